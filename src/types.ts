declare global {
  namespace NodeJS {
    interface ProcessEnv {
      AWS_REGION: string;
      WEBHOOK_SECRET_NAME?: string;
    }
  }
}

export interface AppConfig {
  /** Name prefix for all AWS resources */
  appName: string;
  /** Regions that get a regional notifier stack */
  regions: string[];
  /** Tags applied to every stack */
  tags: Record<string, string>;
  /** Seeds the webhook secrets at deploy time */
  webhookUrl?: string;
  /** Create a CloudTrail trail, for accounts that have none */
  createTrail?: boolean;
}

export const RESOURCE_TYPES = [
  'EC2 Instance',
  'S3 Bucket',
  'RDS Instance',
  'Lambda Function',
  'Security Group',
  'VPC',
  'Elastic Load Balancer',
  'IAM User',
  'Route53 DNS Record',
  'Unknown',
] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

/**
 * What we know about a deleted resource, extracted from the CloudTrail record
 * and enriched with whatever tags the owning service still returns.
 */
export interface ResourceDeletionInfo {
  readonly resourceType: ResourceType;
  /** Friendly name, falls back to the resource id */
  readonly resourceName: string;
  readonly resourceId: string;
  /** Rendered in insertion order */
  readonly additionalInfo: Readonly<Record<string, string>>;
}

export interface OpenUriAction {
  '@type': 'OpenUri';
  name: string;
  targets: { os: 'default'; uri: string }[];
}

export interface MessageCardSection {
  activityTitle: string;
  activitySubtitle: string;
  text: string;
  markdown: boolean;
}

/**
 * Legacy actionable message card accepted by Teams incoming webhooks
 */
export interface MessageCard {
  '@type': 'MessageCard';
  '@context': 'http://schema.org/extensions';
  themeColor: string;
  summary: string;
  sections: MessageCardSection[];
  potentialAction: OpenUriAction[];
}

export interface HandlerResponse {
  statusCode: 200 | 400 | 500;
  body: string;
}
