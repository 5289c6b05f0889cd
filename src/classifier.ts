import type { z } from 'zod';
import { logger } from './logger.js';
import type { CloudTrailDetail } from './schemas/cloudtrail-event.js';
import type { TagLookup, TagLookups, Tags } from './tag-lookups.js';
import type { ResourceDeletionInfo, ResourceType } from './types.js';

const UNKNOWN = 'Unknown';

const UNKNOWN_RESOURCE: ResourceDeletionInfo = Object.freeze({
  resourceType: 'Unknown',
  resourceName: UNKNOWN,
  resourceId: UNKNOWN,
  additionalInfo: Object.freeze({}),
});

interface RuleContext {
  detail: CloudTrailDetail;
  /** Region used to query the owning service */
  region: string;
  tagLookups: TagLookups;
}

/**
 * Classification rule for a single CloudTrail API call.
 *
 * A rule table must not contain two rules for the same event source and name.
 */
interface DeletionRule {
  eventSource: string;
  eventName: string;
  resourceType: Exclude<ResourceType, 'Unknown'>;
  /** IAM actions the rule needs to enrich the record */
  iamActions: readonly string[];
  /** Extra `detail` fields for the EventBridge rule pattern */
  detailPattern?: Record<string, unknown>;
  classify(
    context: RuleContext
  ): Promise<Omit<ResourceDeletionInfo, 'resourceType'>>;
}

const ruleKey = ({
  eventSource,
  eventName,
}: Pick<DeletionRule, 'eventSource' | 'eventName'>) =>
  `${eventSource}:${eventName}`;

/**
 * Throw if two rules share the same event source and name
 *
 * @param rules - Rule table to check
 */
const assertUniqueRules = (rules: readonly DeletionRule[]) => {
  const seen = new Set<string>();
  for (const rule of rules) {
    const key = ruleKey(rule);
    if (seen.has(key)) {
      throw new Error(`Duplicate classification rule for ${key}`);
    }
    seen.add(key);
  }
};

/**
 * Region shown to users, as opposed to the one we query
 */
const displayRegion = (detail: CloudTrailDetail) =>
  detail.awsRegion ?? UNKNOWN;

/**
 * Parse the request parameters of a CloudTrail record with the given schema.
 *
 * Returns `undefined` when the parameters are missing or have an unexpected
 * shape, callers then fall back to `Unknown` values.
 */
const readRequestParameters = <T extends z.ZodTypeAny>(
  schema: T,
  detail: CloudTrailDetail
): z.infer<T> | undefined => {
  if (detail.requestParameters == null) {
    logger.warn('Request parameters missing from event');
    return undefined;
  }
  const result = schema.safeParse(detail.requestParameters);
  if (!result.success) {
    logger.warn('Unexpected request parameters shape', {
      issues: result.error.issues,
    });
    return undefined;
  }

  return result.data;
};

/**
 * Fetch the tags of a resource, returning no tags if the lookup fails.
 *
 * By the time the event arrives the resource is often gone, so failures
 * are expected and only logged.
 */
const fetchTagsSafely = async (
  lookup: TagLookup,
  resourceId: string,
  region: string
): Promise<Tags> => {
  if (resourceId === UNKNOWN) {
    return {};
  }
  try {
    return await lookup.fetchTags(resourceId, region);
  } catch (error) {
    logger.warn('Unable to fetch resource tags', {
      resourceId,
      region,
      error,
    });
    return {};
  }
};

/**
 * Format tags as `Key=Value` pairs, or the placeholder when there are none
 */
const formatTags = (tags: Tags, placeholder: string): string => {
  const entries = Object.entries(tags);
  if (entries.length === 0) {
    return placeholder;
  }

  return entries.map(([key, value]) => `${key}=${value}`).join(', ');
};

/**
 * Build the ARN of a resource from the account that owns it.
 *
 * @returns the ARN, or `Unknown` when the account id or resource name is unknown
 */
const buildArn = ({
  service,
  region,
  accountId,
  resourceType,
  resourceName,
}: {
  service: string;
  region: string;
  accountId?: string;
  resourceType: string;
  resourceName: string;
}): string => {
  if (!accountId || resourceName === UNKNOWN) {
    logger.warn('Cannot build resource ARN', { service, resourceName });
    return UNKNOWN;
  }
  let partition = 'aws';
  if (region.startsWith('cn-')) {
    partition = 'aws-cn';
  } else if (region.startsWith('us-gov-')) {
    partition = 'aws-us-gov';
  }

  return `arn:${partition}:${service}:${region}:${accountId}:${resourceType}:${resourceName}`;
};

/**
 * Account that owns the deleted resource
 */
const accountIdOf = (detail: CloudTrailDetail) =>
  detail.recipientAccountId ?? detail.userIdentity?.accountId;

/**
 * Classify a CloudTrail record using the first rule that matches its event
 * source and name.
 *
 * Never rejects: events with no matching rule, or a rule that fails, produce
 * the `Unknown` record.
 *
 * @param param - options object
 * @param param.detail - The `detail` of the EventBridge event
 * @param param.rules - Rule table of the handler
 * @param param.tagLookups - Tag lookups for this invocation
 */
const classifyEvent = async ({
  detail,
  rules,
  tagLookups,
}: {
  detail: CloudTrailDetail;
  rules: readonly DeletionRule[];
  tagLookups: TagLookups;
}): Promise<ResourceDeletionInfo> => {
  const rule = rules.find(
    (candidate) =>
      candidate.eventSource === detail.eventSource &&
      candidate.eventName === detail.eventName
  );
  if (!rule) {
    logger.info('No classification rule matches the event');
    return UNKNOWN_RESOURCE;
  }

  try {
    const info = await rule.classify({
      detail,
      region: detail.awsRegion ?? process.env.AWS_REGION,
      tagLookups,
    });

    return Object.freeze({
      resourceType: rule.resourceType,
      ...info,
      additionalInfo: Object.freeze({ ...info.additionalInfo }),
    });
  } catch (error) {
    logger.error('Classification rule failed', { error });
    return UNKNOWN_RESOURCE;
  }
};

export {
  UNKNOWN,
  UNKNOWN_RESOURCE,
  accountIdOf,
  assertUniqueRules,
  buildArn,
  classifyEvent,
  displayRegion,
  fetchTagsSafely,
  formatTags,
  readRequestParameters,
  ruleKey,
};
export type { DeletionRule, RuleContext };
