import { Duration, RemovalPolicy, SecretValue, Stack, type StackProps } from 'aws-cdk-lib';
import { Trail } from 'aws-cdk-lib/aws-cloudtrail';
import { Rule } from 'aws-cdk-lib/aws-events';
import { LambdaFunction } from 'aws-cdk-lib/aws-events-targets';
import { PolicyStatement } from 'aws-cdk-lib/aws-iam';
import { Runtime } from 'aws-cdk-lib/aws-lambda';
import { NodejsFunction, OutputFormat } from 'aws-cdk-lib/aws-lambda-nodejs';
import { LogGroup, RetentionDays } from 'aws-cdk-lib/aws-logs';
import { Secret } from 'aws-cdk-lib/aws-secretsmanager';
import type { Construct } from 'constructs';
import { type DeletionRule, ruleKey } from './classifier.js';

interface DeletionNotifierStackProps extends StackProps {
  appName: string;
  variant: 'regional' | 'global';
  /** Handler module, relative to the project root */
  entry: string;
  rules: readonly DeletionRule[];
  /** Seeds the webhook secret, otherwise it must be set after deployment */
  webhookUrl?: string;
  /** Create a multi-region CloudTrail trail and its log bucket */
  createTrail?: boolean;
}

class DeletionNotifierStack extends Stack {
  public constructor(
    scope: Construct,
    id: string,
    props: DeletionNotifierStackProps
  ) {
    super(scope, id, props);

    const { appName, variant, entry, rules, webhookUrl, createTrail } = props;

    if (createTrail) {
      new Trail(this, 'deletion-events-trail', {
        trailName: `${appName}-trail`,
        isMultiRegionTrail: true,
        includeGlobalServiceEvents: true,
      });
    }

    const webhookSecret = new Secret(this, 'webhook-secret', {
      secretName: `${appName}-webhook-${variant}`,
      description: `Chat webhook URL for ${appName} (${variant} resources), stored as {"webhookUrl":"..."}`,
      secretObjectValue: webhookUrl
        ? { webhookUrl: SecretValue.unsafePlainText(webhookUrl) }
        : undefined,
    });

    const fnName = `${appName}-${variant}`;
    const notifierFn = new NodejsFunction(this, 'notifier-fn', {
      functionName: fnName,
      entry,
      handler: 'handler',
      runtime: Runtime.NODEJS_22_X,
      timeout: Duration.seconds(60),
      memorySize: 256,
      bundling: {
        minify: true,
        mainFields: ['module', 'main'],
        sourceMap: true,
        format: OutputFormat.ESM,
      },
      logGroup: new LogGroup(this, 'notifier-log-group', {
        logGroupName: `/aws/lambda/${fnName}`,
        removalPolicy: RemovalPolicy.DESTROY,
        retention: RetentionDays.ONE_MONTH,
      }),
      environment: {
        POWERTOOLS_SERVICE_NAME: appName,
        WEBHOOK_SECRET_NAME: webhookSecret.secretName,
        POWERTOOLS_LOGGER_LOG_EVENT: 'true',
        NODE_OPTIONS: '--enable-source-maps',
      },
    });
    webhookSecret.grantRead(notifierFn);

    // Tag read APIs don't support resource-level permissions
    const tagReadActions = [...new Set(rules.flatMap((r) => r.iamActions))];
    if (tagReadActions.length > 0) {
      notifierFn.addToRolePolicy(
        new PolicyStatement({
          actions: tagReadActions,
          resources: ['*'],
        })
      );
    }

    for (const rule of rules) {
      const [service] = rule.eventSource.split('.');
      new Rule(this, `${ruleKey(rule)}-rule`, {
        ruleName: `${appName}-${service}-${rule.eventName}`.substring(0, 64),
        description: `${rule.resourceType} deletion via ${rule.eventName}`,
        eventPattern: {
          source: [`aws.${service}`],
          detailType: ['AWS API Call via CloudTrail'],
          detail: {
            eventSource: [rule.eventSource],
            eventName: [rule.eventName],
            ...rule.detailPattern,
          },
        },
        targets: [new LambdaFunction(notifierFn)],
        enabled: true,
      });
    }
  }
}

export { DeletionNotifierStack };
export type { DeletionNotifierStackProps };
