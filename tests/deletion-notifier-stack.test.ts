import { App } from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { describe, it } from 'vitest';
import { DeletionNotifierStack } from '../src/deletion-notifier-stack.js';
import { globalRules } from '../src/rules/global.js';
import { regionalRules } from '../src/rules/regional.js';

const synthRegionalStack = (
  options: { webhookUrl?: string; createTrail?: boolean } = {}
) => {
  // Skip esbuild, the template is all we look at
  const app = new App({ context: { 'aws:cdk:bundling-stacks': [] } });
  const stack = new DeletionNotifierStack(app, 'regional-test', {
    env: { region: 'eu-west-1' },
    appName: 'test-notifier',
    variant: 'regional',
    entry: './src/regional-handler.ts',
    rules: regionalRules,
    ...options,
  });

  return Template.fromStack(stack);
};

describe('deletion notifier stack', () => {
  it('creates one EventBridge rule per classification rule', () => {
    // Act
    const template = synthRegionalStack();

    // Assess
    template.resourceCountIs('AWS::Events::Rule', regionalRules.length);
    template.hasResourceProperties('AWS::Events::Rule', {
      Name: 'test-notifier-ec2-TerminateInstances',
      EventPattern: {
        source: ['aws.ec2'],
        'detail-type': ['AWS API Call via CloudTrail'],
        detail: {
          eventSource: ['ec2.amazonaws.com'],
          eventName: ['TerminateInstances'],
        },
      },
    });
  });

  it('points the function at the webhook secret', () => {
    // Act
    const template = synthRegionalStack();

    // Assess
    template.hasResourceProperties('AWS::Lambda::Function', {
      FunctionName: 'test-notifier-regional',
      Environment: {
        Variables: Match.objectLike({
          POWERTOOLS_SERVICE_NAME: 'test-notifier',
        }),
      },
    });
    template.hasResourceProperties('AWS::SecretsManager::Secret', {
      Name: 'test-notifier-webhook-regional',
    });
  });

  it('leaves the webhook secret to be filled in when no URL is configured', () => {
    // Act
    const template = synthRegionalStack();

    // Assess
    template.hasResourceProperties('AWS::SecretsManager::Secret', {
      GenerateSecretString: Match.anyValue(),
      SecretString: Match.absent(),
    });
  });

  it('seeds the webhook secret when a URL is configured', () => {
    // Act
    const template = synthRegionalStack({
      webhookUrl: 'https://example.webhook.office.com/webhookb2/test',
    });

    // Assess
    template.hasResourceProperties('AWS::SecretsManager::Secret', {
      GenerateSecretString: Match.absent(),
      SecretString: Match.anyValue(),
    });
  });

  it.each([
    [true, 1],
    [false, 0],
  ])('creates a trail when createTrail is %s', (createTrail, count) => {
    // Act
    const template = synthRegionalStack({ createTrail });

    // Assess
    template.resourceCountIs('AWS::CloudTrail::Trail', count);
  });

  it('creates a multi-region trail that logs global service events', () => {
    // Act
    const template = synthRegionalStack({ createTrail: true });

    // Assess
    template.hasResourceProperties('AWS::CloudTrail::Trail', {
      TrailName: 'test-notifier-trail',
      IsMultiRegionTrail: true,
      IncludeGlobalServiceEvents: true,
    });
  });

  it('only matches Route 53 batches that delete a record', () => {
    // Prepare
    const app = new App({ context: { 'aws:cdk:bundling-stacks': [] } });
    const stack = new DeletionNotifierStack(app, 'global-test', {
      env: { region: 'us-east-1' },
      appName: 'test-notifier',
      variant: 'global',
      entry: './src/global-handler.ts',
      rules: globalRules,
    });

    // Act
    const template = Template.fromStack(stack);

    // Assess
    template.resourceCountIs('AWS::Events::Rule', globalRules.length);
    template.hasResourceProperties('AWS::Events::Rule', {
      EventPattern: {
        source: ['aws.route53'],
        'detail-type': ['AWS API Call via CloudTrail'],
        detail: {
          eventSource: ['route53.amazonaws.com'],
          eventName: ['ChangeResourceRecordSets'],
          requestParameters: {
            changeBatch: { changes: { action: ['DELETE'] } },
          },
        },
      },
    });
  });
});
