import { getStringFromEnv } from '@aws-lambda-powertools/commons/utils/env';
import type { Context } from 'aws-lambda';
import {
  type DeletionRule,
  assertUniqueRules,
  classifyEvent,
} from './classifier.js';
import { logger } from './logger.js';
import { renderMessageCard } from './message-card.js';
import { DeletionEventSchema } from './schemas/cloudtrail-event.js';
import { type TagLookups, createTagLookups } from './tag-lookups.js';
import type { HandlerResponse, MessageCard } from './types.js';
import { getWebhookUrl, postMessageCard } from './webhook.js';

const INVOCATION_KEYS = ['eventSource', 'eventName', 'awsRegion'];

interface DeletionNotifierOptions {
  /** Classification rules, unique by event source and name */
  rules: readonly DeletionRule[];
  /** Called once per invocation */
  createTagLookups?: () => TagLookups;
  getWebhookUrl?: (secretName: string) => Promise<string>;
  deliver?: (webhookUrl: string, card: MessageCard) => Promise<boolean>;
}

/**
 * Create a Lambda handler that turns CloudTrail deletion events into webhook
 * notifications.
 *
 * The handler never throws, every outcome maps to a status code:
 * - 400 when the event is not a CloudTrail event
 * - 200 when the notification is sent, or the API call failed and there is
 *   nothing to report
 * - 500 when delivery fails or anything else goes wrong
 *
 * Events no rule matches are still reported, as an `Unknown` resource.
 */
const createDeletionNotifier = ({
  rules,
  createTagLookups: tagLookupsFactory = createTagLookups,
  getWebhookUrl: webhookUrlProvider = getWebhookUrl,
  deliver = postMessageCard,
}: DeletionNotifierOptions) => {
  assertUniqueRules(rules);

  return async (event: unknown, context: Context): Promise<HandlerResponse> => {
    logger.addContext(context);
    logger.logEventIfEnabled(event);

    try {
      const parsedEvent = DeletionEventSchema.safeParse(event);
      if (!parsedEvent.success) {
        logger.warn('Not a valid CloudTrail event', {
          issues: parsedEvent.error.issues,
        });
        return { statusCode: 400, body: 'Not a valid CloudTrail event' };
      }

      const { detail } = parsedEvent.data;
      logger.appendKeys({
        eventSource: detail.eventSource,
        eventName: detail.eventName,
        awsRegion: detail.awsRegion,
      });

      if (detail.errorCode) {
        logger.info('Skipping failed API call', {
          errorCode: detail.errorCode,
        });
        return {
          statusCode: 200,
          body: `Event skipped - API call failed with ${detail.errorCode}`,
        };
      }

      const resourceInfo = await classifyEvent({
        detail,
        rules,
        tagLookups: tagLookupsFactory(),
      });
      logger.info('Classified deleted resource', { resourceInfo });

      const webhookUrl = await webhookUrlProvider(
        getStringFromEnv({ key: 'WEBHOOK_SECRET_NAME' })
      );
      const card = renderMessageCard(parsedEvent.data, resourceInfo);

      if (!(await deliver(webhookUrl, card))) {
        return {
          statusCode: 500,
          body: 'Failed to deliver webhook notification',
        };
      }

      return {
        statusCode: 200,
        body: `Notification sent for ${resourceInfo.resourceType} deletion: ${resourceInfo.resourceName}`,
      };
    } catch (error) {
      logger.error('Error processing event', { error });
      return {
        statusCode: 500,
        body: `Error: ${error instanceof Error ? error.message : String(error)}`,
      };
    } finally {
      logger.removeKeys(INVOCATION_KEYS);
    }
  };
};

export { createDeletionNotifier };
export type { DeletionNotifierOptions };
