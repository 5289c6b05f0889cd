import { getSecret } from '@aws-lambda-powertools/parameters/secrets';
import { z } from 'zod';
import { logger } from './logger.js';
import type { MessageCard } from './types.js';

const WebhookSecretSchema = z.object({
  webhookUrl: z.string().url(),
});

/**
 * Read the webhook URL from a Secrets Manager secret shaped like
 * `{ "webhookUrl": "https://..." }`.
 *
 * The secret is fetched on every call, errors propagate to the caller.
 *
 * @param secretName - Name or ARN of the secret
 */
const getWebhookUrl = async (secretName: string): Promise<string> => {
  const secret = await getSecret(secretName, {
    transform: 'json',
    forceFetch: true,
  });
  const { webhookUrl } = WebhookSecretSchema.parse(secret);

  return webhookUrl;
};

/**
 * POST a message card to the webhook.
 *
 * Single attempt, returns `false` on transport errors and non-2xx responses.
 *
 * @param webhookUrl - Incoming webhook URL
 * @param card - Card to send
 */
const postMessageCard = async (
  webhookUrl: string,
  card: MessageCard
): Promise<boolean> => {
  try {
    const response = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(card),
    });
    const responseText = await response.text();

    if (!response.ok) {
      logger.error('Webhook rejected the notification', {
        status: response.status,
        response: responseText,
      });
      return false;
    }

    logger.info('Notification sent', { response: responseText });
    return true;
  } catch (error) {
    logger.error('Error sending notification', { error });
    return false;
  }
};

export { getWebhookUrl, postMessageCard };
