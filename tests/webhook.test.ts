import {
  GetSecretValueCommand,
  SecretsManagerClient,
} from '@aws-sdk/client-secrets-manager';
import { mockClient } from 'aws-sdk-client-mock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MessageCard } from '../src/types.js';
import { getWebhookUrl, postMessageCard } from '../src/webhook.js';

vi.hoisted(() => {
  process.env.POWERTOOLS_DEV = 'true';
  process.env.AWS_REGION = 'eu-west-1';
});

const WEBHOOK_URL = 'https://example.webhook.office.com/webhookb2/test';

describe('webhook', () => {
  const secretsClient = mockClient(SecretsManagerClient);
  const mockFetch = vi.fn();

  const card: MessageCard = {
    '@type': 'MessageCard',
    '@context': 'http://schema.org/extensions',
    themeColor: 'C43532',
    summary: 'VPC Deleted',
    sections: [],
    potentialAction: [],
  };

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    secretsClient.reset();
    mockFetch.mockReset();
    vi.unstubAllGlobals();
  });

  describe('getWebhookUrl', () => {
    it('reads the webhook URL from the secret', async () => {
      // Prepare
      secretsClient.on(GetSecretValueCommand).resolves({
        SecretString: JSON.stringify({ webhookUrl: WEBHOOK_URL }),
      });

      // Act
      const webhookUrl = await getWebhookUrl('test-webhook-secret');

      // Assess
      expect(webhookUrl).toBe(WEBHOOK_URL);
      expect(secretsClient).toReceiveCommandWith(GetSecretValueCommand, {
        SecretId: 'test-webhook-secret',
      });
    });

    it('fetches the secret again on every call', async () => {
      // Prepare
      secretsClient.on(GetSecretValueCommand).resolves({
        SecretString: JSON.stringify({ webhookUrl: WEBHOOK_URL }),
      });

      // Act
      await getWebhookUrl('test-webhook-secret');
      await getWebhookUrl('test-webhook-secret');

      // Assess
      expect(secretsClient.commandCalls(GetSecretValueCommand)).toHaveLength(2);
    });

    it('throws when the secret has no webhook URL', async () => {
      // Prepare
      secretsClient.on(GetSecretValueCommand).resolves({
        SecretString: JSON.stringify({ url: WEBHOOK_URL }),
      });

      // Act & Assess
      await expect(getWebhookUrl('test-webhook-secret')).rejects.toThrow();
    });

    it('throws when the secret cannot be read', async () => {
      // Prepare
      secretsClient.on(GetSecretValueCommand).rejects(new Error('AccessDenied'));

      // Act & Assess
      await expect(getWebhookUrl('test-webhook-secret')).rejects.toThrow();
    });
  });

  describe('postMessageCard', () => {
    it('posts the card as JSON', async () => {
      // Prepare
      mockFetch.mockResolvedValue({
        ok: true,
        status: 200,
        text: async () => '1',
      });

      // Act
      const delivered = await postMessageCard(WEBHOOK_URL, card);

      // Assess
      expect(delivered).toBe(true);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch).toHaveBeenCalledWith(WEBHOOK_URL, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(card),
      });
    });

    it('returns false on a non-2xx response without retrying', async () => {
      // Prepare
      mockFetch.mockResolvedValue({
        ok: false,
        status: 400,
        text: async () => 'Bad payload',
      });

      // Act
      const delivered = await postMessageCard(WEBHOOK_URL, card);

      // Assess
      expect(delivered).toBe(false);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('returns false on a transport error', async () => {
      // Prepare
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));

      // Act
      const delivered = await postMessageCard(WEBHOOK_URL, card);

      // Assess
      expect(delivered).toBe(false);
    });
  });
});
