import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { vi } from 'vitest';
import type { CloudTrailDetail } from '../src/schemas/cloudtrail-event.js';
import type { TagLookup, TagLookups } from '../src/tag-lookups.js';

const testsDir = dirname(fileURLToPath(import.meta.url));

const context = {
  callbackWaitsForEmptyEventLoop: true,
  functionVersion: '$LATEST',
  functionName: 'foo-bar-function',
  memoryLimitInMB: '128',
  logGroupName: '/aws/lambda/foo-bar-function-123456abcdef',
  logStreamName: '2021/03/09/[$LATEST]abcdef123456abcdef123456abcdef123456',
  invokedFunctionArn:
    'arn:aws:lambda:eu-west-1:123456789012:function:foo-bar-function',
  awsRequestId: 'c6af9ac6-7b61-11e6-9a41-93e812345678',
  getRemainingTimeInMillis: () => 1234,
  done: () => console.log('Done!'),
  fail: () => console.log('Failed!'),
  succeed: () => console.log('Succeeded!'),
};

const getTestEvent = <T extends Record<string, unknown>>({
  eventsPath,
  filename,
}: {
  eventsPath: string;
  filename: string;
}): T =>
  JSON.parse(
    readFileSync(join(testsDir, eventsPath, `${filename}.json`), 'utf-8')
  ) as T;

/**
 * Build a CloudTrail event detail with sensible defaults
 */
const buildDetail = (
  overrides: Partial<CloudTrailDetail> & Pick<CloudTrailDetail, 'eventSource'>
): CloudTrailDetail => ({
  eventTime: '2024-05-14T09:30:00Z',
  awsRegion: 'eu-west-1',
  recipientAccountId: '123456789012',
  userIdentity: {
    type: 'IAMUser',
    userName: 'alice',
    accountId: '123456789012',
  },
  ...overrides,
});

const failingTagLookup = (): TagLookup => ({
  fetchTags: vi
    .fn<TagLookup['fetchTags']>()
    .mockRejectedValue(new Error('Resource not found')),
});

/**
 * Tag lookups that all fail, as they do once a resource is gone
 */
const failingTagLookups = (): TagLookups => ({
  ec2: failingTagLookup(),
  s3: failingTagLookup(),
  rds: failingTagLookup(),
  lambda: failingTagLookup(),
  elb: failingTagLookup(),
});

export { buildDetail, context, failingTagLookups, getTestEvent };
