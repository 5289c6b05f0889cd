import { z } from 'zod';

// Optional leaves degrade to undefined when null or of an unexpected type
const optionalString = () => z.string().optional().catch(undefined);

export const UserIdentitySchema = z.object({
  type: optionalString(),
  userName: optionalString(),
  accountId: optionalString(),
  sessionContext: z
    .object({
      sessionIssuer: z
        .object({
          userName: optionalString(),
        })
        .optional()
        .catch(undefined),
    })
    .optional()
    .catch(undefined),
});

export const CloudTrailDetailSchema = z.object({
  eventSource: z.string(),
  eventName: optionalString(),
  eventTime: optionalString(),
  awsRegion: optionalString(),
  recipientAccountId: optionalString(),
  // Present only when the API call failed
  errorCode: optionalString(),
  userIdentity: UserIdentitySchema.optional().catch(undefined),
  requestParameters: z
    .record(z.string(), z.unknown())
    .nullish()
    .catch(undefined),
});

/**
 * EventBridge envelope for an "AWS API Call via CloudTrail" event.
 *
 * Only `detail.eventSource` is required. Any other field that is missing,
 * `null` or of an unexpected type is read as absent.
 */
export const DeletionEventSchema = z.object({
  detail: CloudTrailDetailSchema,
});

export type UserIdentity = z.infer<typeof UserIdentitySchema>;
export type CloudTrailDetail = z.infer<typeof CloudTrailDetailSchema>;
export type DeletionEvent = z.infer<typeof DeletionEventSchema>;
