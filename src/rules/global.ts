import { z } from 'zod';
import {
  type DeletionRule,
  UNKNOWN,
  displayRegion,
  readRequestParameters,
} from '../classifier.js';

const DeleteUserRequestSchema = z.object({
  userName: z.string().optional(),
});

const ChangeResourceRecordSetsRequestSchema = z.object({
  hostedZoneId: z.string().optional(),
  changeBatch: z
    .object({
      changes: z
        .array(
          z.object({
            action: z.string().optional(),
            resourceRecordSet: z
              .object({
                name: z.string().optional(),
                type: z.string().optional(),
              })
              .optional(),
          })
        )
        .optional(),
    })
    .optional(),
});

/**
 * Rules for identity and DNS resources, which are not tied to a region.
 *
 * CloudTrail delivers these events in us-east-1 only.
 */
const globalRules: readonly DeletionRule[] = [
  {
    eventSource: 'iam.amazonaws.com',
    eventName: 'DeleteUser',
    resourceType: 'IAM User',
    iamActions: [],
    async classify({ detail }) {
      const request = readRequestParameters(DeleteUserRequestSchema, detail);
      const userName = request?.userName ?? UNKNOWN;

      return {
        resourceName: userName,
        resourceId: userName,
        additionalInfo: {
          region: displayRegion(detail),
        },
      };
    },
  },
  {
    eventSource: 'route53.amazonaws.com',
    eventName: 'ChangeResourceRecordSets',
    resourceType: 'Route53 DNS Record',
    iamActions: [],
    detailPattern: {
      requestParameters: {
        changeBatch: {
          changes: {
            action: ['DELETE'],
          },
        },
      },
    },
    async classify({ detail }) {
      const request = readRequestParameters(
        ChangeResourceRecordSetsRequestSchema,
        detail
      );
      const deletion = request?.changeBatch?.changes?.find(
        ({ action }) => action === 'DELETE'
      );
      const hostedZoneId = (request?.hostedZoneId ?? UNKNOWN).replace(
        /^\/hostedzone\//,
        ''
      );
      const recordName = deletion?.resourceRecordSet?.name ?? UNKNOWN;
      const recordType = deletion?.resourceRecordSet?.type ?? UNKNOWN;

      return {
        resourceName: recordName,
        resourceId: `${hostedZoneId}/${recordName}/${recordType}`,
        additionalInfo: {
          hostedZoneId,
          recordType,
          region: displayRegion(detail),
        },
      };
    },
  },
];

export { globalRules };
