import { z } from 'zod';
import {
  type DeletionRule,
  UNKNOWN,
  accountIdOf,
  buildArn,
  displayRegion,
  fetchTagsSafely,
  formatTags,
  readRequestParameters,
} from '../classifier.js';

const TerminateInstancesRequestSchema = z.object({
  instancesSet: z
    .object({
      items: z.array(z.object({ instanceId: z.string().optional() })).optional(),
    })
    .optional(),
});

const DeleteBucketRequestSchema = z.object({
  bucketName: z.string().optional(),
});

const DeleteDBInstanceRequestSchema = z.object({
  dBInstanceIdentifier: z.string().optional(),
  skipFinalSnapshot: z.union([z.boolean(), z.string()]).optional(),
});

const DeleteFunctionRequestSchema = z.object({
  functionName: z.string().optional(),
});

const DeleteSecurityGroupRequestSchema = z.object({
  groupId: z.string().optional(),
  groupName: z.string().optional(),
});

const DeleteVpcRequestSchema = z.object({
  vpcId: z.string().optional(),
});

const DeleteLoadBalancerRequestSchema = z.object({
  loadBalancerArn: z.string().optional(),
});

/**
 * Split a load balancer ARN (`...:loadbalancer/<type>/<name>/<id>`) into its
 * type and name
 */
const parseLoadBalancerArn = (loadBalancerArn: string) => {
  const parts = loadBalancerArn.split('/');
  if (parts.length < 3) {
    return { type: UNKNOWN, name: UNKNOWN };
  }

  return { type: parts[1], name: parts[2] };
};

/**
 * Rules for resources that live in a single region
 */
const regionalRules: readonly DeletionRule[] = [
  {
    eventSource: 'ec2.amazonaws.com',
    eventName: 'TerminateInstances',
    resourceType: 'EC2 Instance',
    iamActions: ['ec2:DescribeTags'],
    async classify({ detail, region, tagLookups }) {
      const request = readRequestParameters(
        TerminateInstancesRequestSchema,
        detail
      );
      // Only the first instance of a batch termination is reported
      const instanceId =
        request?.instancesSet?.items?.[0]?.instanceId ?? UNKNOWN;
      const tags = await fetchTagsSafely(tagLookups.ec2, instanceId, region);

      return {
        resourceName: tags.Name || instanceId,
        resourceId: instanceId,
        additionalInfo: {
          region: displayRegion(detail),
          tags: formatTags(tags, 'No tags found'),
        },
      };
    },
  },
  {
    eventSource: 's3.amazonaws.com',
    eventName: 'DeleteBucket',
    resourceType: 'S3 Bucket',
    iamActions: ['s3:GetBucketTagging'],
    async classify({ detail, region, tagLookups }) {
      const request = readRequestParameters(DeleteBucketRequestSchema, detail);
      const bucketName = request?.bucketName ?? UNKNOWN;
      const tags = await fetchTagsSafely(tagLookups.s3, bucketName, region);

      return {
        resourceName: bucketName,
        resourceId: bucketName,
        additionalInfo: {
          region: displayRegion(detail),
          tags: formatTags(tags, 'No tags found or bucket already deleted'),
        },
      };
    },
  },
  {
    eventSource: 'rds.amazonaws.com',
    eventName: 'DeleteDBInstance',
    resourceType: 'RDS Instance',
    iamActions: ['rds:ListTagsForResource'],
    async classify({ detail, region, tagLookups }) {
      const request = readRequestParameters(
        DeleteDBInstanceRequestSchema,
        detail
      );
      const dbInstanceId = request?.dBInstanceIdentifier ?? UNKNOWN;
      const dbInstanceArn = buildArn({
        service: 'rds',
        region,
        accountId: accountIdOf(detail),
        resourceType: 'db',
        resourceName: dbInstanceId,
      });
      const tags = await fetchTagsSafely(
        tagLookups.rds,
        dbInstanceArn,
        region
      );

      return {
        resourceName: dbInstanceId,
        resourceId: dbInstanceId,
        additionalInfo: {
          region: displayRegion(detail),
          skipFinalSnapshot:
            request?.skipFinalSnapshot === undefined
              ? UNKNOWN
              : String(request.skipFinalSnapshot),
          tags: formatTags(tags, 'No tags found or instance already deleted'),
        },
      };
    },
  },
  {
    eventSource: 'lambda.amazonaws.com',
    eventName: 'DeleteFunction20150331',
    resourceType: 'Lambda Function',
    iamActions: ['lambda:ListTags'],
    async classify({ detail, region, tagLookups }) {
      const request = readRequestParameters(
        DeleteFunctionRequestSchema,
        detail
      );
      const functionName = request?.functionName ?? UNKNOWN;
      const functionArn = functionName.startsWith('arn:')
        ? functionName
        : buildArn({
            service: 'lambda',
            region,
            accountId: accountIdOf(detail),
            resourceType: 'function',
            resourceName: functionName,
          });
      const tags = await fetchTagsSafely(
        tagLookups.lambda,
        functionArn,
        region
      );

      return {
        resourceName: functionName,
        resourceId: functionName,
        additionalInfo: {
          region: displayRegion(detail),
          tags: formatTags(tags, 'No tags found or function already deleted'),
        },
      };
    },
  },
  {
    eventSource: 'ec2.amazonaws.com',
    eventName: 'DeleteSecurityGroup',
    resourceType: 'Security Group',
    iamActions: ['ec2:DescribeTags'],
    async classify({ detail, region, tagLookups }) {
      const request = readRequestParameters(
        DeleteSecurityGroupRequestSchema,
        detail
      );
      const groupId = request?.groupId ?? UNKNOWN;
      const tags = await fetchTagsSafely(tagLookups.ec2, groupId, region);

      return {
        resourceName: request?.groupName ?? groupId,
        resourceId: groupId,
        additionalInfo: {
          region: displayRegion(detail),
          tags: formatTags(
            tags,
            'No tags found or security group already deleted'
          ),
        },
      };
    },
  },
  {
    eventSource: 'ec2.amazonaws.com',
    eventName: 'DeleteVpc',
    resourceType: 'VPC',
    iamActions: ['ec2:DescribeTags'],
    async classify({ detail, region, tagLookups }) {
      const request = readRequestParameters(DeleteVpcRequestSchema, detail);
      const vpcId = request?.vpcId ?? UNKNOWN;
      const tags = await fetchTagsSafely(tagLookups.ec2, vpcId, region);

      return {
        resourceName: vpcId,
        resourceId: vpcId,
        additionalInfo: {
          region: displayRegion(detail),
          tags: formatTags(tags, 'No tags found or VPC already deleted'),
        },
      };
    },
  },
  {
    eventSource: 'elasticloadbalancing.amazonaws.com',
    eventName: 'DeleteLoadBalancer',
    resourceType: 'Elastic Load Balancer',
    iamActions: ['elasticloadbalancing:DescribeTags'],
    async classify({ detail, region, tagLookups }) {
      const request = readRequestParameters(
        DeleteLoadBalancerRequestSchema,
        detail
      );
      const loadBalancerArn = request?.loadBalancerArn ?? UNKNOWN;
      const { type, name } = parseLoadBalancerArn(loadBalancerArn);
      const tags = await fetchTagsSafely(
        tagLookups.elb,
        loadBalancerArn,
        region
      );

      return {
        resourceName: name,
        resourceId: loadBalancerArn,
        additionalInfo: {
          region: displayRegion(detail),
          loadBalancerType: type,
          tags: formatTags(
            tags,
            'No tags found or load balancer already deleted'
          ),
        },
      };
    },
  },
];

export { parseLoadBalancerArn, regionalRules };
