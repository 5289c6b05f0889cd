import { DescribeTagsCommand, EC2Client } from '@aws-sdk/client-ec2';
import {
  DescribeTagsCommand as DescribeLoadBalancerTagsCommand,
  ElasticLoadBalancingV2Client,
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { LambdaClient, ListTagsCommand } from '@aws-sdk/client-lambda';
import { ListTagsForResourceCommand, RDSClient } from '@aws-sdk/client-rds';
import { GetBucketTaggingCommand, S3Client } from '@aws-sdk/client-s3';
import { createRegionalClientGetter } from './clients.js';

type Tags = Record<string, string>;

/**
 * Reads the tags of a resource from the service that owns it
 */
interface TagLookup {
  fetchTags(resourceId: string, region: string): Promise<Tags>;
}

interface TagLookups {
  /** Instances, security groups and VPCs, keyed by resource id */
  ec2: TagLookup;
  /** Buckets, keyed by bucket name */
  s3: TagLookup;
  /** DB instances, keyed by ARN */
  rds: TagLookup;
  /** Functions, keyed by ARN */
  lambda: TagLookup;
  /** Load balancers, keyed by ARN */
  elb: TagLookup;
}

const toTags = (tagList: { Key?: string; Value?: string }[] = []): Tags => {
  const tags: Tags = {};
  for (const { Key, Value } of tagList) {
    if (Key !== undefined) {
      tags[Key] = Value ?? '';
    }
  }

  return tags;
};

/**
 * Build the set of tag lookups backed by the AWS SDK.
 *
 * Every call returns a new set with its own clients, so nothing is shared
 * between invocations.
 */
const createTagLookups = (): TagLookups => {
  const getEc2Client = createRegionalClientGetter(
    'EC2',
    (region) => new EC2Client({ region })
  );
  const getS3Client = createRegionalClientGetter(
    'S3',
    (region) => new S3Client({ region })
  );
  const getRdsClient = createRegionalClientGetter(
    'RDS',
    (region) => new RDSClient({ region })
  );
  const getLambdaClient = createRegionalClientGetter(
    'Lambda',
    (region) => new LambdaClient({ region })
  );
  const getElbClient = createRegionalClientGetter(
    'ElasticLoadBalancingV2',
    (region) => new ElasticLoadBalancingV2Client({ region })
  );

  return {
    ec2: {
      async fetchTags(resourceId, region) {
        const { Tags } = await getEc2Client(region).send(
          new DescribeTagsCommand({
            Filters: [{ Name: 'resource-id', Values: [resourceId] }],
          })
        );

        return toTags(Tags);
      },
    },
    s3: {
      async fetchTags(bucketName, region) {
        const { TagSet } = await getS3Client(region).send(
          new GetBucketTaggingCommand({ Bucket: bucketName })
        );

        return toTags(TagSet);
      },
    },
    rds: {
      async fetchTags(dbInstanceArn, region) {
        const { TagList } = await getRdsClient(region).send(
          new ListTagsForResourceCommand({ ResourceName: dbInstanceArn })
        );

        return toTags(TagList);
      },
    },
    lambda: {
      async fetchTags(functionArn, region) {
        const { Tags } = await getLambdaClient(region).send(
          new ListTagsCommand({ Resource: functionArn })
        );

        return { ...Tags };
      },
    },
    elb: {
      async fetchTags(loadBalancerArn, region) {
        const { TagDescriptions } = await getElbClient(region).send(
          new DescribeLoadBalancerTagsCommand({
            ResourceArns: [loadBalancerArn],
          })
        );

        return toTags(TagDescriptions?.[0]?.Tags);
      },
    },
  };
};

export { createTagLookups };
export type { Tags, TagLookup, TagLookups };
