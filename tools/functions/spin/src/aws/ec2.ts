import {
  DescribeInstanceStatusCommand,
  DescribeInstancesCommand,
  EC2Client,
  Filter,
  Instance,
  RunInstancesCommand,
  Tag,
  TerminateInstancesCommand,
  _InstanceType,
} from '@aws-sdk/client-ec2';
import { createChildLogger } from '@cloud-starter/aws-powertools-util';

import { ConfigurationError } from '../errors';
import type {
  ComputeGateway,
  InstanceHealthStatus,
  InstanceQuery,
  LaunchRequest,
  RemoteInstance,
  TagMap,
} from './gateway';

const logger = createChildLogger('ec2');

// DescribeInstanceStatus accepts at most 100 instance ids per request.
export const HEALTH_BATCH_SIZE = 100;
const MAX_RESULTS = 1000;

function isInstanceType(value: string): value is _InstanceType {
  return Object.values<string>(_InstanceType).includes(value);
}

function toTagList(tags: TagMap): Tag[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}

function toFilters(tags: TagMap): Filter[] {
  return Object.entries(tags).map(([key, value]) => ({ Name: `tag:${key}`, Values: [value] }));
}

function toTagMap(tags: Tag[] | undefined): TagMap {
  const map: TagMap = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      map[tag.Key] = tag.Value ?? '';
    }
  }
  return map;
}

function toRemoteInstance(instance: Instance): RemoteInstance | undefined {
  if (!instance.InstanceId) {
    return undefined;
  }
  return {
    id: instance.InstanceId,
    state: instance.State?.Name ?? 'unknown',
    publicIp: instance.PublicIpAddress,
    launchTime: instance.LaunchTime,
    tags: toTagMap(instance.Tags),
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class AwsComputeGateway implements ComputeGateway {
  constructor(private readonly ec2Client: EC2Client) {}

  async launchInstances(request: LaunchRequest): Promise<string[]> {
    if (!isInstanceType(request.instanceType)) {
      throw new ConfigurationError(`Unknown EC2 instance type '${request.instanceType}'.`);
    }
    const tags = toTagList(request.tags);
    logger.debug('Launching instances', { ...request });

    // https://docs.aws.amazon.com/AWSEC2/latest/APIReference/API_RunInstances.html
    const response = await this.ec2Client.send(
      new RunInstancesCommand({
        ImageId: request.imageId,
        InstanceType: request.instanceType,
        MinCount: request.count,
        MaxCount: request.count,
        TagSpecifications: [
          { ResourceType: 'instance', Tags: tags },
          { ResourceType: 'volume', Tags: tags },
        ],
      }),
    );

    const ids = response.Instances?.flatMap((i) => (i.InstanceId ? [i.InstanceId] : [])) ?? [];
    logger.info('Created instance(s): ', ids.join(','));
    return ids;
  }

  async describeInstances(query: InstanceQuery): Promise<RemoteInstance[]> {
    const filters = toFilters(query.tags ?? {});
    const instances: RemoteInstance[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.ec2Client.send(
        new DescribeInstancesCommand({
          InstanceIds: query.ids,
          Filters: filters.length > 0 ? filters : undefined,
          // MaxResults cannot be combined with explicit instance ids
          MaxResults: query.ids ? undefined : MAX_RESULTS,
          NextToken: nextToken,
        }),
      );
      for (const reservation of response.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          const remote = toRemoteInstance(instance);
          if (remote) {
            instances.push(remote);
          }
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return instances;
  }

  async describeInstanceHealth(ids: string[]): Promise<InstanceHealthStatus[]> {
    const statuses: InstanceHealthStatus[] = [];
    for (const batch of chunk(ids, HEALTH_BATCH_SIZE)) {
      let nextToken: string | undefined;
      do {
        const response = await this.ec2Client.send(
          new DescribeInstanceStatusCommand({
            InstanceIds: batch,
            IncludeAllInstances: true,
            NextToken: nextToken,
          }),
        );
        for (const status of response.InstanceStatuses ?? []) {
          if (!status.InstanceId) {
            continue;
          }
          statuses.push({
            id: status.InstanceId,
            systemStatus: status.SystemStatus?.Status,
            instanceStatus: status.InstanceStatus?.Status,
          });
        }
        nextToken = response.NextToken;
      } while (nextToken);
    }
    return statuses;
  }

  async terminateInstances(ids: string[]): Promise<string[]> {
    const response = await this.ec2Client.send(new TerminateInstancesCommand({ InstanceIds: ids }));
    const terminated = response.TerminatingInstances?.flatMap((i) => (i.InstanceId ? [i.InstanceId] : [])) ?? [];
    logger.info(`Instance(s) ${ids.join(',')} have been terminated.`);
    return terminated;
  }
}

export function createComputeGateway(region: string): ComputeGateway {
  return new AwsComputeGateway(new EC2Client({ region }));
}
