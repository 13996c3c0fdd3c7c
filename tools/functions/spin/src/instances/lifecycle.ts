import { createChildLogger } from '@cloud-starter/aws-powertools-util';
import moment from 'moment';

import { AmiResolver } from '../ami/ami';
import type { ComputeGateway, InstanceHealthStatus, RemoteGateways, RemoteInstance, TagMap } from '../aws/gateway';
import { baseTags, GROUP_TAG, Settings } from '../config';
import { PolicyViolationError, PollTimeoutError, translateRemoteError } from '../errors';
import { generateGroupId } from './group';
import { classifyHealth } from './health';
import type { DownRequest, DownResult, InstanceSummary, UpApplied, UpRequest, UpResult } from './types';

const logger = createChildLogger('instances');

// Instances in these states are already on their way out and are not terminated again.
const GONE_STATES = ['shutting-down', 'terminated'];

export interface WaitOptions {
  intervalMs: number;
  timeoutMs: number;
}

export const DEFAULT_WAIT: WaitOptions = { intervalMs: 5_000, timeoutMs: 90_000 };

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface LifecycleOptions {
  wait?: WaitOptions;
  clock?: Clock;
  amiResolver?: AmiResolver;
}

export function instanceTags(settings: Settings, group: string): TagMap {
  return { ...baseTags(settings), [GROUP_TAG]: group };
}

function scopeTags(settings: Settings, group?: string): TagMap {
  return group ? instanceTags(settings, group) : baseTags(settings);
}

function carriesTags(instance: RemoteInstance, tags: TagMap): boolean {
  return Object.entries(tags).every(([key, value]) => instance.tags[key] === value);
}

export class InstanceLifecycleManager {
  private readonly wait: WaitOptions;
  private readonly clock: Clock;
  private readonly amiResolver: AmiResolver;

  constructor(
    private readonly gateways: RemoteGateways,
    options: LifecycleOptions = {},
  ) {
    this.wait = options.wait ?? DEFAULT_WAIT;
    this.clock = options.clock ?? systemClock;
    this.amiResolver = options.amiResolver ?? new AmiResolver(gateways);
  }

  /**
   * Launch `count` instances under one group. Without `apply` and the live interlock this only
   * previews what would be launched.
   */
  async up(settings: Settings, request: UpRequest): Promise<UpResult> {
    const group = request.group || generateGroupId();
    const type = request.instanceType || settings.defaultInstanceType;

    if (!(request.apply && settings.live)) {
      return { applied: false, group, count: request.count, type, region: settings.region };
    }

    const imageId = await this.amiResolver.resolve(settings.region);
    const compute = await this.compute(settings, 'launch');

    let ids: string[];
    try {
      ids = await compute.launchInstances({
        imageId,
        instanceType: type,
        count: request.count,
        tags: instanceTags(settings, group),
      });
    } catch (error) {
      logger.warn('Launch request failed.', { error, group });
      throw translateRemoteError('launch', error, { region: settings.region });
    }

    const result: UpApplied = { applied: true, group, ids, count: ids.length, type, region: settings.region };
    const warning = await this.waitUntilRunning(compute, ids, settings.region);
    return warning ? { ...result, warning } : result;
  }

  /** Summaries of the owner's instances, optionally narrowed to one group. */
  async status(settings: Settings, group?: string): Promise<InstanceSummary[]> {
    if (settings.dryRun || !settings.live) {
      return [];
    }

    const compute = await this.compute(settings, 'describe');
    const instances = await this.locate(compute, settings, group);
    if (instances.length === 0) {
      return [];
    }

    const health = await this.healthById(
      compute,
      instances.map((i) => i.id),
    );
    const now = moment(this.clock.now());
    return instances.map((instance) => {
      const status = health?.get(instance.id);
      return {
        id: instance.id,
        state: instance.state,
        publicIp: instance.publicIp ?? null,
        uptimeMinutes: instance.launchTime ? now.diff(moment(instance.launchTime), 'minutes') : null,
        health: health ? classifyHealth(instance.state, status?.systemStatus, status?.instanceStatus) : 'UNKNOWN',
        tags: instance.tags,
      };
    });
  }

  /** Terminate the instances of a group (or, with the global override, all of the owner's). */
  async down(settings: Settings, request: DownRequest): Promise<DownResult> {
    if (!request.group && !settings.allowGlobalDown) {
      throw new PolicyViolationError(
        'Refusing to down without --group; set SPIN_ALLOW_GLOBAL_DOWN=1 to override (dangerous).',
      );
    }

    if (!(request.apply && settings.live)) {
      return { applied: false, terminated: [] };
    }

    const compute = await this.compute(settings, 'describe');
    const ids = (await this.locate(compute, settings, request.group))
      .filter((instance) => !GONE_STATES.includes(instance.state))
      .map((instance) => instance.id);
    if (ids.length === 0) {
      logger.info('No instances to terminate.', { group: request.group });
      return { applied: true, terminated: [] };
    }

    try {
      await compute.terminateInstances(ids);
    } catch (error) {
      logger.warn('Terminate request failed.', { error, ids });
      throw translateRemoteError('terminate', error, { region: settings.region });
    }
    return { applied: true, terminated: ids };
  }

  private async compute(settings: Settings, operation: 'launch' | 'describe'): Promise<ComputeGateway> {
    try {
      return await this.gateways.compute();
    } catch (error) {
      throw translateRemoteError(operation, error, { region: settings.region });
    }
  }

  private async locate(compute: ComputeGateway, settings: Settings, group?: string): Promise<RemoteInstance[]> {
    const tags = scopeTags(settings, group);
    let instances: RemoteInstance[];
    try {
      instances = await compute.describeInstances({ tags });
    } catch (error) {
      throw translateRemoteError('describe', error, { region: settings.region });
    }
    return instances.filter((instance) => carriesTags(instance, tags));
  }

  private async healthById(
    compute: ComputeGateway,
    ids: string[],
  ): Promise<Map<string, InstanceHealthStatus> | undefined> {
    try {
      const statuses = await compute.describeInstanceHealth(ids);
      return new Map(statuses.map((s) => [s.id, s]));
    } catch (error) {
      logger.warn('Health lookup failed; reporting UNKNOWN health.', { error });
      return undefined;
    }
  }

  /**
   * Polls until every instance is running. An instance that reports `terminated` also ends its
   * wait. Returns a warning when the instances could not be confirmed running.
   */
  private async waitUntilRunning(compute: ComputeGateway, ids: string[], region: string): Promise<string | undefined> {
    const started = this.clock.now();
    for (;;) {
      let instances: RemoteInstance[];
      try {
        instances = await compute.describeInstances({ ids });
      } catch (error) {
        const cause = translateRemoteError('describe', error, { region });
        logger.warn('Polling instance state failed.', { error, ids });
        return `Could not confirm instances are running: ${cause.message}`;
      }

      const states = new Map(instances.map((i) => [i.id, i.state]));
      const pending = ids.filter((id) => {
        const state = states.get(id);
        return state !== 'running' && state !== 'terminated';
      });
      if (pending.length === 0) {
        const terminated = ids.filter((id) => states.get(id) === 'terminated');
        if (terminated.length > 0) {
          // TODO: decide whether an instance terminated during boot should produce a warning
          logger.warn('Instance(s) terminated while waiting for running state.', { terminated });
        }
        return undefined;
      }

      const elapsed = this.clock.now() - started;
      if (elapsed >= this.wait.timeoutMs) {
        const timeout = new PollTimeoutError(this.wait.timeoutMs);
        logger.warn(timeout.message, { pending });
        return timeout.message;
      }
      await this.clock.sleep(Math.min(this.wait.intervalMs, this.wait.timeoutMs - elapsed));
    }
  }
}
