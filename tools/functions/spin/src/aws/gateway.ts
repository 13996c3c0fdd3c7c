import { createChildLogger } from '@cloud-starter/aws-powertools-util';

import { DependencyMissingError, SpinError } from '../errors';

const logger = createChildLogger('gateway');

export type TagMap = Record<string, string>;

export interface LaunchRequest {
  imageId: string;
  instanceType: string;
  count: number;
  tags: TagMap;
}

export interface InstanceQuery {
  ids?: string[];
  tags?: TagMap;
}

export interface RemoteInstance {
  id: string;
  state: string;
  publicIp?: string;
  launchTime?: Date;
  tags: TagMap;
}

export interface InstanceHealthStatus {
  id: string;
  systemStatus?: string;
  instanceStatus?: string;
}

export interface ComputeGateway {
  launchInstances(request: LaunchRequest): Promise<string[]>;
  describeInstances(query: InstanceQuery): Promise<RemoteInstance[]>;
  describeInstanceHealth(ids: string[]): Promise<InstanceHealthStatus[]>;
  terminateInstances(ids: string[]): Promise<string[]>;
}

export interface ParameterStoreGateway {
  getParameter(name: string): Promise<string | undefined>;
}

/**
 * Accessors for the two remote services. Implementations construct their clients on first use,
 * never before, so preview paths work without the AWS SDK being loadable.
 */
export interface RemoteGateways {
  compute(): Promise<ComputeGateway>;
  parameterStore(): Promise<ParameterStoreGateway>;
}

export interface GatewayModules {
  compute: () => Promise<{ createComputeGateway(region: string): ComputeGateway }>;
  parameterStore: () => Promise<{ createParameterStoreGateway(region: string): ParameterStoreGateway }>;
}

const defaultModules: GatewayModules = {
  compute: () => import('./ec2'),
  parameterStore: () => import('./parameters'),
};

function isModuleNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return error.code === 'ERR_MODULE_NOT_FOUND' || error.code === 'MODULE_NOT_FOUND';
}

async function loadModule<T>(dependency: string, load: () => Promise<T>): Promise<T> {
  try {
    return await load();
  } catch (error) {
    if (isModuleNotFound(error)) {
      throw new DependencyMissingError(dependency, error);
    }
    throw error;
  }
}

function memoize<T>(factory: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined;
  return () => {
    if (!pending) {
      pending = factory();
      // a failed construction is retried on the next call
      pending.catch(() => {
        pending = undefined;
      });
    }
    return pending;
  };
}

export function createAwsGateways(region: string, modules: GatewayModules = defaultModules): RemoteGateways {
  return {
    compute: memoize(async () => {
      const module = await loadModule('@aws-sdk/client-ec2', modules.compute);
      logger.debug('Constructed EC2 gateway', { region });
      return module.createComputeGateway(region);
    }),
    parameterStore: memoize(async () => {
      const module = await loadModule('@aws-sdk/client-ssm', modules.parameterStore);
      logger.debug('Constructed SSM gateway', { region });
      return module.createParameterStoreGateway(region);
    }),
  };
}

/**
 * Gateways for runs where the live interlock is closed. Reaching either accessor is a bug in the
 * caller, so it fails instead of silently doing nothing.
 */
export function createOfflineGateways(): RemoteGateways {
  const refuse = (service: string) => () =>
    Promise.reject(
      new SpinError(`Remote access to ${service} is disabled.`, {
        hint: 'Set SPIN_LIVE=1 and pass --apply to run against AWS.',
      }),
    );
  return {
    compute: refuse('EC2'),
    parameterStore: refuse('SSM'),
  };
}
