import yn from 'yn';

import { ConfigurationError } from './errors';

export const DEFAULT_REGION = 'eu-north-1';
export const DEFAULT_INSTANCE_TYPE = 't3.micro';
export const PROJECT = 'cloud-starter';
export const MANAGED_BY = 'spin';
export const GROUP_TAG = 'SpinGroup';

/**
 * Runtime settings for one command invocation, safety toggles included. Loaded once, then passed
 * to every operation.
 */
export interface Settings {
  readonly region: string;
  readonly owner: string;
  readonly dryRun: boolean;
  readonly defaultInstanceType: string;
  /** Live-operation interlock: nothing reaches AWS unless this is set. */
  readonly live: boolean;
  /** Permits `down` without a group, i.e. across every instance the owner has. */
  readonly allowGlobalDown: boolean;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const region = env.SPIN_REGION || env.AWS_DEFAULT_REGION || DEFAULT_REGION;

  const owner = env.SPIN_OWNER?.trim();
  if (!owner) {
    throw new ConfigurationError(
      'SPIN_OWNER is required (set to your handle/email). Refusing to proceed without an explicit owner.',
    );
  }

  return Object.freeze({
    region,
    owner,
    dryRun: yn(env.SPIN_DRY_RUN, { default: true }),
    defaultInstanceType: env.SPIN_INSTANCE_TYPE || DEFAULT_INSTANCE_TYPE,
    live: yn(env.SPIN_LIVE, { default: false }),
    allowGlobalDown: yn(env.SPIN_ALLOW_GLOBAL_DOWN, { default: false }),
  });
}

export function withApply(settings: Settings): Settings {
  return Object.freeze({ ...settings, dryRun: false });
}

export function baseTags(settings: Settings): Record<string, string> {
  return {
    Project: PROJECT,
    ManagedBy: MANAGED_BY,
    Owner: settings.owner,
  };
}
