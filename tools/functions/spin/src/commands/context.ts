import { addPersistentContextToChildLogger } from '@cloud-starter/aws-powertools-util';

import { InstanceLifecycleManager, LifecycleOptions } from '../instances/lifecycle';
import { createAwsGateways, createOfflineGateways, RemoteGateways } from '../aws/gateway';
import { loadSettings, Settings } from '../config';

export interface CliOutput {
  stdout(chunk: string): void;
  stderr(chunk: string): void;
}

export interface CommandContext {
  /** Settings are loaded on first use and reused for the rest of the invocation. */
  settings(): Settings;
  manager(settings: Settings): InstanceLifecycleManager;
  print(text: string): void;
  printError(text: string): void;
  setExitCode(code: number): void;
}

export interface CommandContextOptions extends LifecycleOptions {
  env?: NodeJS.ProcessEnv;
  output: CliOutput;
  createGateways?: (settings: Settings) => RemoteGateways;
  setExitCode(code: number): void;
}

export function defaultGateways(settings: Settings): RemoteGateways {
  return settings.live ? createAwsGateways(settings.region) : createOfflineGateways();
}

export function createCommandContext(options: CommandContextOptions): CommandContext {
  const { env, output, createGateways = defaultGateways, setExitCode, ...lifecycleOptions } = options;
  let settings: Settings | undefined;

  return {
    settings: () => {
      if (!settings) {
        settings = loadSettings(env);
        addPersistentContextToChildLogger({ region: settings.region });
      }
      return settings;
    },
    manager: (forSettings) => new InstanceLifecycleManager(createGateways(forSettings), lifecycleOptions),
    print: (text) => output.stdout(`${text}\n`),
    printError: (text) => output.stderr(`${text}\n`),
    setExitCode,
  };
}
