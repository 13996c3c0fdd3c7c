import { setContext } from '@cloud-starter/aws-powertools-util';
import { Command, CommanderError } from 'commander';
import { randomUUID } from 'crypto';

import type { RemoteGateways } from './aws/gateway';
import { createCommandContext, type CliOutput } from './commands/context';
import { registerDownCommand } from './commands/down';
import { registerStatusCommand } from './commands/status';
import { registerUpCommand } from './commands/up';
import type { Settings } from './config';
import { renderSpinError, toSpinError } from './errors';
import type { Clock, WaitOptions } from './instances/lifecycle';
import { readPackageMeta } from './package';

export const CLI_NAME = 'spin';

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  output?: CliOutput;
  createGateways?: (settings: Settings) => RemoteGateways;
  wait?: WaitOptions;
  clock?: Clock;
}

const processOutput: CliOutput = {
  stdout: (chunk) => process.stdout.write(chunk),
  stderr: (chunk) => process.stderr.write(chunk),
};

/**
 * Runs one invocation of the CLI and resolves with its exit code. Nothing here touches
 * `process.exit`, so callers decide how to leave.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const output = deps.output ?? processOutput;
  let exitCode = 0;

  const context = createCommandContext({
    env: deps.env,
    output,
    createGateways: deps.createGateways,
    wait: deps.wait,
    clock: deps.clock,
    setExitCode: (code) => {
      exitCode = code;
    },
  });

  const program = new Command();
  program
    .name(CLI_NAME)
    .description('Launch, inspect and tear down small groups of tagged EC2 instances')
    .version(readPackageMeta().version ?? '0.0.0', '--version', 'output the version number')
    .exitOverride()
    .configureOutput({
      writeOut: output.stdout,
      writeErr: output.stderr,
    })
    .hook('preAction', (_program, actionCommand) => {
      setContext({ command: actionCommand.name(), invocationId: randomUUID() }, CLI_NAME);
    });

  registerUpCommand(program, context);
  registerStatusCommand(program, context);
  registerDownCommand(program, context);

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const spinError = toSpinError(error);
    output.stderr(`${renderSpinError(spinError)}\n`);
    return spinError.exitCode;
  }
  return exitCode;
}
