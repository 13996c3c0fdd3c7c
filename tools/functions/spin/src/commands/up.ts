import { Command, InvalidArgumentError } from 'commander';

import { withApply } from '../config';
import { toSpinError } from '../errors';
import type { InstanceSummary } from '../instances/types';
import { renderJson, renderUpTable } from '../output/render';
import type { CommandContext } from './context';

interface UpOptions {
  count: number;
  type?: string;
  group?: string;
  apply?: boolean;
  table?: boolean;
}

export function parseCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(count) || count < 1) {
    throw new InvalidArgumentError('Count must be a positive integer.');
  }
  return count;
}

export function registerUpCommand(program: Command, context: CommandContext): void {
  program
    .command('up')
    .description('Launch a group of tagged instances (dry-run unless --apply and SPIN_LIVE=1)')
    .requiredOption('--count <n>', 'Number of instances to launch', parseCount)
    .option('--type <type>', 'EC2 instance type (defaults to SPIN_INSTANCE_TYPE)')
    .option('--group <group>', 'Group id to tag the instances with (generated when omitted)')
    .option('--apply', 'Actually launch the instances')
    .option('--table', 'Print a table instead of JSON')
    .action(async (options: UpOptions) => {
      const apply = options.apply === true;
      const settings = apply ? withApply(context.settings()) : context.settings();
      const manager = context.manager(settings);

      const result = await manager.up(settings, {
        count: options.count,
        instanceType: options.type,
        group: options.group,
        apply,
      });

      if (options.table) {
        let instances: InstanceSummary[] = [];
        let listingFailure: string | undefined;
        if (result.applied && result.ids.length > 0) {
          try {
            instances = await manager.status(settings, result.group);
          } catch (error) {
            listingFailure = toSpinError(error).message;
          }
        }
        context.print(renderUpTable(result, instances));
        if (listingFailure) {
          context.printError(`Warning: Could not list the launched instances: ${listingFailure}`);
          context.setExitCode(1);
        }
      } else {
        context.print(renderJson(result));
      }

      if (result.applied && result.warning) {
        context.printError(`Warning: ${result.warning}`);
        context.setExitCode(1);
      }
    });
}
