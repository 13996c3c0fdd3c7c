import { Command } from 'commander';

import { withApply } from '../config';
import { renderDownTable, renderJson } from '../output/render';
import type { CommandContext } from './context';

interface DownOptions {
  group?: string;
  apply?: boolean;
  table?: boolean;
}

export function registerDownCommand(program: Command, context: CommandContext): void {
  program
    .command('down')
    .description('Terminate the instances of a group (dry-run unless --apply and SPIN_LIVE=1)')
    .option('--group <group>', 'Group to terminate; required unless SPIN_ALLOW_GLOBAL_DOWN=1')
    .option('--apply', 'Actually terminate the instances')
    .option('--table', 'Print a table instead of JSON')
    .action(async (options: DownOptions) => {
      const apply = options.apply === true;
      const settings = apply ? withApply(context.settings()) : context.settings();

      const result = await context.manager(settings).down(settings, { group: options.group || undefined, apply });
      context.print(options.table ? renderDownTable(result) : renderJson(result));
    });
}
