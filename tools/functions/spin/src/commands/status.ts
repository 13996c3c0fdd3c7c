import { Command } from 'commander';

import { renderJson, renderStatusTable } from '../output/render';
import type { CommandContext } from './context';

interface StatusOptions {
  group?: string;
  table?: boolean;
}

export function registerStatusCommand(program: Command, context: CommandContext): void {
  program
    .command('status')
    .description("List the owner's instances with state, uptime and health")
    .option('--group <group>', 'Only show instances of this group')
    .option('--table', 'Print a table instead of JSON')
    .action(async (options: StatusOptions) => {
      const settings = context.settings();
      const instances = await context.manager(settings).status(settings, options.group);
      context.print(options.table ? renderStatusTable(instances) : renderJson(instances));
    });
}
