import { Command } from 'commander';
import { CliContext } from '../context.js';
import { printTable } from '../utils/output.js';
import { AgentFlag, singleTarget } from './shared.js';

export function registerTop(parent: Command, ctx: CliContext): void {
  parent
    .command('top')
    .description('Display the running processes of a container')
    .argument('[args...]', 'CONTAINER [ps OPTIONS], or [ps OPTIONS] with --agent')
    .option('--agent <name>', 'agent name in the current project')
    .passThroughOptions()
    .action(async (args: string[], flags: AgentFlag) => {
      const positional = flags.agent === undefined ? args[0] : undefined;
      const psArgs = (flags.agent === undefined ? args.slice(1) : args).join(' ');
      const target = await singleTarget(ctx, flags.agent, positional);
      const result = await (await ctx.coordinator()).top(target, psArgs || undefined);
      printTable(ctx.io.out, result.titles, result.processes);
    });
}
