import { Command } from 'commander';
import { CliContext } from '../context.js';
import { AgentFlag, targetsOf } from './shared.js';

export function registerWait(parent: Command, ctx: CliContext): void {
  parent
    .command('wait')
    .description('Block until containers stop, then print their exit codes')
    .argument('[containers...]', 'container names or ID prefixes')
    .option('--agent <name>', 'agent name in the current project')
    .action(async (containers: string[], flags: AgentFlag) => {
      const targets = await targetsOf(ctx, flags.agent, containers);
      await (await ctx.coordinator()).wait(targets);
    });
}
