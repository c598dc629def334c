import { Command } from 'commander';
import { CliContext } from '../context.js';
import { AgentFlag, targetsOf } from './shared.js';

export function registerStart(parent: Command, ctx: CliContext): void {
  parent
    .command('start')
    .description('Start one or more stopped containers')
    .argument('[containers...]', 'container names or ID prefixes')
    .option('--agent <name>', 'agent name in the current project')
    .option('-a, --attach', 'attach to the container output')
    .option('-i, --interactive', 'attach stdin')
    .action(async (containers: string[], flags: AgentFlag & { attach?: boolean; interactive?: boolean }) => {
      const targets = await targetsOf(ctx, flags.agent, containers);
      const coordinator = await ctx.coordinator();
      await coordinator.start(targets, { attach: flags.attach, interactive: flags.interactive });
    });
}
