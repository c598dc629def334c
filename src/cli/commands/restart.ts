import { Command } from 'commander';
import { CliContext } from '../context.js';
import { AgentFlag, parseNonNegative, targetsOf } from './shared.js';

export function registerRestart(parent: Command, ctx: CliContext): void {
  parent
    .command('restart')
    .description('Restart one or more containers')
    .argument('[containers...]', 'container names or ID prefixes')
    .option('--agent <name>', 'agent name in the current project')
    .option('-t, --time <seconds>', 'seconds to wait before killing the container', parseNonNegative)
    .action(async (containers: string[], flags: AgentFlag & { time?: number }) => {
      const targets = await targetsOf(ctx, flags.agent, containers);
      const coordinator = await ctx.coordinator();
      await coordinator.restart(targets, { time: flags.time });
    });
}
