import { Command } from 'commander';
import { CliContext } from '../context.js';
import { AgentFlag, parseNonNegative, targetsOf } from './shared.js';

export function registerStop(parent: Command, ctx: CliContext): void {
  parent
    .command('stop')
    .description('Stop one or more running containers')
    .argument('[containers...]', 'container names or ID prefixes')
    .option('--agent <name>', 'agent name in the current project')
    .option('-t, --time <seconds>', 'seconds to wait before killing the container', parseNonNegative)
    .option('--ignore-missing', 'succeed when a container does not exist')
    .action(async (containers: string[], flags: AgentFlag & { time?: number; ignoreMissing?: boolean }) => {
      const targets = await targetsOf(ctx, flags.agent, containers);
      const coordinator = await ctx.coordinator();
      await coordinator.stop(targets, { time: flags.time, ignoreMissing: flags.ignoreMissing });
    });
}
