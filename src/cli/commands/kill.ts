import { Command } from 'commander';
import { CliContext } from '../context.js';
import { AgentFlag, targetsOf } from './shared.js';

export function registerKill(parent: Command, ctx: CliContext): void {
  parent
    .command('kill')
    .description('Send a signal to one or more running containers')
    .argument('[containers...]', 'container names or ID prefixes')
    .option('--agent <name>', 'agent name in the current project')
    .option('-s, --signal <signal>', 'signal to send', 'SIGKILL')
    .action(async (containers: string[], flags: AgentFlag & { signal: string }) => {
      const targets = await targetsOf(ctx, flags.agent, containers);
      const coordinator = await ctx.coordinator();
      await coordinator.kill(targets, flags.signal);
    });
}
