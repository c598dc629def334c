import { Command } from 'commander';
import { CliContext } from '../context.js';
import { AgentFlag, targetsOf } from './shared.js';

export function registerPause(parent: Command, ctx: CliContext): void {
  parent
    .command('pause')
    .description('Pause all processes in one or more containers')
    .argument('[containers...]', 'container names or ID prefixes')
    .option('--agent <name>', 'agent name in the current project')
    .action(async (containers: string[], flags: AgentFlag) => {
      const targets = await targetsOf(ctx, flags.agent, containers);
      await (await ctx.coordinator()).pause(targets);
    });
}

export function registerUnpause(parent: Command, ctx: CliContext): void {
  parent
    .command('unpause')
    .description('Unpause all processes in one or more containers')
    .argument('[containers...]', 'container names or ID prefixes')
    .option('--agent <name>', 'agent name in the current project')
    .action(async (containers: string[], flags: AgentFlag) => {
      const targets = await targetsOf(ctx, flags.agent, containers);
      await (await ctx.coordinator()).unpause(targets);
    });
}
