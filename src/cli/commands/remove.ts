import { Command } from 'commander';
import { CliContext } from '../context.js';
import { AgentFlag, targetsOf } from './shared.js';

export function registerRemove(parent: Command, ctx: CliContext, name = 'remove'): void {
  const command = parent.command(name);
  if (name === 'remove') {
    command.alias('rm');
  }
  command
    .description('Remove one or more containers')
    .argument('[containers...]', 'container names or ID prefixes')
    .option('--agent <name>', 'agent name in the current project')
    .option('-f, --force', 'kill and remove a running container')
    .option('-v, --volumes', "remove the container's managed volumes")
    .option('--no-volumes', "keep the container's managed volumes")
    .action(async (containers: string[], flags: AgentFlag & { force?: boolean; volumes?: boolean }) => {
      const targets = await targetsOf(ctx, flags.agent, containers);
      await (await ctx.coordinator()).remove(targets, { force: flags.force, volumes: flags.volumes });
    });
}
