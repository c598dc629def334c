import { Command } from 'commander';
import { CliContext } from '../context.js';
import { AgentFlag, singleTarget } from './shared.js';

export function registerAttach(parent: Command, ctx: CliContext): void {
  parent
    .command('attach')
    .description("Attach the terminal to a running container's main process")
    .argument('[container]', 'container name or ID prefix')
    .option('--agent <name>', 'agent name in the current project')
    .option('--no-stdin', 'do not attach stdin')
    .action(async (container: string | undefined, flags: AgentFlag & { stdin: boolean }) => {
      const target = await singleTarget(ctx, flags.agent, container);
      await (await ctx.coordinator()).attach(target, { noStdin: !flags.stdin });
    });
}
