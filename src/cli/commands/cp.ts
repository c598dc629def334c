import { Command } from 'commander';
import { CliContext } from '../context.js';
import { resolveCopyOperand } from '../../orchestrator/resolver.js';
import { AgentFlag } from './shared.js';

export function registerCopy(parent: Command, ctx: CliContext): void {
  parent
    .command('cp')
    .description('Copy files between a container and the host')
    .argument('<source>', 'CONTAINER:PATH, :PATH with --agent, a host path, or - for a tar stream')
    .argument('<destination>', 'CONTAINER:PATH, :PATH with --agent, a host path, or - for a tar stream')
    .option('--agent <name>', 'agent name in the current project')
    .action(async (source: string, destination: string, flags: AgentFlag) => {
      const project = flags.agent === undefined ? null : await ctx.projectName();
      await ctx.copyEngine().copy(
        resolveCopyOperand(source, project, flags.agent),
        resolveCopyOperand(destination, project, flags.agent)
      );
    });
}
