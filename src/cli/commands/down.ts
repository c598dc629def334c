import { Command } from 'commander';
import { CliContext } from '../context.js';

export function registerDown(parent: Command, ctx: CliContext): void {
  parent
    .command('down')
    .description("Stop every container of the project")
    .option('--project <name>', 'act on another project')
    .option('--clean', "also remove the containers and the project's images")
    .option('--all', 'with --clean, also remove the containers\' volumes')
    .action(async (flags: { project?: string; clean?: boolean; all?: boolean }) => {
      await (await ctx.coordinator()).down({ project: flags.project, clean: flags.clean, all: flags.all });
    });
}
