import { Command } from 'commander';
import { CliContext } from '../context.js';
import { formatAge, printTable } from '../utils/output.js';

interface ListFlags {
  running?: boolean;
  project?: string;
  allProjects?: boolean;
  quiet?: boolean;
}

const HEADERS = ['CONTAINER ID', 'NAME', 'PROJECT', 'AGENT', 'IMAGE', 'CREATED', 'STATUS'];

export function registerList(parent: Command, ctx: CliContext, name = 'list'): void {
  const command = parent.command(name);
  if (name === 'list') {
    command.aliases(['ls', 'ps']);
  }
  command
    .description('List managed containers')
    .option('--running', 'only show running containers')
    .option('--project <name>', 'show containers of another project')
    .option('--all-projects', 'show containers of every project')
    .option('-q, --quiet', 'only print container IDs')
    .action(async (flags: ListFlags) => {
      const coordinator = await ctx.coordinator();
      const containers = await coordinator.list({
        running: flags.running,
        project: flags.project,
        allProjects: flags.allProjects,
      });
      if (flags.quiet) {
        for (const container of containers) {
          ctx.io.out.write(`${container.id.slice(0, 12)}\n`);
        }
        return;
      }
      printTable(
        ctx.io.out,
        HEADERS,
        containers.map((container) => [
          container.id.slice(0, 12),
          container.name,
          container.project ?? '',
          container.agent ?? '',
          container.image,
          formatAge(container.created),
          container.status,
        ])
      );
    });
}
