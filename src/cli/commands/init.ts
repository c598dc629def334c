import path from 'path';
import { Command } from 'commander';
import { CliContext } from '../context.js';
import { initProject } from '../../config/project.js';
import { normalizeProjectName } from '../../orchestrator/naming.js';
import { colorsFor } from '../utils/output.js';

export function registerInit(parent: Command, ctx: CliContext): void {
  parent
    .command('init')
    .description('Create berth.yaml in the current directory')
    .argument('[project]', 'project name (defaults to the directory name)')
    .option('--image <image>', 'base image for the project')
    .option('-f, --force', 'overwrite an existing berth.yaml')
    .action(async (project: string | undefined, flags: { image?: string; force?: boolean }) => {
      const name = normalizeProjectName(project ?? path.basename(ctx.cwd));
      const file = await initProject(ctx.cwd, name, { image: flags.image, force: flags.force });
      const c = colorsFor(ctx.io.err);
      ctx.io.err.write(`${c.green('✓')} Created ${file} for project ${name}\n`);
    });
}
