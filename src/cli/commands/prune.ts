import { Command } from 'commander';
import { CliContext } from '../context.js';

export function registerPrune(parent: Command, ctx: CliContext): void {
  parent
    .command('prune')
    .description('Remove unused berth resources (stopped containers, dangling images)')
    .option('-a, --all', 'remove ALL berth resources, including volumes and the network')
    .option('-f, --force', 'do not ask for confirmation')
    .action(async (flags: { all?: boolean; force?: boolean }) => {
      await ctx.pruneEngine().prune({ all: flags.all, force: flags.force });
    });
}
