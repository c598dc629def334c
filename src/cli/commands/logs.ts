import { Command } from 'commander';
import { CliContext } from '../context.js';
import { AgentFlag, parseTimestamp, singleTarget } from './shared.js';
import { InvalidArgumentsError } from '../../errors.js';

interface LogFlags extends AgentFlag {
  follow?: boolean;
  timestamps?: boolean;
  since?: number;
  until?: number;
  tail: string;
  details?: boolean;
}

export function registerLogs(parent: Command, ctx: CliContext): void {
  parent
    .command('logs')
    .description('Fetch the logs of a container')
    .argument('[container]', 'container name or ID prefix')
    .option('--agent <name>', 'agent name in the current project')
    .option('-f, --follow', 'follow log output')
    .option('-t, --timestamps', 'show timestamps')
    .option('--since <time>', 'show logs since a timestamp or relative time (e.g. 10m)', (value: string) => parseTimestamp(value))
    .option('--until <time>', 'show logs before a timestamp or relative time', (value: string) => parseTimestamp(value))
    .option('-n, --tail <lines>', 'number of lines from the end, or "all"', 'all')
    .option('--details', 'show extra details')
    .action(async (container: string | undefined, flags: LogFlags) => {
      if (flags.tail !== 'all' && !/^\d+$/.test(flags.tail)) {
        throw new InvalidArgumentsError(`invalid --tail value "${flags.tail}": expected a number or "all"`);
      }
      const target = await singleTarget(ctx, flags.agent, container);
      await (await ctx.coordinator()).logs(target, {
        follow: flags.follow ?? false,
        timestamps: flags.timestamps,
        since: flags.since,
        until: flags.until,
        tail: flags.tail,
        details: flags.details,
      });
    });
}
