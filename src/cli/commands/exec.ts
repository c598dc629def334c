import { Command } from 'commander';
import { CliContext } from '../context.js';
import { InvalidArgumentsError } from '../../errors.js';
import { AgentFlag, collect, singleTarget } from './shared.js';

interface ExecFlags extends AgentFlag {
  interactive?: boolean;
  tty?: boolean;
  detach?: boolean;
  env: string[];
  workdir?: string;
  user?: string;
  privileged?: boolean;
}

export function registerExec(parent: Command, ctx: CliContext): void {
  parent
    .command('exec')
    .description('Run a command in a running container')
    .argument('[args...]', 'CONTAINER COMMAND [ARG...], or COMMAND [ARG...] with --agent')
    .option('--agent <name>', 'agent name in the current project')
    .option('-i, --interactive', 'keep stdin open')
    .option('-t, --tty', 'allocate a pseudo-TTY')
    .option('-d, --detach', 'run the command in the background')
    .option('-e, --env <var>', 'set an environment variable', collect, [])
    .option('-w, --workdir <dir>', 'working directory inside the container')
    .option('-u, --user <user>', 'user to run as')
    .option('--privileged', 'give extended privileges to the command')
    .passThroughOptions()
    .action(async (args: string[], flags: ExecFlags) => {
      const positional = flags.agent === undefined ? args[0] : undefined;
      const command = flags.agent === undefined ? args.slice(1) : args;
      const target = await singleTarget(ctx, flags.agent, positional);
      if (command.length === 0) {
        throw new InvalidArgumentsError('exec requires a command to run');
      }
      await (await ctx.coordinator()).exec(target, {
        command,
        interactive: flags.interactive ?? false,
        tty: flags.tty ?? false,
        detach: flags.detach ?? false,
        env: flags.env,
        workdir: flags.workdir,
        user: flags.user,
        privileged: flags.privileged,
      });
    });
}
