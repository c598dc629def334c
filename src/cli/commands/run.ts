import { Command } from 'commander';
import { CliContext } from '../context.js';
import { collect } from './shared.js';
import type { ContainerSpec } from '../../orchestrator/lifecycle.js';

export interface SpecFlags {
  agent?: string;
  name?: string;
  env: string[];
  volume: string[];
  publish: string[];
  label: string[];
  workdir?: string;
  user?: string;
  entrypoint?: string;
  tty?: boolean;
  interactive?: boolean;
  rm?: boolean;
}

/**
 * Flags shared by run and create.
 */
export function withSpecOptions(command: Command): Command {
  return command
    .argument('<image>', 'image reference, or @ for the project image')
    .argument('[command...]', 'command to run in the container')
    .option('--agent <name>', 'agent name; the container is named berth.<project>.<agent>')
    .option('--name <name>', 'explicit container name instead of an agent')
    .option('-e, --env <var>', 'set an environment variable (KEY=VALUE or KEY)', collect, [])
    .option('-v, --volume <mount>', 'bind mount or named volume (source:target[:ro])', collect, [])
    .option('-p, --publish <port>', 'publish a port ([ip:][hostPort:]containerPort[/proto])', collect, [])
    .option('-l, --label <label>', 'set a label (key=value)', collect, [])
    .option('-w, --workdir <dir>', 'working directory inside the container')
    .option('-u, --user <user>', 'user to run as')
    .option('--entrypoint <cmd>', 'override the image entrypoint')
    .option('-t, --tty', 'allocate a pseudo-TTY')
    .option('-i, --interactive', 'keep stdin open')
    .option('--rm', 'remove the container when it exits')
    .passThroughOptions();
}

export function toSpec(image: string, command: string[], flags: SpecFlags): ContainerSpec {
  return {
    image,
    command,
    agent: flags.agent,
    name: flags.name,
    env: flags.env,
    volumes: flags.volume,
    publish: flags.publish,
    labels: flags.label,
    workdir: flags.workdir,
    user: flags.user,
    entrypoint: flags.entrypoint,
    tty: flags.tty ?? false,
    interactive: flags.interactive ?? false,
    autoRemove: flags.rm ?? false,
  };
}

export function registerRun(parent: Command, ctx: CliContext): void {
  withSpecOptions(parent.command('run').description('Create and start a new container'))
    .option('-d, --detach', 'run in the background and print the container ID')
    .action(async (image: string, command: string[], flags: SpecFlags & { detach?: boolean }) => {
      const coordinator = await ctx.coordinator();
      await coordinator.run({ ...toSpec(image, command, flags), detach: flags.detach ?? false });
    });
}
