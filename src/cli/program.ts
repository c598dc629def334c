import { Command, CommanderError } from 'commander';
import { CliContext, CliEnvironment } from './context.js';
import { printError } from './utils/output.js';
import { exitCodeFor } from '../errors.js';
import { registerAttach } from './commands/attach.js';
import { registerCopy } from './commands/cp.js';
import { registerCreate } from './commands/create.js';
import { registerDown } from './commands/down.js';
import { registerExec } from './commands/exec.js';
import { registerInit } from './commands/init.js';
import { registerInspect } from './commands/inspect.js';
import { registerKill } from './commands/kill.js';
import { registerList } from './commands/list.js';
import { registerLogs } from './commands/logs.js';
import { registerPause, registerUnpause } from './commands/pause.js';
import { registerPrune } from './commands/prune.js';
import { registerRemove } from './commands/remove.js';
import { registerRename } from './commands/rename.js';
import { registerRestart } from './commands/restart.js';
import { registerRun } from './commands/run.js';
import { registerStart } from './commands/start.js';
import { registerStop } from './commands/stop.js';
import { registerTop } from './commands/top.js';
import { registerWait } from './commands/wait.js';

export const VERSION = '0.1.0';

type Register = (parent: Command, ctx: CliContext) => void;

/** Verbs that exist under `container` and again at top level. */
const CONTAINER_VERBS: Register[] = [
  registerRun,
  registerCreate,
  registerStart,
  registerStop,
  registerRestart,
  registerKill,
  registerPause,
  registerUnpause,
  registerRename,
  registerWait,
  registerExec,
  registerAttach,
  registerLogs,
  registerTop,
  registerInspect,
  registerCopy,
];

export function buildProgram(ctx: CliContext): Command {
  const { io } = ctx;
  const program = new Command();

  // Settings made here are copied into every subcommand created below.
  program
    .name('berth')
    .description('Run coding agents in project-scoped Docker containers')
    .version(VERSION)
    .exitOverride()
    .enablePositionalOptions()
    .configureOutput({
      writeOut: (text) => io.out.write(text),
      writeErr: (text) => io.err.write(text),
    });

  const container = program.command('container').description('Manage berth containers');
  for (const register of CONTAINER_VERBS) {
    register(container, ctx);
  }
  registerRemove(container, ctx);
  registerList(container, ctx);

  for (const register of CONTAINER_VERBS) {
    register(program, ctx);
  }
  registerRemove(program, ctx, 'rm');
  registerList(program, ctx, 'ps');

  registerInit(program, ctx);
  registerPrune(program, ctx);
  registerDown(program, ctx);
  return program;
}

/**
 * Run one invocation and map its outcome to a process exit code.
 */
export async function main(argv: string[], environment: CliEnvironment): Promise<number> {
  const ctx = new CliContext(environment);
  const program = buildProgram(ctx);
  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed usage errors, help and the version.
      return error.exitCode === 0 ? 0 : 1;
    }
    printError(ctx.io, error);
    return exitCodeFor(error);
  }
}
