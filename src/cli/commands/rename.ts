import { Command } from 'commander';
import { CliContext } from '../context.js';
import { InvalidArgumentsError } from '../../errors.js';
import { AgentFlag, singleTarget } from './shared.js';

export function registerRename(parent: Command, ctx: CliContext): void {
  parent
    .command('rename')
    .description('Rename a container')
    .argument('<names...>', 'CONTAINER NEW_NAME, or NEW_NAME with --agent')
    .option('--agent <name>', 'agent name in the current project')
    .action(async (names: string[], flags: AgentFlag) => {
      const expected = flags.agent === undefined ? 2 : 1;
      if (names.length !== expected) {
        throw new InvalidArgumentsError(
          flags.agent === undefined
            ? 'rename requires exactly 2 arguments: CONTAINER NEW_NAME'
            : 'rename with --agent requires exactly 1 argument: NEW_NAME'
        );
      }
      const newName = names[names.length - 1];
      const target = await singleTarget(ctx, flags.agent, flags.agent === undefined ? names[0] : undefined);
      await (await ctx.coordinator()).rename(target, newName);
    });
}
