import { Command } from 'commander';
import { CliContext } from '../context.js';
import { SpecFlags, toSpec, withSpecOptions } from './run.js';

export function registerCreate(parent: Command, ctx: CliContext): void {
  withSpecOptions(parent.command('create').description('Create a new container without starting it')).action(
    async (image: string, command: string[], flags: SpecFlags) => {
      const coordinator = await ctx.coordinator();
      await coordinator.create(toSpec(image, command, flags));
    }
  );
}
