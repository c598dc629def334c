import { InvalidArgumentError } from 'commander';
import { CliContext } from '../context.js';
import { resolveTargets, validateAgentArgs } from '../../orchestrator/resolver.js';

export interface AgentFlag {
  agent?: string;
}

/** Repeatable option accumulator. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a number.');
  }
  return Number(value);
}

export function parseNonNegative(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 0) {
    throw new InvalidArgumentError('Must not be negative.');
  }
  return parsed;
}

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600 };

/**
 * Unix seconds from a timestamp flag: unix seconds, an RFC 3339 date, or a
 * duration back from `now` such as "10m" or "1h30m".
 */
export function parseTimestamp(value: string, now: number = Date.now()): number {
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.floor(Number(trimmed));
  }
  if (/^(\d+[smh])+$/.test(trimmed)) {
    let seconds = 0;
    for (const [, amount, unit] of trimmed.matchAll(/(\d+)([smh])/g)) {
      seconds += Number(amount) * DURATION_UNITS[unit];
    }
    return Math.floor(now / 1000) - seconds;
  }
  const parsed = Date.parse(trimmed);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Expected unix seconds, an RFC 3339 date or a duration like 10m.');
  }
  return Math.floor(parsed / 1000);
}

/**
 * Container references from --agent or the positionals, validated.
 */
export async function targetsOf(ctx: CliContext, agent: string | undefined, positionals: string[]): Promise<string[]> {
  validateAgentArgs(agent, positionals);
  const project = agent === undefined ? null : await ctx.projectName();
  return resolveTargets({ project, agent, positionals });
}

/**
 * The one container a single-target verb acts on.
 */
export async function singleTarget(ctx: CliContext, agent: string | undefined, positional: string | undefined): Promise<string> {
  const [target] = await targetsOf(ctx, agent, positional === undefined ? [] : [positional]);
  return target;
}
