import { InvalidArgumentsError, ProjectRequiredError } from '../errors.js';
import { containerName, normalizeAgentName, parseContainerPath } from './naming.js';

/**
 * How the user named a container. Resolved to a canonical name (or left as
 * an ID prefix) before any daemon call.
 */
export type Identifier =
  | { kind: 'name'; name: string }
  | { kind: 'id'; prefix: string }
  | { kind: 'agent'; agent: string; project: string };

const ID_PREFIX_PATTERN = /^[0-9a-f]{6,64}$/i;

export interface ResolveInput {
  project: string | null;
  agent?: string;
  positionals: string[];
  /** The verb runs without targets (e.g. ps) */
  allowEmpty?: boolean;
}

export function classifyIdentifier(value: string): Identifier {
  if (ID_PREFIX_PATTERN.test(value)) {
    return { kind: 'id', prefix: value.toLowerCase() };
  }
  return { kind: 'name', name: value.startsWith('/') ? value.slice(1) : value };
}

export function identifierText(identifier: Identifier): string {
  switch (identifier.kind) {
    case 'name':
      return identifier.name;
    case 'id':
      return identifier.prefix;
    case 'agent':
      return containerName(identifier.project, identifier.agent);
  }
}

/**
 * Reject --agent combined with positional containers, and a verb invoked
 * with neither.
 */
export function validateAgentArgs(agent: string | undefined, positionals: string[], minimum = 1): void {
  if (agent !== undefined && positionals.length > 0) {
    throw new InvalidArgumentsError('--agent and positional container arguments are mutually exclusive');
  }
  if (agent === undefined && positionals.length < minimum) {
    throw new InvalidArgumentsError(`requires at least ${minimum} container argument or --agent flag`);
  }
}

export function resolveIdentifiers(input: ResolveInput): Identifier[] {
  const { agent, positionals } = input;
  if (agent !== undefined && positionals.length > 0) {
    throw new InvalidArgumentsError('--agent and positional container arguments are mutually exclusive');
  }
  if (agent !== undefined) {
    if (!input.project) {
      throw new ProjectRequiredError();
    }
    return [{ kind: 'agent', agent: normalizeAgentName(agent), project: input.project }];
  }
  if (positionals.length > 0) {
    return positionals.map(classifyIdentifier);
  }
  if (input.allowEmpty) {
    return [];
  }
  throw new InvalidArgumentsError('requires at least 1 container argument or --agent flag');
}

/**
 * Resolve user input to an ordered list of container references: canonical
 * names for --agent, positionals unchanged otherwise.
 */
export function resolveTargets(input: ResolveInput): string[] {
  return resolveIdentifiers(input).map(identifierText);
}

/**
 * Rewrite a ":path" copy operand to "<container>:path" using --agent.
 */
export function resolveCopyOperand(operand: string, project: string | null, agent: string | undefined): string {
  const parsed = parseContainerPath(operand);
  if (!parsed.isContainer || parsed.container !== '') {
    return operand;
  }
  if (agent === undefined) {
    throw new InvalidArgumentsError(`"${operand}" needs --agent to name the container`);
  }
  if (!project) {
    throw new ProjectRequiredError();
  }
  return `${containerName(project, normalizeAgentName(agent))}:${parsed.path}`;
}
