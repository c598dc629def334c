import { InvalidArgumentsError } from '../errors.js';
import { ADJECTIVES, NOUNS } from './names.js';

export const PROGRAM = 'berth';
export const LABEL_NAMESPACE = 'dev.berth';

export const LABEL_MANAGED = `${LABEL_NAMESPACE}.managed`;
export const LABEL_PROJECT = `${LABEL_NAMESPACE}.project`;
export const LABEL_AGENT = `${LABEL_NAMESPACE}.agent`;
export const LABEL_VERSION = `${LABEL_NAMESPACE}.version`;
export const LABEL_IMAGE = `${LABEL_NAMESPACE}.image`;
export const LABEL_WORKDIR = `${LABEL_NAMESPACE}.workdir`;
export const MANAGED_VALUE = 'true';

export const NETWORK_NAME = `${PROGRAM}-net`;

export const VOLUME_PURPOSES = ['workspace', 'config', 'history'] as const;
export type VolumePurpose = (typeof VOLUME_PURPOSES)[number];

const IDENTIFIER_PATTERN = /^[a-z0-9][a-z0-9_-]{0,62}$/;
const RESOURCE_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;
const MAX_RESOURCE_NAME_LENGTH = 128;

export function isValidIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

function normalizeIdentifier(kind: 'project' | 'agent', value: string): string {
  const normalized = value.trim().toLowerCase();
  if (!isValidIdentifier(normalized)) {
    throw new InvalidArgumentsError(
      `invalid ${kind} name "${value}": must match [a-z0-9][a-z0-9_-], at most 63 characters`
    );
  }
  return normalized;
}

export function normalizeProjectName(value: string): string {
  return normalizeIdentifier('project', value);
}

export function normalizeAgentName(value: string): string {
  return normalizeIdentifier('agent', value);
}

/**
 * Check a user-supplied container/volume name against the daemon's naming rule.
 */
export function validateResourceName(name: string): void {
  if (name === '') {
    throw new InvalidArgumentsError('name cannot be empty');
  }
  if (name.length > MAX_RESOURCE_NAME_LENGTH) {
    throw new InvalidArgumentsError(
      `name is too long (${name.length} characters, maximum ${MAX_RESOURCE_NAME_LENGTH})`
    );
  }
  if (!RESOURCE_NAME_PATTERN.test(name)) {
    if (name.startsWith('-')) {
      throw new InvalidArgumentsError(`invalid name "${name}": cannot start with a hyphen`);
    }
    throw new InvalidArgumentsError(`invalid name "${name}": only [a-zA-Z0-9][a-zA-Z0-9_.-] are allowed`);
  }
}

export function containerName(project: string, agent: string): string {
  return `${PROGRAM}.${project}.${agent}`;
}

/**
 * Recover project and agent from a canonical container name. The daemon
 * reports names with a leading '/', which is ignored. Returns null for names
 * that are not canonical.
 */
export function parseContainerName(name: string): { project: string; agent: string } | null {
  const bare = name.startsWith('/') ? name.slice(1) : name;
  const parts = bare.split('.');
  if (parts.length !== 3 || parts[0] !== PROGRAM) {
    return null;
  }
  const [, project, agent] = parts;
  if (!isValidIdentifier(project) || !isValidIdentifier(agent)) {
    return null;
  }
  return { project, agent };
}

export function volumeName(container: string, purpose: VolumePurpose): string {
  return `${container}-${purpose}`;
}

export function imageRef(project: string, tag = 'latest'): string {
  return `${PROGRAM}-${project}:${tag}`;
}

export function managedLabels(project: string, agent?: string, version?: string): Record<string, string> {
  const labels: Record<string, string> = {
    [LABEL_MANAGED]: MANAGED_VALUE,
    [LABEL_PROJECT]: project,
  };
  if (agent !== undefined) {
    labels[LABEL_AGENT] = agent;
  }
  if (version !== undefined) {
    labels[LABEL_VERSION] = version;
  }
  return labels;
}

/**
 * Merge user labels with the managed set. Keys in the berth namespace only
 * ever come from the managed set.
 */
export function mergeLabels(user: Record<string, string>, managed: Record<string, string>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(user)) {
    if (!key.startsWith(`${LABEL_NAMESPACE}.`)) {
      merged[key] = value;
    }
  }
  return { ...merged, ...managed };
}

export function isManaged(labels: Record<string, string> | null | undefined): boolean {
  return labels?.[LABEL_MANAGED] === MANAGED_VALUE;
}

export interface ContainerPath {
  container: string;     // '' when deferred to --agent
  path: string;
  isContainer: boolean;
  isStdio: boolean;
}

/**
 * Parse a copy operand: "name:/path", ":/path" (container supplied later by
 * --agent), "-" (stdio) or a host path. A single drive letter before the
 * colon is a Windows host path.
 */
export function parseContainerPath(operand: string): ContainerPath {
  if (operand === '-') {
    return { container: '', path: '-', isContainer: false, isStdio: true };
  }
  const host: ContainerPath = { container: '', path: operand, isContainer: false, isStdio: false };
  if (operand.startsWith('/') || operand.startsWith('.')) {
    return host;
  }
  const colon = operand.indexOf(':');
  if (colon < 0) {
    return host;
  }
  if (colon === 1 && /^[a-zA-Z]$/.test(operand[0])) {
    return host;
  }
  return {
    container: operand.slice(0, colon),
    path: operand.slice(colon + 1),
    isContainer: true,
    isStdio: false,
  };
}

export function generateRandomName(random: () => number = Math.random): string {
  const pick = (list: readonly string[]): string => list[Math.floor(random() * list.length) % list.length];
  return `${pick(ADJECTIVES)}-${pick(NOUNS)}`;
}
