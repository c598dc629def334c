import os from 'os';
import path from 'path';
import { InvalidArgumentsError } from '../errors.js';
import { LABEL_NAMESPACE, validateResourceName } from './naming.js';

export interface PortBinding {
  HostIp: string;
  HostPort: string;
}

export interface PublishedPorts {
  exposed: Record<string, Record<string, never>>;
  bindings: Record<string, PortBinding[]>;
}

export type VolumeFlag =
  | { kind: 'bind'; source: string; target: string; readOnly: boolean }
  | { kind: 'volume'; name: string; target: string; readOnly: boolean };

const PORT_PATTERN = /^\d{1,5}(-\d{1,5})?$/;

/**
 * Parse `KEY=VALUE` entries. A bare `KEY` takes its value from the host
 * environment and is dropped when unset there.
 */
export function parseEnv(entries: string[], environ: NodeJS.ProcessEnv = process.env): string[] {
  const result: string[] = [];
  for (const entry of entries) {
    const eq = entry.indexOf('=');
    if (eq === 0) {
      throw new InvalidArgumentsError(`invalid environment variable "${entry}": name cannot be empty`);
    }
    if (eq > 0) {
      result.push(entry);
      continue;
    }
    const value = environ[entry];
    if (value !== undefined) {
      result.push(`${entry}=${value}`);
    }
  }
  return result;
}

export function parseLabels(entries: string[]): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const entry of entries) {
    const eq = entry.indexOf('=');
    const key = eq < 0 ? entry : entry.slice(0, eq);
    if (key.trim() === '') {
      throw new InvalidArgumentsError(`invalid label "${entry}": key cannot be empty`);
    }
    if (key.startsWith(`${LABEL_NAMESPACE}.`)) {
      throw new InvalidArgumentsError(`label "${key}" is reserved for berth`);
    }
    labels[key] = eq < 0 ? '' : entry.slice(eq + 1);
  }
  return labels;
}

function checkPort(value: string, spec: string): void {
  if (!PORT_PATTERN.test(value)) {
    throw new InvalidArgumentsError(`invalid port "${value}" in "${spec}"`);
  }
  for (const part of value.split('-')) {
    const port = Number(part);
    if (port < 1 || port > 65535) {
      throw new InvalidArgumentsError(`port ${part} out of range in "${spec}"`);
    }
  }
}

/**
 * Parse `-p` mappings: `[ip:][hostPort:]containerPort[/proto]`.
 */
export function parsePublish(specs: string[]): PublishedPorts {
  const exposed: PublishedPorts['exposed'] = {};
  const bindings: PublishedPorts['bindings'] = {};

  for (const spec of specs) {
    const slash = spec.lastIndexOf('/');
    const proto = slash >= 0 ? spec.slice(slash + 1).toLowerCase() : 'tcp';
    if (!['tcp', 'udp', 'sctp'].includes(proto)) {
      throw new InvalidArgumentsError(`invalid protocol "${proto}" in "${spec}"`);
    }
    const parts = (slash >= 0 ? spec.slice(0, slash) : spec).split(':');
    if (parts.length > 3) {
      throw new InvalidArgumentsError(`invalid port mapping "${spec}"`);
    }
    const containerPort = parts[parts.length - 1];
    const hostPort = parts.length >= 2 ? parts[parts.length - 2] : '';
    const hostIp = parts.length === 3 ? parts[0] : '';
    checkPort(containerPort, spec);
    if (hostPort !== '') {
      checkPort(hostPort, spec);
    }

    const key = `${containerPort}/${proto}`;
    exposed[key] = {};
    bindings[key] = [...(bindings[key] ?? []), { HostIp: hostIp, HostPort: hostPort }];
  }
  return { exposed, bindings };
}

export function expandHome(value: string, home: string = os.homedir()): string {
  if (value === '~') {
    return home;
  }
  if (value.startsWith('~/')) {
    return path.join(home, value.slice(2));
  }
  return value;
}

function isHostPath(source: string): boolean {
  return source.startsWith('/') || source.startsWith('.') || source.startsWith('~');
}

/**
 * Parse a `-v source:target[:ro|rw]` flag. Sources that look like paths are
 * resolved against cwd; anything else names a volume.
 */
export function parseVolumeFlag(flag: string, cwd: string): VolumeFlag {
  const parts = flag.split(':');
  if (parts.length < 2 || parts.length > 3 || parts[0] === '' || parts[1] === '') {
    throw new InvalidArgumentsError(`invalid volume "${flag}": expected source:target[:ro]`);
  }
  const [source, target] = parts;
  const mode = parts[2] ?? 'rw';
  if (mode !== 'ro' && mode !== 'rw') {
    throw new InvalidArgumentsError(`invalid volume mode "${mode}" in "${flag}"`);
  }
  if (!target.startsWith('/')) {
    throw new InvalidArgumentsError(`invalid volume "${flag}": target must be an absolute path`);
  }
  const readOnly = mode === 'ro';
  if (isHostPath(source)) {
    return { kind: 'bind', source: path.resolve(cwd, expandHome(source)), target, readOnly };
  }
  validateResourceName(source);
  return { kind: 'volume', name: source, target, readOnly };
}

export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}
