import { describe, it, expect } from 'vitest';
import {
  containerName,
  generateRandomName,
  imageRef,
  isManaged,
  managedLabels,
  mergeLabels,
  normalizeAgentName,
  normalizeProjectName,
  parseContainerName,
  parseContainerPath,
  validateResourceName,
  volumeName,
  LABEL_AGENT,
  LABEL_MANAGED,
  LABEL_PROJECT,
  LABEL_VERSION,
} from './naming.js';
import { ADJECTIVES, NOUNS } from './names.js';
import { InvalidArgumentsError } from '../errors.js';

describe('identifiers', () => {
  it('normalizes case and surrounding whitespace', () => {
    expect(normalizeProjectName('  MyApp ')).toBe('myapp');
    expect(normalizeAgentName('Worker_1')).toBe('worker_1');
  });

  it('rejects names that cannot appear in a container name', () => {
    expect(() => normalizeAgentName('has.dot')).toThrow(InvalidArgumentsError);
    expect(() => normalizeAgentName('-lead')).toThrow('invalid agent name "-lead"');
    expect(() => normalizeProjectName('')).toThrow('invalid project name ""');
    expect(() => normalizeProjectName('a'.repeat(64))).toThrow(InvalidArgumentsError);
    expect(normalizeProjectName('a'.repeat(63))).toBe('a'.repeat(63));
  });
});

describe('validateResourceName', () => {
  it('accepts daemon-legal names', () => {
    expect(() => validateResourceName('my.container_1-x')).not.toThrow();
  });

  it('explains what is wrong with an illegal name', () => {
    expect(() => validateResourceName('')).toThrow('name cannot be empty');
    expect(() => validateResourceName('-x')).toThrow('invalid name "-x": cannot start with a hyphen');
    expect(() => validateResourceName('a b')).toThrow('invalid name "a b": only [a-zA-Z0-9][a-zA-Z0-9_.-] are allowed');
    expect(() => validateResourceName('a'.repeat(129))).toThrow('name is too long (129 characters, maximum 128)');
  });
});

describe('canonical names', () => {
  it('derives container, volume and image names', () => {
    const name = containerName('shop', 'alice');
    expect(name).toBe('berth.shop.alice');
    expect(volumeName(name, 'workspace')).toBe('berth.shop.alice-workspace');
    expect(volumeName(name, 'history')).toBe('berth.shop.alice-history');
    expect(imageRef('shop')).toBe('berth-shop:latest');
    expect(imageRef('shop', 'v2')).toBe('berth-shop:v2');
  });

  it('parses canonical names back, ignoring the daemon slash', () => {
    expect(parseContainerName('/berth.shop.alice')).toEqual({ project: 'shop', agent: 'alice' });
    expect(parseContainerName('berth.shop')).toBeNull();
    expect(parseContainerName('other.shop.alice')).toBeNull();
    expect(parseContainerName('berth.Shop.alice')).toBeNull();
  });
});

describe('labels', () => {
  it('builds the managed set and lets it win over user labels', () => {
    const managed = managedLabels('shop', 'alice');
    expect(managed).toEqual({ [LABEL_MANAGED]: 'true', [LABEL_PROJECT]: 'shop', [LABEL_AGENT]: 'alice' });
    expect(managedLabels('shop', undefined, '1.2')).toEqual({
      [LABEL_MANAGED]: 'true',
      [LABEL_PROJECT]: 'shop',
      [LABEL_VERSION]: '1.2',
    });

    const merged = mergeLabels({ [LABEL_PROJECT]: 'spoofed', team: 'core' }, managed);
    expect(merged[LABEL_PROJECT]).toBe('shop');
    expect(merged.team).toBe('core');
    expect(mergeLabels({ [LABEL_AGENT]: 'a' }, managedLabels('shop'))).toEqual(managedLabels('shop'));
  });

  it('recognizes managed resources only by the exact marker value', () => {
    expect(isManaged({ [LABEL_MANAGED]: 'true' })).toBe(true);
    expect(isManaged({ [LABEL_MANAGED]: 'yes' })).toBe(false);
    expect(isManaged(null)).toBe(false);
    expect(isManaged(undefined)).toBe(false);
  });
});

describe('parseContainerPath', () => {
  it('splits container operands', () => {
    expect(parseContainerPath('web:/etc/hosts')).toEqual({
      container: 'web',
      path: '/etc/hosts',
      isContainer: true,
      isStdio: false,
    });
    expect(parseContainerPath(':/tmp')).toEqual({ container: '', path: '/tmp', isContainer: true, isStdio: false });
  });

  it('treats paths, drive letters and dashes as host operands', () => {
    expect(parseContainerPath('./a:b').isContainer).toBe(false);
    expect(parseContainerPath('/abs:odd').isContainer).toBe(false);
    expect(parseContainerPath('C:\\files').isContainer).toBe(false);
    expect(parseContainerPath('plain.txt')).toEqual({
      container: '',
      path: 'plain.txt',
      isContainer: false,
      isStdio: false,
    });
    expect(parseContainerPath('-')).toEqual({ container: '', path: '-', isContainer: false, isStdio: true });
  });
});

describe('generateRandomName', () => {
  it('joins an adjective and a noun that form a valid agent name', () => {
    expect(generateRandomName(() => 0)).toBe('amber-albatross');
    const name = generateRandomName();
    expect(normalizeAgentName(name)).toBe(name);
  });

  it('draws the last words when random approaches 1', () => {
    expect(generateRandomName(() => 0.999999)).toBe(`${ADJECTIVES[ADJECTIVES.length - 1]}-${NOUNS[NOUNS.length - 1]}`);
  });

  it('keeps every word usable in a container name', () => {
    for (const word of [...ADJECTIVES, ...NOUNS]) {
      expect(word).toMatch(/^[a-z]+$/);
    }
  });
});
