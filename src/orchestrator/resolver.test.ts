import { describe, it, expect } from 'vitest';
import {
  classifyIdentifier,
  resolveCopyOperand,
  resolveIdentifiers,
  resolveTargets,
  validateAgentArgs,
} from './resolver.js';
import { InvalidArgumentsError, ProjectRequiredError } from '../errors.js';

describe('classifyIdentifier', () => {
  it('recognizes hex ID prefixes of six or more characters', () => {
    expect(classifyIdentifier('ABC123')).toEqual({ kind: 'id', prefix: 'abc123' });
    expect(classifyIdentifier('abc12')).toEqual({ kind: 'name', name: 'abc12' });
    expect(classifyIdentifier('/web')).toEqual({ kind: 'name', name: 'web' });
  });
});

describe('resolveTargets', () => {
  it('maps --agent to the canonical name in the current project', () => {
    expect(resolveTargets({ project: 'shop', agent: 'Alice', positionals: [] })).toEqual(['berth.shop.alice']);
  });

  it('keeps positionals in order', () => {
    expect(resolveTargets({ project: null, positionals: ['b', 'a', 'deadbeef'] })).toEqual(['b', 'a', 'deadbeef']);
  });

  it('requires a project for --agent', () => {
    expect(() => resolveTargets({ project: null, agent: 'alice', positionals: [] })).toThrow(ProjectRequiredError);
  });

  it('rejects --agent with positionals and an empty target list', () => {
    expect(() => resolveTargets({ project: 'shop', agent: 'a', positionals: ['x'] })).toThrow(
      '--agent and positional container arguments are mutually exclusive'
    );
    expect(() => resolveTargets({ project: 'shop', positionals: [] })).toThrow(
      'requires at least 1 container argument or --agent flag'
    );
    expect(resolveIdentifiers({ project: 'shop', positionals: [], allowEmpty: true })).toEqual([]);
  });
});

describe('validateAgentArgs', () => {
  it('enforces the minimum positional count', () => {
    expect(() => validateAgentArgs(undefined, ['a'], 2)).toThrow('requires at least 2 container argument or --agent flag');
    expect(() => validateAgentArgs('alice', [])).not.toThrow();
    expect(() => validateAgentArgs('alice', ['x'])).toThrow(InvalidArgumentsError);
  });
});

describe('resolveCopyOperand', () => {
  it('fills in the container for ":path" from --agent', () => {
    expect(resolveCopyOperand(':/workspace/out.txt', 'shop', 'bob')).toBe('berth.shop.bob:/workspace/out.txt');
  });

  it('leaves other operands alone', () => {
    expect(resolveCopyOperand('web:/etc/hosts', 'shop', 'bob')).toBe('web:/etc/hosts');
    expect(resolveCopyOperand('./local', 'shop', 'bob')).toBe('./local');
  });

  it('needs --agent and a project for ":path"', () => {
    expect(() => resolveCopyOperand(':/x', 'shop', undefined)).toThrow('":/x" needs --agent to name the container');
    expect(() => resolveCopyOperand(':/x', null, 'bob')).toThrow(ProjectRequiredError);
  });
});
