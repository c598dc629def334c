import { describe, it, expect } from 'vitest';
import os from 'os';
import path from 'path';
import { expandHome, isWithin, parseEnv, parseLabels, parsePublish, parseVolumeFlag } from './container-config.js';
import { InvalidArgumentsError } from '../errors.js';

describe('parseEnv', () => {
  it('keeps assignments and fills bare names from the host', () => {
    const environ = { EDITOR: 'vim' };
    expect(parseEnv(['A=1', 'B=', 'EDITOR', 'MISSING', 'C=x=y'], environ)).toEqual([
      'A=1',
      'B=',
      'EDITOR=vim',
      'C=x=y',
    ]);
  });

  it('rejects an empty name', () => {
    expect(() => parseEnv(['=oops'], {})).toThrow('invalid environment variable "=oops": name cannot be empty');
  });
});

describe('parseLabels', () => {
  it('splits on the first equals sign', () => {
    expect(parseLabels(['team=core', 'flag', 'expr=a=b'])).toEqual({ team: 'core', flag: '', expr: 'a=b' });
  });

  it('rejects an empty key', () => {
    expect(() => parseLabels(['=v'])).toThrow(InvalidArgumentsError);
  });

  it('rejects keys in the berth namespace', () => {
    expect(() => parseLabels(['dev.berth.agent=a'])).toThrow(
      new InvalidArgumentsError('label "dev.berth.agent" is reserved for berth')
    );
    expect(parseLabels(['dev.berthing=x'])).toEqual({ 'dev.berthing': 'x' });
  });
});

describe('parsePublish', () => {
  it('parses every mapping form', () => {
    const { exposed, bindings } = parsePublish(['8080:80', '127.0.0.1:5353:53/udp', '3000', '9000:9000']);
    expect(Object.keys(exposed)).toEqual(['80/tcp', '53/udp', '3000/tcp', '9000/tcp']);
    expect(bindings['80/tcp']).toEqual([{ HostIp: '', HostPort: '8080' }]);
    expect(bindings['53/udp']).toEqual([{ HostIp: '127.0.0.1', HostPort: '5353' }]);
    expect(bindings['3000/tcp']).toEqual([{ HostIp: '', HostPort: '' }]);
  });

  it('collects several host bindings for one container port', () => {
    const { bindings } = parsePublish(['8080:80', '8081:80']);
    expect(bindings['80/tcp']).toEqual([
      { HostIp: '', HostPort: '8080' },
      { HostIp: '', HostPort: '8081' },
    ]);
  });

  it('rejects malformed mappings', () => {
    expect(() => parsePublish(['80/icmp'])).toThrow('invalid protocol "icmp" in "80/icmp"');
    expect(() => parsePublish(['70000'])).toThrow('port 70000 out of range in "70000"');
    expect(() => parsePublish(['http'])).toThrow('invalid port "http" in "http"');
    expect(() => parsePublish(['1:2:3:4'])).toThrow('invalid port mapping "1:2:3:4"');
  });
});

describe('parseVolumeFlag', () => {
  it('resolves host paths against the working directory', () => {
    expect(parseVolumeFlag('./data:/data:ro', '/proj')).toEqual({
      kind: 'bind',
      source: '/proj/data',
      target: '/data',
      readOnly: true,
    });
    expect(parseVolumeFlag('~/cache:/cache', '/proj')).toEqual({
      kind: 'bind',
      source: path.join(os.homedir(), 'cache'),
      target: '/cache',
      readOnly: false,
    });
  });

  it('treats other sources as named volumes', () => {
    expect(parseVolumeFlag('pkgcache:/root/.cache:rw', '/proj')).toEqual({
      kind: 'volume',
      name: 'pkgcache',
      target: '/root/.cache',
      readOnly: false,
    });
  });

  it('rejects malformed flags', () => {
    expect(() => parseVolumeFlag('/only', '/proj')).toThrow('invalid volume "/only": expected source:target[:ro]');
    expect(() => parseVolumeFlag('/a:rel', '/proj')).toThrow('target must be an absolute path');
    expect(() => parseVolumeFlag('/a:/b:rx', '/proj')).toThrow('invalid volume mode "rx" in "/a:/b:rx"');
    expect(() => parseVolumeFlag('bad name:/b', '/proj')).toThrow(InvalidArgumentsError);
  });
});

describe('path helpers', () => {
  it('expands the home directory', () => {
    expect(expandHome('~', '/home/u')).toBe('/home/u');
    expect(expandHome('~/x', '/home/u')).toBe('/home/u/x');
    expect(expandHome('/abs', '/home/u')).toBe('/abs');
  });

  it('checks containment by path segments', () => {
    expect(isWithin('/proj', '/proj')).toBe(true);
    expect(isWithin('/proj', '/proj/src/a')).toBe(true);
    expect(isWithin('/proj', '/project')).toBe(false);
    expect(isWithin('/proj', '/')).toBe(false);
  });
});
