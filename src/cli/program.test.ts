import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('dockerode', async () => ({
  default: (await import('../testing/fake-docker.js')).FakeDocker,
}));

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import pino from 'pino';
import { main } from './program.js';
import { FakeDaemon, FakeDocker } from '../testing/fake-docker.js';
import { createFakeIO, FakeIO } from '../testing/fake-io.js';

interface Outcome {
  code: number;
  io: FakeIO;
}

describe('berth CLI', () => {
  let daemon: FakeDaemon;
  let dir: string;

  async function berth(args: string[], options: { cwd?: string; io?: FakeIO } = {}): Promise<Outcome> {
    const io = options.io ?? createFakeIO();
    const code = await main(args, {
      io,
      cwd: options.cwd ?? dir,
      env: { BERTH_CONFIG_DIR: path.join(dir, 'no-settings') },
      signal: new AbortController().signal,
      logger: pino({ level: 'silent' }),
      random: () => 0,
    });
    return { code, io };
  }

  beforeEach(async () => {
    daemon = FakeDocker.reset();
    daemon.addImage({ tags: ['alpine:latest'], cmd: ['sh'] });
    daemon.addImage({ tags: ['nginx:latest'], cmd: ['sleep', 'infinity'] });
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'berth-cli-test-'));
    await fs.writeFile(path.join(dir, 'berth.yaml'), 'project: demo\n');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('runs a command attached and lists the exited container', async () => {
    const run = await berth(['run', '--agent', 'a', 'alpine', 'echo', 'hi']);
    expect(run.code).toBe(0);
    expect(run.io.out.text()).toBe('hi\n');

    const ps = await berth(['ps']);
    const [header, row] = ps.io.out.lines().map((line) => line.split(/ {3,}/));
    expect(header).toEqual(['CONTAINER ID', 'NAME', 'PROJECT', 'AGENT', 'IMAGE', 'CREATED', 'STATUS']);
    expect(row.slice(1, 5)).toEqual(['berth.demo.a', 'demo', 'a', 'alpine']);
    expect(row[6]).toBe('Exited (0) Less than a second ago');
  });

  it('stops and starts a detached agent', async () => {
    const run = await berth(['run', '-d', '--agent', 'w', 'nginx']);
    const container = daemon.container('berth.demo.w');
    expect(run.io.out.lines()).toEqual([container?.id.slice(0, 12)]);

    const stop = await berth(['stop', '--agent', 'w']);
    expect(stop.io.out.lines()).toEqual(['berth.demo.w']);
    expect(daemon.container('berth.demo.w')?.status).toBe('exited');

    const start = await berth(['container', 'start', '--agent', 'w']);
    expect(start.io.out.lines()).toEqual(['berth.demo.w']);
    expect(daemon.container('berth.demo.w')?.status).toBe('running');
  });

  it('removes agent volumes but not volumes created by hand', async () => {
    await berth(['run', '-d', '--agent', 'w', 'nginx']);
    daemon.addVolume('berth.demo.w-extra');

    const rm = await berth(['rm', '-f', '--volumes', '--agent', 'w']);

    expect(rm.code).toBe(0);
    expect(daemon.container('berth.demo.w')).toBeUndefined();
    expect([...daemon.volumes.keys()]).toEqual(['berth.demo.w-extra']);
  });

  it('prunes stopped containers once', async () => {
    await berth(['run', '--agent', 'a', 'alpine', 'echo', 'hi']);

    const first = await berth(['prune']);
    expect(first.io.err.lines()).toEqual([
      'Removing container: berth.demo.a',
      'Pruned 1 berth resource(s), reclaimed 0B.',
    ]);

    const second = await berth(['prune']);
    expect(second.io.err.lines()).toEqual(['No berth resources to remove.']);
  });

  it('maps a failing exec to exit code 1', async () => {
    await berth(['run', '-d', '--agent', 'w', 'nginx']);

    const exec = await berth(['exec', '--agent', 'w', 'sh', '-c', 'exit 42']);

    expect(exec.code).toBe(1);
    expect(exec.io.err.text()).toBe('Error: container exited with status 42\n');
  });

  it('prints inspect documents as one JSON array', async () => {
    await berth(['run', '-d', '--agent', 'a', 'nginx']);
    await berth(['run', '-d', '--agent', 'b', 'nginx']);

    const inspect = await berth(['container', 'inspect', '--agent', 'b']);

    expect(inspect.code).toBe(0);
    const documents: unknown = JSON.parse(inspect.io.out.text());
    expect(documents).toEqual([
      expect.objectContaining({ Name: '/berth.demo.b', State: expect.objectContaining({ Status: 'running' }) }),
    ]);
  });

  it('inspects several targets and reports the missing ones', async () => {
    await berth(['run', '-d', '--agent', 'a', 'nginx']);
    await berth(['run', '-d', '--agent', 'b', 'nginx']);

    const inspect = await berth(['inspect', 'berth.demo.a', 'missing', 'berth.demo.b']);

    expect(inspect.code).toBe(1);
    const documents: unknown = JSON.parse(inspect.io.out.text());
    expect(documents).toEqual([
      expect.objectContaining({ Name: '/berth.demo.a', State: expect.objectContaining({ Running: true }) }),
      expect.objectContaining({ Name: '/berth.demo.b' }),
    ]);
    expect(inspect.io.err.text()).toBe(
      'Error: missing: container "missing" not found\nError: failed to inspect 1 container(s)\n'
    );
  });

  it('reports every failed target of a batch', async () => {
    await berth(['run', '-d', '--agent', 'a', 'nginx']);

    const stop = await berth(['stop', 'berth.demo.a', 'missing']);

    expect(stop.code).toBe(1);
    expect(stop.io.out.lines()).toEqual(['berth.demo.a']);
    expect(stop.io.err.text()).toBe(
      'Error: missing: container "missing" not found\nError: failed to stop 1 container(s)\n'
    );
  });

  it('explains what to do when --agent has no project', async () => {
    const elsewhere = path.join(dir, 'elsewhere');
    await fs.mkdir(elsewhere);

    const stop = await berth(['stop', '--agent', 'w'], { cwd: elsewhere });

    expect(stop.code).toBe(1);
    expect(stop.io.err.text()).toBe(
      'Error: --agent requires a project, but no berth.yaml was found\n' +
        '\n' +
        'Next Steps:\n' +
        '  1. Run berth init <project> in your project directory\n' +
        '  2. Or name the container directly instead of using --agent\n'
    );
  });

  it('exits 125 when the daemon is unreachable', async () => {
    daemon.unavailable = true;

    const ps = await berth(['ps']);

    expect(ps.code).toBe(125);
    expect(ps.io.err.lines()[0]).toBe('Error: Cannot connect to the Docker daemon');
  });

  it('rejects unknown options', async () => {
    const stop = await berth(['stop', '--bogus']);

    expect(stop.code).toBe(1);
    expect(stop.io.err.lines()[0]).toMatch(/^error: unknown option '--bogus'/);
  });

  it('creates berth.yaml with init', async () => {
    const fresh = path.join(dir, 'Inventory');
    await fs.mkdir(fresh);

    const init = await berth(['init'], { cwd: fresh });

    expect(init.code).toBe(0);
    expect(init.io.err.text()).toBe(`✓ Created ${path.join(fresh, 'berth.yaml')} for project inventory\n`);
    expect(await fs.readFile(path.join(fresh, 'berth.yaml'), 'utf8')).toContain('project: inventory');
  });
});
