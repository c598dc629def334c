import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadSettings, settingsDir } from './settings.js';
import { ConfigError } from '../errors.js';

describe('settingsDir', () => {
  it('prefers BERTH_CONFIG_DIR, then XDG_CONFIG_HOME', () => {
    expect(settingsDir({ BERTH_CONFIG_DIR: '/etc/berth', XDG_CONFIG_HOME: '/xdg' })).toBe('/etc/berth');
    expect(settingsDir({ XDG_CONFIG_HOME: '/xdg' })).toBe('/xdg/berth');
    expect(settingsDir({})).toBe(path.join(os.homedir(), '.config', 'berth'));
  });
});

describe('loadSettings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'berth-settings-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns empty settings when the file is missing', async () => {
    expect(await loadSettings({ BERTH_CONFIG_DIR: dir })).toEqual({});
  });

  it('reads the default image', async () => {
    await fs.writeFile(path.join(dir, 'settings.yaml'), 'default_image: ubuntu:24.04\n');
    expect(await loadSettings({ BERTH_CONFIG_DIR: dir })).toEqual({ defaultImage: 'ubuntu:24.04' });
  });

  it('rejects a malformed file', async () => {
    await fs.writeFile(path.join(dir, 'settings.yaml'), 'default_image: 42\n');
    await expect(loadSettings({ BERTH_CONFIG_DIR: dir })).rejects.toBeInstanceOf(ConfigError);
  });
});
