import { readFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { UserSettings } from '../types.js';

export const SETTINGS_FILE = 'settings.yaml';

const settingsSchema = z.object({
  default_image: z.string().min(1).optional(),
});

export function settingsDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.BERTH_CONFIG_DIR) {
    return env.BERTH_CONFIG_DIR;
  }
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'berth');
}

/**
 * User settings. A missing file yields empty settings; a malformed one is a
 * configuration error.
 */
export async function loadSettings(env: NodeJS.ProcessEnv = process.env): Promise<UserSettings> {
  const file = path.join(settingsDir(env), SETTINGS_FILE);
  let content: string;
  try {
    content = await readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`cannot read ${file}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`${file} is not valid YAML`, { cause: error });
  }
  const result = settingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`${file} is invalid: ${detail}`);
  }
  return { defaultImage: result.data.default_image };
}
