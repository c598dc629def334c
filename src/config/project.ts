import { readFile } from 'fs/promises';
import path from 'path';
import writeFileAtomic from 'write-file-atomic';
import { parse as parseYaml, stringify as stringifyYaml, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { isValidIdentifier } from '../orchestrator/naming.js';
import type { ProjectConfig } from '../types.js';

export const PROJECT_FILE = 'berth.yaml';

const projectSchema = z.object({
  project: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .refine(isValidIdentifier, { message: 'must match [a-z0-9][a-z0-9_-], at most 63 characters' }),
  image: z.string().min(1).optional(),
  version: z.string().min(1).default('latest'),
  workspace: z
    .object({ mode: z.enum(['bind', 'snapshot']).default('bind') })
    .default({}),
  mounts: z.array(z.string().min(1)).default([]),
  network: z.boolean().default(true),
});

export type ProjectFile = z.input<typeof projectSchema>;

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Parse and validate berth.yaml content. `root` is the directory holding it.
 */
export function parseProjectConfig(content: string, root: string, file = PROJECT_FILE): ProjectConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    const detail = error instanceof YAMLParseError ? error.message : String(error);
    throw new ConfigError(`${file} is not valid YAML: ${detail}`, { cause: error });
  }

  const result = projectSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`${file} is invalid: ${formatIssues(result.error.issues)}`, {
      nextSteps: [`Fix ${file} or recreate it with berth init`],
    });
  }
  return { ...result.data, root };
}

/**
 * Load berth.yaml from `cwd`. A missing file means no project.
 */
export async function loadProjectConfig(cwd: string): Promise<ProjectConfig | null> {
  const file = path.join(cwd, PROJECT_FILE);
  let content: string;
  try {
    content = await readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigError(`cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  return parseProjectConfig(content, cwd, file);
}

export interface InitOptions {
  image?: string;
  force?: boolean;
}

/**
 * Write a fresh berth.yaml into `cwd`. Refuses to overwrite unless forced.
 *
 * @returns the path written
 */
export async function initProject(cwd: string, project: string, options: InitOptions = {}): Promise<string> {
  const file = path.join(cwd, PROJECT_FILE);
  if (!options.force && (await loadProjectConfig(cwd)) !== null) {
    throw new ConfigError(`${file} already exists`, {
      nextSteps: ['Pass --force to overwrite it'],
    });
  }

  const document: ProjectFile = {
    project,
    ...(options.image ? { image: options.image } : {}),
    workspace: { mode: 'bind' },
    mounts: [],
    network: true,
  };
  // Validate before touching the disk.
  parseProjectConfig(stringifyYaml(document), cwd, file);
  await writeFileAtomic(file, stringifyYaml(document), { encoding: 'utf8' });
  return file;
}
