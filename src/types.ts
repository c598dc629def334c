import type { Readable, Writable } from 'stream';

export type WorkspaceMode = 'bind' | 'snapshot';

/**
 * Resolved project configuration (berth.yaml).
 */
export interface ProjectConfig {
  project: string;
  image?: string;
  version: string;
  workspace: { mode: WorkspaceMode };
  mounts: string[];       // host bind allow-list
  network: boolean;
  root: string;           // directory that holds berth.yaml
}

/**
 * User-level settings, independent of any project.
 */
export interface UserSettings {
  defaultImage?: string;
}

/**
 * Host stdin as seen by the attach engine. process.stdin satisfies it; tests
 * hand in a PassThrough that tracks raw mode.
 */
export interface TerminalInput extends Readable {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput extends Writable {
  isTTY?: boolean;
  rows?: number;
  columns?: number;
}

export interface IOStreams {
  in: TerminalInput;
  out: TerminalOutput;
  err: TerminalOutput;
}

/**
 * A daemon container that carries the managed label.
 */
export interface ManagedContainer {
  id: string;
  name: string;           // canonical name without the leading '/'
  project: string | undefined;
  agent: string | undefined;
  image: string;
  state: string;
  status: string;
  created: number;        // unix seconds
  labels: Record<string, string>;
}

export interface TerminalSize {
  rows: number;
  columns: number;
}
