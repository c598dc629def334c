import Docker from 'dockerode';
import pino from 'pino';
import { DaemonClient } from '../orchestrator/client.js';
import { StreamEngine } from '../orchestrator/attach.js';
import { LifecycleCoordinator } from '../orchestrator/lifecycle.js';
import { PruneEngine } from '../orchestrator/prune.js';
import { CopyEngine, TarRunner } from '../orchestrator/copy.js';
import { loadProjectConfig } from '../config/project.js';
import { loadSettings } from '../config/settings.js';
import type { IOStreams, ProjectConfig, UserSettings } from '../types.js';

export interface CliEnvironment {
  io: IOStreams;
  cwd: string;
  env: NodeJS.ProcessEnv;
  signal: AbortSignal;
  logger: pino.Logger;
  docker?: Docker.DockerOptions;
  tar?: TarRunner;
  random?: () => number;
  resizePollMs?: number;
}

/**
 * Per-invocation services. Everything is built on first use, so commands
 * that never reach the daemon (init, --help) never read config or connect.
 * All services share one logger so interactive mode quiets every one.
 */
export class CliContext {
  private projectConfig: Promise<ProjectConfig | null> | null = null;
  private userSettings: Promise<UserSettings> | null = null;
  private daemonClient: DaemonClient | null = null;
  private streamEngine: StreamEngine | null = null;

  constructor(readonly environment: CliEnvironment) {}

  get io(): IOStreams {
    return this.environment.io;
  }

  get cwd(): string {
    return this.environment.cwd;
  }

  get signal(): AbortSignal {
    return this.environment.signal;
  }

  get logger(): pino.Logger {
    return this.environment.logger;
  }

  project(): Promise<ProjectConfig | null> {
    this.projectConfig ??= loadProjectConfig(this.cwd);
    return this.projectConfig;
  }

  async projectName(): Promise<string | null> {
    return (await this.project())?.project ?? null;
  }

  settings(): Promise<UserSettings> {
    this.userSettings ??= loadSettings(this.environment.env);
    return this.userSettings;
  }

  client(): DaemonClient {
    this.daemonClient ??= new DaemonClient({
      docker: this.environment.docker,
      logger: this.logger,
    });
    return this.daemonClient;
  }

  engine(): StreamEngine {
    this.streamEngine ??= new StreamEngine(this.client(), this.io, {
      logger: this.logger,
      resizePollMs: this.environment.resizePollMs,
    });
    return this.streamEngine;
  }

  async coordinator(): Promise<LifecycleCoordinator> {
    return new LifecycleCoordinator({
      client: this.client(),
      engine: this.engine(),
      io: this.io,
      project: await this.project(),
      settings: await this.settings(),
      cwd: this.cwd,
      signal: this.signal,
      logger: this.logger,
      environ: this.environment.env,
      random: this.environment.random,
    });
  }

  pruneEngine(): PruneEngine {
    return new PruneEngine(this.client(), this.io, {
      logger: this.logger,
      signal: this.signal,
    });
  }

  copyEngine(): CopyEngine {
    return new CopyEngine(this.client(), this.io, {
      logger: this.logger,
      signal: this.signal,
      cwd: this.cwd,
      tar: this.environment.tar,
    });
  }
}
