import { access } from 'fs/promises';
import path from 'path';
import Docker from 'dockerode';
import pino from 'pino';
import { DaemonClient, ExecCreateRequest, LogOptions, TopResult } from './client.js';
import { StreamEngine } from './attach.js';
import { expandHome, isWithin, parseEnv, parseLabels, parsePublish, parseVolumeFlag } from './container-config.js';
import {
  LABEL_IMAGE,
  LABEL_MANAGED,
  LABEL_PROJECT,
  LABEL_AGENT,
  LABEL_WORKDIR,
  MANAGED_VALUE,
  NETWORK_NAME,
  VOLUME_PURPOSES,
  containerName,
  generateRandomName,
  imageRef,
  isManaged,
  managedLabels,
  mergeLabels,
  normalizeAgentName,
  validateResourceName,
  volumeName,
} from './naming.js';
import {
  AlreadyInStateError,
  BatchError,
  CancelledError,
  DaemonUnavailableError,
  InvalidArgumentsError,
  NotFoundError,
  NotRunningError,
  ProjectRequiredError,
  TargetFailure,
  classifyDaemonError,
} from '../errors.js';
import type { IOStreams, ManagedContainer, ProjectConfig, UserSettings } from '../types.js';

export const WORKSPACE_PATH = '/workspace';
export const CONFIG_PATH = '/home/agent/.config';
export const HISTORY_PATH = '/commandhistory';

/** The image operand that resolves to the project's image. */
export const PROJECT_IMAGE = '@';

export interface LifecycleContext {
  client: DaemonClient;
  engine: StreamEngine;
  io: IOStreams;
  project: ProjectConfig | null;
  settings: UserSettings;
  cwd: string;
  signal?: AbortSignal;
  logger?: pino.Logger;
  environ?: NodeJS.ProcessEnv;
  random?: () => number;
}

export interface ContainerSpec {
  image: string;
  command: string[];
  agent?: string;
  name?: string;
  env: string[];
  volumes: string[];
  publish: string[];
  labels: string[];
  workdir?: string;
  user?: string;
  entrypoint?: string;
  tty: boolean;
  interactive: boolean;
  autoRemove: boolean;
}

export interface RunOptions extends ContainerSpec {
  detach: boolean;
}

export interface CreateResult {
  id: string;
  name: string;
  warnings: string[];
}

export interface ListOptions {
  running?: boolean;
  project?: string;
  allProjects?: boolean;
}

export interface RemoveOptions {
  force?: boolean;
  /** undefined keeps the default: remove an agent's own volumes */
  volumes?: boolean;
}

export interface DownOptions {
  project?: string;
  clean?: boolean;
  all?: boolean;
}

export interface ExecOptions {
  command: string[];
  interactive: boolean;
  tty: boolean;
  detach: boolean;
  env: string[];
  workdir?: string;
  user?: string;
  privileged?: boolean;
}

/**
 * Owns every mutating verb. Multi-target verbs run sequentially in input
 * order, print one line per success to stdout, and report failures after
 * the last target.
 */
export class LifecycleCoordinator {
  private readonly client: DaemonClient;
  private readonly engine: StreamEngine;
  private readonly io: IOStreams;
  private readonly project: ProjectConfig | null;
  private readonly signal: AbortSignal | undefined;
  private readonly log: pino.Logger;

  constructor(private readonly ctx: LifecycleContext) {
    this.client = ctx.client;
    this.engine = ctx.engine;
    this.io = ctx.io;
    this.project = ctx.project;
    this.signal = ctx.signal;
    this.log = ctx.logger ?? pino({ level: 'silent' });
  }

  private get networkEnabled(): boolean {
    return this.project?.network ?? true;
  }

  private print(line: string): void {
    this.io.out.write(`${line}\n`);
  }

  private warn(message: string): void {
    this.io.err.write(`Warning: ${message}\n`);
  }

  // ---- create / run -----------------------------------------------------

  async create(spec: ContainerSpec): Promise<CreateResult> {
    const result = await this.createContainer(spec);
    this.print(result.id);
    return result;
  }

  async run(options: RunOptions): Promise<void> {
    const { id } = await this.createContainer(options);
    if (options.detach) {
      await this.startWithNetwork(id);
      this.print(id.slice(0, 12));
      return;
    }
    await this.engine.attachContainer(id, {
      interactive: options.interactive,
      signal: this.signal,
      start: () => this.startWithNetwork(id),
    });
  }

  /**
   * Resolve the image operand. '@' means the project's built image, then the
   * project file's image, then the user's default image.
   */
  async resolveImage(image: string): Promise<string> {
    if (image !== PROJECT_IMAGE) {
      return image;
    }
    const project = this.project;
    if (project) {
      const wanted = imageRef(project.project, project.version);
      const images = await this.client.listImages({ project: project.project }, this.signal);
      if (images.some((candidate) => candidate.tags.includes(wanted))) {
        return wanted;
      }
      if (project.image) {
        return project.image;
      }
    }
    if (this.ctx.settings.defaultImage) {
      return this.ctx.settings.defaultImage;
    }
    throw new InvalidArgumentsError('no image found for "@"', {
      nextSteps: [
        project ? `Build the project image ${imageRef(project.project, project.version)}` : 'Run berth init in your project directory',
        'Set image in berth.yaml',
        'Set default_image in your berth settings.yaml',
      ],
    });
  }

  private containerIdentity(spec: ContainerSpec): { name: string; agent: string | undefined } {
    if (spec.agent !== undefined && spec.name !== undefined) {
      throw new InvalidArgumentsError('--agent and --name are mutually exclusive');
    }
    const project = this.requireProject('creating a container requires a project, but no berth.yaml was found');
    if (spec.name !== undefined) {
      validateResourceName(spec.name);
      return { name: spec.name, agent: undefined };
    }
    const agent = spec.agent !== undefined ? normalizeAgentName(spec.agent) : generateRandomName(this.ctx.random);
    return { name: containerName(project.project, agent), agent };
  }

  private requireProject(message?: string): ProjectConfig {
    if (!this.project) {
      throw new ProjectRequiredError(message);
    }
    return this.project;
  }

  private async allowedRoots(warnings: string[]): Promise<string[]> {
    const project = this.requireProject();
    const roots = [project.root];
    for (const entry of project.mounts) {
      const resolved = path.resolve(project.root, expandHome(entry));
      try {
        await access(resolved);
        roots.push(resolved);
      } catch {
        warnings.push(`allow-listed mount "${entry}" does not exist on this host`);
      }
    }
    return roots;
  }

  private async buildMounts(
    name: string,
    agent: string | undefined,
    spec: ContainerSpec,
    warnings: string[]
  ): Promise<{ mounts: Docker.MountConfig; binds: string[] }> {
    const project = this.requireProject();
    const labels = managedLabels(project.project, agent);
    const mounts: Docker.MountConfig = [];
    const binds: string[] = [];

    if (project.workspace.mode === 'snapshot') {
      await this.client.ensureVolume(volumeName(name, 'workspace'), labels, this.signal);
      mounts.push({ Type: 'volume', Source: volumeName(name, 'workspace'), Target: WORKSPACE_PATH });
    } else {
      binds.push(`${project.root}:${WORKSPACE_PATH}`);
    }
    await this.client.ensureVolume(volumeName(name, 'config'), labels, this.signal);
    mounts.push({ Type: 'volume', Source: volumeName(name, 'config'), Target: CONFIG_PATH });
    await this.client.ensureVolume(volumeName(name, 'history'), labels, this.signal);
    mounts.push({ Type: 'volume', Source: volumeName(name, 'history'), Target: HISTORY_PATH });

    if (spec.volumes.length === 0) {
      return { mounts, binds };
    }
    const roots = await this.allowedRoots(warnings);
    for (const flag of spec.volumes) {
      const volume = parseVolumeFlag(flag, this.ctx.cwd);
      if (volume.kind === 'volume') {
        mounts.push({ Type: 'volume', Source: volume.name, Target: volume.target, ReadOnly: volume.readOnly });
        continue;
      }
      if (!roots.some((root) => isWithin(root, volume.source))) {
        throw new InvalidArgumentsError(`mount source "${volume.source}" is outside the project and the allow-list`, {
          nextSteps: ['Add the path to mounts in berth.yaml'],
        });
      }
      binds.push(`${volume.source}:${volume.target}${volume.readOnly ? ':ro' : ''}`);
    }
    return { mounts, binds };
  }

  private async createContainer(spec: ContainerSpec): Promise<CreateResult> {
    const { name, agent } = this.containerIdentity(spec);
    const project = this.requireProject();
    const image = await this.resolveImage(spec.image);
    const warnings: string[] = [];
    if (spec.tty && !spec.interactive) {
      warnings.push('--tty without --interactive: the terminal will not receive input');
    }

    const labels = mergeLabels(parseLabels(spec.labels), {
      ...managedLabels(project.project, agent),
      [LABEL_IMAGE]: image,
      [LABEL_WORKDIR]: project.root,
    });
    const ports = parsePublish(spec.publish);
    const env = parseEnv(spec.env, this.ctx.environ);
    const { mounts, binds } = await this.buildMounts(name, agent, spec, warnings);

    if (this.networkEnabled) {
      await this.client.ensureNetwork(NETWORK_NAME, { [LABEL_MANAGED]: MANAGED_VALUE }, undefined, this.signal);
    }

    const request: Docker.ContainerCreateOptions = {
      name,
      Image: image,
      Cmd: spec.command.length > 0 ? spec.command : undefined,
      Entrypoint: spec.entrypoint !== undefined ? [spec.entrypoint] : undefined,
      Env: env,
      Labels: labels,
      WorkingDir: spec.workdir ?? WORKSPACE_PATH,
      User: spec.user,
      Tty: spec.tty,
      OpenStdin: spec.interactive,
      StdinOnce: spec.interactive,
      AttachStdin: spec.interactive,
      AttachStdout: true,
      AttachStderr: true,
      ExposedPorts: ports.exposed,
      HostConfig: {
        Binds: binds,
        Mounts: mounts,
        AutoRemove: spec.autoRemove,
        NetworkMode: this.networkEnabled ? NETWORK_NAME : undefined,
        PortBindings: ports.bindings,
      },
    };

    let id: string;
    try {
      id = await this.client.createContainer(request, this.signal);
    } catch (error) {
      if (!(error instanceof NotFoundError && error.resource === 'image')) {
        throw error;
      }
      this.io.err.write(`Unable to find image '${image}' locally, pulling\n`);
      await this.client.pullImage(image, this.signal);
      id = await this.client.createContainer(request, this.signal);
    }

    for (const warning of warnings) {
      this.warn(warning);
    }
    this.log.info({ container: name, image }, 'Container created');
    return { id, name, warnings };
  }

  private async startWithNetwork(id: string): Promise<void> {
    if (this.networkEnabled) {
      await this.client.ensureNetwork(NETWORK_NAME, { [LABEL_MANAGED]: MANAGED_VALUE }, id, this.signal);
    }
    await this.client.startContainer(id, this.signal);
  }

  // ---- batch verbs ------------------------------------------------------

  /**
   * Run action per target in order. A single target fails with its own
   * error; several targets fail with a BatchError after every target ran.
   */
  private async batch(
    verb: string,
    targets: string[],
    action: (container: ManagedContainer) => Promise<string | null>,
    options: { ignoreMissing?: boolean } = {}
  ): Promise<void> {
    const failures: TargetFailure[] = [];
    for (const target of targets) {
      try {
        const container = await this.client.findContainer(target, this.signal);
        const line = await action(container);
        if (line !== null) {
          this.print(line);
        }
      } catch (error) {
        const classified = classifyDaemonError(error, { op: verb, resource: 'container', target });
        if (classified instanceof CancelledError || classified instanceof DaemonUnavailableError) {
          throw classified;
        }
        if (options.ignoreMissing && classified instanceof NotFoundError && classified.resource === 'container') {
          continue;
        }
        failures.push({ target, error: classified });
      }
    }

    if (failures.length === 0) {
      return;
    }
    if (targets.length === 1) {
      throw failures[0].error;
    }
    for (const failure of failures) {
      this.io.err.write(`Error: ${failure.target}: ${failure.error.message}\n`);
    }
    throw new BatchError(verb, failures);
  }

  async start(targets: string[], options: { attach?: boolean; interactive?: boolean } = {}): Promise<void> {
    if (options.attach) {
      if (targets.length !== 1) {
        throw new InvalidArgumentsError('you cannot start and attach multiple containers at once');
      }
      const container = await this.client.findContainer(targets[0], this.signal);
      await this.engine.attachContainer(container.id, {
        interactive: options.interactive ?? false,
        signal: this.signal,
        start: () => this.startWithNetwork(container.id),
      });
      return;
    }
    await this.batch('start', targets, async (container) => {
      await this.startWithNetwork(container.id);
      return container.name;
    });
  }

  async stop(targets: string[], options: { time?: number; ignoreMissing?: boolean } = {}): Promise<void> {
    await this.batch(
      'stop',
      targets,
      async (container) => {
        try {
          await this.client.stopContainer(container.id, options.time, this.signal);
        } catch (error) {
          // Removed between lookup and stop.
          if (!(error instanceof NotFoundError)) {
            throw error;
          }
        }
        return container.name;
      },
      { ignoreMissing: options.ignoreMissing }
    );
  }

  async restart(targets: string[], options: { time?: number } = {}): Promise<void> {
    await this.batch('restart', targets, async (container) => {
      await this.client.restartContainer(container.id, options.time, this.signal);
      return container.name;
    });
  }

  async kill(targets: string[], killSignal = 'SIGKILL'): Promise<void> {
    await this.batch('kill', targets, async (container) => {
      if (container.state !== 'running' && container.state !== 'paused') {
        throw new NotRunningError(container.name);
      }
      await this.client.killContainer(container.id, killSignal, this.signal);
      return container.name;
    });
  }

  async pause(targets: string[]): Promise<void> {
    await this.batch('pause', targets, async (container) => {
      if (container.state === 'paused') {
        throw new AlreadyInStateError(`container "${container.name}" is already paused`);
      }
      if (container.state !== 'running') {
        throw new NotRunningError(container.name);
      }
      await this.client.pauseContainer(container.id, this.signal);
      return container.name;
    });
  }

  async unpause(targets: string[]): Promise<void> {
    await this.batch('unpause', targets, async (container) => {
      if (container.state !== 'paused') {
        throw new AlreadyInStateError(`container "${container.name}" is not paused`);
      }
      await this.client.unpauseContainer(container.id, this.signal);
      return container.name;
    });
  }

  async rename(target: string, newName: string): Promise<void> {
    validateResourceName(newName);
    const container = await this.client.findContainer(target, this.signal);
    await this.client.renameContainer(container.id, newName, this.signal);
    this.print(newName);
  }

  async remove(targets: string[], options: RemoveOptions = {}): Promise<void> {
    await this.batch('remove', targets, async (container) => {
      if (container.state === 'running' && options.force) {
        await this.client.killContainer(container.id, 'SIGKILL', this.signal);
        await this.removeIfPresent(container.id, true);
      } else {
        await this.client.removeContainer(container.id, { force: options.force }, this.signal);
      }

      const removeVolumes = options.volumes ?? isManaged(container.labels);
      if (removeVolumes) {
        await this.removeOwnVolumes(container);
      }
      return container.name;
    });
  }

  /**
   * Remove the volumes that belong to a container: labeled with its project
   * and agent, found by label or by the canonical `<name>-<purpose>` names.
   * Volumes without matching managed labels are left alone.
   */
  private async removeOwnVolumes(container: ManagedContainer): Promise<void> {
    const owns = (labels: Record<string, string>): boolean =>
      labels[LABEL_MANAGED] === MANAGED_VALUE &&
      labels[LABEL_PROJECT] === container.project &&
      labels[LABEL_AGENT] === container.agent;

    const candidates = new Set<string>();
    if (container.project !== undefined && container.agent !== undefined) {
      const labeled = await this.client.listVolumes({ project: container.project, agent: container.agent }, this.signal);
      for (const volume of labeled) {
        candidates.add(volume.name);
      }
    }
    for (const purpose of VOLUME_PURPOSES) {
      candidates.add(volumeName(container.name, purpose));
    }

    for (const name of candidates) {
      let labels: Record<string, string>;
      try {
        labels = (await this.client.inspectVolume(name, this.signal)).labels;
      } catch (error) {
        if (error instanceof NotFoundError) {
          continue;
        }
        throw error;
      }
      if (!owns(labels)) {
        this.log.debug({ volume: name }, 'Skipping volume with foreign labels');
        continue;
      }
      await this.client.removeVolume(name, false, this.signal);
    }
  }

  /**
   * Print the daemon's inspect document of every target as one JSON array.
   * Targets that resolve are printed even when others fail.
   */
  async inspect(targets: string[]): Promise<void> {
    const documents: Docker.ContainerInspectInfo[] = [];
    try {
      await this.batch('inspect', targets, async (container) => {
        documents.push(await this.client.inspectContainer(container.id, this.signal));
        return null;
      });
    } finally {
      if (documents.length > 0) {
        this.print(JSON.stringify(documents, null, 2));
      }
    }
  }

  async wait(targets: string[]): Promise<void> {
    await this.batch('wait', targets, async (container) => {
      const outcome = await this.client.waitContainer(container.id, 'not-running', this.signal);
      if (outcome.kind === 'error') {
        throw outcome.error;
      }
      return String(outcome.code);
    });
  }

  /**
   * Stop every container of a project. --clean also removes the containers
   * and the project's images; --all adds their volumes.
   */
  async down(options: DownOptions = {}): Promise<void> {
    const project = options.project ?? this.project?.project;
    if (!project) {
      throw new ProjectRequiredError('down requires a project, but no berth.yaml was found');
    }
    const containers = await this.client.listContainers({ project, signal: this.signal });
    const targets = containers.map((container) => container.id);

    if (targets.length > 0) {
      await this.batch('stop', targets, async (container) => {
        if (container.state === 'running' || container.state === 'paused') {
          await this.client.stopContainer(container.id, undefined, this.signal);
        }
        if (options.clean) {
          await this.removeIfPresent(container.id);
          if (options.all) {
            await this.removeOwnVolumes(container);
          }
        }
        return container.name;
      });
    }

    if (!options.clean) {
      return;
    }
    const images = await this.client.listImages({ project }, this.signal);
    for (const image of images) {
      const ref = image.tags.find((tag) => tag !== '<none>:<none>') ?? image.id;
      await this.client.removeImage(ref, { force: false }, this.signal);
      this.print(`Deleted: ${ref}`);
    }
  }

  private async removeIfPresent(id: string, force = false): Promise<void> {
    try {
      await this.client.removeContainer(id, { force }, this.signal);
    } catch (error) {
      // Auto-remove containers are gone once stopped.
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
    }
  }

  // ---- session verbs ----------------------------------------------------

  async exec(target: string, options: ExecOptions): Promise<void> {
    if (options.command.length === 0) {
      throw new InvalidArgumentsError('exec requires a command');
    }
    const container = await this.client.findContainer(target, this.signal);
    const request: ExecCreateRequest = {
      cmd: options.command,
      env: parseEnv(options.env, this.ctx.environ),
      workdir: options.workdir,
      user: options.user,
      tty: options.tty,
      stdin: options.interactive && !options.detach,
      privileged: options.privileged,
    };
    if (!options.detach) {
      await this.engine.attachExec(container.id, request, { interactive: options.interactive, signal: this.signal });
      return;
    }
    if (container.state !== 'running') {
      throw new NotRunningError(container.name);
    }
    const execId = await this.client.createExec(container.id, request, this.signal);
    await this.client.startExecDetached(execId, this.signal);
    this.print(execId);
  }

  async attach(target: string, options: { noStdin?: boolean } = {}): Promise<void> {
    const container = await this.client.findContainer(target, this.signal);
    await this.engine.attachContainer(container.id, { interactive: !options.noStdin, signal: this.signal });
  }

  async logs(target: string, options: LogOptions): Promise<void> {
    const container = await this.client.findContainer(target, this.signal);
    await this.engine.followLogs(container.id, options, this.signal);
  }

  async top(target: string, psArgs?: string): Promise<TopResult> {
    const container = await this.client.findContainer(target, this.signal);
    if (container.state !== 'running') {
      throw new NotRunningError(container.name);
    }
    return this.client.top(container.id, psArgs, this.signal);
  }

  /**
   * Managed containers, newest first. Scoped to the current project unless
   * another project or every project is asked for.
   */
  async list(options: ListOptions = {}): Promise<ManagedContainer[]> {
    const project = options.allProjects ? undefined : options.project ?? this.project?.project;
    const containers = await this.client.listContainers({
      project,
      all: !options.running,
      signal: this.signal,
    });
    return [...containers].sort((a, b) => b.created - a.created);
  }
}
