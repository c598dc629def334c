import Docker from 'dockerode';
import { Duplex, Readable, Writable } from 'stream';
import pino from 'pino';
import {
  AlreadyInStateError,
  BerthError,
  CancelledError,
  ClassifyContext,
  ConflictError,
  ExitWaitFailedError,
  NotFoundError,
  StreamFailureError,
  classifyDaemonError,
  getErrorMessage,
} from '../errors.js';
import { LABEL_AGENT, LABEL_MANAGED, LABEL_PROJECT, MANAGED_VALUE, isManaged } from './naming.js';
import { untilEnded } from './streams.js';
import type { ManagedContainer, TerminalSize } from '../types.js';

export interface ManagedFilter {
  project?: string;
  agent?: string;
}

export type WaitCondition = 'not-running' | 'next-exit' | 'removed';

/**
 * Result of a wait subscription. Never a rejection: the attach engine races
 * it against stream completion and needs both outcomes as values.
 */
export type WaitOutcome =
  | { kind: 'exited'; code: number }
  | { kind: 'error'; error: BerthError };

export interface LogOptions {
  follow: boolean;
  timestamps?: boolean;
  since?: number;       // unix seconds
  until?: number;       // unix seconds
  tail?: string;        // "all" or a line count
  details?: boolean;
}

export interface ExecCreateRequest {
  cmd: string[];
  env?: string[];
  workdir?: string;
  user?: string;
  tty: boolean;
  stdin: boolean;
  privileged?: boolean;
}

export interface ExecStatus {
  running: boolean;
  exitCode: number | null;
}

export interface VolumeSummary {
  name: string;
  labels: Record<string, string>;
}

export interface ImageSummary {
  id: string;
  tags: string[];
  size: number;
  created: number;
  labels: Record<string, string>;
}

export interface NetworkSummary {
  id: string;
  name: string;
  containers: string[];
  labels: Record<string, string>;
}

export interface TopResult {
  titles: string[];
  processes: string[][];
}

export interface DaemonClientOptions {
  docker?: Docker.DockerOptions;
  logger?: pino.Logger;
}

const SENTINEL_TAG = '<none>:<none>';
const ID_PREFIX_PATTERN = /^[0-9a-f]{6,64}$/i;

function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? (value as Record<string, unknown>) : {};
}

function asLabels(value: unknown): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const [key, entry] of Object.entries(asRecord(value))) {
    if (typeof entry === 'string') {
      labels[key] = entry;
    }
  }
  return labels;
}

function asNumber(value: unknown, fallback = 0): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function hasRealTag(image: ImageSummary): boolean {
  return image.tags.some((tag) => tag !== SENTINEL_TAG);
}

function toManagedContainer(info: Docker.ContainerInfo): ManagedContainer {
  const labels = asLabels(info.Labels);
  const rawName = info.Names?.[0] ?? info.Id;
  return {
    id: info.Id,
    name: rawName.startsWith('/') ? rawName.slice(1) : rawName,
    project: labels[LABEL_PROJECT],
    agent: labels[LABEL_AGENT],
    image: info.Image,
    state: info.State,
    status: info.Status,
    created: asNumber(info.Created),
    labels,
  };
}

/**
 * Thin adapter over dockerode. Every call is cancellable, every failure is
 * classified into a BerthError, and every enumeration is scoped to managed
 * resources.
 */
export class DaemonClient {
  private docker: Docker;
  private log: pino.Logger;

  constructor(options: DaemonClientOptions = {}) {
    this.docker = new Docker(options.docker);
    this.log = options.logger ?? pino({ level: 'silent' });
  }

  /**
   * Compose the label filter every enumeration goes through.
   */
  managedFilters(filter: ManagedFilter = {}, extra: Record<string, string[]> = {}): Record<string, string[]> {
    const label = [`${LABEL_MANAGED}=${MANAGED_VALUE}`];
    if (filter.project) {
      label.push(`${LABEL_PROJECT}=${filter.project}`);
    }
    if (filter.agent) {
      label.push(`${LABEL_AGENT}=${filter.agent}`);
    }
    return { ...extra, label };
  }

  private async call<T>(context: ClassifyContext, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    try {
      return await raceAbort(fn(), signal);
    } catch (error) {
      const classified = classifyDaemonError(error, context);
      this.log.debug({ op: context.op, kind: classified.kind, err: getErrorMessage(error) }, 'Daemon call failed');
      throw classified;
    }
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'ping' }, signal, () => this.docker.ping());
  }

  // ---- containers -------------------------------------------------------

  async listContainers(
    options: ManagedFilter & { all?: boolean; status?: string[]; signal?: AbortSignal } = {}
  ): Promise<ManagedContainer[]> {
    const extra: Record<string, string[]> = options.status ? { status: options.status } : {};
    const listOptions = { all: options.all ?? true, filters: this.managedFilters(options, extra) };
    const infos = await this.call({ op: 'list containers' }, options.signal, () =>
      this.docker.listContainers(listOptions)
    );
    // The daemon applies the filter; re-check so nothing foreign leaks through.
    return infos.map(toManagedContainer).filter((c) => isManaged(c.labels));
  }

  /**
   * Find a managed container by canonical name or ID prefix (at least 6 hex
   * digits). Foreign containers are invisible here.
   */
  async findContainer(identifier: string, signal?: AbortSignal): Promise<ManagedContainer> {
    const bare = identifier.startsWith('/') ? identifier.slice(1) : identifier;
    const containers = await this.listContainers({ signal });

    const byName = containers.filter((c) => c.name === bare);
    if (byName.length > 1) {
      throw new ConflictError(`more than one managed container is named "${bare}"`);
    }
    if (byName.length === 1) {
      return byName[0];
    }

    if (ID_PREFIX_PATTERN.test(bare)) {
      const prefix = bare.toLowerCase();
      const byId = containers.filter((c) => c.id.toLowerCase().startsWith(prefix));
      if (byId.length > 1) {
        throw new ConflictError(`ID prefix "${bare}" matches ${byId.length} containers`, {
          nextSteps: ['Use a longer ID prefix or the container name'],
        });
      }
      if (byId.length === 1) {
        return byId[0];
      }
    }
    throw new NotFoundError('container', bare);
  }

  async inspectContainer(id: string, signal?: AbortSignal): Promise<Docker.ContainerInspectInfo> {
    return this.call({ op: 'inspect container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).inspect()
    );
  }

  async createContainer(request: Docker.ContainerCreateOptions, signal?: AbortSignal): Promise<string> {
    // A 404 on create means the image is missing.
    const context: ClassifyContext = { op: 'create container', resource: 'image', target: request.Image ?? '' };
    const container = await this.call(context, signal, () => this.docker.createContainer(request));
    this.log.info({ containerId: container.id, name: request.name }, 'Container created');
    return container.id;
  }

  /**
   * @returns false when the container was already running
   */
  async startContainer(id: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.call({ op: 'start container', resource: 'container', target: id }, signal, () =>
        this.docker.getContainer(id).start()
      );
      this.log.info({ containerId: id }, 'Container started');
      return true;
    } catch (error) {
      if (error instanceof AlreadyInStateError) {
        this.log.info({ containerId: id }, 'Container already running');
        return false;
      }
      throw error;
    }
  }

  /**
   * @returns false when the container was already stopped
   */
  async stopContainer(id: string, timeoutSeconds?: number, signal?: AbortSignal): Promise<boolean> {
    const stopOptions = timeoutSeconds === undefined ? {} : { t: timeoutSeconds };
    try {
      await this.call({ op: 'stop container', resource: 'container', target: id }, signal, () =>
        this.docker.getContainer(id).stop(stopOptions)
      );
      this.log.info({ containerId: id }, 'Container stopped');
      return true;
    } catch (error) {
      if (error instanceof AlreadyInStateError) {
        this.log.info({ containerId: id }, 'Container already stopped');
        return false;
      }
      throw error;
    }
  }

  async restartContainer(id: string, timeoutSeconds?: number, signal?: AbortSignal): Promise<void> {
    const restartOptions = timeoutSeconds === undefined ? {} : { t: timeoutSeconds };
    await this.call({ op: 'restart container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).restart(restartOptions)
    );
  }

  async killContainer(id: string, killSignal: string, signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'kill container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).kill({ signal: killSignal })
    );
  }

  async pauseContainer(id: string, signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'pause container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).pause()
    );
  }

  async unpauseContainer(id: string, signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'unpause container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).unpause()
    );
  }

  async renameContainer(id: string, newName: string, signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'rename container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).rename({ name: newName })
    );
  }

  async removeContainer(id: string, options: { force?: boolean; volumes?: boolean } = {}, signal?: AbortSignal): Promise<void> {
    const removeOptions = { force: options.force ?? false, v: options.volumes ?? false };
    await this.call({ op: 'remove container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).remove(removeOptions)
    );
    this.log.info({ containerId: id }, 'Container removed');
  }

  /**
   * Subscribe to a wait condition. The request is sent immediately, so a
   * 'next-exit' subscription made before start observes the first exit.
   */
  waitContainer(id: string, condition: WaitCondition, signal?: AbortSignal): Promise<WaitOutcome> {
    const waitOptions = { condition, abortSignal: signal };
    return raceAbort(this.docker.getContainer(id).wait(waitOptions), signal).then(
      (result: unknown): WaitOutcome => {
        const body = asRecord(result);
        const failure = asRecord(body.Error);
        if (typeof failure.Message === 'string' && failure.Message.length > 0) {
          return { kind: 'error', error: new ExitWaitFailedError(failure.Message) };
        }
        return { kind: 'exited', code: asNumber(body.StatusCode) };
      },
      (error: unknown): WaitOutcome => {
        const classified = classifyDaemonError(error, { op: 'wait container', resource: 'container', target: id });
        if (classified instanceof CancelledError) {
          return { kind: 'error', error: classified };
        }
        return { kind: 'error', error: new ExitWaitFailedError(classified.message, error) };
      }
    );
  }

  /**
   * Open the hijacked attach connection. With a TTY it carries raw bytes,
   * otherwise multiplexed frames.
   */
  async attachContainer(id: string, options: { stdin: boolean }, signal?: AbortSignal): Promise<Duplex> {
    const attachOptions = { stream: true, stdin: options.stdin, stdout: true, stderr: true, hijack: true };
    const stream: unknown = await this.call({ op: 'attach container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).attach(attachOptions)
    );
    if (!(stream instanceof Duplex)) {
      throw new StreamFailureError('daemon did not return a bidirectional attach stream');
    }
    return stream;
  }

  /**
   * Copy a multiplexed attach or logs stream to stdout and stderr with the
   * modem's demuxer until the source ends. Neither destination is ended.
   */
  demultiplex(source: Readable, stdout: Writable, stderr: Writable, signal?: AbortSignal): Promise<void> {
    return untilEnded(source, () => this.docker.modem.demuxStream(source, stdout, stderr), signal);
  }

  async resizeContainer(id: string, size: TerminalSize, signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'resize container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).resize({ h: size.rows, w: size.columns })
    );
  }

  async top(id: string, psArgs?: string, signal?: AbortSignal): Promise<TopResult> {
    const topOptions = psArgs ? { ps_args: psArgs } : {};
    const result: unknown = await this.call({ op: 'top', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).top(topOptions)
    );
    const body = asRecord(result);
    const titles = Array.isArray(body.Titles) ? body.Titles.map(String) : [];
    const processes = Array.isArray(body.Processes)
      ? body.Processes.map((row: unknown) => (Array.isArray(row) ? row.map(String) : []))
      : [];
    return { titles, processes };
  }

  /**
   * Container output as a stream. Framed unless the container has a TTY.
   */
  async logs(id: string, options: LogOptions, signal?: AbortSignal): Promise<Readable> {
    const container = this.docker.getContainer(id);
    const tail = options.tail === undefined || options.tail === 'all' ? undefined : Number(options.tail);
    const base = {
      stdout: true,
      stderr: true,
      timestamps: options.timestamps ?? false,
      details: options.details ?? false,
      since: options.since,
      until: options.until,
      tail,
    };
    const context: ClassifyContext = { op: 'logs', resource: 'container', target: id };
    if (options.follow) {
      const stream: unknown = await this.call(context, signal, () => container.logs({ ...base, follow: true }));
      if (!(stream instanceof Readable)) {
        throw new StreamFailureError('daemon did not return a log stream');
      }
      return stream;
    }
    const buffer = await this.call(context, signal, () => container.logs({ ...base, follow: false }));
    return Readable.from([buffer]);
  }

  // ---- exec -------------------------------------------------------------

  async createExec(id: string, request: ExecCreateRequest, signal?: AbortSignal): Promise<string> {
    const execOptions = {
      Cmd: request.cmd,
      Env: request.env,
      WorkingDir: request.workdir,
      User: request.user,
      Tty: request.tty,
      Privileged: request.privileged ?? false,
      AttachStdin: request.stdin,
      AttachStdout: true,
      AttachStderr: true,
    };
    const exec = await this.call({ op: 'create exec', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).exec(execOptions)
    );
    this.log.debug({ containerId: id, execId: exec.id }, 'Exec session created');
    return exec.id;
  }

  async startExec(execId: string, options: { stdin: boolean; tty: boolean }, signal?: AbortSignal): Promise<Duplex> {
    const startOptions = { hijack: true, stdin: options.stdin, Tty: options.tty };
    const stream: unknown = await this.call({ op: 'start exec', resource: 'exec session', target: execId }, signal, () =>
      this.docker.getExec(execId).start(startOptions)
    );
    if (!(stream instanceof Duplex)) {
      throw new StreamFailureError('daemon did not return a bidirectional exec stream');
    }
    return stream;
  }

  async startExecDetached(execId: string, signal?: AbortSignal): Promise<void> {
    const startOptions = { Detach: true };
    await this.call({ op: 'start exec', resource: 'exec session', target: execId }, signal, () =>
      this.docker.getExec(execId).start(startOptions)
    );
  }

  async resizeExec(execId: string, size: TerminalSize, signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'resize exec', resource: 'exec session', target: execId }, signal, () =>
      this.docker.getExec(execId).resize({ h: size.rows, w: size.columns })
    );
  }

  async inspectExec(execId: string, signal?: AbortSignal): Promise<ExecStatus> {
    const info = await this.call({ op: 'inspect exec', resource: 'exec session', target: execId }, signal, () =>
      this.docker.getExec(execId).inspect()
    );
    return { running: info.Running, exitCode: info.ExitCode ?? null };
  }

  // ---- volumes ----------------------------------------------------------

  async listVolumes(filter: ManagedFilter = {}, signal?: AbortSignal): Promise<VolumeSummary[]> {
    const listOptions = { filters: this.managedFilters(filter) };
    const result: unknown = await this.call({ op: 'list volumes' }, signal, () => this.docker.listVolumes(listOptions));
    const volumes = asRecord(result).Volumes;
    return (Array.isArray(volumes) ? volumes : [])
      .map((volume: unknown) => {
        const body = asRecord(volume);
        return { name: String(body.Name), labels: asLabels(body.Labels) };
      })
      .filter((volume) => isManaged(volume.labels));
  }

  async inspectVolume(name: string, signal?: AbortSignal): Promise<VolumeSummary> {
    const info: unknown = await this.call({ op: 'inspect volume', resource: 'volume', target: name }, signal, () =>
      this.docker.getVolume(name).inspect()
    );
    const body = asRecord(info);
    return { name: String(body.Name ?? name), labels: asLabels(body.Labels) };
  }

  /**
   * Create a labeled volume unless it exists. An existing volume without the
   * managed label is never adopted.
   *
   * @returns true when the volume was created
   */
  async ensureVolume(name: string, labels: Record<string, string>, signal?: AbortSignal): Promise<boolean> {
    try {
      const existing = await this.inspectVolume(name, signal);
      if (!isManaged(existing.labels)) {
        throw new ConflictError(`volume "${name}" exists but is not managed by berth`, {
          nextSteps: [`Remove or rename the volume: docker volume rm ${name}`],
        });
      }
      return false;
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
    }
    const createOptions = { Name: name, Labels: labels };
    await this.call({ op: 'create volume', resource: 'volume', target: name }, signal, () =>
      this.docker.createVolume(createOptions)
    );
    this.log.info({ volume: name }, 'Volume created');
    return true;
  }

  async removeVolume(name: string, force = false, signal?: AbortSignal): Promise<void> {
    const removeOptions = { force };
    await this.call({ op: 'remove volume', resource: 'volume', target: name }, signal, () =>
      this.docker.getVolume(name).remove(removeOptions)
    );
    this.log.info({ volume: name }, 'Volume removed');
  }

  // ---- images -----------------------------------------------------------

  async listImages(filter: ManagedFilter = {}, signal?: AbortSignal): Promise<ImageSummary[]> {
    const listOptions = { filters: this.managedFilters({ project: filter.project }) };
    const infos = await this.call({ op: 'list images' }, signal, () => this.docker.listImages(listOptions));
    return infos
      .map((info) => ({
        id: info.Id,
        tags: info.RepoTags ?? [],
        size: asNumber(info.Size),
        created: asNumber(info.Created),
        labels: asLabels(info.Labels),
      }))
      .filter((image) => isManaged(image.labels));
  }

  async inspectImage(ref: string, signal?: AbortSignal): Promise<ImageSummary> {
    const info = await this.call({ op: 'inspect image', resource: 'image', target: ref }, signal, () =>
      this.docker.getImage(ref).inspect()
    );
    return {
      id: info.Id,
      tags: info.RepoTags ?? [],
      size: asNumber(info.Size),
      created: Date.parse(info.Created) / 1000 || 0,
      labels: asLabels(info.Config?.Labels),
    };
  }

  async pullImage(ref: string, signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'pull image', resource: 'image', target: ref }, signal, async () => {
      const stream = await this.docker.pull(ref);
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(stream, (error: Error | null) => (error ? reject(error) : resolve()));
      });
    });
    this.log.info({ image: ref }, 'Image pulled');
  }

  async removeImage(ref: string, options: { force?: boolean; pruneChildren?: boolean } = {}, signal?: AbortSignal): Promise<void> {
    const removeOptions = { force: options.force ?? false, noprune: !(options.pruneChildren ?? true) };
    await this.call({ op: 'remove image', resource: 'image', target: ref }, signal, () =>
      this.docker.getImage(ref).remove(removeOptions)
    );
    this.log.info({ image: ref }, 'Image removed');
  }

  // ---- networks ---------------------------------------------------------

  async inspectNetwork(name: string, signal?: AbortSignal): Promise<NetworkSummary> {
    const info: unknown = await this.call({ op: 'inspect network', resource: 'network', target: name }, signal, () =>
      this.docker.getNetwork(name).inspect()
    );
    const body = asRecord(info);
    return {
      id: String(body.Id ?? ''),
      name: String(body.Name ?? name),
      containers: Object.keys(asRecord(body.Containers)),
      labels: asLabels(body.Labels),
    };
  }

  /**
   * Inspect the network, create it if absent, then connect the container
   * unless it is already a member.
   */
  async ensureNetwork(name: string, labels: Record<string, string>, containerId?: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.inspectNetwork(name, signal);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      const createOptions = { Name: name, Driver: 'bridge', Labels: labels, CheckDuplicate: true };
      await this.call({ op: 'create network', resource: 'network', target: name }, signal, () =>
        this.docker.createNetwork(createOptions)
      );
      this.log.info({ network: name }, 'Network created');
    }

    if (containerId === undefined) {
      return;
    }
    const inspect = await this.inspectContainer(containerId, signal);
    const joined = Object.keys(asRecord(inspect.NetworkSettings?.Networks));
    if (joined.includes(name)) {
      return;
    }
    try {
      await this.call({ op: 'connect network', resource: 'network', target: name }, signal, () =>
        this.docker.getNetwork(name).connect({ Container: containerId })
      );
      this.log.debug({ network: name, containerId }, 'Container connected to network');
    } catch (error) {
      // The daemon reports an existing endpoint as 403/409 "already exists".
      if (error instanceof BerthError && /already exists/i.test(error.message)) {
        return;
      }
      throw error;
    }
  }

  async removeNetwork(name: string, signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'remove network', resource: 'network', target: name }, signal, () =>
      this.docker.getNetwork(name).remove()
    );
    this.log.info({ network: name }, 'Network removed');
  }

  // ---- archives ---------------------------------------------------------

  async getArchive(id: string, path: string, signal?: AbortSignal): Promise<NodeJS.ReadableStream> {
    // The container was resolved already, so a 404 here is a missing path.
    return this.call({ op: 'copy from container', resource: 'file', target: path }, signal, () =>
      this.docker.getContainer(id).getArchive({ path })
    );
  }

  async putArchive(id: string, path: string, archive: NodeJS.ReadableStream | Buffer, signal?: AbortSignal): Promise<void> {
    await this.call({ op: 'copy to container', resource: 'container', target: id }, signal, () =>
      this.docker.getContainer(id).putArchive(archive, { path })
    );
  }
}
