import readline from 'readline';
import pino from 'pino';
import { DaemonClient, NetworkSummary, hasRealTag } from './client.js';
import { NETWORK_NAME, PROGRAM, isManaged } from './naming.js';
import { CancelledError, DaemonUnavailableError, NotFoundError, getErrorMessage } from '../errors.js';
import type { IOStreams } from '../types.js';

export interface PruneOptions {
  all?: boolean;
  force?: boolean;
}

export type PrunedKind = 'container' | 'image' | 'volume' | 'network';

export interface PrunedResource {
  kind: PrunedKind;
  name: string;
  bytes: number;
}

export interface PruneSummary {
  confirmed: boolean;
  removed: PrunedResource[];
  failed: Array<{ kind: PrunedKind; name: string; error: string }>;
  reclaimedBytes: number;
}

export interface PruneEngineOptions {
  logger?: pino.Logger;
  signal?: AbortSignal;
}

const UNITS = ['B', 'kB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1000 && unit < UNITS.length - 1) {
    value /= 1000;
    unit++;
  }
  return unit === 0 ? `${value}B` : `${value.toFixed(1)}${UNITS[unit]}`;
}

/**
 * Read one line from input. EOF, or a closed stream, reads as "no".
 */
export async function confirm(io: IOStreams, question: string): Promise<boolean> {
  io.err.write(`${question} [y/N] `);
  const rl = readline.createInterface({ input: io.in, terminal: false });
  try {
    const answer = await new Promise<string | null>((resolve) => {
      rl.once('line', resolve);
      rl.once('close', () => resolve(null));
    });
    return answer !== null && /^(y|yes)$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

/**
 * Removes managed resources nobody uses. Foreign resources are never
 * listed, so never touched.
 */
export class PruneEngine {
  private log: pino.Logger;
  private signal: AbortSignal | undefined;

  constructor(
    private readonly client: DaemonClient,
    private readonly io: IOStreams,
    options: PruneEngineOptions = {}
  ) {
    this.log = options.logger ?? pino({ level: 'silent' });
    this.signal = options.signal;
  }

  async prune(options: PruneOptions = {}): Promise<PruneSummary> {
    const summary: PruneSummary = { confirmed: true, removed: [], failed: [], reclaimedBytes: 0 };

    if (options.all && !options.force) {
      this.io.err.write(
        [
          `WARNING: This will remove ALL ${PROGRAM} resources:`,
          `  - every stopped ${PROGRAM} container`,
          `  - every ${PROGRAM} image`,
          `  - every ${PROGRAM} volume (persistent data will be lost)`,
          `  - the ${NETWORK_NAME} network`,
          '',
        ].join('\n')
      );
      if (!(await confirm(this.io, 'Are you sure you want to continue?'))) {
        this.io.err.write('Aborted.\n');
        summary.confirmed = false;
        return summary;
      }
    }

    await this.pruneContainers(summary, options.all ?? false);
    await this.pruneImages(summary, options.all ?? false);
    if (options.all) {
      await this.pruneVolumes(summary);
      await this.pruneNetwork(summary);
    }

    summary.reclaimedBytes = summary.removed.reduce((total, resource) => total + resource.bytes, 0);
    if (summary.removed.length === 0) {
      this.io.err.write(`No ${PROGRAM} resources to remove.\n`);
    } else {
      this.io.err.write(
        `Pruned ${summary.removed.length} ${PROGRAM} resource(s), reclaimed ${formatBytes(summary.reclaimedBytes)}.\n`
      );
    }
    return summary;
  }

  /**
   * Remove one resource. Failures are recorded and logged, and the batch
   * continues; only cancellation and a lost daemon stop it.
   */
  private async removeOne(summary: PruneSummary, resource: PrunedResource, remove: () => Promise<void>): Promise<void> {
    this.io.err.write(`Removing ${resource.kind}: ${resource.name}\n`);
    try {
      await remove();
      summary.removed.push(resource);
    } catch (error) {
      if (error instanceof CancelledError || error instanceof DaemonUnavailableError) {
        throw error;
      }
      if (error instanceof NotFoundError) {
        this.log.debug({ kind: resource.kind, name: resource.name }, 'Already gone');
        return;
      }
      this.log.warn({ kind: resource.kind, name: resource.name, err: getErrorMessage(error) }, 'Prune failed');
      summary.failed.push({ kind: resource.kind, name: resource.name, error: getErrorMessage(error) });
    }
  }

  private async pruneContainers(summary: PruneSummary, all: boolean): Promise<void> {
    const containers = await this.client.listContainers({ all: true, signal: this.signal });
    for (const container of containers) {
      if (container.state === 'running' || (!all && container.state !== 'exited')) {
        continue;
      }
      await this.removeOne(summary, { kind: 'container', name: container.name, bytes: 0 }, () =>
        this.client.removeContainer(container.id, { force: true }, this.signal)
      );
    }
  }

  private async pruneImages(summary: PruneSummary, all: boolean): Promise<void> {
    const images = await this.client.listImages({}, this.signal);
    for (const image of images) {
      if (!all && hasRealTag(image)) {
        continue;
      }
      const name = image.tags.find((tag) => tag !== '<none>:<none>') ?? image.id;
      await this.removeOne(summary, { kind: 'image', name, bytes: image.size }, () =>
        this.client.removeImage(image.id, { force: true }, this.signal)
      );
    }
  }

  private async pruneVolumes(summary: PruneSummary): Promise<void> {
    const volumes = await this.client.listVolumes({}, this.signal);
    for (const volume of volumes) {
      await this.removeOne(summary, { kind: 'volume', name: volume.name, bytes: 0 }, () =>
        this.client.removeVolume(volume.name, false, this.signal)
      );
    }
  }

  private async pruneNetwork(summary: PruneSummary): Promise<void> {
    let network: NetworkSummary;
    try {
      network = await this.client.inspectNetwork(NETWORK_NAME, this.signal);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return;
      }
      throw error;
    }
    if (!isManaged(network.labels)) {
      this.log.debug({ network: NETWORK_NAME }, 'Network is not managed; leaving it');
      return;
    }
    if (network.containers.length > 0) {
      this.log.info({ network: NETWORK_NAME, containers: network.containers.length }, 'Network in use; leaving it');
      return;
    }
    await this.removeOne(summary, { kind: 'network', name: NETWORK_NAME, bytes: 0 }, () =>
      this.client.removeNetwork(NETWORK_NAME, this.signal)
    );
  }
}
