/**
 * Orchestrator module exports
 *
 * The orchestrator runs on the host and manages:
 * - Docker container lifecycle for project agents (via dockerode)
 * - Attach, exec and log streams
 * - Pruning and file copies
 */

export { DaemonClient, hasRealTag } from './client.js';
export { StreamEngine } from './attach.js';
export { LifecycleCoordinator, PROJECT_IMAGE } from './lifecycle.js';
export { PruneEngine } from './prune.js';
export { CopyEngine, hostTar } from './copy.js';
export * from './naming.js';
export * from './resolver.js';
export type { ManagedFilter, WaitCondition, WaitOutcome, LogOptions, ExecCreateRequest } from './client.js';
export type { ContainerAttachOptions, ExecAttachOptions, StreamEngineOptions } from './attach.js';
export type { ContainerSpec, RunOptions, CreateResult, ListOptions, RemoveOptions, DownOptions, ExecOptions } from './lifecycle.js';
export type { PruneOptions, PruneSummary } from './prune.js';
export type { TarRunner } from './copy.js';
export type { ManagedContainer, ProjectConfig, UserSettings, IOStreams } from '../types.js';
