/**
 * Custom error classes for typed error handling.
 * Use instanceof checks (or `kind`) instead of fragile string matching.
 */

export type ErrorKind =
  | 'InvalidArguments'
  | 'ProjectRequired'
  | 'NotFound'
  | 'NotRunning'
  | 'AlreadyInState'
  | 'Conflict'
  | 'DaemonUnavailable'
  | 'DaemonError'
  | 'ContainerExitedNonZero'
  | 'ExitWaitFailed'
  | 'StreamFailure'
  | 'Cancelled'
  | 'ConfigInvalid'
  | 'BatchFailed';

export interface BerthErrorOptions {
  cause?: unknown;
  nextSteps?: string[];
}

export class BerthError extends Error {
  readonly kind: ErrorKind;
  readonly nextSteps: string[];

  constructor(kind: ErrorKind, message: string, options: BerthErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BerthError';
    this.kind = kind;
    this.nextSteps = options.nextSteps ?? [];
  }
}

export class InvalidArgumentsError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('InvalidArguments', message, options);
    this.name = 'InvalidArgumentsError';
  }
}

export class ProjectRequiredError extends BerthError {
  constructor(message = '--agent requires a project, but no berth.yaml was found') {
    super('ProjectRequired', message, {
      nextSteps: [
        'Run berth init <project> in your project directory',
        'Or name the container directly instead of using --agent',
      ],
    });
    this.name = 'ProjectRequiredError';
  }
}

export type ResourceType = 'container' | 'volume' | 'image' | 'network' | 'exec session' | 'file';

export class NotFoundError extends BerthError {
  readonly resource: ResourceType;
  readonly target: string;

  constructor(resource: ResourceType, target: string, options?: BerthErrorOptions) {
    super('NotFound', `${resource} "${target}" not found`, {
      nextSteps: resource === 'container'
        ? ['List managed containers: berth ps', 'Check the agent name and the current project']
        : [],
      ...options,
    });
    this.name = 'NotFoundError';
    this.resource = resource;
    this.target = target;
  }
}

export class NotRunningError extends BerthError {
  constructor(target: string) {
    super('NotRunning', `container "${target}" is not running`, {
      nextSteps: [`Start it first: berth start ${target}`],
    });
    this.name = 'NotRunningError';
  }
}

export class AlreadyInStateError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('AlreadyInState', message, options);
    this.name = 'AlreadyInStateError';
  }
}

export class ConflictError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('Conflict', message, options);
    this.name = 'ConflictError';
  }
}

export class DaemonUnavailableError extends BerthError {
  constructor(cause?: unknown) {
    super('DaemonUnavailable', 'Cannot connect to the Docker daemon', {
      cause,
      nextSteps: [
        'Ensure Docker is installed and running: docker ps',
        'Check DOCKER_HOST if you use a non-default socket',
        'Verify your user can access /var/run/docker.sock',
      ],
    });
    this.name = 'DaemonUnavailableError';
  }
}

export class DaemonError extends BerthError {
  readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number, options?: BerthErrorOptions) {
    super('DaemonError', message, options);
    this.name = 'DaemonError';
    this.statusCode = statusCode;
  }
}

export class ContainerExitedNonZeroError extends BerthError {
  readonly code: number;

  constructor(code: number) {
    super('ContainerExitedNonZero', `container exited with status ${code}`);
    this.name = 'ContainerExitedNonZeroError';
    this.code = code;
  }
}

export class ExitWaitFailedError extends BerthError {
  constructor(message: string, cause?: unknown) {
    super('ExitWaitFailed', `waiting for container exit failed: ${message}`, { cause });
    this.name = 'ExitWaitFailedError';
  }
}

export class StreamFailureError extends BerthError {
  constructor(message: string, cause?: unknown) {
    super('StreamFailure', message, { cause });
    this.name = 'StreamFailureError';
  }
}

export class CancelledError extends BerthError {
  constructor() {
    super('Cancelled', 'operation cancelled');
    this.name = 'CancelledError';
  }
}

export class ConfigError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('ConfigInvalid', message, options);
    this.name = 'ConfigError';
  }
}

export interface TargetFailure {
  target: string;
  error: BerthError;
}

/**
 * Aggregate failure of a batch verb. Each failure has already been reported
 * to the user by the time this is thrown.
 */
export class BatchError extends BerthError {
  readonly failures: TargetFailure[];

  constructor(verb: string, failures: TargetFailure[]) {
    super('BatchFailed', `failed to ${verb} ${failures.length} container(s)`);
    this.name = 'BatchError';
    this.failures = failures;
  }
}

/**
 * Type guard for Docker API errors which have a statusCode property
 */
export function isDockerError(error: unknown): error is { statusCode: number; message: string; json?: unknown } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof (error as Record<string, unknown>).statusCode === 'number'
  );
}

const TRANSPORT_CODES = new Set([
  'ECONNREFUSED',
  'ENOENT',
  'EACCES',
  'ECONNRESET',
  'EPIPE',
  'ETIMEDOUT',
  'EHOSTUNREACH',
]);

function isTransportError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const code = (error as Record<string, unknown>).code;
  return typeof code === 'string' && TRANSPORT_CODES.has(code);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'AbortSignal');
}

/**
 * Extract error message safely without exposing internal details
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unknown error';
}

/**
 * Prefer the daemon's JSON body message over dockerode's "(HTTP code N) ..." wrapper.
 */
export function daemonMessage(error: unknown): string {
  return bodyMessage(error) || getErrorMessage(error).trim();
}

/** The message in the daemon's JSON body, or '' when the body has none. */
function bodyMessage(error: unknown): string {
  if (isDockerError(error) && typeof error.json === 'object' && error.json !== null) {
    const message = (error.json as Record<string, unknown>).message;
    if (typeof message === 'string') {
      return message.trim();
    }
  }
  return '';
}

export interface ClassifyContext {
  op: string;
  resource?: ResourceType;
  target?: string;
}

/**
 * Map a failure raised by dockerode (or the transport under it) onto the
 * closed set of error kinds. Errors that are already classified pass through.
 */
export function classifyDaemonError(error: unknown, context: ClassifyContext): BerthError {
  if (error instanceof BerthError) {
    return error;
  }
  if (isAbortError(error)) {
    return new CancelledError();
  }
  if (isTransportError(error)) {
    return new DaemonUnavailableError(error);
  }
  if (!isDockerError(error)) {
    return new DaemonError(`${context.op} failed: ${getErrorMessage(error)}`, undefined, { cause: error });
  }

  const message = daemonMessage(error);
  switch (error.statusCode) {
    case 404:
      if (context.resource && context.target) {
        return new NotFoundError(context.resource, context.target, { cause: error });
      }
      return new DaemonError(`${context.op} failed: ${message}`, 404, { cause: error });
    case 304:
      return new AlreadyInStateError(
        `${context.target ?? context.resource ?? 'resource'}: ${bodyMessage(error) || 'already in requested state'}`,
        { cause: error }
      );
    case 409:
      if (/already|is not paused|not paused/i.test(message)) {
        return new AlreadyInStateError(message, { cause: error });
      }
      return new ConflictError(message, { cause: error });
    default:
      return new DaemonError(`${context.op} failed: ${message}`, error.statusCode, { cause: error });
  }
}

/**
 * Process exit code for an error surfaced at the command boundary.
 */
export function exitCodeFor(error: unknown): number {
  if (!(error instanceof BerthError)) {
    return 1;
  }
  switch (error.kind) {
    case 'ConfigInvalid':
      return 2;
    case 'DaemonUnavailable':
    case 'DaemonError':
      return 125;
    case 'Cancelled':
      return 130;
    case 'BatchFailed': {
      // A batch keeps the shared code of its failures, 1 when they differ.
      const codes = new Set(error instanceof BatchError ? error.failures.map((f) => exitCodeFor(f.error)) : []);
      return codes.size === 1 ? [...codes][0] : 1;
    }
    default:
      return 1;
  }
}
