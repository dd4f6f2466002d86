/**
 * Error taxonomy
 */

import type { OutputFormat } from './artifact.types.js';
import type { StageId } from './stage.types.js';

export type ConfigErrorKind = 'unsupported-format' | 'missing-option' | 'invalid-option';

export class ConfigError extends Error {
  public readonly context: Record<string, unknown> | undefined;

  constructor(
    message: string,
    public readonly kind: ConfigErrorKind,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
    this.context = context;
  }
}

export type WorkerErrorKind =
  | 'remote-unavailable'
  | 'rate-limited'
  | 'timeout'
  | 'schema-mismatch'
  | 'invalid-output'
  | 'execution-failed'
  | 'cancelled';

const TRANSIENT_WORKER_ERRORS: ReadonlySet<WorkerErrorKind> = new Set([
  'remote-unavailable',
  'rate-limited',
  'timeout',
]);

export class WorkerError extends Error {
  constructor(
    message: string,
    public readonly kind: WorkerErrorKind,
    public readonly stageId: StageId,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'WorkerError';
  }

  /** Transient failures may succeed on retry */
  get transient(): boolean {
    return TRANSIENT_WORKER_ERRORS.has(this.kind);
  }
}

export class InternalGraphError extends Error {
  public readonly context: Record<string, unknown> | undefined;

  constructor(
    message: string,
    public readonly stageId?: StageId | undefined,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'InternalGraphError';
    this.context = context;
  }
}

export class StageFailedError extends Error {
  constructor(
    message: string,
    public readonly stageId: StageId,
    public readonly retries: number,
    public readonly lastCause: WorkerError
  ) {
    super(message);
    this.name = 'StageFailedError';
  }
}

export interface FailedFormat {
  format: OutputFormat;
  stageId: StageId;
  retries: number;
  cause: WorkerError;
}

export class PartialFormatFailureError extends Error {
  constructor(
    message: string,
    public readonly succeeded: OutputFormat[],
    public readonly failed: FailedFormat[]
  ) {
    super(message);
    this.name = 'PartialFormatFailureError';
  }
}

export class CancelledError extends Error {
  constructor(
    message: string,
    public readonly stageId?: StageId | undefined
  ) {
    super(message);
    this.name = 'CancelledError';
  }
}

export class RunStateError extends Error {
  public readonly attemptedState: string | undefined;

  constructor(
    message: string,
    public readonly currentState: string,
    attemptedState?: string
  ) {
    super(message);
    this.name = 'RunStateError';
    this.attemptedState = attemptedState;
  }
}

export type CollaboratorName = 'analysis' | 'generation' | 'render' | 'storage';

/**
 * Raised by external collaborators. `transient` marks failures worth retrying.
 */
export class CollaboratorError extends Error {
  constructor(
    message: string,
    public readonly collaborator: CollaboratorName,
    public readonly transient: boolean = false,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'CollaboratorError';
  }
}

/**
 * Raised by the managed runtime client
 */
export class RemoteRuntimeError extends Error {
  public readonly status: number | undefined;

  constructor(
    message: string,
    public readonly code: 'network' | 'timeout' | 'rate-limited' | 'http' | 'run-failed' | 'cancelled' | 'bad-response',
    status?: number,
    public readonly transient: boolean = false
  ) {
    super(message);
    this.name = 'RemoteRuntimeError';
    this.status = status;
  }
}

export type FailureKind =
  | 'ConfigError'
  | 'InternalGraphError'
  | 'StageFailed'
  | 'PartialFormatFailure'
  | 'Cancelled';

export type RunError =
  | ConfigError
  | InternalGraphError
  | StageFailedError
  | PartialFormatFailureError
  | CancelledError;
