/**
 * Run state and result types
 */

import type { ExecutionMode } from './agent.types.js';
import type {
  AnalysisReportArtifact,
  DraftDocumentArtifact,
  OutputFormat,
  RenderedOutputArtifact,
} from './artifact.types.js';
import type { FailedFormat, FailureKind, RunError } from './error.types.js';
import type { StageId, StageRecord } from './stage.types.js';

export interface TaskOptions {
  documentTypes?: readonly string[] | undefined; // Default: every document type
  title?: string | undefined;
  prompt?: string | undefined;                // Free-form user request
  upload?: boolean | undefined;               // Upload rendered outputs to the object store
}

export interface TaskRequest {
  readonly source: string;                    // Codebase locator
  readonly formats: readonly string[];        // Requested output format tags, unvalidated
  readonly options: Readonly<TaskOptions>;
}

export type RunState =
  | 'pending'
  | 'probing'
  | 'building'
  | 'executing'
  | 'aggregating'
  | 'done'
  | 'failed'
  | 'cancelled';

export interface RunContext {
  runId: string;
  state: RunState;
  mode?: ExecutionMode | undefined;
  currentStage?: StageId | undefined;
  startedAt: Date;
  completedAt?: Date | undefined;
  failure?: FailureReport | undefined;
}

export interface DocumentPackage {
  runId: string;
  mode: ExecutionMode;
  outputs: Partial<Record<OutputFormat, RenderedOutputArtifact>>;
  analysis: AnalysisReportArtifact;
  draft: DraftDocumentArtifact;
}

export interface FailureReport {
  kind: FailureKind;
  message: string;
  stageId: StageId | undefined;
  retries: number;
  error: RunError;
}

export interface PartialFormatFailureReport extends FailureReport {
  kind: 'PartialFormatFailure';
  succeeded: OutputFormat[];
  failed: FailedFormat[];
}

interface OutcomeBase {
  runId: string;
  mode: ExecutionMode | undefined;
  stages: StageRecord[];
}

export type RunOutcome =
  | (OutcomeBase & { status: 'done'; package: DocumentPackage })
  | (OutcomeBase & { status: 'partial'; package: DocumentPackage; failure: PartialFormatFailureReport })
  | (OutcomeBase & { status: 'failed'; failure: FailureReport })
  | (OutcomeBase & { status: 'cancelled'; failure: FailureReport });

export interface RunStatus {
  runId: string;
  state: RunState;
  currentStage: StageId | undefined;
  mode: ExecutionMode | undefined;
  failure?: {
    kind: FailureKind;
    stageId: StageId | undefined;
    retries: number;
  } | undefined;
}

export interface RunOptions {
  signal?: AbortSignal | undefined;
}

export type RunEventType =
  | 'run:state'
  | 'stage:started'
  | 'stage:retry'
  | 'stage:completed'
  | 'stage:failed';

export interface RunStatePayload {
  runId: string;
  from: RunState;
  to: RunState;
}

export interface StagePayload {
  runId: string;
  stageId: StageId;
  attempt: number;
  error?: string | undefined;
}

export type RunEvent =
  | { type: 'run:state'; timestamp: Date; payload: RunStatePayload }
  | { type: Exclude<RunEventType, 'run:state'>; timestamp: Date; payload: StagePayload };
