/**
 * Worker agent contract and shared behaviour
 *
 * A worker executes one stage kind (analyze, generate or format). Managed and
 * fallback variants share this base so that input validation, error mapping
 * and artifact construction are identical across modes.
 */

import { ZodError } from 'zod';
import type { Logger } from 'pino';
import type { AgentDescriptor, ExecutionMode, WorkerRole } from '../types/agent.types.js';
import type {
  Artifact,
  DocumentType,
  DraftDocumentPayload,
  RenderedOutputPayload,
} from '../types/artifact.types.js';
import {
  CancelledError,
  CollaboratorError,
  RemoteRuntimeError,
  WorkerError,
  type WorkerErrorKind,
} from '../types/error.types.js';
import type { TaskRequest } from '../types/run.types.js';
import type { Stage, StageId, StageInput } from '../types/stage.types.js';
import type { DocumentRenderer, ObjectStore, RendererRegistry } from '../collaborators/types.js';
import type { AgentRegistry } from '@core/agent-registry';
import { createSlug } from '@utils/sanitize';

export type WorkerInput = Artifact | TaskRequest;

/**
 * Everything a worker needs to know about the stage it runs
 */
export interface StageContext {
  runId: string;
  stage: Stage;
  attempt: number;
  request: TaskRequest;
  documentTypes: readonly DocumentType[];
  title: string;
  logger: Logger;
  signal?: AbortSignal | undefined;
}

export interface WorkerAgent {
  readonly role: WorkerRole;
  readonly mode: ExecutionMode;
  execute(input: WorkerInput, context: StageContext): Promise<Artifact>;
}

export function isArtifact(input: WorkerInput): input is Artifact {
  return 'kind' in input;
}

function inputKindOf(input: WorkerInput): StageInput {
  return isArtifact(input) ? input.kind : 'TaskRequest';
}

const REMOTE_ERROR_KINDS: Record<RemoteRuntimeError['code'], WorkerErrorKind | undefined> = {
  'rate-limited': 'rate-limited',
  timeout: 'timeout',
  cancelled: 'cancelled',
  network: 'remote-unavailable',
  http: undefined,
  'run-failed': undefined,
  'bad-response': 'invalid-output',
};

/**
 * Map any failure raised while executing a stage onto a WorkerError
 */
export function toWorkerError(error: unknown, stageId: StageId): WorkerError {
  if (error instanceof WorkerError) {
    return error;
  }

  if (error instanceof CancelledError) {
    return new WorkerError(error.message, 'cancelled', stageId, error);
  }

  if (error instanceof RemoteRuntimeError) {
    const kind = REMOTE_ERROR_KINDS[error.code] ?? (error.transient ? 'remote-unavailable' : 'execution-failed');
    return new WorkerError(error.message, kind, stageId, error);
  }

  if (error instanceof CollaboratorError) {
    return new WorkerError(error.message, error.transient ? 'remote-unavailable' : 'execution-failed', stageId, error);
  }

  if (error instanceof ZodError || error instanceof SyntaxError) {
    return new WorkerError(`Invalid worker output: ${error.message}`, 'invalid-output', stageId, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new WorkerError(message, 'execution-failed', stageId, error);
}

export abstract class BaseWorker<I extends WorkerInput> implements WorkerAgent {
  abstract readonly role: WorkerRole;
  abstract readonly inputKind: StageInput;

  constructor(protected registry: AgentRegistry) {}

  get mode(): ExecutionMode {
    return this.registry.mode;
  }

  /**
   * Validate the input kind, then perform the stage. The input is checked
   * before any agent is resolved or collaborator called.
   */
  async execute(input: WorkerInput, context: StageContext): Promise<Artifact> {
    const stageId = context.stage.id;

    if (!this.accepts(input)) {
      throw new WorkerError(
        `Stage ${stageId} expects ${this.inputKind} input, received ${inputKindOf(input)}`,
        'schema-mismatch',
        stageId
      );
    }

    if (context.signal?.aborted) {
      throw new WorkerError(`Stage ${stageId} cancelled before start`, 'cancelled', stageId);
    }

    try {
      const agent = await this.registry.resolve(this.role, context.signal);
      return await this.perform(input, agent, context);
    } catch (error) {
      const workerError = toWorkerError(error, stageId);
      context.logger.warn(
        { stageId, attempt: context.attempt, kind: workerError.kind, mode: this.mode, error: workerError.message },
        'Worker failed'
      );
      throw workerError;
    }
  }

  protected abstract accepts(input: WorkerInput): input is I;

  protected abstract perform(input: I, agent: AgentDescriptor, context: StageContext): Promise<Artifact>;
}

export interface RenderDependencies {
  renderers: RendererRegistry;
  store?: ObjectStore | undefined;
}

/**
 * Renderer for the format sub-stage in context
 */
export function rendererFor(context: StageContext, renderers: RendererRegistry): DocumentRenderer {
  const format = context.stage.format;
  if (format === undefined) {
    throw new WorkerError(`Stage ${context.stage.id} has no output format`, 'execution-failed', context.stage.id);
  }

  const renderer = renderers.get(format);
  if (!renderer) {
    throw new WorkerError(`No renderer registered for ${format}`, 'execution-failed', context.stage.id);
  }
  return renderer;
}

/**
 * Render a draft and, when the request asks for upload, store the bytes and
 * return a reference instead of inline content
 */
export async function renderOutput(
  draft: DraftDocumentPayload,
  renderer: DocumentRenderer,
  deps: RenderDependencies,
  context: StageContext
): Promise<RenderedOutputPayload> {
  const bytes = await renderer.render(draft, { signal: context.signal });
  const fileName = `${createSlug(draft.title)}${renderer.extension}`;

  const base = { format: renderer.format, mediaType: renderer.mediaType, fileName };

  if (context.request.options.upload && deps.store) {
    const uri = await deps.store.put(`${context.runId}/${fileName}`, bytes, renderer.mediaType);
    return { ...base, content: { type: 'reference', uri, size: bytes.byteLength } };
  }

  return { ...base, content: { type: 'inline', bytes } };
}
