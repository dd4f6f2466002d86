/**
 * Main orchestration engine
 * Drives a request through analyze → generate → format fan-out
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { AgentDescriptor, ExecutionMode } from '../types/agent.types.js';
import type { Artifact, DocumentType, OutputFormat } from '../types/artifact.types.js';
import {
  CancelledError,
  ConfigError,
  InternalGraphError,
  PartialFormatFailureError,
  RunStateError,
  StageFailedError,
  WorkerError,
  type FailedFormat,
  type FailureKind,
  type RunError,
} from '../types/error.types.js';
import type {
  FailureReport,
  PartialFormatFailureReport,
  RunEventType,
  RunOptions,
  RunOutcome,
  RunStatus,
  TaskRequest,
} from '../types/run.types.js';
import type { Stage, StageId, StageRecord } from '../types/stage.types.js';
import type { StageContext } from '../workers/worker.js';
import { toWorkerError } from '../workers/worker.js';
import type { WorkerFactory } from '../workers/worker-factory.js';
import type { AgentRegistry } from './agent-registry.js';
import { ArtifactStore } from './artifact-store.js';
import type { CapabilityDetector, ProbeResult } from './capability-probe.js';
import { aggregate } from './result-aggregator.js';
import { DEFAULT_RETRY_POLICY, executeWithRetry, type RetryPolicy } from './retry.js';
import { RunEventEmitter, type RunEventListener } from './run-events.js';
import { RunStateMachine } from './run-state-machine.js';
import { buildTaskGraph, resolveDocumentTypes, resolveTitle } from './task-graph.js';
import { createModuleLogger, createRunLogger } from '@utils/logger';
import { mapWithConcurrency } from '@utils/async';

const logger = createModuleLogger('orchestrator');

export interface OrchestratorConfig {
  probe: CapabilityDetector;
  factories: {
    fallback: WorkerFactory;
    managed?: WorkerFactory | undefined;
  };
  retry?: Partial<RetryPolicy> | undefined;
  maxConcurrentFormats?: number | undefined;  // Format sub-stages in flight (default: 2)
}

interface RunRecord {
  runId: string;
  request: TaskRequest;
  machine: RunStateMachine;
  store: ArtifactStore;
  logger: Logger;
  stages: Stage[];
  records: Map<StageId, StageRecord>;
  factory: WorkerFactory | undefined;
  documentTypes: DocumentType[];
  title: string;
  outcome: RunOutcome | undefined;
  active: boolean;
}

type StageEventType = Exclude<RunEventType, 'run:state'>;

function failureKindOf(error: RunError): FailureKind {
  if (error instanceof ConfigError) {
    return 'ConfigError';
  }
  if (error instanceof StageFailedError) {
    return 'StageFailed';
  }
  if (error instanceof PartialFormatFailureError) {
    return 'PartialFormatFailure';
  }
  if (error instanceof CancelledError) {
    return 'Cancelled';
  }
  return 'InternalGraphError';
}

function toRunError(error: unknown): RunError {
  if (
    error instanceof ConfigError ||
    error instanceof InternalGraphError ||
    error instanceof StageFailedError ||
    error instanceof PartialFormatFailureError ||
    error instanceof CancelledError
  ) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalGraphError(`Unexpected orchestration error: ${message}`, undefined, { cause: message });
}

function freezeRequest(request: TaskRequest): TaskRequest {
  const { documentTypes, ...options } = request.options;
  return Object.freeze({
    source: request.source,
    formats: Object.freeze([...request.formats]),
    options: Object.freeze({
      ...options,
      ...(documentTypes ? { documentTypes: Object.freeze([...documentTypes]) } : {}),
    }),
  });
}

function isFormatStage(stage: Stage): stage is Stage & { format: OutputFormat } {
  return stage.format !== undefined;
}

/**
 * Coordinates runs: probes the environment, builds the stage graph, drives
 * each stage through the worker of the selected mode and assembles the package
 */
export class Orchestrator {
  private probe: CapabilityDetector;
  private factories: OrchestratorConfig['factories'];
  private retryPolicy: RetryPolicy;
  private maxConcurrentFormats: number;
  private events = new RunEventEmitter();
  private runs: Map<string, RunRecord> = new Map();

  constructor(config: OrchestratorConfig) {
    this.probe = config.probe;
    this.factories = config.factories;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...config.retry };
    this.maxConcurrentFormats = Math.max(1, config.maxConcurrentFormats ?? 2);

    logger.info(
      {
        retry: this.retryPolicy,
        maxConcurrentFormats: this.maxConcurrentFormats,
        managedAvailable: this.factories.managed !== undefined,
      },
      'Orchestrator initialized'
    );
  }

  /**
   * Run a request to completion. Resolves with the outcome; pipeline failures
   * never reject.
   */
  async run(request: TaskRequest, options: RunOptions = {}): Promise<RunOutcome> {
    const runId = randomUUID();
    const record: RunRecord = {
      runId,
      request: freezeRequest(request),
      machine: new RunStateMachine(runId, this.events),
      store: new ArtifactStore(runId),
      logger: createRunLogger(logger, runId),
      stages: [],
      records: new Map(),
      factory: undefined,
      documentTypes: [],
      title: '',
      outcome: undefined,
      active: false,
    };
    this.runs.set(runId, record);

    record.logger.info({ source: request.source, formats: request.formats }, 'Run started');
    return this.drive(record, options.signal, (signal) => this.pipeline(record, signal));
  }

  /**
   * Re-render only the failed formats of a partial run from its stored draft.
   * Generate is not re-run.
   */
  async retryFailedFormats(runId: string, options: RunOptions = {}): Promise<RunOutcome> {
    const record = this.runs.get(runId);
    if (!record) {
      throw new RunStateError(`Unknown run: ${runId}`, 'unknown');
    }
    if (record.active || record.outcome?.status !== 'partial') {
      throw new RunStateError(
        `Run ${runId} has no failed formats to retry`,
        record.machine.getState(),
        'executing'
      );
    }

    if (options.signal?.aborted) {
      // Reopen the run so cancellation settles it and discards its artifacts
      record.machine.transitionTo('executing');
      return this.cancel(record);
    }

    const failedStages = record.stages.filter(
      (stage) => isFormatStage(stage) && record.records.get(stage.id)?.status === 'failed'
    );
    record.logger.info({ stages: failedStages.map((stage) => stage.id) }, 'Retrying failed formats');

    return this.drive(record, options.signal, async (signal) => {
      try {
        record.machine.transitionTo('executing');
        return await this.fanOut(record, failedStages, signal);
      } catch (error) {
        return this.settleError(record, error, signal);
      }
    });
  }

  getRunStatus(runId: string): RunStatus | undefined {
    const record = this.runs.get(runId);
    if (!record) {
      return undefined;
    }

    const context = record.machine.getContext();
    return {
      runId,
      state: context.state,
      currentStage: context.currentStage,
      mode: context.mode,
      ...(context.failure
        ? {
            failure: {
              kind: context.failure.kind,
              stageId: context.failure.stageId,
              retries: context.failure.retries,
            },
          }
        : {}),
    };
  }

  on(eventType: RunEventType, listener: RunEventListener): void {
    this.events.on(eventType, listener);
  }

  off(eventType: RunEventType, listener: RunEventListener): void {
    this.events.off(eventType, listener);
  }

  listAgents(): AgentDescriptor[] {
    return this.registries().flatMap((registry) => registry.list());
  }

  /**
   * Release one agent. Returns false when no registry knows the id.
   */
  async teardownAgent(agentId: string): Promise<boolean> {
    const registry = this.registries().find((candidate) => candidate.has(agentId));
    if (!registry) {
      return false;
    }
    return registry.teardown(agentId);
  }

  async teardownAll(): Promise<void> {
    await Promise.all(this.registries().map((registry) => registry.teardownAll()));
  }

  private registries(): AgentRegistry[] {
    const factories = [this.factories.managed, this.factories.fallback];
    return factories.filter((factory): factory is WorkerFactory => factory !== undefined).map((f) => f.registry);
  }

  /**
   * Run `body` for a record, resolving `cancelled` as soon as the signal aborts
   * without waiting for workers that ignore it
   */
  private async drive(
    record: RunRecord,
    signal: AbortSignal | undefined,
    body: (signal: AbortSignal | undefined) => Promise<RunOutcome>
  ): Promise<RunOutcome> {
    if (signal?.aborted) {
      return this.cancel(record);
    }

    record.active = true;
    let onAbort: (() => void) | undefined;
    const cancelled = new Promise<RunOutcome>((resolve) => {
      onAbort = () => resolve(this.cancel(record));
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([body(signal), cancelled]);
    } finally {
      record.active = false;
      if (onAbort) {
        signal?.removeEventListener('abort', onAbort);
      }
    }
  }

  private async pipeline(record: RunRecord, signal: AbortSignal | undefined): Promise<RunOutcome> {
    const { machine } = record;

    try {
      machine.transitionTo('probing');
      const probe = await this.detect(signal);
      record.factory = this.selectFactory(probe, record.logger);
      machine.setMode(record.factory.mode);
      await this.registerCoordinator(record.factory, record.logger, signal);
      if (signal?.aborted) {
        throw new CancelledError('Run cancelled after probing');
      }

      machine.transitionTo('building');
      record.stages = buildTaskGraph(record.request);
      record.documentTypes = resolveDocumentTypes(record.request.options);
      record.title = resolveTitle(record.request.options);
      for (const stage of record.stages) {
        record.records.set(stage.id, { stageId: stage.id, status: 'pending', attempts: 0, retries: 0 });
      }
      record.logger.info({ stages: record.stages.map((stage) => stage.id) }, 'Task graph built');

      machine.transitionTo('executing');
      for (const stage of record.stages.filter((candidate) => !isFormatStage(candidate))) {
        await this.runStage(record, stage, signal);
      }

      return await this.fanOut(record, record.stages.filter(isFormatStage), signal);
    } catch (error) {
      return this.settleError(record, error, signal);
    }
  }

  private async detect(signal: AbortSignal | undefined): Promise<ProbeResult> {
    try {
      return await this.probe.detect(signal);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return { mode: 'fallback', reason: 'probe-error', detail };
    }
  }

  private selectFactory(probe: ProbeResult, runLogger: Logger): WorkerFactory {
    if (probe.mode === 'managed') {
      if (this.factories.managed) {
        return this.factories.managed;
      }
      runLogger.warn('Managed runtime detected but no managed workers configured, using fallback');
    }
    return this.factories.fallback;
  }

  /**
   * Resolve the coordinating agent for the selected mode. Stages do not depend
   * on it, so a provisioning failure is logged and the run continues.
   */
  private async registerCoordinator(
    factory: WorkerFactory,
    runLogger: Logger,
    signal: AbortSignal | undefined
  ): Promise<void> {
    try {
      await factory.prepare(signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError('Run cancelled while registering agents');
      }
      const message = error instanceof Error ? error.message : String(error);
      runLogger.warn({ mode: factory.mode, error: message }, 'Coordinator agent not registered');
    }
  }

  /**
   * Run format sub-stages concurrently, then aggregate whatever rendered
   */
  private async fanOut(record: RunRecord, stages: Stage[], signal: AbortSignal | undefined): Promise<RunOutcome> {
    const results = await mapWithConcurrency(stages, this.maxConcurrentFormats, (stage) =>
      this.runStage(record, stage, signal)
    );

    if (signal?.aborted) {
      throw new CancelledError('Run cancelled during format fan-out');
    }

    const failed: FailedFormat[] = [];
    results.forEach((result, index) => {
      const stage = stages[index];
      if (result.status === 'fulfilled' || !stage) {
        return;
      }
      if (!(result.reason instanceof StageFailedError) || !isFormatStage(stage)) {
        throw result.reason;
      }
      failed.push({
        format: stage.format,
        stageId: stage.id,
        retries: result.reason.retries,
        cause: result.reason.lastCause,
      });
    });

    const succeeded = record.stages
      .filter(isFormatStage)
      .filter((stage) => record.records.get(stage.id)?.status === 'succeeded')
      .map((stage) => stage.format);

    const firstFailure = failed[0];
    if (succeeded.length === 0 && firstFailure) {
      // Nothing rendered: a package without outputs is a failed run
      throw new StageFailedError(
        `Every output format failed; first: ${firstFailure.cause.message}`,
        firstFailure.stageId,
        firstFailure.retries,
        firstFailure.cause
      );
    }

    return this.finish(record, succeeded, failed);
  }

  private finish(record: RunRecord, succeeded: OutputFormat[], failed: FailedFormat[]): RunOutcome {
    const { machine } = record;
    const mode = this.modeOf(record);

    machine.setCurrentStage(undefined);
    machine.transitionTo('aggregating');
    const documentPackage = aggregate(record.runId, record.store.list(), mode);

    const firstFailure = failed[0];
    let outcome: RunOutcome;
    if (firstFailure) {
      const message = `${failed.length} of ${succeeded.length + failed.length} output formats failed: ${failed
        .map((entry) => entry.format)
        .join(', ')}`;
      const failure: PartialFormatFailureReport = {
        kind: 'PartialFormatFailure',
        message,
        stageId: firstFailure.stageId,
        retries: firstFailure.retries,
        error: new PartialFormatFailureError(message, succeeded, failed),
        succeeded,
        failed,
      };
      machine.setFailure(failure);
      machine.transitionTo('done');
      outcome = { status: 'partial', runId: record.runId, mode, stages: this.snapshot(record), package: documentPackage, failure };
      record.logger.warn({ succeeded, failed: failed.map((entry) => entry.format) }, 'Run finished with failed formats');
    } else {
      machine.setFailure(undefined);
      machine.transitionTo('done');
      outcome = { status: 'done', runId: record.runId, mode, stages: this.snapshot(record), package: documentPackage };
      record.logger.info({ formats: succeeded }, 'Run complete');
    }

    record.outcome = outcome;
    return outcome;
  }

  /**
   * Execute one stage with bounded retries and store its artifact
   */
  private async runStage(record: RunRecord, stage: Stage, signal: AbortSignal | undefined): Promise<Artifact> {
    const input = this.resolveInput(record, stage);
    const stageRecord = record.records.get(stage.id);
    if (!stageRecord || !record.factory) {
      throw new InternalGraphError(`Stage ${stage.id} is not part of run ${record.runId}`, stage.id);
    }
    const worker = record.factory.create(stage.role);

    stageRecord.status = 'running';
    stageRecord.error = undefined;
    record.machine.setCurrentStage(stage.id);

    let artifact: Artifact;
    try {
      artifact = await executeWithRetry(
        async () => {
          stageRecord.attempts += 1;
          this.emitStage('stage:started', record, stage.id, stageRecord.attempts);
          return worker.execute(input, this.stageContext(record, stage, stageRecord.attempts, signal));
        },
        this.retryPolicy,
        {
          signal,
          shouldRetry: (error) => error instanceof WorkerError && error.transient && !signal?.aborted,
          onRetry: (error, retry, delayMs) => {
            stageRecord.retries += 1;
            const message = error instanceof Error ? error.message : String(error);
            record.logger.warn({ stageId: stage.id, retry, delayMs, error: message }, 'Retrying stage');
            this.emitStage('stage:retry', record, stage.id, stageRecord.attempts, message);
          },
        }
      );
    } catch (error) {
      const cause = toWorkerError(error, stage.id);
      stageRecord.status = 'failed';
      stageRecord.error = cause;

      if (cause.kind === 'cancelled' || signal?.aborted) {
        throw new CancelledError(`Stage ${stage.id} cancelled`, stage.id);
      }

      record.logger.error(
        { stageId: stage.id, kind: cause.kind, attempts: stageRecord.attempts, retries: stageRecord.retries },
        'Stage failed'
      );
      this.emitStage('stage:failed', record, stage.id, stageRecord.attempts, cause.message);
      throw new StageFailedError(
        `Stage ${stage.id} failed after ${stageRecord.attempts} attempt(s): ${cause.message}`,
        stage.id,
        stageRecord.retries,
        cause
      );
    }

    const stored = record.store.put(artifact);
    stageRecord.status = 'succeeded';
    this.emitStage('stage:completed', record, stage.id, stageRecord.attempts);
    return stored;
  }

  private resolveInput(record: RunRecord, stage: Stage): TaskRequest | Artifact {
    if (stage.inputKind === 'TaskRequest') {
      return record.request;
    }

    const input = record.store.latest(stage.inputKind);
    if (!input) {
      throw new InternalGraphError(
        `Stage ${stage.id} requires a ${stage.inputKind} artifact but none exists`,
        stage.id,
        { runId: record.runId }
      );
    }
    return input;
  }

  private stageContext(
    record: RunRecord,
    stage: Stage,
    attempt: number,
    signal: AbortSignal | undefined
  ): StageContext {
    return {
      runId: record.runId,
      stage,
      attempt,
      request: record.request,
      documentTypes: record.documentTypes,
      title: record.title,
      logger: record.logger.child({ stageId: stage.id, attempt }),
      signal,
    };
  }

  private settleError(record: RunRecord, error: unknown, signal: AbortSignal | undefined): RunOutcome {
    const { machine } = record;

    // Cancellation already settled the run; late failures are noise
    if (machine.getState() === 'cancelled' && record.outcome) {
      return record.outcome;
    }
    if (error instanceof CancelledError || signal?.aborted) {
      return this.cancel(record);
    }

    const runError = toRunError(error);
    const stageId = runError instanceof StageFailedError ? runError.stageId : machine.getContext().currentStage;
    const failure: FailureReport = {
      kind: failureKindOf(runError),
      message: runError.message,
      stageId,
      retries: runError instanceof StageFailedError ? runError.retries : 0,
      error: runError,
    };

    record.logger.error({ kind: failure.kind, stageId, error: runError.message }, 'Run failed');

    if (machine.canTransition('failed')) {
      machine.fail(failure);
    } else {
      machine.setFailure(failure);
    }
    this.skipPending(record);

    const outcome: RunOutcome = {
      status: 'failed',
      runId: record.runId,
      mode: machine.getContext().mode,
      stages: this.snapshot(record),
      failure,
    };
    record.outcome = outcome;
    return outcome;
  }

  /**
   * Settle the run as cancelled and discard its artifacts. Idempotent.
   */
  private cancel(record: RunRecord): RunOutcome {
    const { machine } = record;
    if (machine.isTerminal() && record.outcome) {
      return record.outcome;
    }

    const stageId = machine.getContext().currentStage;
    const error = new CancelledError('Run cancelled', stageId);
    const failure: FailureReport = {
      kind: 'Cancelled',
      message: error.message,
      stageId,
      retries: stageId ? record.records.get(stageId)?.retries ?? 0 : 0,
      error,
    };

    machine.setFailure(failure);
    machine.transitionTo('cancelled');
    const discarded = record.store.size;
    record.store.discard();
    this.skipPending(record);
    record.logger.warn({ stageId, discarded }, 'Run cancelled');

    const outcome: RunOutcome = {
      status: 'cancelled',
      runId: record.runId,
      mode: machine.getContext().mode,
      stages: this.snapshot(record),
      failure,
    };
    record.outcome = outcome;
    return outcome;
  }

  private skipPending(record: RunRecord): void {
    for (const stageRecord of record.records.values()) {
      if (stageRecord.status === 'pending') {
        stageRecord.status = 'skipped';
      }
    }
  }

  private snapshot(record: RunRecord): StageRecord[] {
    return [...record.records.values()].map((stageRecord) => ({ ...stageRecord }));
  }

  private modeOf(record: RunRecord): ExecutionMode {
    const mode = record.machine.getContext().mode;
    if (!mode) {
      throw new InternalGraphError(`Run ${record.runId} has no execution mode`);
    }
    return mode;
  }

  private emitStage(type: StageEventType, record: RunRecord, stageId: StageId, attempt: number, error?: string): void {
    this.events.emit({
      type,
      timestamp: new Date(),
      payload: { runId: record.runId, stageId, attempt, ...(error !== undefined ? { error } : {}) },
    });
  }
}
