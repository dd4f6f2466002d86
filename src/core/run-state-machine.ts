/**
 * Per-run state machine
 */

import type { ExecutionMode } from '../types/agent.types.js';
import { RunStateError } from '../types/error.types.js';
import type { FailureReport, RunContext, RunState } from '../types/run.types.js';
import type { StageId } from '../types/stage.types.js';
import type { RunEventEmitter } from './run-events.js';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('run-state-machine');

/**
 * Valid state transitions of a run
 */
const VALID_TRANSITIONS: Record<RunState, RunState[]> = {
  pending: ['probing', 'cancelled'],
  probing: ['building', 'cancelled'],
  building: ['executing', 'failed', 'cancelled'],
  executing: ['aggregating', 'failed', 'cancelled'],
  aggregating: ['done', 'failed', 'cancelled'],
  done: ['executing'], // Re-render of failed formats
  failed: [],
  cancelled: [],
};

const TERMINAL_STATES: ReadonlySet<RunState> = new Set(['done', 'failed', 'cancelled']);

export class RunStateMachine {
  private context: RunContext;
  private events: RunEventEmitter;

  constructor(runId: string, events: RunEventEmitter) {
    this.context = {
      runId,
      state: 'pending',
      startedAt: new Date(),
    };
    this.events = events;
  }

  getState(): RunState {
    return this.context.state;
  }

  getContext(): RunContext {
    return { ...this.context };
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.context.state);
  }

  canTransition(to: RunState): boolean {
    return VALID_TRANSITIONS[this.context.state].includes(to);
  }

  /**
   * Transition to a new state
   */
  transitionTo(to: RunState): void {
    const from = this.context.state;

    if (!this.canTransition(to)) {
      logger.error(
        { runId: this.context.runId, from, to, validStates: VALID_TRANSITIONS[from] },
        'Invalid state transition'
      );
      throw new RunStateError(`Invalid transition from ${from} to ${to}`, from, to);
    }

    this.context.state = to;

    if (TERMINAL_STATES.has(to)) {
      this.context.completedAt = new Date();
      this.context.currentStage = undefined;
    } else if (to === 'executing') {
      this.context.failure = undefined;
      this.context.completedAt = undefined;
    }

    logger.debug({ runId: this.context.runId, from, to }, 'State transition');

    this.events.emit({
      type: 'run:state',
      timestamp: new Date(),
      payload: { runId: this.context.runId, from, to },
    });
  }

  /**
   * Record the failure and move to `failed`
   */
  fail(failure: FailureReport): void {
    this.context.failure = failure;
    this.transitionTo('failed');
  }

  setMode(mode: ExecutionMode): void {
    this.context.mode = mode;
  }

  setCurrentStage(stageId: StageId | undefined): void {
    this.context.currentStage = stageId;
  }

  /**
   * Record a failure report without leaving the current state (partial outcomes)
   */
  setFailure(failure: FailureReport | undefined): void {
    this.context.failure = failure;
  }
}
