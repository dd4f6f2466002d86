/**
 * Unit tests for RunStateMachine and RunEventEmitter
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RunEventEmitter } from '@core/run-events';
import { RunStateMachine } from '@core/run-state-machine';
import { InternalGraphError, RunStateError } from '../../src/types/error.types.js';
import type { RunEvent, RunState } from '../../src/types/run.types.js';
import { captureError } from '../setup.js';

const stageEvent = (stageId: 'analyze' | 'generate'): RunEvent => ({
  type: 'stage:started',
  timestamp: new Date(),
  payload: { runId: 'run-1', stageId, attempt: 1 },
});

describe('RunStateMachine', () => {
  let events: RunEventEmitter;
  let machine: RunStateMachine;

  beforeEach(() => {
    events = new RunEventEmitter();
    machine = new RunStateMachine('run-1', events);
  });

  function advance(...states: RunState[]): void {
    for (const state of states) {
      machine.transitionTo(state);
    }
  }

  describe('initialization', () => {
    it('should start pending', () => {
      expect(machine.getState()).toBe('pending');
      expect(machine.isTerminal()).toBe(false);
    });

    it('should record the run id and start time', () => {
      const context = machine.getContext();
      expect(context.runId).toBe('run-1');
      expect(context.startedAt).toBeInstanceOf(Date);
      expect(context.completedAt).toBeUndefined();
    });

    it('should return a copy of the context', () => {
      expect(machine.getContext()).not.toBe(machine.getContext());
      expect(machine.getContext()).toEqual(machine.getContext());
    });
  });

  describe('transitionTo', () => {
    it('should follow the pipeline to done', () => {
      advance('probing', 'building', 'executing', 'aggregating', 'done');

      expect(machine.getState()).toBe('done');
      expect(machine.isTerminal()).toBe(true);
      expect(machine.getContext().completedAt).toBeInstanceOf(Date);
    });

    it('should emit a run:state event per transition', () => {
      const listener = vi.fn();
      events.on('run:state', listener);

      advance('probing', 'building');

      expect(listener).toHaveBeenCalledTimes(2);
      expect(listener.mock.calls[0]?.[0]).toMatchObject({
        type: 'run:state',
        payload: { runId: 'run-1', from: 'pending', to: 'probing' },
      });
      expect(listener.mock.calls[1]?.[0]).toMatchObject({ payload: { from: 'probing', to: 'building' } });
    });

    it('should reject a skipped state', () => {
      const error = captureError(() => machine.transitionTo('done'));

      expect(error).toBeInstanceOf(RunStateError);
      expect(error).toMatchObject({
        message: 'Invalid transition from pending to done',
        currentState: 'pending',
        attemptedState: 'done',
      });
      expect(machine.getState()).toBe('pending');
    });

    it('should allow cancellation from every non-terminal state', () => {
      const paths: RunState[][] = [
        [],
        ['probing'],
        ['probing', 'building'],
        ['probing', 'building', 'executing'],
        ['probing', 'building', 'executing', 'aggregating'],
      ];

      for (const path of paths) {
        machine = new RunStateMachine('run-1', events);
        advance(...path);
        expect(machine.canTransition('cancelled')).toBe(true);
      }
    });

    it('should not leave failed or cancelled', () => {
      advance('cancelled');
      expect(machine.canTransition('executing')).toBe(false);
      expect(machine.canTransition('failed')).toBe(false);
    });

    it('should clear the current stage on terminal states', () => {
      advance('probing', 'building', 'executing');
      machine.setCurrentStage('generate');
      expect(machine.getContext().currentStage).toBe('generate');

      advance('cancelled');
      expect(machine.getContext().currentStage).toBeUndefined();
    });

    it('should reopen a done run for re-execution and clear its failure', () => {
      advance('probing', 'building', 'executing', 'aggregating');
      machine.setFailure({
        kind: 'InternalGraphError',
        message: 'x',
        stageId: undefined,
        retries: 0,
        error: new InternalGraphError('x'),
      });
      advance('done', 'executing');

      const context = machine.getContext();
      expect(context.state).toBe('executing');
      expect(context.failure).toBeUndefined();
      expect(context.completedAt).toBeUndefined();
    });
  });

  describe('fail', () => {
    it('should record the failure and move to failed', () => {
      advance('probing', 'building');
      const error = new InternalGraphError('no producer', 'generate');

      machine.fail({ kind: 'InternalGraphError', message: error.message, stageId: 'generate', retries: 0, error });

      expect(machine.getState()).toBe('failed');
      expect(machine.getContext().failure?.stageId).toBe('generate');
    });
  });

  describe('setMode', () => {
    it('should store the execution mode', () => {
      machine.setMode('fallback');
      expect(machine.getContext().mode).toBe('fallback');
    });
  });
});

describe('RunEventEmitter', () => {
  it('should deliver events only to listeners of that type', () => {
    const events = new RunEventEmitter();
    const started = vi.fn();
    const completed = vi.fn();
    events.on('stage:started', started);
    events.on('stage:completed', completed);

    events.emit(stageEvent('analyze'));

    expect(started).toHaveBeenCalledTimes(1);
    expect(completed).not.toHaveBeenCalled();
  });

  it('should stop delivering after off', () => {
    const events = new RunEventEmitter();
    const listener = vi.fn();
    events.on('stage:started', listener);
    events.off('stage:started', listener);

    events.emit(stageEvent('analyze'));

    expect(listener).not.toHaveBeenCalled();
  });

  it('should keep notifying after a listener throws', () => {
    const events = new RunEventEmitter();
    const after = vi.fn();
    events.on('stage:started', () => {
      throw new Error('listener failed');
    });
    events.on('stage:started', after);

    events.emit(stageEvent('generate'));

    expect(after).toHaveBeenCalledTimes(1);
  });

  it('should tolerate a listener removing itself during emit', () => {
    const events = new RunEventEmitter();
    const second = vi.fn();
    const first = (): void => events.off('stage:started', first);
    events.on('stage:started', first);
    events.on('stage:started', second);

    events.emit(stageEvent('analyze'));

    expect(second).toHaveBeenCalledTimes(1);
  });
});
