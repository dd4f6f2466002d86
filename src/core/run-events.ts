/**
 * Run event listeners shared by the orchestrator and every run it drives
 */

import type { RunEvent, RunEventType } from '../types/run.types.js';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('run-events');

export type RunEventListener = (event: RunEvent) => void;

export class RunEventEmitter {
  private listeners: Map<RunEventType, RunEventListener[]> = new Map();

  /**
   * Register an event listener
   */
  on(eventType: RunEventType, listener: RunEventListener): void {
    const listeners = this.listeners.get(eventType);
    if (listeners) {
      listeners.push(listener);
    } else {
      this.listeners.set(eventType, [listener]);
    }

    logger.debug({ eventType }, 'Event listener registered');
  }

  /**
   * Unregister an event listener
   */
  off(eventType: RunEventType, listener: RunEventListener): void {
    const listeners = this.listeners.get(eventType);

    if (!listeners) {
      return;
    }

    const index = listeners.indexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
      logger.debug({ eventType }, 'Event listener unregistered');
    }
  }

  /**
   * Emit an event to all registered listeners.
   * A throwing listener is logged and does not stop the others.
   */
  emit(event: RunEvent): void {
    const listeners = this.listeners.get(event.type);

    if (!listeners || listeners.length === 0) {
      return;
    }

    for (const listener of [...listeners]) {
      try {
        listener(event);
      } catch (error) {
        logger.error({ eventType: event.type, error }, 'Error in event listener');
      }
    }
  }
}
