/**
 * Capability probe
 *
 * Decides once per run whether the managed agent runtime can be used.
 * Never throws, never retries and never registers agents.
 */

import type { ExecutionMode } from '../types/agent.types.js';
import { RemoteRuntimeError } from '../types/error.types.js';
import type { RemoteAgentsClient } from '../remote/agents-client.js';
import type { Config } from '@utils/config';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('capability-probe');

export type ProbeReason =
  | 'ok'
  | 'forced-fallback'
  | 'missing-endpoint'
  | 'invalid-endpoint'
  | 'missing-credentials'
  | 'missing-deployment'
  | 'runtime-unreachable'
  | 'deployment-unresolvable'
  | 'probe-error';

export interface ProbeResult {
  mode: ExecutionMode;
  reason: ProbeReason;
  detail?: string | undefined;
}

/**
 * Anything that can decide the execution mode of a run
 */
export interface CapabilityDetector {
  detect(signal?: AbortSignal): Promise<ProbeResult>;
}

export type ProbeConfig = Pick<Config, 'executionMode' | 'endpoint' | 'apiKey' | 'modelDeployment'>;

function fallback(reason: ProbeReason, detail?: string): ProbeResult {
  return detail === undefined ? { mode: 'fallback', reason } : { mode: 'fallback', reason, detail };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export class CapabilityProbe implements CapabilityDetector {
  constructor(
    private config: ProbeConfig,
    private client: RemoteAgentsClient | undefined
  ) {}

  async detect(signal?: AbortSignal): Promise<ProbeResult> {
    let result: ProbeResult;
    try {
      result = await this.check(signal);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      result = fallback('probe-error', detail);
    }

    logger.info({ mode: result.mode, reason: result.reason, detail: result.detail }, 'Execution mode selected');
    return result;
  }

  private async check(signal: AbortSignal | undefined): Promise<ProbeResult> {
    const { executionMode, endpoint, apiKey, modelDeployment } = this.config;

    if (executionMode === 'fallback') {
      return fallback('forced-fallback');
    }
    if (!endpoint) {
      return fallback('missing-endpoint');
    }
    if (!isHttpUrl(endpoint)) {
      return fallback('invalid-endpoint', endpoint);
    }
    if (!apiKey) {
      return fallback('missing-credentials');
    }
    if (!modelDeployment) {
      return fallback('missing-deployment');
    }
    if (!this.client) {
      return fallback('probe-error', 'No runtime client configured');
    }

    try {
      await this.client.checkReachable(signal);
    } catch (error) {
      if (error instanceof RemoteRuntimeError) {
        return fallback('runtime-unreachable', error.message);
      }
      throw error;
    }

    let resolved: boolean;
    try {
      resolved = await this.client.resolveDeployment(modelDeployment, signal);
    } catch (error) {
      if (error instanceof RemoteRuntimeError) {
        return fallback('deployment-unresolvable', error.message);
      }
      throw error;
    }

    if (!resolved) {
      return fallback('deployment-unresolvable', modelDeployment);
    }

    return { mode: 'managed', reason: 'ok' };
  }
}
