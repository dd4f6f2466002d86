/**
 * Managed agent runtime client
 *
 * Talks to an Assistants-style agents REST API: agents are registered under
 * /assistants, work is submitted as a thread run and polled until it settles.
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { CancelledError, RemoteRuntimeError } from '../types/error.types.js';
import { createModuleLogger } from '@utils/logger';
import { sleep } from '@utils/async';
import type { Config } from '@utils/config';

const logger = createModuleLogger('agents-client');

export interface RemoteAgent {
  id: string;
  name: string;
  model: string;
}

export interface CreateAgentParams {
  name: string;
  model: string;
  instructions: string;
  metadata?: Record<string, string> | undefined;
}

export interface RunAgentOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Operations the orchestrator needs from the managed runtime
 */
export interface RemoteAgentsClient {
  listAgents(signal?: AbortSignal): Promise<RemoteAgent[]>;
  createAgent(params: CreateAgentParams, signal?: AbortSignal): Promise<RemoteAgent>;
  deleteAgent(agentId: string, signal?: AbortSignal): Promise<void>;
  /** Run an agent on one user message and return its reply text */
  runAgent(agentId: string, message: string, options?: RunAgentOptions): Promise<string>;
  /** Resolves when the runtime answers; rejects with RemoteRuntimeError otherwise */
  checkReachable(signal?: AbortSignal): Promise<void>;
  /** Whether a model deployment with this name exists */
  resolveDeployment(name: string, signal?: AbortSignal): Promise<boolean>;
}

export interface HttpAgentsClientOptions {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  pollIntervalMs: number;
  runTimeoutMs: number;
  requestTimeoutMs?: number | undefined;
  adapter?: AxiosAdapter | undefined;
}

const AgentSchema = z.object({
  id: z.string(),
  name: z.string().nullable(),
  model: z.string(),
});

const AgentListSchema = z.object({
  data: z.array(AgentSchema),
});

const RunSchema = z.object({
  id: z.string(),
  thread_id: z.string(),
  status: z.string(),
  last_error: z
    .object({
      code: z.string(),
      message: z.string(),
    })
    .nullable()
    .optional(),
});

const MessageListSchema = z.object({
  data: z.array(
    z.object({
      role: z.string(),
      content: z.array(
        z.object({
          type: z.string(),
          text: z.object({ value: z.string() }).optional(),
        })
      ),
    })
  ),
});

type Run = z.infer<typeof RunSchema>;

const TERMINAL_RUN_STATUSES = new Set(['completed', 'failed', 'cancelled', 'expired', 'requires_action', 'incomplete']);
const TRANSIENT_RUN_ERROR_CODES = new Set(['server_error', 'rate_limit_exceeded']);

function toRemoteAgent(agent: z.infer<typeof AgentSchema>): RemoteAgent {
  return { id: agent.id, name: agent.name ?? '', model: agent.model };
}

/**
 * Map transport failures onto RemoteRuntimeError with a transient flag
 */
export function toRemoteError(error: unknown, operation: string): RemoteRuntimeError {
  if (error instanceof RemoteRuntimeError) {
    return error;
  }

  if (error instanceof CancelledError || axios.isCancel(error)) {
    return new RemoteRuntimeError(`${operation} cancelled`, 'cancelled');
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new RemoteRuntimeError(`${operation} timed out`, 'timeout', undefined, true);
      }
      return new RemoteRuntimeError(`${operation} failed: ${error.message}`, 'network', undefined, true);
    }
    if (status === 429) {
      return new RemoteRuntimeError(`${operation} rate limited`, 'rate-limited', status, true);
    }
    if (status === 408) {
      return new RemoteRuntimeError(`${operation} timed out`, 'timeout', status, true);
    }
    return new RemoteRuntimeError(`${operation} failed with HTTP ${status}`, 'http', status, status >= 500);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new RemoteRuntimeError(`${operation} returned an unexpected response: ${message}`, 'bad-response');
}

export class HttpAgentsClient implements RemoteAgentsClient {
  private http: AxiosInstance;
  private options: HttpAgentsClientOptions;

  constructor(options: HttpAgentsClientOptions) {
    this.options = options;
    this.http = axios.create({
      baseURL: options.endpoint.replace(/\/+$/, ''),
      timeout: options.requestTimeoutMs ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        'api-key': options.apiKey,
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async listAgents(signal?: AbortSignal): Promise<RemoteAgent[]> {
    try {
      const response = await this.http.get('/assistants', this.requestConfig(signal, { limit: 100 }));
      return AgentListSchema.parse(response.data).data.map(toRemoteAgent);
    } catch (error) {
      throw toRemoteError(error, 'List agents');
    }
  }

  async createAgent(params: CreateAgentParams, signal?: AbortSignal): Promise<RemoteAgent> {
    logger.info({ name: params.name, model: params.model }, 'Creating remote agent');

    try {
      const response = await this.http.post(
        '/assistants',
        {
          name: params.name,
          model: params.model,
          instructions: params.instructions,
          metadata: params.metadata ?? {},
        },
        this.requestConfig(signal)
      );
      return toRemoteAgent(AgentSchema.parse(response.data));
    } catch (error) {
      throw toRemoteError(error, 'Create agent');
    }
  }

  async deleteAgent(agentId: string, signal?: AbortSignal): Promise<void> {
    logger.info({ agentId }, 'Deleting remote agent');

    try {
      await this.http.delete(`/assistants/${encodeURIComponent(agentId)}`, this.requestConfig(signal));
    } catch (error) {
      throw toRemoteError(error, 'Delete agent');
    }
  }

  async runAgent(agentId: string, message: string, options: RunAgentOptions = {}): Promise<string> {
    const { signal } = options;

    try {
      const created = await this.http.post(
        '/threads/runs',
        {
          assistant_id: agentId,
          thread: { messages: [{ role: 'user', content: message }] },
        },
        this.requestConfig(signal)
      );
      const run = await this.pollRun(RunSchema.parse(created.data), signal);

      if (run.status !== 'completed') {
        const code = run.last_error?.code;
        const reason = run.last_error?.message ?? run.status;
        logger.warn({ agentId, runId: run.id, status: run.status, code }, 'Agent run did not complete');

        if (code === 'rate_limit_exceeded') {
          throw new RemoteRuntimeError(`Agent run rate limited: ${reason}`, 'rate-limited', undefined, true);
        }
        throw new RemoteRuntimeError(
          `Agent run ${run.status}: ${reason}`,
          'run-failed',
          undefined,
          code !== undefined && TRANSIENT_RUN_ERROR_CODES.has(code)
        );
      }

      return await this.readReply(run.thread_id, signal);
    } catch (error) {
      throw toRemoteError(error, 'Agent run');
    }
  }

  async checkReachable(signal?: AbortSignal): Promise<void> {
    try {
      await this.http.get('/assistants', this.requestConfig(signal, { limit: 1 }));
    } catch (error) {
      throw toRemoteError(error, 'Reachability check');
    }
  }

  async resolveDeployment(name: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.http.get(`/deployments/${encodeURIComponent(name)}`, this.requestConfig(signal));
      return true;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return false;
      }
      throw toRemoteError(error, 'Deployment lookup');
    }
  }

  /**
   * Per-request config: api-version on every call, plus the caller's abort signal
   */
  private requestConfig(signal: AbortSignal | undefined, params: Record<string, string | number> = {}): AxiosRequestConfig {
    return {
      params: { 'api-version': this.options.apiVersion, ...params },
      ...(signal ? { signal } : {}),
    };
  }

  /**
   * Poll a run until it reaches a terminal status or the run timeout elapses
   */
  private async pollRun(initial: Run, signal: AbortSignal | undefined): Promise<Run> {
    const startTime = Date.now();
    let run = initial;

    while (!TERMINAL_RUN_STATUSES.has(run.status)) {
      if (Date.now() - startTime >= this.options.runTimeoutMs) {
        throw new RemoteRuntimeError(
          `Agent run did not finish within ${this.options.runTimeoutMs}ms`,
          'timeout',
          undefined,
          true
        );
      }

      await sleep(this.options.pollIntervalMs, signal);

      const response = await this.http.get(
        `/threads/${encodeURIComponent(run.thread_id)}/runs/${encodeURIComponent(run.id)}`,
        this.requestConfig(signal)
      );
      run = RunSchema.parse(response.data);
      logger.debug({ runId: run.id, status: run.status }, 'Polled agent run');
    }

    return run;
  }

  /**
   * Read the latest assistant message of a thread
   */
  private async readReply(threadId: string, signal: AbortSignal | undefined): Promise<string> {
    const response = await this.http.get(
      `/threads/${encodeURIComponent(threadId)}/messages`,
      this.requestConfig(signal, { order: 'desc', limit: 20 })
    );
    const messages = MessageListSchema.parse(response.data).data;
    const reply = messages.find((candidate) => candidate.role === 'assistant');

    const text = reply?.content
      .map((part) => part.text?.value ?? '')
      .join('\n')
      .trim();

    if (!text) {
      throw new RemoteRuntimeError('Agent run completed without an assistant reply', 'bad-response');
    }

    return text;
  }
}

/**
 * Build the HTTP client from configuration, when an endpoint and credential are set
 */
export function createAgentsClient(
  config: Pick<Config, 'endpoint' | 'apiKey' | 'apiVersion' | 'runPollIntervalMs' | 'runTimeoutMs'>
): HttpAgentsClient | undefined {
  if (!config.endpoint || !config.apiKey) {
    return undefined;
  }

  return new HttpAgentsClient({
    endpoint: config.endpoint,
    apiKey: config.apiKey,
    apiVersion: config.apiVersion,
    pollIntervalMs: config.runPollIntervalMs,
    runTimeoutMs: config.runTimeoutMs,
  });
}
