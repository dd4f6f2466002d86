/**
 * Worker factories, one per execution mode
 *
 * The orchestrator picks a factory once per run from the probed mode; stage
 * code never branches on the mode itself. Each factory owns the agent
 * registry its workers resolve agents through.
 */

import type { ExecutionMode, WorkerRole } from '../types/agent.types.js';
import type { CodeAnalyzer, DocumentGenerator, ObjectStore, RendererRegistry } from '../collaborators/types.js';
import type { RemoteAgentsClient } from '../remote/agents-client.js';
import { AgentRegistry, LocalAgentProvisioner, RemoteAgentProvisioner } from '@core/agent-registry';
import { FallbackAnalyzeWorker, FallbackFormatWorker, FallbackGenerateWorker } from './fallback-workers.js';
import { ManagedAnalyzeWorker, ManagedFormatWorker, ManagedGenerateWorker } from './managed-workers.js';
import type { WorkerAgent } from './worker.js';

export interface WorkerFactory {
  readonly mode: ExecutionMode;
  readonly registry: AgentRegistry;
  /** Worker for a role; the same instance for every call */
  create(role: WorkerRole): WorkerAgent;
  /** Register the coordinating agent so the registry carries the full agent set */
  prepare(signal?: AbortSignal): Promise<void>;
}

abstract class CachingWorkerFactory implements WorkerFactory {
  abstract readonly mode: ExecutionMode;
  private workers: Map<WorkerRole, WorkerAgent> = new Map();

  constructor(public readonly registry: AgentRegistry) {}

  create(role: WorkerRole): WorkerAgent {
    let worker = this.workers.get(role);
    if (!worker) {
      worker = this.build(role);
      this.workers.set(role, worker);
    }
    return worker;
  }

  async prepare(signal?: AbortSignal): Promise<void> {
    await this.registry.resolve('orchestrator', signal);
  }

  protected abstract build(role: WorkerRole): WorkerAgent;
}

export interface ManagedWorkerOptions {
  client: RemoteAgentsClient;
  modelDeployment: string;
  renderers: RendererRegistry;
  store?: ObjectStore | undefined;
}

export class ManagedWorkerFactory extends CachingWorkerFactory {
  override readonly mode = 'managed';

  constructor(private options: ManagedWorkerOptions) {
    super(new AgentRegistry(new RemoteAgentProvisioner(options.client, options.modelDeployment)));
  }

  protected override build(role: WorkerRole): WorkerAgent {
    const { client, renderers, store } = this.options;
    switch (role) {
      case 'code-analyzer':
        return new ManagedAnalyzeWorker(this.registry, client);
      case 'doc-generator':
        return new ManagedGenerateWorker(this.registry, client);
      case 'formatter':
        return new ManagedFormatWorker(this.registry, { renderers, store }, client);
    }
  }
}

export interface FallbackWorkerOptions {
  analyzer: CodeAnalyzer;
  generator: DocumentGenerator;
  renderers: RendererRegistry;
  store?: ObjectStore | undefined;
}

export class FallbackWorkerFactory extends CachingWorkerFactory {
  override readonly mode = 'fallback';

  constructor(private options: FallbackWorkerOptions) {
    super(new AgentRegistry(new LocalAgentProvisioner()));
  }

  protected override build(role: WorkerRole): WorkerAgent {
    const { analyzer, generator, renderers, store } = this.options;
    switch (role) {
      case 'code-analyzer':
        return new FallbackAnalyzeWorker(this.registry, analyzer);
      case 'doc-generator':
        return new FallbackGenerateWorker(this.registry, generator);
      case 'formatter':
        return new FallbackFormatWorker(this.registry, { renderers, store });
    }
  }
}
