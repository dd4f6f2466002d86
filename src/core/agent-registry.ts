/**
 * Agent registry
 *
 * Resolves each agent role once and caches its descriptor. Concurrent
 * resolutions of the same role share a single provisioning request. Remote
 * agents that already exist under the role's name are reused, not recreated.
 */

import { randomUUID } from 'node:crypto';
import { getAgentDefinition } from '../agents/agent-config.js';
import type {
  AgentDefinition,
  AgentDescriptor,
  AgentId,
  AgentRole,
  ExecutionMode,
} from '../types/agent.types.js';
import { toAgentId } from '../types/agent.types.js';
import type { RemoteAgentsClient } from '../remote/agents-client.js';
import { createAgentLogger, createModuleLogger } from '@utils/logger';
import { abortable } from '@utils/async';

const logger = createModuleLogger('agent-registry');

export interface ProvisionedAgent {
  id: string;
  reused: boolean;
}

/**
 * Creates and releases agents in one execution mode
 */
export interface AgentProvisioner {
  readonly mode: ExecutionMode;
  provision(definition: AgentDefinition): Promise<ProvisionedAgent>;
  release(agentId: AgentId): Promise<void>;
}

/**
 * Registers agents with the managed runtime, reusing agents found by name
 */
export class RemoteAgentProvisioner implements AgentProvisioner {
  readonly mode = 'managed';

  constructor(
    private client: RemoteAgentsClient,
    private model: string
  ) {}

  async provision(definition: AgentDefinition): Promise<ProvisionedAgent> {
    const existing = (await this.client.listAgents()).find((agent) => agent.name === definition.name);
    if (existing) {
      return { id: existing.id, reused: true };
    }

    const created = await this.client.createAgent({
      name: definition.name,
      model: this.model,
      instructions: definition.instructions,
      metadata: { role: definition.role, capabilities: definition.capabilities.join(',') },
    });
    return { id: created.id, reused: false };
  }

  async release(agentId: AgentId): Promise<void> {
    await this.client.deleteAgent(agentId);
  }
}

/**
 * In-process identities for the direct-call workers
 */
export class LocalAgentProvisioner implements AgentProvisioner {
  readonly mode = 'fallback';

  async provision(definition: AgentDefinition): Promise<ProvisionedAgent> {
    return { id: `local-${definition.role}-${randomUUID()}`, reused: false };
  }

  async release(agentId: AgentId): Promise<void> {
    createAgentLogger(agentId).debug('Released local agent');
  }
}

export class AgentRegistry {
  private descriptors: Map<AgentRole, AgentDescriptor> = new Map();
  private pending: Map<AgentRole, Promise<AgentDescriptor>> = new Map();

  constructor(private provisioner: AgentProvisioner) {}

  get mode(): ExecutionMode {
    return this.provisioner.mode;
  }

  /**
   * Resolve the agent for a role, provisioning it on first use.
   * An abort only stops this caller from waiting; the shared request continues.
   */
  resolve(role: AgentRole, signal?: AbortSignal): Promise<AgentDescriptor> {
    const cached = this.descriptors.get(role);
    if (cached) {
      return Promise.resolve(cached);
    }

    let pending = this.pending.get(role);
    if (!pending) {
      pending = this.provision(role);
      this.pending.set(role, pending);
    }

    return abortable(pending, signal);
  }

  list(): AgentDescriptor[] {
    return [...this.descriptors.values()];
  }

  has(agentId: string): boolean {
    return this.list().some((descriptor) => descriptor.id === agentId);
  }

  /**
   * Release one agent and forget it. Returns false when the id is not registered here.
   */
  async teardown(agentId: string): Promise<boolean> {
    const descriptor = this.list().find((candidate) => candidate.id === agentId);
    if (!descriptor) {
      return false;
    }

    await this.provisioner.release(descriptor.id);
    this.descriptors.delete(descriptor.role);
    logger.info({ agentId, role: descriptor.role, mode: this.mode }, 'Agent torn down');
    return true;
  }

  /**
   * Release every registered agent. Failures are reported after all releases were attempted.
   */
  async teardownAll(): Promise<void> {
    const results = await Promise.allSettled(this.list().map((descriptor) => this.teardown(descriptor.id)));
    const failures = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');

    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((failure) => failure.reason),
        `Failed to tear down ${failures.length} agent(s)`
      );
    }
  }

  private async provision(role: AgentRole): Promise<AgentDescriptor> {
    const definition = getAgentDefinition(role);

    try {
      const provisioned = await this.provisioner.provision(definition);
      const descriptor: AgentDescriptor = Object.freeze({
        id: toAgentId(provisioned.id),
        role,
        name: definition.name,
        capabilities: Object.freeze([...definition.capabilities]),
        mode: this.mode,
        createdAt: new Date(),
        reused: provisioned.reused,
      });

      this.descriptors.set(role, descriptor);
      createAgentLogger(descriptor.id).info(
        { role, name: descriptor.name, mode: this.mode, reused: descriptor.reused },
        'Agent resolved'
      );
      return descriptor;
    } finally {
      this.pending.delete(role);
    }
  }
}
