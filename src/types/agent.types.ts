/**
 * Agent role types and definitions
 */

// Branded types for compile-time safety
export type AgentId = string & { readonly __brand: 'AgentId' };

export function toAgentId(id: string): AgentId {
  return id as AgentId;
}

export type ExecutionMode = 'managed' | 'fallback';

export type AgentRole =
  | 'orchestrator'
  | 'code-analyzer'
  | 'doc-generator'
  | 'formatter';

/** Roles that execute pipeline stages (the orchestrator role only coordinates) */
export type WorkerRole = Exclude<AgentRole, 'orchestrator'>;

export type Capability = 'analyze' | 'generate' | 'format';

export interface AgentDefinition {
  role: AgentRole;
  name: string;            // Remote agent name, e.g. "CodeAnalyzerAgent"
  capabilities: string[];  // Capability tags advertised by the agent
  instructions: string;
}

/**
 * Resolved agent identity. Immutable once resolved; removed only by teardown.
 */
export interface AgentDescriptor {
  readonly id: AgentId;
  readonly role: AgentRole;
  readonly name: string;
  readonly capabilities: readonly string[];
  readonly mode: ExecutionMode;
  readonly createdAt: Date;
  readonly reused: boolean; // true when an existing remote agent was looked up
}
