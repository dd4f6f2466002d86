/**
 * Agent role configurations
 *
 * Defines the 4 agents of the documentation pipeline:
 * - DocOrchestrator: coordinates the other agents
 * - CodeAnalyzerAgent: Analyze stage
 * - DocGeneratorAgent: Generate stage
 * - FormatterAgent: Format stage (one sub-stage per output format)
 */

import type { AgentDefinition, AgentRole, Capability, WorkerRole } from '../types/agent.types.js';
import { generateInstructions } from './agent-instructions.js';

export const AGENT_DEFINITIONS: AgentDefinition[] = [
  {
    role: 'orchestrator',
    name: 'DocOrchestrator',
    capabilities: ['coordinate', 'delegate'],
    instructions: generateInstructions('orchestrator'),
  },
  {
    role: 'code-analyzer',
    name: 'CodeAnalyzerAgent',
    capabilities: ['analyze', 'endpoints', 'auth', 'security'],
    instructions: generateInstructions('code-analyzer'),
  },
  {
    role: 'doc-generator',
    name: 'DocGeneratorAgent',
    capabilities: ['generate', 'brd', 'frd', 'nfrd', 'security', 'architecture'],
    instructions: generateInstructions('doc-generator'),
  },
  {
    role: 'formatter',
    name: 'FormatterAgent',
    capabilities: ['format', 'pdf', 'docx', 'html', 'markdown'],
    instructions: generateInstructions('formatter'),
  },
];

const ROLE_CAPABILITY: Record<WorkerRole, Capability> = {
  'code-analyzer': 'analyze',
  'doc-generator': 'generate',
  formatter: 'format',
};

/**
 * Get the definition for a specific agent role
 */
export function getAgentDefinition(role: AgentRole): AgentDefinition {
  const definition = AGENT_DEFINITIONS.find((candidate) => candidate.role === role);
  if (!definition) {
    throw new Error(`Unknown agent role: ${role}`);
  }
  return definition;
}

/**
 * Pipeline capability a worker role provides
 */
export function getRoleCapability(role: WorkerRole): Capability {
  return ROLE_CAPABILITY[role];
}
