/**
 * Stage types
 */

import type { Capability, WorkerRole } from './agent.types.js';
import type { ArtifactKind, OutputFormat } from './artifact.types.js';

export type StageId = 'analyze' | 'generate' | `format:${OutputFormat}`;

export type StageName = 'analyze' | 'generate' | 'format';

/** Input a stage reads: the task request itself, or an artifact kind */
export type StageInput = 'TaskRequest' | ArtifactKind;

export interface Stage {
  id: StageId;
  name: StageName;
  capability: Capability;
  role: WorkerRole;           // Worker that executes this stage
  inputKind: StageInput;
  outputKind: ArtifactKind;
  format?: OutputFormat | undefined; // Set on format fan-out sub-stages only
}

export type StageStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

export interface StageRecord {
  stageId: StageId;
  status: StageStatus;
  attempts: number;
  retries: number;
  error?: Error | undefined;
}

export function formatStageId(format: OutputFormat): StageId {
  return `format:${format}`;
}
