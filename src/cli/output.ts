/**
 * Console output for the CLI
 */

import type { AgentDescriptor } from '../types/agent.types.js';
import { OUTPUT_FORMATS } from '../types/artifact.types.js';
import type { DocumentPackage, RunEvent, RunOutcome } from '../types/run.types.js';
import type { ProbeResult } from '@core/capability-probe';

const RULE_WIDTH = 72;

export function displayBanner(version: string): void {
  console.log('='.repeat(RULE_WIDTH));
  console.log(`DOCWEAVE v${version}`);
  console.log('Multi-agent documentation pipeline');
  console.log('='.repeat(RULE_WIDTH));
}

export function displayInfo(message: string): void {
  console.log(`ℹ️  ${message}`);
}

export function displayError(title: string, detail?: string): void {
  console.error('\n' + '!'.repeat(RULE_WIDTH));
  console.error(`ERROR: ${title}`);
  if (detail) {
    console.error(detail);
  }
  console.error('!'.repeat(RULE_WIDTH) + '\n');
}

export function displayProbe(result: ProbeResult): void {
  const detail = result.detail ? ` (${result.detail})` : '';
  console.log(`Execution mode: ${result.mode} [${result.reason}]${detail}`);
}

/**
 * One line per run event, for progress while a run is executing
 */
export function formatEvent(event: RunEvent): string {
  if (event.type === 'run:state') {
    return `  ${event.payload.from} → ${event.payload.to}`;
  }

  const { stageId, attempt, error } = event.payload;
  switch (event.type) {
    case 'stage:started':
      return `  ▶ ${stageId} (attempt ${attempt})`;
    case 'stage:retry':
      return `  ↻ ${stageId} retrying after attempt ${attempt}: ${error ?? 'transient failure'}`;
    case 'stage:completed':
      return `  ✓ ${stageId}`;
    case 'stage:failed':
      return `  ✗ ${stageId}: ${error ?? 'failed'}`;
  }
}

function describeOutputs(documentPackage: DocumentPackage, written: ReadonlyMap<string, string>): string[] {
  return OUTPUT_FORMATS.flatMap((key) => {
    const output = documentPackage.outputs[key];
    if (!output) {
      return [];
    }
    const { content, fileName, format } = output.payload;
    const location = content.type === 'reference' ? content.uri : written.get(format) ?? '(in memory)';
    const size = content.type === 'reference' ? content.size : content.bytes.byteLength;
    return [`  ${format.padEnd(9)} ${fileName.padEnd(32)} ${String(size).padStart(9)} bytes  ${location}`];
  });
}

/**
 * Summary of a finished run. `written` maps format → local file URI.
 */
export function displayOutcome(outcome: RunOutcome, written: ReadonlyMap<string, string> = new Map()): void {
  console.log('\n' + '='.repeat(RULE_WIDTH));
  console.log(`RUN ${outcome.runId}: ${outcome.status.toUpperCase()} (mode: ${outcome.mode ?? 'n/a'})`);
  console.log('='.repeat(RULE_WIDTH));

  for (const stage of outcome.stages) {
    const retries = stage.retries > 0 ? `, ${stage.retries} retries` : '';
    console.log(`  ${stage.stageId.padEnd(16)} ${stage.status.padEnd(10)} ${stage.attempts} attempts${retries}`);
  }

  if (outcome.status === 'done' || outcome.status === 'partial') {
    console.log('\nOutputs:');
    for (const line of describeOutputs(outcome.package, written)) {
      console.log(line);
    }
  }

  if (outcome.status !== 'done') {
    console.log(`\n${outcome.failure.kind}: ${outcome.failure.message}`);
  }

  console.log('='.repeat(RULE_WIDTH) + '\n');
}

export function displayAgents(agents: AgentDescriptor[]): void {
  if (agents.length === 0) {
    console.log('No agents registered.');
    return;
  }

  console.log('Agents used by this run:');
  for (const agent of agents) {
    const reused = agent.reused ? ' (reused)' : '';
    console.log(`  ${agent.id}  ${agent.name.padEnd(20)} ${agent.role.padEnd(14)} ${agent.mode}${reused}`);
  }
}

export function displayRemoteAgents(agents: Array<{ id: string; name: string; model: string }>): void {
  if (agents.length === 0) {
    console.log('No remote agents.');
    return;
  }

  for (const agent of agents) {
    console.log(`  ${agent.id}  ${agent.name.padEnd(20)} ${agent.model}`);
  }
}
