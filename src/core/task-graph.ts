/**
 * Task graph builder
 *
 * Decomposes a request into the ordered stage sequence:
 * analyze → generate → format:<f> (one per distinct requested format)
 */

import { getAgentDefinition, getRoleCapability } from '../agents/agent-config.js';
import type { WorkerRole } from '../types/agent.types.js';
import {
  DOCUMENT_TYPES,
  isOutputFormat,
  type DocumentType,
  type OutputFormat,
} from '../types/artifact.types.js';
import { ConfigError } from '../types/error.types.js';
import type { TaskOptions, TaskRequest } from '../types/run.types.js';
import { formatStageId, type Stage } from '../types/stage.types.js';
import { validatePrompt, validateSourceRef, validateTitle, type ValidationResult } from '@utils/sanitize';

export const DEFAULT_TITLE = 'Documentation Package';

const FORMAT_ALIASES: Record<string, OutputFormat> = {
  md: 'markdown',
};

function stage(role: WorkerRole, fields: Omit<Stage, 'role' | 'capability'>): Stage {
  // Fails loudly if the role has no registered agent definition
  getAgentDefinition(role);
  return { ...fields, role, capability: getRoleCapability(role) };
}

function normalizeTag(tag: string): string {
  const normalized = tag.trim().toLowerCase();
  return FORMAT_ALIASES[normalized] ?? normalized;
}

/**
 * Normalize requested format tags: trim, lower-case, resolve aliases and
 * de-duplicate in first-appearance order
 */
export function normalizeFormats(formats: readonly string[]): OutputFormat[] {
  if (formats.length === 0) {
    throw new ConfigError('At least one output format is required', 'missing-option', { option: 'formats' });
  }

  const unsupported: string[] = [];
  const result: OutputFormat[] = [];

  for (const tag of formats) {
    const normalized = normalizeTag(tag);
    if (!isOutputFormat(normalized)) {
      unsupported.push(tag);
    } else if (!result.includes(normalized)) {
      result.push(normalized);
    }
  }

  if (unsupported.length > 0) {
    throw new ConfigError(
      `Unsupported output format: ${unsupported.map((tag) => JSON.stringify(tag)).join(', ')}`,
      'unsupported-format',
      { unsupported }
    );
  }

  return result;
}

/**
 * Requested document types, defaulting to all of them in canonical order
 */
export function resolveDocumentTypes(options: Readonly<TaskOptions>): DocumentType[] {
  if (options.documentTypes === undefined || options.documentTypes.length === 0) {
    return [...DOCUMENT_TYPES];
  }

  const result: DocumentType[] = [];
  for (const requested of options.documentTypes) {
    const match = DOCUMENT_TYPES.find((type) => type.toLowerCase() === requested.trim().toLowerCase());
    if (match === undefined) {
      throw new ConfigError(`Unknown document type: ${requested}`, 'invalid-option', {
        option: 'documentTypes',
        allowed: DOCUMENT_TYPES,
      });
    }
    if (!result.includes(match)) {
      result.push(match);
    }
  }
  return result;
}

export function resolveTitle(options: Readonly<TaskOptions>): string {
  return options.title?.trim() || DEFAULT_TITLE;
}

function validateRequest(request: TaskRequest): void {
  if (!request.source || !request.source.trim()) {
    throw new ConfigError('A codebase source is required', 'missing-option', { option: 'source' });
  }

  const checks: Array<[string, ValidationResult]> = [['source', validateSourceRef(request.source)]];
  if (request.options.title !== undefined) {
    checks.push(['title', validateTitle(request.options.title)]);
  }
  if (request.options.prompt !== undefined) {
    checks.push(['prompt', validatePrompt(request.options.prompt)]);
  }

  for (const [option, result] of checks) {
    if (!result.valid) {
      throw new ConfigError(result.error ?? `Invalid ${option}`, 'invalid-option', { option });
    }
  }
}

/**
 * Build the ordered stage list for a request. Pure: no worker or collaborator is touched.
 */
export function buildTaskGraph(request: TaskRequest): Stage[] {
  validateRequest(request);
  const formats = normalizeFormats(request.formats);
  resolveDocumentTypes(request.options);

  return [
    stage('code-analyzer', {
      id: 'analyze',
      name: 'analyze',
      inputKind: 'TaskRequest',
      outputKind: 'AnalysisReport',
    }),
    stage('doc-generator', {
      id: 'generate',
      name: 'generate',
      inputKind: 'AnalysisReport',
      outputKind: 'DraftDocument',
    }),
    ...formats.map((format) =>
      stage('formatter', {
        id: formatStageId(format),
        name: 'format',
        inputKind: 'DraftDocument',
        outputKind: 'RenderedOutput',
        format,
      })
    ),
  ];
}
