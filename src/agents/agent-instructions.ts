/**
 * Agent instruction templates
 *
 * System instructions registered with each remote agent, and the per-task
 * messages the managed workers send. Each task message states:
 * - The input the agent receives
 * - The exact output shape expected back
 */

import type { AgentRole } from '../types/agent.types.js';
import type {
  AnalysisReportPayload,
  DocumentType,
  DraftDocumentPayload,
} from '../types/artifact.types.js';
import { draftBody } from '@utils/markdown-parser';

const DOCUMENT_TYPE_TITLES: Record<DocumentType, string> = {
  BRD: 'Business Requirements Document',
  FRD: 'Functional Requirements Document',
  NFRD: 'Non-Functional Requirements Document',
  Security: 'Security & Compliance Document',
  Architecture: 'Architecture Overview',
};

export function documentTypeTitle(documentType: DocumentType): string {
  return DOCUMENT_TYPE_TITLES[documentType];
}

const ROLE_INSTRUCTIONS: Record<AgentRole, string> = {
  orchestrator: `You are the Documentation Orchestrator.

Decompose documentation requests into Analyze, Generate and Format subtasks and
delegate them to CodeAnalyzerAgent, DocGeneratorAgent and FormatterAgent.
Ensure traceability between the analysis and every generated document.`,

  'code-analyzer': `You are a code and system analysis engineer.

Extract architecture, API endpoints, authentication mechanisms and security risks
from a codebase. Always answer with a single JSON object and nothing else.`,

  'doc-generator': `You are an enterprise documentation architect.

Write one requirements or design document at a time from a JSON code analysis.
Use Markdown with tables for structured data. Keep requirements traceable to the
analysis findings.`,

  formatter: `You are a document publisher.

Normalize Markdown drafts for rendering: consistent heading levels, tables and code
blocks. Never add or remove content.`,
};

/**
 * Generate the system instructions for a role
 */
export function generateInstructions(role: AgentRole): string {
  return ROLE_INSTRUCTIONS[role];
}

/**
 * Message for the code analyzer: locate the codebase and describe the JSON to return
 */
export function buildAnalyzeMessage(source: string, prompt?: string): string {
  const request = prompt ? `\nUser request: ${prompt}\n` : '';

  return `Analyze the codebase at: ${source}
${request}
Return a JSON object with exactly these fields:
{
  "source": string,
  "architecture": { "summary": string, "languages": string[], "fileCount": number, "components": string[] },
  "endpoints": [{ "method": string, "path": string, "location": string }],
  "authFindings": [{ "mechanism": string, "location": string }],
  "vulnerabilities": [{ "severity": "low" | "medium" | "high" | "critical", "title": string, "location": string }]
}`;
}

/**
 * Message for the document generator: one document type per message
 */
export function buildGenerateMessage(
  report: AnalysisReportPayload,
  documentType: DocumentType,
  prompt?: string
): string {
  const request = prompt ? `User request: ${prompt}\n\n` : '';

  return `${request}Write the ${documentTypeTitle(documentType)} (${documentType}) for this codebase.

Code analysis:
\`\`\`json
${JSON.stringify(report, null, 2)}
\`\`\`

Answer with the document body in Markdown. Do not repeat the document title.`;
}

/**
 * Message for the formatter: normalize the complete draft
 */
export function buildFormatMessage(draft: DraftDocumentPayload, format: string): string {
  return `Normalize this documentation draft for ${format} rendering.
Keep every "## " section heading exactly as written.

${draftBody(draft)}`;
}
