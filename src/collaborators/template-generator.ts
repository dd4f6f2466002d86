/**
 * Template document generator used by the direct-call path
 */

import type {
  AnalysisReportPayload,
  DocumentSection,
  DocumentType,
} from '../types/artifact.types.js';
import { documentTypeTitle } from '../agents/agent-instructions.js';
import type { DocumentGenerator, GenerateOptions } from './types.js';

function table(headers: string[], rows: string[][]): string {
  if (rows.length === 0) {
    return '_None detected._';
  }
  const escape = (cell: string): string => cell.replace(/\|/g, '\\|');
  return [
    `| ${headers.join(' | ')} |`,
    `| ${headers.map(() => '---').join(' | ')} |`,
    ...rows.map((row) => `| ${row.map(escape).join(' | ')} |`),
  ].join('\n');
}

function list(items: string[], empty: string): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : empty;
}

type SectionBuilder = (report: AnalysisReportPayload, options: GenerateOptions) => string;

const BUILDERS: Record<DocumentType, SectionBuilder> = {
  BRD: (report, options) => `### Executive Summary
${options.prompt ? `${options.prompt}\n\n` : ''}This document captures the business requirements for the system at \`${report.source}\`.

### Business Objectives
1. Describe the capabilities the system exposes (${report.endpoints.length} endpoints detected)
2. Keep authentication and data protection aligned with the findings below
3. Enable efficient onboarding for new contributors

### Stakeholders
- Development Team
- Product Management
- Quality Assurance
- Security Team`,

  FRD: (report) => `### System Architecture
${report.architecture.summary}

### Components
${list(report.architecture.components, '_No components detected._')}

### API Endpoints
${table(
  ['Method', 'Path', 'Location'],
  report.endpoints.map((endpoint) => [endpoint.method, endpoint.path, endpoint.location])
)}`,

  NFRD: (report) => `### Performance
- API responses within 200 ms at the 95th percentile
- Horizontal scaling of stateless components

### Security
${list(
  report.authFindings.map((finding) => `Authentication via ${finding.mechanism}`),
  '- Define the authentication mechanism'
)}

### Maintainability
- Languages in use: ${report.architecture.languages.join(', ') || 'unknown'}
- ${report.architecture.fileCount} source files under analysis`,

  Security: (report) => `### Authentication Findings
${table(
  ['Mechanism', 'Location'],
  report.authFindings.map((finding) => [finding.mechanism, finding.location])
)}

### Vulnerability Findings
${table(
  ['Severity', 'Finding', 'Location'],
  report.vulnerabilities.map((finding) => [finding.severity, finding.title, finding.location])
)}`,

  Architecture: (report) => `### Overview
${report.architecture.summary}

### Technology Stack
${list(report.architecture.languages, '_No languages detected._')}

### Module Layout
${list(report.architecture.components.map((component) => `\`${component}\``), '_Flat layout._')}`,
};

export class TemplateDocumentGenerator implements DocumentGenerator {
  async generate(
    report: AnalysisReportPayload,
    documentType: DocumentType,
    options: GenerateOptions
  ): Promise<DocumentSection> {
    return {
      documentType,
      heading: documentTypeTitle(documentType),
      body: BUILDERS[documentType](report, options),
    };
  }
}
