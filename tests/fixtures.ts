/**
 * Shared test data
 */

import type {
  AnalysisReportPayload,
  DraftDocumentPayload,
  OutputFormat,
  RenderedOutputPayload,
} from '../src/types/artifact.types.js';
import type { TaskRequest } from '../src/types/run.types.js';

export function sampleReport(source = './repo'): AnalysisReportPayload {
  return {
    source,
    architecture: {
      summary: '2 files | TypeScript | Express | 1 endpoints',
      languages: ['TypeScript'],
      fileCount: 2,
      components: ['api'],
    },
    endpoints: [{ method: 'GET', path: '/health', location: 'api/app.ts:3' }],
    authFindings: [{ mechanism: 'JWT', location: 'api/auth.ts:1' }],
    vulnerabilities: [{ severity: 'medium', title: 'Permissive CORS configuration', location: 'api/app.ts:2' }],
  };
}

export function sampleDraft(title = 'Billing'): DraftDocumentPayload {
  return {
    title,
    sections: [
      { documentType: 'BRD', heading: 'Business Requirements Document', body: '### Goals\n\n- Collect payments' },
      { documentType: 'Security', heading: 'Security & Compliance Document', body: 'Uses **JWT** tokens.' },
    ],
  };
}

export function renderedPayload(format: OutputFormat, bytes: number[] = [1, 2, 3]): RenderedOutputPayload {
  return {
    format,
    mediaType: 'application/octet-stream',
    fileName: `billing.${format}`,
    content: { type: 'inline', bytes: new Uint8Array(bytes) },
  };
}

export function taskRequest(overrides: Partial<TaskRequest> = {}): TaskRequest {
  return { source: './repo', formats: ['markdown'], options: {}, ...overrides };
}
