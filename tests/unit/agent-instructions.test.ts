/**
 * Unit tests for agent instructions
 */

import { describe, it, expect } from 'vitest';
import {
  buildAnalyzeMessage,
  buildFormatMessage,
  buildGenerateMessage,
  documentTypeTitle,
  generateInstructions,
} from '../../src/agents/agent-instructions.js';
import type { AnalysisReportPayload } from '../../src/types/artifact.types.js';

const report: AnalysisReportPayload = {
  source: './repo',
  architecture: { summary: 'Small service', languages: ['TypeScript'], fileCount: 3, components: ['api'] },
  endpoints: [{ method: 'GET', path: '/health', location: 'api/app.ts:3' }],
  authFindings: [],
  vulnerabilities: [],
};

describe('agent-instructions', () => {
  describe('generateInstructions', () => {
    it('should ask the analyzer for JSON only', () => {
      expect(generateInstructions('code-analyzer')).toContain('single JSON object and nothing else');
    });

    it('should forbid the formatter from changing content', () => {
      expect(generateInstructions('formatter')).toContain('Never add or remove content.');
    });
  });

  describe('documentTypeTitle', () => {
    it('should return the long name of each document type', () => {
      expect(documentTypeTitle('BRD')).toBe('Business Requirements Document');
      expect(documentTypeTitle('NFRD')).toBe('Non-Functional Requirements Document');
      expect(documentTypeTitle('Architecture')).toBe('Architecture Overview');
    });
  });

  describe('buildAnalyzeMessage', () => {
    it('should name the source', () => {
      const message = buildAnalyzeMessage('./repo');
      expect(message.startsWith('Analyze the codebase at: ./repo\n')).toBe(true);
      expect(message).not.toContain('User request:');
    });

    it('should include the user request when given', () => {
      expect(buildAnalyzeMessage('./repo', 'focus on auth')).toContain('\nUser request: focus on auth\n');
    });
  });

  describe('buildGenerateMessage', () => {
    it('should embed the analysis as JSON', () => {
      const message = buildGenerateMessage(report, 'FRD');
      expect(message.startsWith('Write the Functional Requirements Document (FRD) for this codebase.')).toBe(true);
      expect(message).toContain(JSON.stringify(report, null, 2));
    });

    it('should lead with the user request when given', () => {
      expect(buildGenerateMessage(report, 'BRD', 'keep it short').startsWith('User request: keep it short\n\n')).toBe(
        true
      );
    });
  });

  describe('buildFormatMessage', () => {
    it('should carry the whole draft', () => {
      const message = buildFormatMessage(
        { title: 'Billing', sections: [{ documentType: 'BRD', heading: 'Goals', body: 'Collect payments.' }] },
        'pdf'
      );
      expect(message).toBe(
        'Normalize this documentation draft for pdf rendering.\n' +
          'Keep every "## " section heading exactly as written.\n\n' +
          '# Billing\n\n## Goals\n\nCollect payments.\n'
      );
    });
  });
});
