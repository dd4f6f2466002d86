/**
 * Artifact types carried between stages
 */

import { z } from 'zod';
import type { StageId } from './stage.types.js';

export const OUTPUT_FORMATS = ['pdf', 'docx', 'html', 'markdown'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DOCUMENT_TYPES = ['BRD', 'FRD', 'NFRD', 'Security', 'Architecture'] as const;
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export type ArtifactKind = 'AnalysisReport' | 'DraftDocument' | 'RenderedOutput';

export const SeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);

export const AnalysisReportSchema = z.object({
  source: z.string(),
  architecture: z.object({
    summary: z.string(),
    languages: z.array(z.string()),
    fileCount: z.number().int().nonnegative(),
    components: z.array(z.string()),
  }),
  endpoints: z.array(
    z.object({
      method: z.string(),
      path: z.string(),
      location: z.string(),
    })
  ),
  authFindings: z.array(
    z.object({
      mechanism: z.string(),
      location: z.string(),
    })
  ),
  vulnerabilities: z.array(
    z.object({
      severity: SeveritySchema,
      title: z.string(),
      location: z.string(),
    })
  ),
});

export type AnalysisReportPayload = z.infer<typeof AnalysisReportSchema>;

export interface DocumentSection {
  documentType: DocumentType;
  heading: string;
  body: string; // Markdown
}

export interface DraftDocumentPayload {
  title: string;
  sections: DocumentSection[];
}

export type RenderedContent =
  | { type: 'inline'; bytes: Uint8Array }
  | { type: 'reference'; uri: string; size: number };

export interface RenderedOutputPayload {
  format: OutputFormat;
  mediaType: string;
  fileName: string;
  content: RenderedContent;
}

interface ArtifactBase<K extends ArtifactKind, P> {
  readonly id: string;        // "<stageId>#<attempt>"
  readonly kind: K;
  readonly format: string;    // Format tag: "json", "markdown" or an output format
  readonly payload: P;
  readonly stageId: StageId;  // Producing stage
  readonly attempt: number;   // Version within the producing stage
  readonly createdAt: Date;
}

export type AnalysisReportArtifact = ArtifactBase<'AnalysisReport', AnalysisReportPayload>;
export type DraftDocumentArtifact = ArtifactBase<'DraftDocument', DraftDocumentPayload>;
export type RenderedOutputArtifact = ArtifactBase<'RenderedOutput', RenderedOutputPayload>;

export type Artifact = AnalysisReportArtifact | DraftDocumentArtifact | RenderedOutputArtifact;

export type ArtifactOfKind<K extends ArtifactKind> = Extract<Artifact, { kind: K }>;

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}
