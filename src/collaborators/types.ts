/**
 * Collaborator interfaces: analysis, generation, rendering and storage
 */

import type {
  AnalysisReportPayload,
  DocumentSection,
  DocumentType,
  DraftDocumentPayload,
  OutputFormat,
} from '../types/artifact.types.js';

export interface CallOptions {
  signal?: AbortSignal | undefined;
}

export interface CodeAnalyzer {
  analyze(source: string, options?: CallOptions): Promise<AnalysisReportPayload>;
}

export interface GenerateOptions extends CallOptions {
  title: string;
  prompt?: string | undefined;
}

export interface DocumentGenerator {
  generate(
    report: AnalysisReportPayload,
    documentType: DocumentType,
    options: GenerateOptions
  ): Promise<DocumentSection>;
}

export interface DocumentRenderer {
  readonly format: OutputFormat;
  readonly mediaType: string;
  readonly extension: string;
  render(draft: DraftDocumentPayload, options?: CallOptions): Promise<Uint8Array>;
}

export interface ObjectStore {
  /** Store bytes under a key and return a URI referencing them */
  put(key: string, bytes: Uint8Array, mediaType: string): Promise<string>;
}

export type RendererRegistry = ReadonlyMap<OutputFormat, DocumentRenderer>;
