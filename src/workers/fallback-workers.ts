/**
 * Fallback workers: the same stages through direct collaborator calls
 */

import type { AgentDescriptor } from '../types/agent.types.js';
import type {
  AnalysisReportPayload,
  DocumentSection,
  DocumentType,
  DraftDocumentPayload,
} from '../types/artifact.types.js';
import type { TaskRequest } from '../types/run.types.js';
import type { CodeAnalyzer, DocumentGenerator } from '../collaborators/types.js';
import type { AgentRegistry } from '@core/agent-registry';
import { AnalyzeWorker, FormatWorker, GenerateWorker } from './stage-workers.js';
import type { StageContext } from './worker.js';

export class FallbackAnalyzeWorker extends AnalyzeWorker {
  constructor(
    registry: AgentRegistry,
    private analyzer: CodeAnalyzer
  ) {
    super(registry);
  }

  protected override async analyze(
    request: TaskRequest,
    _agent: AgentDescriptor,
    context: StageContext
  ): Promise<AnalysisReportPayload> {
    return this.analyzer.analyze(request.source, { signal: context.signal });
  }
}

export class FallbackGenerateWorker extends GenerateWorker {
  constructor(
    registry: AgentRegistry,
    private generator: DocumentGenerator
  ) {
    super(registry);
  }

  protected override async writeSection(
    report: AnalysisReportPayload,
    documentType: DocumentType,
    _agent: AgentDescriptor,
    context: StageContext
  ): Promise<DocumentSection> {
    return this.generator.generate(report, documentType, {
      title: context.title,
      prompt: context.request.options.prompt,
      signal: context.signal,
    });
  }
}

export class FallbackFormatWorker extends FormatWorker {
  protected override async prepare(draft: DraftDocumentPayload): Promise<DraftDocumentPayload> {
    return draft;
  }
}
