/**
 * Stage workers: the mode-independent half of analyze, generate and format.
 * Subclasses supply only the step that differs between managed and fallback.
 */

import type { AgentDescriptor } from '../types/agent.types.js';
import {
  AnalysisReportSchema,
  type AnalysisReportArtifact,
  type AnalysisReportPayload,
  type Artifact,
  type DocumentSection,
  type DocumentType,
  type DraftDocumentArtifact,
  type DraftDocumentPayload,
} from '../types/artifact.types.js';
import { WorkerError } from '../types/error.types.js';
import type { TaskRequest } from '../types/run.types.js';
import type { AgentRegistry } from '@core/agent-registry';
import { createAnalysisArtifact, createDraftArtifact, createRenderedArtifact } from '@core/artifact-store';
import {
  BaseWorker,
  isArtifact,
  renderOutput,
  rendererFor,
  type RenderDependencies,
  type StageContext,
  type WorkerInput,
} from './worker.js';

export abstract class AnalyzeWorker extends BaseWorker<TaskRequest> {
  override readonly role = 'code-analyzer';
  override readonly inputKind = 'TaskRequest';

  protected override accepts(input: WorkerInput): input is TaskRequest {
    return !isArtifact(input);
  }

  protected override async perform(
    request: TaskRequest,
    agent: AgentDescriptor,
    context: StageContext
  ): Promise<AnalysisReportArtifact> {
    const raw = await this.analyze(request, agent, context);
    // Both modes must hand back the same report shape
    const payload = AnalysisReportSchema.parse(raw);
    context.logger.info(
      { endpoints: payload.endpoints.length, vulnerabilities: payload.vulnerabilities.length },
      'Analysis complete'
    );
    return createAnalysisArtifact(payload, context.stage.id, context.attempt);
  }

  protected abstract analyze(
    request: TaskRequest,
    agent: AgentDescriptor,
    context: StageContext
  ): Promise<unknown>;
}

export abstract class GenerateWorker extends BaseWorker<AnalysisReportArtifact> {
  override readonly role = 'doc-generator';
  override readonly inputKind = 'AnalysisReport';

  protected override accepts(input: WorkerInput): input is AnalysisReportArtifact {
    return isArtifact(input) && input.kind === 'AnalysisReport';
  }

  protected override async perform(
    report: AnalysisReportArtifact,
    agent: AgentDescriptor,
    context: StageContext
  ): Promise<DraftDocumentArtifact> {
    const sections: DocumentSection[] = [];

    // One document type at a time, in request order
    for (const documentType of context.documentTypes) {
      const section = await this.writeSection(report.payload, documentType, agent, context);
      if (!section.body.trim()) {
        throw new WorkerError(`Empty ${documentType} section`, 'invalid-output', context.stage.id);
      }
      sections.push(section);
    }

    const draft: DraftDocumentPayload = { title: context.title, sections };
    return createDraftArtifact(draft, context.stage.id, context.attempt);
  }

  protected abstract writeSection(
    report: AnalysisReportPayload,
    documentType: DocumentType,
    agent: AgentDescriptor,
    context: StageContext
  ): Promise<DocumentSection>;
}

export abstract class FormatWorker extends BaseWorker<DraftDocumentArtifact> {
  override readonly role = 'formatter';
  override readonly inputKind = 'DraftDocument';

  constructor(
    registry: AgentRegistry,
    protected renderDeps: RenderDependencies
  ) {
    super(registry);
  }

  protected override accepts(input: WorkerInput): input is DraftDocumentArtifact {
    return isArtifact(input) && input.kind === 'DraftDocument';
  }

  protected override async perform(
    draft: DraftDocumentArtifact,
    agent: AgentDescriptor,
    context: StageContext
  ): Promise<Artifact> {
    const renderer = rendererFor(context, this.renderDeps.renderers);
    const prepared = await this.prepare(draft.payload, agent, context);
    const payload = await renderOutput(prepared, renderer, this.renderDeps, context);
    return createRenderedArtifact(payload, context.stage.id, context.attempt);
  }

  /**
   * Draft to render; the fallback renders the stored draft as is
   */
  protected abstract prepare(
    draft: DraftDocumentPayload,
    agent: AgentDescriptor,
    context: StageContext
  ): Promise<DraftDocumentPayload>;
}
