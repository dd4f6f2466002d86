/**
 * Managed workers: each stage is delegated to a registered remote agent
 */

import type { AgentDescriptor } from '../types/agent.types.js';
import type {
  AnalysisReportPayload,
  DocumentSection,
  DocumentType,
  DraftDocumentPayload,
} from '../types/artifact.types.js';
import { WorkerError } from '../types/error.types.js';
import type { TaskRequest } from '../types/run.types.js';
import type { RemoteAgentsClient } from '../remote/agents-client.js';
import {
  buildAnalyzeMessage,
  buildFormatMessage,
  buildGenerateMessage,
  documentTypeTitle,
} from '../agents/agent-instructions.js';
import type { AgentRegistry } from '@core/agent-registry';
import { extractJson, splitSections, stripFrontmatter, stripLeadingHeading } from '@utils/markdown-parser';
import { AnalyzeWorker, FormatWorker, GenerateWorker } from './stage-workers.js';
import type { RenderDependencies, StageContext } from './worker.js';

export class ManagedAnalyzeWorker extends AnalyzeWorker {
  constructor(
    registry: AgentRegistry,
    private client: RemoteAgentsClient
  ) {
    super(registry);
  }

  protected override async analyze(
    request: TaskRequest,
    agent: AgentDescriptor,
    context: StageContext
  ): Promise<unknown> {
    const reply = await this.client.runAgent(agent.id, buildAnalyzeMessage(request.source, request.options.prompt), {
      signal: context.signal,
    });

    const report = extractJson(reply);
    // Report the locator as requested, whatever the agent echoed back
    return typeof report === 'object' && report !== null ? { ...report, source: request.source } : report;
  }
}

export class ManagedGenerateWorker extends GenerateWorker {
  constructor(
    registry: AgentRegistry,
    private client: RemoteAgentsClient
  ) {
    super(registry);
  }

  protected override async writeSection(
    report: AnalysisReportPayload,
    documentType: DocumentType,
    agent: AgentDescriptor,
    context: StageContext
  ): Promise<DocumentSection> {
    const reply = await this.client.runAgent(
      agent.id,
      buildGenerateMessage(report, documentType, context.request.options.prompt),
      { signal: context.signal }
    );

    return {
      documentType,
      heading: documentTypeTitle(documentType),
      body: stripLeadingHeading(stripFrontmatter(reply)),
    };
  }
}

export class ManagedFormatWorker extends FormatWorker {
  constructor(
    registry: AgentRegistry,
    render: RenderDependencies,
    private client: RemoteAgentsClient
  ) {
    super(registry, render);
  }

  /**
   * Let the formatter agent normalize every section body; the section
   * structure must come back unchanged
   */
  protected override async prepare(
    draft: DraftDocumentPayload,
    agent: AgentDescriptor,
    context: StageContext
  ): Promise<DraftDocumentPayload> {
    const format = context.stage.format ?? context.stage.id;
    const reply = await this.client.runAgent(agent.id, buildFormatMessage(draft, format), {
      signal: context.signal,
    });

    const normalized = splitSections(reply);
    const headings = draft.sections.map((section) => section.heading);
    const matches =
      normalized.length === headings.length &&
      normalized.every((section, index) => section.heading === headings[index] && section.body.length > 0);

    if (!matches) {
      throw new WorkerError(
        `Formatter changed the section structure (expected ${headings.length} sections, received ${normalized.length})`,
        'invalid-output',
        context.stage.id
      );
    }

    return {
      title: draft.title,
      sections: draft.sections.map((section, index) => ({
        ...section,
        body: normalized[index]?.body ?? section.body,
      })),
    };
  }
}
