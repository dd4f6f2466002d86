/**
 * Result aggregator: merges the latest stage outputs into a document package
 */

import type { ExecutionMode } from '../types/agent.types.js';
import {
  OUTPUT_FORMATS,
  type AnalysisReportArtifact,
  type Artifact,
  type DraftDocumentArtifact,
  type OutputFormat,
  type RenderedOutputArtifact,
} from '../types/artifact.types.js';
import { InternalGraphError } from '../types/error.types.js';
import type { DocumentPackage } from '../types/run.types.js';
import { isArtifactOfKind } from './artifact-store.js';

function newer<A extends Artifact>(current: A | undefined, candidate: A): A {
  return current === undefined || candidate.attempt > current.attempt ? candidate : current;
}

/**
 * Build the package from a run's artifacts. Pure; outputs are keyed by format
 * in canonical format order, whatever order the formats completed in.
 */
export function aggregate(runId: string, artifacts: readonly Artifact[], mode: ExecutionMode): DocumentPackage {
  let analysis: AnalysisReportArtifact | undefined;
  let draft: DraftDocumentArtifact | undefined;
  const rendered = new Map<OutputFormat, RenderedOutputArtifact>();

  for (const artifact of artifacts) {
    if (isArtifactOfKind(artifact, 'AnalysisReport')) {
      analysis = newer(analysis, artifact);
    } else if (isArtifactOfKind(artifact, 'DraftDocument')) {
      draft = newer(draft, artifact);
    } else if (isArtifactOfKind(artifact, 'RenderedOutput')) {
      const format = artifact.payload.format;
      rendered.set(format, newer(rendered.get(format), artifact));
    }
  }

  if (!analysis) {
    throw new InternalGraphError('Cannot aggregate: no AnalysisReport artifact', 'analyze', { runId });
  }
  if (!draft) {
    throw new InternalGraphError('Cannot aggregate: no DraftDocument artifact', 'generate', { runId });
  }

  const outputs: Partial<Record<OutputFormat, RenderedOutputArtifact>> = {};
  for (const format of OUTPUT_FORMATS) {
    const output = rendered.get(format);
    if (output) {
      outputs[format] = output;
    }
  }

  return { runId, mode, outputs, analysis, draft };
}
