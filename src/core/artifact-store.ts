/**
 * Per-run artifact store
 *
 * Append-only and keyed by (stageId, attempt). Artifacts are deep-frozen on
 * write, except byte content, which is copied; a newer attempt of the same
 * stage supersedes older ones on read.
 */

import type {
  AnalysisReportArtifact,
  AnalysisReportPayload,
  Artifact,
  ArtifactKind,
  ArtifactOfKind,
  DraftDocumentArtifact,
  DraftDocumentPayload,
  RenderedOutputArtifact,
  RenderedOutputPayload,
} from '../types/artifact.types.js';
import { CancelledError, InternalGraphError } from '../types/error.types.js';
import type { StageId } from '../types/stage.types.js';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('artifact-store');

export function artifactKey(stageId: StageId, attempt: number): string {
  return `${stageId}#${attempt}`;
}

export function isArtifactOfKind<K extends ArtifactKind>(artifact: Artifact, kind: K): artifact is ArtifactOfKind<K> {
  return artifact.kind === kind;
}

/**
 * Byte buffers cannot be frozen; the store keeps its own copy of inline content
 * so later writes to the caller's buffer do not reach stored artifacts
 */
function ownBytes(artifact: Artifact): void {
  if (
    artifact.kind === 'RenderedOutput' &&
    artifact.payload.content.type === 'inline' &&
    !Object.isFrozen(artifact.payload)
  ) {
    const { content } = artifact.payload;
    artifact.payload.content = { type: 'inline', bytes: content.bytes.slice() };
  }
}

function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || ArrayBuffer.isView(value) || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

export function createAnalysisArtifact(
  payload: AnalysisReportPayload,
  stageId: StageId,
  attempt: number
): AnalysisReportArtifact {
  return {
    id: artifactKey(stageId, attempt),
    kind: 'AnalysisReport',
    format: 'json',
    payload,
    stageId,
    attempt,
    createdAt: new Date(),
  };
}

export function createDraftArtifact(
  payload: DraftDocumentPayload,
  stageId: StageId,
  attempt: number
): DraftDocumentArtifact {
  return {
    id: artifactKey(stageId, attempt),
    kind: 'DraftDocument',
    format: 'markdown',
    payload,
    stageId,
    attempt,
    createdAt: new Date(),
  };
}

export function createRenderedArtifact(
  payload: RenderedOutputPayload,
  stageId: StageId,
  attempt: number
): RenderedOutputArtifact {
  return {
    id: artifactKey(stageId, attempt),
    kind: 'RenderedOutput',
    format: payload.format,
    payload,
    stageId,
    attempt,
    createdAt: new Date(),
  };
}

export class ArtifactStore {
  private artifacts: Map<string, Artifact> = new Map();
  private discarded = false;

  constructor(public readonly runId: string) {}

  /**
   * Append an artifact. Rejects duplicate (stageId, attempt) keys and writes after discard.
   */
  put<A extends Artifact>(artifact: A): A {
    if (this.discarded) {
      throw new CancelledError(`Run ${this.runId} was discarded; artifact ${artifact.id} rejected`, artifact.stageId);
    }

    const key = artifactKey(artifact.stageId, artifact.attempt);
    if (this.artifacts.has(key)) {
      throw new InternalGraphError(`Artifact ${key} already exists`, artifact.stageId, { runId: this.runId });
    }

    ownBytes(artifact);
    const frozen = deepFreeze(artifact);
    this.artifacts.set(key, frozen);
    logger.debug({ runId: this.runId, key, kind: artifact.kind }, 'Artifact stored');
    return frozen;
  }

  /**
   * Latest version of a kind across stages
   */
  latest<K extends ArtifactKind>(kind: K): ArtifactOfKind<K> | undefined {
    let latest: ArtifactOfKind<K> | undefined;
    for (const artifact of this.artifacts.values()) {
      if (isArtifactOfKind(artifact, kind) && (!latest || artifact.attempt > latest.attempt)) {
        latest = artifact;
      }
    }
    return latest;
  }

  list(): Artifact[] {
    return [...this.artifacts.values()];
  }

  get size(): number {
    return this.artifacts.size;
  }

  /**
   * Drop every artifact and reject later writes
   */
  discard(): void {
    this.discarded = true;
    this.artifacts.clear();
    logger.debug({ runId: this.runId }, 'Artifacts discarded');
  }
}
