/**
 * Unit tests for ArtifactStore
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ArtifactStore,
  artifactKey,
  createAnalysisArtifact,
  createDraftArtifact,
  createRenderedArtifact,
} from '@core/artifact-store';
import { CancelledError, InternalGraphError } from '../../src/types/error.types.js';
import { renderedPayload, sampleDraft, sampleReport } from '../fixtures.js';
import { captureError } from '../setup.js';

describe('ArtifactStore', () => {
  let store: ArtifactStore;

  beforeEach(() => {
    store = new ArtifactStore('run-1');
  });

  describe('artifact constructors', () => {
    it('should key artifacts by stage and attempt', () => {
      expect(artifactKey('format:pdf', 2)).toBe('format:pdf#2');
      expect(createAnalysisArtifact(sampleReport(), 'analyze', 1).id).toBe('analyze#1');
    });

    it('should tag each kind with its format', () => {
      expect(createAnalysisArtifact(sampleReport(), 'analyze', 1).format).toBe('json');
      expect(createDraftArtifact(sampleDraft(), 'generate', 1).format).toBe('markdown');
      expect(createRenderedArtifact(renderedPayload('docx'), 'format:docx', 1).format).toBe('docx');
    });
  });

  describe('put', () => {
    it('should store and return a frozen artifact', () => {
      const stored = store.put(createAnalysisArtifact(sampleReport(), 'analyze', 1));

      expect(store.list()).toEqual([stored]);
      expect(Object.isFrozen(stored)).toBe(true);
      expect(Object.isFrozen(stored.payload.architecture)).toBe(true);
      expect(() => stored.payload.endpoints.push({ method: 'POST', path: '/x', location: 'x' })).toThrow(TypeError);
    });

    it('should leave byte buffers writable', () => {
      const stored = store.put(createRenderedArtifact(renderedPayload('pdf'), 'format:pdf', 1));

      expect(Object.isFrozen(stored.payload)).toBe(true);
      expect(stored.payload.content.type === 'inline' && Object.isFrozen(stored.payload.content.bytes)).toBe(false);
    });

    it('should reject a duplicate stage and attempt', () => {
      store.put(createDraftArtifact(sampleDraft(), 'generate', 1));

      const error = captureError(() => store.put(createDraftArtifact(sampleDraft('Other'), 'generate', 1)));

      expect(error).toBeInstanceOf(InternalGraphError);
      expect(error).toMatchObject({ message: 'Artifact generate#1 already exists', stageId: 'generate' });
    });
  });

  describe('byte content', () => {
    it('should keep its own copy of inline bytes', () => {
      const bytes = new Uint8Array([1, 2, 3]);
      const payload = renderedPayload('pdf');
      payload.content = { type: 'inline', bytes };

      const stored = store.put(createRenderedArtifact(payload, 'format:pdf', 1));
      bytes[0] = 9;

      expect(stored.payload.content).toEqual({ type: 'inline', bytes: new Uint8Array([1, 2, 3]) });
      expect(Object.isFrozen(stored.payload.content)).toBe(true);
    });

    it('should keep references unchanged', () => {
      const payload = renderedPayload('pdf');
      payload.content = { type: 'reference', uri: 'memory://run/billing.pdf', size: 3 };

      const stored = store.put(createRenderedArtifact(payload, 'format:pdf', 1));

      expect(stored.payload.content).toEqual({ type: 'reference', uri: 'memory://run/billing.pdf', size: 3 });
    });
  });

  describe('latest', () => {
    it('should return the newest artifact of a kind', () => {
      store.put(createAnalysisArtifact(sampleReport(), 'analyze', 1));
      store.put(createRenderedArtifact(renderedPayload('pdf'), 'format:pdf', 1));
      store.put(createRenderedArtifact(renderedPayload('docx'), 'format:docx', 3));

      expect(store.latest('RenderedOutput')?.payload.format).toBe('docx');
      expect(store.latest('AnalysisReport')?.payload.source).toBe('./repo');
      expect(store.latest('DraftDocument')).toBeUndefined();
    });
  });

  describe('discard', () => {
    it('should drop every artifact and reject later writes', () => {
      store.put(createAnalysisArtifact(sampleReport(), 'analyze', 1));

      store.discard();

      expect(store.size).toBe(0);
      expect(store.list()).toEqual([]);
      const error = captureError(() => store.put(createDraftArtifact(sampleDraft(), 'generate', 1)));
      expect(error).toBeInstanceOf(CancelledError);
      expect(error).toMatchObject({ stageId: 'generate' });
    });
  });
});
