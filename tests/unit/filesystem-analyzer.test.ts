/**
 * Unit tests for FileSystemAnalyzer
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import AdmZip from 'adm-zip';
import { FileSystemAnalyzer } from '../../src/collaborators/filesystem-analyzer.js';
import { AnalysisReportSchema } from '../../src/types/artifact.types.js';
import { CancelledError, CollaboratorError } from '../../src/types/error.types.js';
import { captureRejection } from '../setup.js';

const APP_TS = [
  "import express from 'express';",
  'const app = express();',
  "app.get('/users', listUsers);",
  "app.post('/login', passport.authenticate('local'));",
  'const password = "hunter22";',
].join('\n');

const WORKER_PY = ['import jwt', 'result = eval(payload)'].join('\n');

describe('FileSystemAnalyzer', () => {
  const analyzer = new FileSystemAnalyzer();
  let root: string;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'analyzer-'));
    await mkdir(join(root, 'api'));
    await mkdir(join(root, 'node_modules', 'lib'), { recursive: true });
    await writeFile(join(root, 'api', 'app.ts'), APP_TS);
    await writeFile(join(root, 'worker.py'), WORKER_PY);
    await writeFile(join(root, 'README.md'), "app.get('/ignored', handler);");
    await writeFile(join(root, 'node_modules', 'lib', 'index.js'), "app.get('/vendored', handler);");
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should summarize the architecture', async () => {
    const report = await analyzer.analyze(root);

    expect(report.source).toBe(root);
    expect(report.architecture).toEqual({
      summary: '2 files | Python, TypeScript | Express | 2 endpoints',
      languages: ['Python', 'TypeScript'],
      fileCount: 2,
      components: ['.', 'api'],
    });
  });

  it('should find route declarations', async () => {
    const report = await analyzer.analyze(root);

    expect(report.endpoints).toEqual([
      { method: 'GET', path: '/users', location: 'api/app.ts:3' },
      { method: 'POST', path: '/login', location: 'api/app.ts:4' },
    ]);
  });

  it('should find auth mechanisms once per file', async () => {
    const report = await analyzer.analyze(root);

    expect(report.authFindings).toEqual([
      { mechanism: 'Passport', location: 'api/app.ts:4' },
      { mechanism: 'JWT', location: 'worker.py:1' },
    ]);
  });

  it('should flag secrets and dynamic evaluation', async () => {
    const report = await analyzer.analyze(root);

    expect(report.vulnerabilities).toEqual([
      { severity: 'high', title: 'Possible hard-coded secret', location: 'api/app.ts:5' },
      { severity: 'medium', title: 'Dynamic code evaluation', location: 'worker.py:2' },
    ]);
  });

  it('should produce a report that passes schema validation', async () => {
    expect(AnalysisReportSchema.safeParse(await analyzer.analyze(root)).success).toBe(true);
  });

  it('should reject a missing directory', async () => {
    const missing = join(root, 'missing');

    const error = await captureRejection(analyzer.analyze(missing));

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error).toMatchObject({
      message: `Source not found: ${missing}`,
      collaborator: 'analysis',
      transient: false,
    });
  });

  it('should reject a file as source', async () => {
    const file = join(root, 'worker.py');
    await expect(analyzer.analyze(file)).rejects.toThrow(`Source is neither a directory nor a zip archive: ${file}`);
  });

  it('should stop when aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    expect(await captureRejection(analyzer.analyze(root, { signal: controller.signal }))).toBeInstanceOf(
      CancelledError
    );
  });

  describe('zip archives', () => {
    let archiveDir: string;
    let archive: string;

    async function extractionDirs(): Promise<string[]> {
      return (await readdir(tmpdir())).filter((name) => name.startsWith('docweave-src-'));
    }

    beforeAll(async () => {
      archiveDir = await mkdtemp(join(tmpdir(), 'analyzer-zip-'));
      archive = join(archiveDir, 'code.zip');
      const zip = new AdmZip();
      zip.addFile('api/app.ts', Buffer.from(APP_TS));
      zip.addFile('worker.py', Buffer.from(WORKER_PY));
      zip.writeZip(archive);
      await writeFile(join(archiveDir, 'broken.zip'), 'not an archive');
    });

    afterAll(async () => {
      await rm(archiveDir, { recursive: true, force: true });
    });

    it('should analyze an archive like the directory it contains', async () => {
      const report = await analyzer.analyze(archive);

      expect(report.source).toBe(archive);
      expect(report.architecture.summary).toBe('2 files | Python, TypeScript | Express | 2 endpoints');
      expect(report.endpoints).toEqual([
        { method: 'GET', path: '/users', location: 'api/app.ts:3' },
        { method: 'POST', path: '/login', location: 'api/app.ts:4' },
      ]);
    });

    it('should remove the extracted files afterwards', async () => {
      const before = await extractionDirs();

      await analyzer.analyze(archive);

      expect(await extractionDirs()).toEqual(before);
    });

    it('should reject an archive that cannot be read', async () => {
      const broken = join(archiveDir, 'broken.zip');
      const before = await extractionDirs();

      const error = await captureRejection(analyzer.analyze(broken));

      expect(error).toBeInstanceOf(CollaboratorError);
      expect(error).toMatchObject({
        message: expect.stringMatching(/^Cannot extract .*broken\.zip: /),
        collaborator: 'analysis',
        transient: false,
      });
      expect(await extractionDirs()).toEqual(before);
    });
  });
});
