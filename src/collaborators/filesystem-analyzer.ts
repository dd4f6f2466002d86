/**
 * Direct-call code analyzer over a local directory or zip archive
 *
 * Keyword and pattern heuristics only: source files are scanned line by line
 * for route declarations, auth libraries and hard-coded secrets.
 */

import { mkdtemp, readdir, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { extname, join, relative, sep } from 'node:path';
import AdmZip from 'adm-zip';
import type { AnalysisReportPayload } from '../types/artifact.types.js';
import { CancelledError, CollaboratorError } from '../types/error.types.js';
import type { CallOptions, CodeAnalyzer } from './types.js';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('filesystem-analyzer');

const LANGUAGES: Record<string, string> = {
  '.py': 'Python',
  '.js': 'JavaScript',
  '.ts': 'TypeScript',
  '.java': 'Java',
  '.go': 'Go',
  '.cs': 'C#',
};

const IGNORED_DIRECTORIES = new Set(['node_modules', '.git', 'dist', 'build', '__pycache__', '.venv', 'venv', 'target', 'bin', 'obj']);

const MAX_FILE_BYTES = 1024 * 1024;
const MAX_FILES = 5000;

const ROUTE_CALL = /\b(?:app|router|api|server)\.(get|post|put|patch|delete)\(\s*['"`]([^'"`]+)['"`]/gi;
const FLASK_ROUTE = /@\w+\.route\(\s*['"]([^'"]+)['"](?:[^)]*methods\s*=\s*\[([^\]]*)\])?/g;
const SPRING_MAPPING = /@(Get|Post|Put|Patch|Delete)Mapping\(\s*(?:(?:value|path)\s*=\s*)?"([^"]+)"/g;

const AUTH_PATTERNS: Array<{ mechanism: string; pattern: RegExp }> = [
  { mechanism: 'JWT', pattern: /\bjwt\b|jsonwebtoken/i },
  { mechanism: 'OAuth', pattern: /\boauth2?\b/i },
  { mechanism: 'Passport', pattern: /\bpassport\b/i },
  { mechanism: 'Auth0', pattern: /\bauth0\b/i },
  { mechanism: 'API key', pattern: /x-api-key|api[_-]?key\s*(?:header|auth)/i },
  { mechanism: 'Basic auth', pattern: /\bbasic\s+auth|httpbasic/i },
];

const SECRET_ASSIGNMENT = /\b(password|passwd|secret|api[_-]?key|token)\s*[:=]\s*['"][^'"\s]{4,}['"]/i;
const EVAL_CALL = /\beval\s*\(/;

const FRAMEWORKS: Array<{ name: string; pattern: RegExp }> = [
  { name: 'Express', pattern: /require\(['"]express['"]\)|from ['"]express['"]/ },
  { name: 'FastAPI', pattern: /\bfrom fastapi\b|\bimport fastapi\b/ },
  { name: 'Flask', pattern: /\bfrom flask\b|\bimport flask\b/ },
  { name: 'Django', pattern: /\bfrom django\b/ },
  { name: 'Spring', pattern: /org\.springframework/ },
];

function toLocation(root: string, file: string, line: number): string {
  return `${relative(root, file).split(sep).join('/')}:${line}`;
}

const EXTRACT_PREFIX = 'docweave-src-';

function isZipArchive(path: string): boolean {
  return extname(path).toLowerCase() === '.zip';
}

export class FileSystemAnalyzer implements CodeAnalyzer {
  async analyze(source: string, options: CallOptions = {}): Promise<AnalysisReportPayload> {
    const info = await stat(source).catch((error: unknown) => {
      throw new CollaboratorError(`Source not found: ${source}`, 'analysis', false, error);
    });

    if (info.isDirectory()) {
      return this.analyzeDirectory(source, source, options);
    }
    if (info.isFile() && isZipArchive(source)) {
      return this.analyzeArchive(source, options);
    }
    throw new CollaboratorError(`Source is neither a directory nor a zip archive: ${source}`, 'analysis');
  }

  /**
   * Extract the archive into a temporary directory, analyze it, then remove it
   */
  private async analyzeArchive(archive: string, options: CallOptions): Promise<AnalysisReportPayload> {
    const root = await mkdtemp(join(tmpdir(), EXTRACT_PREFIX));
    try {
      try {
        new AdmZip(archive).extractAllTo(root, true);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new CollaboratorError(`Cannot extract ${archive}: ${message}`, 'analysis', false, error);
      }
      logger.debug({ archive, root }, 'Archive extracted');
      return await this.analyzeDirectory(root, archive, options);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  }

  private async analyzeDirectory(root: string, source: string, options: CallOptions): Promise<AnalysisReportPayload> {
    const files = await this.collectFiles(root, options.signal);
    logger.info({ source, fileCount: files.length }, 'Collected source files');

    const report: AnalysisReportPayload = {
      source,
      architecture: { summary: '', languages: [], fileCount: files.length, components: [] },
      endpoints: [],
      authFindings: [],
      vulnerabilities: [],
    };

    const languages = new Set<string>();
    const components = new Set<string>();
    const frameworks = new Set<string>();
    const authSeen = new Set<string>();

    for (const file of files) {
      if (options.signal?.aborted) {
        throw new CancelledError('Analysis aborted');
      }

      const language = LANGUAGES[extname(file)];
      if (language) {
        languages.add(language);
      }

      const relativeParts = relative(root, file).split(sep);
      components.add(relativeParts.length > 1 ? relativeParts[0] ?? '.' : '.');

      const content = await readFile(file, 'utf-8');
      for (const framework of FRAMEWORKS) {
        if (framework.pattern.test(content)) {
          frameworks.add(framework.name);
        }
      }

      content.split('\n').forEach((line, index) => {
        const location = toLocation(root, file, index + 1);
        this.scanEndpoints(line, location, report);

        for (const { mechanism, pattern } of AUTH_PATTERNS) {
          // One finding per mechanism and file
          const key = `${mechanism}@${file}`;
          if (!authSeen.has(key) && pattern.test(line)) {
            authSeen.add(key);
            report.authFindings.push({ mechanism, location });
          }
        }

        if (SECRET_ASSIGNMENT.test(line)) {
          report.vulnerabilities.push({ severity: 'high', title: 'Possible hard-coded secret', location });
        } else if (EVAL_CALL.test(line)) {
          report.vulnerabilities.push({ severity: 'medium', title: 'Dynamic code evaluation', location });
        }
      });
    }

    report.architecture.languages = [...languages].sort();
    report.architecture.components = [...components].sort();
    const stack = [...frameworks].sort();
    report.architecture.summary = [
      `${files.length} files`,
      report.architecture.languages.join(', ') || 'unknown language',
      ...(stack.length > 0 ? [stack.join(', ')] : []),
      `${report.endpoints.length} endpoints`,
    ].join(' | ');

    return report;
  }

  private scanEndpoints(line: string, location: string, report: AnalysisReportPayload): void {
    for (const match of line.matchAll(ROUTE_CALL)) {
      report.endpoints.push({ method: (match[1] ?? 'get').toUpperCase(), path: match[2] ?? '', location });
    }

    for (const match of line.matchAll(FLASK_ROUTE)) {
      const methods = (match[2] ?? "'GET'")
        .split(',')
        .map((method) => method.replace(/['"\s]/g, '').toUpperCase())
        .filter((method) => method.length > 0);
      for (const method of methods) {
        report.endpoints.push({ method, path: match[1] ?? '', location });
      }
    }

    for (const match of line.matchAll(SPRING_MAPPING)) {
      report.endpoints.push({ method: (match[1] ?? 'Get').toUpperCase(), path: match[2] ?? '', location });
    }
  }

  /**
   * Walk the tree in name order, collecting source files
   */
  private async collectFiles(root: string, signal: AbortSignal | undefined): Promise<string[]> {
    const files: string[] = [];
    const pending = [root];

    while (pending.length > 0 && files.length < MAX_FILES) {
      if (signal?.aborted) {
        throw new CancelledError('Analysis aborted');
      }

      const dir = pending.shift();
      if (dir === undefined) {
        break;
      }

      const entries = (await readdir(dir, { withFileTypes: true })).sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        const fullPath = join(dir, entry.name);
        if (entry.isDirectory()) {
          if (!IGNORED_DIRECTORIES.has(entry.name) && !entry.name.startsWith('.')) {
            pending.push(fullPath);
          }
        } else if (entry.isFile() && extname(entry.name) in LANGUAGES) {
          const { size } = await stat(fullPath);
          if (size <= MAX_FILE_BYTES) {
            files.push(fullPath);
          }
        }
      }
    }

    return files.sort();
  }
}
