/**
 * Output renderers for draft documents
 *
 * markdown: gray-matter front matter + sections
 * html:     marked
 * docx:     docx
 * pdf:      pdfkit
 */

import { Document, HeadingLevel, Packer, Paragraph, TextRun } from 'docx';
import { marked } from 'marked';
import PDFDocument from 'pdfkit';
import type { DraftDocumentPayload, OutputFormat } from '../types/artifact.types.js';
import { CancelledError, CollaboratorError } from '../types/error.types.js';
import { draftBody, serializeDraft } from '@utils/markdown-parser';
import type { CallOptions, DocumentRenderer, RendererRegistry } from './types.js';

type Block =
  | { kind: 'heading'; level: number; text: string }
  | { kind: 'bullet'; text: string }
  | { kind: 'row'; cells: string[] }
  | { kind: 'paragraph'; text: string };

function plainText(text: string): string {
  return text
    .replace(/`([^`]*)`/g, '$1')
    .replace(/\*\*([^*]*)\*\*/g, '$1')
    .replace(/(^|\s)_([^_]+)_(?=\s|$)/g, '$1$2')
    .replace(/\\\|/g, '|');
}

/**
 * Line-level block split used by the binary renderers
 */
export function toBlocks(markdown: string): Block[] {
  const blocks: Block[] = [];

  for (const raw of markdown.split('\n')) {
    const line = raw.trim();
    if (!line || /^\|(\s*-+\s*\|)+$/.test(line)) {
      continue;
    }

    const heading = /^(#{1,6})\s+(.*)$/.exec(line);
    if (heading) {
      blocks.push({ kind: 'heading', level: heading[1]?.length ?? 1, text: plainText(heading[2] ?? '') });
    } else if (/^([-*]|\d+\.)\s+/.test(line)) {
      blocks.push({ kind: 'bullet', text: plainText(line.replace(/^([-*]|\d+\.)\s+/, '')) });
    } else if (line.startsWith('|') && line.endsWith('|')) {
      const cells = line
        .slice(1, -1)
        .split(/(?<!\\)\|/)
        .map((cell) => plainText(cell.trim()));
      blocks.push({ kind: 'row', cells });
    } else {
      blocks.push({ kind: 'paragraph', text: plainText(line) });
    }
  }

  return blocks;
}

function checkAborted(signal: AbortSignal | undefined, format: OutputFormat): void {
  if (signal?.aborted) {
    throw new CancelledError(`Rendering ${format} aborted`);
  }
}

export class MarkdownRenderer implements DocumentRenderer {
  readonly format = 'markdown';
  readonly mediaType = 'text/markdown';
  readonly extension = '.md';

  async render(draft: DraftDocumentPayload, options: CallOptions = {}): Promise<Uint8Array> {
    checkAborted(options.signal, this.format);
    return new TextEncoder().encode(serializeDraft(draft));
  }
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export class HtmlRenderer implements DocumentRenderer {
  readonly format = 'html';
  readonly mediaType = 'text/html';
  readonly extension = '.html';

  async render(draft: DraftDocumentPayload, options: CallOptions = {}): Promise<Uint8Array> {
    checkAborted(options.signal, this.format);
    const body = await marked.parse(draftBody(draft));

    const html = `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(draft.title)}</title>
</head>
<body>
${body}</body>
</html>
`;
    return new TextEncoder().encode(html);
  }
}

const DOCX_HEADINGS = [
  HeadingLevel.HEADING_1,
  HeadingLevel.HEADING_2,
  HeadingLevel.HEADING_3,
  HeadingLevel.HEADING_4,
] as const;

export class DocxRenderer implements DocumentRenderer {
  readonly format = 'docx';
  readonly mediaType = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
  readonly extension = '.docx';

  async render(draft: DraftDocumentPayload, options: CallOptions = {}): Promise<Uint8Array> {
    checkAborted(options.signal, this.format);

    const children = toBlocks(draftBody(draft)).map((block) => {
      switch (block.kind) {
        case 'heading':
          return new Paragraph({
            text: block.text,
            heading: DOCX_HEADINGS[Math.min(block.level, DOCX_HEADINGS.length) - 1] ?? HeadingLevel.HEADING_4,
          });
        case 'bullet':
          return new Paragraph({ text: block.text, bullet: { level: 0 } });
        case 'row':
          return new Paragraph({ children: [new TextRun({ text: block.cells.join('  |  '), font: 'Consolas' })] });
        case 'paragraph':
          return new Paragraph({ text: block.text });
      }
    });

    const document = new Document({
      title: draft.title,
      sections: [{ children }],
    });

    try {
      return await Packer.toBuffer(document);
    } catch (error) {
      throw new CollaboratorError('Failed to pack docx document', 'render', false, error);
    }
  }
}

const PDF_FONT_SIZES: Record<number, number> = { 1: 20, 2: 16, 3: 13 };

export class PdfRenderer implements DocumentRenderer {
  readonly format = 'pdf';
  readonly mediaType = 'application/pdf';
  readonly extension = '.pdf';

  async render(draft: DraftDocumentPayload, options: CallOptions = {}): Promise<Uint8Array> {
    checkAborted(options.signal, this.format);

    const pdf = new PDFDocument({ size: 'A4', margin: 50, info: { Title: draft.title } });
    const chunks: Buffer[] = [];

    const finished = new Promise<Uint8Array>((resolve, reject) => {
      pdf.on('data', (chunk: Buffer) => chunks.push(chunk));
      pdf.on('end', () => resolve(Buffer.concat(chunks)));
      pdf.on('error', (error: unknown) =>
        reject(new CollaboratorError('Failed to write pdf document', 'render', false, error))
      );
    });

    for (const block of toBlocks(draftBody(draft))) {
      switch (block.kind) {
        case 'heading':
          pdf.moveDown(0.5).font('Helvetica-Bold').fontSize(PDF_FONT_SIZES[block.level] ?? 11).text(block.text);
          pdf.moveDown(0.25);
          break;
        case 'bullet':
          pdf.font('Helvetica').fontSize(11).text(`• ${block.text}`, { indent: 12 });
          break;
        case 'row':
          pdf.font('Courier').fontSize(9).text(block.cells.join(' | '));
          break;
        case 'paragraph':
          pdf.font('Helvetica').fontSize(11).text(block.text);
          break;
      }
    }

    pdf.end();
    return finished;
  }
}

/**
 * One renderer per supported output format
 */
export function createDefaultRenderers(): RendererRegistry {
  const renderers: DocumentRenderer[] = [
    new PdfRenderer(),
    new DocxRenderer(),
    new HtmlRenderer(),
    new MarkdownRenderer(),
  ];
  return new Map(renderers.map((renderer): [OutputFormat, DocumentRenderer] => [renderer.format, renderer]));
}
