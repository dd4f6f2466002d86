/**
 * Markdown helpers for draft documents: front matter, section splitting, JSON extraction
 */

import matter from 'gray-matter';
import type { DocumentSection, DraftDocumentPayload } from '../types/artifact.types.js';

interface DraftMetadata {
  title: string;
  documentTypes: string[];
  generatedAt?: string | undefined;
}

/**
 * Serialize a draft to one markdown file with YAML front matter
 */
export function serializeDraft(draft: DraftDocumentPayload, generatedAt?: Date): string {
  const metadata: DraftMetadata = {
    title: draft.title,
    documentTypes: draft.sections.map((section) => section.documentType),
  };
  if (generatedAt) {
    metadata.generatedAt = generatedAt.toISOString();
  }

  return matter.stringify(draftBody(draft), metadata);
}

/**
 * Markdown body of a draft without front matter
 */
export function draftBody(draft: DraftDocumentPayload): string {
  const parts = [`# ${draft.title}`];
  for (const section of draft.sections) {
    parts.push(sectionMarkdown(section));
  }
  return parts.join('\n\n') + '\n';
}

export function sectionMarkdown(section: DocumentSection): string {
  return `## ${section.heading}\n\n${section.body.trim()}`;
}

/**
 * Strip YAML front matter from agent output, returning the markdown body
 */
export function stripFrontmatter(text: string): string {
  const { content } = matter(text);
  return content.trim();
}

/**
 * Strip a single leading "#"/"##" heading, if the text starts with one
 */
export function stripLeadingHeading(text: string): string {
  return text.replace(/^\s*#{1,2}[^\n]*(?:\n+|$)/, '').trim();
}

/**
 * Extract a JSON value from agent output that may be wrapped in a code fence or prose
 */
export function extractJson(text: string): unknown {
  const fenced = /```(?:json)?\s*\n([\s\S]*?)\n```/.exec(text);
  const candidate = fenced?.[1] ?? text.slice(text.indexOf('{'), text.lastIndexOf('}') + 1);

  if (!candidate.trim()) {
    throw new SyntaxError('No JSON object found in agent output');
  }

  return JSON.parse(candidate);
}

export interface MarkdownSection {
  heading: string;
  body: string;
}

/**
 * Split a markdown document on its "## " headings.
 * Text before the first such heading (front matter, "# title") is dropped.
 */
export function splitSections(markdown: string): MarkdownSection[] {
  const sections: MarkdownSection[] = [];
  let current: MarkdownSection | undefined;

  for (const line of stripFrontmatter(markdown).split('\n')) {
    const heading = /^##\s+(.+?)\s*$/.exec(line);
    if (heading) {
      current = { heading: heading[1] ?? '', body: '' };
      sections.push(current);
    } else if (current) {
      current.body += `${line}\n`;
    }
  }

  return sections.map((section) => ({ heading: section.heading, body: section.body.trim() }));
}
