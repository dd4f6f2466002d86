/**
 * Sanitization utilities for request fields and output file names
 */

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from',
  'in', 'is', 'it', 'of', 'on', 'or', 'the', 'to', 'with',
]);

/**
 * Create a file-name-safe slug from a document title
 *
 * Examples:
 * - "Documentation Package" → "documentation-package"
 * - "The Payments API & its Docs" → "payments-api-its-docs"
 */
export function createSlug(name: string, fallback = 'document'): string {
  const normalized = name
    .toLowerCase()
    .trim()
    .replace(/[^\w\s-]/g, '');

  const words = normalized.split(/[\s_]+/).filter((w) => w.length > 0);
  const keywords = words.filter((w) => !STOP_WORDS.has(w));

  // Limit to 50 chars at a word boundary
  let slug = (keywords.length > 0 ? keywords : words).join('-');
  if (slug.length > 50) {
    slug = slug.substring(0, 50).replace(/-[^-]*$/, '');
  }

  slug = slug.replace(/-{2,}/g, '-').replace(/^-|-$/g, '');
  return slug.length > 0 ? slug : fallback;
}

function findControlCharacter(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    // Null byte and control characters other than tab, newline, carriage return
    if (code === 0 || code === 127 || (code < 32 && code !== 9 && code !== 10 && code !== 13)) {
      return true;
    }
  }
  return false;
}

/**
 * Validate a codebase locator (directory, zip archive or URL)
 */
export function validateSourceRef(source: string): ValidationResult {
  if (!source || !source.trim()) {
    return { valid: false, error: 'Source cannot be empty' };
  }

  if (source.length > 2048) {
    return { valid: false, error: 'Source cannot exceed 2048 characters' };
  }

  if (findControlCharacter(source) || /[\n\r\t]/.test(source)) {
    return { valid: false, error: 'Source contains invalid control characters' };
  }

  return { valid: true };
}

/**
 * Validate a document title
 */
export function validateTitle(title: string): ValidationResult {
  if (!title.trim()) {
    return { valid: false, error: 'Title cannot be empty' };
  }

  if (title.length > 200) {
    return { valid: false, error: 'Title cannot exceed 200 characters' };
  }

  if (findControlCharacter(title) || /[\n\r]/.test(title)) {
    return { valid: false, error: 'Title contains invalid control characters' };
  }

  return { valid: true };
}

/**
 * Validate the free-form user request.
 * More lenient than title validation to allow full descriptions.
 */
export function validatePrompt(prompt: string): ValidationResult {
  if (prompt.length > 4000) {
    return { valid: false, error: 'Prompt cannot exceed 4000 characters' };
  }

  if (findControlCharacter(prompt)) {
    return { valid: false, error: 'Prompt contains invalid control characters' };
  }

  return { valid: true };
}
