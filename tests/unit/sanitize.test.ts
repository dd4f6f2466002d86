/**
 * Unit tests for sanitization utilities
 */

import { describe, it, expect } from 'vitest';
import { createSlug, validatePrompt, validateSourceRef, validateTitle } from '../../src/utils/sanitize';

describe('createSlug', () => {
  describe('stop word filtering', () => {
    it('should remove stop words from the title', () => {
      expect(createSlug('The Payments API & its Docs')).toBe('payments-api-its-docs');
    });

    it('should keep the words when every word is a stop word', () => {
      expect(createSlug('The and of')).toBe('the-and-of');
    });
  });

  describe('special character removal', () => {
    it('should lower-case and hyphenate', () => {
      expect(createSlug('Documentation Package')).toBe('documentation-package');
    });

    it('should split on underscores', () => {
      expect(createSlug('Q3 Report_v2')).toBe('q3-report-v2');
    });

    it('should fall back when nothing usable remains', () => {
      expect(createSlug('!!!')).toBe('document');
      expect(createSlug('???', 'output')).toBe('output');
    });
  });

  describe('length constraints', () => {
    it('should truncate long titles at a word boundary', () => {
      const slug = createSlug('alpha '.repeat(12));
      expect(slug).toBe('alpha-'.repeat(7) + 'alpha');
      expect(slug.length).toBeLessThanOrEqual(50);
    });
  });
});

describe('validateSourceRef', () => {
  it('should accept paths and URLs', () => {
    expect(validateSourceRef('./services/billing').valid).toBe(true);
    expect(validateSourceRef('https://git.example.com/acme/billing.git').valid).toBe(true);
  });

  it('should reject empty sources', () => {
    expect(validateSourceRef('   ')).toEqual({ valid: false, error: 'Source cannot be empty' });
  });

  it('should reject overly long sources', () => {
    expect(validateSourceRef('a'.repeat(2049))).toEqual({
      valid: false,
      error: 'Source cannot exceed 2048 characters',
    });
  });

  it('should reject control characters and newlines', () => {
    expect(validateSourceRef('repo\0').valid).toBe(false);
    expect(validateSourceRef('repo\nother').error).toBe('Source contains invalid control characters');
  });
});

describe('validateTitle', () => {
  it('should accept a normal title', () => {
    expect(validateTitle('Billing Service').valid).toBe(true);
  });

  it('should reject blank titles', () => {
    expect(validateTitle(' ').error).toBe('Title cannot be empty');
  });

  it('should reject titles over 200 characters', () => {
    expect(validateTitle('t'.repeat(201)).error).toBe('Title cannot exceed 200 characters');
  });

  it('should reject multi-line titles', () => {
    expect(validateTitle('line one\nline two').error).toBe('Title contains invalid control characters');
  });
});

describe('validatePrompt', () => {
  it('should allow newlines and tabs', () => {
    expect(validatePrompt('Focus on:\n\t- auth\n\t- billing').valid).toBe(true);
  });

  it('should allow an empty prompt', () => {
    expect(validatePrompt('').valid).toBe(true);
  });

  it('should reject prompts over 4000 characters', () => {
    expect(validatePrompt('p'.repeat(4001)).error).toBe('Prompt cannot exceed 4000 characters');
  });

  it('should reject control characters', () => {
    expect(validatePrompt('bell\u0007').error).toBe('Prompt contains invalid control characters');
  });
});
