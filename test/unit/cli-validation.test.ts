import { describe, it, expect } from 'vitest';
import { validateCliOptions, VALID_PROFILES } from '../../src/utils/cli-validation.js';

// Stub file existence checker for testing
const fileExists = (path: string) => path === '/exists/build.log' || path === '/exists/app';

describe('validateCliOptions', () => {
  it('returns no errors for empty options', () => {
    expect(validateCliOptions({}, fileExists)).toEqual([]);
  });

  // ─── Enumerations ──────────────────────────────────────────────

  describe('--profile', () => {
    it('accepts valid profiles', () => {
      for (const profile of VALID_PROFILES) {
        expect(validateCliOptions({ profile }, fileExists)).toEqual([]);
      }
    });

    it('rejects invalid profile', () => {
      expect(validateCliOptions({ profile: 'turbo' }, fileExists)).toEqual([
        { field: '--profile', message: 'Invalid value "turbo" for --profile. Must be one of: gentle, standard, fast' },
      ]);
    });
  });

  it('rejects an unknown framework', () => {
    expect(validateCliOptions({ framework: 'rails' }, fileExists)).toEqual([
      { field: '--framework', message: 'Invalid value "rails" for --framework. Must be one of: flask, express, fastapi, django' },
    ]);
  });

  it('checks --format and --status', () => {
    const errors = validateCliOptions({ format: 'xml', status: 'failed' }, fileExists);
    expect(errors.map((e) => e.field)).toEqual(['--format', '--status']);
    expect(errors[1].message).toBe('Invalid value "failed" for --status. Must be one of: Success, Failed');
  });

  // ─── Numbers ───────────────────────────────────────────────────

  describe('numeric options', () => {
    it('accepts positive integers', () => {
      expect(validateCliOptions({ timeout: '3000', concurrency: '4', delay: '50', retries: '2' }, fileExists)).toEqual([]);
    });

    it('rejects zero where a positive value is required', () => {
      expect(validateCliOptions({ timeout: '0' }, fileExists)).toEqual([
        { field: '--timeout', message: 'Invalid value "0" for --timeout. Must be a positive integer.' },
      ]);
    });

    it('allows zero for --delay and --retries', () => {
      expect(validateCliOptions({ delay: '0', retries: '0' }, fileExists)).toEqual([]);
    });

    it('rejects fractions and negatives', () => {
      expect(validateCliOptions({ concurrency: '1.5', retries: '-1' }, fileExists)).toEqual([
        { field: '--concurrency', message: 'Invalid value "1.5" for --concurrency. Must be a positive integer.' },
        { field: '--retries', message: 'Invalid value "-1" for --retries. Must be a non-negative integer.' },
      ]);
    });

    it('rejects non-numeric input', () => {
      const errors = validateCliOptions({ delay: 'abc' }, fileExists);
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('Invalid value "abc" for --delay. Must be a non-negative integer.');
    });
  });

  // ─── URLs and files ────────────────────────────────────────────

  describe('--base-url', () => {
    it('accepts http and https URLs', () => {
      expect(validateCliOptions({ baseUrl: 'http://localhost:8080' }, fileExists)).toEqual([]);
      expect(validateCliOptions({ baseUrl: 'https://staging.example.com/api' }, fileExists)).toEqual([]);
    });

    it('rejects other schemes and garbage', () => {
      expect(validateCliOptions({ baseUrl: 'ftp://example.com' }, fileExists)).toEqual([
        { field: '--base-url', message: 'Invalid URL "ftp://example.com". Must be an http:// or https:// URL.' },
      ]);
      expect(validateCliOptions({ baseUrl: 'not a url' }, fileExists)).toHaveLength(1);
    });
  });

  describe('file paths', () => {
    it('accepts existing paths', () => {
      expect(validateCliOptions({ log: '/exists/build.log', source: '/exists/app' }, fileExists)).toEqual([]);
    });

    it('reports each missing path', () => {
      expect(validateCliOptions({ log: '/missing/build.log', snippet: '/missing/snippet.py' }, fileExists)).toEqual([
        { field: '--log', message: 'File not found: /missing/build.log' },
        { field: '--snippet', message: 'File not found: /missing/snippet.py' },
      ]);
    });
  });

  it('collects errors from several options at once', () => {
    const errors = validateCliOptions({ profile: 'turbo', timeout: 'x', log: '/missing' }, fileExists);
    expect(errors.map((e) => e.field)).toEqual(['--profile', '--timeout', '--log']);
  });
});
