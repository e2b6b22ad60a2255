import { existsSync } from 'node:fs';
import { FRAMEWORK_KINDS } from '../discovery/types.js';

export const VALID_PROFILES = ['gentle', 'standard', 'fast'] as const;
export const VALID_FORMATS = ['json', 'terminal'] as const;
export const VALID_BUILD_STATUSES = ['Success', 'Failed'] as const;

export interface CliValidationError {
  field: string;
  message: string;
}

/** Raw option strings as commander hands them over. */
export interface CliOptions {
  format?: string;
  framework?: string;
  profile?: string;
  timeout?: string;
  concurrency?: string;
  delay?: string;
  retries?: string;
  baseUrl?: string;
  status?: string;
  log?: string;
  snippet?: string;
  source?: string;
}

function checkInteger(
  errors: CliValidationError[],
  field: string,
  value: string | undefined,
  { allowZero }: { allowZero: boolean },
): void {
  if (value === undefined) return;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || (!allowZero && n === 0)) {
    errors.push({
      field,
      message: `Invalid value "${value}" for ${field}. Must be a ${allowZero ? 'non-negative' : 'positive'} integer.`,
    });
  }
}

function checkOneOf(errors: CliValidationError[], field: string, value: string | undefined, allowed: readonly string[]): void {
  if (value !== undefined && !allowed.includes(value)) {
    errors.push({ field, message: `Invalid value "${value}" for ${field}. Must be one of: ${allowed.join(', ')}` });
  }
}

/**
 * Validates CLI options and returns an array of errors (empty if all valid).
 * Uses a fileExists function for testability (defaults to fs.existsSync).
 */
export function validateCliOptions(
  options: CliOptions,
  fileExists: (path: string) => boolean = existsSync,
): CliValidationError[] {
  const errors: CliValidationError[] = [];

  checkOneOf(errors, '--format', options.format, VALID_FORMATS);
  checkOneOf(errors, '--framework', options.framework, FRAMEWORK_KINDS);
  checkOneOf(errors, '--profile', options.profile, VALID_PROFILES);
  checkOneOf(errors, '--status', options.status, VALID_BUILD_STATUSES);

  checkInteger(errors, '--timeout', options.timeout, { allowZero: false });
  checkInteger(errors, '--concurrency', options.concurrency, { allowZero: false });
  checkInteger(errors, '--delay', options.delay, { allowZero: true });
  checkInteger(errors, '--retries', options.retries, { allowZero: true });

  if (options.baseUrl !== undefined) {
    let protocol: string | undefined;
    try {
      protocol = new URL(options.baseUrl).protocol;
    } catch {
      protocol = undefined;
    }
    if (protocol !== 'http:' && protocol !== 'https:') {
      errors.push({ field: '--base-url', message: `Invalid URL "${options.baseUrl}". Must be an http:// or https:// URL.` });
    }
  }

  for (const [field, path] of [
    ['--log', options.log],
    ['--snippet', options.snippet],
    ['--source', options.source],
  ] as const) {
    if (path !== undefined && !fileExists(path)) {
      errors.push({ field, message: `File not found: ${path}` });
    }
  }

  return errors;
}
