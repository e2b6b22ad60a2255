import { createHash } from 'node:crypto';
import { truncate } from '../utils/shared.js';
import { anchorKey, parseFrames, reportedLocation, selectAnchor } from './frames.js';
import { findErrorLine, skeleton, stripVolatile } from './normalize.js';
import { classify } from './rules.js';
import type { ErrorCategory, ErrorSignature, StackFrame } from './types.js';

export const DEFAULT_MAX_SNIPPET_CHARS = 2000;

export interface SignatureOptions {
  codeSnippet?: string;
  maxSnippetChars?: number;
  now?: () => Date;
}

export function computeFingerprint(category: ErrorCategory, anchor: StackFrame | undefined, messageSkeleton: string): string {
  const input = `${category}|${anchorKey(anchor)}|${messageSkeleton}`;
  return createHash('sha256').update(input).digest('hex').substring(0, 16);
}

/**
 * Turn raw error text (a build log or a stack trace) into a signature whose
 * fingerprint survives changes in addresses, ids, timestamps and line numbers.
 */
export function createSignature(rawMessage: string, options: SignatureOptions = {}): ErrorSignature {
  const now = options.now ?? (() => new Date());
  const { line, errorType } = findErrorLine(rawMessage);
  const frames = parseFrames(rawMessage);
  const { anchor, fromDependency } = selectAnchor(frames);

  const category: ErrorCategory = fromDependency ? 'DependencyError' : classify(rawMessage);
  const messageSkeleton = skeleton(line);
  const location = reportedLocation(rawMessage);
  const snippet = options.codeSnippet
    ? truncate(options.codeSnippet, options.maxSnippetChars ?? DEFAULT_MAX_SNIPPET_CHARS)
    : undefined;

  return {
    category,
    fingerprint: computeFingerprint(category, anchor, messageSkeleton),
    rawMessage,
    ...(errorType ? { errorType } : {}),
    normalizedMessage: stripVolatile(line).trim(),
    ...(anchor ? { anchor } : {}),
    ...(location ? { location } : {}),
    ...(snippet ? { codeSnippet: snippet } : {}),
    occurredAt: now().toISOString(),
  };
}

export { classify, CATEGORY_RULES } from './rules.js';
export { parseFrames, selectAnchor, isLibraryPath } from './frames.js';
export { findErrorLine, skeleton, stripVolatile } from './normalize.js';
export { ERROR_CATEGORIES } from './types.js';
export type { ErrorCategory, ErrorSignature, StackFrame } from './types.js';
