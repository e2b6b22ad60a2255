import type { ErrorSignature } from '../analysis/types.js';
import type { Diagnostic } from '../discovery/types.js';
import { SuggestionUnavailableError } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { delay, isRecord } from '../utils/shared.js';
import { classifyBackendError, parseJsonResponse } from './client.js';
import { fallbackSuggestion } from './fallback.js';
import { SUGGESTION_SYSTEM_PROMPT, buildSuggestionPrompt } from './prompts.js';
import type { AttemptResult, Suggestion, SuggestionBackend } from './types.js';

export interface SuggestOptions {
  /** null runs the rule table directly */
  backend: SuggestionBackend | null;
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  /** Per-request timeout */
  timeoutMs: number;
  maxContextChars: number;
  maxTokens: number;
  /** When false, an unusable backend is an error instead of a rule-based suggestion */
  fallback: boolean;
  /** Caller's overall budget */
  signal?: AbortSignal;
  now?: () => Date;
}

export const DEFAULT_SUGGEST_OPTIONS: Omit<SuggestOptions, 'backend'> = {
  maxRetries: 2,
  initialBackoffMs: 500,
  maxBackoffMs: 8000,
  timeoutMs: 30000,
  maxContextChars: 4000,
  maxTokens: 1024,
  fallback: true,
};

export interface SuggestionOutcome {
  suggestion: Suggestion;
  diagnostics: Diagnostic[];
}

export function backoffDelay(retry: number, initialMs: number, maxMs: number): number {
  return Math.min(initialMs * 2 ** retry, maxMs);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string' && v.trim() !== '') : [];
}

/**
 * Read a model answer. JSON answers carry their own certainty; free text
 * becomes a Medium suggestion whose first line is the summary.
 */
export function parseModelAnswer(
  text: string,
  fingerprint: string,
  attempts: number,
  now: () => Date = () => new Date(),
): Suggestion | undefined {
  const base = { fingerprint, generatedBy: 'Model' as const, generatedAt: now().toISOString(), attempts };
  const parsed = parseJsonResponse(text);

  if (isRecord(parsed)) {
    const summary = typeof parsed.summary === 'string' ? parsed.summary.trim() : '';
    const suggestedFix = typeof parsed.suggestedFix === 'string' ? parsed.suggestedFix.trim() : '';
    if (!summary && !suggestedFix) return undefined;
    const certain = parsed.certain === true || (typeof parsed.confidence === 'string' && parsed.confidence.toLowerCase() === 'high');
    const codeExample = typeof parsed.codeExample === 'string' && parsed.codeExample.trim() ? parsed.codeExample : undefined;
    return {
      ...base,
      summary: summary || suggestedFix.split('\n')[0],
      suggestedFix: suggestedFix || summary,
      steps: stringList(parsed.steps),
      ...(codeExample ? { codeExample } : {}),
      confidence: certain ? 'High' : 'Medium',
    };
  }

  const trimmed = text.trim();
  if (!trimmed) return undefined;
  const [firstLine] = trimmed.split(/\r?\n/);
  return { ...base, summary: firstLine.trim(), suggestedFix: trimmed, steps: [], confidence: 'Medium' };
}

/**
 * Ask the backend for a fix, retrying transient failures with exponential
 * backoff, and fall back to the rule table when that does not work out.
 */
export async function generateSuggestion(signature: ErrorSignature, options: SuggestOptions): Promise<SuggestionOutcome> {
  const now = options.now ?? (() => new Date());
  const diagnostics: Diagnostic[] = [];
  const signal = options.signal ?? new AbortController().signal;
  const { backend } = options;

  const giveUp = (reason: string, attempts: number): SuggestionOutcome => {
    if (!options.fallback) {
      throw new SuggestionUnavailableError(`No suggestion for ${signature.fingerprint}: ${reason}`, signature.fingerprint);
    }
    log.info(`Using rule-based suggestion (${reason})`);
    return { suggestion: fallbackSuggestion(signature, attempts, now), diagnostics };
  };

  if (!backend) {
    return giveUp('no generative backend configured', 0);
  }

  const request = {
    system: SUGGESTION_SYSTEM_PROMPT,
    prompt: buildSuggestionPrompt(signature, options.maxContextChars),
    maxTokens: options.maxTokens,
    timeoutMs: options.timeoutMs,
  };

  let attempts = 0;
  let retries = 0;
  let reason = 'backend unavailable';
  let quotaReported = false;

  while (!signal.aborted) {
    attempts += 1;
    let result: AttemptResult;
    try {
      result = await backend.complete(request, signal);
    } catch (err) {
      // Backends should report failures as results; a thrown error is mapped the same way
      result = classifyBackendError(err);
    }

    if (result.kind === 'success') {
      const suggestion = parseModelAnswer(result.text, signature.fingerprint, attempts, now);
      if (suggestion) {
        log.info(`Suggestion from ${backend.name} after ${attempts} attempt(s)`);
        return { suggestion, diagnostics };
      }
      reason = 'unusable response';
      break;
    }

    reason = result.reason;
    if (result.kind === 'permanent') break;

    if (result.quotaExceeded && !quotaReported) {
      quotaReported = true;
      diagnostics.push({ kind: 'BackendQuotaExceeded', step: 'suggest', message: result.reason });
    }
    if (retries >= options.maxRetries) {
      reason = `${result.reason} (after ${attempts} attempts)`;
      break;
    }

    const wait = backoffDelay(retries, options.initialBackoffMs, options.maxBackoffMs);
    retries += 1;
    log.debug(`${backend.name}: ${result.reason}, retrying in ${wait}ms`);
    try {
      await delay(wait, signal);
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  }

  if (signal.aborted) {
    const timedOut = signal.reason instanceof Error && signal.reason.name === 'TimeoutError';
    reason = timedOut ? 'suggestion budget exhausted' : 'cancelled';
    diagnostics.push({ kind: timedOut ? 'BackendUnavailable' : 'Cancelled', step: 'suggest', message: `${backend.name}: ${reason}` });
  } else {
    diagnostics.push({ kind: 'BackendUnavailable', step: 'suggest', message: `${backend.name}: ${reason}` });
  }
  return giveUp(reason, attempts);
}
