import { generateSuggestion, type Suggestion, type SuggestionBackend } from './ai/index.js';
import { createSignature } from './analysis/index.js';
import { snippetForFrame } from './analysis/snippet.js';
import type { ErrorSignature } from './analysis/types.js';
import type { DeployLensConfig } from './config/defaults.js';
import { discoverRoutes, type SourceInput } from './discovery/index.js';
import type { Diagnostic, DuplicateRoute, Route, SourceTree } from './discovery/types.js';
import { routeKey } from './discovery/types.js';
import { decideNotification, severityResolver, type HistoryView, type NotificationDecision } from './notify/index.js';
import { SuggestionUnavailableError } from './utils/errors.js';
import { log } from './utils/logger.js';
import { compareStrings, withTimeout } from './utils/shared.js';
import { verifyRoutes } from './verifier/index.js';
import type { RouteCheckResult } from './verifier/types.js';

export * from './ai/index.js';
export * from './notify/index.js';
export { createSignature } from './analysis/index.js';
export { discoverRoutes } from './discovery/index.js';
export { verifyRoutes } from './verifier/index.js';

export type BuildStatus = 'Success' | 'Failed';

export interface CommitInfo {
  sha: string;
  branch?: string;
  author?: string;
  message?: string;
}

export interface BuildOutcome {
  status: BuildStatus;
  rawLog: string;
  commit?: CommitInfo;
}

export interface PipelineInput {
  build: BuildOutcome;
  /** Source location or in-memory file map */
  source?: SourceInput;
  baseUrl?: string;
  /** Defaults to true when a base URL is given */
  verify?: boolean;
  codeSnippet?: string;
}

export interface PipelineDeps {
  config: DeployLensConfig;
  /** null keeps suggestions on the rule table */
  backend: SuggestionBackend | null;
  /** Snapshot taken by the caller; the pipeline never writes history */
  history: HistoryView;
  fetch?: typeof fetch;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface PipelineResult {
  routes: Route[];
  duplicates: DuplicateRoute[];
  checkResults: RouteCheckResult[];
  signature: ErrorSignature | null;
  suggestion: Suggestion | null;
  notify: NotificationDecision | null;
  diagnostics: Diagnostic[];
  commit: CommitInfo | null;
}

/** One line per failed route, sorted so the text (and its fingerprint) does not depend on probe order. */
export function describeFailedRoutes(results: readonly RouteCheckResult[]): string | null {
  const failed = results.filter((r) => r.status !== 'OK');
  if (failed.length === 0) return null;
  const lines = failed
    .map((r) => `${routeKey(r.route)} -> ${r.status}${r.httpStatusCode !== undefined ? ` ${r.httpStatusCode}` : ''}`)
    .sort(compareStrings);
  return lines.map((l) => `Route verification failed: ${l}`).join('\n');
}

/**
 * One build event, start to finish: extract routes, verify them when the
 * build succeeded, and on failure classify, suggest and decide whether to
 * notify. Partial results survive cancellation.
 */
export async function runPipeline(input: PipelineInput, deps: PipelineDeps): Promise<PipelineResult> {
  const { config, signal } = deps;
  const now = deps.now ?? (() => new Date());
  const diagnostics: Diagnostic[] = [];
  const result: PipelineResult = {
    routes: [],
    duplicates: [],
    checkResults: [],
    signature: null,
    suggestion: null,
    notify: null,
    diagnostics,
    commit: input.build.commit ?? null,
  };
  const cancelled = (step: Diagnostic['step']): boolean => {
    if (!signal?.aborted) return false;
    diagnostics.push({ kind: 'Cancelled', step, message: `Pipeline cancelled before ${step}` });
    return true;
  };

  // ─── Extract ───────────────────────────────────────────────
  let tree: SourceTree | undefined;
  if (input.source !== undefined) {
    const extraction = discoverRoutes(input.source, config.extraction);
    tree = extraction.tree;
    result.routes = extraction.routes;
    result.duplicates = extraction.duplicates;
    diagnostics.push(...extraction.diagnostics);
  }

  // ─── Verify ────────────────────────────────────────────────
  const wantsVerify = input.verify ?? input.baseUrl !== undefined;
  if (wantsVerify && input.build.status === 'Failed') {
    log.info('Build failed, skipping route verification');
  } else if (wantsVerify && !input.baseUrl) {
    diagnostics.push({ kind: 'ConfigurationError', step: 'verify', message: 'Route verification requested without a base URL' });
  } else if (wantsVerify && input.baseUrl && result.routes.length > 0) {
    if (cancelled('verify')) return result;
    const verification = await verifyRoutes(result.routes, {
      ...config.verification,
      baseUrl: input.baseUrl,
      ...(signal ? { signal } : {}),
      ...(deps.fetch ? { fetch: deps.fetch } : {}),
    });
    result.checkResults = verification.results;
    diagnostics.push(...verification.diagnostics);
    if (verification.cancelled) return result;
  }

  // ─── Analyze ───────────────────────────────────────────────
  const failureText = input.build.status === 'Failed' ? input.build.rawLog : describeFailedRoutes(result.checkResults);
  if (failureText === null) {
    log.info('No failure to analyze');
    return result;
  }
  if (cancelled('analyze')) return result;

  let signature = createSignature(failureText, {
    ...(input.codeSnippet ? { codeSnippet: input.codeSnippet } : {}),
    maxSnippetChars: config.analysis.maxSnippetChars,
    now,
  });
  if (!signature.codeSnippet && tree) {
    const snippet = snippetForFrame(tree, signature.anchor, config.analysis.snippetContextLines);
    if (snippet) {
      signature = createSignature(failureText, { codeSnippet: snippet, maxSnippetChars: config.analysis.maxSnippetChars, now });
    }
  }
  result.signature = signature;
  log.info(`Signature ${signature.fingerprint} (${signature.category})`);

  // ─── Suggest ───────────────────────────────────────────────
  if (!cancelled('suggest')) {
    try {
      const outcome = await generateSuggestion(signature, {
        ...config.suggestion,
        backend: config.suggestion.useAI ? deps.backend : null,
        signal: withTimeout(config.suggestion.budgetMs, signal),
        now,
      });
      result.suggestion = outcome.suggestion;
      diagnostics.push(...outcome.diagnostics);
    } catch (err) {
      // Only reachable with the rule fallback disabled; the decision below still runs
      if (!(err instanceof SuggestionUnavailableError)) throw err;
      log.warn(err.message);
      diagnostics.push({ kind: 'BackendUnavailable', step: 'suggest', message: err.message });
    }
  }

  // ─── Notify ────────────────────────────────────────────────
  result.notify = decideNotification(signature, deps.history, {
    suppressionWindowMs: config.notification.suppressionWindowMs,
    minSeverity: config.notification.minSeverity,
    maxPerWindow: config.notification.maxPerWindow,
    rateLimitWindowMs: config.notification.rateLimitWindowMs,
    severityOf: severityResolver(config.notification.severities),
    now,
  });
  log.info(`Notify: ${result.notify.shouldNotify ? 'yes' : 'no'} (${result.notify.reason})`);

  return result;
}
