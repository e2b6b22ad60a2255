import type { Diagnostic, Route } from '../discovery/types.js';
import { routeKey } from '../discovery/types.js';
import { ConfigurationError } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { buildProbeUrl, fillTemplate } from './placeholder.js';
import { probeMethodFor, probeOnce } from './probe.js';
import type { RouteCheckResult, VerificationProfile, VerificationResult, VerifyOptions } from './types.js';

export const VERIFICATION_PROFILES: Record<VerificationProfile, Pick<VerifyOptions, 'concurrency' | 'minDelayMs'>> = {
  gentle: { concurrency: 1, minDelayMs: 500 },
  standard: { concurrency: 4, minDelayMs: 100 },
  fast: { concurrency: 8, minDelayMs: 20 },
};

export const DEFAULT_VERIFY_OPTIONS: Omit<VerifyOptions, 'baseUrl'> = {
  timeoutMs: 5000,
  retries: 1,
  probeUnsafeMethods: false,
  placeholders: {},
  ...VERIFICATION_PROFILES.standard,
};

export function parseBaseUrl(baseUrl: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    throw new ConfigurationError(`Invalid base URL: ${baseUrl}`, 'baseUrl');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`Only HTTP/HTTPS base URLs are supported: ${baseUrl}`, 'baseUrl');
  }
  return parsed;
}

/**
 * Probe every route against a running deployment.
 *
 * Results come back in input order. When `signal` aborts, probes that had
 * not finished are dropped and `cancelled` is set.
 */
export async function verifyRoutes(routes: readonly Route[], options: VerifyOptions): Promise<VerificationResult> {
  parseBaseUrl(options.baseUrl);
  const fetchImpl = options.fetch ?? fetch;
  const limiter = new RateLimiter({ minDelayMs: options.minDelayMs });
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const retries = Math.max(0, Math.floor(options.retries));

  const slots: (RouteCheckResult | undefined)[] = new Array(routes.length);
  const diagnostics: Diagnostic[] = [];
  let nextIndex = 0;

  const checkRoute = async (route: Route): Promise<RouteCheckResult | undefined> => {
    const url = buildProbeUrl(options.baseUrl, fillTemplate(route, options.placeholders));
    const probeMethod = probeMethodFor(route.method, options.probeUnsafeMethods);

    for (let attempt = 1; ; attempt++) {
      try {
        await limiter.acquire(options.signal);
      } catch (err) {
        if (options.signal?.aborted) return undefined;
        throw err;
      }
      const checkedAt = new Date().toISOString();
      const outcome = await probeOnce({ url, method: probeMethod, timeoutMs: options.timeoutMs, signal: options.signal, fetch: fetchImpl });

      if (outcome.kind === 'cancelled') return undefined;
      if (outcome.kind === 'response') {
        limiter.recordResponse(outcome.httpStatusCode);
        log.debug(`${probeMethod} ${url} -> ${outcome.httpStatusCode} (${outcome.latencyMs}ms)`);
        return {
          route,
          status: outcome.status,
          httpStatusCode: outcome.httpStatusCode,
          latencyMs: outcome.latencyMs,
          checkedAt,
          url,
          probeMethod,
          attempts: attempt,
        };
      }

      if (attempt <= retries) {
        log.debug(`${probeMethod} ${url} failed (${outcome.error}), retrying`);
        continue;
      }
      diagnostics.push({
        kind: 'NetworkFailure',
        step: 'verify',
        route: routeKey(route),
        message: `${probeMethod} ${url}: ${outcome.error} after ${attempt} attempt(s)`,
      });
      return {
        route,
        status: outcome.status,
        latencyMs: outcome.latencyMs,
        checkedAt,
        url,
        probeMethod,
        attempts: attempt,
        error: outcome.error,
      };
    }
  };

  const worker = async (): Promise<void> => {
    while (nextIndex < routes.length && !options.signal?.aborted) {
      const index = nextIndex;
      nextIndex += 1;
      slots[index] = await checkRoute(routes[index]);
    }
  };

  log.info(`Verifying ${routes.length} routes against ${options.baseUrl}`);
  await Promise.all(Array.from({ length: Math.min(concurrency, routes.length) }, () => worker()));

  const results = slots.filter((r): r is RouteCheckResult => r !== undefined);
  const cancelled = options.signal?.aborted === true && results.length < routes.length;
  if (cancelled) {
    diagnostics.push({
      kind: 'Cancelled',
      step: 'verify',
      message: `Verification cancelled after ${results.length} of ${routes.length} routes`,
    });
  }

  const stats = limiter.getStats();
  log.info(`Verified ${results.length} routes (${stats.totalRequests} requests, ${stats.backoffs} backoffs)`);
  return { results, diagnostics, cancelled };
}

export { buildProbeUrl, fillTemplate, DEFAULT_PLACEHOLDERS } from './placeholder.js';
export { classifyStatus, probeMethodFor } from './probe.js';
export type * from './types.js';
