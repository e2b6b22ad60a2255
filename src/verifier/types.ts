import type { Diagnostic, HttpMethod, Route } from '../discovery/types.js';

export type CheckStatus = 'OK' | 'UNREACHABLE' | 'ERROR_STATUS' | 'TIMEOUT';

export interface RouteCheckResult {
  route: Route;
  status: CheckStatus;
  httpStatusCode?: number;
  latencyMs: number;
  /** ISO-8601 */
  checkedAt: string;
  url: string;
  /** Method actually sent; OPTIONS stands in for unsafe methods */
  probeMethod: HttpMethod | 'OPTIONS';
  attempts: number;
  error?: string;
}

export type VerificationProfile = 'gentle' | 'standard' | 'fast';

export interface VerifyOptions {
  baseUrl: string;
  /** Per-probe timeout */
  timeoutMs: number;
  concurrency: number;
  /** Minimum spacing between probe starts */
  minDelayMs: number;
  /** Extra attempts after a network failure */
  retries: number;
  /** Send POST/PUT/DELETE/PATCH as-is instead of OPTIONS */
  probeUnsafeMethods: boolean;
  /** Values for path parameters, keyed by parameter name */
  placeholders: Record<string, string>;
  signal?: AbortSignal;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

export interface VerificationResult {
  results: RouteCheckResult[];
  diagnostics: Diagnostic[];
  cancelled: boolean;
}
