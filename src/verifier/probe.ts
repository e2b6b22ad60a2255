import type { HttpMethod } from '../discovery/types.js';
import { errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/shared.js';
import type { CheckStatus } from './types.js';

export type ProbeOutcome =
  | { kind: 'response'; status: CheckStatus; httpStatusCode: number; latencyMs: number }
  | { kind: 'network'; status: 'TIMEOUT' | 'UNREACHABLE'; error: string; latencyMs: number }
  | { kind: 'cancelled' };

export interface ProbeRequest {
  url: string;
  method: HttpMethod | 'OPTIONS';
  timeoutMs: number;
  signal?: AbortSignal;
  fetch: typeof fetch;
}

export function probeMethodFor(method: HttpMethod, probeUnsafeMethods: boolean): HttpMethod | 'OPTIONS' {
  if (method === 'GET' || method === 'ANY') return 'GET';
  return probeUnsafeMethods ? method : 'OPTIONS';
}

export function classifyStatus(code: number): CheckStatus {
  return code >= 200 && code < 400 ? 'OK' : 'ERROR_STATUS';
}

function describeNetworkError(err: unknown): string {
  const message = errorMessage(err);
  if (err instanceof Error && err.cause instanceof Error) {
    return `${message}: ${err.cause.message}`;
  }
  return message;
}

/** One HTTP request. Redirects are reported, not followed. */
export async function probeOnce(request: ProbeRequest): Promise<ProbeOutcome> {
  const started = performance.now();
  const elapsed = () => Math.round(performance.now() - started);
  try {
    const response = await request.fetch(request.url, {
      method: request.method,
      redirect: 'manual',
      signal: withTimeout(request.timeoutMs, request.signal),
    });
    const latencyMs = elapsed();
    await response.body?.cancel();
    return {
      kind: 'response',
      status: classifyStatus(response.status),
      httpStatusCode: response.status,
      latencyMs,
    };
  } catch (err) {
    if (request.signal?.aborted) return { kind: 'cancelled' };
    const latencyMs = elapsed();
    if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
      return { kind: 'network', status: 'TIMEOUT', error: `No response within ${request.timeoutMs}ms`, latencyMs };
    }
    return { kind: 'network', status: 'UNREACHABLE', error: describeNetworkError(err), latencyMs };
  }
}
