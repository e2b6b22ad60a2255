import { describe, it, expect, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import {
  AnthropicBackend,
  classifyBackendError,
  createBackendFromEnv,
  parseJsonResponse,
} from '../../src/ai/client.js';

vi.mock('../../src/utils/logger.js', () => ({
  log: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('parseJsonResponse', () => {
  it('parses plain JSON', () => {
    expect(parseJsonResponse('{"summary": "x"}')).toEqual({ summary: 'x' });
  });

  it('parses JSON in a markdown code block', () => {
    expect(parseJsonResponse('```json\n{"summary": "x"}\n```')).toEqual({ summary: 'x' });
    expect(parseJsonResponse('```\n{"summary": "x"}\n```')).toEqual({ summary: 'x' });
  });

  it('extracts JSON from surrounding text', () => {
    expect(parseJsonResponse('Here is the fix: {"summary": "x"} Hope this helps!')).toEqual({ summary: 'x' });
    expect(parseJsonResponse('Steps: [1, 2, 3] as requested.')).toEqual([1, 2, 3]);
  });

  it('closes an unclosed array and object', () => {
    expect(parseJsonResponse('{"summary": "x", "steps": ["a", "b"')).toEqual({ summary: 'x', steps: ['a', 'b'] });
  });

  it('drops a trailing comma', () => {
    expect(parseJsonResponse('{"summary": "x",')).toEqual({ summary: 'x' });
  });

  it('closes a cut-off string', () => {
    expect(parseJsonResponse('{"summary": "x", "suggestedFix": "add a col')).toEqual({ summary: 'x', suggestedFix: 'add a col' });
  });

  it('drops a key that has no value yet', () => {
    expect(parseJsonResponse('{"summary": "x", "steps":')).toEqual({ summary: 'x' });
  });

  it('returns null when there is no JSON', () => {
    expect(parseJsonResponse('not json at all')).toBeNull();
    expect(parseJsonResponse('')).toBeNull();
    expect(parseJsonResponse('   ')).toBeNull();
  });
});

describe('classifyBackendError', () => {
  it('retries rate limits and reports the quota', () => {
    const result = classifyBackendError(new Anthropic.APIError(429, undefined, 'slow down', undefined));
    expect(result).toMatchObject({ kind: 'transient', quotaExceeded: true });
  });

  it('retries server errors', () => {
    expect(classifyBackendError(new Anthropic.APIError(529, undefined, 'overloaded', undefined)).kind).toBe('transient');
    expect(classifyBackendError(new Anthropic.APIError(408, undefined, 'timeout', undefined)).kind).toBe('transient');
  });

  it('does not retry a rejected request', () => {
    expect(classifyBackendError(new Anthropic.APIError(400, undefined, 'bad model', undefined)).kind).toBe('permanent');
    expect(classifyBackendError(new Anthropic.APIError(401, undefined, 'bad key', undefined)).kind).toBe('permanent');
  });

  it('retries connection failures and timeouts', () => {
    expect(classifyBackendError(new Anthropic.APIConnectionTimeoutError())).toEqual({ kind: 'transient', reason: 'request timed out' });
    expect(classifyBackendError(new Anthropic.APIConnectionError({ message: 'socket hang up' }))).toEqual({
      kind: 'transient',
      reason: 'connection error: socket hang up',
    });
    expect(classifyBackendError(new DOMException('timed out', 'TimeoutError'))).toEqual({
      kind: 'transient',
      reason: 'request timed out',
    });
  });

  it('treats a failed fetch as transient', () => {
    expect(classifyBackendError(new TypeError('fetch failed'))).toEqual({
      kind: 'transient',
      reason: 'connection error: fetch failed',
    });
  });

  it('treats anything else as permanent', () => {
    expect(classifyBackendError(new Error('boom'))).toEqual({ kind: 'permanent', reason: 'boom' });
  });
});

describe('createBackendFromEnv', () => {
  it('returns null without an API key', () => {
    expect(createBackendFromEnv(undefined, {})).toBeNull();
  });

  it('builds an Anthropic backend when a key is set', () => {
    const backend = createBackendFromEnv('claude-test-model', { ANTHROPIC_API_KEY: 'test-secret' });
    expect(backend).toBeInstanceOf(AnthropicBackend);
    expect(backend?.name).toBe('anthropic');
  });
});
