import Anthropic from '@anthropic-ai/sdk';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import type { AttemptResult, BackendRequest, SuggestionBackend } from './types.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

/** Statuses worth another attempt after a pause */
const TRANSIENT_STATUSES = new Set([408, 409, 429]);

/** Map anything the SDK throws onto an attempt outcome. */
export function classifyBackendError(err: unknown): Exclude<AttemptResult, { kind: 'success' }> {
  if (err instanceof Anthropic.APIUserAbortError) {
    return { kind: 'transient', reason: 'request aborted' };
  }
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return { kind: 'transient', reason: 'request timed out' };
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return { kind: 'transient', reason: `connection error: ${err.message}` };
  }
  if (err instanceof Anthropic.APIError) {
    const status = err.status;
    if (status === 429) {
      return { kind: 'transient', reason: `rate limited (429): ${err.message}`, quotaExceeded: true };
    }
    if (status !== undefined && (TRANSIENT_STATUSES.has(status) || status >= 500)) {
      return { kind: 'transient', reason: `server error (${status}): ${err.message}` };
    }
    return { kind: 'permanent', reason: `request rejected (${status ?? 'no status'}): ${err.message}` };
  }
  if (err instanceof TypeError && err.message === 'fetch failed') {
    return { kind: 'transient', reason: 'connection error: fetch failed' };
  }
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return { kind: 'transient', reason: 'request timed out' };
  }
  return { kind: 'permanent', reason: errorMessage(err) };
}

export interface AnthropicBackendOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
}

/**
 * Messages API backend. The SDK's own retries are off: the suggestion
 * generator owns retry and backoff.
 */
export class AnthropicBackend implements SuggestionBackend {
  readonly name = 'anthropic';
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly temperature: number;

  constructor(options: AnthropicBackendOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? 0.1;
  }

  async complete(request: BackendRequest, signal: AbortSignal): Promise<AttemptResult> {
    try {
      const message = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: this.temperature,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal, timeout: request.timeoutMs },
      );

      log.debug(`Anthropic usage: ${message.usage.input_tokens} in, ${message.usage.output_tokens} out`);

      const textBlock = message.content.find((b) => b.type === 'text');
      if (!textBlock || textBlock.type !== 'text' || textBlock.text.trim() === '') {
        return { kind: 'permanent', reason: 'response had no text content' };
      }
      return { kind: 'success', text: textBlock.text };
    } catch (err) {
      const result = classifyBackendError(err);
      log.debug(`Anthropic attempt failed (${result.kind}): ${result.reason}`);
      return result;
    }
  }
}

/** A backend when `ANTHROPIC_API_KEY` is set, otherwise null. */
export function createBackendFromEnv(model?: string, env: NodeJS.ProcessEnv = process.env): SuggestionBackend | null {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    log.debug('ANTHROPIC_API_KEY not set, suggestions come from the rule table');
    return null;
  }
  const chosen = model ?? env.DEPLOYLENS_MODEL;
  return new AnthropicBackend({ apiKey, ...(chosen ? { model: chosen } : {}) });
}

/**
 * Parse a JSON response from the model, handling markdown code blocks and
 * truncated JSON. Returns null when nothing parseable is found.
 */
export function parseJsonResponse(text: string): unknown {
  let jsonStr = text.trim();

  const fenced = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    jsonStr = fenced[1].trim();
  }

  // Text before/after the JSON body
  if (!jsonStr.startsWith('{') && !jsonStr.startsWith('[')) {
    const startObj = jsonStr.indexOf('{');
    const startArr = jsonStr.indexOf('[');
    const start = startObj === -1 ? startArr : startArr === -1 ? startObj : Math.min(startObj, startArr);
    const end = Math.max(jsonStr.lastIndexOf('}'), jsonStr.lastIndexOf(']'));
    if (start === -1) return null;
    jsonStr = end > start ? jsonStr.slice(start, end + 1) : jsonStr.slice(start);
  }

  try {
    return JSON.parse(jsonStr);
  } catch (err) {
    log.debug(`JSON parse failed: ${errorMessage(err)}`);
  }

  const recovered = recoverTruncatedJson(jsonStr);
  if (recovered === null) return null;
  try {
    return JSON.parse(recovered);
  } catch (err) {
    log.debug(`JSON recovery failed: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Close what a cut-off response left open: a dangling string, unclosed
 * brackets, trailing commas.
 */
function recoverTruncatedJson(input: string): string | null {
  let str = input.trim().replace(/,\s*$/, '');

  const stack: string[] = [];
  let inString = false;
  let escape = false;

  for (const ch of str) {
    if (escape) {
      escape = false;
      continue;
    }
    if (ch === '\\' && inString) {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (ch === '{' || ch === '[') {
      stack.push(ch);
    } else if ((ch === '}' && stack[stack.length - 1] === '{') || (ch === ']' && stack[stack.length - 1] === '[')) {
      stack.pop();
    }
  }

  if (stack.length === 0 && !inString) return null;

  if (inString) str += '"';
  str = str.replace(/,\s*$/, '');
  // A key with no value yet
  str = str.replace(/,?\s*"[^"]*"\s*:\s*$/, '');

  while (stack.length > 0) {
    const open = stack.pop();
    str = str.replace(/,\s*$/, '');
    str += open === '{' ? '}' : ']';
  }

  log.debug('Recovered truncated JSON');
  return str;
}
