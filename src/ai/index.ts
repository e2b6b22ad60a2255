export { generateSuggestion, parseModelAnswer, backoffDelay, DEFAULT_SUGGEST_OPTIONS } from './suggester.js';
export type { SuggestOptions, SuggestionOutcome } from './suggester.js';
export { fallbackSuggestion } from './fallback.js';
export { AnthropicBackend, createBackendFromEnv, classifyBackendError, parseJsonResponse } from './client.js';
export type { AttemptResult, BackendRequest, Suggestion, SuggestionBackend, SuggestionConfidence } from './types.js';
