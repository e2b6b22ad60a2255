export type SuggestionConfidence = 'High' | 'Medium' | 'Low';
export type SuggestionSource = 'Model' | 'RuleFallback';

export interface Suggestion {
  fingerprint: string;
  summary: string;
  suggestedFix: string;
  /** Ordered, concrete actions */
  steps: string[];
  codeExample?: string;
  confidence: SuggestionConfidence;
  generatedBy: SuggestionSource;
  generatedAt: string;
  /** Backend attempts made before this suggestion was produced */
  attempts: number;
}

/** Outcome of one backend call. Errors are values here, never thrown. */
export type AttemptResult =
  | { kind: 'success'; text: string }
  | { kind: 'transient'; reason: string; quotaExceeded?: boolean }
  | { kind: 'permanent'; reason: string };

export interface BackendRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  timeoutMs: number;
}

export interface SuggestionBackend {
  readonly name: string;
  complete(request: BackendRequest, signal: AbortSignal): Promise<AttemptResult>;
}
