import type { ErrorCategory } from '../analysis/types.js';
import type { CollisionPolicy } from '../discovery/index.js';
import type { FrameworkKind } from '../discovery/types.js';
import type { Severity } from '../notify/severity.js';
import { ONE_HOUR_MS } from '../notify/policy.js';
import type { VerificationProfile } from '../verifier/types.js';
import { VERIFICATION_PROFILES } from '../verifier/index.js';
import { ConfigurationError } from '../utils/errors.js';

export interface ExtractionConfig {
  framework?: FrameworkKind;
  minConfidence: number;
  collisionPolicy: CollisionPolicy;
  maxFileBytes: number;
  ignoreDirs?: string[];
}

export interface VerificationConfig {
  profile: VerificationProfile;
  timeoutMs: number;
  concurrency: number;
  minDelayMs: number;
  retries: number;
  probeUnsafeMethods: boolean;
  placeholders: Record<string, string>;
}

export interface AnalysisConfig {
  maxSnippetChars: number;
  snippetContextLines: number;
}

export interface SuggestionConfig {
  /** false skips the generative backend entirely (`--no-ai`) */
  useAI: boolean;
  model?: string;
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  timeoutMs: number;
  /** Wall-clock budget for the whole suggestion step */
  budgetMs: number;
  maxContextChars: number;
  maxTokens: number;
  fallback: boolean;
}

export interface NotificationConfig {
  suppressionWindowMs: number;
  minSeverity: Severity;
  maxPerWindow: number;
  rateLimitWindowMs: number;
  severities: Partial<Record<ErrorCategory, Severity>>;
}

export interface DeployLensConfig {
  extraction: ExtractionConfig;
  verification: VerificationConfig;
  analysis: AnalysisConfig;
  suggestion: SuggestionConfig;
  notification: NotificationConfig;
}

/** Every section optional, every field inside optional. */
export type ConfigOverrides = {
  [K in keyof DeployLensConfig]?: Partial<DeployLensConfig[K]>;
};

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`, name);
  }
  return parsed;
}

/**
 * Defaults, then the verification profile, then environment variables, then
 * explicit overrides (config file and CLI flags, already merged by the caller).
 */
export function buildConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): DeployLensConfig {
  const profile = overrides.verification?.profile ?? 'standard';
  const profileSettings = VERIFICATION_PROFILES[profile];
  const envTimeout = envInt(env, 'DEPLOYLENS_TIMEOUT_MS');
  const envWindow = envInt(env, 'DEPLOYLENS_SUPPRESSION_WINDOW_MS');

  return {
    extraction: {
      minConfidence: 0.3,
      collisionPolicy: 'highest',
      maxFileBytes: 1_000_000,
      ...overrides.extraction,
    },
    verification: {
      timeoutMs: envTimeout ?? 5000,
      retries: 1,
      probeUnsafeMethods: false,
      placeholders: {},
      ...profileSettings,
      ...overrides.verification,
      profile,
    },
    analysis: {
      maxSnippetChars: 2000,
      snippetContextLines: 5,
      ...overrides.analysis,
    },
    suggestion: {
      useAI: true,
      ...(env.DEPLOYLENS_MODEL ? { model: env.DEPLOYLENS_MODEL } : {}),
      maxRetries: 2,
      initialBackoffMs: 500,
      maxBackoffMs: 8000,
      timeoutMs: 30000,
      budgetMs: 60000,
      maxContextChars: 4000,
      maxTokens: 1024,
      fallback: true,
      ...overrides.suggestion,
    },
    notification: {
      suppressionWindowMs: envWindow ?? ONE_HOUR_MS,
      minSeverity: 'low',
      maxPerWindow: 0,
      rateLimitWindowMs: ONE_HOUR_MS,
      severities: {},
      ...overrides.notification,
    },
  };
}

/** Section-wise merge; later sources win field by field. */
export function mergeOverrides(...sources: (ConfigOverrides | null | undefined)[]): ConfigOverrides {
  const merged: ConfigOverrides = {};
  for (const source of sources) {
    if (!source) continue;
    merged.extraction = { ...merged.extraction, ...source.extraction };
    merged.verification = { ...merged.verification, ...source.verification };
    merged.analysis = { ...merged.analysis, ...source.analysis };
    merged.suggestion = { ...merged.suggestion, ...source.suggestion };
    merged.notification = { ...merged.notification, ...source.notification };
  }
  return merged;
}
