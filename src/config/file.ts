import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ERROR_CATEGORIES } from '../analysis/types.js';
import { FRAMEWORK_KINDS } from '../discovery/types.js';
import { isSeverity } from '../notify/severity.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { isRecord } from '../utils/shared.js';
import type {
  AnalysisConfig,
  ConfigOverrides,
  ExtractionConfig,
  NotificationConfig,
  SuggestionConfig,
  VerificationConfig,
} from './defaults.js';

const CONFIG_FILE_NAMES = ['.deploylensrc.json', 'deploylens.config.json'] as const;
const PROFILES = ['gentle', 'standard', 'fast'] as const;
const COLLISION_POLICIES = ['highest', 'merge'] as const;

class SectionReader {
  constructor(
    private readonly values: Record<string, unknown>,
    private readonly where: string,
  ) {}

  private fail(key: string, expected: string): ConfigurationError {
    return new ConfigurationError(`${this.where}.${key} must be ${expected}`, `${this.where}.${key}`);
  }

  number(key: string): number | undefined {
    const v = this.values[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'number' || !Number.isFinite(v) || v < 0) throw this.fail(key, 'a non-negative number');
    return v;
  }

  boolean(key: string): boolean | undefined {
    const v = this.values[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'boolean') throw this.fail(key, 'true or false');
    return v;
  }

  string(key: string): string | undefined {
    const v = this.values[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'string') throw this.fail(key, 'a string');
    return v;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T | undefined {
    const v = this.values[key];
    if (v === undefined) return undefined;
    const match = allowed.find((a) => a === v);
    if (match === undefined) throw this.fail(key, `one of ${allowed.join(', ')}`);
    return match;
  }

  stringArray(key: string): string[] | undefined {
    const v = this.values[key];
    if (v === undefined) return undefined;
    if (!Array.isArray(v) || !v.every((s) => typeof s === 'string')) throw this.fail(key, 'an array of strings');
    return v.filter((s): s is string => typeof s === 'string');
  }

  stringRecord(key: string): Record<string, string> | undefined {
    const v = this.values[key];
    if (v === undefined) return undefined;
    if (!isRecord(v)) throw this.fail(key, 'an object of strings');
    const out: Record<string, string> = {};
    for (const [k, value] of Object.entries(v)) {
      if (typeof value !== 'string') throw this.fail(`${key}.${k}`, 'a string');
      out[k] = value;
    }
    return out;
  }
}

function section(raw: Record<string, unknown>, name: string): SectionReader | undefined {
  const value = raw[name];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigurationError(`Config section "${name}" must be an object`, name);
  }
  return new SectionReader(value, name);
}

/** Validate a parsed config object, keeping only the fields that are set. */
export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  if (!isRecord(raw)) throw new ConfigurationError('Config must be a JSON object');
  const overrides: ConfigOverrides = {};

  const ex = section(raw, 'extraction');
  if (ex) {
    const out: Partial<ExtractionConfig> = {};
    const framework = ex.oneOf('framework', FRAMEWORK_KINDS);
    if (framework) out.framework = framework;
    const minConfidence = ex.number('minConfidence');
    if (minConfidence !== undefined) out.minConfidence = minConfidence;
    const collisionPolicy = ex.oneOf('collisionPolicy', COLLISION_POLICIES);
    if (collisionPolicy) out.collisionPolicy = collisionPolicy;
    const maxFileBytes = ex.number('maxFileBytes');
    if (maxFileBytes !== undefined) out.maxFileBytes = maxFileBytes;
    const ignoreDirs = ex.stringArray('ignoreDirs');
    if (ignoreDirs) out.ignoreDirs = ignoreDirs;
    overrides.extraction = out;
  }

  const ver = section(raw, 'verification');
  if (ver) {
    const out: Partial<VerificationConfig> = {};
    const profile = ver.oneOf('profile', PROFILES);
    if (profile) out.profile = profile;
    for (const key of ['timeoutMs', 'concurrency', 'minDelayMs', 'retries'] as const) {
      const value = ver.number(key);
      if (value !== undefined) out[key] = value;
    }
    const probeUnsafeMethods = ver.boolean('probeUnsafeMethods');
    if (probeUnsafeMethods !== undefined) out.probeUnsafeMethods = probeUnsafeMethods;
    const placeholders = ver.stringRecord('placeholders');
    if (placeholders) out.placeholders = placeholders;
    overrides.verification = out;
  }

  const an = section(raw, 'analysis');
  if (an) {
    const out: Partial<AnalysisConfig> = {};
    for (const key of ['maxSnippetChars', 'snippetContextLines'] as const) {
      const value = an.number(key);
      if (value !== undefined) out[key] = value;
    }
    overrides.analysis = out;
  }

  const sg = section(raw, 'suggestion');
  if (sg) {
    const out: Partial<SuggestionConfig> = {};
    for (const key of ['maxRetries', 'initialBackoffMs', 'maxBackoffMs', 'timeoutMs', 'budgetMs', 'maxContextChars', 'maxTokens'] as const) {
      const value = sg.number(key);
      if (value !== undefined) out[key] = value;
    }
    for (const key of ['useAI', 'fallback'] as const) {
      const value = sg.boolean(key);
      if (value !== undefined) out[key] = value;
    }
    const model = sg.string('model');
    if (model) out.model = model;
    overrides.suggestion = out;
  }

  const nt = section(raw, 'notification');
  if (nt) {
    const out: Partial<NotificationConfig> = {};
    for (const key of ['suppressionWindowMs', 'maxPerWindow', 'rateLimitWindowMs'] as const) {
      const value = nt.number(key);
      if (value !== undefined) out[key] = value;
    }
    const minSeverity = nt.oneOf('minSeverity', ['low', 'medium', 'high', 'critical'] as const);
    if (minSeverity) out.minSeverity = minSeverity;
    const severities = nt.stringRecord('severities');
    if (severities) {
      const mapped: NotificationConfig['severities'] = {};
      for (const [category, severity] of Object.entries(severities)) {
        const known = ERROR_CATEGORIES.find((c) => c === category);
        if (!known || !isSeverity(severity)) {
          throw new ConfigurationError(`notification.severities.${category} is not a known category/severity pair`, 'notification.severities');
        }
        mapped[known] = severity;
      }
      out.severities = mapped;
    }
    overrides.notification = out;
  }

  return overrides;
}

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Failed to parse ${filePath}: ${errorMessage(err)}`, 'config');
  }
}

/**
 * Loads the config from the given directory.
 *
 * Search order:
 *   1. .deploylensrc.json
 *   2. deploylens.config.json
 *   3. package.json → "deploylens" key
 *
 * Returns null when none is present. A file that exists but is invalid is a
 * ConfigurationError.
 */
export function loadConfigFile(cwd?: string): ConfigOverrides | null {
  const dir = cwd ?? process.cwd();

  for (const name of CONFIG_FILE_NAMES) {
    const filePath = resolve(dir, name);
    if (existsSync(filePath)) {
      const overrides = parseConfigOverrides(readJson(filePath));
      log.info(`Loaded config from ${name}`);
      return overrides;
    }
  }

  const pkgPath = resolve(dir, 'package.json');
  if (existsSync(pkgPath)) {
    const pkg = readJson(pkgPath);
    if (isRecord(pkg) && isRecord(pkg.deploylens)) {
      const overrides = parseConfigOverrides(pkg.deploylens);
      log.info('Loaded config from package.json "deploylens" key');
      return overrides;
    }
  }

  return null;
}
