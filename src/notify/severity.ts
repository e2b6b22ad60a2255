import type { ErrorCategory } from '../analysis/types.js';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export const SEVERITIES: readonly Severity[] = ['low', 'medium', 'high', 'critical'];

export const DEFAULT_CATEGORY_SEVERITY: Record<ErrorCategory, Severity> = {
  RouteVerificationFailure: 'critical',
  SyntaxError: 'high',
  ImportError: 'high',
  RuntimeError: 'high',
  ConfigError: 'medium',
  DependencyError: 'medium',
  Unknown: 'low',
};

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITIES.some((s) => s === value);
}

/** Category severity lookup with per-category overrides. */
export function severityResolver(overrides: Partial<Record<ErrorCategory, Severity>> = {}): (category: ErrorCategory) => Severity {
  return (category) => overrides[category] ?? DEFAULT_CATEGORY_SEVERITY[category];
}
