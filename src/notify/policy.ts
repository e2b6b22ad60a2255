import type { ErrorCategory, ErrorSignature } from '../analysis/types.js';
import type { HistoryView } from './history.js';
import type { Severity } from './severity.js';
import { DEFAULT_CATEGORY_SEVERITY, severityRank } from './severity.js';

export type NotificationReason =
  | 'NewFingerprint'
  | 'SeverityEscalated'
  | 'RepeatWithinWindow'
  | 'WindowExpired'
  | 'RateLimited'
  | 'BelowSeverityThreshold';

export interface NotificationDecision {
  shouldNotify: boolean;
  reason: NotificationReason;
  fingerprint: string;
  severity: Severity;
  previousNotifiedAt?: string;
}

export interface PolicyOptions {
  suppressionWindowMs: number;
  severityOf: (category: ErrorCategory) => Severity;
  minSeverity: Severity;
  /** Notifications allowed across all fingerprints per `rateLimitWindowMs`; 0 disables the limit */
  maxPerWindow: number;
  rateLimitWindowMs: number;
  now: () => Date;
}

export const ONE_HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_POLICY_OPTIONS: PolicyOptions = {
  suppressionWindowMs: ONE_HOUR_MS,
  severityOf: (category) => DEFAULT_CATEGORY_SEVERITY[category],
  minSeverity: 'low',
  maxPerWindow: 0,
  rateLimitWindowMs: ONE_HOUR_MS,
  now: () => new Date(),
};

/**
 * Decide whether this occurrence should page someone. Pure: history is a
 * snapshot and recording the outcome is left to the caller.
 */
export function decideNotification(
  signature: Pick<ErrorSignature, 'fingerprint' | 'category'>,
  history: HistoryView,
  overrides: Partial<PolicyOptions> = {},
): NotificationDecision {
  const options: PolicyOptions = { ...DEFAULT_POLICY_OPTIONS, ...overrides };
  const { fingerprint } = signature;
  const severity = options.severityOf(signature.category);
  const decide = (shouldNotify: boolean, reason: NotificationReason, previousNotifiedAt?: string): NotificationDecision => ({
    shouldNotify,
    reason,
    fingerprint,
    severity,
    ...(previousNotifiedAt ? { previousNotifiedAt } : {}),
  });

  if (severityRank(severity) < severityRank(options.minSeverity)) {
    return decide(false, 'BelowSeverityThreshold');
  }

  const entry = history.entries.get(fingerprint);
  const lastNotifiedAt = entry?.lastNotifiedAt;
  if (!entry || !lastNotifiedAt) {
    return decide(true, 'NewFingerprint');
  }

  const previous = entry.lastNotifiedSeverity;
  if (previous && severityRank(severity) > severityRank(previous)) {
    return decide(true, 'SeverityEscalated', lastNotifiedAt);
  }

  const nowMs = options.now().getTime();
  const elapsed = nowMs - Date.parse(lastNotifiedAt);
  if (elapsed < options.suppressionWindowMs) {
    return decide(false, 'RepeatWithinWindow', lastNotifiedAt);
  }

  if (options.maxPerWindow > 0) {
    const since = nowMs - options.rateLimitWindowMs;
    const recent = history.notifiedAt.filter((t) => Date.parse(t) > since).length;
    if (recent >= options.maxPerWindow) {
      return decide(false, 'RateLimited', lastNotifiedAt);
    }
  }

  return decide(true, 'WindowExpired', lastNotifiedAt);
}
