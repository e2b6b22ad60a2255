export { decideNotification, DEFAULT_POLICY_OPTIONS, ONE_HOUR_MS } from './policy.js';
export type { NotificationDecision, NotificationReason, PolicyOptions } from './policy.js';
export { EMPTY_HISTORY, JsonFileHistoryStore, MemoryHistoryStore } from './history.js';
export type { HistoryEntry, HistoryEvent, HistoryStore, HistoryView } from './history.js';
export { DEFAULT_CATEGORY_SEVERITY, SEVERITIES, isSeverity, severityRank, severityResolver } from './severity.js';
export type { Severity } from './severity.js';
