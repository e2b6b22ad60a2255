import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ErrorCategory } from '../analysis/types.js';
import { ERROR_CATEGORIES } from '../analysis/types.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { isRecord } from '../utils/shared.js';
import type { Severity } from './severity.js';
import { isSeverity } from './severity.js';

export interface HistoryEntry {
  fingerprint: string;
  category: ErrorCategory;
  firstSeenAt: string;
  lastSeenAt: string;
  occurrences: number;
  lastNotifiedAt?: string;
  lastNotifiedSeverity?: Severity;
}

/** Read-only snapshot handed to the notification policy. */
export interface HistoryView {
  readonly entries: ReadonlyMap<string, Readonly<HistoryEntry>>;
  /** When each notification went out, across all fingerprints (ISO-8601) */
  readonly notifiedAt: readonly string[];
}

export interface HistoryEvent {
  fingerprint: string;
  category: ErrorCategory;
  severity: Severity;
  occurredAt: string;
  notified: boolean;
}

/**
 * Where fingerprint history lives. Reads are snapshots; the caller records
 * events after acting on a decision.
 */
export interface HistoryStore {
  snapshot(): Promise<HistoryView>;
  record(event: HistoryEvent): Promise<void>;
}

const MAX_NOTIFICATION_TIMES = 1000;

export const EMPTY_HISTORY: HistoryView = { entries: new Map(), notifiedAt: [] };

function applyEvent(entries: Map<string, HistoryEntry>, notifiedAt: string[], event: HistoryEvent): void {
  const existing = entries.get(event.fingerprint);
  const entry: HistoryEntry = existing
    ? { ...existing, category: event.category, lastSeenAt: event.occurredAt, occurrences: existing.occurrences + 1 }
    : {
        fingerprint: event.fingerprint,
        category: event.category,
        firstSeenAt: event.occurredAt,
        lastSeenAt: event.occurredAt,
        occurrences: 1,
      };
  if (event.notified) {
    entry.lastNotifiedAt = event.occurredAt;
    entry.lastNotifiedSeverity = event.severity;
    notifiedAt.push(event.occurredAt);
    if (notifiedAt.length > MAX_NOTIFICATION_TIMES) notifiedAt.splice(0, notifiedAt.length - MAX_NOTIFICATION_TIMES);
  }
  entries.set(event.fingerprint, entry);
}

function copyView(entries: Map<string, HistoryEntry>, notifiedAt: string[]): HistoryView {
  return {
    entries: new Map([...entries].map(([k, v]) => [k, { ...v }])),
    notifiedAt: [...notifiedAt],
  };
}

export class MemoryHistoryStore implements HistoryStore {
  private readonly entries = new Map<string, HistoryEntry>();
  private readonly notifiedAt: string[] = [];

  constructor(initial: HistoryEvent[] = []) {
    for (const event of initial) applyEvent(this.entries, this.notifiedAt, event);
  }

  async snapshot(): Promise<HistoryView> {
    return copyView(this.entries, this.notifiedAt);
  }

  async record(event: HistoryEvent): Promise<void> {
    applyEvent(this.entries, this.notifiedAt, event);
  }
}

interface HistoryFile {
  version: 1;
  entries: HistoryEntry[];
  notifiedAt: string[];
}

function parseEntry(value: unknown, index: number, file: string): HistoryEntry {
  const fail = (what: string) => new ConfigurationError(`${file}: entries[${index}] ${what}`, 'history');
  if (!isRecord(value)) throw fail('is not an object');
  const { fingerprint, category, firstSeenAt, lastSeenAt, occurrences, lastNotifiedAt, lastNotifiedSeverity } = value;
  if (typeof fingerprint !== 'string' || fingerprint.length === 0) throw fail('has no fingerprint');
  const knownCategory = ERROR_CATEGORIES.find((c) => c === category);
  if (!knownCategory) throw fail(`has unknown category ${String(category)}`);
  if (typeof firstSeenAt !== 'string' || typeof lastSeenAt !== 'string') throw fail('has no timestamps');
  if (typeof occurrences !== 'number') throw fail('has no occurrence count');
  return {
    fingerprint,
    category: knownCategory,
    firstSeenAt,
    lastSeenAt,
    occurrences,
    ...(typeof lastNotifiedAt === 'string' ? { lastNotifiedAt } : {}),
    ...(isSeverity(lastNotifiedSeverity) ? { lastNotifiedSeverity } : {}),
  };
}

/**
 * History kept in a local JSON file. Stands in for the external store when
 * the CLI runs on its own.
 */
export class JsonFileHistoryStore implements HistoryStore {
  constructor(private readonly filePath: string) {}

  async snapshot(): Promise<HistoryView> {
    const { entries, notifiedAt } = this.load();
    return copyView(entries, notifiedAt);
  }

  async record(event: HistoryEvent): Promise<void> {
    const { entries, notifiedAt } = this.load();
    applyEvent(entries, notifiedAt, event);
    const data: HistoryFile = { version: 1, entries: [...entries.values()], notifiedAt };
    mkdirSync(dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
    renameSync(tmp, this.filePath);
    log.debug(`History updated: ${this.filePath}`);
  }

  private load(): { entries: Map<string, HistoryEntry>; notifiedAt: string[] } {
    const entries = new Map<string, HistoryEntry>();
    if (!existsSync(this.filePath)) return { entries, notifiedAt: [] };

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`History file ${this.filePath} is not valid JSON: ${errorMessage(err)}`, 'history');
    }
    if (!isRecord(parsed) || !Array.isArray(parsed.entries)) {
      throw new ConfigurationError(`History file ${this.filePath} has no "entries" array`, 'history');
    }
    parsed.entries.forEach((raw: unknown, i: number) => {
      const entry = parseEntry(raw, i, this.filePath);
      entries.set(entry.fingerprint, entry);
    });
    const notifiedAt = Array.isArray(parsed.notifiedAt)
      ? parsed.notifiedAt.filter((t: unknown): t is string => typeof t === 'string')
      : [];
    return { entries, notifiedAt };
  }
}
