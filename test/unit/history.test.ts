import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JsonFileHistoryStore, MemoryHistoryStore, type HistoryEvent } from '../../src/notify/history.js';
import { ConfigurationError } from '../../src/utils/errors.js';

vi.mock('../../src/utils/logger.js', () => ({
  log: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const event = (occurredAt: string, notified: boolean): HistoryEvent => ({
  fingerprint: 'f00dfeedf00dfeed',
  category: 'ImportError',
  severity: 'high',
  occurredAt,
  notified,
});

describe('MemoryHistoryStore', () => {
  it('counts occurrences and remembers the last notification', async () => {
    const store = new MemoryHistoryStore();
    await store.record(event('2025-01-15T12:00:00.000Z', true));
    await store.record(event('2025-01-15T12:10:00.000Z', false));

    const view = await store.snapshot();

    expect(view.entries.get('f00dfeedf00dfeed')).toEqual({
      fingerprint: 'f00dfeedf00dfeed',
      category: 'ImportError',
      firstSeenAt: '2025-01-15T12:00:00.000Z',
      lastSeenAt: '2025-01-15T12:10:00.000Z',
      occurrences: 2,
      lastNotifiedAt: '2025-01-15T12:00:00.000Z',
      lastNotifiedSeverity: 'high',
    });
    expect(view.notifiedAt).toEqual(['2025-01-15T12:00:00.000Z']);
  });

  it('hands out snapshots that later records do not change', async () => {
    const store = new MemoryHistoryStore();
    const before = await store.snapshot();
    await store.record(event('2025-01-15T12:00:00.000Z', true));

    expect(before.entries.size).toBe(0);
    expect((await store.snapshot()).entries.size).toBe(1);
  });
});

describe('JsonFileHistoryStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'deploylens-history-test-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const view = await new JsonFileHistoryStore(join(tmpDir, 'history.json')).snapshot();
    expect(view.entries.size).toBe(0);
    expect(view.notifiedAt).toEqual([]);
  });

  it('persists events across instances', async () => {
    const file = join(tmpDir, 'state', 'history.json');
    await new JsonFileHistoryStore(file).record(event('2025-01-15T12:00:00.000Z', true));
    await new JsonFileHistoryStore(file).record(event('2025-01-15T12:05:00.000Z', false));

    const view = await new JsonFileHistoryStore(file).snapshot();

    expect(view.entries.get('f00dfeedf00dfeed')?.occurrences).toBe(2);
    expect(view.entries.get('f00dfeedf00dfeed')?.lastNotifiedAt).toBe('2025-01-15T12:00:00.000Z');
    expect(JSON.parse(readFileSync(file, 'utf-8')).version).toBe(1);
  });

  it('rejects a file that is not JSON', async () => {
    const file = join(tmpDir, 'history.json');
    writeFileSync(file, '{oops');

    await expect(new JsonFileHistoryStore(file).snapshot()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects entries with an unknown category', async () => {
    const file = join(tmpDir, 'history.json');
    writeFileSync(
      file,
      JSON.stringify({
        version: 1,
        entries: [{ fingerprint: 'x', category: 'Gremlins', firstSeenAt: 'a', lastSeenAt: 'b', occurrences: 1 }],
        notifiedAt: [],
      }),
    );

    await expect(new JsonFileHistoryStore(file).snapshot()).rejects.toThrow('has unknown category Gremlins');
  });
});
