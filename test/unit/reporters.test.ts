import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Route } from '../../src/discovery/types.js';
import type { PipelineResult } from '../../src/pipeline.js';
import { printJson, writeJsonReport } from '../../src/reporter/json.js';
import { printDecision, printDiagnostics, printPipelineResult, printRoutes } from '../../src/reporter/terminal.js';

vi.mock('../../src/utils/logger.js', () => ({
  log: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

// ─── Factories ────────────────────────────────────────────────────────

function makeRoute(overrides: Partial<Route> = {}): Route {
  return {
    method: 'GET',
    path: '/health',
    params: [],
    sourceFile: 'server.js',
    sourceLine: 4,
    frameworkKind: 'express',
    handlerName: 'health',
    ...overrides,
  };
}

function makeResult(overrides: Partial<PipelineResult> = {}): PipelineResult {
  return {
    routes: [],
    duplicates: [],
    checkResults: [],
    signature: null,
    suggestion: null,
    notify: null,
    diagnostics: [],
    commit: null,
    ...overrides,
  };
}

function captureConsole(): string[] {
  const lines: string[] = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    lines.push(args.map(String).join(' '));
  });
  return lines;
}

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── JSON ─────────────────────────────────────────────────────────────

describe('JSON reporter', () => {
  it('prints one pretty-printed document to stdout', () => {
    const writes: string[] = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });

    printJson({ routes: [], cancelled: false });

    expect(writes).toEqual(['{\n  "routes": [],\n  "cancelled": false\n}\n']);
  });

  it('writes a report file, creating missing directories', () => {
    const dir = mkdtempSync(join(tmpdir(), 'deploylens-report-test-'));
    const outputPath = join(dir, 'reports', 'run.json');
    try {
      writeJsonReport(makeResult({ routes: [makeRoute()] }), outputPath);

      expect(existsSync(outputPath)).toBe(true);
      const parsed = JSON.parse(readFileSync(outputPath, 'utf-8'));
      expect(parsed.routes[0].path).toBe('/health');
      expect(parsed.signature).toBeNull();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

// ─── Terminal ─────────────────────────────────────────────────────────

describe('terminal reporter', () => {
  it('lists routes with their source locations', () => {
    const lines = captureConsole();

    printRoutes([makeRoute(), makeRoute({ method: 'DELETE', path: '/users/{id}', sourceLine: 9, handlerName: undefined })]);

    expect(lines).toContain('  Routes (2)');
    expect(lines).toContain('  GET    /health → health');
    expect(lines).toContain('         server.js:4 [express]');
    expect(lines).toContain('  DELETE /users/{id}');
  });

  it('says so when no routes were found', () => {
    const lines = captureConsole();
    printRoutes([]);
    expect(lines).toContain('  No routes found.');
  });

  it('prints the notification verdict', () => {
    const lines = captureConsole();

    printDecision({
      shouldNotify: false,
      reason: 'RepeatWithinWindow',
      fingerprint: 'abc',
      severity: 'high',
      previousNotifiedAt: '2025-01-15T12:00:00.000Z',
    });

    expect(lines).toContain('  suppress [HIGH] RepeatWithinWindow');
    expect(lines).toContain('  last notified 2025-01-15T12:00:00.000Z');
  });

  it('prints diagnostics with their step', () => {
    const lines = captureConsole();
    printDiagnostics([{ kind: 'ConfigurationError', step: 'verify', message: 'Route verification requested without a base URL' }]);
    expect(lines).toContain('  ConfigurationError [verify]: Route verification requested without a base URL');
  });

  it('reports a clean run', () => {
    const lines = captureConsole();
    printPipelineResult(makeResult({ commit: { sha: 'abc1234def', branch: 'main' } }));
    expect(lines).toContain('  Build abc1234 on main');
    expect(lines).toContain('  No failures detected.');
  });
});
