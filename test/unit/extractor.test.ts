import { describe, it, expect, vi } from 'vitest';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  DEFAULT_EXTRACT_OPTIONS,
  discoverRoutes,
  orderAndDeduplicate,
  type Route,
} from '../../src/discovery/index.js';

vi.mock('../../src/utils/logger.js', () => ({
  log: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const APPS = fileURLToPath(new URL('../fixtures/apps/', import.meta.url));

function summary(routes: Route[]): string[] {
  return routes.map((r) => `${r.method} ${r.path}`);
}

const FASTAPI_FILE = `from fastapi import FastAPI

app = FastAPI()


@app.get("/ping")
def ping():
    return "pong"
`;

const FLASK_FILE = `from flask import Flask

app = Flask(__name__)


@app.route("/home")
def home():
    return "hi"
`;

describe('discoverRoutes on fixture apps', () => {
  it('extracts Flask routes with blueprint prefixes and skips comments and docstrings', () => {
    const result = discoverRoutes(join(APPS, 'flask'));

    expect(summary(result.routes)).toEqual([
      'GET /',
      'GET /users/{user_id}',
      'DELETE /users/{user_id}',
      'POST /api/items',
      'GET /api/items/{item_id}',
    ]);
    expect(result.routes[1]).toEqual({
      method: 'GET',
      path: '/users/{user_id}',
      params: [{ name: 'user_id', type: 'int' }],
      sourceFile: 'app.py',
      sourceLine: 12,
      frameworkKind: 'flask',
      handlerName: 'get_user',
    });
    expect(result.routes[4].params).toEqual([{ name: 'item_id', type: 'uuid' }]);
    expect(result.diagnostics).toEqual([]);
  });

  it('reports per-framework confidence', () => {
    const result = discoverRoutes(join(APPS, 'flask'));
    expect(result.frameworks).toEqual([
      { kind: 'flask', confidence: 1 },
      { kind: 'fastapi', confidence: 0.2 },
      { kind: 'django', confidence: 0 },
      { kind: 'express', confidence: 0 },
    ]);
  });

  it('extracts Express routes, mounts, route() chains and wildcards', () => {
    const result = discoverRoutes(join(APPS, 'express'));

    expect(summary(result.routes)).toEqual([
      'GET /health',
      'GET /users/{id}',
      'POST /users',
      'GET /sessions',
      'DELETE /sessions',
      'ANY /{wildcard}',
    ]);
    expect(result.routes.map((r) => r.sourceLine)).toEqual([6, 10, 11, 14, 15, 26]);
    expect(result.routes.map((r) => r.handlerName)).toEqual([
      undefined,
      'getUser',
      'createUser',
      'listSessions',
      'endSession',
      'notFound',
    ]);
    expect(result.routes[1].params).toEqual([{ name: 'id', type: 'int' }]);
    expect(result.routes[5].params).toEqual([{ name: 'wildcard', type: 'path' }]);
  });

  it('extracts FastAPI routes with router prefixes and annotated parameter types', () => {
    const result = discoverRoutes(join(APPS, 'fastapi'));

    expect(summary(result.routes)).toEqual([
      'GET /status',
      'GET /v1/orders/{order_id}',
      'POST /v1/orders/{order_id}/refund',
      'PUT /v1/orders/{order_id}/refund',
      'GET /files/{file_path}',
    ]);
    expect(result.routes[1].params).toEqual([{ name: 'order_id', type: 'int' }]);
    expect(result.routes[2].params).toEqual([{ name: 'order_id', type: 'uuid' }]);
    expect(result.routes[4].params).toEqual([{ name: 'file_path', type: 'path' }]);
    expect(result.routes[1].handlerName).toBe('read_order');
  });

  it('extracts Django urlpatterns as ANY routes and ignores include()', () => {
    const result = discoverRoutes(join(APPS, 'django'));

    expect(summary(result.routes)).toEqual(['ANY /', 'ANY /articles/{year}', 'ANY /articles/{slug}', 'ANY /archive/{year}']);
    expect(result.routes.map((r) => r.handlerName)).toEqual([
      'views.home',
      'views.year_archive',
      'views.ArticleDetail',
      'views.archive',
    ]);
    expect(result.routes[3].params).toEqual([{ name: 'year', type: 'int' }]);
  });

  it('is idempotent', () => {
    const first = discoverRoutes(join(APPS, 'express'));
    const second = discoverRoutes(join(APPS, 'express'));
    expect(second.routes).toEqual(first.routes);
  });
});

describe('discoverRoutes on in-memory trees', () => {
  it('orders routes independently of map insertion order', () => {
    const a = discoverRoutes({ 'web.py': FLASK_FILE, 'api.py': FASTAPI_FILE });
    const b = discoverRoutes({ 'api.py': FASTAPI_FILE, 'web.py': FLASK_FILE });

    expect(summary(a.routes)).toEqual(['GET /ping', 'GET /home']);
    expect(b.routes).toEqual(a.routes);
  });

  it('gives each file to its highest-scoring adapter by default', () => {
    const result = discoverRoutes({ 'api.py': FASTAPI_FILE, 'web.py': FLASK_FILE });

    expect(result.routes.map((r) => `${r.sourceFile}:${r.frameworkKind}`)).toEqual(['api.py:fastapi', 'web.py:flask']);
    expect(result.duplicates).toEqual([]);
  });

  it('records collisions as duplicates under the merge policy', () => {
    const result = discoverRoutes(
      { 'api.py': FASTAPI_FILE, 'web.py': FLASK_FILE },
      { ...DEFAULT_EXTRACT_OPTIONS, collisionPolicy: 'merge' },
    );

    expect(summary(result.routes)).toEqual(['GET /ping', 'GET /home']);
    expect(result.duplicates).toEqual([
      {
        method: 'GET',
        path: '/ping',
        kept: { sourceFile: 'api.py', sourceLine: 6, frameworkKind: 'flask', handlerName: 'ping' },
        others: [{ sourceFile: 'api.py', sourceLine: 6, frameworkKind: 'fastapi', handlerName: 'ping' }],
      },
    ]);
  });

  it('skips a file that cannot be scanned and keeps the rest', () => {
    const broken = 'from flask import Flask\napp = Flask(__name__)\n\n"""never closed\n@app.route("/lost")\n';
    const result = discoverRoutes({ 'broken.py': broken, 'web.py': FLASK_FILE });

    expect(summary(result.routes)).toEqual(['GET /home']);
    expect(result.diagnostics).toEqual([
      {
        kind: 'ParseFailure',
        step: 'extract',
        file: 'broken.py',
        message: 'flask: broken.py:4: unterminated triple-quoted string',
      },
    ]);
  });

  it('reports NoFrameworkDetected when nothing reaches the confidence threshold', () => {
    const result = discoverRoutes({ 'script.py': 'print("hi")\n' });

    expect(result.routes).toEqual([]);
    expect(result.diagnostics).toEqual([
      {
        kind: 'NoFrameworkDetected',
        step: 'extract',
        message: 'No framework reached confidence 0.3 (best: flask at 0)',
      },
    ]);
  });

  it('runs the hinted adapter even below the confidence threshold', () => {
    const files = { 'routes.ts': "router.get('/a', handler);\n" };

    expect(discoverRoutes(files).routes).toEqual([]);
    expect(discoverRoutes(files, { ...DEFAULT_EXTRACT_OPTIONS, framework: 'express' }).routes).toEqual([
      {
        method: 'GET',
        path: '/a',
        params: [],
        sourceFile: 'routes.ts',
        sourceLine: 1,
        frameworkKind: 'express',
        handlerName: 'handler',
      },
    ]);
  });

  it('fails with a ConfigurationError for a missing source path', () => {
    expect(() => discoverRoutes(join(APPS, 'does-not-exist'))).toThrow('Source path does not exist');
  });
});

describe('orderAndDeduplicate', () => {
  const route = (sourceFile: string, sourceLine: number, method: Route['method'], path: string): Route => ({
    method,
    path,
    params: [],
    sourceFile,
    sourceLine,
    frameworkKind: 'express',
  });

  it('sorts by file then line and keeps the first of each (method, path)', () => {
    const { routes, duplicates } = orderAndDeduplicate([
      route('b.js', 1, 'GET', '/x'),
      route('a.js', 9, 'GET', '/y'),
      route('a.js', 2, 'GET', '/x'),
      route('a.js', 2, 'POST', '/x'),
    ]);

    expect(routes.map((r) => `${r.sourceFile}:${r.sourceLine} ${r.method} ${r.path}`)).toEqual([
      'a.js:2 GET /x',
      'a.js:2 POST /x',
      'a.js:9 GET /y',
    ]);
    expect(duplicates).toEqual([
      {
        method: 'GET',
        path: '/x',
        kept: { sourceFile: 'a.js', sourceLine: 2, frameworkKind: 'express' },
        others: [{ sourceFile: 'b.js', sourceLine: 1, frameworkKind: 'express' }],
      },
    ]);
  });
});
