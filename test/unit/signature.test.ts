import { describe, it, expect } from 'vitest';
import { classify, computeFingerprint, createSignature, findErrorLine, parseFrames, stripVolatile } from '../../src/analysis/index.js';

const FIXED_NOW = () => new Date('2025-01-15T12:00:00.000Z');

const PY_TRACEBACK = (root: string, line: number) => `Traceback (most recent call last):
  File "/usr/lib/python3.11/site-packages/flask/app.py", line 880, in full_dispatch_request
    rv = self.dispatch_request()
  File "${root}/handlers/users.py", line ${line}, in get_user
    return USERS[user_id]
KeyError: 42`;

const NODE_TRACE = `TypeError: Cannot read properties of undefined (reading 'id')
    at getUser (/app/src/routes/users.js:14:22)
    at Layer.handle [as handle_request] (/app/node_modules/express/lib/router/layer.js:95:5)`;

describe('createSignature', () => {
  it('classifies a syntax error and keeps the reported location', () => {
    const sig = createSignature('SyntaxError: invalid syntax (app.py, line 42)', { now: FIXED_NOW });

    expect(sig.category).toBe('SyntaxError');
    expect(sig.errorType).toBe('SyntaxError');
    expect(sig.location).toEqual({ file: 'app.py', line: 42 });
    expect(sig.anchor).toEqual({ file: 'app.py', line: 42, isApplicationCode: true });
    expect(sig.normalizedMessage).toBe('SyntaxError: invalid syntax (app.py, line <N>)');
    expect(sig.occurredAt).toBe('2025-01-15T12:00:00.000Z');
    expect(sig.fingerprint).toMatch(/^[0-9a-f]{16}$/);
  });

  it('gives the same fingerprint when only the line number moves', () => {
    const a = createSignature('SyntaxError: invalid syntax (app.py, line 42)');
    const b = createSignature('SyntaxError: invalid syntax (app.py, line 57)');
    expect(b.fingerprint).toBe(a.fingerprint);
  });

  it('anchors a Python traceback on the innermost application frame', () => {
    const sig = createSignature(PY_TRACEBACK('/srv/app', 18));

    expect(sig.category).toBe('RuntimeError');
    expect(sig.errorType).toBe('KeyError');
    expect(sig.normalizedMessage).toBe('KeyError: 42');
    expect(sig.anchor).toEqual({
      file: '/srv/app/handlers/users.py',
      line: 18,
      function: 'get_user',
      isApplicationCode: true,
    });
  });

  it('ignores checkout roots and line shifts in the fingerprint', () => {
    const a = createSignature(PY_TRACEBACK('/srv/app', 18));
    const b = createSignature(PY_TRACEBACK('/home/ci/build/app', 21));
    expect(b.fingerprint).toBe(a.fingerprint);
  });

  it('normalizes volatile tokens so repeated failures share a fingerprint', () => {
    const a = createSignature('ConnectionError: request 3f9a1c2b7d4e5f60 failed after 1534ms');
    const b = createSignature('ConnectionError: request a1b2c3d4e5f60718 failed after 20ms');

    expect(a.normalizedMessage).toBe('ConnectionError: request <ID> failed after <DURATION>');
    expect(b.fingerprint).toBe(a.fingerprint);
  });

  it('anchors a V8 stack on the first frame outside node_modules', () => {
    const sig = createSignature(NODE_TRACE);

    expect(sig.category).toBe('RuntimeError');
    expect(sig.errorType).toBe('TypeError');
    expect(sig.normalizedMessage).toBe("TypeError: Cannot read properties of undefined (reading 'id')");
    expect(sig.anchor).toEqual({ file: '/app/src/routes/users.js', line: 14, function: 'getUser', isApplicationCode: true });
    expect(sig.location).toBeUndefined();
  });

  it('files a failure raised entirely inside dependencies as DependencyError', () => {
    const sig = createSignature(`Traceback (most recent call last):
  File "/usr/lib/python3.11/site-packages/gunicorn/arbiter.py", line 589, in spawn_worker
  File "/usr/lib/python3.11/site-packages/gunicorn/util.py", line 371, in import_app
ValueError: bad config`);

    expect(sig.category).toBe('DependencyError');
    expect(sig.anchor?.function).toBe('import_app');
    expect(sig.anchor?.isApplicationCode).toBe(false);
  });

  it('truncates the code snippet', () => {
    const sig = createSignature('Error: boom', { codeSnippet: 'x'.repeat(50), maxSnippetChars: 20 });
    expect(sig.codeSnippet).toBe(`${'x'.repeat(7)}\n…[truncated]`);
  });
});

describe('computeFingerprint', () => {
  it('differs between categories for the same message', () => {
    expect(computeFingerprint('RuntimeError', undefined, 'boom')).not.toBe(computeFingerprint('ConfigError', undefined, 'boom'));
  });

  it('is stable for equal inputs', () => {
    const anchor = { file: 'src/app.py', function: 'main', isApplicationCode: true };
    expect(computeFingerprint('RuntimeError', anchor, 'boom')).toBe(computeFingerprint('RuntimeError', { ...anchor, line: 99 }, 'boom'));
  });
});

describe('classify', () => {
  it.each([
    ["ModuleNotFoundError: No module named 'requests'", 'DependencyError'],
    ['npm ERR! code ERESOLVE', 'DependencyError'],
    ["ImportError: cannot import name 'User' from 'app.models'", 'ImportError'],
    ["Error: Cannot find module './routes/users'", 'ImportError'],
    ['django.core.exceptions.ImproperlyConfigured: SECRET_KEY must not be empty', 'ConfigError'],
    ["KeyError: 'DATABASE_URL'", 'ConfigError'],
    ["src/index.ts(3,5): error TS1005: ';' expected.", 'SyntaxError'],
    ['Route verification failed: GET /health -> TIMEOUT', 'RouteVerificationFailure'],
    ['ZeroDivisionError: division by zero', 'RuntimeError'],
    ['Killed', 'Unknown'],
  ] as const)('%s -> %s', (text, expected) => {
    expect(classify(text)).toBe(expected);
  });
});

describe('normalization helpers', () => {
  it('replaces addresses, uuids and timestamps', () => {
    expect(stripVolatile('worker 0x7f3a2b1c died at 2024-05-01T10:00:00Z (job 123e4567-e89b-12d3-a456-426614174000)')).toBe(
      'worker <ADDR> died at <TIMESTAMP> (job <UUID>)',
    );
  });

  it('replaces ctime, syslog and RFC 1123 dates as a whole', () => {
    expect(stripVolatile('Mon Mar 12 10:00:00 2024 worker crashed')).toBe('<TIMESTAMP> worker crashed');
    expect(stripVolatile('Tue Mar  5 09:15:42 UTC 2024: pool exhausted')).toBe('<TIMESTAMP>: pool exhausted');
    expect(stripVolatile('Last-Modified: Mon, 12 Mar 2024 10:00:00 GMT')).toBe('Last-Modified: <TIMESTAMP>');
  });

  it('replaces temp paths and file positions', () => {
    expect(stripVolatile('failed reading /tmp/build-8812/out.js at main.js:10:4')).toBe('failed reading <TMP> at main.js:<N>:<N>');
  });

  it('picks the error line from the bottom of a traceback', () => {
    expect(findErrorLine(PY_TRACEBACK('/srv/app', 18))).toEqual({ line: 'KeyError: 42', errorType: 'KeyError' });
  });

  it('falls back to the first line that mentions a failure', () => {
    expect(findErrorLine('step 1 ok\nbuild failed with exit code 2\ncleanup done')).toEqual({
      line: 'build failed with exit code 2',
    });
  });

  it('puts a compiler-reported location ahead of the stack', () => {
    const frames = parseFrames("src/server.ts:12:7 - error TS2304: Cannot find name 'app'.");
    expect(frames).toEqual([{ file: 'src/server.ts', line: 12, isApplicationCode: true }]);
  });
});

describe('fingerprint stability', () => {
  it('ignores memory addresses and ISO timestamps', () => {
    const first = createSignature('RuntimeError: worker 0x7f3a2b1c crashed at 2025-01-15T12:00:00Z');
    const second = createSignature('RuntimeError: worker 0x55d0e4a8 crashed at 2025-02-03T08:30:12.512Z');

    expect(first.normalizedMessage).toBe('RuntimeError: worker <ADDR> crashed at <TIMESTAMP>');
    expect(second.fingerprint).toBe(first.fingerprint);
  });

  it('ignores the date in ctime-style timestamps', () => {
    const monday = createSignature('RuntimeError: pool exhausted since Mon Mar 11 23:59:01 2024');
    const tuesday = createSignature('RuntimeError: pool exhausted since Tue Mar 12 10:00:00 2024');

    expect(tuesday.fingerprint).toBe(monday.fingerprint);
  });

  it('still separates different messages', () => {
    const first = createSignature('RuntimeError: worker 0x7f3a2b1c crashed');
    const other = createSignature('RuntimeError: worker 0x7f3a2b1c hung');

    expect(other.fingerprint).not.toBe(first.fingerprint);
  });
});
