import type { ParamType, RouteParam } from './types.js';

export interface PathTemplate {
  path: string;
  params: RouteParam[];
}

/** Leading slash, no repeated slashes, no trailing slash (except for the root). */
export function normalizePath(path: string): string {
  let p = path.trim();
  if (!p.startsWith('/')) p = `/${p}`;
  p = p.replace(/\/{2,}/g, '/');
  if (p.length > 1 && p.endsWith('/')) p = p.slice(0, -1);
  return p;
}

export function joinPaths(prefix: string | undefined, path: string): string {
  if (!prefix) return normalizePath(path);
  return normalizePath(`${prefix}/${path}`);
}

const CONVERTER_TYPES: Record<string, ParamType> = {
  int: 'int',
  float: 'float',
  string: 'string',
  str: 'string',
  slug: 'string',
  uuid: 'uuid',
  path: 'path',
  any: 'string',
};

function converterType(converter: string | undefined, fallback: ParamType): ParamType {
  if (!converter) return fallback;
  return CONVERTER_TYPES[converter.toLowerCase()] ?? 'unknown';
}

/**
 * Flask (`<int:id>`) and Django `path()` (`<slug:name>`) converter syntax.
 * A bare `<name>` is a string in both frameworks.
 */
export function fromAngleTemplate(raw: string): PathTemplate {
  const params: RouteParam[] = [];
  const path = raw.replace(/<(?:([A-Za-z_]\w*)(?:\([^)]*\))?:)?([A-Za-z_]\w*)>/g, (_m, converter: string | undefined, name: string) => {
    params.push({ name, type: converterType(converter, 'string') });
    return `{${name}}`;
  });
  return { path: normalizePath(path), params };
}

/**
 * FastAPI / Starlette braces: `{id}` or `{file_path:path}`.
 * `annotations` carries the handler's parameter annotations when known.
 */
export function fromBraceTemplate(raw: string, annotations: Record<string, string> = {}): PathTemplate {
  const params: RouteParam[] = [];
  const path = raw.replace(/\{([A-Za-z_]\w*)(?::([A-Za-z_]\w*))?\}/g, (_m, name: string, converter: string | undefined) => {
    let type = converterType(converter, 'unknown');
    if (!converter) {
      const annotation = annotations[name];
      type = annotation ? annotationType(annotation) : 'unknown';
    }
    params.push({ name, type });
    return `{${name}}`;
  });
  return { path: normalizePath(path), params };
}

function annotationType(annotation: string): ParamType {
  const base = annotation.replace(/^Optional\[(.*)\]$/, '$1').split('.').pop() ?? annotation;
  switch (base) {
    case 'int':
      return 'int';
    case 'float':
      return 'float';
    case 'str':
      return 'string';
    case 'UUID':
      return 'uuid';
    default:
      return 'unknown';
  }
}

/** Express segments: `:id`, `:id?`, `:id(\d+)`, and `*` wildcards. */
export function fromColonTemplate(raw: string): PathTemplate {
  const params: RouteParam[] = [];
  let wildcards = 0;
  const segments = raw.split('/').map((segment) => {
    if (segment === '*') {
      const name = wildcards === 0 ? 'wildcard' : `wildcard${wildcards}`;
      wildcards++;
      params.push({ name, type: 'path' });
      return `{${name}}`;
    }
    return segment.replace(/:([A-Za-z_$][\w$]*)(\([^)]*\))?\??/g, (_m, name: string, pattern: string | undefined) => {
      params.push({ name, type: pattern && /^\((?:\\d|\[0-9\])[+*]\)$/.test(pattern) ? 'int' : 'unknown' });
      return `{${name}}`;
    });
  });
  return { path: normalizePath(segments.join('/')), params };
}

const NUMERIC_PATTERN = /^\(?(?:\\d|\[0-9\])(?:[+*]|\{\d+(?:,\d*)?\})?\)?$/;
const REGEX_SYNTAX = /[[\]\\()*+?|^$]|\{\d/;
const PLACEHOLDER = /\{([A-Za-z_]\w*)\}/g;

/**
 * Django `re_path()` patterns. Anchors and a trailing optional slash are
 * dropped and named groups become parameters. Whatever regex syntax is left
 * (unnamed groups, classes like `\d+` or `[0-9]{4}`) turns its segment into a
 * positional `{argN}` parameter, so every template stays fillable.
 */
export function fromRegexTemplate(raw: string): PathTemplate {
  let params: RouteParam[] = [];
  let positional = 0;
  const nextArg = (body: string): string => {
    positional++;
    const name = `arg${positional}`;
    params.push({ name, type: NUMERIC_PATTERN.test(body) ? 'int' : 'string' });
    return `{${name}}`;
  };

  let pattern = raw.replace(/^\^/, '').replace(/\$$/, '').replace(/\/\?$/, '');
  pattern = pattern.replace(/\(\?P<([A-Za-z_]\w*)>((?:[^()]|\([^()]*\))*)\)/g, (_m, name: string, body: string) => {
    params.push({ name, type: NUMERIC_PATTERN.test(body) ? 'int' : 'string' });
    return `{${name}}`;
  });
  pattern = pattern.replace(/\((?!\?)((?:[^()]|\([^()]*\))*)\)/g, (_m, body: string) => nextArg(body));
  pattern = pattern.replace(/\[(?:\\.|[^\]\\])*\](?:[+*?]|\{\d+(?:,\d*)?\})?/g, (cls) => nextArg(cls));
  pattern = pattern.replace(/\\([./-])/g, '$1');

  const segments = pattern.split('/').map((segment) => {
    if (!REGEX_SYNTAX.test(segment.replace(PLACEHOLDER, ''))) return segment;
    const dropped = new Set([...segment.matchAll(PLACEHOLDER)].map((m) => m[1]));
    params = params.filter((p) => !dropped.has(p.name));
    return nextArg(segment);
  });
  return { path: normalizePath(segments.join('/')), params };
}
