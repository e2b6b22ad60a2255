import { SourceParseError } from '../utils/errors.js';

// ─── Comment Masking ────────────────────────────────────────────────
//
// Adapters match route idioms with regular expressions. To keep commented-out
// routes and docstring examples from matching, comments (and Python
// docstrings) are overwritten with spaces first. Offsets and newlines are kept,
// so line numbers computed on the masked text are the real ones.

export type CommentStyle = 'python' | 'javascript';

export function maskSource(text: string, style: CommentStyle, file: string): string {
  return style === 'python' ? maskPython(text, file) : maskJavaScript(text, file);
}

function blank(out: string[], text: string, from: number, to: number): void {
  for (let k = from; k < to; k++) {
    if (text[k] !== '\n' && text[k] !== '\r') out[k] = ' ';
  }
}

/** Skip a one-line string starting at the opening quote; returns the index after it. */
function skipLineString(text: string, start: number): number {
  const quote = text[start];
  let j = start + 1;
  while (j < text.length && text[j] !== quote && text[j] !== '\n') {
    j += text[j] === '\\' ? 2 : 1;
  }
  return text[j] === quote ? j + 1 : j;
}

function maskPython(text: string, file: string): string {
  const out = text.split('');
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '#') {
      const end = text.indexOf('\n', i);
      const stop = end === -1 ? text.length : end;
      blank(out, text, i, stop);
      i = stop;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const triple = ch.repeat(3);
      if (text.startsWith(triple, i)) {
        let j = i + 3;
        while (j < text.length && !text.startsWith(triple, j)) {
          j += text[j] === '\\' ? 2 : 1;
        }
        if (j >= text.length) {
          throw new SourceParseError('unterminated triple-quoted string', file, lineAt(text, i));
        }
        blank(out, text, i, j + 3);
        i = j + 3;
        continue;
      }
      i = skipLineString(text, i);
      continue;
    }
    i++;
  }
  return out.join('');
}

const REGEX_PRECEDERS = new Set(['(', ',', '=', ':', '[', '!', '&', '|', '?', '{', '}', ';', '+', '-', '*', '%', '<', '>', '~', '^']);

function previousSignificant(text: string, index: number): string | undefined {
  for (let k = index - 1; k >= 0; k--) {
    if (!/\s/.test(text[k])) return text[k];
  }
  return undefined;
}

function skipRegexLiteral(text: string, start: number): number {
  let j = start + 1;
  let inClass = false;
  while (j < text.length && text[j] !== '\n') {
    const c = text[j];
    if (c === '\\') {
      j += 2;
      continue;
    }
    if (c === '[') inClass = true;
    else if (c === ']') inClass = false;
    else if (c === '/' && !inClass) return j + 1;
    j++;
  }
  return j;
}

function maskJavaScript(text: string, file: string): string {
  const out = text.split('');
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];
    if (ch === '/' && next === '/') {
      const end = text.indexOf('\n', i);
      const stop = end === -1 ? text.length : end;
      blank(out, text, i, stop);
      i = stop;
      continue;
    }
    if (ch === '/' && next === '*') {
      const end = text.indexOf('*/', i + 2);
      if (end === -1) {
        throw new SourceParseError('unterminated block comment', file, lineAt(text, i));
      }
      blank(out, text, i, end + 2);
      i = end + 2;
      continue;
    }
    if (ch === '/') {
      const prev = previousSignificant(text, i);
      if (prev === undefined || REGEX_PRECEDERS.has(prev)) {
        i = skipRegexLiteral(text, i);
        continue;
      }
    }
    if (ch === '"' || ch === "'") {
      i = skipLineString(text, i);
      continue;
    }
    if (ch === '`') {
      let j = i + 1;
      while (j < text.length && text[j] !== '`') {
        j += text[j] === '\\' ? 2 : 1;
      }
      if (j >= text.length) {
        throw new SourceParseError('unterminated template literal', file, lineAt(text, i));
      }
      i = j + 1;
      continue;
    }
    i++;
  }
  return out.join('');
}

// ─── Position Helpers ───────────────────────────────────────────────

/** 1-based line number of a character offset. */
export function lineAt(text: string, index: number): number {
  let line = 1;
  for (let k = 0; k < index && k < text.length; k++) {
    if (text.charCodeAt(k) === 10) line++;
  }
  return line;
}

const CLOSERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

/**
 * Index of the bracket closing the one at `openIndex`, skipping strings.
 * Returns -1 when the bracket is never closed.
 */
export function findClosing(text: string, openIndex: number): number {
  const stack: string[] = [];
  let i = openIndex;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      i = skipLineString(text, i);
      continue;
    }
    if (ch === '`') {
      const end = text.indexOf('`', i + 1);
      if (end === -1) return -1;
      i = end + 1;
      continue;
    }
    const closer = CLOSERS[ch];
    if (closer) {
      stack.push(closer);
    } else if (ch === ')' || ch === ']' || ch === '}') {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i;
    }
    i++;
  }
  return -1;
}

/** Split an argument list on commas that are not nested in brackets or strings. */
export function splitTopLevel(args: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  let i = 0;
  while (i < args.length) {
    const ch = args[i];
    if (ch === '"' || ch === "'") {
      i = skipLineString(args, i);
      continue;
    }
    if (ch === '`') {
      const end = args.indexOf('`', i + 1);
      i = end === -1 ? args.length : end + 1;
      continue;
    }
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth--;
    else if (ch === ',' && depth === 0) {
      parts.push(args.slice(start, i).trim());
      start = i + 1;
    }
    i++;
  }
  const last = args.slice(start).trim();
  if (last) parts.push(last);
  return parts;
}

/**
 * Value of a plain string literal (`'x'`, `"x"`, `r'x'`, or a template without
 * substitutions). Anything dynamic returns undefined.
 */
export function stringLiteralValue(expr: string): string | undefined {
  const m = expr.trim().match(/^([rRuUbB]{0,2})(['"`])([\s\S]*)\2$/);
  if (!m) return undefined;
  const [, prefix, quote, body] = m;
  if (quote === '`' && body.includes('${')) return undefined;
  if (body.replace(/\\./g, '').includes(quote)) return undefined;
  if (/r/i.test(prefix)) return body;
  return body.replace(/\\(["'`\\])/g, '$1');
}

/** Keyword argument value (`name=...` in Python, `name: ...` in an object literal). */
export function keywordArgument(args: string[], name: string): string | undefined {
  const pattern = new RegExp(`^${name}\\s*[=:]\\s*([\\s\\S]+)$`);
  for (const arg of args) {
    const m = arg.match(pattern);
    if (m) return m[1].trim();
  }
  return undefined;
}

/** Quoted strings inside a list or tuple literal, e.g. `['GET', "POST"]`. */
export function listLiteralStrings(expr: string): string[] {
  const values: string[] = [];
  for (const m of expr.matchAll(/(['"])([^'"]*)\1/g)) {
    values.push(m[2]);
  }
  return values;
}
