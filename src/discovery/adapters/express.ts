import type { DetectionSignal } from './base.js';
import { PatternAdapter } from './base.js';
import { fromColonTemplate, joinPaths } from '../path.js';
import { findClosing, lineAt, maskSource, splitTopLevel, stringLiteralValue } from '../source-text.js';
import type { Route } from '../types.js';
import { toHttpMethods } from './methods.js';

const IDENT = '[A-Za-z_$][\\w$]*';
const VERB_CALL = new RegExp(`\\b(${IDENT})\\s*\\.\\s*(get|post|put|delete|patch|all)\\s*\\(`, 'g');
const ROUTE_CALL = new RegExp(`\\b(${IDENT})\\s*\\.\\s*route\\s*\\(`, 'g');
const CHAINED_VERB = /^\s*\.\s*(get|post|put|delete|patch|all)\s*\(/;
const APP_DECLARATION = new RegExp(
  `\\b(?:const|let|var)\\s+(${IDENT})\\s*(?::\\s*[\\w.<>]+\\s*)?=\\s*(?:express\\s*\\(\\s*\\)|(?:express\\s*\\.\\s*)?Router\\s*\\()`,
  'g',
);
const MOUNT = new RegExp(`\\b(${IDENT})\\s*\\.\\s*use\\s*\\(\\s*(['"\`])(/[^'"\`]*)\\2\\s*,\\s*(${IDENT})\\s*\\)`, 'g');
const CONVENTIONAL_RECEIVERS = /^(?:app|api|server|router|routes|\w*Router)$/;

interface PendingRoute {
  offset: number;
  route: Route;
}

/** Best-effort handler name: the last handler argument when it is a plain reference or a named function. */
export function handlerNameFrom(handlers: string[]): string | undefined {
  const last = handlers[handlers.length - 1];
  if (!last) return undefined;
  if (new RegExp(`^${IDENT}(?:\\.${IDENT})*$`).test(last)) return last;
  const named = last.match(new RegExp(`^(?:async\\s+)?function\\s*\\*?\\s*(${IDENT})\\s*\\(`));
  if (named) return named[1];
  const wrapped = last.match(new RegExp(`^${IDENT}\\s*\\(\\s*(${IDENT}(?:\\.${IDENT})*)\\s*\\)$`));
  if (wrapped) return wrapped[1];
  return undefined;
}

/**
 * Method-call registration: `app.get('/x', handler)`, `router.route('/x').get(...)`,
 * and `app.use('/prefix', router)` mounts declared in the same file.
 */
export class ExpressAdapter extends PatternAdapter {
  readonly kind = 'express' as const;
  readonly extensions = ['.js', '.mjs', '.cjs', '.ts', '.mts', '.cts'] as const;
  protected readonly signals: readonly DetectionSignal[] = [
    { pattern: /(?:require\s*\(\s*['"]express['"]\s*\)|from\s+['"]express['"])/, weight: 0.6 },
    { pattern: /\bexpress\s*\(\s*\)/, weight: 0.2 },
    { pattern: /\b(?:express\s*\.\s*)?Router\s*\(\s*\)/, weight: 0.1 },
    { pattern: /\.\s*(?:get|post|put|delete|patch|all)\s*\(\s*['"`]\//, weight: 0.2 },
  ];

  extractRoutes(sourceText: string, sourceFile: string): Route[] {
    const masked = maskSource(sourceText, 'javascript', sourceFile);
    const declared = new Set<string>();
    for (const match of masked.matchAll(APP_DECLARATION)) declared.add(match[1]);
    const isRouter = (name: string) => (declared.size > 0 ? declared.has(name) : CONVENTIONAL_RECEIVERS.test(name));

    const mounts = new Map<string, string>();
    for (const match of masked.matchAll(MOUNT)) {
      const [, , , prefix, router] = match;
      if (isRouter(router)) mounts.set(router, prefix);
    }

    const pending: PendingRoute[] = [];
    const emit = (receiver: string, verb: string, rawPath: string, handlers: string[], offset: number) => {
      const template = fromColonTemplate(joinPaths(mounts.get(receiver), rawPath));
      const handlerName = handlerNameFrom(handlers);
      for (const method of toHttpMethods([verb])) {
        pending.push({
          offset,
          route: {
            method,
            path: template.path,
            params: template.params,
            sourceFile,
            sourceLine: lineAt(masked, offset),
            frameworkKind: this.kind,
            ...(handlerName ? { handlerName } : {}),
          },
        });
      }
    };

    for (const match of masked.matchAll(VERB_CALL)) {
      const [whole, receiver, verb] = match;
      if (!isRouter(receiver)) continue;
      const start = match.index ?? 0;
      const open = start + whole.length - 1;
      const close = findClosing(masked, open);
      if (close === -1) continue;
      const args = splitTopLevel(masked.slice(open + 1, close));
      // `app.get('env')` is a settings lookup, not a route
      if (args.length < 2) continue;
      const rawPath = stringLiteralValue(args[0]);
      if (rawPath === undefined || !(rawPath.startsWith('/') || rawPath === '*')) continue;
      emit(receiver, verb, rawPath, args.slice(1), start);
    }

    for (const match of masked.matchAll(ROUTE_CALL)) {
      const [whole, receiver] = match;
      if (!isRouter(receiver)) continue;
      const open = (match.index ?? 0) + whole.length - 1;
      const close = findClosing(masked, open);
      if (close === -1) continue;
      const [pathExpr] = splitTopLevel(masked.slice(open + 1, close));
      const rawPath = pathExpr !== undefined ? stringLiteralValue(pathExpr) : undefined;
      if (rawPath === undefined) continue;

      let cursor = close + 1;
      for (;;) {
        const link = masked.slice(cursor).match(CHAINED_VERB);
        if (!link || link.index === undefined) break;
        const dot = cursor + masked.slice(cursor).indexOf('.');
        const linkOpen = cursor + link.index + link[0].length - 1;
        const linkClose = findClosing(masked, linkOpen);
        if (linkClose === -1) break;
        emit(receiver, link[1], rawPath, splitTopLevel(masked.slice(linkOpen + 1, linkClose)), dot);
        cursor = linkClose + 1;
      }
    }

    return pending.sort((a, b) => a.offset - b.offset).map((p) => p.route);
  }
}
