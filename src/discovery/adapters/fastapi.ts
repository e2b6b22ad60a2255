import type { DetectionSignal } from './base.js';
import { PatternAdapter } from './base.js';
import { fromBraceTemplate, joinPaths } from '../path.js';
import {
  findClosing,
  keywordArgument,
  lineAt,
  listLiteralStrings,
  maskSource,
  splitTopLevel,
  stringLiteralValue,
} from '../source-text.js';
import { SourceParseError } from '../../utils/errors.js';
import type { HttpMethod, Route } from '../types.js';
import { toHttpMethods } from './methods.js';

const DECORATOR = /^[ \t]*@([A-Za-z_]\w*)\.(get|post|put|delete|patch|api_route)[ \t]*\(/gm;
const APP_ASSIGNMENT = /^[ \t]*([A-Za-z_]\w*)\s*=\s*(?:fastapi\.)?(FastAPI|APIRouter)\s*\(/gm;
const INCLUDE_ROUTER = /\b([A-Za-z_]\w*)\.include_router\s*\(/g;
const HANDLER_DEF = /^[ \t]*(?:async[ \t]+)?def[ \t]+([A-Za-z_]\w*)[ \t]*\(/m;

/**
 * FastAPI path operations: `@app.get('/items/{item_id}')`, `api_route` with
 * explicit methods, `APIRouter(prefix=...)` and `include_router(..., prefix=...)`
 * within one module. Parameter types come from the handler's annotations.
 */
export class FastApiAdapter extends PatternAdapter {
  readonly kind = 'fastapi' as const;
  readonly extensions = ['.py'] as const;
  protected readonly signals: readonly DetectionSignal[] = [
    { pattern: /^[ \t]*(?:from[ \t]+fastapi(?:\.\w+)*[ \t]+import|import[ \t]+fastapi)\b/m, weight: 0.6 },
    { pattern: /\b(?:FastAPI|APIRouter)\s*\(/, weight: 0.3 },
    { pattern: /^[ \t]*@\w+\.(?:get|post|put|delete|patch|api_route)\s*\(/m, weight: 0.2 },
  ];

  extractRoutes(sourceText: string, sourceFile: string): Route[] {
    const masked = maskSource(sourceText, 'python', sourceFile);
    const { objects, prefixes } = this.collectObjects(masked, sourceFile);
    const routes: Route[] = [];

    for (const match of masked.matchAll(DECORATOR)) {
      const [whole, receiver, decorator] = match;
      const start = match.index ?? 0;
      const open = start + whole.length - 1;
      const close = findClosing(masked, open);
      if (close === -1) {
        throw new SourceParseError(`unclosed @${receiver}.${decorator}( decorator`, sourceFile, lineAt(masked, start));
      }
      if (objects.size > 0 && !objects.has(receiver)) continue;

      const args = splitTopLevel(masked.slice(open + 1, close));
      const pathExpr = args[0] !== undefined && !/^\w+\s*=/.test(args[0]) ? args[0] : keywordArgument(args, 'path');
      const rawPath = pathExpr !== undefined ? stringLiteralValue(pathExpr) : undefined;
      if (rawPath === undefined) continue;

      let methods: HttpMethod[];
      if (decorator === 'api_route') {
        const methodsExpr = keywordArgument(args, 'methods');
        methods = methodsExpr !== undefined ? toHttpMethods(listLiteralStrings(methodsExpr)) : ['GET'];
      } else {
        methods = toHttpMethods([decorator]);
      }

      const handler = this.findHandler(masked, close);
      const template = fromBraceTemplate(joinPaths(prefixes.get(receiver), rawPath), handler?.annotations);
      const sourceLine = lineAt(masked, start);

      for (const method of methods) {
        routes.push({
          method,
          path: template.path,
          params: template.params,
          sourceFile,
          sourceLine,
          frameworkKind: this.kind,
          ...(handler ? { handlerName: handler.name } : {}),
        });
      }
    }

    return routes;
  }

  private findHandler(masked: string, from: number): { name: string; annotations: Record<string, string> } | undefined {
    const rest = masked.slice(from);
    const def = rest.match(HANDLER_DEF);
    if (!def || def.index === undefined) return undefined;
    const open = from + def.index + def[0].length - 1;
    const close = findClosing(masked, open);
    const annotations: Record<string, string> = {};
    if (close !== -1) {
      for (const param of splitTopLevel(masked.slice(open + 1, close))) {
        const m = param.match(/^\*{0,2}([A-Za-z_]\w*)\s*:\s*([^=]+?)\s*(?:=[\s\S]*)?$/);
        if (m) annotations[m[1]] = m[2];
      }
    }
    return { name: def[1], annotations };
  }

  private collectObjects(masked: string, sourceFile: string): { objects: Set<string>; prefixes: Map<string, string> } {
    const objects = new Set<string>();
    const ownPrefixes = new Map<string, string>();
    const includePrefixes = new Map<string, string>();

    for (const match of masked.matchAll(APP_ASSIGNMENT)) {
      const [whole, name, ctor] = match;
      objects.add(name);
      if (ctor !== 'APIRouter') continue;
      const prefix = this.prefixArgument(masked, (match.index ?? 0) + whole.length - 1, sourceFile);
      if (prefix) ownPrefixes.set(name, prefix);
    }

    for (const match of masked.matchAll(INCLUDE_ROUTER)) {
      const open = (match.index ?? 0) + match[0].length - 1;
      const close = findClosing(masked, open);
      if (close === -1) continue;
      const args = splitTopLevel(masked.slice(open + 1, close));
      const router = args[0];
      const prefixExpr = keywordArgument(args, 'prefix');
      const prefix = prefixExpr !== undefined ? stringLiteralValue(prefixExpr) : undefined;
      if (router && /^[A-Za-z_]\w*$/.test(router) && prefix) includePrefixes.set(router, prefix);
    }

    const prefixes = new Map<string, string>();
    for (const name of objects) {
      const combined = [includePrefixes.get(name), ownPrefixes.get(name)].filter((p): p is string => Boolean(p));
      if (combined.length > 0) prefixes.set(name, combined.join('/'));
    }
    return { objects, prefixes };
  }

  private prefixArgument(masked: string, open: number, sourceFile: string): string | undefined {
    const close = findClosing(masked, open);
    if (close === -1) {
      throw new SourceParseError('unclosed APIRouter( call', sourceFile, lineAt(masked, open));
    }
    const expr = keywordArgument(splitTopLevel(masked.slice(open + 1, close)), 'prefix');
    return expr !== undefined ? stringLiteralValue(expr) : undefined;
  }
}
