import type { DetectionSignal } from './base.js';
import { PatternAdapter } from './base.js';
import { fromAngleTemplate, joinPaths } from '../path.js';
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

const DECORATOR = /^[ \t]*@([A-Za-z_]\w*)\.(route|get|post|put|delete|patch)[ \t]*\(/gm;
const APP_ASSIGNMENT = /^[ \t]*([A-Za-z_]\w*)\s*=\s*(?:flask\.)?(Flask|Blueprint)\s*\(/gm;
const HANDLER_DEF = /^[ \t]*(?:async[ \t]+)?def[ \t]+([A-Za-z_]\w*)/m;

/**
 * Decorator-registered routes: `@app.route('/x', methods=[...])`, the Flask 2
 * verb shortcuts, and blueprints declared with a `url_prefix` in the same file.
 */
export class FlaskAdapter extends PatternAdapter {
  readonly kind = 'flask' as const;
  readonly extensions = ['.py'] as const;
  protected readonly signals: readonly DetectionSignal[] = [
    { pattern: /^[ \t]*(?:from[ \t]+flask[ \t]+import|import[ \t]+flask)\b/m, weight: 0.6 },
    { pattern: /\bFlask\s*\(/, weight: 0.2 },
    { pattern: /\bBlueprint\s*\(/, weight: 0.2 },
    { pattern: /^[ \t]*@\w+\.route\s*\(/m, weight: 0.3 },
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

      // Verb shortcuts share their names with other frameworks' decorators;
      // only trust them on objects this file created with Flask()/Blueprint().
      if (decorator !== 'route' && objects.size > 0 && !objects.has(receiver)) continue;

      const args = splitTopLevel(masked.slice(open + 1, close));
      const ruleExpr = args[0] !== undefined && !/^\w+\s*=/.test(args[0]) ? args[0] : keywordArgument(args, 'rule');
      const rule = ruleExpr !== undefined ? stringLiteralValue(ruleExpr) : undefined;
      if (rule === undefined) continue;

      let methods: HttpMethod[];
      if (decorator === 'route') {
        const methodsExpr = keywordArgument(args, 'methods');
        methods = methodsExpr !== undefined ? toHttpMethods(listLiteralStrings(methodsExpr)) : ['GET'];
      } else {
        methods = toHttpMethods([decorator]);
      }

      const template = fromAngleTemplate(joinPaths(prefixes.get(receiver), rule));
      const handler = masked.slice(close).match(HANDLER_DEF);
      const sourceLine = lineAt(masked, start);

      for (const method of methods) {
        routes.push({
          method,
          path: template.path,
          params: template.params,
          sourceFile,
          sourceLine,
          frameworkKind: this.kind,
          ...(handler ? { handlerName: handler[1] } : {}),
        });
      }
    }

    return routes;
  }

  private collectObjects(masked: string, sourceFile: string): { objects: Set<string>; prefixes: Map<string, string> } {
    const objects = new Set<string>();
    const prefixes = new Map<string, string>();
    for (const match of masked.matchAll(APP_ASSIGNMENT)) {
      const [whole, name, ctor] = match;
      objects.add(name);
      if (ctor !== 'Blueprint') continue;
      const open = (match.index ?? 0) + whole.length - 1;
      const close = findClosing(masked, open);
      if (close === -1) {
        throw new SourceParseError('unclosed Blueprint( call', sourceFile, lineAt(masked, open));
      }
      const prefixExpr = keywordArgument(splitTopLevel(masked.slice(open + 1, close)), 'url_prefix');
      const prefix = prefixExpr !== undefined ? stringLiteralValue(prefixExpr) : undefined;
      if (prefix) prefixes.set(name, prefix);
    }
    return { objects, prefixes };
  }
}
