import type { DetectionSignal } from './base.js';
import { PatternAdapter } from './base.js';
import { fromAngleTemplate, fromRegexTemplate } from '../path.js';
import { findClosing, lineAt, maskSource, splitTopLevel, stringLiteralValue } from '../source-text.js';
import type { Route } from '../types.js';

const URL_CALL = /(?<![\w.])(path|re_path|url)\s*\(/g;

function viewName(expr: string | undefined): string | undefined {
  if (!expr) return undefined;
  const classView = expr.match(/^([A-Za-z_][\w.]*)\.as_view\s*\(/);
  if (classView) return classView[1];
  return /^[A-Za-z_][\w.]*$/.test(expr) ? expr : undefined;
}

/**
 * URLconf entries in modules that define `urlpatterns`. Django dispatches
 * every method to the view, so routes are reported as ANY. `include()` entries
 * point at other modules and are not followed.
 */
export class DjangoAdapter extends PatternAdapter {
  readonly kind = 'django' as const;
  readonly extensions = ['.py'] as const;
  protected readonly signals: readonly DetectionSignal[] = [
    { pattern: /^[ \t]*from[ \t]+django(?:\.\w+)*[ \t]+import\b/m, weight: 0.4 },
    { pattern: /\burlpatterns\s*[:=]/, weight: 0.4 },
    { pattern: /(?<![\w.])(?:re_)?path\s*\(\s*r?['"]/, weight: 0.2 },
  ];

  extractRoutes(sourceText: string, sourceFile: string): Route[] {
    const masked = maskSource(sourceText, 'python', sourceFile);
    if (!/\burlpatterns\b/.test(masked)) return [];

    const routes: Route[] = [];
    for (const match of masked.matchAll(URL_CALL)) {
      const [whole, fn] = match;
      const start = match.index ?? 0;
      const open = start + whole.length - 1;
      const close = findClosing(masked, open);
      if (close === -1) continue;

      const args = splitTopLevel(masked.slice(open + 1, close));
      const raw = args[0] !== undefined ? stringLiteralValue(args[0]) : undefined;
      if (raw === undefined || args.length < 2) continue;
      if (/^include\s*\(/.test(args[1])) continue;

      const template = fn === 'path' ? fromAngleTemplate(raw) : fromRegexTemplate(raw);
      const handlerName = viewName(args[1]);
      routes.push({
        method: 'ANY',
        path: template.path,
        params: template.params,
        sourceFile,
        sourceLine: lineAt(masked, start),
        frameworkKind: this.kind,
        ...(handlerName ? { handlerName } : {}),
      });
    }
    return routes;
  }
}
