import type { ParamType, Route } from '../discovery/types.js';

export const DEFAULT_PLACEHOLDERS: Record<ParamType, string> = {
  int: '0',
  float: '0.0',
  uuid: '00000000-0000-0000-0000-000000000000',
  string: 'a',
  path: 'a',
  unknown: 'placeholder',
};

/**
 * Fill a route template with concrete values. Overrides are keyed by
 * parameter name and win over the per-type default.
 */
export function fillTemplate(route: Pick<Route, 'path' | 'params'>, overrides: Record<string, string> = {}): string {
  const types = new Map(route.params.map((p) => [p.name, p.type]));
  return route.path.replace(/\{([^}]+)\}/g, (_m, name: string) => {
    const value = overrides[name] ?? DEFAULT_PLACEHOLDERS[types.get(name) ?? 'unknown'];
    return encodeURIComponent(value);
  });
}

/**
 * Resolve a filled path against the base URL, keeping any path prefix the
 * base carries (`https://host/api` + `/users` gives `https://host/api/users`).
 */
export function buildProbeUrl(baseUrl: string, filledPath: string): string {
  const base = new URL(baseUrl);
  const prefix = base.pathname.replace(/\/+$/, '');
  base.pathname = `${prefix}${filledPath}`;
  base.search = '';
  base.hash = '';
  return base.href;
}
