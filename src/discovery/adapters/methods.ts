import { HTTP_METHODS, type HttpMethod } from '../types.js';

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((m) => m === value);
}

/**
 * Map framework verb names to route methods, keeping order and dropping
 * duplicates. `all` becomes ANY; HEAD, OPTIONS and unknown verbs are dropped.
 */
export function toHttpMethods(names: readonly string[]): HttpMethod[] {
  const methods: HttpMethod[] = [];
  for (const name of names) {
    const upper = name.trim().toUpperCase();
    const method = upper === 'ALL' ? 'ANY' : upper;
    if (isHttpMethod(method) && !methods.includes(method)) methods.push(method);
  }
  return methods;
}
