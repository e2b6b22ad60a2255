export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'ANY';
export type FrameworkKind = 'flask' | 'express' | 'fastapi' | 'django';
export type ParamType = 'int' | 'float' | 'string' | 'uuid' | 'path' | 'unknown';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'ANY'];
export const FRAMEWORK_KINDS: readonly FrameworkKind[] = ['flask', 'express', 'fastapi', 'django'];

export interface RouteParam {
  readonly name: string;
  readonly type: ParamType;
}

export interface Route {
  readonly method: HttpMethod;
  /** Normalized template, e.g. `/users/{id}` */
  readonly path: string;
  readonly params: readonly RouteParam[];
  readonly sourceFile: string;
  readonly sourceLine: number;
  readonly frameworkKind: FrameworkKind;
  readonly handlerName?: string;
}

export interface SourceFile {
  /** Path relative to the tree root, `/`-separated */
  path: string;
  content: string;
}

export interface SourceTree {
  root: string;
  files: SourceFile[];
}

export interface SourceLocation {
  sourceFile: string;
  sourceLine: number;
  frameworkKind: FrameworkKind;
  handlerName?: string;
}

export interface DuplicateRoute {
  method: HttpMethod;
  path: string;
  kept: SourceLocation;
  others: SourceLocation[];
}

export type DiagnosticKind =
  | 'ParseFailure'
  | 'FileSkipped'
  | 'NoFrameworkDetected'
  | 'NetworkFailure'
  | 'ConfigurationError'
  | 'BackendQuotaExceeded'
  | 'BackendUnavailable'
  | 'Cancelled';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  step?: 'extract' | 'verify' | 'analyze' | 'suggest' | 'notify';
  file?: string;
  route?: string;
}

export interface FrameworkDetection {
  kind: FrameworkKind;
  confidence: number;
}

export interface ExtractionResult {
  routes: Route[];
  duplicates: DuplicateRoute[];
  diagnostics: Diagnostic[];
  frameworks: FrameworkDetection[];
}

/**
 * A route-discovery capability for one web framework.
 * Implementations parse text only; they never load or run the target code.
 */
export interface FrameworkAdapter {
  readonly kind: FrameworkKind;
  /** File extensions (with dot) this adapter reads */
  readonly extensions: readonly string[];
  /** Confidence in [0, 1] that the tree uses this framework */
  detect(tree: SourceTree): number;
  /** @throws SourceParseError when the file cannot be scanned */
  extractRoutes(sourceText: string, sourceFile: string): Route[];
}

export function routeKey(route: Pick<Route, 'method' | 'path'>): string {
  return `${route.method} ${route.path}`;
}
