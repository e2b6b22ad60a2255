import { createDefaultAdapters, hasExtension } from './adapters/index.js';
import { loadSourceTree, sourceTreeFromMap } from './source-loader.js';
import type {
  Diagnostic,
  DuplicateRoute,
  ExtractionResult,
  FrameworkAdapter,
  FrameworkDetection,
  FrameworkKind,
  Route,
  SourceFile,
  SourceLocation,
  SourceTree,
} from './types.js';
import { routeKey } from './types.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { compareStrings } from '../utils/shared.js';
import { log } from '../utils/logger.js';

export type CollisionPolicy = 'highest' | 'merge';

export interface ExtractOptions {
  /** Run only this framework's adapter */
  framework?: FrameworkKind;
  minConfidence: number;
  /** What to do when several detected adapters read the same file */
  collisionPolicy: CollisionPolicy;
  maxFileBytes: number;
  ignoreDirs?: readonly string[];
  adapters?: FrameworkAdapter[];
}

export const DEFAULT_EXTRACT_OPTIONS: ExtractOptions = {
  minConfidence: 0.3,
  collisionPolicy: 'highest',
  maxFileBytes: 1_000_000,
};

/** A directory or file path, or an in-memory `path -> content` map. */
export type SourceInput = string | Record<string, string>;

function locationOf(route: Route): SourceLocation {
  return {
    sourceFile: route.sourceFile,
    sourceLine: route.sourceLine,
    frameworkKind: route.frameworkKind,
    ...(route.handlerName ? { handlerName: route.handlerName } : {}),
  };
}

function pickAdapters(
  file: SourceFile,
  tree: SourceTree,
  active: FrameworkAdapter[],
  policy: CollisionPolicy,
): FrameworkAdapter[] {
  const candidates = active.filter((a) => hasExtension(file.path, a.extensions));
  if (candidates.length <= 1 || policy === 'merge') return candidates;

  let best = candidates[0];
  let bestScore = -1;
  for (const adapter of candidates) {
    const score = adapter.detect({ root: tree.root, files: [file] });
    if (score > bestScore) {
      best = adapter;
      bestScore = score;
    }
  }
  return [best];
}

/**
 * Sort by (sourceFile, sourceLine) and merge exact (method, path) collisions
 * into the first entry, keeping the rest as an audit trail.
 */
export function orderAndDeduplicate(routes: Route[]): { routes: Route[]; duplicates: DuplicateRoute[] } {
  const ordered = routes
    .map((route, index) => ({ route, index }))
    .sort(
      (a, b) =>
        compareStrings(a.route.sourceFile, b.route.sourceFile) ||
        a.route.sourceLine - b.route.sourceLine ||
        a.index - b.index,
    )
    .map((entry) => entry.route);

  const kept = new Map<string, Route>();
  const duplicates = new Map<string, DuplicateRoute>();
  for (const route of ordered) {
    const key = routeKey(route);
    const first = kept.get(key);
    if (!first) {
      kept.set(key, route);
      continue;
    }
    const dup: DuplicateRoute = duplicates.get(key) ?? { method: route.method, path: route.path, kept: locationOf(first), others: [] };
    dup.others.push(locationOf(route));
    duplicates.set(key, dup);
  }

  return { routes: [...kept.values()], duplicates: [...duplicates.values()] };
}

/** Run framework detection and every selected adapter over an in-memory tree. */
export function extractFromTree(tree: SourceTree, options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS): ExtractionResult {
  const adapters = options.adapters ?? createDefaultAdapters();
  const diagnostics: Diagnostic[] = [];
  const frameworks: FrameworkDetection[] = adapters.map((a) => ({ kind: a.kind, confidence: a.detect(tree) }));

  let active: FrameworkAdapter[];
  if (options.framework) {
    active = adapters.filter((a) => a.kind === options.framework);
    if (active.length === 0) {
      throw new ConfigurationError(`No adapter registered for framework "${options.framework}"`, 'framework');
    }
  } else {
    active = adapters.filter((_a, i) => frameworks[i].confidence >= options.minConfidence);
  }

  if (active.length === 0) {
    const best = [...frameworks].sort((a, b) => b.confidence - a.confidence)[0];
    diagnostics.push({
      kind: 'NoFrameworkDetected',
      step: 'extract',
      message: best
        ? `No framework reached confidence ${options.minConfidence} (best: ${best.kind} at ${best.confidence})`
        : 'No framework adapters registered',
    });
    return { routes: [], duplicates: [], diagnostics, frameworks };
  }

  log.info(`Frameworks: ${active.map((a) => a.kind).join(', ')}`);

  const collected: Route[] = [];
  for (const file of tree.files) {
    for (const adapter of pickAdapters(file, tree, active, options.collisionPolicy)) {
      try {
        collected.push(...adapter.extractRoutes(file.content, file.path));
      } catch (err) {
        log.warn(`Skipping ${file.path} (${adapter.kind}): ${errorMessage(err)}`);
        diagnostics.push({
          kind: 'ParseFailure',
          step: 'extract',
          file: file.path,
          message: `${adapter.kind}: ${errorMessage(err)}`,
        });
      }
    }
  }

  const { routes, duplicates } = orderAndDeduplicate(collected);
  log.info(`Extracted ${routes.length} routes (${duplicates.length} duplicated)`);
  return { routes, duplicates, diagnostics, frameworks };
}

/**
 * Extract routes from a source location or an in-memory file map.
 * Never executes the target code.
 */
export function discoverRoutes(input: SourceInput, options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS): ExtractionResult & { tree: SourceTree } {
  const adapters = options.adapters ?? createDefaultAdapters();
  let tree: SourceTree;
  const loadDiagnostics: Diagnostic[] = [];

  if (typeof input === 'string') {
    const extensions = [...new Set(adapters.flatMap((a) => [...a.extensions]))];
    const loaded = loadSourceTree(input, {
      extensions,
      maxFileBytes: options.maxFileBytes,
      ...(options.ignoreDirs ? { ignoreDirs: options.ignoreDirs } : {}),
    });
    tree = loaded.tree;
    loadDiagnostics.push(...loaded.diagnostics);
  } else {
    tree = sourceTreeFromMap(input);
  }

  const result = extractFromTree(tree, { ...options, adapters });
  return { ...result, diagnostics: [...loadDiagnostics, ...result.diagnostics], tree };
}

export { createDefaultAdapters } from './adapters/index.js';
export { loadSourceTree, sourceTreeFromMap } from './source-loader.js';
export type * from './types.js';
