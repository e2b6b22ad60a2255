import { existsSync, readdirSync, readFileSync, statSync, type Dirent } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { compareStrings } from '../utils/shared.js';
import { log } from '../utils/logger.js';
import type { Diagnostic, SourceFile, SourceTree } from './types.js';

export const DEFAULT_IGNORED_DIRS = [
  'node_modules',
  '.git',
  '.hg',
  '.venv',
  'venv',
  'env',
  '__pycache__',
  '.mypy_cache',
  '.pytest_cache',
  '.tox',
  'dist',
  'build',
  'coverage',
  '.next',
  'site-packages',
] as const;

export interface LoadOptions {
  extensions: readonly string[];
  maxFileBytes: number;
  ignoreDirs?: readonly string[];
}

export interface LoadedTree {
  tree: SourceTree;
  diagnostics: Diagnostic[];
}

function wanted(name: string, extensions: readonly string[]): boolean {
  if (name.endsWith('.d.ts')) return false;
  return extensions.some((ext) => name.endsWith(ext));
}

/**
 * Read a directory (recursively) or a single file into memory. Paths in the
 * result are relative to the root and `/`-separated so ordering does not
 * depend on the host platform.
 */
export function loadSourceTree(target: string, options: LoadOptions): LoadedTree {
  const absolute = resolve(target);
  if (!existsSync(absolute)) {
    throw new ConfigurationError(`Source path does not exist: ${target}`, 'path');
  }

  const diagnostics: Diagnostic[] = [];
  const files: SourceFile[] = [];
  const ignored = new Set(options.ignoreDirs ?? DEFAULT_IGNORED_DIRS);

  const readOne = (fullPath: string, relPath: string) => {
    try {
      const size = statSync(fullPath).size;
      if (size > options.maxFileBytes) {
        diagnostics.push({
          kind: 'FileSkipped',
          step: 'extract',
          file: relPath,
          message: `File is ${size} bytes, over the ${options.maxFileBytes}-byte limit`,
        });
        return;
      }
      const content = readFileSync(fullPath, 'utf-8');
      if (content.includes('\u0000')) {
        diagnostics.push({ kind: 'FileSkipped', step: 'extract', file: relPath, message: 'Binary content' });
        return;
      }
      files.push({ path: relPath, content });
    } catch (err) {
      diagnostics.push({ kind: 'ParseFailure', step: 'extract', file: relPath, message: errorMessage(err) });
    }
  };

  if (statSync(absolute).isFile()) {
    const name = basename(absolute);
    readOne(absolute, name);
    return { tree: { root: dirname(absolute), files }, diagnostics };
  }

  const walk = (dir: string, rel: string) => {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      diagnostics.push({ kind: 'FileSkipped', step: 'extract', file: rel || '.', message: errorMessage(err) });
      return;
    }
    entries.sort((a, b) => compareStrings(a.name, b.name));
    for (const entry of entries) {
      const relPath = rel ? `${rel}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (!ignored.has(entry.name)) walk(join(dir, entry.name), relPath);
      } else if (entry.isFile() && wanted(entry.name, options.extensions)) {
        readOne(join(dir, entry.name), relPath);
      }
    }
  };

  walk(absolute, '');
  log.debug(`Loaded ${files.length} source files from ${absolute}`);
  return { tree: { root: absolute, files }, diagnostics };
}

/** Build a tree from an in-memory `path -> content` map. */
export function sourceTreeFromMap(files: Record<string, string>, root = '<memory>'): SourceTree {
  return {
    root,
    files: Object.entries(files)
      .map(([path, content]) => ({ path: path.replace(/\\/g, '/').replace(/^\.\//, ''), content }))
      .sort((a, b) => compareStrings(a.path, b.path)),
  };
}
