import type { SourceFile, SourceTree } from '../discovery/types.js';
import type { StackFrame } from './types.js';

/**
 * Find the tree file a frame points at. Frames carry whatever path the
 * runtime printed (often absolute), so the match is by path suffix and the
 * longest match wins.
 */
export function findSourceFile(tree: SourceTree, file: string): SourceFile | undefined {
  const target = file.replace(/\\/g, '/');
  let best: SourceFile | undefined;
  for (const candidate of tree.files) {
    const matches = target === candidate.path || target.endsWith(`/${candidate.path}`) || candidate.path.endsWith(`/${target}`);
    if (matches && (!best || candidate.path.length > best.path.length)) best = candidate;
  }
  return best;
}

/** Lines around `line` (1-based), numbered, with the target line marked. */
export function excerpt(content: string, line: number, context: number): string {
  const lines = content.split(/\r?\n/);
  const start = Math.max(1, line - context);
  const end = Math.min(lines.length, line + context);
  const width = String(end).length;
  const out: string[] = [];
  for (let n = start; n <= end; n++) {
    const marker = n === line ? '>' : ' ';
    out.push(`${marker} ${String(n).padStart(width)} | ${lines[n - 1]}`);
  }
  return out.join('\n');
}

export function snippetForFrame(tree: SourceTree, frame: StackFrame | undefined, context: number): string | undefined {
  if (!frame || frame.line === undefined) return undefined;
  const file = findSourceFile(tree, frame.file);
  if (!file) return undefined;
  const lineCount = file.content.split(/\r?\n/).length;
  if (frame.line < 1 || frame.line > lineCount) return undefined;
  return excerpt(file.content, frame.line, context);
}
