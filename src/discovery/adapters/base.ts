import type { FrameworkAdapter, FrameworkKind, Route, SourceFile, SourceTree } from '../types.js';

export interface DetectionSignal {
  pattern: RegExp;
  weight: number;
}

export function hasExtension(path: string, extensions: readonly string[]): boolean {
  if (path.endsWith('.d.ts')) return false;
  return extensions.some((ext) => path.endsWith(ext));
}

/**
 * Shared detection for pattern-driven adapters: each file scores the sum of
 * the weights of the signals it contains (capped at 1), and the tree scores
 * its best file.
 */
export abstract class PatternAdapter implements FrameworkAdapter {
  abstract readonly kind: FrameworkKind;
  abstract readonly extensions: readonly string[];
  protected abstract readonly signals: readonly DetectionSignal[];

  appliesTo(file: SourceFile): boolean {
    return hasExtension(file.path, this.extensions);
  }

  scoreFile(content: string): number {
    let score = 0;
    for (const signal of this.signals) {
      if (signal.pattern.test(content)) score += signal.weight;
    }
    return Math.round(Math.min(score, 1) * 100) / 100;
  }

  detect(tree: SourceTree): number {
    let best = 0;
    for (const file of tree.files) {
      if (!this.appliesTo(file)) continue;
      best = Math.max(best, this.scoreFile(file.content));
      if (best === 1) break;
    }
    return best;
  }

  abstract extractRoutes(sourceText: string, sourceFile: string): Route[];
}
