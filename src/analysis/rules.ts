import type { ErrorCategory } from './types.js';

export interface CategoryRule {
  category: ErrorCategory;
  patterns: RegExp[];
}

/**
 * Ordered classification rules. The first rule with a matching pattern
 * decides the category, so specific markers sit above the generic ones.
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    category: 'SyntaxError',
    patterns: [
      /\b(?:SyntaxError|IndentationError|TabError)\b/,
      /\berror TS1\d{3}\b/,
      /\bUnexpected (?:token|end of input|identifier)\b/,
      /\bParseError\b/,
    ],
  },
  {
    category: 'ConfigError',
    patterns: [
      /\bImproperlyConfigured\b/,
      /\bConfigurationError\b/,
      /environment variable\b.*\b(?:not set|missing|undefined|required)/i,
      /missing required (?:config(?:uration)?|setting|env(?:ironment)?)/i,
      /invalid (?:config(?:uration)?|settings?) (?:file|value)/i,
      // os.environ['DATABASE_URL']
      /\bKeyError: ['"][A-Z][A-Z0-9_]{2,}['"]/,
    ],
  },
  {
    category: 'DependencyError',
    patterns: [
      /\bModuleNotFoundError\b/,
      /\bNo module named\b/,
      /\b(?:DistributionNotFound|VersionConflict)\b/,
      /Could not find a version that satisfies/i,
      /No matching distribution found/i,
      /\bERESOLVE\b/,
      /npm ERR! (?:code E404|404 Not Found|peer dep)/i,
      /Cannot find (?:module|package) '(?![./])[^']+'/,
    ],
  },
  {
    category: 'ImportError',
    patterns: [
      /\bImportError\b/,
      /cannot import name\b/,
      /Cannot find module '\.{1,2}\//,
      /\bERR_MODULE_NOT_FOUND\b/,
      /does not provide an export named\b/,
    ],
  },
  {
    category: 'RouteVerificationFailure',
    patterns: [/Route verification failed/i, /\broute checks? failed\b/i],
  },
  {
    category: 'RuntimeError',
    patterns: [/\b[A-Z]\w*(?:Error|Exception)\b/, /^Error\b/m, /Traceback \(most recent call last\)/],
  },
];

export function classify(text: string): ErrorCategory {
  for (const rule of CATEGORY_RULES) {
    if (rule.patterns.some((p) => p.test(text))) return rule.category;
  }
  return 'Unknown';
}
