export type ErrorCategory =
  | 'SyntaxError'
  | 'ImportError'
  | 'RuntimeError'
  | 'ConfigError'
  | 'DependencyError'
  | 'RouteVerificationFailure'
  | 'Unknown';

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  'SyntaxError',
  'ImportError',
  'RuntimeError',
  'ConfigError',
  'DependencyError',
  'RouteVerificationFailure',
  'Unknown',
];

export interface StackFrame {
  file: string;
  line?: number;
  function?: string;
  isApplicationCode: boolean;
}

export interface ErrorSignature {
  category: ErrorCategory;
  /** 16 hex chars */
  fingerprint: string;
  rawMessage: string;
  /** Language-level error name, e.g. `KeyError` */
  errorType?: string;
  /** The error line with volatile tokens replaced by placeholders */
  normalizedMessage: string;
  anchor?: StackFrame;
  /** File and line the message itself reports */
  location?: { file: string; line: number };
  codeSnippet?: string;
  occurredAt: string;
}
