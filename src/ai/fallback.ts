import type { ErrorCategory, ErrorSignature } from '../analysis/types.js';
import type { Suggestion } from './types.js';

interface FallbackRule {
  summary: string;
  steps: string[];
}

const CATEGORY_RULES: Record<ErrorCategory, FallbackRule> = {
  SyntaxError: {
    summary: 'The source does not parse.',
    steps: [
      'Check for missing parentheses, brackets, or quotes',
      'Verify indentation is consistent',
      'Look for unclosed blocks or a missing colon after a def/class/if line',
    ],
  },
  ImportError: {
    summary: 'A module or name could not be imported.',
    steps: [
      'Check the module path and the imported name for typos',
      'Make sure the module exports the name being imported',
      'Look for circular imports between the modules involved',
    ],
  },
  DependencyError: {
    summary: 'A third-party dependency is missing or incompatible.',
    steps: [
      'Install the missing package and add it to the dependency manifest',
      'Check that the build environment installs from the same lock file',
      'Verify the package name (some packages import under a different name)',
    ],
  },
  ConfigError: {
    summary: 'Configuration required at startup is missing or invalid.',
    steps: [
      'Compare the environment variables in the deploy target with the ones the app reads',
      'Check configuration files for missing keys or wrong value types',
      'Add a startup check that names every missing setting',
    ],
  },
  RuntimeError: {
    summary: 'The application raised an error while running.',
    steps: [
      'Open the anchor frame and inspect the values involved',
      'Review recent changes to that code path',
      'Add a test that reproduces the failure before fixing it',
    ],
  },
  RouteVerificationFailure: {
    summary: 'Routes declared in the source are not answering after deploy.',
    steps: [
      'Check that the service started and is listening on the expected port',
      'Compare the failing routes with the router registration and URL prefixes',
      'Look at the server logs for errors raised while handling the failing requests',
    ],
  },
  Unknown: {
    summary: 'The failure could not be classified.',
    steps: [
      'Read the error message carefully for specific clues',
      'Check the line number mentioned in the error',
      'Review recent code changes that might have introduced the error',
      'Check the documentation for the function or feature involved',
    ],
  },
};

const ERROR_TYPE_RULES: Record<string, FallbackRule> = {
  ModuleNotFoundError: {
    summary: 'A module is not installed in the build environment.',
    steps: [
      'Install the missing module and add it to requirements or package.json',
      'Check that the virtual environment or node_modules used by the build is the one you expect',
      'Verify the package name (some packages have different import names)',
    ],
  },
  NameError: {
    summary: 'A name is used before it is defined.',
    steps: [
      'Check that the variable is defined before use',
      'Verify the spelling (names are case-sensitive)',
      'Ensure the variable is in scope where it is used',
    ],
  },
  ReferenceError: {
    summary: 'A name is used before it is defined.',
    steps: [
      'Check that the variable is declared before use',
      'Verify the spelling (names are case-sensitive)',
      'Ensure the variable is in scope where it is used',
    ],
  },
  TypeError: {
    summary: 'An operation received a value of the wrong type.',
    steps: [
      'Check the types of the values used in the failing operation',
      'Verify function arguments match the expected signature',
      'Look for a value that can be null or undefined at that point',
    ],
  },
  AttributeError: {
    summary: 'An object does not have the attribute being accessed.',
    steps: [
      'Verify the object has the attribute you are accessing',
      'Check for typos in the attribute name',
      'Ensure the object is initialized before use',
    ],
  },
  IndexError: {
    summary: 'A sequence was indexed out of range.',
    steps: [
      'Check that the index is within the valid range',
      'Remember that indexing is 0-based',
      'Verify the sequence is not empty before accessing elements',
    ],
  },
  KeyError: {
    summary: 'A mapping was read with a key it does not contain.',
    steps: [
      'Check that the key exists before accessing it',
      'Use dict.get(key, default) where a missing key is expected',
      'Verify the key spelling and type',
    ],
  },
  ValueError: {
    summary: 'A value has the right type but an invalid content.',
    steps: [
      'Check the format of the value being passed',
      'Verify conversions between types (for example string to integer)',
      'Ensure the value is within the expected range',
    ],
  },
};

function ruleFor(signature: ErrorSignature): FallbackRule {
  const byType = signature.errorType ? ERROR_TYPE_RULES[signature.errorType] : undefined;
  // Type-specific advice only where it does not contradict the category
  if (byType && signature.category !== 'SyntaxError' && signature.category !== 'RouteVerificationFailure') {
    return byType;
  }
  return CATEGORY_RULES[signature.category];
}

function whereReported(signature: ErrorSignature): string | undefined {
  const loc = signature.location ?? (signature.anchor?.line !== undefined ? { file: signature.anchor.file, line: signature.anchor.line } : undefined);
  return loc ? `near line ${loc.line} of ${loc.file}` : undefined;
}

/** Deterministic suggestion from the static table. */
export function fallbackSuggestion(signature: ErrorSignature, attempts = 0, now: () => Date = () => new Date()): Suggestion {
  const rule = ruleFor(signature);
  const where = whereReported(signature);

  let suggestedFix: string;
  if (signature.category === 'SyntaxError') {
    suggestedFix = where
      ? `Check for missing punctuation ${where}: unbalanced brackets or quotes, a missing colon or comma.`
      : 'Check for missing punctuation: unbalanced brackets or quotes, a missing colon or comma.';
  } else {
    suggestedFix = where ? `${rule.steps[0]} (${where}).` : `${rule.steps[0]}.`;
  }

  return {
    fingerprint: signature.fingerprint,
    summary: rule.summary,
    suggestedFix,
    steps: [...rule.steps],
    confidence: 'Low',
    generatedBy: 'RuleFallback',
    generatedAt: now().toISOString(),
    attempts,
  };
}
