const WEEKDAY = '(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun)';
const MONTH = '(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)';

/**
 * Volatile-token substitution. Order matters: wider patterns (UUIDs,
 * timestamps) run before the narrower ones that would match their pieces.
 */
const SUBSTITUTIONS: ReadonlyArray<[RegExp, string]> = [
  [/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, '<UUID>'],
  // ISO 8601 and `2024-03-12 10:00:00,123` log timestamps
  [/\b\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:[.,]\d+)?(?:Z|[+-]\d{2}:?\d{2})?/g, '<TIMESTAMP>'],
  // Common Log Format
  [/\b\d{2}\/[A-Z][a-z]{2}\/\d{4}:\d{2}:\d{2}:\d{2}(?: [+-]\d{4})?/g, '<TIMESTAMP>'],
  // ctime / syslog (`Mon Mar 12 10:00:00 2024`) and RFC 1123 (`Mon, 12 Mar 2024 10:00:00 GMT`)
  [new RegExp(`\\b(?:${WEEKDAY},? )?${MONTH} {1,2}\\d{1,2},? \\d{2}:\\d{2}:\\d{2}(?:[.,]\\d+)?(?: (?:UTC|GMT|[A-Z]{1,3}[SD]?T))?(?: \\d{4})?\\b`, 'g'), '<TIMESTAMP>'],
  [new RegExp(`\\b${WEEKDAY}, \\d{1,2} ${MONTH} \\d{4} \\d{2}:\\d{2}:\\d{2}(?: (?:[A-Z]{3}|[+-]\\d{4}))?`, 'g'), '<TIMESTAMP>'],
  [/\b\d{2}:\d{2}:\d{2}(?:[.,]\d+)?\b/g, '<TIMESTAMP>'],
  [/\b0x[0-9a-f]+\b/gi, '<ADDR>'],
  [/\b\d{10,13}\b/g, '<TIMESTAMP>'],
  [/\b(?=[0-9a-f]*[a-f])(?=[0-9a-f]*\d)[0-9a-f]{12,}\b/gi, '<ID>'],
  [/(?:\/tmp|\/var\/folders)\/[^\s'"`,:)]+/g, '<TMP>'],
  [/\btmp[_-]?[A-Za-z0-9]+\b/g, '<TMP>'],
  [/\b\d+(?:\.\d+)?\s?(?:ms|milliseconds?|s|secs?|seconds?|minutes?|mins?)\b/g, '<DURATION>'],
  [/\bline \d+/g, 'line <N>'],
  [/:\d+:\d+\b/g, ':<N>:<N>'],
  [/(\.[A-Za-z]{1,4}):\d+\b/g, '$1:<N>'],
  [/(\.[A-Za-z]{1,4})\(\d+,\d+\)/g, '$1(<N>,<N>)'],
];

/** Replace volatile substrings (addresses, ids, timestamps, temp names, line numbers) with placeholders. */
export function stripVolatile(text: string): string {
  let out = text;
  for (const [pattern, replacement] of SUBSTITUTIONS) {
    out = out.replace(pattern, replacement);
  }
  return out;
}

/** The form that goes into a fingerprint: placeholders applied, lower-cased, whitespace collapsed. */
export function skeleton(text: string): string {
  return stripVolatile(text).toLowerCase().replace(/\s+/g, ' ').trim();
}

const ERROR_LINE = /^\s*(?:[A-Za-z_][\w]*\.)*((?:[A-Z]\w*)?(?:Error|Exception|Exit|Interrupt|NotFound|Conflict))\b(?:\s*\[[A-Z_]+\])?(?:\s*:\s*(.*))?$/;

export interface ErrorLine {
  line: string;
  errorType?: string;
}

/**
 * Pick the line that names the error. Tracebacks end with it, so the search
 * runs bottom-up; stack-frame lines are never candidates.
 */
export function findErrorLine(text: string): ErrorLine {
  const lines = text.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0);
  const candidates = lines.filter((l) => !/^at\s/.test(l) && !/^File "/.test(l));

  for (let i = candidates.length - 1; i >= 0; i--) {
    const match = candidates[i].match(ERROR_LINE);
    if (match) return { line: candidates[i], errorType: match[1] };
  }
  const mentionsError = candidates.find((l) => /\b(?:error|failed|failure|fatal)\b/i.test(l));
  if (mentionsError) return { line: mentionsError };
  return { line: candidates[candidates.length - 1] ?? '' };
}
