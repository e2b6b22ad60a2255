import type { ErrorSignature } from '../analysis/types.js';
import { truncate } from '../utils/shared.js';

export const SUGGESTION_SYSTEM_PROMPT = `You are a deployment debugging assistant. A build or post-deploy route check has failed. You receive the error category, the normalized error message, the stack frame where it surfaced, and nearby source code.

Your job:
1. Identify the most likely root cause
2. Propose the smallest change that fixes it
3. List concrete steps a developer can follow

Rules:
- Base the answer on the evidence given; do not invent files or APIs
- If the evidence is ambiguous, say so and set "certain" to false
- Keep "summary" to one sentence

Output ONLY valid JSON matching this schema:
{
  "summary": "string - one-sentence root cause",
  "suggestedFix": "string - what to change, may include a unified diff",
  "steps": ["string"],
  "codeExample": "string (optional)",
  "certain": boolean
}`;

/** Build the user prompt, capping the code context at `maxContextChars`. */
export function buildSuggestionPrompt(signature: ErrorSignature, maxContextChars: number): string {
  const sections = [
    `Category: ${signature.category}`,
    signature.errorType ? `Error type: ${signature.errorType}` : undefined,
    `Message: ${signature.normalizedMessage}`,
    signature.location ? `Reported at: ${signature.location.file}, line ${signature.location.line}` : undefined,
    signature.anchor
      ? `Anchor frame: ${signature.anchor.file}${signature.anchor.line !== undefined ? `:${signature.anchor.line}` : ''}${signature.anchor.function ? ` in ${signature.anchor.function}` : ''}`
      : undefined,
  ].filter((s): s is string => s !== undefined);

  if (signature.codeSnippet) {
    sections.push('', 'Code context:', '```', truncate(signature.codeSnippet, maxContextChars), '```');
  }
  return sections.join('\n');
}
