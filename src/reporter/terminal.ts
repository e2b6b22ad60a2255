import chalk from 'chalk';
import type { Suggestion } from '../ai/types.js';
import type { ErrorSignature } from '../analysis/types.js';
import type { Diagnostic, DuplicateRoute, Route } from '../discovery/types.js';
import type { NotificationDecision } from '../notify/policy.js';
import type { Severity } from '../notify/severity.js';
import type { PipelineResult } from '../pipeline.js';
import type { CheckStatus, RouteCheckResult } from '../verifier/types.js';
import { formatDuration } from '../utils/shared.js';

const RULE = '═══════════════════════════════════════════════';

function heading(title: string): void {
  console.log();
  console.log(chalk.bold(RULE));
  console.log(chalk.bold(`  ${title}`));
  console.log(chalk.bold(RULE));
  console.log();
}

function getSeverityColor(severity: Severity) {
  switch (severity) {
    case 'critical': return chalk.bgRed.white;
    case 'high': return chalk.red;
    case 'medium': return chalk.yellow;
    case 'low': return chalk.cyan;
  }
}

function statusColor(status: CheckStatus) {
  switch (status) {
    case 'OK': return chalk.green;
    case 'ERROR_STATUS': return chalk.red;
    case 'TIMEOUT': return chalk.yellow;
    case 'UNREACHABLE': return chalk.magenta;
  }
}

export function printRoutes(routes: readonly Route[], duplicates: readonly DuplicateRoute[] = []): void {
  heading(`Routes (${routes.length})`);
  if (routes.length === 0) {
    console.log(chalk.yellow('  No routes found.'));
  }
  const width = Math.max(6, ...routes.map((r) => r.method.length));
  for (const route of routes) {
    const handler = route.handlerName ? chalk.dim(` → ${route.handlerName}`) : '';
    console.log(`  ${chalk.bold(route.method.padEnd(width))} ${route.path}${handler}`);
    console.log(`  ${' '.repeat(width)} ${chalk.dim(`${route.sourceFile}:${route.sourceLine} [${route.frameworkKind}]`)}`);
  }

  if (duplicates.length > 0) {
    console.log();
    console.log(chalk.bold.underline('Duplicates'));
    for (const dup of duplicates) {
      const others = dup.others.map((o) => `${o.sourceFile}:${o.sourceLine}`).join(', ');
      console.log(`  ${dup.method} ${dup.path}: kept ${dup.kept.sourceFile}:${dup.kept.sourceLine}, also ${others}`);
    }
  }
  console.log();
}

export function printCheckResults(results: readonly RouteCheckResult[]): void {
  const ok = results.filter((r) => r.status === 'OK').length;
  heading(`Route Checks (${ok}/${results.length} OK)`);
  for (const r of results) {
    const color = statusColor(r.status);
    const code = r.httpStatusCode !== undefined ? ` ${r.httpStatusCode}` : '';
    console.log(`  ${color(`[${r.status}${code}]`)} ${r.probeMethod} ${r.url} ${chalk.dim(formatDuration(r.latencyMs))}`);
    if (r.error) console.log(`     ${chalk.dim(r.error)}`);
  }
  console.log();
}

export function printSignature(signature: ErrorSignature): void {
  heading('Error Signature');
  console.log(`  Category:    ${chalk.bold(signature.category)}`);
  console.log(`  Fingerprint: ${signature.fingerprint}`);
  if (signature.errorType) console.log(`  Type:        ${signature.errorType}`);
  console.log(`  Message:     ${signature.normalizedMessage}`);
  if (signature.anchor) {
    const line = signature.anchor.line !== undefined ? `:${signature.anchor.line}` : '';
    const fn = signature.anchor.function ? ` in ${signature.anchor.function}` : '';
    console.log(`  Anchor:      ${signature.anchor.file}${line}${fn}`);
  }
  if (signature.codeSnippet) {
    console.log();
    for (const line of signature.codeSnippet.split('\n')) {
      console.log(chalk.dim(`     ${line}`));
    }
  }
  console.log();
}

export function printSuggestion(suggestion: Suggestion): void {
  const confidenceBadge = suggestion.confidence === 'High'
    ? chalk.green(`[${suggestion.confidence}]`)
    : suggestion.confidence === 'Medium'
      ? chalk.yellow(`[${suggestion.confidence}]`)
      : chalk.gray(`[${suggestion.confidence}]`);

  console.log(chalk.bold.underline('Suggestion'));
  console.log(`  ${confidenceBadge} ${chalk.bold(suggestion.summary)} ${chalk.dim(`(${suggestion.generatedBy})`)}`);
  console.log();
  console.log(`     ${chalk.bold('Suggested Fix:')}`);
  for (const line of suggestion.suggestedFix.split('\n')) {
    console.log(`     ${line}`);
  }

  if (suggestion.steps.length > 0) {
    console.log();
    console.log(`     ${chalk.bold('Steps:')}`);
    suggestion.steps.forEach((step, i) => console.log(`       ${i + 1}. ${step}`));
  }

  if (suggestion.codeExample) {
    console.log();
    console.log(`     ${chalk.bold('Code Example:')}`);
    console.log(chalk.dim('     ```'));
    for (const line of suggestion.codeExample.split('\n')) {
      console.log(chalk.dim(`     ${line}`));
    }
    console.log(chalk.dim('     ```'));
  }
  console.log();
}

export function printDecision(decision: NotificationDecision): void {
  const color = getSeverityColor(decision.severity);
  const verdict = decision.shouldNotify ? chalk.bold.red('NOTIFY') : chalk.green('suppress');
  console.log(chalk.bold.underline('Notification'));
  console.log(`  ${verdict} ${color(`[${decision.severity.toUpperCase()}]`)} ${decision.reason}`);
  if (decision.previousNotifiedAt) {
    console.log(`  ${chalk.dim(`last notified ${decision.previousNotifiedAt}`)}`);
  }
  console.log();
}

export function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  if (diagnostics.length === 0) return;
  console.log(chalk.bold.underline(`Diagnostics (${diagnostics.length})`));
  for (const d of diagnostics) {
    const where = d.file ?? d.route;
    console.log(`  ${chalk.yellow(d.kind)}${d.step ? chalk.dim(` [${d.step}]`) : ''}${where ? ` ${where}` : ''}: ${d.message}`);
  }
  console.log();
}

export function printPipelineResult(result: PipelineResult): void {
  if (result.commit) {
    heading(`Build ${result.commit.sha.slice(0, 7)}${result.commit.branch ? ` on ${result.commit.branch}` : ''}`);
  }
  if (result.routes.length > 0) printRoutes(result.routes, result.duplicates);
  if (result.checkResults.length > 0) printCheckResults(result.checkResults);
  if (result.signature) printSignature(result.signature);
  if (result.suggestion) printSuggestion(result.suggestion);
  if (result.notify) printDecision(result.notify);
  if (!result.signature) {
    console.log(chalk.green('  No failures detected.'));
    console.log();
  }
  printDiagnostics(result.diagnostics);
}
