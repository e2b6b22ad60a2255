#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
loadEnv({ path: '.env.local', override: false });
loadEnv({ override: false }); // fallback to .env

import { Command, program } from 'commander';
import { readFileSync } from 'node:fs';
import { createBackendFromEnv } from './ai/client.js';
import { generateSuggestion } from './ai/suggester.js';
import { createSignature } from './analysis/index.js';
import type { ConfigOverrides, DeployLensConfig } from './config/defaults.js';
import { buildConfig, mergeOverrides } from './config/defaults.js';
import { loadConfigFile } from './config/file.js';
import { discoverRoutes } from './discovery/index.js';
import type { Diagnostic, FrameworkKind } from './discovery/types.js';
import { FRAMEWORK_KINDS } from './discovery/types.js';
import { EMPTY_HISTORY, JsonFileHistoryStore } from './notify/history.js';
import { severityResolver } from './notify/severity.js';
import { runPipeline, type BuildStatus } from './pipeline.js';
import { printJson, writeJsonReport } from './reporter/json.js';
import {
  printCheckResults,
  printDiagnostics,
  printPipelineResult,
  printRoutes,
  printSignature,
  printSuggestion,
} from './reporter/terminal.js';
import { validateCliOptions, VALID_PROFILES, type CliOptions } from './utils/cli-validation.js';
import { ConfigurationError, errorMessage, SuggestionUnavailableError } from './utils/errors.js';
import { log, setLogLevel } from './utils/logger.js';
import { withTimeout } from './utils/shared.js';
import { verifyRoutes } from './verifier/index.js';

const pkg: { version?: string } = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));

interface CommonFlags {
  format: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface ExtractFlags extends CommonFlags {
  framework?: string;
}

interface VerifyFlags extends ExtractFlags {
  timeout?: string;
  concurrency?: string;
  delay?: string;
  retries?: string;
  profile?: string;
  unsafeMethods?: boolean;
}

interface AnalyzeFlags extends CommonFlags {
  snippet?: string;
  ai: boolean;
}

interface RunFlags extends CommonFlags {
  status: string;
  log?: string;
  source?: string;
  baseUrl?: string;
  history?: string;
  commit?: string;
  branch?: string;
  snippet?: string;
  output?: string;
  ai: boolean;
}

// Interrupts abort in-flight probes and backend calls; partial output is still printed.
const interrupt = new AbortController();
const onSignal = () => {
  if (interrupt.signal.aborted) process.exit(130);
  log.warn('Interrupted, finishing with partial results...');
  interrupt.abort();
  process.exitCode = 130;
};
process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

function applyVerbosity(flags: CommonFlags): void {
  if (flags.verbose) setLogLevel('debug');
  else if (flags.quiet) setLogLevel('silent');
}

function validate(options: CliOptions): void {
  const errors = validateCliOptions(options);
  if (errors.length > 0) {
    const detail = errors.map((e) => `${e.field}: ${e.message}`).join('\n  ');
    throw new ConfigurationError(`Invalid options:\n  ${detail}`);
  }
}

function frameworkFlag(value: string | undefined): FrameworkKind | undefined {
  return FRAMEWORK_KINDS.find((k) => k === value);
}

function intFlag(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function resolveConfig(cli: ConfigOverrides): DeployLensConfig {
  return buildConfig(mergeOverrides(loadConfigFile(), cli));
}

function verificationOverrides(flags: VerifyFlags): ConfigOverrides['verification'] {
  const out: NonNullable<ConfigOverrides['verification']> = {};
  const profile = VALID_PROFILES.find((p) => p === flags.profile);
  if (profile) out.profile = profile;
  const timeoutMs = intFlag(flags.timeout);
  if (timeoutMs !== undefined) out.timeoutMs = timeoutMs;
  const concurrency = intFlag(flags.concurrency);
  if (concurrency !== undefined) out.concurrency = concurrency;
  const minDelayMs = intFlag(flags.delay);
  if (minDelayMs !== undefined) out.minDelayMs = minDelayMs;
  const retries = intFlag(flags.retries);
  if (retries !== undefined) out.retries = retries;
  if (flags.unsafeMethods) out.probeUnsafeMethods = true;
  return out;
}

function extractionOverrides(flags: ExtractFlags): ConfigOverrides['extraction'] {
  const framework = frameworkFlag(flags.framework);
  return framework ? { framework } : {};
}

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    throw new ConfigurationError('analyze reads the error text from stdin; pipe a log or stack trace into it', 'stdin');
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/** Run a command action, mapping failures onto exit code 1. */
function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof SuggestionUnavailableError) {
        log.error(err.message);
      } else {
        log.error(`deploylens failed: ${errorMessage(err)}`);
        if (err instanceof Error && err.stack) log.debug(err.stack);
      }
      process.exitCode = 1;
    }
  };
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('-f, --format <format>', 'Output format: json, terminal', 'json')
    .option('--verbose', 'Enable verbose logging', false)
    .option('--quiet', 'Only print the result', false);
}

program
  .name('deploylens')
  .description('Route discovery, post-deploy verification and build failure triage')
  .version(pkg.version ?? '0.0.0');

withCommonOptions(
  program
    .command('extract')
    .description('List the HTTP routes declared in a source tree')
    .argument('<path>', 'Source directory or file')
    .option('--framework <kind>', `Only run one adapter: ${FRAMEWORK_KINDS.join(', ')}`),
).action(
  action(async (path: string, flags: ExtractFlags) => {
    applyVerbosity(flags);
    validate({ format: flags.format, framework: flags.framework });
    log.banner();

    const config = resolveConfig({ extraction: extractionOverrides(flags) });
    const { routes, duplicates, diagnostics, frameworks } = discoverRoutes(path, config.extraction);

    if (flags.format === 'terminal') {
      printRoutes(routes, duplicates);
      printDiagnostics(diagnostics);
    } else {
      printJson({ routes, duplicates, diagnostics, frameworks });
    }
  }),
);

withCommonOptions(
  program
    .command('verify')
    .description('Extract routes and probe them against a running deployment')
    .argument('<path>', 'Source directory or file')
    .argument('<baseUrl>', 'Base URL of the deployment')
    .option('--framework <kind>', `Only run one adapter: ${FRAMEWORK_KINDS.join(', ')}`)
    .option('-p, --profile <profile>', `Probe pacing: ${VALID_PROFILES.join(', ')}`)
    .option('--timeout <ms>', 'Per-probe timeout in milliseconds')
    .option('--concurrency <n>', 'Probes in flight at once')
    .option('--delay <ms>', 'Minimum spacing between probe starts')
    .option('--retries <n>', 'Retries after a network failure')
    .option('--unsafe-methods', 'Send POST/PUT/PATCH/DELETE as-is instead of OPTIONS', false),
).action(
  action(async (path: string, baseUrl: string, flags: VerifyFlags) => {
    applyVerbosity(flags);
    validate({
      format: flags.format,
      framework: flags.framework,
      profile: flags.profile,
      timeout: flags.timeout,
      concurrency: flags.concurrency,
      delay: flags.delay,
      retries: flags.retries,
      baseUrl,
    });
    log.banner();

    const config = resolveConfig({ extraction: extractionOverrides(flags), verification: verificationOverrides(flags) });
    const extraction = discoverRoutes(path, config.extraction);
    const verification = await verifyRoutes(extraction.routes, {
      ...config.verification,
      baseUrl,
      signal: interrupt.signal,
    });
    const diagnostics: Diagnostic[] = [...extraction.diagnostics, ...verification.diagnostics];

    if (flags.format === 'terminal') {
      printCheckResults(verification.results);
      printDiagnostics(diagnostics);
    } else {
      printJson({ routes: extraction.routes, checkResults: verification.results, cancelled: verification.cancelled, diagnostics });
    }
  }),
);

withCommonOptions(
  program
    .command('analyze')
    .description('Classify an error read from stdin and suggest a fix')
    .option('--snippet <file>', 'Source excerpt to send along with the error')
    .option('--no-ai', 'Skip the generative backend (use the rule table)'),
).action(
  action(async (flags: AnalyzeFlags) => {
    applyVerbosity(flags);
    validate({ format: flags.format, snippet: flags.snippet });

    const config = resolveConfig({ suggestion: { useAI: flags.ai } });
    const raw = await readStdin();
    if (raw.trim() === '') throw new ConfigurationError('No error text on stdin', 'stdin');

    const snippet = flags.snippet ? readFileSync(flags.snippet, 'utf-8') : undefined;
    const signature = createSignature(raw, {
      ...(snippet ? { codeSnippet: snippet } : {}),
      maxSnippetChars: config.analysis.maxSnippetChars,
    });
    const { suggestion, diagnostics } = await generateSuggestion(signature, {
      ...config.suggestion,
      backend: config.suggestion.useAI ? createBackendFromEnv(config.suggestion.model) : null,
      signal: withTimeout(config.suggestion.budgetMs, interrupt.signal),
    });
    const severity = severityResolver(config.notification.severities)(signature.category);

    if (flags.format === 'terminal') {
      printSignature(signature);
      printSuggestion(suggestion);
      printDiagnostics(diagnostics);
    } else {
      printJson({ signature, severity, suggestion, diagnostics });
    }
  }),
);

withCommonOptions(
  program
    .command('run')
    .description('Run the whole pipeline for one build event')
    .requiredOption('--status <status>', 'Build outcome: Success or Failed')
    .option('--log <file>', 'Build log (required reading when the build failed)')
    .option('--source <path>', 'Source directory to extract routes from')
    .option('--base-url <url>', 'Deployment to verify the routes against')
    .option('--history <file>', 'JSON file holding fingerprint history')
    .option('--commit <sha>', 'Commit that triggered the build')
    .option('--branch <name>', 'Branch of that commit')
    .option('--snippet <file>', 'Source excerpt to send along with the error')
    .option('-o, --output <file>', 'Also write the JSON result to a file')
    .option('--no-ai', 'Skip the generative backend (use the rule table)'),
).action(
  action(async (flags: RunFlags) => {
    applyVerbosity(flags);
    validate({
      format: flags.format,
      status: flags.status,
      log: flags.log,
      source: flags.source,
      baseUrl: flags.baseUrl,
      snippet: flags.snippet,
    });
    log.banner();

    const status: BuildStatus = flags.status === 'Failed' ? 'Failed' : 'Success';
    if (status === 'Failed' && !flags.log) {
      throw new ConfigurationError('--log is required when --status is Failed', '--log');
    }
    const config = resolveConfig({ suggestion: { useAI: flags.ai } });
    const store = flags.history ? new JsonFileHistoryStore(flags.history) : undefined;
    const history = store ? await store.snapshot() : EMPTY_HISTORY;
    const snippet = flags.snippet ? readFileSync(flags.snippet, 'utf-8') : undefined;

    const result = await runPipeline(
      {
        build: {
          status,
          rawLog: flags.log ? readFileSync(flags.log, 'utf-8') : '',
          ...(flags.commit ? { commit: { sha: flags.commit, ...(flags.branch ? { branch: flags.branch } : {}) } } : {}),
        },
        ...(flags.source ? { source: flags.source } : {}),
        ...(flags.baseUrl ? { baseUrl: flags.baseUrl } : {}),
        ...(snippet ? { codeSnippet: snippet } : {}),
      },
      {
        config,
        backend: config.suggestion.useAI ? createBackendFromEnv(config.suggestion.model) : null,
        history,
        signal: interrupt.signal,
      },
    );

    if (store && result.signature && result.notify) {
      await store.record({
        fingerprint: result.signature.fingerprint,
        category: result.signature.category,
        severity: result.notify.severity,
        occurredAt: result.signature.occurredAt,
        notified: result.notify.shouldNotify,
      });
    }

    if (flags.format === 'terminal') {
      printPipelineResult(result);
    } else {
      printJson(result);
    }
    if (flags.output) writeJsonReport(result, flags.output);
    // Backend down with the rule fallback disabled: the result is printed, the run still fails
    if (result.signature && !result.suggestion && !interrupt.signal.aborted) process.exitCode = 1;
  }),
);

await program.parseAsync();
