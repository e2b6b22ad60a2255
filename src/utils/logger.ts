import chalk from 'chalk';
import { readFileSync } from 'node:fs';

const loggerPkg: { version?: string } = JSON.parse(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
);

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 19);
}

// Everything goes to stderr: stdout is reserved for the structured result.
export const log = {
  debug(msg: string, ...args: unknown[]): void {
    if (shouldLog('debug')) {
      console.error(chalk.gray(`[${timestamp()}] DBG ${msg}`), ...args);
    }
  },
  info(msg: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.error(chalk.blue(`[${timestamp()}]`) + ` ${msg}`, ...args);
    }
  },
  warn(msg: string, ...args: unknown[]): void {
    if (shouldLog('warn')) {
      console.error(chalk.yellow(`[${timestamp()}] WARN ${msg}`), ...args);
    }
  },
  error(msg: string, ...args: unknown[]): void {
    if (shouldLog('error')) {
      console.error(chalk.red(`[${timestamp()}] ERR ${msg}`), ...args);
    }
  },
  banner(): void {
    if (!shouldLog('info')) return;
    const version = loggerPkg.version ?? '0.0.0';
    console.error(chalk.bold.cyan(`
  ╔═══════════════════════════════════════╗
  ║         deploylens v${version.padEnd(18)}║
  ║   Routes, probes and failure triage   ║
  ╚═══════════════════════════════════════╝
`));
  },
};
