import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { log } from '../utils/logger.js';

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** The only thing written to stdout in JSON mode. */
export function printJson(value: unknown): void {
  process.stdout.write(`${toJson(value)}\n`);
}

export function writeJsonReport(value: unknown, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, toJson(value), 'utf-8');
  log.info(`JSON report written to: ${outputPath}`);
}
