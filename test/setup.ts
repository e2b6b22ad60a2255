import type { Server } from 'node:http';
import { createTargetServer } from './fixtures/target-server.js';

let server: Server | undefined;
let baseUrl = '';
let requestLog: string[] = [];

export async function startTestServer(): Promise<string> {
  const started = await createTargetServer();
  server = started.server;
  baseUrl = started.url;
  requestLog = started.hits;
  return baseUrl;
}

export async function stopTestServer(): Promise<void> {
  return new Promise((resolve) => {
    const running = server;
    if (!running) return resolve();
    server = undefined;
    const timeout = setTimeout(() => {
      running.closeAllConnections();
      resolve();
    }, 3000);
    running.closeAllConnections();
    running.close(() => {
      clearTimeout(timeout);
      resolve();
    });
  });
}

export function getTestUrl(): string {
  if (!baseUrl) throw new Error('Test server not started. Call startTestServer() first.');
  return baseUrl;
}

/** Requests the server has seen since it started, as `METHOD /path`. */
export function getRequestLog(): readonly string[] {
  return requestLog;
}
