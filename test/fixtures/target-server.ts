import express from 'express';
import type { Server } from 'node:http';

/**
 * Stand-in for a freshly deployed service. Every request is recorded as
 * `METHOD /path` so tests can see what the verifier sent.
 */
export function createTargetServer(): Promise<{ server: Server; url: string; hits: string[] }> {
  const app = express();
  const hits: string[] = [];

  app.use((req, _res, next) => {
    hits.push(`${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/users/:id', (req, res) => {
    if (req.params.id === '7') {
      res.json({ id: 7 });
      return;
    }
    res.status(404).json({ error: 'not found' });
  });

  app.post('/orders', (_req, res) => {
    res.status(201).json({ created: true });
  });

  app.get('/slow', (_req, res) => {
    setTimeout(() => {
      if (!res.headersSent) res.send('late');
    }, 1500);
  });

  app.get('/redirect', (_req, res) => {
    res.redirect(302, '/health');
  });

  app.get('/boom', (_req, res) => {
    res.status(500).send('boom');
  });

  app.get('/busy', (_req, res) => {
    res.status(503).send('try later');
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Target server has no TCP address'));
        return;
      }
      resolve({ server, url: `http://127.0.0.1:${address.port}`, hits });
    });
  });
}
