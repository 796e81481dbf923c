import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { parseOperation, snapshotToJSON } from '@pagesync/sdk';
import type { SyncCoordinator } from './sync/coordinator';

export const VERSION = '0.1.0';

const DOCUMENT_ID = /^[A-Za-z0-9_-]{1,128}$/;

const operationsBodySchema = z.object({
  operations: z.array(z.unknown()),
});

/**
 * HTTP surface: health, snapshot reads for rendering collaborators and
 * operation ingress for producers such as the compiler service
 */
export function createApp(
  coordinator: SyncCoordinator,
  options: { stats?: () => Record<string, unknown>; requestLogging?: boolean } = {}
) {
  const app = new Hono();

  // Middleware
  if (options.requestLogging ?? true) {
    app.use('*', logger());
  }
  app.use('*', cors({ origin: '*' }));

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: VERSION,
      uptime: process.uptime(),
    });
  });

  // Server info endpoint
  app.get('/', (c) => {
    return c.json({
      name: 'pagesync server',
      version: VERSION,
      description: 'Authoritative page state server',
      endpoints: {
        health: '/health',
        ws: '/ws/:documentId',
        snapshot: '/documents/:documentId',
        operations: '/documents/:documentId/operations',
      },
    });
  });

  app.get('/stats', (c) => {
    return c.json(options.stats ? options.stats() : coordinator.getStats());
  });

  app.get('/documents/:documentId', async (c) => {
    const documentId = c.req.param('documentId');
    if (!DOCUMENT_ID.test(documentId)) {
      return c.json({ error: 'Invalid document id' }, 400);
    }
    const snapshot = await coordinator.getSnapshot(documentId);
    return c.json(snapshotToJSON(snapshot));
  });

  app.post('/documents/:documentId/operations', async (c) => {
    const documentId = c.req.param('documentId');
    if (!DOCUMENT_ID.test(documentId)) {
      return c.json({ error: 'Invalid document id' }, 400);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Body must be JSON' }, 400);
    }
    const parsed = operationsBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Body must be { operations: [...] }' }, 400);
    }

    const stream = await coordinator.openStream(documentId, {
      announce: true,
      source: 'http',
    });
    const errors: string[] = [];
    parsed.data.operations.forEach((raw, index) => {
      const op = parseOperation(raw);
      if (op) {
        stream.push(op);
      } else {
        errors.push(`operations[${index}]: malformed operation`);
      }
    });
    const summary = stream.end();

    for (const rejection of summary.rejected) {
      errors.push(`${rejection.operation.t}: ${rejection.error.message}`);
    }

    return c.json({
      applied: summary.applied,
      rejected: errors.length,
      errors,
    });
  });

  app.onError((error, c) => {
    console.error('[HTTP] Unhandled error:', error);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
