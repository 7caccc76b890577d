/**
 * FILE PURPOSE: Intake API server with health checks and graceful shutdown
 *
 * WHY: Entry point for upstream producers and load-balancer health probes.
 * HOW: Native Node.js HTTP server, no framework. CORS origin restriction.
 *      Graceful shutdown closing all connections.
 */

import * as Sentry from '@sentry/node';
import { createServer, type IncomingMessage } from 'node:http';
import { describeError, isPlainObject, loadIntakeConfig } from '@fhir-intake/shared-pipeline';
import { handleHealthRoute } from './routes/health.js';
import { handleIntakeRoutes } from './routes/intake.js';
import { closeIntakeQueue } from './queue.js';
import { shutdownRedis } from './redis.js';

// Sentry: no-op when DSN not set
const sentryDsn = process.env.SENTRY_DSN;
if (sentryDsn) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 0.2,
    sendDefaultPii: false,
  });
}

const config = loadIntakeConfig();
const PORT = parseInt(process.env.PORT ?? '3002', 10);
const startTime = Date.now();

/** Parse allowed origins from env var (comma-separated). */
function getAllowedOrigins(): Set<string> | null {
  const raw = process.env.ALLOWED_ORIGINS;
  if (!raw) return null;
  return new Set(raw.split(',').map((o) => o.trim()).filter(Boolean));
}

/** Parse a JSON object body; anything else reads as {}. */
function parseBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString());
        resolve(isPlainObject(parsed) ? parsed : {});
      } catch {
        resolve({});
      }
    });
    req.on('error', () => resolve({}));
  });
}

export const server = createServer(async (req, res) => {
  res.setHeader('Content-Type', 'application/json');

  const allowedOrigins = getAllowedOrigins();
  const requestOrigin = req.headers.origin;

  if (allowedOrigins && requestOrigin) {
    if (allowedOrigins.has(requestOrigin)) {
      res.setHeader('Access-Control-Allow-Origin', requestOrigin);
    }
  } else {
    res.setHeader('Access-Control-Allow-Origin', '*');
  }

  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');

  if (req.method === 'OPTIONS') {
    res.statusCode = 204;
    res.end();
    return;
  }

  const url = req.url ?? '';

  if (url === '/api/health') {
    await handleHealthRoute(res, config, startTime);
    return;
  }

  if (url.startsWith('/api/intake')) {
    await handleIntakeRoutes(req, res, url, parseBody, config);
    return;
  }

  res.statusCode = 404;
  res.end(JSON.stringify({ error: 'Not found' }));
});

server.listen(PORT, () => {
  process.stdout.write(`Intake API running on port ${PORT}\n`);
});

// ─── Graceful shutdown: close all connections in order ───
process.on('SIGTERM', async () => {
  process.stdout.write('SIGTERM received, shutting down gracefully\n');

  const forceExitTimer = setTimeout(() => {
    process.stderr.write('WARN: Graceful shutdown timed out after 30s, forcing exit\n');
    process.exit(1);
  }, 30_000);
  forceExitTimer.unref();

  try {
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    process.stdout.write('  Server closed\n');

    await closeIntakeQueue();
    await shutdownRedis();
    process.stdout.write('  Redis disconnected\n');

    await Sentry.flush(2000);
    process.stdout.write('Shutdown complete\n');
  } catch (err) {
    process.stderr.write(`ERROR during shutdown: ${describeError(err)}\n`);
  }
});
