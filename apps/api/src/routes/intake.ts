/**
 * FILE PURPOSE: Intake API route: hands a file reference to the worker pool
 * WHY: Upstream systems drop files on shared storage and announce them here. The
 *      route only checks the reference and enqueues it; all processing happens in
 *      the worker.
 *
 * Routes:
 *   POST /api/intake  { fileReference }  → 202 { jobId, fileReference, queue }
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { stat } from 'node:fs/promises';
import { enqueueFile } from '@fhir-intake/shared-pipeline';
import type { IntakeConfig } from '@fhir-intake/shared-pipeline';
import { getIntakeQueue } from '../queue.js';
import type { BodyParser } from '../types.js';
import { handleRouteError, sendJson } from '../types.js';

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function handleIntakeRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  parseBody: BodyParser,
  config: Pick<IntakeConfig, 'redisUrl' | 'queueName'>,
): Promise<void> {
  try {
    const { pathname } = new URL(url, 'http://localhost');

    if (pathname === '/api/intake' && req.method === 'POST') {
      const body = await parseBody(req);
      const fileReference = typeof body.fileReference === 'string' ? body.fileReference.trim() : '';

      if (!fileReference) {
        sendJson(res, 400, { error: 'fileReference (string) is required' });
        return;
      }

      if (!(await isRegularFile(fileReference))) {
        sendJson(res, 422, { error: `File not found: ${fileReference}` });
        return;
      }

      const jobId = await enqueueFile(getIntakeQueue(config), fileReference);
      process.stderr.write(`INFO: Enqueued ${fileReference} as job ${jobId}\n`);
      sendJson(res, 202, { jobId, fileReference, queue: config.queueName });
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  } catch (err) {
    handleRouteError(res, 'intake', err);
  }
}
