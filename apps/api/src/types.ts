/**
 * FILE PURPOSE: Shared types and error handling for API route handlers
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { describeError } from '@fhir-intake/shared-pipeline';

export type BodyParser = (req: IncomingMessage) => Promise<Record<string, unknown>>;

export function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.statusCode = statusCode;
  res.end(JSON.stringify(body));
}

export function handleRouteError(res: ServerResponse, routeName: string, err: unknown): void {
  process.stderr.write(`ERROR in ${routeName} routes: ${describeError(err)}\n`);
  if (!res.writableEnded) {
    sendJson(res, 500, { error: 'Internal server error' });
  }
}
