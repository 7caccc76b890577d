/**
 * FILE PURPOSE: Entity mapper client: sends extracted content to the mapping service
 * WHY: Entity extraction (templates, ML model, relational lookups) runs as its own
 *      service. This client is the only place the pipeline talks to it.
 *
 * Contract:
 *   POST <url>  { transactionId, sourceKind, mime, payload }
 *   200         { records: EntityRecord[] }
 * Anything else throws MappingError.
 */

import { describeError, MappingError } from '../../errors.js';
import type { EntityRecord } from '../../resources/resource.js';
import { isPlainObject } from '../../resources/resource.js';
import { mimeString } from '../classify/mime.js';
import type { EntityMapper, ExtractionResult, IntakeJob } from '../types.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export class HttpEntityMapper implements EntityMapper {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: { url: string; timeoutMs?: number }) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async map(extraction: ExtractionResult, job: IntakeJob): Promise<EntityRecord[]> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let body: unknown;
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          transactionId: job.transactionId,
          sourceKind: extraction.sourceKind,
          mime: mimeString(job.mime),
          payload: extraction.payload,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new MappingError(`Entity mapper responded with status ${response.status}`);
      }
      body = await response.json();
    } catch (err) {
      if (err instanceof MappingError) throw err;
      throw new MappingError(`Entity mapper request failed: ${describeError(err)}`, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (!isPlainObject(body) || !Array.isArray(body.records)) {
      throw new MappingError('Entity mapper response is missing a records array');
    }
    return body.records.filter(isPlainObject);
  }
}
