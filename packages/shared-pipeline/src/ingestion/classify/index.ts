/**
 * FILE PURPOSE: Classifier stage: fingerprint + MIME classification of one file
 * WHY: Both results travel with the job. A failure of either is recorded on the
 *      job instead of aborting it, so downstream stages still run and the error
 *      stays visible.
 */

import { ClassificationError, describeError } from '../../errors.js';
import type { ClassificationFailure, ContentSniffer, MimeClassification } from '../types.js';
import { computeFingerprint, DEFAULT_CHUNK_SIZE } from './fingerprint.js';
import { parseMimeOutput } from './mime.js';

export interface ClassifyOptions {
  sniffer: ContentSniffer;
  chunkSize?: number;
}

export interface Classification {
  fingerprint: string | null;
  mime: MimeClassification | null;
  classificationErrors: ClassificationFailure[];
}

function record(errors: ClassificationFailure[], error: ClassificationError, fileReference: string): void {
  process.stderr.write(`WARN: ${error.stage} classification failed for ${fileReference}: ${error.message}\n`);
  errors.push({ stage: error.stage, message: error.message });
}

export async function classifyFile(fileReference: string, options: ClassifyOptions): Promise<Classification> {
  const errors: ClassificationFailure[] = [];

  let fingerprint: string | null = null;
  try {
    fingerprint = await computeFingerprint(fileReference, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  } catch (err) {
    record(errors, new ClassificationError('fingerprint', `Failed to compute fingerprint: ${describeError(err)}`, { cause: err }), fileReference);
  }

  let mime: MimeClassification | null = null;
  try {
    mime = parseMimeOutput(await options.sniffer.sniff(fileReference));
    if (!mime) {
      record(errors, new ClassificationError('mime', 'Failed to determine MIME type: empty tool output'), fileReference);
    }
  } catch (err) {
    record(errors, new ClassificationError('mime', `Failed to determine MIME type: ${describeError(err)}`, { cause: err }), fileReference);
  }

  return { fingerprint, mime, classificationErrors: errors };
}
