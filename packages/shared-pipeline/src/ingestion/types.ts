/**
 * FILE PURPOSE: Core types for the intake pipeline stages
 *
 * WHY: Every stage hands a value to the next one. Keeping those values and the
 *      capability interfaces for external tools in one place lets the pipeline be
 *      wired with real tools in the worker and with fakes in tests.
 */

import { randomUUID } from 'node:crypto';
import type { ClassificationStage } from '../errors.js';
import type { EntityRecord } from '../resources/resource.js';

/** Parsed `type/subtype; charset=value` classification. */
export interface MimeClassification {
  type: string;
  subtype: string | null;
  charset: string | null;
}

/** A classification step that failed; recorded on the job, never thrown. */
export interface ClassificationFailure {
  stage: ClassificationStage;
  message: string;
}

/** One file's passage through the pipeline. Frozen once created. */
export interface IntakeJob {
  readonly transactionId: string;
  readonly transactionTime: string;
  readonly fileReference: string;
  readonly fingerprint: string | null;
  readonly mime: MimeClassification | null;
  readonly classificationErrors: readonly ClassificationFailure[];
}

export type SourceKind = 'text-layer' | 'ocr';

export interface ExtractionResult {
  sourceKind: SourceKind;
  /** Plain text for text-layer results, hOCR markup for OCR results. */
  payload: string;
  /** transactionId of the job this was extracted from. */
  producedFrom: string;
  /** Where the OCR markup was written; null for text-layer results. */
  markupPath: string | null;
}

// ─── External tool capabilities ─────────────────────────────────────────────

export interface ContentSniffer {
  /** Raw `type/subtype[; charset=value]` line for the file. */
  sniff(path: string): Promise<string>;
}

export interface TextLayerExtractor {
  /** Text embedded in the document; empty when there is none. */
  extractText(path: string): Promise<string>;
}

export interface Rasterizer {
  /** Render every page of the document into one multi-page raster at outputPath. */
  rasterize(path: string, outputPath: string, dpi: number): Promise<void>;
}

export interface OcrEngine {
  /** Recognize the image and write markup to `<outputBase><extension>`. Returns that path. */
  recognize(imagePath: string, outputBase: string, lang: string): Promise<string>;
}

export interface ExtractionTools {
  textLayer: TextLayerExtractor;
  rasterizer: Rasterizer;
  ocr: OcrEngine;
}

/** Turns extracted text/markup into entity records. Lives outside this package. */
export interface EntityMapper {
  map(extraction: ExtractionResult, job: IntakeJob): Promise<EntityRecord[]>;
}

export function createJob(
  fileReference: string,
  classification: Pick<IntakeJob, 'fingerprint' | 'mime' | 'classificationErrors'>,
): IntakeJob {
  return Object.freeze({
    transactionId: randomUUID(),
    transactionTime: new Date().toISOString(),
    fileReference,
    fingerprint: classification.fingerprint,
    mime: classification.mime,
    classificationErrors: Object.freeze([...classification.classificationErrors]),
  });
}
