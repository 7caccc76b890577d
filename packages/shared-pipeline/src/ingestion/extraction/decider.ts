/**
 * FILE PURPOSE: Extraction decider: text layer first, rasterize + OCR only without one
 *
 * WHY: OCR at 600 dpi is slow and lossy. A document that already carries
 *      machine-readable text never goes near the OCR engine.
 *
 * HOW: State machine per job, chosen by MIME type:
 *   text/*    start → try-text-layer → extracted-text            (file read directly)
 *   image/*   start → ocr → extracted-markup                     (no raster artifact)
 *   other     start → try-text-layer → extracted-text
 *                                    ↘ rasterize → ocr → extracted-markup
 *   Any tool failure moves to `failed` and throws ExtractionError.
 *   The raster lives in a scoped temp dir removed on every exit path.
 */

import { mkdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ExtractionError } from '../../errors.js';
import type { ExtractionStage } from '../../errors.js';
import type { ExtractionResult, ExtractionTools, IntakeJob, MimeClassification } from '../types.js';
import { withTempDir } from './temp.js';

export type ExtractionState =
  | 'start'
  | 'try-text-layer'
  | 'extracted-text'
  | 'rasterize'
  | 'ocr'
  | 'extracted-markup'
  | 'failed';

export type ExtractionRoute = 'plain-text' | 'image' | 'document';

export interface ExtractionOptions {
  /** Raster resolution in dots per inch. Default: 600. */
  dpi?: number;
  /** OCR language tag. Default: 'eng'. */
  lang?: string;
  /** Directory that receives `<transactionId>.hocr`. */
  outputDir: string;
  /** Called on every state change. */
  onTransition?: (state: ExtractionState, job: IntakeJob) => void;
}

export const DEFAULT_DPI = 600;
export const DEFAULT_OCR_LANG = 'eng';
const RASTER_FILE = 'raster.tiff';

export function selectRoute(mime: MimeClassification | null): ExtractionRoute {
  if (mime?.type === 'text') return 'plain-text';
  if (mime?.type === 'image') return 'image';
  return 'document';
}

export async function extractContent(
  job: IntakeJob,
  tools: ExtractionTools,
  options: ExtractionOptions,
): Promise<ExtractionResult> {
  const dpi = options.dpi ?? DEFAULT_DPI;
  const lang = options.lang ?? DEFAULT_OCR_LANG;
  const outputBase = join(options.outputDir, job.transactionId);
  const path = job.fileReference;

  const enter = (state: ExtractionState): void => {
    options.onTransition?.(state, job);
  };

  /** Run one step; any failure lands in `failed` tagged with the step's stage. */
  const step = async <T>(stage: ExtractionStage, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (err) {
      enter('failed');
      throw new ExtractionError(stage, path, { cause: err });
    }
  };

  const textResult = (payload: string): ExtractionResult => {
    enter('extracted-text');
    return { sourceKind: 'text-layer', payload, producedFrom: job.transactionId, markupPath: null };
  };

  const ocr = async (imagePath: string): Promise<ExtractionResult> => {
    enter('ocr');
    const markupPath = await step('ocr', async () => {
      await mkdir(options.outputDir, { recursive: true });
      return tools.ocr.recognize(imagePath, outputBase, lang);
    });
    const payload = await step('ocr', () => readFile(markupPath, 'utf-8'));
    enter('extracted-markup');
    return { sourceKind: 'ocr', payload, producedFrom: job.transactionId, markupPath };
  };

  enter('start');
  const route = selectRoute(job.mime);

  if (route === 'image') {
    return ocr(path);
  }

  enter('try-text-layer');

  if (route === 'plain-text') {
    const text = await step('read', () => readFile(path, 'utf-8'));
    return textResult(text);
  }

  const text = await step('text-layer', () => tools.textLayer.extractText(path));
  const trimmed = text.trim();
  if (trimmed) {
    return textResult(trimmed);
  }

  process.stderr.write(`INFO: No text layer in ${path}, rasterizing at ${dpi} dpi for OCR\n`);

  return withTempDir('fhir-intake-raster-', async (dir) => {
    enter('rasterize');
    const rasterPath = join(dir, RASTER_FILE);
    await step('rasterize', () => tools.rasterizer.rasterize(path, rasterPath, dpi));
    return ocr(rasterPath);
  });
}
