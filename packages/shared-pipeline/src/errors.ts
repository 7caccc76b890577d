/**
 * FILE PURPOSE: Error kinds raised (or recorded) by the intake pipeline
 *
 * WHY: Callers branch on the kind. An ExtractionError ends the job for good,
 *      a MappingError is worth another delivery, classification and validation
 *      failures are recorded on the job/resource and never thrown past their stage.
 */

/** Which external tool failed, and how. */
export type ToolFailureKind = 'missing-binary' | 'timeout' | 'exit';

export class ToolError extends Error {
  readonly command: string;
  readonly kind: ToolFailureKind;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    command: string,
    kind: ToolFailureKind,
    details: { exitCode?: number | null; stderr?: string; cause?: unknown } = {},
  ) {
    const suffix = kind === 'exit'
      ? `exited with code ${details.exitCode ?? 'unknown'}`
      : kind === 'timeout' ? 'timed out' : 'binary not found';
    super(`${command} ${suffix}`, { cause: details.cause });
    this.name = 'ToolError';
    this.command = command;
    this.kind = kind;
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? '';
  }
}

export type ClassificationStage = 'fingerprint' | 'mime';

export class ClassificationError extends Error {
  readonly stage: ClassificationStage;

  constructor(stage: ClassificationStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClassificationError';
    this.stage = stage;
  }
}

export type ExtractionStage = 'read' | 'text-layer' | 'rasterize' | 'ocr';

export class ExtractionError extends Error {
  readonly stage: ExtractionStage;
  readonly fileReference: string;

  constructor(stage: ExtractionStage, fileReference: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
    super(`Extraction failed at ${stage} for ${fileReference}: ${reason}`, options);
    this.name = 'ExtractionError';
    this.stage = stage;
    this.fileReference = fileReference;
  }
}

export class MappingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MappingError';
  }
}

export class ValidationError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ValidationError';
    this.status = status;
  }
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
