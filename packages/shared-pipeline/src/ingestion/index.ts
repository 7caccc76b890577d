export type {
  MimeClassification, ClassificationFailure, IntakeJob, SourceKind, ExtractionResult,
  ContentSniffer, TextLayerExtractor, Rasterizer, OcrEngine, ExtractionTools, EntityMapper,
} from './types.js';
export { createJob } from './types.js';
export { classifyFile } from './classify/index.js';
export type { Classification, ClassifyOptions } from './classify/index.js';
export { computeFingerprint, fingerprintChunks, DEFAULT_CHUNK_SIZE } from './classify/fingerprint.js';
export { parseMimeOutput, mimeString, FileCommandSniffer } from './classify/mime.js';
export { extractContent, selectRoute, DEFAULT_DPI, DEFAULT_OCR_LANG } from './extraction/decider.js';
export type { ExtractionState, ExtractionRoute, ExtractionOptions } from './extraction/decider.js';
export { PdfToTextExtractor, GhostscriptRasterizer, TesseractOcr, HOCR_EXTENSION } from './extraction/tools.js';
export { withTempDir, removeQuietly } from './extraction/temp.js';
export { HttpEntityMapper } from './mapping/http-mapper.js';
export { reconcile, reconcileToList, unionExtensions } from './reconcile/reconcile.js';
export type { ResourceSet, ScalarMergePolicy, ReconcileOptions } from './reconcile/reconcile.js';
export { enrichResource, enrichResources, DEFAULT_VALIDATION_TIMEOUT_MS } from './validation/enricher.js';
export type { EnrichOptions } from './validation/enricher.js';
export { assembleBundle } from './bundle/assembler.js';
export { checkServiceHealth } from './health.js';
export type { ServiceStatus } from './health.js';
export { parseRedisConnection } from './pipeline/connection.js';
export type { RedisConnectionOptions } from './pipeline/connection.js';
export { INTAKE_JOB_NAME, DEFAULT_QUEUE_NAME } from './pipeline/jobs.js';
export type { IntakeQueueData, QueueLease, NackOptions, WorkQueue } from './pipeline/jobs.js';
export { createIntakeQueue, enqueueFile, BullWorkQueue } from './pipeline/queue.js';
export type { BullWorkQueueOptions } from './pipeline/queue.js';
export { InMemoryWorkQueue } from './pipeline/memory-queue.js';
export type { DeadLetter } from './pipeline/memory-queue.js';
export { processFile, pollOnce } from './pipeline/processor.js';
export type {
  PipelineDependencies, IntakeOutcome, BundleSink, PollOutcome, PollOptions,
} from './pipeline/processor.js';
