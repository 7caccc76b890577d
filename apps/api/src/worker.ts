/**
 * FILE PURPOSE: Standalone intake worker process
 * WHY: Runs separately from the HTTP server so OCR-heavy jobs never block API
 *      requests. Start more processes for more throughput. Start via `npm run worker`.
 */

import * as Sentry from '@sentry/node';
import {
  BullWorkQueue,
  FileCommandSniffer,
  GhostscriptRasterizer,
  HttpEntityMapper,
  PdfToTextExtractor,
  TesseractOcr,
  loadIntakeConfig,
} from '@fhir-intake/shared-pipeline';
import type { PipelineDependencies } from '@fhir-intake/shared-pipeline';
import { FileBundleSink } from './services/bundle-store.js';
import { runIntakeLoop } from './services/intake-loop.js';

const sentryDsn = process.env.SENTRY_DSN;
if (sentryDsn) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 0,
    sendDefaultPii: false,
  });
}

const config = loadIntakeConfig();
const toolOptions = { timeoutMs: config.toolTimeoutMs };

const deps: PipelineDependencies = {
  sniffer: new FileCommandSniffer(toolOptions),
  tools: {
    textLayer: new PdfToTextExtractor(toolOptions),
    rasterizer: new GhostscriptRasterizer(toolOptions),
    ocr: new TesseractOcr(toolOptions),
  },
  mapper: new HttpEntityMapper({ url: config.entityMapperUrl }),
  extraction: { dpi: config.rasterDpi, lang: config.ocrLang, outputDir: config.ocrOutputDir },
  validation: { url: config.validationUrl, timeoutMs: config.validationTimeoutMs },
  hashChunkSize: config.hashChunkSize,
  bundleType: config.bundleType,
  scalarPolicy: config.scalarMergePolicy,
};

const queue = new BullWorkQueue({
  redisUrl: config.redisUrl,
  queueName: config.queueName,
  visibilityTimeoutMs: config.visibilityTimeoutMs,
});

let stopping = false;

function requestStop(signal: string): void {
  if (stopping) return;
  stopping = true;
  process.stderr.write(`INFO: ${signal} received, finishing current job before exit\n`);
}

process.on('SIGTERM', () => requestStop('SIGTERM'));
process.on('SIGINT', () => requestStop('SIGINT'));

process.stderr.write(
  `INFO: Intake worker started (queue=${config.queueName}, validation=${config.validationUrl ?? 'off'})\n`,
);

try {
  const stats = await runIntakeLoop(queue, deps, {
    sink: new FileBundleSink(config.bundleOutputDir),
    pollIntervalMs: config.pollIntervalMs,
    shouldStop: () => stopping,
    onError: (err, lease) => {
      Sentry.captureException(err, { extra: { fileReference: lease.fileReference, attempt: lease.attempt } });
    },
    onPollError: (err) => {
      Sentry.captureException(err);
    },
  });
  process.stderr.write(
    `INFO: Worker stopped: ${stats.completed} completed, ${stats.failed} failed, ${stats.retried} retried\n`,
  );
} finally {
  await queue.close();
  await Sentry.flush(2000);
}
