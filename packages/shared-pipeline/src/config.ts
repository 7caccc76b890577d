/**
 * FILE PURPOSE: Environment-driven configuration for the intake pipeline
 *
 * WHY: The worker, the API server and the tests read the same knobs
 *      (tool timeouts, OCR language, validation endpoint...).
 * HOW: Pure function of an env map. Missing or unparseable numbers fall back to
 *      their defaults; unknown enum values fall back with a WARN.
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { BundleType } from '@fhir-intake/shared-types';
import type { ScalarMergePolicy } from './ingestion/reconcile/reconcile.js';

export interface IntakeConfig {
  redisUrl: string;
  queueName: string;
  visibilityTimeoutMs: number;
  pollIntervalMs: number;
  hashChunkSize: number;
  rasterDpi: number;
  ocrLang: string;
  ocrOutputDir: string;
  toolTimeoutMs: number;
  entityMapperUrl: string;
  validationUrl: string | null;
  validationTimeoutMs: number;
  bundleType: BundleType;
  bundleOutputDir: string;
  scalarMergePolicy: ScalarMergePolicy;
}

type Env = Record<string, string | undefined>;

const BUNDLE_TYPES: readonly BundleType[] = [
  'document', 'message', 'transaction', 'transaction-response',
  'batch', 'batch-response', 'history', 'searchset', 'collection',
];

const MERGE_POLICIES: readonly ScalarMergePolicy[] = ['first-wins', 'last-wins'];

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function oneOf<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T, name: string): T {
  if (!raw) return fallback;
  const match = allowed.find((candidate) => candidate === raw);
  if (match) return match;
  process.stderr.write(`WARN: ${name}=${raw} is not one of ${allowed.join(', ')}; using ${fallback}\n`);
  return fallback;
}

export function loadIntakeConfig(env: Env = process.env): IntakeConfig {
  return {
    redisUrl: env.REDIS_URL || 'redis://localhost:6379',
    queueName: env.INTAKE_QUEUE_NAME || 'file_queue',
    visibilityTimeoutMs: positiveInt(env.VISIBILITY_TIMEOUT_MS, 300_000),
    pollIntervalMs: positiveInt(env.POLL_INTERVAL_MS, 1000),
    hashChunkSize: positiveInt(env.HASH_CHUNK_SIZE, 65_536),
    rasterDpi: positiveInt(env.RASTER_DPI, 600),
    ocrLang: env.OCR_LANG || 'eng',
    ocrOutputDir: env.OCR_OUTPUT_DIR || join(tmpdir(), 'fhir-intake-ocr'),
    toolTimeoutMs: positiveInt(env.TOOL_TIMEOUT_MS, 120_000),
    entityMapperUrl: env.ENTITY_MAPPER_URL || 'http://localhost:8000/map',
    validationUrl: env.VALIDATION_URL || null,
    validationTimeoutMs: positiveInt(env.VALIDATION_TIMEOUT_MS, 5000),
    bundleType: oneOf(env.BUNDLE_TYPE, BUNDLE_TYPES, 'collection', 'BUNDLE_TYPE'),
    bundleOutputDir: env.BUNDLE_OUTPUT_DIR || './bundles',
    scalarMergePolicy: oneOf(env.SCALAR_MERGE_POLICY, MERGE_POLICIES, 'first-wins', 'SCALAR_MERGE_POLICY'),
  };
}
