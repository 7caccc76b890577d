/**
 * FILE PURPOSE: Barrel export for the document intake pipeline
 *
 * WHY: Single import point for the worker and the API.
 *      Import: `import { processFile, BullWorkQueue, loadIntakeConfig } from '@fhir-intake/shared-pipeline'`
 */

// ─── Configuration ──────────────────────────────────────────────────────────
export { loadIntakeConfig } from './config.js';
export type { IntakeConfig } from './config.js';

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  ToolError, ClassificationError, ExtractionError, MappingError, ValidationError, describeError,
} from './errors.js';
export type { ToolFailureKind, ClassificationStage, ExtractionStage } from './errors.js';

// ─── External tools ─────────────────────────────────────────────────────────
export { runTool } from './tools/exec.js';
export type { RunToolOptions, ToolOutput } from './tools/exec.js';

// ─── Resources ──────────────────────────────────────────────────────────────
export {
  toResource, toFhirJson, identityKey, isPlainObject, isJsonValue, isJsonObject,
  UNKNOWN_ID, UNKNOWN_RESOURCE_TYPE,
} from './resources/resource.js';
export type { Resource, EntityRecord, IdentityKey } from './resources/resource.js';

// ─── Intake pipeline ────────────────────────────────────────────────────────
export * from './ingestion/index.js';
