/**
 * FILE PURPOSE: Validation enricher: annotates each resource with external validation results
 *
 * WHY: Codes and references are checked by a terminology/validation service the
 *      pipeline does not own. One unreachable or broken endpoint must not stall or
 *      fail the batch, so every failure becomes an error record on the resource.
 *
 * HOW: POST the FHIR JSON form, bounded by a timeout.
 *   200 + { results }      → results attached verbatim
 *   other status           → [{ error: "Validation service responded with status <n>" }]
 *   transport/timeout/JSON → [{ error: <message> }]
 *   Never throws. Only `validationResults` differs from the input.
 */

import type { ValidationResult } from '@fhir-intake/shared-types';
import { describeError, ValidationError } from '../../errors.js';
import type { Resource } from '../../resources/resource.js';
import { isJsonValue, isPlainObject, toFhirJson } from '../../resources/resource.js';

export const DEFAULT_VALIDATION_TIMEOUT_MS = 5000;
const EXPECTED_STATUS = 200;

export interface EnrichOptions {
  timeoutMs?: number;
}

async function requestValidation(resource: Resource, endpoint: string, timeoutMs: number): Promise<ValidationResult[]> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(toFhirJson(resource)),
      signal: controller.signal,
    });

    if (response.status !== EXPECTED_STATUS) {
      throw new ValidationError(`Validation service responded with status ${response.status}`, response.status);
    }

    const body: unknown = await response.json();
    if (!isPlainObject(body) || !Array.isArray(body.results)) return [];
    return body.results.filter(isJsonValue).map((result) => structuredClone(result));
  } catch (err) {
    if (err instanceof ValidationError) throw err;
    const message = controller.signal.aborted
      ? `Validation request timed out after ${timeoutMs}ms`
      : describeError(err);
    throw new ValidationError(message, null, { cause: err });
  } finally {
    clearTimeout(timeout);
  }
}

export async function enrichResource(
  resource: Resource,
  endpoint: string,
  options: EnrichOptions = {},
): Promise<Resource> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_VALIDATION_TIMEOUT_MS;
  let validationResults: ValidationResult[];

  try {
    validationResults = await requestValidation(resource, endpoint, timeoutMs);
  } catch (err) {
    const message = describeError(err);
    process.stderr.write(`WARN: Validation failed for ${resource.resourceType}/${resource.id ?? 'unknown'}: ${message}\n`);
    validationResults = [{ error: message }];
  }

  return { ...resource, validationResults };
}

/** Validate resources one at a time, preserving order. */
export async function enrichResources(
  resources: readonly Resource[],
  endpoint: string,
  options: EnrichOptions = {},
): Promise<Resource[]> {
  const enriched: Resource[] = [];
  for (const resource of resources) {
    enriched.push(await enrichResource(resource, endpoint, options));
  }
  return enriched;
}
