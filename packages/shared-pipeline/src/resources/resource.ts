/**
 * FILE PURPOSE: Typed Resource model + conversion at the entity-mapper boundary
 *
 * WHY: The mapper hands back schema-less records. They are validated and defaulted
 *      once, here, so reconciliation and bundling only ever see a typed Resource.
 * HOW: toResource() applies the defaulting policy, toFhirJson() flattens a Resource
 *      back into FHIR JSON for the validator and the bundle.
 */

import type { Extension, FhirResource, JsonObject, JsonValue, ValidationResult } from '@fhir-intake/shared-types';
import { MappingError } from '../errors.js';

/** Open mapping produced by the external entity mapper. */
export type EntityRecord = Record<string, unknown>;

export interface Resource {
  resourceType: string;
  /** null when the mapper supplied no usable id. */
  id: string | null;
  fields: JsonObject;
  extensions: Extension[];
  /** Set by the validation enricher, never by the mapper. */
  validationResults?: ValidationResult[];
}

/** JSON-encoded `[resourceType, id]` pair; distinct pairs never share a key. */
export type IdentityKey = string;

export const UNKNOWN_ID = 'unknown';
export const UNKNOWN_RESOURCE_TYPE = 'Unknown';

const RESERVED_KEYS = new Set(['resourceType', 'id', 'extension', 'validationResults']);

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isPlainObject(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isPlainObject(value) && isJsonValue(value);
}

export function identityKey(resource: Pick<Resource, 'resourceType' | 'id'>): IdentityKey {
  return JSON.stringify([resource.resourceType, resource.id ?? UNKNOWN_ID]);
}

/**
 * Convert a mapper record into a Resource.
 *
 * Defaulting policy:
 *   - resourceType: non-empty string, else "Unknown"
 *   - id: string, or finite number as string, else null
 *   - extension: plain-object entries of an array, else []
 *   - validationResults: dropped (owned by the enricher)
 *   - anything else that is valid JSON becomes a field; other values are dropped
 */
export function toResource(record: unknown): Resource {
  if (!isPlainObject(record)) {
    throw new MappingError(`Entity record must be an object, got ${Array.isArray(record) ? 'array' : typeof record}`);
  }

  const rawType = record.resourceType;
  const rawId = record.id;
  const rawExtensions = record.extension;

  const fields: JsonObject = {};
  for (const [key, value] of Object.entries(record)) {
    if (RESERVED_KEYS.has(key) || !isJsonValue(value)) continue;
    fields[key] = structuredClone(value);
  }

  return {
    resourceType: typeof rawType === 'string' && rawType.trim() ? rawType : UNKNOWN_RESOURCE_TYPE,
    id: typeof rawId === 'string' && rawId
      ? rawId
      : typeof rawId === 'number' && Number.isFinite(rawId) ? String(rawId) : null,
    fields,
    extensions: Array.isArray(rawExtensions)
      ? rawExtensions.filter(isJsonObject).map((ext) => structuredClone(ext))
      : [],
  };
}

/** Flatten a Resource back into FHIR JSON. Empty extension lists are omitted. */
export function toFhirJson(resource: Resource): FhirResource {
  const json: FhirResource = { resourceType: resource.resourceType };
  if (resource.id !== null) json.id = resource.id;
  for (const [key, value] of Object.entries(resource.fields)) {
    json[key] = value;
  }
  if (resource.extensions.length > 0) json.extension = resource.extensions;
  if (resource.validationResults) json.validationResults = resource.validationResults;
  return json;
}
