/**
 * FILE PURPOSE: Reconciliation: collapse resources that denote the same entity
 * WHY: A multi-page document mentions the same patient or observation several
 *      times. The bundle must contain one canonical record per (resourceType, id).
 *
 * Merge rules for a repeated identity key:
 *   extensions  → union by structural equality, canonical order first
 *   other fields → per ScalarMergePolicy ('first-wins' keeps the first sighting)
 *
 * Under 'first-wins' the result depends on input order: [A, A'] and [A', A]
 * keep different scalar values.
 */

import { isDeepStrictEqual } from 'node:util';
import type { Extension } from '@fhir-intake/shared-types';
import type { IdentityKey, Resource } from '../../resources/resource.js';
import { identityKey } from '../../resources/resource.js';

export type ScalarMergePolicy = 'first-wins' | 'last-wins';

/** At most one resource per identity key, in order of first sighting. */
export type ResourceSet = Map<IdentityKey, Resource>;

export interface ReconcileOptions {
  scalarPolicy?: ScalarMergePolicy;
}

/** Append every extension not already present (structurally) in `target`. */
export function unionExtensions(target: Extension[], incoming: readonly Extension[]): void {
  for (const ext of incoming) {
    if (!target.some((existing) => isDeepStrictEqual(existing, ext))) {
      target.push(structuredClone(ext));
    }
  }
}

function mergeInto(canonical: Resource, duplicate: Resource, policy: ScalarMergePolicy): void {
  unionExtensions(canonical.extensions, duplicate.extensions);
  if (policy === 'last-wins') {
    for (const [key, value] of Object.entries(duplicate.fields)) {
      canonical.fields[key] = structuredClone(value);
    }
  }
}

export function reconcile(resources: Iterable<Resource>, options: ReconcileOptions = {}): ResourceSet {
  const policy = options.scalarPolicy ?? 'first-wins';
  const seen: ResourceSet = new Map();

  for (const resource of resources) {
    const key = identityKey(resource);
    const canonical = seen.get(key);
    if (canonical) {
      mergeInto(canonical, resource, policy);
    } else {
      seen.set(key, structuredClone(resource));
    }
  }

  return seen;
}

export function reconcileToList(resources: Iterable<Resource>, options?: ReconcileOptions): Resource[] {
  return [...reconcile(resources, options).values()];
}
