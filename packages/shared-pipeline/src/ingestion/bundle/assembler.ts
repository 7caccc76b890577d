/**
 * FILE PURPOSE: Wrap the final resource set into one FHIR Bundle
 * WHY: Downstream consumers load a single artifact per job. Bundle id and entry
 *      fullUrls are minted here and have nothing to do with the resources' own ids.
 *      Purely structural: no validation of the resources themselves.
 */

import { randomUUID } from 'node:crypto';
import type { Bundle, BundleType } from '@fhir-intake/shared-types';
import type { Resource } from '../../resources/resource.js';
import { toFhirJson } from '../../resources/resource.js';

export function assembleBundle(resources: readonly Resource[], type: BundleType = 'collection'): Bundle {
  const timestamp = new Date().toISOString();

  return {
    resourceType: 'Bundle',
    id: randomUUID(),
    type,
    timestamp,
    entry: resources.map((resource) => ({
      fullUrl: `urn:uuid:${randomUUID()}`,
      resource: structuredClone(toFhirJson(resource)),
    })),
  };
}
