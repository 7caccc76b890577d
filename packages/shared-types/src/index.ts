/**
 * FILE PURPOSE: Wire-level FHIR shapes shared by the pipeline package and the apps
 *
 * WHY: The bundle written to disk, the body POSTed to the validation service and the
 *      records returned by the entity mapper all speak FHIR JSON. Apps and the pipeline
 *      import these shapes from here instead of redefining them.
 */

/** Any value that survives a JSON round-trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** A FHIR extension, opaque apart from its JSON-ness. */
export type Extension = JsonObject;

/** One entry of the validation service's result list, kept as sent, or a locally synthesized error record. */
export type ValidationResult = JsonValue;

/** FHIR JSON form of a resource, as it appears in a bundle entry. */
export interface FhirResource {
  resourceType: string;
  id?: string;
  extension?: Extension[];
  validationResults?: ValidationResult[];
  [field: string]: JsonValue | undefined;
}

/** Bundle types defined by FHIR R4. */
export type BundleType =
  | 'document'
  | 'message'
  | 'transaction'
  | 'transaction-response'
  | 'batch'
  | 'batch-response'
  | 'history'
  | 'searchset'
  | 'collection';

export interface BundleEntry {
  fullUrl: string;
  resource: FhirResource;
}

/** Terminal artifact of one intake job. */
export interface Bundle {
  resourceType: 'Bundle';
  id: string;
  type: BundleType;
  timestamp: string;
  entry: BundleEntry[];
}
