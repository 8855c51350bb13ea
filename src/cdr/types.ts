import { z } from 'zod';

/** Content type of FHIR STU3 resource bodies. */
export const FHIR_JSON = 'application/fhir+json;fhirVersion=3.0';

/** Content type of JSON Patch bodies. */
export const JSON_PATCH = 'application/json-patch+json';

/**
 * Any FHIR resource. Only `resourceType` and `id` are checked; every other
 * field is kept as returned.
 */
export const fhirResourceSchema = z
  .object({
    resourceType: z.string(),
    id: z.string().optional(),
  })
  .passthrough();

export type FHIRResource = z.output<typeof fhirResourceSchema>;

/** An Organization resource, as used for tenant onboarding. */
export const organizationSchema = fhirResourceSchema.extend({
  resourceType: z.literal('Organization'),
  name: z.string().optional(),
});

export type Organization = z.output<typeof organizationSchema>;
