/**
 * Clinical data repository (FHIR STU3 store) client.
 * @module
 */

export { CDRClient, type CDRClientOptions } from './client.js';
export { OperationsService } from './operationsService.js';
export { TenantService } from './tenantService.js';
export {
  FHIR_JSON,
  type FHIRResource,
  fhirResourceSchema,
  JSON_PATCH,
  type Organization,
  organizationSchema,
} from './types.js';
