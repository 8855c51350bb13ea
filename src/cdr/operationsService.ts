import type { ServiceClient } from '../core/client.js';
import { structured } from '../core/destination.js';
import { withContentType } from '../core/options.js';
import type { BodyBytes, OptionFunc } from '../core/request.js';
import type { ResponseWrap } from '../core/response.js';
import { FHIR_JSON, type FHIRResource, fhirResourceSchema, JSON_PATCH } from './types.js';

/**
 * Generic resource operations against the FHIR store, relative to the root
 * organization. Bodies are passed pre-serialized; responses decode to a
 * {@link FHIRResource}. Options run after the service's own, so a caller may
 * override the content type.
 */
export class OperationsService {
  #client: ServiceClient;

  constructor(client: ServiceClient) {
    this.#client = client;
  }

  /**
   * Reads a resource or runs a search, e.g. `Patient/123` or `Patient?name=doe`.
   * Query options add to a query already in the path.
   */
  get(path: string, ...options: OptionFunc[]): Promise<ResponseWrap<FHIRResource>> {
    return this.#client.do('GET', path, null, options, structured(fhirResourceSchema));
  }

  /** Creates a resource, e.g. `post('Patient', body)`. */
  post(path: string, body: BodyBytes, ...options: OptionFunc[]): Promise<ResponseWrap<FHIRResource>> {
    return this.#client.do('POST', path, body, [withContentType(FHIR_JSON), ...options], structured(fhirResourceSchema));
  }

  /** Creates or replaces the resource at `path`. */
  put(path: string, body: BodyBytes, ...options: OptionFunc[]): Promise<ResponseWrap<FHIRResource>> {
    return this.#client.do('PUT', path, body, [withContentType(FHIR_JSON), ...options], structured(fhirResourceSchema));
  }

  /** Applies a JSON Patch document to the resource at `path`. */
  patch(path: string, patch: BodyBytes, ...options: OptionFunc[]): Promise<ResponseWrap<FHIRResource>> {
    return this.#client.do('PATCH', path, patch, [withContentType(JSON_PATCH), ...options], structured(fhirResourceSchema));
  }

  /** Deletes the resource at `path`. The response body is discarded. */
  delete(path: string, ...options: OptionFunc[]): Promise<ResponseWrap<never>> {
    return this.#client.do('DELETE', path, null, options);
  }
}
