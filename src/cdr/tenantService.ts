import type { ServiceClient } from '../core/client.js';
import { structured } from '../core/destination.js';
import { withContentType, withHeader } from '../core/options.js';
import type { OptionFunc } from '../core/request.js';
import type { ResponseWrap } from '../core/response.js';
import { FHIR_JSON, type Organization, organizationSchema } from './types.js';

/**
 * Tenant management: onboarding organizations into the FHIR store.
 */
export class TenantService {
  #client: ServiceClient;

  constructor(client: ServiceClient) {
    this.#client = client;
  }

  /**
   * Onboards an organization by PUTting it under its own id. The store answers
   * with the stored representation.
   */
  async onboard(organization: Organization, ...options: OptionFunc[]): Promise<ResponseWrap<Organization>> {
    if (!organization.id) {
      return [new Error('error organization id is required for onboarding'), null];
    }

    return this.#client.do(
      'PUT',
      `Organization/${organization.id}`,
      JSON.stringify(organization),
      [withContentType(FHIR_JSON), withHeader('Prefer', 'return=representation'), ...options],
      structured(organizationSchema),
    );
  }

  /** Fetches an onboarded organization. */
  getOrganizationById(id: string, ...options: OptionFunc[]): Promise<ResponseWrap<Organization>> {
    return this.#client.do('GET', `Organization/${id}`, null, options, structured(organizationSchema));
  }
}
