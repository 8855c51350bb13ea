/** Version reported in every module's User-Agent. */
export const LIBRARY_VERSION = '0.1.0';

/** Value of the `API-Version` header sent to the platform services. */
export const API_VERSION = '1';

/** Builds the User-Agent for a service module, e.g. `careplane/cdr/0.1.0`. */
export function userAgentFor(module: string): string {
  return `careplane/${module}/${LIBRARY_VERSION}`;
}
