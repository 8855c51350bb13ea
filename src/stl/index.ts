/**
 * Application-resource service client over GraphQL.
 * @module
 */

export { AppsService, LIST_PAGE_SIZE } from './appsService.js';
export { STLClient, type STLClientOptions } from './client.js';
export { GraphQLClient, type GraphQLVariables } from './graphql.js';
export {
  type AppResource,
  appResourceSchema,
  type CreateAppResourceInput,
  type DeleteAppResourceInput,
} from './types.js';
