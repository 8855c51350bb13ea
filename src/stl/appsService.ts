import { z } from 'zod';
import type { OptionFunc } from '../core/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { GraphQLClient } from './graphql.js';
import { type AppResource, appResourceSchema, type CreateAppResourceInput, type DeleteAppResourceInput } from './types.js';

/** Page size used when listing; the service returns every resource of a device in one page. */
export const LIST_PAGE_SIZE = 10000;

const APP_RESOURCE_FIELDS = 'id deviceId name content';

const GET_APP_RESOURCE = `query GetApplicationResource($id: Int!, $name: String!) {
  applicationResource(id: $id, name: $name) { ${APP_RESOURCE_FIELDS} }
}`;

const LIST_APP_RESOURCES = `query ListApplicationResources($serial: String!, $first: Int!) {
  applicationResources(serialNumber: $serial, first: $first) { edges { node { ${APP_RESOURCE_FIELDS} } } }
}`;

const CREATE_APP_RESOURCE = `mutation CreateApplicationResource($input: CreateApplicationResourceInput!) {
  createApplicationResource(input: $input) {
    success message statusCode requestId
    applicationResource { ${APP_RESOURCE_FIELDS} }
  }
}`;

const DELETE_APP_RESOURCE = `mutation DeleteApplicationResource($input: DeleteApplicationResourceInput!) {
  deleteApplicationResource(input: $input) { success message statusCode requestId }
}`;

const mutationStatusFields = {
  success: z.boolean().nullish(),
  message: z.string().nullish(),
  statusCode: z.number().nullish(),
  requestId: z.string().nullish(),
};

const getResponseSchema = z.object({ applicationResource: appResourceSchema });

const listResponseSchema = z.object({
  applicationResources: z.object({
    edges: z.array(z.object({ node: appResourceSchema })),
  }),
});

const createResponseSchema = z.object({
  createApplicationResource: z.object({ ...mutationStatusFields, applicationResource: appResourceSchema }),
});

const deleteResponseSchema = z.object({
  deleteApplicationResource: z.object(mutationStatusFields),
});

/**
 * Application resources stored per device, over GraphQL.
 */
export class AppsService {
  #graphql: GraphQLClient;

  constructor(graphql: GraphQLClient) {
    this.#graphql = graphql;
  }

  /** Fetches one resource of a device by name. */
  async getAppResourceByDeviceIdAndName(
    deviceId: number,
    name: string,
    ...options: OptionFunc[]
  ): SafeWrapAsync<Error, AppResource> {
    const [err, data] = await this.#graphql.query(GET_APP_RESOURCE, { id: deviceId, name }, getResponseSchema, ...options);
    if (err) {
      return [err, null];
    }

    return [null, data.applicationResource];
  }

  /** Lists every resource of the device with this serial number. */
  async getAppResourcesBySerial(serial: string, ...options: OptionFunc[]): SafeWrapAsync<Error, AppResource[]> {
    const [err, data] = await this.#graphql.query(
      LIST_APP_RESOURCES,
      { serial, first: LIST_PAGE_SIZE },
      listResponseSchema,
      ...options,
    );
    if (err) {
      return [err, null];
    }

    return [null, data.applicationResources.edges.map((edge) => edge.node)];
  }

  /** Creates a resource and returns it as stored. */
  async createAppResource(input: CreateAppResourceInput, ...options: OptionFunc[]): SafeWrapAsync<Error, AppResource> {
    const [err, data] = await this.#graphql.query(CREATE_APP_RESOURCE, { input }, createResponseSchema, ...options);
    if (err) {
      return [err, null];
    }

    return [null, data.createApplicationResource.applicationResource];
  }

  /** Deletes a resource. Resolves `true` once the service accepted the mutation. */
  async deleteAppResource(input: DeleteAppResourceInput, ...options: OptionFunc[]): SafeWrapAsync<Error, boolean> {
    const [err] = await this.#graphql.query(DELETE_APP_RESOURCE, { input }, deleteResponseSchema, ...options);
    if (err) {
      return [err, null];
    }

    return [null, true];
  }
}
