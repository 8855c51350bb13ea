import { Hono } from 'hono';
import { z } from 'zod';
import type { FetchFunction } from '../src/fetch/client.js';
import { validator } from '../src/utils/validator.js';
import { safeWrapAsync } from '../src/utils/wrap.js';

export const E2E_TOKEN = 'test-token';

export type PlatformStandIn = {
  /** Fetch function routing into the app without opening a socket. */
  fetch: FetchFunction;
  /** Calls seen so far, as `METHOD /path`. */
  calls: () => string[];
  reset: () => void;
};

type StoredResource = Record<string, unknown> & { resourceType: string; id: string };

type StoredAppResource = {
  id: number;
  deviceId: number;
  name: string;
  content: string;
  serialNumber: string;
};

const resourceSchema = z.object({ resourceType: z.string(), id: z.string().optional() }).passthrough();

const patchSchema = z.array(
  z.object({
    op: z.enum(['add', 'replace', 'remove']),
    path: z.string().regex(/^\/[^/]+$/),
    value: z.unknown().optional(),
  }),
);

const graphqlRequestSchema = z.object({
  query: z.string(),
  variables: z.record(z.unknown()).default({}),
});

const getVariablesSchema = z.object({ id: z.number(), name: z.string() });
const listVariablesSchema = z.object({ serial: z.string(), first: z.number() });
const createVariablesSchema = z.object({
  input: z.object({
    deviceId: z.number(),
    serialNumber: z.string(),
    groupId: z.string(),
    name: z.string(),
    content: z.string(),
    isLocked: z.boolean(),
  }),
});
const deleteVariablesSchema = z.object({ input: z.object({ id: z.number() }) });

function outcome(diagnostics: string) {
  return { resourceType: 'OperationOutcome', issue: [{ severity: 'error', code: 'processing', diagnostics }] };
}

function toAppResource(stored: StoredAppResource) {
  return { id: stored.id, deviceId: stored.deviceId, name: stored.name, content: stored.content };
}

/**
 * In-process stand-in for the platform: a FHIR store under `/store/fhir/:org`
 * and the application-resource GraphQL endpoint under `/core/graphql`.
 */
export function createPlatformStandIn(): PlatformStandIn {
  const app = new Hono();
  const resources = new Map<string, StoredResource>();
  let appResources: StoredAppResource[] = [];
  let calls: string[] = [];
  let nextId = 1;

  app.use('*', async (c, next) => {
    calls.push(`${c.req.method} ${new URL(c.req.url).pathname}`);

    if (c.req.header('authorization') !== `Bearer ${E2E_TOKEN}`) {
      return c.json(outcome('invalid token'), 401);
    }

    if (c.req.header('api-version') !== '1') {
      return c.json(outcome('unsupported api version'), 400);
    }

    await next();
  });

  app.get('/store/fhir/:org/:type/:id', (c) => {
    const { org, type, id } = c.req.param();
    const resource = resources.get(`${org}/${type}/${id}`);
    if (!resource) {
      return c.json(outcome(`${type}/${id} not found`), 404);
    }

    return c.json(resource);
  });

  app.post('/store/fhir/:org/:type', async (c) => {
    const { org, type } = c.req.param();
    const [errBody, body] = await safeWrapAsync(() => c.req.json());
    if (errBody) {
      return c.json(outcome('invalid json'), 400);
    }

    const [errValidate, resource] = await validator(body, resourceSchema);
    if (errValidate || resource.resourceType !== type) {
      return c.json(outcome('invalid resource'), 400);
    }

    const stored: StoredResource = { ...resource, resourceType: type, id: `${type.toLowerCase()}-${nextId++}` };
    resources.set(`${org}/${type}/${stored.id}`, stored);
    return c.json(stored, 201);
  });

  app.put('/store/fhir/:org/:type/:id', async (c) => {
    const { org, type, id } = c.req.param();
    const [errBody, body] = await safeWrapAsync(() => c.req.json());
    if (errBody) {
      return c.json(outcome('invalid json'), 400);
    }

    const [errValidate, resource] = await validator(body, resourceSchema);
    if (errValidate || resource.resourceType !== type || resource.id !== id) {
      return c.json(outcome('invalid resource'), 400);
    }

    const key = `${org}/${type}/${id}`;
    const created = !resources.has(key);
    const stored: StoredResource = { ...resource, resourceType: type, id };
    resources.set(key, stored);

    if (c.req.header('prefer') !== 'return=representation') {
      return c.body(null, created ? 201 : 200);
    }

    return c.json(stored, created ? 201 : 200);
  });

  app.patch('/store/fhir/:org/:type/:id', async (c) => {
    const { org, type, id } = c.req.param();
    const key = `${org}/${type}/${id}`;
    const resource = resources.get(key);
    if (!resource) {
      return c.json(outcome(`${type}/${id} not found`), 404);
    }

    const [errBody, body] = await safeWrapAsync(() => c.req.json());
    if (errBody) {
      return c.json(outcome('invalid json'), 400);
    }

    const [errValidate, operations] = await validator(body, patchSchema);
    if (errValidate) {
      return c.json(outcome('invalid patch'), 400);
    }

    const patched: StoredResource = { ...resource };
    for (const operation of operations) {
      const field = operation.path.slice(1);
      if (operation.op === 'remove') {
        delete patched[field];
      } else {
        patched[field] = operation.value;
      }
    }

    resources.set(key, patched);
    return c.json(patched);
  });

  app.delete('/store/fhir/:org/:type/:id', (c) => {
    const { org, type, id } = c.req.param();
    if (!resources.delete(`${org}/${type}/${id}`)) {
      return c.json(outcome(`${type}/${id} not found`), 404);
    }

    return c.body(null, 204);
  });

  app.post('/core/graphql', async (c) => {
    const [errBody, body] = await safeWrapAsync(() => c.req.json());
    if (errBody) {
      return c.json({ errors: [{ message: 'invalid json' }] }, 400);
    }

    const [errRequest, request] = await validator(body, graphqlRequestSchema);
    if (errRequest) {
      return c.json({ errors: [{ message: 'invalid graphql request' }] }, 400);
    }

    const operation = /^(?:query|mutation)\s+(\w+)/.exec(request.query)?.[1];
    switch (operation) {
      case 'GetApplicationResource': {
        const [errVars, vars] = await validator(request.variables, getVariablesSchema);
        if (errVars) {
          return c.json({ errors: [{ message: errVars.message }] });
        }

        const found = appResources.find((stored) => stored.deviceId === vars.id && stored.name === vars.name);
        if (!found) {
          return c.json({ data: null, errors: [{ message: 'application resource not found', path: ['applicationResource'] }] });
        }

        return c.json({ data: { applicationResource: toAppResource(found) } });
      }

      case 'ListApplicationResources': {
        const [errVars, vars] = await validator(request.variables, listVariablesSchema);
        if (errVars) {
          return c.json({ errors: [{ message: errVars.message }] });
        }

        const edges = appResources
          .filter((stored) => stored.serialNumber === vars.serial)
          .slice(0, vars.first)
          .map((stored) => ({ node: toAppResource(stored) }));
        return c.json({ data: { applicationResources: { edges } } });
      }

      case 'CreateApplicationResource': {
        const [errVars, vars] = await validator(request.variables, createVariablesSchema);
        if (errVars) {
          return c.json({ errors: [{ message: errVars.message }] });
        }

        const stored: StoredAppResource = {
          id: nextId++,
          deviceId: vars.input.deviceId,
          name: vars.input.name,
          content: vars.input.content,
          serialNumber: vars.input.serialNumber,
        };
        appResources.push(stored);
        return c.json({
          data: {
            createApplicationResource: {
              success: true,
              message: 'created',
              statusCode: 201,
              requestId: `req-${stored.id}`,
              applicationResource: toAppResource(stored),
            },
          },
        });
      }

      case 'DeleteApplicationResource': {
        const [errVars, vars] = await validator(request.variables, deleteVariablesSchema);
        if (errVars) {
          return c.json({ errors: [{ message: errVars.message }] });
        }

        const before = appResources.length;
        appResources = appResources.filter((stored) => stored.id !== vars.input.id);
        if (appResources.length === before) {
          return c.json({ data: null, errors: [{ message: 'application resource not found' }] });
        }

        return c.json({
          data: { deleteApplicationResource: { success: true, message: 'deleted', statusCode: 200, requestId: 'req-delete' } },
        });
      }

      default:
        return c.json({ errors: [{ message: `unknown operation ${operation ?? ''}`.trim() }] });
    }
  });

  return {
    fetch: async (url, init) => app.request(url, init),
    calls: () => [...calls],
    reset: () => {
      resources.clear();
      appResources = [];
      calls = [];
      nextId = 1;
    },
  };
}
