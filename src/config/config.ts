import { z } from 'zod';
import { ConfigurationError, type ConfigurationIssue } from '../error/configurationError.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Suffix appended to the CDR base URL when no explicit FHIR store is configured. */
export const FHIR_STORE_SUFFIX = '/store/fhir/';

/** Path of the GraphQL endpoint below the STL base URL. */
export const DEFAULT_GRAPHQL_PATH = 'core/graphql';

/**
 * Settings of a clinical data repository client.
 * Either `cdrUrl` or `fhirStore` must be given; `fhirStore` wins when both are.
 */
export const cdrConfigSchema = z
  .object({
    region: z.string().optional(),
    environment: z.string().optional(),
    /** Root organization every resource path is scoped to. */
    rootOrgId: z.string().min(1, 'root organization id is required'),
    cdrUrl: z.string().optional(),
    fhirStore: z.string().optional(),
    /** Passed through to resource encoders, unused by the transport. */
    timeZone: z.string().default('UTC'),
    debugLog: z.string().optional(),
  })
  .superRefine((config, ctx) => {
    if (!config.cdrUrl && !config.fhirStore) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fhirStore'],
        message: 'either cdrUrl or fhirStore is required',
      });
    }
  });

/** CDR settings as passed in. */
export type CDRConfig = z.input<typeof cdrConfigSchema>;
/** CDR settings after validation and defaults. */
export type ParsedCDRConfig = z.output<typeof cdrConfigSchema>;

/** Settings of an application-resource (STL) client. */
export const stlConfigSchema = z.object({
  region: z.string().optional(),
  environment: z.string().optional(),
  stlUrl: z.string().min(1, 'stl url is required'),
  graphqlPath: z.string().default(DEFAULT_GRAPHQL_PATH),
  debugLog: z.string().optional(),
});

/** STL settings as passed in. */
export type STLConfig = z.input<typeof stlConfigSchema>;
/** STL settings after validation and defaults. */
export type ParsedSTLConfig = z.output<typeof stlConfigSchema>;

/** Settings of a job-scheduling (iron) client. */
export const ironConfigSchema = z.object({
  region: z.string().optional(),
  environment: z.string().optional(),
  baseUrl: z.string().min(1, 'base url is required'),
  /** Project every task, schedule and code package belongs to. */
  projectId: z.string().min(1, 'project id is required'),
  token: z.string().min(1, 'token is required'),
  debugLog: z.string().optional(),
});

/** Iron settings as passed in. */
export type IronConfig = z.input<typeof ironConfigSchema>;
/** Iron settings after validation. */
export type ParsedIronConfig = z.output<typeof ironConfigSchema>;

function toIssues(error: z.ZodError): ConfigurationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

/**
 * Validates CDR settings.
 * @returns `[ConfigurationError, null]` listing every problem found, or the parsed config.
 */
export function parseCDRConfig(input: unknown): SafeWrap<ConfigurationError, ParsedCDRConfig> {
  const result = cdrConfigSchema.safeParse(input);
  if (!result.success) {
    return [new ConfigurationError('error invalid cdr config', toIssues(result.error), { cause: result.error }), null];
  }

  return [null, result.data];
}

/**
 * Validates STL settings.
 */
export function parseSTLConfig(input: unknown): SafeWrap<ConfigurationError, ParsedSTLConfig> {
  const result = stlConfigSchema.safeParse(input);
  if (!result.success) {
    return [new ConfigurationError('error invalid stl config', toIssues(result.error), { cause: result.error }), null];
  }

  return [null, result.data];
}

/**
 * Validates iron settings.
 */
export function parseIronConfig(input: unknown): SafeWrap<ConfigurationError, ParsedIronConfig> {
  const result = ironConfigSchema.safeParse(input);
  if (!result.success) {
    return [new ConfigurationError('error invalid iron config', toIssues(result.error), { cause: result.error }), null];
  }

  return [null, result.data];
}

/**
 * FHIR store URL for a CDR config: the explicit `fhirStore`, or `cdrUrl` plus `/store/fhir/`.
 */
export function resolveStoreUrl(config: Pick<ParsedCDRConfig, 'cdrUrl' | 'fhirStore'>): string {
  if (config.fhirStore) {
    return config.fhirStore;
  }

  return `${(config.cdrUrl ?? '').replace(/\/+$/, '')}${FHIR_STORE_SUFFIX}`;
}
