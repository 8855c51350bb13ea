import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** A single problem found while validating client configuration. */
export interface ConfigurationIssue {
  path: string;
  message: string;
}

/**
 * Error raised when a client cannot be configured, e.g. an empty or unparsable base URL.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  static name = 'ConfigurationError';
  name = ConfigurationError.name;
  /** Problems reported by config validation, empty for URL failures */
  #issues: ConfigurationIssue[];

  /** Creates a new instance of a ConfigurationError with the offending issues */
  constructor(message: string, issues: ConfigurationIssue[] = [], opts?: ErrorOptions) {
    super(message, opts);
    this.#issues = issues;
  }

  /** Problems reported by config validation */
  get issues(): ConfigurationIssue[] {
    return [...this.#issues];
  }
}

/**
 * Type guard for {@link ConfigurationError}, matching it anywhere in the cause chain.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}

/**
 * Extract a {@link ConfigurationError} from an unknown error value, following nested causes.
 */
export function getConfigurationError(error: unknown): null | ConfigurationError {
  return unwrapErrorType(ConfigurationError, error);
}
