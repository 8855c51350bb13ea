import { NonSuccessStatusError } from '../error/nonSuccessStatusError.js';
import type { StatusCode } from '../types/request.js';

/** Statuses treated as success. Anything else is a {@link NonSuccessStatusError}. */
export const SUCCESS_STATUS_CODES: readonly StatusCode[] = [200, 201, 202, 204, 304];

/**
 * Classifies a status code. Every failure maps to the same error class;
 * callers inspect `status` to tell a 404 from a 503.
 */
export function checkResponse(status: number): NonSuccessStatusError | null {
  if (SUCCESS_STATUS_CODES.some((code) => code === status)) {
    return null;
  }

  return new NonSuccessStatusError(status);
}
