import { describe, expect, it } from 'vitest';
import { NonSuccessStatusError } from '../error/nonSuccessStatusError.js';
import { checkResponse, SUCCESS_STATUS_CODES } from './classify.js';

describe('checkResponse', () => {
  it.each([200, 201, 202, 204, 304])('classifies %i as success', (status) => {
    expect(checkResponse(status)).toBeNull();
  });

  it('classifies every other status in 100-599 as NonSuccessStatusError', () => {
    for (let status = 100; status <= 599; status += 1) {
      if (SUCCESS_STATUS_CODES.some((code) => code === status)) {
        continue;
      }

      const err = checkResponse(status);
      expect(err).toBeInstanceOf(NonSuccessStatusError);
      expect(err?.status).toBe(status);
    }
  });

  it('classifies unknown codes as failures', () => {
    expect(checkResponse(299)).toBeInstanceOf(NonSuccessStatusError);
    expect(checkResponse(0)).toBeInstanceOf(NonSuccessStatusError);
  });
});
