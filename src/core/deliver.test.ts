import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { DecodeError, getDecodeError } from '../error/decodeError.js';
import type { FetchResponse } from '../types/request.js';
import { deliver } from './deliver.js';
import { discard, structured, toSink } from './destination.js';

function jsonResponse(body: string, status = 200): FetchResponse {
  return new Response(body, { status, headers: { 'Content-Type': 'application/json' } }) as FetchResponse;
}

describe('deliver', () => {
  describe('none', () => {
    it('discards the body', async () => {
      const response = jsonResponse('{"resourceType":"Patient"}');

      const [err, data] = await deliver(response, discard());
      expect(err).toBeNull();
      expect(data).toBeNull();
      expect(response.bodyUsed).toBe(true);
    });

    it('handles a response without a body', async () => {
      const [err, data] = await deliver(new Response(null, { status: 204 }) as FetchResponse, discard());
      expect(err).toBeNull();
      expect(data).toBeNull();
    });
  });

  describe('raw', () => {
    it('copies the body verbatim to the sink', async () => {
      const chunks: Uint8Array[] = [];
      const sink = { write: vi.fn((chunk: Uint8Array) => chunks.push(chunk)) };

      const [err, data] = await deliver(jsonResponse('{"id":"1"}'), toSink(sink));
      expect(err).toBeNull();
      expect(data).toBeNull();
      expect(Buffer.concat(chunks).toString('utf8')).toBe('{"id":"1"}');
    });

    it('awaits asynchronous sinks', async () => {
      let written = '';
      const sink = {
        write: async (chunk: Uint8Array) => {
          await Promise.resolve();
          written += new TextDecoder().decode(chunk);
        },
      };

      const [err] = await deliver(jsonResponse('abc'), toSink(sink));
      expect(err).toBeNull();
      expect(written).toBe('abc');
    });

    it('returns a DecodeError when the sink fails', async () => {
      const failure = new Error('disk full');
      const sink = {
        write: () => {
          throw failure;
        },
      };

      const [err, data] = await deliver(jsonResponse('abc'), toSink(sink));
      expect(data).toBeNull();
      expect(err).toBeInstanceOf(DecodeError);
      expect(err?.message).toBe('error writing response body to sink');
      expect(err?.cause).toBe(failure);
    });
  });

  describe('structured', () => {
    const patientSchema = z.object({ resourceType: z.literal('Patient'), id: z.string() });

    it('parses and validates the body', async () => {
      const [err, data] = await deliver(jsonResponse('{"resourceType":"Patient","id":"123"}'), structured(patientSchema));
      expect(err).toBeNull();
      expect(data).toEqual({ resourceType: 'Patient', id: '123' });
    });

    it('accepts any JSON without a schema', async () => {
      const [err, data] = await deliver(jsonResponse('[1,2,3]'), structured());
      expect(err).toBeNull();
      expect(data).toEqual([1, 2, 3]);
    });

    it('decodes an empty body to null', async () => {
      const [err, data] = await deliver(jsonResponse(''), structured(patientSchema));
      expect(err).toBeNull();
      expect(data).toBeNull();
    });

    it('returns a DecodeError for malformed JSON', async () => {
      const [err, data] = await deliver(jsonResponse('{ not json'), structured(patientSchema));
      expect(data).toBeNull();
      expect(err).toBeInstanceOf(DecodeError);
      expect(err?.message).toBe('error parsing json response body');
      expect(err?.cause).toBeInstanceOf(SyntaxError);
    });

    it('returns a DecodeError with issues when validation fails', async () => {
      const [err, data] = await deliver(jsonResponse('{"resourceType":"Observation","id":"1"}'), structured(patientSchema));
      expect(data).toBeNull();
      expect(err).toBeInstanceOf(DecodeError);
      expect(getDecodeError(err)?.issues).toHaveLength(1);
    });
  });
});
