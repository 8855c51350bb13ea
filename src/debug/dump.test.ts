import { describe, expect, it } from 'vitest';
import { PendingRequest } from '../core/request.js';
import type { FetchResponse } from '../types/request.js';
import { dumpRequest, dumpResponse, frame } from './dump.js';

const BASE = new URL('https://example.org/store/fhir/');

describe('dumpRequest', () => {
  it('renders request line, host and headers', () => {
    const request = new PendingRequest('GET', BASE, '/store/fhir/org1/Patient/123');
    request.query.set('_summary', 'true');
    request.headers.set('Accept', '*/*');

    expect(dumpRequest(request)).toBe(
      'GET /store/fhir/org1/Patient/123?_summary=true HTTP/1.1\r\nhost: example.org\r\naccept: */*\r\n\r\n',
    );
  });

  it('includes content length and body for mutating calls', () => {
    const request = new PendingRequest('POST', BASE, '/store/fhir/org1/Patient');
    request.headers.set('Content-Type', 'application/json');
    request.attachBody('{"a":1}');

    expect(dumpRequest(request)).toBe(
      'POST /store/fhir/org1/Patient HTTP/1.1\r\nhost: example.org\r\ncontent-type: application/json\r\ncontent-length: 7\r\n\r\n{"a":1}',
    );
  });
});

describe('dumpResponse', () => {
  it('renders status line, headers and body without consuming the original', async () => {
    const response = new Response('{"ok":true}', {
      status: 200,
      statusText: 'OK',
      headers: { 'Content-Type': 'application/json' },
    }) as FetchResponse;

    const [err, dump] = await dumpResponse(response);
    expect(err).toBeNull();
    expect(dump).toBe('HTTP/1.1 200 OK\r\ncontent-type: application/json\r\n\r\n{"ok":true}');
    await expect(response.json()).resolves.toEqual({ ok: true });
  });

  it('omits an empty status text', async () => {
    const [, dump] = await dumpResponse(new Response(null, { status: 204 }) as FetchResponse);
    expect(dump).toBe('HTTP/1.1 204\r\n\r\n');
  });
});

describe('frame', () => {
  it('wraps a dump in start and end markers', () => {
    expect(frame('Response', 'HTTP/1.1 204\r\n\r\n')).toBe(
      '[careplane] --- Response start ---\nHTTP/1.1 204\r\n\r\n\n[careplane] --- Response end ---\n',
    );
  });
});
