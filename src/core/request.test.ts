import { describe, expect, it, vi } from 'vitest';
import { applyOptions, isMutatingMethod, type OptionFunc, PendingRequest } from './request.js';

const BASE = new URL('https://example.org/store/fhir/');

describe('PendingRequest', () => {
  it('joins origin and opaque path verbatim', () => {
    const request = new PendingRequest('GET', BASE, '/store/fhir/org1/Patient/a%2Fb');
    expect(request.url).toBe('https://example.org/store/fhir/org1/Patient/a%2Fb');
    expect(request.requestUri).toBe('/store/fhir/org1/Patient/a%2Fb');
    expect(request.host).toBe('example.org');
  });

  it('appends query parameters after the opaque path', () => {
    const request = new PendingRequest('GET', BASE, '/store/fhir/org1/Patient');
    request.query.set('name', 'doe');
    request.query.set('_count', '10');
    expect(request.url).toBe('https://example.org/store/fhir/org1/Patient?name=doe&_count=10');
  });

  it('moves a query written into the path to the query parameters', () => {
    const request = new PendingRequest('GET', BASE, '/store/fhir/org1/Patient?name=doe');
    request.query.append('_count', '5');
    expect(request.opaque).toBe('/store/fhir/org1/Patient');
    expect(request.url).toBe('https://example.org/store/fhir/org1/Patient?name=doe&_count=5');
  });

  it('drops a query written into the path once a body is attached', () => {
    const request = new PendingRequest('PUT', BASE, '/store/fhir/org1/Patient/1?_format=json');
    request.attachBody('{}');
    expect(request.url).toBe('https://example.org/store/fhir/org1/Patient/1');
  });

  it('copies byte bodies into an ArrayBuffer-backed view', () => {
    const shared = new Uint8Array(new SharedArrayBuffer(3));
    shared.set([1, 2, 3]);
    const request = new PendingRequest('POST', BASE, '/store/fhir/org1/Binary');
    request.attachBody(shared);

    expect(request.body).not.toBe(shared);
    expect(request.body?.buffer).toBeInstanceOf(ArrayBuffer);
    expect(Array.from(request.body ?? [])).toEqual([1, 2, 3]);
  });

  it('keeps the port of the base url', () => {
    const request = new PendingRequest('GET', new URL('http://localhost:8080/fhir/'), '/fhir/Patient');
    expect(request.url).toBe('http://localhost:8080/fhir/Patient');
  });

  it('encodes string bodies as UTF-8 and clears the query', () => {
    const request = new PendingRequest('POST', BASE, '/store/fhir/org1/Patient');
    request.query.set('_format', 'json');
    request.attachBody('héllo');

    expect(request.contentLength).toBe(6);
    expect(request.body).toEqual(new TextEncoder().encode('héllo'));
    expect(request.query.toString()).toBe('');
    expect(request.url).toBe('https://example.org/store/fhir/org1/Patient');
  });

  it('has no body by default', () => {
    const request = new PendingRequest('GET', BASE, '/store/fhir/org1/Patient');
    expect(request.body).toBeNull();
    expect(request.contentLength).toBe(0);
  });
});

describe('isMutatingMethod', () => {
  it.each(['POST', 'PUT', 'PATCH'] as const)('%s carries a body', (method) => {
    expect(isMutatingMethod(method)).toBe(true);
  });

  it.each(['GET', 'DELETE'] as const)('%s does not', (method) => {
    expect(isMutatingMethod(method)).toBe(false);
  });
});

describe('applyOptions', () => {
  it('runs options in order and skips nullish entries', () => {
    const calls: string[] = [];
    const request = new PendingRequest('GET', BASE, '/store/fhir/x');

    const err = applyOptions(request, [
      () => {
        calls.push('first');
      },
      null,
      undefined,
      () => {
        calls.push('second');
        return null;
      },
    ]);

    expect(err).toBeNull();
    expect(calls).toEqual(['first', 'second']);
  });

  it('stops at the first returned error and returns it unchanged', () => {
    const failure = new Error('rejected by option');
    const later = vi.fn<OptionFunc>();
    const request = new PendingRequest('GET', BASE, '/store/fhir/x');

    const err = applyOptions(request, [() => null, () => failure, later]);

    expect(err).toBe(failure);
    expect(later).not.toHaveBeenCalled();
  });

  it('treats a thrown error as a failure', () => {
    const failure = new TypeError('invalid header name');
    const later = vi.fn<OptionFunc>();
    const request = new PendingRequest('GET', BASE, '/store/fhir/x');

    const err = applyOptions(request, [
      () => {
        throw failure;
      },
      later,
    ]);

    expect(err).toBe(failure);
    expect(later).not.toHaveBeenCalled();
  });
});
