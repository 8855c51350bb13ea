import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import { PendingRequest } from '../core/request.js';
import { FetchTransport } from './client.js';
import { StaticTokenProvider } from './tokenProvider.js';

const BASE = new URL('https://example.org/store/fhir/');

describe('FetchTransport', () => {
  const originalFetch = global.fetch;

  beforeEach(() => {
    global.fetch = vi.fn();
  });

  afterEach(() => {
    global.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it('sends a GET with url, method and headers, without a body', async () => {
    const successResponse = new Response('{}', { status: 200 });
    const mockedFetch = global.fetch as MockedFunction<typeof fetch>;
    mockedFetch.mockResolvedValueOnce(successResponse);

    const request = new PendingRequest('GET', BASE, '/store/fhir/org1/Patient/123');
    request.headers.set('Accept', '*/*');

    const [err, response] = await new FetchTransport().send(request);
    expect(err).toBeNull();
    expect(response).toBe(successResponse);
    expect(mockedFetch).toHaveBeenCalledOnce();
    expect(mockedFetch).toHaveBeenCalledWith('https://example.org/store/fhir/org1/Patient/123', {
      method: 'GET',
      headers: request.headers,
    });
  });

  it('sends the attached body for a POST', async () => {
    const mockedFetch = global.fetch as MockedFunction<typeof fetch>;
    mockedFetch.mockResolvedValueOnce(new Response(null, { status: 201 }));

    const request = new PendingRequest('POST', BASE, '/store/fhir/org1/Patient');
    request.attachBody('{"resourceType":"Patient"}');

    const [err] = await new FetchTransport().send(request);
    expect(err).toBeNull();

    const init = mockedFetch.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toEqual(new TextEncoder().encode('{"resourceType":"Patient"}'));
  });

  it('returns non-2xx responses as responses, not errors', async () => {
    const mockedFetch = global.fetch as MockedFunction<typeof fetch>;
    mockedFetch.mockResolvedValueOnce(new Response('{"issue":[]}', { status: 404 }));

    const [err, response] = await new FetchTransport().send(new PendingRequest('GET', BASE, '/store/fhir/x'));
    expect(err).toBeNull();
    expect(response?.status).toBe(404);
  });

  it('returns network failures unwrapped', async () => {
    const failure = new TypeError('fetch failed');
    const mockedFetch = global.fetch as MockedFunction<typeof fetch>;
    mockedFetch.mockRejectedValueOnce(failure);

    const [err, response] = await new FetchTransport().send(new PendingRequest('GET', BASE, '/store/fhir/x'));
    expect(response).toBeNull();
    expect(err).toBe(failure);
  });

  it('prefers an injected fetch function over the global one', async () => {
    const injected = vi.fn((_url: string, _init: RequestInit) => Promise.resolve(new Response(null, { status: 204 })));

    const [err, response] = await new FetchTransport({ fetch: injected }).send(
      new PendingRequest('DELETE', BASE, '/store/fhir/org1/Patient/1'),
    );
    expect(err).toBeNull();
    expect(response?.status).toBe(204);
    expect(injected).toHaveBeenCalledOnce();
    expect(global.fetch).not.toHaveBeenCalled();
  });
});

describe('StaticTokenProvider', () => {
  it('hands out the current token and its transport', () => {
    const transport = new FetchTransport();
    const provider = new StaticTokenProvider('test-token', transport);

    expect(provider.token()).toBe('test-token');
    expect(provider.httpClient()).toBe(transport);

    provider.setToken('test-token-2');
    expect(provider.token()).toBe('test-token-2');
  });

  it('defaults to a fetch transport', () => {
    expect(new StaticTokenProvider('test-token').httpClient()).toBeInstanceOf(FetchTransport);
  });
});
