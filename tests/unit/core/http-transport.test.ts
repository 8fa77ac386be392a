/**
 * FetchTransport Tests
 *
 * The global fetch is replaced with a mock; nothing leaves the process.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FetchTransport } from '../../../src/core/http-transport.js';
import { TransportError } from '../../../src/utils/errors.js';

const API_KEY = { id: 'test-key-id', secret: 'test-secret' };
const EXPECTED_AUTHORIZATION = `Basic ${Buffer.from('test-key-id:test-secret').toString('base64')}`;

describe('FetchTransport', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  function lastInit(): RequestInit {
    const call = fetchMock.mock.calls[0];
    expect(call).toBeDefined();
    return call[1] ?? {};
  }

  it('should send form bodies urlencoded with API key authentication', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ ok: true }), { status: 200 }));
    const transport = new FetchTransport({ apiKey: API_KEY });

    const response = await transport.send({
      method: 'POST',
      url: 'https://api.example.com/v1/applications/a1/oauth/token',
      form: { grant_type: 'password', username: 'jane@example.com' },
    });

    expect(response).toEqual({ status: 200, body: { ok: true } });
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.example.com/v1/applications/a1/oauth/token');
    const init = lastInit();
    expect(init.method).toBe('POST');
    expect(init.body).toBe('grant_type=password&username=jane%40example.com');
    expect(init.headers).toMatchObject({
      Authorization: EXPECTED_AUTHORIZATION,
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
      'User-Agent': 'idsite-oauth-client',
    });
  });

  it('should send JSON bodies as JSON', async () => {
    fetchMock.mockResolvedValue(new Response('{}', { status: 200 }));
    const transport = new FetchTransport({ apiKey: API_KEY, userAgent: 'my-app/1.0' });

    await transport.send({ method: 'POST', url: 'https://api.example.com/x', json: { type: 'basic' } });

    const init = lastInit();
    expect(init.body).toBe('{"type":"basic"}');
    expect(init.headers).toMatchObject({ 'Content-Type': 'application/json', 'User-Agent': 'my-app/1.0' });
  });

  it('should let request headers override the defaults', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));
    const transport = new FetchTransport({ apiKey: API_KEY });

    await transport.send({
      method: 'GET',
      url: 'https://api.example.com/x',
      headers: { Authorization: 'Bearer test-token' },
    });

    expect(lastInit().headers).toMatchObject({ Authorization: 'Bearer test-token' });
    expect(lastInit().body).toBeUndefined();
  });

  it('should return null for an empty body and text for a non-JSON body', async () => {
    const transport = new FetchTransport({ apiKey: API_KEY });

    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));
    await expect(transport.send({ method: 'DELETE', url: 'https://api.example.com/x' })).resolves.toEqual({
      status: 204,
      body: null,
    });

    fetchMock.mockResolvedValueOnce(new Response('Bad Gateway', { status: 502 }));
    await expect(transport.send({ method: 'GET', url: 'https://api.example.com/x' })).resolves.toEqual({
      status: 502,
      body: 'Bad Gateway',
    });
  });

  it('should return error statuses without throwing', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ status: 400, code: 7100, message: 'no' }), { status: 400 }));
    const transport = new FetchTransport({ apiKey: API_KEY });

    const response = await transport.send({ method: 'GET', url: 'https://api.example.com/x' });

    expect(response.status).toBe(400);
  });

  it('should wrap network failures in a TransportError', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const transport = new FetchTransport({ apiKey: API_KEY });

    const error = await transport.send({ method: 'GET', url: 'https://api.example.com/x' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      method: 'GET',
      url: 'https://api.example.com/x',
      message: 'Request failed: fetch failed',
      timedOut: false,
    });
  });

  it('should report timeouts as timed out', async () => {
    fetchMock.mockRejectedValue(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));
    const transport = new FetchTransport({ apiKey: API_KEY, timeoutMs: 50 });

    const error = await transport.send({ method: 'POST', url: 'https://api.example.com/x' }).catch((e: unknown) => e);

    expect(error).toMatchObject({
      kind: 'transport',
      message: 'Request failed: timed out after 50ms',
      timedOut: true,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should pass an abort signal to fetch', async () => {
    fetchMock.mockResolvedValue(new Response('{}', { status: 200 }));
    const transport = new FetchTransport({ apiKey: API_KEY });

    await transport.send({ method: 'GET', url: 'https://api.example.com/x' });

    expect(lastInit().signal).toBeInstanceOf(AbortSignal);
  });
});
