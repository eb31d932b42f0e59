/**
 * Tests for the fetch transport
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { FetchTransport, getHeader, isSuccess } from '../index.js';
import { TransportError } from '../../error/index.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('FetchTransport', () => {
  it('should return status, lower-cased headers and body text', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response('{"ok":true}', {
        status: 201,
        headers: { 'Content-Type': 'application/json' },
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const response = await new FetchTransport().send({
      method: 'POST',
      url: 'https://api.test/v2/api-key',
      headers: { Authorization: 'test' },
      body: '{}',
    });

    expect(response.status).toBe(201);
    expect(response.headers['content-type']).toBe('application/json');
    expect(response.body).toBe('{"ok":true}');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.test/v2/api-key');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ Authorization: 'test' });
    expect(init.body).toBe('{}');
  });

  it('should map network failures to TransportError', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    const send = new FetchTransport().send({ method: 'GET', url: 'https://api.test/', headers: {} });

    await expect(send).rejects.toBeInstanceOf(TransportError);
    await expect(send).rejects.toMatchObject({
      code: 'TRANSPORT',
      url: 'https://api.test/',
      message: 'HTTP request failed: fetch failed',
    });
  });

  it('should map timeouts to a TIMEOUT TransportError', async () => {
    const abort = new Error('The operation was aborted due to timeout');
    abort.name = 'TimeoutError';
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(abort));

    const send = new FetchTransport(1500).send({ method: 'GET', url: 'https://api.test/', headers: {} });

    await expect(send).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Request timeout after 1500ms',
    });
  });
});

describe('response helpers', () => {
  it('should classify 2xx as success', () => {
    expect(isSuccess({ status: 200, headers: {}, body: '' })).toBe(true);
    expect(isSuccess({ status: 204, headers: {}, body: '' })).toBe(true);
    expect(isSuccess({ status: 302, headers: {}, body: '' })).toBe(false);
    expect(isSuccess({ status: 404, headers: {}, body: '' })).toBe(false);
  });

  it('should read headers case-insensitively', () => {
    const response = { status: 200, headers: { 'x-request-id': 'abc' }, body: '' };

    expect(getHeader(response, 'X-Request-Id')).toBe('abc');
    expect(getHeader(response, 'missing')).toBeUndefined();
  });
});
