import { describe, expect, it, vi } from 'vitest';
import { HttpOracleClient } from '../src/http-oracle-client.js';

const REQUEST = { id: 'doc-1', loanId: 'L1', pageCount: 2, fileName: 'le.pdf' };

function respondWith(response: Response | Error) {
  return vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => {
    if (response instanceof Error) throw response;
    return response;
  });
}

describe('HttpOracleClient', () => {
  it('posts the document and returns the raw body', async () => {
    const fetchMock = respondWith(
      new Response(JSON.stringify({ type_label: 'Loan Estimate' }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      })
    );
    const client = new HttpOracleClient({
      url: 'http://oracle.test/classify',
      token: 'test-token',
      fetch: fetchMock,
    });

    await expect(client.classify(REQUEST)).resolves.toEqual({ type_label: 'Loan Estimate' });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://oracle.test/classify');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Accept: 'application/json',
      Authorization: 'Bearer test-token',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      documentId: 'doc-1',
      loanId: 'L1',
      pageCount: 2,
      fileName: 'le.pdf',
    });
  });

  it('passes the abort signal through', async () => {
    const fetchMock = respondWith(new Response('{}', { status: 200 }));
    const client = new HttpOracleClient({ url: 'http://oracle.test/classify', fetch: fetchMock });
    const controller = new AbortController();

    await client.classify(REQUEST, controller.signal);

    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
  });

  it('treats server errors and throttling as transient', async () => {
    const client = new HttpOracleClient({
      url: 'http://oracle.test/classify',
      fetch: respondWith(new Response('busy', { status: 503 })),
    });

    await expect(client.classify(REQUEST)).rejects.toMatchObject({
      code: 'TRANSIENT_ORACLE_FAILURE',
      message: 'Oracle unavailable (HTTP 503: busy)',
      context: { loanId: 'L1', documentId: 'doc-1', status: 503 },
    });

    const throttled = new HttpOracleClient({
      url: 'http://oracle.test/classify',
      fetch: respondWith(new Response('', { status: 429 })),
    });
    await expect(throttled.classify(REQUEST)).rejects.toMatchObject({
      code: 'TRANSIENT_ORACLE_FAILURE',
      message: 'Oracle unavailable (HTTP 429)',
    });
  });

  it.each([501, 505, 599])('treats HTTP %i as transient', async (status) => {
    const client = new HttpOracleClient({
      url: 'http://oracle.test/classify',
      fetch: respondWith(new Response('down', { status })),
    });

    await expect(client.classify(REQUEST)).rejects.toMatchObject({
      code: 'TRANSIENT_ORACLE_FAILURE',
      message: `Oracle unavailable (HTTP ${status}: down)`,
    });
  });

  it('treats other client errors as invalid responses', async () => {
    const client = new HttpOracleClient({
      url: 'http://oracle.test/classify',
      fetch: respondWith(new Response('unsupported file', { status: 422 })),
    });

    await expect(client.classify(REQUEST)).rejects.toMatchObject({
      code: 'INVALID_ORACLE_RESPONSE',
      message: 'Oracle refused document (HTTP 422: unsupported file)',
    });
  });

  it('reports rejected credentials as a configuration problem', async () => {
    const client = new HttpOracleClient({
      url: 'http://oracle.test/classify',
      fetch: respondWith(new Response('', { status: 401 })),
    });

    await expect(client.classify(REQUEST)).rejects.toMatchObject({
      code: 'INVALID_CONFIG',
      message: 'Oracle rejected credentials (HTTP 401)',
    });
  });

  it('maps network failures and aborts', async () => {
    const offline = new HttpOracleClient({
      url: 'http://oracle.test/classify',
      fetch: respondWith(new TypeError('fetch failed')),
    });
    await expect(offline.classify(REQUEST)).rejects.toMatchObject({
      code: 'TRANSIENT_ORACLE_FAILURE',
      message: 'Failed to reach oracle: fetch failed',
    });

    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    const aborted = new HttpOracleClient({ url: 'http://oracle.test/classify', fetch: respondWith(abort) });
    await expect(aborted.classify(REQUEST)).rejects.toMatchObject({
      code: 'ORACLE_TIMEOUT',
      message: 'Oracle request was aborted',
    });
  });

  it('rejects a body that is not JSON', async () => {
    const client = new HttpOracleClient({
      url: 'http://oracle.test/classify',
      fetch: respondWith(new Response('<html>', { status: 200 })),
    });

    await expect(client.classify(REQUEST)).rejects.toMatchObject({ code: 'INVALID_ORACLE_RESPONSE' });
  });
});
