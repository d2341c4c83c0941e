/**
 * In-process stand-in for the global fetch, injected into the HTTP
 * executor. Records every request and answers from a handler.
 */

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
}

export type FetchHandler = (request: RecordedRequest, signal?: AbortSignal) => Response | Promise<Response>;

export interface FakeFetch {
  fetch: typeof fetch;
  requests: RecordedRequest[];
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function createFakeFetch(handler: FetchHandler = () => jsonResponse({})): FakeFetch {
  const requests: RecordedRequest[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const request: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    };
    requests.push(request);
    return handler(request, init?.signal ?? undefined);
  };

  return { fetch: fakeFetch, requests };
}

/**
 * A handler that never answers and rejects once the request is aborted.
 */
export function hangingHandler(): FetchHandler {
  return (_request, signal) =>
    new Promise<Response>((_resolve, reject) => {
      signal?.addEventListener('abort', () => {
        const err = new Error('This operation was aborted');
        err.name = 'AbortError';
        reject(err);
      });
    });
}
