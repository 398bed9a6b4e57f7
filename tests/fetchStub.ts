export interface RecordedFetch {
  url: string;
  init?: RequestInit;
}

export type FetchHandler = (url: string, init?: RequestInit) => Promise<Response> | Response;

/**
 * Replace globalThis.fetch for the duration of a test. Call restore() in a finally block.
 */
export function stubFetch(handler: FetchHandler): { calls: RecordedFetch[]; restore: () => void } {
  const originalFetch = globalThis.fetch;
  const calls: RecordedFetch[] = [];

  globalThis.fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    calls.push({ url, init });
    return handler(url, init);
  };

  return {
    calls,
    restore: () => {
      globalThis.fetch = originalFetch;
    },
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function timeoutError(): Error {
  const error = new Error('The operation was aborted due to timeout');
  error.name = 'TimeoutError';
  return error;
}

export function parseJsonBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}
