/**
 * Fetch mock utilities for the HTTP clients
 */
import { vi, type Mock } from 'vitest';

export type FetchMock = Mock<typeof fetch>;

/**
 * Replace fetch with a mock answering each call with the next outcome.
 * The last outcome repeats once the list runs out.
 */
export function mockFetchSequence(...outcomes: Array<Response | Error>): FetchMock {
  let call = 0;
  const fetchMock = vi.fn<typeof fetch>(() => {
    const outcome = outcomes[Math.min(call, outcomes.length - 1)];
    call++;
    if (outcome === undefined) {
      return Promise.reject(new Error('No mocked response'));
    }
    return outcome instanceof Error ? Promise.reject(outcome) : Promise.resolve(outcome.clone());
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function mockFetchWith(response: Response): FetchMock {
  return mockFetchSequence(response);
}

export function mockFetchError(error: Error): FetchMock {
  return mockFetchSequence(error);
}

export function createJsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Google Vision annotate response carrying `text` as the full-text annotation.
 */
export function createVisionResponse(text: string | null): Response {
  const annotations = text === null ? {} : { textAnnotations: [{ locale: 'ja', description: text }] };
  return createJsonResponse({ responses: [annotations] });
}

export function createErrorResponse(status: number, message: string): Response {
  return createJsonResponse({ error: { code: status, message } }, status);
}

/** URL and parsed JSON body of the n-th fetch call. */
export function getFetchCall(fetchMock: FetchMock, index: number = 0): { url: string; init: RequestInit | undefined; json: unknown } {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [input, init] = call;
  const url = input instanceof Request ? input.url : input.toString();
  const json: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
  return { url, init, json };
}
