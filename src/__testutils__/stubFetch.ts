import type { FetchLike } from '../ai/http.js';

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: RequestInit['body'];
}

export type Route = (url: string, req: RecordedRequest) => Response | undefined;

export interface StubFetch {
  fetch: FetchLike;
  requests: RecordedRequest[];
}

/** Routes are tried in order; an unrouted request gets a 404. */
export function stubFetch(...routes: Route[]): StubFetch {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const req: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: init?.body,
    };
    requests.push(req);
    for (const route of routes) {
      const res = route(url, req);
      if (res) return res;
    }
    return new Response('not found', { status: 404 });
  };
  return { fetch: fetchImpl, requests };
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** JSON body of a recorded request, or undefined when it was not a string. */
export function jsonBody(req: RecordedRequest | undefined): unknown {
  return typeof req?.body === 'string' ? JSON.parse(req.body) : undefined;
}
