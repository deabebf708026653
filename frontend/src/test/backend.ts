/**
 * backend.ts: In-process stand-in for the backend: stubs global fetch
 * with a route table keyed by "METHOD /path". Unknown routes reject with
 * a TypeError, which is what fetch does when the server is unreachable.
 */

import { vi } from "vitest";

export type RouteHandler = (init: RequestInit | undefined, url: URL) => Response | Promise<Response>;

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function stubBackend(routes: Record<string, RouteHandler>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = new URL(String(input));
    const key = `${init?.method ?? "GET"} ${url.pathname}`;
    const handler = routes[key];
    if (!handler) throw new TypeError(`fetch failed: no route for ${key}`);
    return handler(init, url);
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** Calls whose "METHOD /path" matches `key` */
export function callsTo(fetchMock: ReturnType<typeof stubBackend>, key: string) {
  return fetchMock.mock.calls.filter(([input, init]) => {
    const url = new URL(String(input));
    return `${init?.method ?? "GET"} ${url.pathname}` === key;
  });
}

/** Never settles; keeps a page in its loading state */
export function pending(): Promise<Response> {
  return new Promise<Response>(() => {});
}

export function headerOf(init: RequestInit | undefined, name: string): string | undefined {
  const headers = init?.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) return undefined;
  return headers[name];
}
