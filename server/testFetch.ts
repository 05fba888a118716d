import { vi } from "vitest";

export type FetchRoute = { status?: number; body: unknown } | Error;

function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * Replace global fetch with a URL -> response table. Unknown URLs get a 404.
 * Returns the list of requested URLs, in order.
 */
export function stubFetch(routes: Record<string, FetchRoute>): string[] {
  const calls: string[] = [];
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request) => {
      const url = urlOf(input);
      calls.push(url);
      const route = routes[url];
      if (route === undefined) return new Response("not found", { status: 404 });
      if (route instanceof Error) throw route;
      const body = typeof route.body === "string" ? route.body : JSON.stringify(route.body);
      return new Response(body, { status: route.status ?? 200 });
    })
  );
  return calls;
}
