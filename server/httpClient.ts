import { errorMessage } from "./_core/logger";

export type HttpResult<T> =
  | { kind: "ok"; data: T }
  | { kind: "not_found" }
  | { kind: "error"; error: string };

/**
 * GET a URL with an explicit timeout. 404 is reported separately from every
 * other failure so callers can tell a missing account from an unreachable host.
 */
async function httpGet<T>(
  url: string,
  timeoutMs: number,
  read: (resp: Response) => Promise<T>,
  accept: string
): Promise<HttpResult<T>> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const resp = await fetch(url, {
      signal: controller.signal,
      headers: { Accept: accept },
    });
    if (resp.status === 404) return { kind: "not_found" };
    if (!resp.ok) return { kind: "error", error: `HTTP ${resp.status}` };
    return { kind: "ok", data: await read(resp) };
  } catch (err) {
    const aborted = err instanceof Error && err.name === "AbortError";
    return { kind: "error", error: aborted ? `Timeout after ${timeoutMs}ms` : errorMessage(err) };
  } finally {
    clearTimeout(timeoutId);
  }
}

export function getJson(url: string, timeoutMs: number): Promise<HttpResult<unknown>> {
  return httpGet(url, timeoutMs, (resp): Promise<unknown> => resp.json(), "application/json");
}

export function getText(url: string, timeoutMs: number): Promise<HttpResult<string>> {
  return httpGet(url, timeoutMs, (resp) => resp.text(), "text/html,text/plain,*/*");
}
