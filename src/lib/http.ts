/**
 * Minimal JSON-over-HTTP helper - just fetch with a timeout, no retries
 */

import type { FetchLike } from "./handlers/types.ts";

export class HttpError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

export interface FetchJsonOptions {
  fetch: FetchLike;
  timeoutMs: number;
}

/** GET a URL and parse JSON; throws HttpError on non-2xx, timeout, or bad body */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await options.fetch(url, { signal: controller.signal });
    if (!response.ok) {
      throw new HttpError(`HTTP ${response.status} from ${url}`, response.status);
    }
    return await response.json();
  } catch (err) {
    if (err instanceof HttpError) throw err;
    if (controller.signal.aborted) {
      throw new HttpError(`Timed out after ${options.timeoutMs}ms: ${url}`);
    }
    throw new HttpError(`Request failed: ${url}: ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Global fetch narrowed to FetchLike */
export const defaultFetch: FetchLike = (input, init) => fetch(input, init);
