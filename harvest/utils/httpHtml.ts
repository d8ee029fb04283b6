import fetch from "node-fetch";
import { FetchError } from "./errors.js";
import type { PageFetcher } from "../adapter.types.js";

export const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

const DEFAULT_HEADERS = {
  "Accept": "text/html,application/xhtml+xml",
  "Accept-Language": "en-US,en;q=0.9",
};

export type HttpOptions = {
  timeoutMs: number;
  userAgent: string;
};

// One attempt per URL; re-running the harvest is the retry.
export async function getText(url: string, opts: HttpOptions): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs);
  try {
    const res = await fetch(url, {
      headers: { ...DEFAULT_HEADERS, "User-Agent": opts.userAgent },
      signal: controller.signal,
    });
    if (!res.ok) throw new FetchError(url, String(res.status), res.status);
    return await res.text();
  } catch (e) {
    if (e instanceof FetchError) throw e;
    if (controller.signal.aborted) throw new FetchError(url, `timed out after ${opts.timeoutMs}ms`);
    throw new FetchError(url, e instanceof Error ? e.message : String(e));
  } finally {
    clearTimeout(timer);
  }
}

export function htmlFetcher(opts: HttpOptions): PageFetcher {
  return (url) => getText(url, opts);
}
