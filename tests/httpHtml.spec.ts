import { beforeEach, describe, expect, it, vi } from "vitest";

type FakeResponse = { ok: boolean; status: number; text: () => Promise<string> };

const { fetchMock } = vi.hoisted(() => ({
  fetchMock: vi.fn<(url: string, init: { headers: Record<string, string>; signal: AbortSignal }) => Promise<FakeResponse>>(),
}));

vi.mock("node-fetch", () => ({ default: fetchMock }));

import { getText, htmlFetcher } from "../harvest/utils/httpHtml.js";
import { FetchError } from "../harvest/utils/errors.js";

const OPTS = { timeoutMs: 1000, userAgent: "test-agent" };

beforeEach(() => {
  fetchMock.mockReset();
});

describe("getText", () => {
  it("returns the body and sends the configured user agent", async () => {
    fetchMock.mockResolvedValue({ ok: true, status: 200, text: async () => "<table></table>" });

    await expect(getText("https://example.test/a", OPTS)).resolves.toBe("<table></table>");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][1].headers["User-Agent"]).toBe("test-agent");
  });

  it("fails on a non-success status without retrying", async () => {
    fetchMock.mockResolvedValue({ ok: false, status: 503, text: async () => "" });

    const attempt = getText("https://example.test/a", OPTS);
    await expect(attempt).rejects.toBeInstanceOf(FetchError);
    await expect(attempt).rejects.toMatchObject({ message: "GET https://example.test/a -> 503", status: 503 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("wraps network errors", async () => {
    fetchMock.mockRejectedValue(new Error("ECONNREFUSED"));

    await expect(getText("https://example.test/a", OPTS)).rejects.toMatchObject({
      name: "FetchError",
      message: "GET https://example.test/a -> ECONNREFUSED",
      status: null,
    });
  });

  it("gives up after the timeout", async () => {
    fetchMock.mockImplementation((_url, init) => new Promise((_resolve, reject) => {
      init.signal.addEventListener("abort", () => reject(new Error("The operation was aborted")));
    }));

    const fetcher = htmlFetcher({ timeoutMs: 20, userAgent: "test-agent" });
    await expect(fetcher("https://example.test/slow")).rejects.toThrow("GET https://example.test/slow -> timed out after 20ms");
  });
});
