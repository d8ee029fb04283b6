import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { exitCodeFor, harvest } from "../harvest/pipeline.js";
import { resultsAdapter } from "../harvest/adapters/results.template.js";
import { FetchError } from "../harvest/utils/errors.js";
import type { OlympiadAdapter, OlympiadResult } from "../harvest/adapter.types.js";

const NOW = new Date("2025-06-01T00:00:00.000Z");

const fixed = (result: OlympiadResult): OlympiadAdapter => ({
  olympiad: result.olympiad,
  firstYear: result.firstYear,
  ingest: async () => result,
});

const failing = (olympiad: OlympiadAdapter["olympiad"]): OlympiadAdapter => ({
  olympiad,
  firstYear: 2000,
  ingest: async () => {
    throw new FetchError(`https://example.test/${olympiad}`, "503", 503);
  },
});

const imoResult: OlympiadResult = {
  olympiad: "IMO",
  firstYear: 2020,
  endYear: 2021,
  years: [{ year: 2020, rows: [{ country: "China", gold: 6, silver: 0, bronze: 0 }] }],
  skipped: [],
};

const iphoResult: OlympiadResult = {
  olympiad: "IPhO",
  firstYear: 2020,
  endYear: 2021,
  years: [{ year: 2021, rows: [{ country: "Vietnam", gold: 1, silver: 2, bronze: 2 }] }],
  skipped: [],
};

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "medals-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe("harvest", () => {
  it("keeps the olympiads that succeeded when one source fails", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const outPath = join(dir, "out", "medals.json");

    const outcome = await harvest({
      adapters: [fixed(imoResult), failing("IOI"), fixed(iphoResult)],
      getText: async () => "",
      endYear: 2021,
      outPath,
      now: NOW,
    });

    expect(outcome.updated).toEqual(["IMO", "IPhO"]);
    expect(outcome.failed).toEqual([{ olympiad: "IOI", error: "GET https://example.test/IOI -> 503" }]);
    expect(exitCodeFor(outcome)).toBe(0);
    expect(error).toHaveBeenCalledWith("ERROR IOI not updated: GET https://example.test/IOI -> 503");

    const written = JSON.parse(readFileSync(outPath, "utf8"));
    expect(written._metadata.failed).toEqual(["IOI"]);
    expect(written.CHN).toEqual({
      name: "China",
      alpha2: "CN",
      IMO: { gold: 6, silver: 0, bronze: 0, total: 6 },
      IPhO: { gold: 0, silver: 0, bronze: 0, total: 0 },
    });
    expect(written.VNM.IPhO).toEqual({ gold: 1, silver: 2, bronze: 2, total: 5 });
  });

  it("writes nothing and exits non-zero when every source fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const outPath = join(dir, "medals.json");

    const outcome = await harvest({
      adapters: [failing("IMO"), failing("IOI"), failing("IPhO")],
      getText: async () => "",
      endYear: 2021,
      outPath,
    });

    expect(outcome.dataset).toBeNull();
    expect(exitCodeFor(outcome)).toBe(1);
    expect(existsSync(outPath)).toBe(false);
  });

  it("keeps the previous file when a source yields no parsable year", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const adapter = resultsAdapter({
      olympiad: "IMO",
      firstYear: 2020,
      yearUrl: (year) => `https://example.test/imo/${year}`,
      layout: {
        kind: "tally",
        table: "table",
        columns: { country: ["country"], gold: ["g"], silver: ["s"], bronze: ["b"] },
      },
    });
    const outPath = join(dir, "medals.json");
    const previous = '{"USA":{"IMO":{"gold":1,"silver":0,"bronze":0,"total":1}}}\n';
    writeFileSync(outPath, previous);

    const outcome = await harvest({
      adapters: [adapter],
      getText: async () => "<div>site redesigned</div>",
      endYear: 2022,
      outPath,
    });

    expect(outcome.updated).toEqual([]);
    expect(outcome.failed).toEqual([{ olympiad: "IMO", error: "no year parsed (3 tried)" }]);
    expect(exitCodeFor(outcome)).toBe(1);
    expect(error).toHaveBeenCalledWith("ERROR IMO not updated: no year parsed (3 tried)");
    expect(readFileSync(outPath, "utf8")).toBe(previous);
  });

  it("runs an adapter end to end against fetched pages", async () => {
    const adapter = resultsAdapter({
      olympiad: "IMO",
      firstYear: 2022,
      yearUrl: (year) => `https://example.test/imo/${year}`,
      layout: {
        kind: "tally",
        table: "table",
        columns: { country: ["country"], gold: ["g"], silver: ["s"], bronze: ["b"] },
      },
    });
    const pages: Record<string, string> = {
      "https://example.test/imo/2022": "<table><tr><th>Country</th><th>G</th><th>S</th><th>B</th></tr>"
        + "<tr><td>USA</td><td>2</td><td>3</td><td>1</td></tr>"
        + "<tr><td>Czechoslovakia</td><td>1</td><td>0</td><td>0</td></tr></table>",
      "https://example.test/imo/2023": "<table><tr><th>Country</th><th>G</th><th>S</th><th>B</th></tr>"
        + "<tr><td>United States of America</td><td>1</td><td>0</td><td>0</td></tr></table>",
    };
    const outPath = join(dir, "medals.json");

    const first = await harvest({
      adapters: [adapter],
      getText: async (url) => pages[url] ?? "",
      endYear: 2023,
      outPath,
      now: NOW,
    });
    const firstText = readFileSync(outPath, "utf8");
    await harvest({
      adapters: [adapter],
      getText: async (url) => pages[url] ?? "",
      endYear: 2023,
      outPath,
      now: NOW,
    });

    expect(Object.keys(first.dataset?.countries ?? {})).toEqual(["USA"]);
    expect(first.dataset?.countries.USA.medals.IMO).toEqual({ gold: 3, silver: 3, bronze: 1, total: 7 });
    expect(first.dataset?.metadata.years).toEqual({ IMO: "2022-2023" });
    expect(readFileSync(outPath, "utf8")).toBe(firstText);
  });
});
