import { describe, expect, it } from "vitest";
import { loadConfig } from "../harvest/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const cfg = loadConfig({});
    expect(cfg.endYear).toBe(2025);
    expect(cfg.outPath).toBe("web/public/medals.json");
    expect(cfg.timeoutMs).toBe(20000);
    expect(cfg.rateMs).toBe(800);
  });

  it("reads the environment and lets the first argument pick the output", () => {
    const cfg = loadConfig({ OLYMPIAD_END_YEAR: "2019", MEDALS_OUT: "env.json", RATE_MS: "0" }, ["cli.json"]);
    expect(cfg.endYear).toBe(2019);
    expect(cfg.rateMs).toBe(0);
    expect(cfg.outPath).toBe("cli.json");
  });

  it("rejects values that are not whole numbers", () => {
    expect(() => loadConfig({ HTTP_TIMEOUT_MS: "soon" })).toThrow("HTTP_TIMEOUT_MS must be a non-negative integer, got 'soon'");
  });
});
