import { describe, expect, it } from "vitest";
import type { Feature } from "geojson";
import { featureIso3, featureName, isFeatureCollection } from "../web/geo.js";

const feature = (properties: Record<string, unknown>, id?: string): Feature => ({
  type: "Feature",
  id,
  properties,
  geometry: { type: "Point", coordinates: [0, 0] },
});

describe("featureIso3", () => {
  it("reads ISO_A3", () => {
    expect(featureIso3(feature({ ISO_A3: "DEU" }))).toBe("DEU");
  });

  it("falls back to ADM0_A3 when ISO_A3 is a placeholder", () => {
    expect(featureIso3(feature({ ISO_A3: "-99", ADM0_A3: "FRA" }))).toBe("FRA");
  });

  it("maps boundary-file codes onto ISO ones", () => {
    expect(featureIso3(feature({ ISO_A3: "-99", ADM0_A3: "KOS" }))).toBe("XKX");
  });

  it("uses the feature id last", () => {
    expect(featureIso3(feature({ name: "Peru" }, "PER"))).toBe("PER");
    expect(featureIso3(feature({ name: "Nowhere" }))).toBeNull();
  });
});

describe("featureName", () => {
  it("reads the usual name properties", () => {
    expect(featureName(feature({ ADMIN: "Japan" }))).toBe("Japan");
    expect(featureName(feature({}))).toBe("Unknown");
  });
});

describe("isFeatureCollection", () => {
  it("accepts only feature collections", () => {
    expect(isFeatureCollection({ type: "FeatureCollection", features: [] })).toBe(true);
    expect(isFeatureCollection({ type: "Feature" })).toBe(false);
    expect(isFeatureCollection(null)).toBe(false);
  });
});
