import type { Feature, FeatureCollection } from "geojson";

const ISO3 = /^[A-Z]{3}$/;

// Codes some boundary files use where ISO has (or lacks) another one.
const GEO_ALIASES: Record<string, string> = {
  KOS: "XKX",
};

export function isFeatureCollection(v: unknown): v is FeatureCollection {
  return typeof v === "object" && v !== null && "type" in v && v.type === "FeatureCollection"
    && "features" in v && Array.isArray(v.features);
}

function prop(feature: Feature, keys: string[]): string | null {
  const props = feature.properties ?? {};
  for (const k of keys) {
    const v: unknown = props[k];
    if (typeof v === "string" && v.trim()) return v.trim();
  }
  return null;
}

/**
 * ISO3 join key of a boundary feature. Natural Earth marks some ISO_A3 values
 * as "-99", so ADM0_A3 and the feature id are tried after it.
 */
export function featureIso3(feature: Feature): string | null {
  const candidates = [
    prop(feature, ["ISO_A3", "iso_a3", "ISO3", "iso3"]),
    prop(feature, ["ADM0_A3", "adm0_a3"]),
    typeof feature.id === "string" ? feature.id : null,
  ];
  for (const c of candidates) {
    const code = c?.toUpperCase();
    if (code && ISO3.test(code)) return GEO_ALIASES[code] ?? code;
  }
  return null;
}

export function featureName(feature: Feature): string {
  return prop(feature, ["name", "NAME", "ADMIN", "admin", "name_long"]) ?? "Unknown";
}
