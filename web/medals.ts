import * as d3 from "d3";
import { OLYMPIADS } from "../harvest/adapter.types.js";
import type { DatasetMetadata, MedalTally, Olympiad } from "../harvest/adapter.types.js";

export type Filter = "All" | Olympiad;

export const FILTERS: readonly Filter[] = ["All", ...OLYMPIADS];

export const NO_DATA_COLOR = "#d9d9d9";

export type CountryMedals = {
  name: string | null;
  alpha2: string | null;
  medals: Partial<Record<Olympiad, MedalTally>>;
};

/** Immutable view of one loaded dataset; passed to every render/filter function. */
export type MedalSnapshot = {
  readonly countries: ReadonlyMap<string, CountryMedals>;
  readonly metadata: DatasetMetadata | null;
};

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

const ISO3 = /^[A-Z]{3}$/;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isOlympiad(v: unknown): v is Olympiad {
  return OLYMPIADS.some(o => o === v);
}

function count(v: unknown, where: string): number {
  if (v === undefined) return 0;
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0) {
    throw new DatasetError(`${where}: expected a medal count, got ${JSON.stringify(v)}`);
  }
  return v;
}

function parseTally(v: unknown, where: string): MedalTally {
  if (!isRecord(v)) throw new DatasetError(`${where}: expected an object`);
  const gold = count(v.gold, `${where}.gold`);
  const silver = count(v.silver, `${where}.silver`);
  const bronze = count(v.bronze, `${where}.bronze`);
  return { gold, silver, bronze, total: gold + silver + bronze };
}

function parseMetadata(v: unknown): DatasetMetadata | null {
  if (!isRecord(v) || typeof v.generated !== "string") return null;
  const years: Partial<Record<Olympiad, string>> = {};
  if (isRecord(v.years)) {
    for (const [o, range] of Object.entries(v.years)) {
      if (isOlympiad(o) && typeof range === "string") years[o] = range;
    }
  }
  const skipped: Partial<Record<Olympiad, number[]>> = {};
  if (isRecord(v.skipped)) {
    for (const [o, ys] of Object.entries(v.skipped)) {
      if (isOlympiad(o) && Array.isArray(ys)) skipped[o] = ys.filter((y): y is number => Number.isInteger(y));
    }
  }
  const list = (x: unknown) => (Array.isArray(x) ? x.filter(isOlympiad) : []);
  return { generated: v.generated, years, skipped, updated: list(v.updated), failed: list(v.failed) };
}

/** Validates the fetched JSON. Keys that are not ISO3 codes (e.g. `_metadata`) are not countries. */
export function parseDataset(raw: unknown): MedalSnapshot {
  if (!isRecord(raw)) throw new DatasetError("dataset is not a JSON object");
  const countries = new Map<string, CountryMedals>();

  for (const [code, entry] of Object.entries(raw)) {
    if (!ISO3.test(code)) continue;
    if (!isRecord(entry)) throw new DatasetError(`${code}: expected an object`);
    const medals: Partial<Record<Olympiad, MedalTally>> = {};
    for (const o of OLYMPIADS) {
      if (entry[o] !== undefined) medals[o] = parseTally(entry[o], `${code}.${o}`);
    }
    countries.set(code, {
      name: typeof entry.name === "string" ? entry.name : null,
      alpha2: typeof entry.alpha2 === "string" ? entry.alpha2 : null,
      medals,
    });
  }

  return { countries, metadata: parseMetadata(raw._metadata) };
}

const ZERO: MedalTally = { gold: 0, silver: 0, bronze: 0, total: 0 };

/** Medals of one country under a filter; "All" sums the three olympiads, absent countries are zero. */
export function tallyFor(snapshot: MedalSnapshot, iso3: string | null, filter: Filter): MedalTally {
  const country = iso3 ? snapshot.countries.get(iso3) : undefined;
  if (!country) return { ...ZERO };
  if (filter !== "All") return { ...(country.medals[filter] ?? ZERO) };

  const out = { ...ZERO };
  for (const o of OLYMPIADS) {
    const t = country.medals[o];
    if (!t) continue;
    out.gold += t.gold;
    out.silver += t.silver;
    out.bronze += t.bronze;
    out.total += t.total;
  }
  return out;
}

export function maxTotal(snapshot: MedalSnapshot, filter: Filter): number {
  let max = 0;
  for (const iso3 of snapshot.countries.keys()) {
    max = Math.max(max, tallyFor(snapshot, iso3, filter).total);
  }
  return max;
}

export function intensity(total: number, max: number): number {
  return max > 0 ? Math.min(1, total / max) : 0;
}

export type ColorScale = {
  max: number;
  colorOf: (iso3: string | null) => string;
  colorAt: (total: number) => string;
};

/** Green gradient over [0, max] for the current filter; countries not in the dataset get NO_DATA_COLOR. */
export function colorScale(snapshot: MedalSnapshot, filter: Filter): ColorScale {
  const max = maxTotal(snapshot, filter);
  const scale = d3.scaleSequential(d3.interpolateGreens).domain([0, 1]);
  const colorAt = (total: number) => scale(intensity(total, max));
  return {
    max,
    colorAt,
    colorOf: (iso3) =>
      iso3 && snapshot.countries.has(iso3) ? colorAt(tallyFor(snapshot, iso3, filter).total) : NO_DATA_COLOR,
  };
}

export function parseFilter(value: string | null): Filter {
  return FILTERS.find(f => f.toLowerCase() === (value ?? "").toLowerCase()) ?? "All";
}
