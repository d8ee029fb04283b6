import { readFileSync } from "fs";
import { MappingError } from "./utils/errors.js";

const DATA_DIR = new URL("./data/", import.meta.url);

function readJson(name: string): unknown {
  return JSON.parse(readFileSync(new URL(name, DATA_DIR), "utf8"));
}

function stringRecord(name: string): Record<string, string> {
  const raw = readJson(name);
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`${name}: expected an object`);
  }
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v !== "string") throw new Error(`${name}: value of '${k}' is not a string`);
    out[k] = v;
  }
  return out;
}

function stringList(name: string): string[] {
  const raw = readJson(name);
  if (!Array.isArray(raw) || !raw.every((x): x is string => typeof x === "string")) {
    throw new Error(`${name}: expected an array of strings`);
  }
  return raw;
}

export type CountryTables = {
  codes: Record<string, string>;      // canonical name -> ISO3
  remap: Record<string, string>;      // alias/renamed name -> ISO3
  historical: string[];               // dissolved states, never emitted
  alpha2: Record<string, string>;     // ISO3 -> ISO alpha-2
};

export function loadCountryTables(): CountryTables {
  return {
    codes: stringRecord("country-codes.json"),
    remap: stringRecord("name-remap.json"),
    historical: stringList("historical-states.json"),
    alpha2: stringRecord("alpha2.json"),
  };
}

export function normalizeName(raw: string): string {
  return raw.normalize("NFC").replace(/\s+/g, " ").trim();
}

const key = (name: string) => normalizeName(name).toLowerCase();

export class CountryResolver {
  private readonly historical: Set<string>;
  private readonly remap = new Map<string, string>();
  private readonly codes = new Map<string, string>();
  private readonly names = new Map<string, string>();
  private readonly alpha2: Record<string, string>;

  constructor(tables: CountryTables = loadCountryTables()) {
    this.historical = new Set(tables.historical.map(key));
    for (const [name, iso3] of Object.entries(tables.remap)) this.remap.set(key(name), iso3);
    for (const [name, iso3] of Object.entries(tables.codes)) {
      this.codes.set(key(name), iso3);
      if (!this.names.has(iso3)) this.names.set(iso3, name);
    }
    this.alpha2 = tables.alpha2;
  }

  /**
   * ISO3 for a printed country name; `null` for a dissolved state.
   * @throws MappingError when neither table knows the name
   */
  resolve(raw: string): string | null {
    const k = key(raw);
    if (this.historical.has(k)) return null;
    const iso3 = this.remap.get(k) ?? this.codes.get(k);
    if (!iso3) throw new MappingError(normalizeName(raw));
    return iso3;
  }

  isHistorical(raw: string): boolean {
    return this.historical.has(key(raw));
  }

  nameOf(iso3: string): string {
    return this.names.get(iso3) ?? iso3;
  }

  alpha2Of(iso3: string): string | null {
    return this.alpha2[iso3] ?? null;
  }
}
