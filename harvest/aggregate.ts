import { CountryResolver } from "./countries.js";
import { MappingError } from "./utils/errors.js";
import { OLYMPIADS } from "./adapter.types.js";
import type {
  CountryMedalRecord,
  MedalTally,
  Olympiad,
  OlympiadDataset,
  OlympiadResult,
} from "./adapter.types.js";

export const emptyTally = (): MedalTally => ({ gold: 0, silver: 0, bronze: 0, total: 0 });

export function tally(gold: number, silver: number, bronze: number): MedalTally {
  return { gold, silver, bronze, total: gold + silver + bronze };
}

/** Cumulative ISO3 -> tally for one olympiad across all of its parsed years. */
export function accumulate(result: OlympiadResult, resolver: CountryResolver): Map<string, MedalTally> {
  const totals = new Map<string, MedalTally>();
  const unmapped = new Set<string>();

  for (const { rows } of result.years) {
    for (const row of rows) {
      let iso3: string | null;
      try {
        iso3 = resolver.resolve(row.country);
      } catch (e) {
        if (!(e instanceof MappingError)) throw e;
        if (!unmapped.has(e.country)) {
          unmapped.add(e.country);
          console.warn(`WARN ${result.olympiad}: ${e.message}, dropped`);
        }
        continue;
      }
      if (!iso3) continue;

      const t = totals.get(iso3) ?? emptyTally();
      totals.set(iso3, tally(t.gold + row.gold, t.silver + row.silver, t.bronze + row.bronze));
    }
  }
  return totals;
}

export function combined(record: Pick<CountryMedalRecord, "medals">): MedalTally {
  let out = emptyTally();
  for (const o of OLYMPIADS) {
    const t = record.medals[o];
    if (t) out = tally(out.gold + t.gold, out.silver + t.silver, out.bronze + t.bronze);
  }
  return out;
}

export type BuildOptions = {
  failed?: Olympiad[];
  now?: Date;
  resolver?: CountryResolver;
};

/**
 * Merges independent per-olympiad results into one dataset. Every kept country
 * carries a tally for every olympiad that was updated; countries without a
 * single medal are left out.
 */
export function buildDataset(results: OlympiadResult[], opts: BuildOptions = {}): OlympiadDataset {
  const resolver = opts.resolver ?? new CountryResolver();
  const updated = OLYMPIADS.filter(o => results.some(r => r.olympiad === o));
  const perOlympiad = new Map<Olympiad, Map<string, MedalTally>>();
  for (const r of results) perOlympiad.set(r.olympiad, accumulate(r, resolver));

  const codes = new Set<string>();
  for (const m of perOlympiad.values()) for (const iso3 of m.keys()) codes.add(iso3);

  const countries: Record<string, CountryMedalRecord> = {};
  for (const iso3 of Array.from(codes).sort()) {
    const medals: Partial<Record<Olympiad, MedalTally>> = {};
    for (const o of updated) medals[o] = perOlympiad.get(o)?.get(iso3) ?? emptyTally();
    const record: CountryMedalRecord = {
      iso3,
      name: resolver.nameOf(iso3),
      alpha2: resolver.alpha2Of(iso3),
      medals,
    };
    if (combined(record).total > 0) countries[iso3] = record;
  }

  const years: Partial<Record<Olympiad, string>> = {};
  const skipped: Partial<Record<Olympiad, number[]>> = {};
  for (const o of OLYMPIADS) {
    const r = results.find(x => x.olympiad === o);
    if (!r) continue;
    years[o] = `${r.firstYear}-${r.endYear}`;
    if (r.skipped.length) skipped[o] = r.skipped.map(s => s.year).sort((a, b) => a - b);
  }

  return {
    metadata: {
      generated: (opts.now ?? new Date()).toISOString(),
      years,
      skipped,
      updated,
      failed: opts.failed ?? [],
    },
    countries,
  };
}

/** The on-disk form: `_metadata` first, then one key per ISO3 code in sorted order. */
export function serializeDataset(ds: OlympiadDataset): string {
  const out: Record<string, unknown> = { _metadata: ds.metadata };
  for (const iso3 of Object.keys(ds.countries).sort()) {
    const { name, alpha2, medals } = ds.countries[iso3];
    const entry: Record<string, unknown> = { name, alpha2 };
    for (const o of OLYMPIADS) {
      const t = medals[o];
      if (t) entry[o] = t;
    }
    out[iso3] = entry;
  }
  return JSON.stringify(out, null, 2) + "\n";
}

export function topCountries(ds: OlympiadDataset, n = 10): Array<{ iso3: string; name: string; total: number }> {
  return Object.values(ds.countries)
    .map(c => ({ iso3: c.iso3, name: c.name, total: combined(c).total }))
    .sort((a, b) => b.total - a.total || a.iso3.localeCompare(b.iso3))
    .slice(0, n);
}
