import { buildDataset, serializeDataset, topCountries } from "./aggregate.js";
import { emitAtomic } from "./utils/emitter.js";
import type { CountryResolver } from "./countries.js";
import type { Olympiad, OlympiadAdapter, OlympiadDataset, OlympiadResult, PageFetcher } from "./adapter.types.js";

export type HarvestOptions = {
  adapters: OlympiadAdapter[];
  getText: PageFetcher;
  endYear: number;
  outPath: string;
  rateMs?: number;
  now?: Date;
  resolver?: CountryResolver;
};

export type HarvestOutcome = {
  updated: Olympiad[];
  failed: Array<{ olympiad: Olympiad; error: string }>;
  dataset: OlympiadDataset | null;
};

/**
 * Runs every adapter one after another. A failing olympiad is logged and left
 * out; the dataset is written only when at least one olympiad succeeded.
 */
export async function harvest(opts: HarvestOptions): Promise<HarvestOutcome> {
  const results: OlympiadResult[] = [];
  const failed: HarvestOutcome["failed"] = [];

  for (const adapter of opts.adapters) {
    console.log(`Fetching ${adapter.olympiad} ${adapter.firstYear}-${opts.endYear}...`);
    try {
      results.push(await adapter.ingest({ endYear: opts.endYear, getText: opts.getText, rateMs: opts.rateMs }));
    } catch (e) {
      const error = e instanceof Error ? e.message : String(e);
      console.error(`ERROR ${adapter.olympiad} not updated: ${error}`);
      failed.push({ olympiad: adapter.olympiad, error });
    }
  }

  if (!results.length) {
    console.error("Every source failed; nothing written");
    return { updated: [], failed, dataset: null };
  }

  const dataset = buildDataset(results, {
    failed: failed.map(f => f.olympiad),
    now: opts.now,
    resolver: opts.resolver,
  });
  emitAtomic(opts.outPath, serializeDataset(dataset));

  console.log(`Wrote ${Object.keys(dataset.countries).length} countries to ${opts.outPath}`);
  console.log("Top 10 countries by total medals:");
  topCountries(dataset).forEach((c, i) => {
    console.log(`${String(i + 1).padStart(2)}. ${c.name.padEnd(30)} ${String(c.total).padStart(4)} total`);
  });

  return { updated: dataset.metadata.updated, failed, dataset };
}

export function exitCodeFor(outcome: HarvestOutcome): number {
  return outcome.updated.length > 0 ? 0 : 1;
}
