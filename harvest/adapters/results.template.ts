import { load, type CheerioAPI } from "cheerio";
import { ParseError } from "../utils/errors.js";
import { sleep } from "../utils/httpHtml.js";
import type { MedalRow, Olympiad, OlympiadAdapter, OlympiadResult, PageFetcher } from "../adapter.types.js";

/** One row per country with gold/silver/bronze count columns. */
export type TallyLayout = {
  kind: "tally";
  table: string;
  columns: { country: string[]; gold: string[]; silver: string[]; bronze: string[] };
};

/** One row per contestant with a country column and a medal/award column. */
export type ContestantLayout = {
  kind: "contestant";
  table: string;
  columns: { country: string[]; medal: string[] };
  medals: { gold: string[]; silver: string[]; bronze: string[] };
};

export type TableLayout = TallyLayout | ContestantLayout;

export type ResultsConfig = {
  olympiad: Olympiad;
  firstYear: number;
  notHeld?: number[];            // years with no competition
  yearUrl: (year: number) => string;
  layout: TableLayout;
};

type Cell = { text: string; header: boolean };

const SUMMARY_ROW = /^(total|totals|sum)$/i;

export function cleanText(raw: string): string {
  return raw
    .replace(/\[[^\]]*\]/g, "")   // footnote markers
    .replace(/\s+/g, " ")
    .trim();
}

function span(raw: string | undefined): number {
  const n = Number(raw ?? 1);
  return Number.isInteger(n) && n > 0 ? n : 1;
}

// Expands colspan/rowspan so that every row has one entry per visual column.
function tableGrid($: CheerioAPI, selector: string): Cell[][] {
  const grid: Cell[][] = [];
  const carry: Array<{ cell: Cell; left: number } | undefined> = [];

  $(selector).first().find("tr").each((_i, tr) => {
    const out: Cell[] = [];
    let col = 0;
    const fill = () => {
      let pending = carry[col];
      while (pending && pending.left > 0) {
        out[col] = pending.cell;
        pending.left -= 1;
        if (pending.left === 0) carry[col] = undefined;
        col += 1;
        pending = carry[col];
      }
    };

    $(tr).children("th, td").each((_j, el) => {
      fill();
      const cell: Cell = { text: cleanText($(el).text()), header: $(el).is("th") };
      const cols = span($(el).attr("colspan"));
      const rows = span($(el).attr("rowspan"));
      for (let k = 0; k < cols; k++) {
        out[col] = cell;
        if (rows > 1) carry[col] = { cell, left: rows - 1 };
        col += 1;
      }
    });
    fill();
    // Spans reaching past the end of a short row still use up that row.
    for (let c = col; c < carry.length; c++) {
      const pending = carry[c];
      if (!pending) continue;
      pending.left -= 1;
      if (pending.left === 0) carry[c] = undefined;
    }
    if (out.length) grid.push(out);
  });

  return grid;
}

function findColumn(header: Cell[][], aliases: string[], label: string): number {
  const wanted = new Set(aliases.map(a => a.toLowerCase()));
  const width = Math.max(...header.map(r => r.length));
  for (let c = 0; c < width; c++) {
    if (header.some(r => wanted.has((r[c]?.text ?? "").toLowerCase()))) return c;
  }
  throw new ParseError(`no '${label}' column (looked for ${aliases.join(", ")})`);
}

// Caption rows such as "Unofficial teams" are one cell with a colspan.
const spansWholeRow = (cells: Cell[]) => new Set(cells).size === 1;

function count(text: string, row: number): number {
  if (text === "" || text === "-" || text === "–") return 0;
  if (!/^\d+$/.test(text)) throw new ParseError(`row ${row}: '${text}' is not a medal count`);
  return Number(text);
}

/**
 * Parses one year's results page into per-country medal rows.
 * Rows with fewer cells than the layout needs (separators, footers, captions) are skipped;
 * anything else that does not fit the layout is a ParseError.
 */
export function parseResultsTable(html: string, layout: TableLayout): MedalRow[] {
  const $ = load(html);
  if (!$(layout.table).length) throw new ParseError(`no table matching '${layout.table}'`);

  const grid = tableGrid($, layout.table);
  let headerRows = 0;
  while (headerRows < grid.length && grid[headerRows].every(c => c.header)) headerRows++;
  if (headerRows === 0) headerRows = 1;
  const header = grid.slice(0, headerRows);
  const body = grid.slice(headerRows);

  const country = findColumn(header, layout.columns.country, "country");

  if (layout.kind === "tally") {
    const gold = findColumn(header, layout.columns.gold, "gold");
    const silver = findColumn(header, layout.columns.silver, "silver");
    const bronze = findColumn(header, layout.columns.bronze, "bronze");
    const need = Math.max(country, gold, silver, bronze) + 1;

    const rows: MedalRow[] = [];
    body.forEach((cells, i) => {
      if (cells.length < need || spansWholeRow(cells)) return;
      const name = cells[country].text;
      if (!name || SUMMARY_ROW.test(name)) return;
      const line = headerRows + i + 1;
      rows.push({
        country: name,
        gold: count(cells[gold].text, line),
        silver: count(cells[silver].text, line),
        bronze: count(cells[bronze].text, line),
      });
    });
    return rows;
  }

  const medal = findColumn(header, layout.columns.medal, "medal");
  const need = Math.max(country, medal) + 1;
  const kinds: Array<["gold" | "silver" | "bronze", Set<string>]> = [
    ["gold", new Set(layout.medals.gold.map(m => m.toLowerCase()))],
    ["silver", new Set(layout.medals.silver.map(m => m.toLowerCase()))],
    ["bronze", new Set(layout.medals.bronze.map(m => m.toLowerCase()))],
  ];

  const byCountry = new Map<string, MedalRow>();
  for (const cells of body) {
    if (cells.length < need || spansWholeRow(cells)) continue;
    const name = cells[country].text;
    if (!name) continue;
    const row = byCountry.get(name) ?? { country: name, gold: 0, silver: 0, bronze: 0 };
    byCountry.set(name, row);
    const award = cells[medal].text.toLowerCase();
    const hit = kinds.find(([, names]) => names.has(award));
    if (hit) row[hit[0]] += 1;
  }
  return Array.from(byCountry.values());
}

export function yearsFor(cfg: Pick<ResultsConfig, "firstYear" | "notHeld">, endYear: number): number[] {
  const skip = new Set(cfg.notHeld ?? []);
  const years: number[] = [];
  for (let y = cfg.firstYear; y <= endYear; y++) {
    if (!skip.has(y)) years.push(y);
  }
  return years;
}

/**
 * Fetches and parses every year of one olympiad. A FetchError aborts the whole
 * olympiad; a ParseError only drops the year it happened in, unless no year
 * parses at all, in which case the olympiad fails.
 */
export async function ingestResults(
  cfg: ResultsConfig,
  opts: { endYear: number; getText: PageFetcher; rateMs?: number },
): Promise<OlympiadResult> {
  const result: OlympiadResult = {
    olympiad: cfg.olympiad,
    firstYear: cfg.firstYear,
    endYear: opts.endYear,
    years: [],
    skipped: [],
  };
  const years = yearsFor(cfg, opts.endYear);

  for (const [i, year] of years.entries()) {
    if (i > 0 && opts.rateMs) await sleep(opts.rateMs);
    const html = await opts.getText(cfg.yearUrl(year));
    try {
      result.years.push({ year, rows: parseResultsTable(html, cfg.layout) });
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      console.warn(`WARN ${cfg.olympiad} ${year} skipped: ${e.message}`);
      result.skipped.push({ year, reason: e.message });
    }
  }

  console.log(`${cfg.olympiad}: parsed ${result.years.length} of ${years.length} years`);
  if (years.length > 0 && result.years.length === 0) {
    throw new ParseError(`no year parsed (${years.length} tried)`);
  }
  return result;
}

export function resultsAdapter(cfg: ResultsConfig): OlympiadAdapter {
  return {
    olympiad: cfg.olympiad,
    firstYear: cfg.firstYear,
    ingest: (opts) => ingestResults(cfg, opts),
  };
}
