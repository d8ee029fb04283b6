import { OLYMPIADS } from "../harvest/adapter.types.js";
import { NO_DATA_COLOR, tallyFor } from "./medals.js";
import type { ColorScale, Filter, MedalSnapshot } from "./medals.js";
import type { DatasetMetadata, MedalTally } from "../harvest/adapter.types.js";

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function flagEmoji(alpha2: string | null): string {
  if (!alpha2 || !/^[A-Za-z]{2}$/.test(alpha2)) return "";
  return String.fromCodePoint(...Array.from(alpha2.toUpperCase(), c => 0x1f1e6 + c.charCodeAt(0) - 65));
}

export type DetailRow = { filter: Filter; tally: MedalTally; active: boolean };

export function detailRows(snapshot: MedalSnapshot, iso3: string | null, filter: Filter): DetailRow[] {
  const order: Filter[] = [...OLYMPIADS, "All"];
  return order.map(f => ({ filter: f, tally: tallyFor(snapshot, iso3, f), active: f === filter }));
}

function row({ filter, tally, active }: DetailRow): string {
  return `<tr data-olympiad="${filter}"${active ? ' class="active"' : ""}>`
    + `<th>${filter}</th>`
    + `<td class="gold">${tally.gold}</td>`
    + `<td class="silver">${tally.silver}</td>`
    + `<td class="bronze">${tally.bronze}</td>`
    + `<td class="total">${tally.total}</td>`
    + `</tr>`;
}

/**
 * Per-olympiad breakdown for the hover panel and the click popup.
 * `fallbackName` comes from the boundary file and is used when the dataset has no name.
 */
export function renderDetail(snapshot: MedalSnapshot, iso3: string | null, fallbackName: string, filter: Filter): string {
  const country = iso3 ? snapshot.countries.get(iso3) : undefined;
  const name = escapeHtml(country?.name ?? fallbackName);
  const flag = flagEmoji(country?.alpha2 ?? null);
  const title = flag ? `<span class="flag">${flag}</span> ${name}` : name;

  return [
    `<div class="detail">`,
    `<div class="detail-title">${title}</div>`,
    `<table class="detail-table">`,
    `<thead><tr><th></th><th>Gold</th><th>Silver</th><th>Bronze</th><th>Total</th></tr></thead>`,
    `<tbody>${detailRows(snapshot, iso3, filter).map(row).join("")}</tbody>`,
    `</table>`,
    country ? "" : `<p class="detail-note">No medals recorded</p>`,
    `</div>`,
  ].join("");
}

export function renderLegend(scale: ColorScale, filter: Filter): string {
  const label = filter === "All" ? "All olympiads" : filter;
  return [
    `<div class="legend">`,
    `<div class="legend-title">${label}: total medals</div>`,
    `<div class="legend-bar" style="background: linear-gradient(to right, ${scale.colorAt(0)}, ${scale.colorAt(Math.max(scale.max, 1))})"></div>`,
    `<div class="legend-range"><span>0</span><span>${scale.max}</span></div>`,
    `<div class="legend-nodata"><span class="swatch" style="background: ${NO_DATA_COLOR}"></span> No data</div>`,
    `</div>`,
  ].join("");
}

export function renderNotice(message: string): string {
  return `<div class="notice">${escapeHtml(message)}</div>`;
}

/** Header line such as "IMO 1959-2025 · IOI 1989-2025 (2 years missing)"; empty without metadata. */
export function renderCoverage(metadata: DatasetMetadata | null): string {
  if (!metadata) return "";
  const parts: string[] = [];
  for (const o of OLYMPIADS) {
    const range = metadata.years[o];
    if (!range) continue;
    const missing = metadata.skipped[o]?.length ?? 0;
    parts.push(missing ? `${o} ${range} (${missing} year${missing === 1 ? "" : "s"} missing)` : `${o} ${range}`);
  }
  return parts.join(" · ");
}
