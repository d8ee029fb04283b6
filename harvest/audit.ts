import { OLYMPIADS } from "./adapter.types.js";
import type { CountryResolver } from "./countries.js";
import type { MedalTally, Olympiad } from "./adapter.types.js";

export type AuditReport = {
  countryCount: number;
  medals: Partial<Record<Olympiad, MedalTally>>;
  violations: string[];
};

const ISO3 = /^[A-Z]{3}$/;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Re-reads a generated dataset and reports sums and broken invariants. */
export function auditDataset(raw: unknown, resolver: CountryResolver): AuditReport {
  const report: AuditReport = { countryCount: 0, medals: {}, violations: [] };
  if (!isRecord(raw)) {
    report.violations.push("dataset is not a JSON object");
    return report;
  }

  for (const [code, entry] of Object.entries(raw)) {
    if (code === "_metadata") continue;
    if (!ISO3.test(code)) report.violations.push(`${code}: key is not an ISO3 code`);
    if (!isRecord(entry)) {
      report.violations.push(`${code}: entry is not an object`);
      continue;
    }
    report.countryCount += 1;
    if (typeof entry.name === "string" && resolver.isHistorical(entry.name)) {
      report.violations.push(`${code}: historical state '${entry.name}'`);
    }

    for (const o of OLYMPIADS) {
      const t = entry[o];
      if (t === undefined) continue;
      if (!isRecord(t)) {
        report.violations.push(`${code}.${o}: not an object`);
        continue;
      }
      const { gold, silver, bronze, total } = t;
      if (typeof gold !== "number" || typeof silver !== "number" || typeof bronze !== "number" || typeof total !== "number") {
        report.violations.push(`${code}.${o}: non-numeric medal count`);
        continue;
      }
      if (total !== gold + silver + bronze) {
        report.violations.push(`${code}.${o}: total ${total} != ${gold}+${silver}+${bronze}`);
      }
      const sum = report.medals[o] ?? { gold: 0, silver: 0, bronze: 0, total: 0 };
      report.medals[o] = {
        gold: sum.gold + gold,
        silver: sum.silver + silver,
        bronze: sum.bronze + bronze,
        total: sum.total + total,
      };
    }
  }
  return report;
}

/** Audits the text of a dataset file; text that is not JSON is reported, not thrown. */
export function auditText(text: string, resolver: CountryResolver): AuditReport {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    if (!(e instanceof SyntaxError)) throw e;
    return { countryCount: 0, medals: {}, violations: [`not valid JSON: ${e.message}`] };
  }
  return auditDataset(raw, resolver);
}
