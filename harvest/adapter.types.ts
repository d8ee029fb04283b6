
export const OLYMPIADS = ["IMO", "IOI", "IPhO"] as const;
export type Olympiad = typeof OLYMPIADS[number];

export type MedalTally = {
  gold: number;
  silver: number;
  bronze: number;
  total: number;                // gold + silver + bronze
};

export type MedalRow = {
  country: string;              // raw name as printed on the results page
  gold: number;
  silver: number;
  bronze: number;
};

export type YearResult = {
  year: number;
  rows: MedalRow[];
};

export type SkippedYear = {
  year: number;
  reason: string;
};

export type OlympiadResult = {
  olympiad: Olympiad;
  firstYear: number;
  endYear: number;
  years: YearResult[];
  skipped: SkippedYear[];
};

export type CountryMedalRecord = {
  iso3: string;
  name: string;
  alpha2: string | null;
  medals: Partial<Record<Olympiad, MedalTally>>;
};

export type DatasetMetadata = {
  generated: string;            // ISO timestamp
  years: Partial<Record<Olympiad, string>>;   // e.g. "1959-2025"
  skipped: Partial<Record<Olympiad, number[]>>; // years in that range with no parsed results
  updated: Olympiad[];
  failed: Olympiad[];
};

export type OlympiadDataset = {
  metadata: DatasetMetadata;
  countries: Record<string, CountryMedalRecord>;
};

export type PageFetcher = (url: string) => Promise<string>;

export interface OlympiadAdapter {
  olympiad: Olympiad;
  firstYear: number;
  ingest: (opts: { endYear: number; getText: PageFetcher; rateMs?: number }) => Promise<OlympiadResult>;
}
