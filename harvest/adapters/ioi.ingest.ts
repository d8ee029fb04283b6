import { resultsAdapter } from "./results.template.js";

const BASE = "https://stats.ioinformatics.org";

export const ioi = resultsAdapter({
  olympiad: "IOI",
  firstYear: 1989,
  yearUrl: (year) => `${BASE}/results/${year}`,
  layout: {
    kind: "contestant",
    table: "table",
    columns: { country: ["country", "team"], medal: ["medal", "award"] },
    medals: { gold: ["gold"], silver: ["silver"], bronze: ["bronze"] },
  },
});
