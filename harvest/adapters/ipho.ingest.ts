import { resultsAdapter } from "./results.template.js";

const BASE = "https://ipho-unofficial.org";

// 1973, 1978 and 1980 were not organised; 2020 was cancelled.
export const ipho = resultsAdapter({
  olympiad: "IPhO",
  firstYear: 1967,
  notHeld: [1973, 1978, 1980, 2020],
  yearUrl: (year) => `${BASE}/timeline/${year}/individual`,
  layout: {
    kind: "contestant",
    table: "table",
    columns: { country: ["country", "team"], medal: ["award", "medal"] },
    medals: {
      gold: ["gold", "gold medal", "g"],
      silver: ["silver", "silver medal", "s"],
      bronze: ["bronze", "bronze medal", "b"],
    },
  },
});
