import { resultsAdapter } from "./results.template.js";

const BASE = "https://www.imo-official.org";

// Country results per year: one row per team with award counts under "G", "S", "B".
export const imo = resultsAdapter({
  olympiad: "IMO",
  firstYear: 1959,
  notHeld: [1980],
  yearUrl: (year) => `${BASE}/year_country_r.aspx?year=${year}`,
  layout: {
    kind: "tally",
    table: "table",
    columns: {
      country: ["country", "team"],
      gold: ["gold", "g"],
      silver: ["silver", "s"],
      bronze: ["bronze", "b"],
    },
  },
});
