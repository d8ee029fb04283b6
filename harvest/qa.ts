import "dotenv/config";
import { readFileSync, existsSync } from "fs";
import { auditText } from "./audit.js";
import { CountryResolver } from "./countries.js";

const path = process.argv[2] ?? process.env.MEDALS_OUT ?? "web/public/medals.json";
if (!existsSync(path)) {
  console.error(`No dataset at ${path}; run the harvest first`);
  process.exit(1);
}

const report = auditText(readFileSync(path, "utf8"), new CountryResolver());
console.log(JSON.stringify(report, null, 2));
if (report.violations.length) process.exitCode = 1;
