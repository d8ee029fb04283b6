import { loadConfig } from "./config.js";
import { adapters } from "./adapters/index.js";
import { htmlFetcher } from "./utils/httpHtml.js";
import { exitCodeFor, harvest } from "./pipeline.js";

const cfg = loadConfig(process.env, process.argv.slice(2));

harvest({
  adapters,
  getText: htmlFetcher({ timeoutMs: cfg.timeoutMs, userAgent: cfg.userAgent }),
  endYear: cfg.endYear,
  outPath: cfg.outPath,
  rateMs: cfg.rateMs,
}).then(outcome => {
  process.exitCode = exitCodeFor(outcome);
}).catch(err => {
  console.error(err);
  process.exit(1);
});
