import "dotenv/config";

export type HarvestConfig = {
  endYear: number;
  outPath: string;
  timeoutMs: number;
  rateMs: number;
  userAgent: string;
};

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36";

function num(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${key} must be a non-negative integer, got '${raw}'`);
  }
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = []): HarvestConfig {
  return {
    endYear: num(env, "OLYMPIAD_END_YEAR", 2025),
    outPath: argv[0] ?? env.MEDALS_OUT ?? "web/public/medals.json",
    timeoutMs: num(env, "HTTP_TIMEOUT_MS", 20000),
    rateMs: num(env, "RATE_MS", 800),
    userAgent: env.HTTP_USER_AGENT ?? DEFAULT_USER_AGENT,
  };
}
