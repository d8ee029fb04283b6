import { mkdirSync, renameSync, rmSync, writeFileSync } from "fs";
import { basename, dirname, join } from "path";

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

/**
 * Writes `text` to a temp file next to `target` and renames it into place, so a
 * reader sees either the previous file or the complete new one.
 */
export function emitAtomic(target: string, text: string) {
  const dir = dirname(target);
  ensureDir(dir);
  const tmp = join(dir, `.${basename(target)}.${process.pid}.tmp`);
  try {
    writeFileSync(tmp, text, "utf8");
    renameSync(tmp, target);
  } catch (e) {
    rmSync(tmp, { force: true });
    throw e;
  }
}
