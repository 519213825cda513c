import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";

/** Calls that read real time or real randomness. Only `platform/` may use them. */
export const BANNED = [
  "Math.random",
  "crypto.getRandomValues",
  "new Date()",
  "Date.now()",
  "performance.now()",
  "setTimeout",
  "clearTimeout",
  "setInterval",
  "clearInterval",
];

/** Maps each offending file (relative to `dir`) to the banned strings it contains. */
export function findDeterminismViolations(dir: string): Map<string, string[]> {
  const files = readdirSync(dir, { recursive: true, encoding: "utf8" })
    .map((f) => f.split("\\").join("/"))
    .filter(
      (f) =>
        f.endsWith(".ts") &&
        !f.endsWith(".spec.ts") &&
        !f.startsWith("platform/")
    )
    .sort();

  const byFile = new Map<string, string[]>();
  for (const file of files) {
    const text = readFileSync(join(dir, file), "utf8");
    const found = BANNED.filter((banned) => text.includes(banned));
    if (found.length > 0) {
      byFile.set(file, found);
    }
  }
  return byFile;
}
