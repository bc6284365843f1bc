import { writeFile } from "node:fs/promises";
import { CONFUSION_BUCKETS, countConfusion } from "../decode/confusion.js";
import type { HitList } from "../types.js";
import { NA_SENTINEL } from "./codes.js";

/**
 * Confusion summary (`# <bucket>: <count>`, one line per bucket) followed by one
 * line per sample: id, status, then the hit list or `#N/A`.
 */
export function formatHits(hits: ReadonlyMap<string, HitList>): string {
  const confusion = countConfusion(hits);
  const lines = [...CONFUSION_BUCKETS]
    .sort()
    .map((bucket) => `# ${bucket}: ${confusion[bucket]}`);

  for (const sample of Array.from(hits.keys()).sort()) {
    const list = hits.get(sample) ?? null;
    if (list === null) {
      lines.push([sample, "no_code", NA_SENTINEL].join("\t"));
      continue;
    }
    lines.push([sample, list.length > 0 ? "matches" : "no_matches", ...list].join("\t"));
  }
  return `${lines.join("\n")}\n`;
}

export async function writeHits(hits: ReadonlyMap<string, HitList>, path: string): Promise<void> {
  await writeFile(path, formatHits(hits), "utf8");
}
