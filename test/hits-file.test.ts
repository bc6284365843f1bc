import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { formatHits, writeHits } from "../src/io/hits.js";
import type { HitList } from "../src/types.js";

const HITS = new Map<string, HitList>([
  ["S5", ["S1"]],
  ["S1", ["S1"]],
  ["S2", ["S1", "S2"]],
  ["S3", []],
  ["S4", null],
]);

const EXPECTED = [
  "# 1|TP: 1",
  "# 2|TP+FP: 1",
  "# 3|FN+FP: 1",
  "# 4|FN: 1",
  "# 5|NA: 1",
  "S1\tmatches\tS1",
  "S2\tmatches\tS1\tS2",
  "S3\tno_matches",
  "S4\tno_code\t#N/A",
  "S5\tmatches\tS1",
  "",
].join("\n");

test("formatHits writes the confusion summary then one sorted line per sample", () => {
  assert.equal(formatHits(HITS), EXPECTED);
});

test("formatHits reports zero counts for empty buckets", () => {
  const body = formatHits(new Map<string, HitList>([["S1", null]]));
  assert.equal(
    body,
    "# 1|TP: 0\n# 2|TP+FP: 0\n# 3|FN+FP: 0\n# 4|FN: 0\n# 5|NA: 1\nS1\tno_code\t#N/A\n",
  );
});

test("writeHits writes the formatted report", async () => {
  const dir = await mkdtemp(join(tmpdir(), "idability-hits-"));
  try {
    const path = join(dir, "visit2.visit1.hits.txt");
    await writeHits(HITS, path);
    assert.equal(await readFile(path, "utf8"), EXPECTED);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
