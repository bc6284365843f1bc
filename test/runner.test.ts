import test from "node:test";
import assert from "node:assert/strict";
import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { TableFormatError } from "../src/common/errors.js";
import { Logger } from "../src/logger.js";
import { formatRunSummary, run } from "../src/runner.js";
import type { IdabilityParameters, RunConfig } from "../src/types.js";

const VISIT1 = "\tS1\tS2\tS3\nA\t5\t3\t4\nB\t1\t1\t0\nC\t2\t0\t0\n";
const VISIT2 = "\tS1\tS2\tS3\nA\t5\t3\t4\nC\t0\t2\t0\n";

const PARAMETERS: IdabilityParameters = {
  abundDetect: 0.5,
  abundNondetect: 0.5,
  minCodeSize: 1,
  ranking: "rarity",
};

function silentLogger(lines: string[] = []): Logger {
  return new Logger({ debugEnabled: true, sink: { write: (chunk: string) => lines.push(chunk) } });
}

function configFor(dir: string, overrides: Partial<RunConfig>): RunConfig {
  return {
    tablePath: join(dir, "visit1.pcl"),
    outputPath: join(dir, "visit1.codes.txt"),
    metaMode: "off",
    verbose: false,
    parameters: PARAMETERS,
    ...overrides,
  };
}

async function withTables(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "idability-run-"));
  try {
    await writeFile(join(dir, "visit1.pcl"), VISIT1, "utf8");
    await writeFile(join(dir, "visit2.pcl"), VISIT2, "utf8");
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("run encodes a table into a codes file", async () => {
  await withTables(async (dir) => {
    const lines: string[] = [];
    const config = configFor(dir, {});
    const summary = await run(config, { logger: silentLogger(lines) });

    assert.equal(
      await readFile(config.outputPath, "utf8"),
      "#SAMPLE\tCODE\nS1\tC\nS2\t#N/A\nS3\t#N/A\n",
    );
    assert.equal(summary.mode, "encode");
    assert.equal(summary.samples, 3);
    assert.equal(
      formatRunSummary(summary),
      `Finished. mode=encode samples=3 output=${config.outputPath} coded=1 uncoded=2 mean_code_length=1.00`,
    );
    assert.ok(lines.some((line) => line.includes("[DEBUG] S2: no unique code")));
    assert.ok(lines.some((line) => line.includes("[WARN] 2 of 3 samples could not be uniquely coded.")));
  });
});

test("run decodes the same table back to its samples", async () => {
  await withTables(async (dir) => {
    await run(configFor(dir, {}), { logger: silentLogger() });
    const config = configFor(dir, {
      codesPath: join(dir, "visit1.codes.txt"),
      outputPath: join(dir, "visit1.visit1.hits.txt"),
    });
    const summary = await run(config, { logger: silentLogger() });

    assert.equal(
      await readFile(config.outputPath, "utf8"),
      "# 1|TP: 1\n# 2|TP+FP: 0\n# 3|FN+FP: 0\n# 4|FN: 0\n# 5|NA: 2\n" +
        "S1\tmatches\tS1\nS2\tno_code\t#N/A\nS3\tno_code\t#N/A\n",
    );
    assert.equal(
      formatRunSummary(summary),
      `Finished. mode=decode samples=3 output=${config.outputPath} ` +
        "1|TP=1 2|TP+FP=0 3|FN+FP=0 4|FN=0 5|NA=2",
    );
  });
});

test("run reports a code that now hits a different sample", async () => {
  await withTables(async (dir) => {
    await run(configFor(dir, {}), { logger: silentLogger() });
    const config = configFor(dir, {
      tablePath: join(dir, "visit2.pcl"),
      codesPath: join(dir, "visit1.codes.txt"),
      outputPath: join(dir, "visit2.visit1.hits.txt"),
    });
    await run(config, { logger: silentLogger() });

    assert.equal(
      await readFile(config.outputPath, "utf8"),
      "# 1|TP: 0\n# 2|TP+FP: 0\n# 3|FN+FP: 1\n# 4|FN: 0\n# 5|NA: 2\n" +
        "S1\tmatches\tS2\nS2\tno_code\t#N/A\nS3\tno_code\t#N/A\n",
    );
  });
});

test("run writes nothing when the table is malformed", async () => {
  await withTables(async (dir) => {
    await writeFile(join(dir, "broken.pcl"), "\tS1\tS2\nA\t1\n", "utf8");
    const config = configFor(dir, {
      tablePath: join(dir, "broken.pcl"),
      outputPath: join(dir, "broken.codes.txt"),
    });
    await assert.rejects(() => run(config, { logger: silentLogger() }), TableFormatError);
    await assert.rejects(() => access(config.outputPath));
  });
});
