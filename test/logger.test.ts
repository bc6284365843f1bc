import test from "node:test";
import assert from "node:assert/strict";
import { Logger } from "../src/logger.js";

function captureLogger(debugEnabled?: boolean): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({
    debugEnabled,
    sink: { write: (chunk: string) => lines.push(chunk) },
    now: () => new Date("2026-01-02T03:04:05.000Z"),
  });
  return { logger, lines };
}

test("Logger writes one grep-friendly line per message", () => {
  const { logger, lines } = captureLogger();
  logger.info("Loading table file: t.pcl");
  logger.warn("2 of 3 samples could not be uniquely coded.");
  assert.deepEqual(lines, [
    "[2026-01-02T03:04:05.000Z] [INFO] Loading table file: t.pcl\n",
    "[2026-01-02T03:04:05.000Z] [WARN] 2 of 3 samples could not be uniquely coded.\n",
  ]);
});

test("Logger drops debug lines unless enabled", () => {
  const quiet = captureLogger();
  quiet.logger.debug("S1: code of 1 feature(s)");
  assert.deepEqual(quiet.lines, []);

  const verbose = captureLogger(true);
  verbose.logger.debug("S1: code of 1 feature(s)");
  assert.deepEqual(verbose.lines, ["[2026-01-02T03:04:05.000Z] [DEBUG] S1: code of 1 feature(s)\n"]);
});
