import { thresholdFilter, toPresenceSets } from "../matrix/transform.js";
import type { Code, HitMap, ReadonlyMatrix, ReadonlyPresenceSets } from "../types.js";

/** Samples of `population` carrying every feature of `code`, in population order. */
export function checkCode(code: readonly string[], population: ReadonlyPresenceSets): string[] {
  const hits: string[] = [];
  for (const [sample, features] of population) {
    if (code.every((feature) => features.has(feature))) {
      hits.push(sample);
    }
  }
  return hits;
}

export function decode(
  matrix: ReadonlyMatrix,
  codes: ReadonlyMap<string, Code>,
  abundDetect: number,
): HitMap {
  const population = toPresenceSets(thresholdFilter(matrix, abundDetect, "keep_above"));
  const hits: HitMap = new Map();
  for (const [sample, code] of codes) {
    hits.set(sample, code === null ? null : checkCode(code, population));
  }
  return hits;
}
