import type {
  FlippedMatrix,
  Matrix,
  PresenceSets,
  ReadonlyMatrix,
  ThresholdDirection,
} from "../types.js";

/**
 * Rebuilds the matrix keeping only entries on the requested side of `cutoff`
 * (`keep_above`: value >= cutoff, `keep_below`: value < cutoff).
 * Every sample survives, even when none of its entries do.
 */
export function thresholdFilter(
  matrix: ReadonlyMatrix,
  cutoff: number,
  direction: ThresholdDirection = "keep_above",
): Matrix {
  const out: Matrix = new Map();
  for (const [sample, values] of matrix) {
    const kept = new Map<string, number>();
    for (const [feature, value] of values) {
      const keep = direction === "keep_above" ? value >= cutoff : value < cutoff;
      if (keep) {
        kept.set(feature, value);
      }
    }
    out.set(sample, kept);
  }
  return out;
}

/** sample -> feature -> value becomes feature -> sample -> value. */
export function flip(matrix: ReadonlyMatrix): FlippedMatrix {
  const out: FlippedMatrix = new Map();
  for (const [sample, values] of matrix) {
    for (const [feature, value] of values) {
      let samples = out.get(feature);
      if (!samples) {
        samples = new Map();
        out.set(feature, samples);
      }
      samples.set(sample, value);
    }
  }
  return out;
}

export function toPresenceSets(matrix: ReadonlyMatrix): PresenceSets {
  const out: PresenceSets = new Map();
  for (const [key, values] of matrix) {
    out.set(key, new Set(values.keys()));
  }
  return out;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) {
      intersection += 1;
    }
  }
  const union = a.size + b.size - intersection;
  if (union === 0) {
    throw new RangeError("jaccard similarity is undefined for two empty sets");
  }
  return intersection / union;
}
