import { jaccard } from "../matrix/transform.js";
import type { Code, ReadonlyPresenceSets } from "../types.js";

export interface CodeBuildOptions {
  /** Knock out remaining candidates at or above this Jaccard similarity to a chosen feature. */
  similarityCutoff?: number;
  minCodeSize: number;
}

const NO_SAMPLES: ReadonlySet<string> = new Set();

/**
 * Greedy hitting-set search for one sample.
 *
 * Features are taken from the end of `rankedFeatures` until no other sample
 * carries every chosen feature. A feature that leaves the set of remaining
 * samples unchanged is dropped again, except once that set is already empty:
 * from then on features are only appended to reach `minCodeSize`.
 */
export function buildCode(
  sample: string,
  rankedFeatures: readonly string[],
  samplePresence: ReadonlyPresenceSets,
  featurePresence: ReadonlyPresenceSets,
  options: CodeBuildOptions,
): Code {
  let candidates = rankedFeatures.slice();
  let others = new Set<string>();
  for (const other of samplePresence.keys()) {
    if (other !== sample) {
      others.add(other);
    }
  }
  const code: string[] = [];

  while (candidates.length > 0 && (others.size > 0 || code.length < options.minCodeSize)) {
    const feature = candidates.pop();
    if (feature === undefined) {
      break;
    }
    code.push(feature);

    const carriers = featurePresence.get(feature) ?? NO_SAMPLES;
    const previousCount = others.size;
    others = intersect(others, carriers);
    if (previousCount === others.size && previousCount !== 0) {
      code.pop();
    }

    const cutoff = options.similarityCutoff;
    if (cutoff !== undefined) {
      candidates = candidates.filter(
        (candidate) =>
          jaccard(carriers, featurePresence.get(candidate) ?? NO_SAMPLES) < cutoff,
      );
    }
  }

  return others.size === 0 ? code : null;
}

function intersect(a: ReadonlySet<string>, b: ReadonlySet<string>): Set<string> {
  const out = new Set<string>();
  for (const item of a) {
    if (b.has(item)) {
      out.add(item);
    }
  }
  return out;
}
