import { flip, thresholdFilter, toPresenceSets } from "../matrix/transform.js";
import type { CodeMap, EncodeSummary, IdabilityParameters, ReadonlyMatrix } from "../types.js";
import { buildCode } from "./codeBuilder.js";
import { rankFeatures } from "./ranking.js";

/**
 * Builds a code for every sample of `matrix`, which is expected to be loaded at
 * the non-detect cutoff. Only detected features may enter a code, while sharing
 * a feature is judged at the non-detect level.
 */
export function encode(matrix: ReadonlyMatrix, parameters: IdabilityParameters): CodeMap {
  const flipped = flip(matrix);
  const detected = thresholdFilter(matrix, parameters.abundDetect, "keep_above");
  const ranked = rankFeatures(parameters.ranking, {
    detected,
    flipped,
    abundNondetect: parameters.abundNondetect,
  });

  const samplePresence = toPresenceSets(detected);
  const featurePresence = toPresenceSets(flipped);
  const codes: CodeMap = new Map();
  for (const sample of samplePresence.keys()) {
    codes.set(
      sample,
      buildCode(sample, ranked.get(sample) ?? [], samplePresence, featurePresence, {
        similarityCutoff: parameters.similarityCutoff,
        minCodeSize: parameters.minCodeSize,
      }),
    );
  }
  return codes;
}

export function summarizeCodes(codes: ReadonlyMap<string, readonly string[] | null>): EncodeSummary {
  let coded = 0;
  let totalLength = 0;
  for (const code of codes.values()) {
    if (code) {
      coded += 1;
      totalLength += code.length;
    }
  }
  return {
    samples: codes.size,
    coded,
    uncoded: codes.size - coded,
    meanCodeLength: coded > 0 ? totalLength / coded : undefined,
  };
}
