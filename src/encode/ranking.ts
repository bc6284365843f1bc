import type { RankingStrategy, ReadonlyMatrix } from "../types.js";

export interface RankingContext {
  /** Detect-thresholded matrix: the features a sample may use in its code. */
  detected: ReadonlyMatrix;
  /** Non-detect feature view: prevalence and competing values come from here. */
  flipped: ReadonlyMatrix;
  abundNondetect: number;
}

/**
 * Orders one sample's detected features from lowest to highest priority.
 * The code builder consumes from the end of the returned list.
 */
export type FeatureRanker = (sample: string, context: RankingContext) => string[];

export const rankByRarity: FeatureRanker = (sample, context) => {
  const features = Array.from(context.detected.get(sample)?.keys() ?? []);
  const prevalence = (feature: string): number => context.flipped.get(feature)?.size ?? 0;
  // Array#sort is stable: ties keep load order, so the later-loaded feature is tried first.
  return features.sort((a, b) => prevalence(b) - prevalence(a));
};

export const rankByAbundanceGap: FeatureRanker = (sample, context) => {
  const values = context.detected.get(sample);
  if (!values) {
    return [];
  }
  const gaps = new Map<string, number>();
  for (const [feature, focal] of values) {
    gaps.set(feature, focal - nextLowerValue(sample, feature, focal, context));
  }
  const gapOf = (feature: string): number => gaps.get(feature) ?? 0;
  return Array.from(gaps.keys()).sort((a, b) => gapOf(a) - gapOf(b));
};

/**
 * Highest value held by another sample that does not exceed `focal`,
 * floored at the non-detect threshold.
 */
function nextLowerValue(
  sample: string,
  feature: string,
  focal: number,
  context: RankingContext,
): number {
  let best = context.abundNondetect;
  for (const [other, value] of context.flipped.get(feature) ?? []) {
    if (other !== sample && value <= focal && value > best) {
      best = value;
    }
  }
  return best;
}

export const FEATURE_RANKERS: Record<RankingStrategy, FeatureRanker> = {
  rarity: rankByRarity,
  abundance_gap: rankByAbundanceGap,
};

export function rankFeatures(
  strategy: RankingStrategy,
  context: RankingContext,
): Map<string, string[]> {
  const ranker = FEATURE_RANKERS[strategy];
  const out = new Map<string, string[]>();
  for (const sample of context.detected.keys()) {
    out.set(sample, ranker(sample, context));
  }
  return out;
}
