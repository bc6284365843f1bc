import type { ConfusionBucket, ConfusionCounts, HitList } from "../types.js";

export const CONFUSION_BUCKETS: readonly ConfusionBucket[] = [
  "1|TP",
  "2|TP+FP",
  "3|FN+FP",
  "4|FN",
  "5|NA",
];

export function classifyHits(sample: string, hits: HitList): ConfusionBucket {
  if (hits === null) {
    return "5|NA";
  }
  const truePositive = hits.includes(sample);
  const falsePositive = hits.some((hit) => hit !== sample);
  if (truePositive) {
    return falsePositive ? "2|TP+FP" : "1|TP";
  }
  return falsePositive ? "3|FN+FP" : "4|FN";
}

export function emptyConfusionCounts(): ConfusionCounts {
  return { "1|TP": 0, "2|TP+FP": 0, "3|FN+FP": 0, "4|FN": 0, "5|NA": 0 };
}

export function countConfusion(hits: ReadonlyMap<string, HitList>): ConfusionCounts {
  const counts = emptyConfusionCounts();
  for (const [sample, list] of hits) {
    counts[classifyHits(sample, list)] += 1;
  }
  return counts;
}
