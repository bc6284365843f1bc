/** sample -> feature -> abundance, iterated in load order. */
export type Matrix = Map<string, Map<string, number>>;
/** feature -> sample -> abundance, the transposed view of a {@link Matrix}. */
export type FlippedMatrix = Map<string, Map<string, number>>;
export type ReadonlyMatrix = ReadonlyMap<string, ReadonlyMap<string, number>>;

/** Membership only: sample -> features (or feature -> samples). */
export type PresenceSets = Map<string, Set<string>>;
export type ReadonlyPresenceSets = ReadonlyMap<string, ReadonlySet<string>>;

export type ThresholdDirection = "keep_above" | "keep_below";
export type RankingStrategy = "rarity" | "abundance_gap";
export type MetaMode = "off" | "relab" | "rpkm";
export type RunMode = "encode" | "decode";

/**
 * Features chosen for one sample, in the order the builder picked them.
 * `null` when no subset of the sample's features separates it from every other sample.
 */
export type Code = string[] | null;
export type CodeMap = Map<string, Code>;

/** Samples whose features cover a code; `null` when the code itself was `null`. */
export type HitList = string[] | null;
export type HitMap = Map<string, HitList>;

export type ConfusionBucket = "1|TP" | "2|TP+FP" | "3|FN+FP" | "4|FN" | "5|NA";
export type ConfusionCounts = Record<ConfusionBucket, number>;

export interface IdabilityParameters {
  abundDetect: number;
  abundNondetect: number;
  similarityCutoff?: number;
  minCodeSize: number;
  ranking: RankingStrategy;
}

export interface RunConfig {
  tablePath: string;
  codesPath?: string;
  outputPath: string;
  metaMode: MetaMode;
  verbose: boolean;
  parameters: IdabilityParameters;
}

export interface EncodeSummary {
  samples: number;
  coded: number;
  uncoded: number;
  meanCodeLength?: number;
}

export interface DecodeSummary {
  samples: number;
  confusion: ConfusionCounts;
}

export type RunSummary =
  | ({ mode: "encode"; outputPath: string; startedAt: string; finishedAt: string } & EncodeSummary)
  | ({ mode: "decode"; outputPath: string; startedAt: string; finishedAt: string } & DecodeSummary);

export interface LogSink {
  write(chunk: string): unknown;
}
