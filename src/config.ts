import { basename } from "node:path";
import { z } from "zod";
import { ConfigError } from "./common/errors.js";
import type { IdabilityParameters, MetaMode, RunConfig, RunMode } from "./types.js";

const EPSILON = 1e-20;
const CODES_EXTENSION = "codes.txt";
const HITS_EXTENSION = "hits.txt";

const schema = z.object({
  tablePath: z.string().min(1, "a table file is required"),
  codesPath: z.string().min(1).optional(),
  outputPath: z.string().min(1).optional(),
  abundDetect: z.number().finite(),
  abundNondetect: z.number().finite(),
  similarityCutoff: z.number().min(0).max(1).optional(),
  minCodeSize: z.number().int().min(0),
  ranking: z.enum(["rarity", "abundance_gap"]),
  metaMode: z.enum(["off", "relab", "rpkm"]),
  verbose: z.boolean(),
});

const DEFAULTS = {
  abundDetect: EPSILON,
  abundNondetect: EPSILON,
  minCodeSize: 1,
  ranking: "rarity",
  metaMode: "off",
  verbose: false,
} as const;

/** Detect thresholds of the metagenomics presets; everything else is shared. */
const META_MODE_DETECT: Record<Exclude<MetaMode, "off">, number> = {
  relab: 0.001,
  rpkm: 5.0,
};

const SHORT_ALIASES: Record<string, string> = {
  c: "codes",
  j: "jaccard-similarity-cutoff",
  m: "min-code-size",
  d: "abund-detect",
  n: "abund-nondetect",
  r: "ranking",
  o: "output",
  e: "meta-mode",
  v: "verbose",
  h: "help",
};

const KNOWN_OPTIONS = new Set(Object.values(SHORT_ALIASES));
const BOOLEAN_FLAGS = new Set(["verbose", "help"]);

export const USAGE = [
  "Usage: idability <table> [options]",
  "",
  "  Encode: builds a hitting-set code for every sample (column) of <table>.",
  "  Decode (with --codes): reports which samples of <table> each code hits.",
  "",
  "Options:",
  "  -c, --codes <path>                      codes file from an earlier run (decode mode)",
  "  -j, --jaccard-similarity-cutoff <0..1>  chosen features knock out features at least this similar",
  "  -m, --min-code-size <int>               keep lengthening codes past uniqueness (default 1)",
  "  -d, --abund-detect <float>              values at or above this are confidently present",
  "  -n, --abund-nondetect <float>           values below this are confidently absent",
  "  -r, --ranking <rarity|abundance_gap>    feature priority when building codes (default rarity)",
  "  -o, --output <path>                     output file (default derived from input names)",
  "  -e, --meta-mode <off|relab|rpkm>        metagenomics preset, overrides the parameters above",
  "  -v, --verbose                           log every sample",
  "  -h, --help                              show this help",
].join("\n");

interface CliRaw {
  positionals: string[];
  options: Record<string, string | boolean>;
}

export function isHelpRequested(argv: string[]): boolean {
  return parseCliArgs(argv).options.help === true;
}

export function buildRunConfig(argv: string[]): RunConfig {
  const args = parseCliArgs(argv);
  const unknown = Object.keys(args.options).filter((key) => !KNOWN_OPTIONS.has(key));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown option(s): ${unknown.map((key) => `--${key}`).join(", ")}\n${USAGE}`);
  }
  if (args.positionals.length > 1) {
    throw new ConfigError(`Expected one table file, got: ${args.positionals.join(", ")}`);
  }

  const result = schema.safeParse({
    tablePath: args.positionals[0] ?? "",
    codesPath: readOptionalString(args, "codes"),
    outputPath: readOptionalString(args, "output"),
    abundDetect: readNumber(args, "abund-detect", DEFAULTS.abundDetect),
    abundNondetect: readNumber(args, "abund-nondetect", DEFAULTS.abundNondetect),
    similarityCutoff: readOptionalNumber(args, "jaccard-similarity-cutoff"),
    minCodeSize: readNumber(args, "min-code-size", DEFAULTS.minCodeSize),
    ranking: readString(args, "ranking", DEFAULTS.ranking),
    metaMode: readString(args, "meta-mode", DEFAULTS.metaMode),
    verbose: readBool(args, "verbose", DEFAULTS.verbose),
  });
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }

  const parsed = result.data;
  const mode: RunMode = parsed.codesPath === undefined ? "encode" : "decode";
  return {
    tablePath: parsed.tablePath,
    codesPath: parsed.codesPath,
    outputPath:
      parsed.outputPath ?? defaultOutputPath(parsed.tablePath, parsed.codesPath),
    metaMode: parsed.metaMode,
    verbose: parsed.verbose,
    parameters: resolveParameters(
      {
        abundDetect: parsed.abundDetect,
        abundNondetect: parsed.abundNondetect,
        similarityCutoff: parsed.similarityCutoff,
        minCodeSize: parsed.minCodeSize,
        ranking: parsed.ranking,
      },
      parsed.metaMode,
      mode,
    ),
  };
}

/**
 * Applies a metagenomics preset on top of explicit parameters. Non-detect is
 * derived before the detect threshold is relaxed tenfold for decoding.
 */
export function resolveParameters(
  explicit: IdabilityParameters,
  metaMode: MetaMode,
  mode: RunMode,
): IdabilityParameters {
  if (metaMode === "off") {
    return { ...explicit };
  }
  const detect = META_MODE_DETECT[metaMode];
  return {
    abundDetect: mode === "decode" ? detect / 10 : detect,
    abundNondetect: detect / 100,
    similarityCutoff: 0.8,
    minCodeSize: 7,
    ranking: "abundance_gap",
  };
}

/** `<table>.codes.txt` when encoding, `<table>.<codes>.hits.txt` when decoding. */
export function defaultOutputPath(tablePath: string, codesPath?: string): string {
  const items = [pathToName(tablePath)];
  if (codesPath === undefined) {
    items.push(CODES_EXTENSION);
  } else {
    items.push(pathToName(codesPath), HITS_EXTENSION);
  }
  return items.join(".");
}

function pathToName(path: string): string {
  return basename(path).split(".")[0];
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = { positionals: [], options: {} };
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const key = readOptionKey(token);
    if (key === undefined) {
      out.positionals.push(token);
      continue;
    }
    const next = argv[i + 1];
    if (BOOLEAN_FLAGS.has(key) || next === undefined || readOptionKey(next) !== undefined) {
      out.options[key] = true;
      continue;
    }
    out.options[key] = next;
    i += 1;
  }
  return out;
}

function readOptionKey(token: string): string | undefined {
  if (token.startsWith("--") && token.length > 2) {
    return token.slice(2).replaceAll("_", "-");
  }
  const short = /^-([a-zA-Z])$/.exec(token);
  if (short) {
    return SHORT_ALIASES[short[1]] ?? short[1];
  }
  return undefined;
}

function readOptionalString(args: CliRaw, key: string): string | undefined {
  const value = args.options[key];
  if (typeof value === "string") {
    return value;
  }
  // A value option given as a bare flag; the schema rejects the empty string.
  return value === true ? "" : undefined;
}

function readString(args: CliRaw, key: string, fallback: string): string {
  return readOptionalString(args, key) ?? fallback;
}

function readOptionalNumber(args: CliRaw, key: string): number | undefined {
  const value = args.options[key];
  if (value === undefined) {
    return undefined;
  }
  return typeof value === "string" ? Number(value) : Number.NaN;
}

function readNumber(args: CliRaw, key: string, fallback: number): number {
  return readOptionalNumber(args, key) ?? fallback;
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args.options[key];
  if (typeof value === "boolean") {
    return value;
  }
  return fallback;
}
