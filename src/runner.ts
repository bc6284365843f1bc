import { countConfusion } from "./decode/confusion.js";
import { decode } from "./decode/matcher.js";
import { encode, summarizeCodes } from "./encode/encode.js";
import { readCodes, writeCodes } from "./io/codes.js";
import { writeHits } from "./io/hits.js";
import { loadTable } from "./io/table.js";
import { Logger } from "./logger.js";
import type { IdabilityParameters, RunConfig, RunSummary } from "./types.js";

export interface RunOptions {
  logger?: Logger;
}

/**
 * One encode or decode pass over a table. Inputs are fully read and processed
 * before the single output file is written.
 */
export async function run(config: RunConfig, options: RunOptions = {}): Promise<RunSummary> {
  const logger = options.logger ?? new Logger({ debugEnabled: config.verbose });
  const startedAt = new Date().toISOString();
  const parameters = config.parameters;
  logger.info(`Parameters: ${formatParameters(parameters)}, meta_mode=${config.metaMode}`);

  logger.info(`Loading table file: ${config.tablePath}`);
  const matrix = await loadTable(config.tablePath, parameters.abundNondetect);

  if (config.codesPath === undefined) {
    logger.info("Encoding the table.");
    logger.info(`Performing requested feature ranking: ${parameters.ranking}`);
    const codes = encode(matrix, parameters);
    for (const [sample, code] of codes) {
      logger.debug(
        code === null ? `${sample}: no unique code` : `${sample}: code of ${code.length} feature(s)`,
      );
    }
    const summary = summarizeCodes(codes);
    if (summary.uncoded > 0) {
      logger.warn(`${summary.uncoded} of ${summary.samples} samples could not be uniquely coded.`);
    }
    await writeCodes(codes, config.outputPath);
    logger.info(`Wrote codes to: ${config.outputPath}`);
    return {
      mode: "encode",
      outputPath: config.outputPath,
      startedAt,
      finishedAt: new Date().toISOString(),
      ...summary,
    };
  }

  logger.info("Decoding the table.");
  const codes = await readCodes(config.codesPath);
  const hits = decode(matrix, codes, parameters.abundDetect);
  const confusion = countConfusion(hits);
  await writeHits(hits, config.outputPath);
  logger.info(`Wrote hits to: ${config.outputPath}`);
  return {
    mode: "decode",
    outputPath: config.outputPath,
    startedAt,
    finishedAt: new Date().toISOString(),
    samples: hits.size,
    confusion,
  };
}

export function formatRunSummary(summary: RunSummary): string {
  const head = `Finished. mode=${summary.mode} samples=${summary.samples} output=${summary.outputPath}`;
  if (summary.mode === "encode") {
    const mean =
      summary.meanCodeLength === undefined ? "-" : summary.meanCodeLength.toFixed(2);
    return `${head} coded=${summary.coded} uncoded=${summary.uncoded} mean_code_length=${mean}`;
  }
  const confusion = Object.entries(summary.confusion)
    .map(([bucket, count]) => `${bucket}=${count}`)
    .join(" ");
  return `${head} ${confusion}`;
}

function formatParameters(parameters: IdabilityParameters): string {
  return (
    `abund_detect=${parameters.abundDetect}, abund_nondetect=${parameters.abundNondetect}, ` +
    `jaccard_similarity_cutoff=${parameters.similarityCutoff ?? "off"}, ` +
    `min_code_size=${parameters.minCodeSize}, ranking=${parameters.ranking}`
  );
}
