import { readFile, writeFile } from "node:fs/promises";
import { InputFileError, TableFormatError, stringifyError } from "../common/errors.js";
import type { Code, CodeMap } from "../types.js";

export const NA_SENTINEL = "#N/A";
const CODES_HEADER = "#SAMPLE\tCODE";

/** One line per sample, sorted by sample id; null codes become `#N/A`. */
export function formatCodes(codes: ReadonlyMap<string, Code>): string {
  const lines = [CODES_HEADER];
  for (const sample of Array.from(codes.keys()).sort()) {
    const code = codes.get(sample) ?? null;
    lines.push([sample, ...(code === null ? [NA_SENTINEL] : code)].join("\t"));
  }
  return `${lines.join("\n")}\n`;
}

export function parseCodes(body: string): CodeMap {
  const lines = body.split(/\r?\n/);
  if (!lines[0]?.startsWith("#SAMPLE")) {
    throw new TableFormatError(`Codes file must start with a "${CODES_HEADER}" header line.`);
  }
  const codes: CodeMap = new Map();
  for (const line of lines.slice(1)) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    const [sample, ...features] = trimmed.split("\t");
    codes.set(sample, features.includes(NA_SENTINEL) ? null : features);
  }
  return codes;
}

export async function writeCodes(codes: ReadonlyMap<string, Code>, path: string): Promise<void> {
  await writeFile(path, formatCodes(codes), "utf8");
}

export async function readCodes(path: string): Promise<CodeMap> {
  let body: string;
  try {
    body = await readFile(path, "utf8");
  } catch (error) {
    throw new InputFileError(`Cannot read codes file ${path}: ${stringifyError(error)}`, {
      cause: error,
    });
  }
  return parseCodes(body);
}
