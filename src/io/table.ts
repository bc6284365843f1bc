import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { InputFileError, TableFormatError, stringifyError } from "../common/errors.js";
import type { Matrix } from "../types.js";

/**
 * Parses a tab-separated table with samples as columns and features as rows.
 * Entries below `cutoff` are not stored; every sample named in the header is.
 */
export function parseTable(body: string, cutoff: number): Matrix {
  const rows = readRows(body);
  const header = rows[0];
  if (!header) {
    throw new TableFormatError("Table is empty: expected a header row with sample ids.");
  }

  const samples = header.slice(1);
  const matrix: Matrix = new Map();
  for (const sample of samples) {
    if (matrix.has(sample)) {
      throw new TableFormatError(`Duplicate sample id in header: ${sample}`);
    }
    matrix.set(sample, new Map());
  }

  for (let index = 1; index < rows.length; index += 1) {
    const row = rows[index];
    if (row.length !== header.length) {
      throw new TableFormatError(
        `Row ${index + 1} has ${row.length} cells but the header has ${header.length} (row length mismatch).`,
      );
    }
    const feature = row[0];
    for (let column = 1; column < row.length; column += 1) {
      const value = parseValue(row[column], index + 1, column + 1);
      if (value < cutoff) {
        continue;
      }
      matrix.get(samples[column - 1])?.set(feature, value);
    }
  }
  return matrix;
}

export async function loadTable(path: string, cutoff: number): Promise<Matrix> {
  let body: string;
  try {
    body = await readFile(path, "utf8");
  } catch (error) {
    throw new InputFileError(`Cannot read table file ${path}: ${stringifyError(error)}`, {
      cause: error,
    });
  }
  return parseTable(body, cutoff);
}

function readRows(body: string): string[][] {
  let records: unknown;
  try {
    records = parse(body, {
      delimiter: "\t",
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw new TableFormatError(`Cannot parse table: ${stringifyError(error)}`, { cause: error });
  }
  if (!Array.isArray(records) || !records.every(isStringRow)) {
    throw new TableFormatError("Cannot parse table: unexpected record shape.");
  }
  return records;
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === "string");
}

function parseValue(cell: string, row: number, column: number): number {
  const trimmed = cell.trim();
  const value = trimmed === "" ? Number.NaN : Number(trimmed);
  if (Number.isNaN(value)) {
    throw new TableFormatError(`Row ${row}, column ${column}: "${cell}" is not a number.`);
  }
  return value;
}
