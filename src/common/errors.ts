export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

/** Structural problem in a table or codes file. */
export class TableFormatError extends Error {
  override readonly name = "TableFormatError";
}

/** Input file missing or unreadable. */
export class InputFileError extends Error {
  override readonly name = "InputFileError";
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";
}
