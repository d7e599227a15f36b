/**
 * Error types raised by the conversion pipeline.
 *
 * Every error carries a `code` so callers can branch without `instanceof`
 * chains, and an optional location (part, sheet, cell) that is folded into
 * the message.
 */

export type ErrorCode =
  | "ARCHIVE_CORRUPT"
  | "ENTRY_MISSING"
  | "MALFORMED_SHARED_STRINGS"
  | "MALFORMED_SHEET_XML"
  | "UNKNOWN_CELL_TYPE"
  | "FORMAT_ERROR"
  | "SELECTION_ERROR"
  | "OUTPUT_CLOSED"
  | "CONFIG_ERROR";

export interface ErrorLocation {
  part?: string;
  sheet?: string;
  cell?: string;
}

function describeLocation(location: ErrorLocation): string {
  const parts: string[] = [];
  if (location.sheet !== undefined) {
    parts.push(`sheet "${location.sheet}"`);
  }
  if (location.cell !== undefined) {
    parts.push(`cell ${location.cell}`);
  }
  if (location.part !== undefined && location.sheet === undefined) {
    parts.push(`part ${location.part}`);
  }
  return parts.length ? ` (${parts.join(", ")})` : "";
}

export class SheetpipeError extends Error {
  readonly code: ErrorCode;
  readonly location: ErrorLocation;
  readonly detail: string;

  constructor(code: ErrorCode, detail: string, location: ErrorLocation = {}, options?: ErrorOptions) {
    super(detail + describeLocation(location), options);
    this.name = new.target.name;
    this.code = code;
    this.detail = detail;
    this.location = location;
  }
}

export class ArchiveCorruptError extends SheetpipeError {
  constructor(detail: string, location?: ErrorLocation, options?: ErrorOptions) {
    super("ARCHIVE_CORRUPT", detail, location, options);
  }
}

export class EntryMissingError extends SheetpipeError {
  readonly path: string;

  constructor(path: string, location?: ErrorLocation) {
    super("ENTRY_MISSING", `Part not found in archive: ${path}`, location);
    this.path = path;
  }
}

export class MalformedSharedStringsError extends SheetpipeError {
  constructor(detail: string, options?: ErrorOptions) {
    super("MALFORMED_SHARED_STRINGS", detail, { part: "xl/sharedStrings.xml" }, options);
  }
}

export class MalformedSheetXmlError extends SheetpipeError {
  constructor(detail: string, location?: ErrorLocation, options?: ErrorOptions) {
    super("MALFORMED_SHEET_XML", detail, location, options);
  }
}

export class UnknownCellTypeError extends SheetpipeError {
  readonly cellType: string;

  constructor(cellType: string, location?: ErrorLocation) {
    super("UNKNOWN_CELL_TYPE", `Unknown cell type "${cellType}"`, location);
    this.cellType = cellType;
  }
}

export class FormatError extends SheetpipeError {
  constructor(detail: string, location?: ErrorLocation) {
    super("FORMAT_ERROR", detail, location);
  }
}

export class SelectionError extends SheetpipeError {
  constructor(detail: string) {
    super("SELECTION_ERROR", detail);
  }
}

/**
 * The output consumer closed its end. Not a failure: the pipeline reports it
 * as a clean, early completion.
 */
export class OutputClosedError extends SheetpipeError {
  constructor(options?: ErrorOptions) {
    super("OUTPUT_CLOSED", "Output stream was closed by the consumer", {}, options);
  }
}

export class ConfigError extends SheetpipeError {
  constructor(detail: string) {
    super("CONFIG_ERROR", detail);
  }
}

/**
 * Re-raise `error` with a sheet name attached when it is one of ours and has
 * no sheet yet.
 */
export function withSheet(error: unknown, sheet: string): unknown {
  if (!(error instanceof SheetpipeError) || error.location.sheet !== undefined) {
    return error;
  }
  if (error instanceof OutputClosedError) {
    return error;
  }
  const location = { ...error.location, sheet };
  switch (error.code) {
    case "MALFORMED_SHEET_XML":
      return new MalformedSheetXmlError(error.detail, location, { cause: error });
    case "FORMAT_ERROR":
      return new FormatError(error.detail, location);
    case "ARCHIVE_CORRUPT":
      return new ArchiveCorruptError(error.detail, location, { cause: error });
    default:
      return error;
  }
}

/**
 * Turn a parser failure inside a workbook-level part into an
 * `ArchiveCorruptError` naming that part. Errors of our own pass through.
 */
export function partError(error: unknown, part: string): SheetpipeError {
  if (error instanceof SheetpipeError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new ArchiveCorruptError(`Invalid XML: ${detail}`, { part }, { cause: error });
}
