import { z } from "zod";
import { ConfigError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { CsvDialect, FormatOverrides, Logger, SheetCriteria } from "./types.js";
import { compileOverrides } from "./utils/format-override.js";
import type { CompiledOverrides } from "./utils/format-override.js";

const LoggerSchema = z.custom<Logger>(
  value =>
    typeof value === "object" &&
    value !== null &&
    "warn" in value &&
    typeof value.warn === "function" &&
    "debug" in value &&
    typeof value.debug === "function",
  { message: "Expected a pino logger" }
);

export const ConvertOptionsSchema = z
  .object({
    delimiter: z.string().length(1, "Delimiter must be a single character").default(","),
    lineTerminator: z.enum(["\n", "\r\n", "\r"]).default("\n"),
    sheetDelimiter: z.string().default("--------"),
    quoting: z.enum(["none", "minimal", "nonnumeric", "all"]).default("minimal"),
    sheetNames: z.array(z.string()).default([]),
    sheetIds: z.array(z.number().int().positive()).default([]),
    includeSheetPatterns: z.array(z.string()).default([]),
    excludeSheetPatterns: z.array(z.string()).default([]),
    excludeHiddenSheets: z.boolean().default(false),
    all: z.boolean().default(false),
    skipEmptyRows: z.boolean().default(false),
    skipTrailingEmptyColumns: z.boolean().default(false),
    includeHiddenRows: z.boolean().default(false),
    mergeCells: z.boolean().default(false),
    escape: z.boolean().default(false),
    noLineBreaks: z.boolean().default(false),
    hyperlinks: z.boolean().default(false),
    dateFormat: z.string().min(1).optional(),
    timeFormat: z.string().min(1).optional(),
    floatFormat: z.string().min(1).optional(),
    sciFloat: z.boolean().default(false),
    ignoreFormats: z.array(z.enum(["date", "time", "float"])).default([]),
    strict: z.boolean().default(false),
    logger: LoggerSchema.optional()
  })
  .strict();

/** Conversion options as callers pass them; every field is optional */
export type ConvertOptions = z.input<typeof ConvertOptionsSchema>;

/** Conversion options with every default filled in */
export type CompleteOptions = z.output<typeof ConvertOptionsSchema>;

export interface RowOptions {
  skipEmptyRows: boolean;
  skipTrailingEmptyColumns: boolean;
  includeHiddenRows: boolean;
  mergeCells: boolean;
}

export interface ResolvedOptions {
  dialect: CsvDialect;
  criteria: SheetCriteria;
  rows: RowOptions;
  /** Backslash-escape control characters in cell text */
  escape: boolean;
  noLineBreaks: boolean;
  hyperlinks: boolean;
  overrides: FormatOverrides;
  formats: CompiledOverrides;
  strict: boolean;
  logger: Logger;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Check an untyped options object, such as one assembled from command-line
 * flags, and fill in defaults
 */
export function validateOptions(options: unknown): CompleteOptions {
  const parsed = ConvertOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigError(`Invalid options: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Validate user options and fill in defaults. Format overrides are compiled
 * here, so a bad format string is reported before any output.
 */
export function resolveOptions(options: ConvertOptions = {}): ResolvedOptions {
  const o = validateOptions(options);

  const overrides: FormatOverrides = {
    dateFormat: o.dateFormat,
    timeFormat: o.timeFormat,
    floatFormat: o.floatFormat,
    sciFloat: o.sciFloat,
    ignoreFormats: new Set(o.ignoreFormats)
  };

  return Object.freeze({
    dialect: Object.freeze({
      delimiter: o.delimiter,
      lineTerminator: o.lineTerminator,
      sheetDelimiter: o.sheetDelimiter,
      quoting: o.quoting
    }),
    criteria: Object.freeze({
      sheetNames: o.sheetNames,
      sheetIds: o.sheetIds,
      includeSheetPatterns: o.includeSheetPatterns,
      excludeSheetPatterns: o.excludeSheetPatterns,
      excludeHiddenSheets: o.excludeHiddenSheets,
      all: o.all
    }),
    rows: Object.freeze({
      skipEmptyRows: o.skipEmptyRows,
      skipTrailingEmptyColumns: o.skipTrailingEmptyColumns,
      includeHiddenRows: o.includeHiddenRows,
      mergeCells: o.mergeCells
    }),
    escape: o.escape,
    noLineBreaks: o.noLineBreaks,
    hyperlinks: o.hyperlinks,
    overrides,
    formats: compileOverrides(overrides),
    strict: o.strict,
    logger: o.logger ?? silentLogger
  });
}
