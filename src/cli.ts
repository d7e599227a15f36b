import { readFileSync } from "fs";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import { convertFile } from "./csv/convert.js";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, createLogger, stderrDestination } from "./logger.js";
import type { LogLevel } from "./logger.js";
import { validateOptions } from "./options.js";
import type { CompleteOptions } from "./options.js";
import type { Logger } from "./types.js";

export interface CliFlags {
  all?: boolean;
  outputencoding: string;
  delimiter: string;
  hyperlinks?: boolean;
  escape?: boolean;
  /** Set to false by `--no-line-breaks` */
  lineBreaks: boolean;
  exclude_sheet_pattern: string[];
  dateformat?: string;
  timeformat?: string;
  floatformat?: string;
  sciFloat?: boolean;
  include_sheet_pattern: string[];
  exclude_hidden_sheets?: boolean;
  ignoreFormats: string[];
  lineterminator: string;
  mergeCells?: boolean;
  sheetname: string[];
  ignoreempty?: boolean;
  skipemptycolumns?: boolean;
  sheetdelimiter: string;
  quoting: string;
  sheet: number[];
  include_hidden_rows?: boolean;
  strict?: boolean;
  logLevel: string;
}

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  return PackageJsonSchema.parse(raw).version;
}

/**
 * Expand the escape sequences accepted for terminators and separators
 * @example parseEscapes("\\r\\n") => "\r\n", parseEscapes("x07") => "\u0007"
 */
export function parseEscapes(value: string): string {
  return value
    .replace(/\\n/g, "\n")
    .replace(/\\r/g, "\r")
    .replace(/\\t/g, "\t")
    .replace(/\\f/g, "\f")
    .replace(/x07/g, "\x07")
    .replace(/x09/g, "\t");
}

export function parseDelimiter(value: string): string {
  return value === "tab" || value === "\\t" || value === "x09" ? "\t" : value;
}

function collect<T>(parse: (value: string) => T) {
  return (value: string, previous: T[]): T[] => [...previous, parse(value)];
}

function parseSheetNumber(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`Sheet number must be a positive integer, got "${value}"`);
  }
  return n;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Map parsed flags onto conversion options
 */
export function buildOptions(flags: CliFlags, logger: Logger): CompleteOptions {
  return validateOptions({
    delimiter: parseDelimiter(flags.delimiter),
    lineTerminator: parseEscapes(flags.lineterminator),
    sheetDelimiter: parseEscapes(flags.sheetdelimiter),
    quoting: flags.quoting,
    sheetNames: flags.sheetname,
    sheetIds: flags.sheet,
    includeSheetPatterns: flags.include_sheet_pattern,
    excludeSheetPatterns: flags.exclude_sheet_pattern,
    excludeHiddenSheets: flags.exclude_hidden_sheets ?? false,
    all: flags.all ?? false,
    skipEmptyRows: flags.ignoreempty ?? false,
    skipTrailingEmptyColumns: flags.skipemptycolumns ?? false,
    includeHiddenRows: flags.include_hidden_rows ?? false,
    mergeCells: flags.mergeCells ?? false,
    escape: flags.escape ?? false,
    noLineBreaks: !flags.lineBreaks,
    hyperlinks: flags.hyperlinks ?? false,
    dateFormat: flags.dateformat,
    timeFormat: flags.timeformat,
    floatFormat: flags.floatformat,
    sciFloat: flags.sciFloat ?? false,
    ignoreFormats: flags.ignoreFormats,
    strict: flags.strict ?? false,
    logger
  });
}

export function createProgram(): Command {
  return new Command()
    .name("sheetpipe")
    .description("Stream XLSX spreadsheets to CSV")
    .version(readVersion())
    .argument("<xlsxfile>", "xlsx file path, use '-' to read from stdin")
    .argument("[outfile]", "output csv file path, '-' or omitted for stdout")
    .option("-a, --all", "export all sheets, hidden ones included")
    .option("-c, --outputencoding <encoding>", "encoding of output csv (only utf-8 is supported)", "utf-8")
    .option("-d, --delimiter <delimiter>", "column delimiter, 'tab' or 'x09' for a tab", ",")
    .option("--hyperlinks", "include hyperlink targets")
    .option("-e, --escape", "escape \\r\\n\\t characters")
    .option("--no-line-breaks", "replace \\r\\n\\t with a space")
    .option("-E, --exclude_sheet_pattern <pattern>", "exclude sheets matching the pattern", collect(String), [])
    .option("-f, --dateformat <format>", "override date format (ex. %Y/%m/%d)")
    .option("-t, --timeformat <format>", "override time format (ex. %H:%M:%S)")
    .option("--floatformat <format>", "override float format (ex. %.15f)")
    .option("--sci-float", "render numbers in scientific notation as plain decimals")
    .option("-I, --include_sheet_pattern <pattern>", "only include sheets matching the pattern", collect(String), [])
    .option("--exclude_hidden_sheets", "exclude hidden sheets")
    .option("--ignore-formats <type>", "leave date, time or float values unformatted", collect(String), [])
    .option("-l, --lineterminator <terminator>", "line terminator: \\n, \\r\\n or \\r", "\n")
    .option("-m, --merge-cells", "fill merged cells with the value of their top-left cell")
    .option("-n, --sheetname <name>", "sheet name to convert", collect(String), [])
    .option("-i, --ignoreempty", "skip empty lines")
    .option("--skipemptycolumns", "skip trailing empty columns")
    .option("-p, --sheetdelimiter <delimiter>", "line between sheets, '' for none", "--------")
    .option("-q, --quoting <style>", "quoting: none, minimal, nonnumeric or all", "minimal")
    .option("-s, --sheet <number>", "sheet number to convert, starting at 1", collect(parseSheetNumber), [])
    .option("--include_hidden_rows", "include hidden rows")
    .option("--strict", "fail on unknown cell types")
    .option("--log-level <level>", `diagnostics level: ${LOG_LEVELS.join(", ")}`, "warn");
}

/**
 * Run the command line and return the process exit code
 */
export async function main(argv: readonly string[] = process.argv): Promise<number> {
  const program = createProgram().exitOverride();
  let input: string | undefined;
  let output: string | undefined;
  program.action((xlsxfile: string, outfile: string | undefined) => {
    input = xlsxfile;
    output = outfile;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    process.stderr.write(`sheetpipe: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
  if (input === undefined) {
    return 1;
  }

  const flags = program.opts<CliFlags>();
  const level = isLogLevel(flags.logLevel) ? flags.logLevel : "warn";
  const logger = createLogger(level, stderrDestination());
  if (!isLogLevel(flags.logLevel)) {
    logger.warn({ logLevel: flags.logLevel }, "Unknown log level; using warn");
  }

  try {
    if (!/^utf-?8$/i.test(flags.outputencoding)) {
      logger.warn({ encoding: flags.outputencoding }, "Only UTF-8 output is supported; writing UTF-8");
    }
    const result = await convertFile(input, output, buildOptions(flags, logger));
    logger.info({ status: result.status, sheets: result.sheets, rows: result.rows }, "Done");
    return 0;
  } catch (error) {
    process.stderr.write(`sheetpipe: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
