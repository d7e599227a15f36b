import type { Logger } from "pino";

// =============================================================================
// Workbook structure
// =============================================================================

/**
 * One physical sheet declared by the workbook manifest
 */
export interface SheetDescriptor {
  /** The workbook's own `sheetId` */
  id: number;
  /** 1-based position in declaration order */
  index: number;
  /** Display name */
  name: string;
  /** True for `hidden` and `veryHidden` sheets */
  hidden: boolean;
  /** Part path inside the container, e.g. `xl/worksheets/sheet1.xml` */
  path: string;
}

export type DateSystem = "1900" | "1904";

export interface SheetCatalog {
  sheets: readonly SheetDescriptor[];
  dateSystem: DateSystem;
  /** Shared-string part named by the workbook relationships */
  sharedStringsPath: string;
  stylesPath: string;
}

/**
 * Cell coordinate (0-indexed)
 */
export interface CellRef {
  row: number;
  col: number;
}

export interface MergeRegion {
  /** Top-left cell, the only one holding a value */
  start: CellRef;
  /** Bottom-right cell */
  end: CellRef;
}

export interface HyperlinkAnchor {
  /** Cell range the hyperlink is attached to */
  range: MergeRegion;
  target: string;
}

export interface SheetMetadata {
  merges: readonly MergeRegion[];
  hyperlinks: readonly HyperlinkAnchor[];
}

// =============================================================================
// Cell events
// =============================================================================

export type CellKind =
  | "shared-string"
  | "inline-string"
  | "string"
  | "number"
  | "boolean"
  | "error"
  | "empty";

export interface CellEvent {
  type: "cell";
  ref: CellRef;
  kind: CellKind;
  /** Raw payload as written in the part; numbers stay text */
  raw: string;
  /** Index into the `cellXfs` style list */
  style?: number;
}

export interface RowBoundary {
  type: "row";
  /** 0-indexed row number */
  row: number;
  hidden: boolean;
}

export type SheetEvent = CellEvent | RowBoundary;

/** One output row, dense from column 0 */
export type AssembledRow = string[];

// =============================================================================
// Formatting
// =============================================================================

/**
 * Classification of a number-format code
 */
export type FormatKind = "general" | "float" | "date" | "time" | "text";

/** Format kinds a caller may ask to leave unformatted */
export type IgnorableFormatKind = "date" | "time" | "float";

export interface FormatOverrides {
  dateFormat?: string;
  timeFormat?: string;
  floatFormat?: string;
  sciFloat: boolean;
  ignoreFormats: ReadonlySet<IgnorableFormatKind>;
}

// =============================================================================
// Output
// =============================================================================

export type QuotingPolicy = "none" | "minimal" | "nonnumeric" | "all";

export interface CsvDialect {
  delimiter: string;
  lineTerminator: string;
  /** Line written between consecutive sheets; empty writes nothing */
  sheetDelimiter: string;
  quoting: QuotingPolicy;
}

export interface SheetCriteria {
  sheetNames: readonly string[];
  /** 1-based sheet numbers in declaration order */
  sheetIds: readonly number[];
  includeSheetPatterns: readonly string[];
  excludeSheetPatterns: readonly string[];
  excludeHiddenSheets: boolean;
  all: boolean;
}

export interface ConvertResult {
  /** `closed` when the consumer stopped reading before the end */
  status: "complete" | "closed";
  /** Names of the sheets written, in output order */
  sheets: string[];
  /** Number of rows written */
  rows: number;
}

export type { Logger };
