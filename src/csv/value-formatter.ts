import { FormatError } from "../errors.js";
import type { CellEvent, CellRef, DateSystem, HyperlinkAnchor, QuotingPolicy } from "../types.js";
import { encodeCell, rangeContains } from "../utils/cell-address.js";
import { formatSerial } from "../utils/cell-format.js";
import { expandExponent } from "../utils/format-override.js";
import type { CompiledOverrides } from "../utils/format-override.js";
import type { SharedStringTable } from "../stream/xlsx/shared-strings.js";
import type { CellStyle, StyleTable } from "../stream/xlsx/styles.js";

export interface TextOptions {
  noLineBreaks: boolean;
  escape: boolean;
  delimiter: string;
  quoting: QuotingPolicy;
}

export interface ValueFormatterContext {
  sharedStrings: SharedStringTable;
  styles: StyleTable;
  dateSystem: DateSystem;
  overrides: CompiledOverrides;
  text: TextOptions;
  /** Anchors of the current sheet; empty when hyperlinks are off */
  hyperlinks: readonly HyperlinkAnchor[];
}

export interface ValueFormatter {
  /** Final text of one cell */
  format(event: CellEvent): string;
  /** Cells that must be rendered even when the sheet has no entry for them */
  readonly placeholders: readonly CellRef[];
}

const NUMBER_REGEX = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * Replace line breaks and tabs with one space each
 */
export function flattenLineBreaks(value: string): string {
  return value.replace(/\r\n|[\r\n\t]/g, " ");
}

/**
 * Backslash-escape control characters. Under `none` quoting the delimiter and
 * the quote character are escaped too, since nothing else protects them.
 */
export function escapeText(value: string, delimiter: string, quoting: QuotingPolicy): string {
  let result = value
    .replace(/\\/g, "\\\\")
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t");
  if (quoting === "none") {
    result = result.replace(/"/g, '\\"');
    if (delimiter !== "\t" && delimiter !== '"' && delimiter !== "\\") {
      result = result.split(delimiter).join(`\\${delimiter}`);
    }
  }
  return result;
}

export function createValueFormatter(context: ValueFormatterContext): ValueFormatter {
  const { sharedStrings, styles, dateSystem, overrides, text, hyperlinks } = context;

  const formatNumberCell = (raw: string, style: CellStyle): string => {
    if (!NUMBER_REGEX.test(raw)) {
      return raw;
    }
    const value = Number(raw);

    if (style.kind === "date" || style.kind === "time") {
      if (overrides.ignoreFormats.has(style.kind)) {
        return raw;
      }
      const override = style.kind === "date" ? overrides.date : overrides.time;
      return override ? override(value, dateSystem) : formatSerial(value, style.code, dateSystem);
    }

    if (overrides.ignoreFormats.has("float")) {
      return raw;
    }
    if (overrides.sciFloat && /[eE]/.test(raw)) {
      return expandExponent(raw);
    }
    if (overrides.float && (style.kind === "float" || (style.kind === "general" && !Number.isInteger(value)))) {
      return overrides.float(value);
    }
    return raw;
  };

  const resolve = (event: CellEvent): string => {
    switch (event.kind) {
      case "shared-string": {
        const trimmed = event.raw.trim();
        const index = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
        const value = isNaN(index) ? undefined : sharedStrings.get(index);
        if (value === undefined) {
          throw new FormatError(
            `Shared string index "${event.raw}" is invalid (table has ${sharedStrings.size} entries)`,
            { cell: encodeCell(event.ref) }
          );
        }
        return value;
      }
      case "number":
        return formatNumberCell(event.raw, styles.get(event.style));
      case "boolean": {
        const trimmed = event.raw.trim();
        return trimmed === "1" ? "true" : trimmed === "0" ? "false" : event.raw;
      }
      case "empty":
        return "";
      default:
        return event.raw;
    }
  };

  const linkFor = (ref: CellRef): string | undefined =>
    hyperlinks.find(anchor => rangeContains(anchor.range, ref.row, ref.col))?.target;

  const applyTextOptions = (value: string): string => {
    if (text.noLineBreaks) {
      return flattenLineBreaks(value);
    }
    if (text.escape) {
      return escapeText(value, text.delimiter, text.quoting);
    }
    return value;
  };

  return {
    format(event: CellEvent): string {
      let value = resolve(event);
      if (hyperlinks.length) {
        const target = linkFor(event.ref);
        if (target !== undefined) {
          value = value ? `${value} (${target})` : target;
        }
      }
      return applyTextOptions(value);
    },
    placeholders: hyperlinks.map(anchor => anchor.range.start)
  };
}
