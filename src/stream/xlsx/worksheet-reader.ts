import type { Logger } from "pino";
import { MalformedSheetXmlError, SheetpipeError, UnknownCellTypeError } from "../../errors.js";
import type { CellEvent, CellKind, CellRef, SheetEvent } from "../../types.js";
import { decodeCell, encodeCell } from "../../utils/cell-address.js";
import { parseSax } from "../../utils/parse-sax.js";
import type { XmlTag } from "../../utils/parse-sax.js";

export interface WorksheetContext {
  /** Sheet name, for error locations and log lines */
  sheet: string;
  /** Treat unknown cell types as fatal */
  strict: boolean;
  logger: Logger;
}

const CELL_KINDS: Record<string, CellKind> = {
  n: "number",
  s: "shared-string",
  inlineStr: "inline-string",
  str: "string",
  b: "boolean",
  e: "error",
  // ISO 8601 date cells carry their value as text
  d: "string"
};

function isTrue(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

interface PendingCell {
  ref: CellRef;
  kind: CellKind;
  style?: number;
  value: string | null;
}

/**
 * Pull-parse one worksheet part into cell events and row boundaries.
 *
 * Each `<row>` produces a boundary before its cells. Cell values stay as the
 * raw text of the part: shared-string indices, number literals, `0`/`1`
 * booleans. Nothing but the current cell is held in memory.
 */
export async function* parseWorksheet(
  iterable: AsyncIterable<Uint8Array>,
  context: WorksheetContext
): AsyncGenerator<SheetEvent> {
  const { sheet, strict, logger } = context;
  const warnedTypes = new Set<string>();

  let row = -1;
  let inRow = false;
  let lastCol = -1;
  // Open cell; `value` stays null until text arrives, which makes it empty
  let cell: PendingCell | undefined;
  let lastAddress: string | undefined;
  let inValue = false;
  let inInline = false;
  let inInlineText = false;
  let phoneticDepth = 0;

  const fail = (detail: string, address = lastAddress): never => {
    throw new MalformedSheetXmlError(detail, { sheet, cell: address });
  };

  const openCell = (tag: XmlTag): PendingCell => {
    let ref: CellRef;
    const address = tag.attributes.r;
    if (address !== undefined) {
      const decoded = decodeCell(address);
      if (!decoded) {
        return fail(`Invalid cell reference "${address}"`);
      }
      if (inRow && decoded.row !== row) {
        return fail(`Cell ${address} lies outside row ${row + 1}`, address);
      }
      if (decoded.col < lastCol) {
        return fail(`Cell ${address} is out of column order`, address);
      }
      ref = decoded;
    } else {
      ref = { row: Math.max(row, 0), col: lastCol + 1 };
    }
    lastCol = ref.col;
    lastAddress = encodeCell(ref);

    const type = tag.attributes.t ?? "n";
    let kind = CELL_KINDS[type];
    if (kind === undefined) {
      const error = new UnknownCellTypeError(type, { sheet, cell: lastAddress });
      if (strict) {
        throw error;
      }
      if (!warnedTypes.has(type)) {
        warnedTypes.add(type);
        logger.warn({ sheet, cell: lastAddress, cellType: type }, `${error.message}; using its raw text`);
      }
      kind = "string";
    }

    const style = tag.attributes.s === undefined ? undefined : parseInt(tag.attributes.s, 10);
    return { ref, kind, style: style === undefined || isNaN(style) ? undefined : style, value: null };
  };

  const closeCell = (pending: PendingCell): CellEvent => {
    const event: CellEvent = {
      type: "cell",
      ref: pending.ref,
      kind: pending.value ? pending.kind : "empty",
      raw: pending.value ?? ""
    };
    if (pending.style !== undefined) {
      event.style = pending.style;
    }
    return event;
  };

  try {
    for await (const events of parseSax(iterable)) {
      const out: SheetEvent[] = [];
      for (const { eventType, value } of events) {
        if (eventType === "opentag") {
          switch (value.local) {
            case "row": {
              const r = value.attributes.r;
              const next = r === undefined ? row + 1 : parseInt(r, 10) - 1;
              if (isNaN(next) || next < 0) {
                fail(`Invalid row number "${r ?? ""}"`);
              }
              if (next <= row) {
                fail(`Row ${next + 1} is out of order`);
              }
              row = next;
              inRow = !value.isSelfClosing;
              lastCol = -1;
              out.push({ type: "row", row, hidden: isTrue(value.attributes.hidden) });
              break;
            }
            case "c":
              cell = openCell(value);
              break;
            case "v":
              inValue = cell !== undefined;
              break;
            case "is":
              inInline = cell !== undefined;
              break;
            case "t":
              inInlineText = inInline && phoneticDepth === 0;
              break;
            case "rPh":
              phoneticDepth++;
              break;
          }
        } else if (eventType === "text") {
          if (cell && (inValue || inInlineText)) {
            cell.value = (cell.value ?? "") + value;
          }
        } else {
          switch (value.local) {
            case "row":
              inRow = false;
              break;
            case "c":
              if (cell) {
                out.push(closeCell(cell));
                cell = undefined;
              }
              break;
            case "v":
              inValue = false;
              break;
            case "is":
              inInline = false;
              break;
            case "t":
              inInlineText = false;
              break;
            case "rPh":
              phoneticDepth--;
              break;
          }
        }
      }
      if (out.length) {
        yield* out;
      }
    }
  } catch (error) {
    if (error instanceof SheetpipeError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new MalformedSheetXmlError(detail, { sheet, cell: lastAddress }, { cause: error });
  }
}
