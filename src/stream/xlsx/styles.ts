import type { FormatKind } from "../../types.js";
import { partError } from "../../errors.js";
import { classifyFormat, getFormat } from "../../utils/cell-format.js";
import { parseSax } from "../../utils/parse-sax.js";

export interface CellStyle {
  numFmtId: number;
  /** Number-format code, built-in or custom */
  code: string;
  kind: FormatKind;
}

const GENERAL_STYLE: CellStyle = Object.freeze({ numFmtId: 0, code: "General", kind: "general" });

/**
 * Number formats of the `cellXfs` style list, by style index
 */
export class StyleTable {
  private readonly styles: readonly CellStyle[];

  constructor(styles: readonly CellStyle[] = []) {
    this.styles = styles;
  }

  get size(): number {
    return this.styles.length;
  }

  /**
   * Style for a cell's `s` attribute; absent or unknown indices are General
   */
  get(index: number | undefined): CellStyle {
    if (index === undefined) {
      return GENERAL_STYLE;
    }
    return this.styles[index] ?? GENERAL_STYLE;
  }
}

/**
 * Read the custom `numFmt` codes and the `cellXfs` list of `xl/styles.xml`.
 * Other style records (fonts, fills, borders) have no bearing on values.
 */
export async function loadStyles(iterable: AsyncIterable<Uint8Array>): Promise<StyleTable> {
  const customFormats = new Map<number, string>();
  const xfFormatIds: number[] = [];
  let inCellXfs = false;

  try {
    for await (const events of parseSax(iterable)) {
      for (const { eventType, value } of events) {
        if (eventType === "opentag") {
          switch (value.local) {
            case "numFmt": {
              const id = parseInt(value.attributes.numFmtId ?? "", 10);
              const code = value.attributes.formatCode;
              if (!isNaN(id) && code !== undefined) {
                customFormats.set(id, code);
              }
              break;
            }
            case "cellXfs":
              inCellXfs = !value.isSelfClosing;
              break;
            case "xf":
              if (inCellXfs) {
                const id = parseInt(value.attributes.numFmtId ?? "0", 10);
                xfFormatIds.push(isNaN(id) ? 0 : id);
              }
              break;
          }
        } else if (eventType === "closetag" && value.local === "cellXfs") {
          inCellXfs = false;
        }
      }
    }
  } catch (error) {
    throw partError(error, "xl/styles.xml");
  }

  const classified = new Map<number, CellStyle>();
  const styles = xfFormatIds.map(numFmtId => {
    let style = classified.get(numFmtId);
    if (!style) {
      const code = customFormats.get(numFmtId) ?? getFormat(numFmtId);
      style = Object.freeze({ numFmtId, code, kind: classifyFormat(code) });
      classified.set(numFmtId, style);
    }
    return style;
  });
  return new StyleTable(styles);
}
