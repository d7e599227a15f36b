import { MalformedSharedStringsError, SheetpipeError } from "../../errors.js";
import { parseSax } from "../../utils/parse-sax.js";

/**
 * The workbook's shared string list, immutable once loaded
 */
export class SharedStringTable {
  private readonly strings: readonly string[];

  constructor(strings: readonly string[] = []) {
    this.strings = Object.freeze([...strings]);
  }

  get size(): number {
    return this.strings.length;
  }

  get(index: number): string | undefined {
    return this.strings[index];
  }
}

/**
 * Read `xl/sharedStrings.xml`.
 *
 * Each `<si>` contributes one string: the text of its `<t>` elements, plain
 * or spread over rich-text runs, concatenated. Phonetic guides (`<rPh>`) are
 * not part of the value.
 */
export async function loadSharedStrings(
  iterable: AsyncIterable<Uint8Array>
): Promise<SharedStringTable> {
  const strings: string[] = [];
  let text: string | null = null;
  let inText = false;
  let phoneticDepth = 0;

  try {
    for await (const events of parseSax(iterable)) {
      for (const { eventType, value } of events) {
        if (eventType === "opentag") {
          switch (value.local) {
            case "si":
              text = "";
              break;
            case "rPh":
              phoneticDepth++;
              break;
            case "t":
              inText = phoneticDepth === 0 && !value.isSelfClosing;
              break;
          }
        } else if (eventType === "text") {
          if (inText && text !== null) {
            text += value;
          }
        } else {
          switch (value.local) {
            case "si":
              strings.push(text ?? "");
              text = null;
              break;
            case "rPh":
              phoneticDepth--;
              break;
            case "t":
              inText = false;
              break;
          }
        }
      }
    }
  } catch (error) {
    if (error instanceof SheetpipeError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new MalformedSharedStringsError(`Invalid shared strings: ${detail}`, { cause: error });
  }

  return new SharedStringTable(strings);
}
