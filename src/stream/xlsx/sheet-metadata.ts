import { MalformedSheetXmlError, SheetpipeError } from "../../errors.js";
import type { HyperlinkAnchor, MergeRegion, SheetMetadata } from "../../types.js";
import { decodeRange } from "../../utils/cell-address.js";
import { getAttribute, parseSax } from "../../utils/parse-sax.js";
import type { ArchiveReader } from "../../utils/unzip/archive-reader.js";
import { loadRelationships } from "./catalog.js";
import type { Relationship } from "./catalog.js";

export interface MetadataScanOptions {
  merges: boolean;
  hyperlinks: boolean;
}

export const EMPTY_METADATA: SheetMetadata = Object.freeze({ merges: [], hyperlinks: [] });

/**
 * Path of the relationship part that belongs to `part`
 * @example relsPathFor("xl/worksheets/sheet1.xml") => "xl/worksheets/_rels/sheet1.xml.rels"
 */
export function relsPathFor(part: string): string {
  const idx = part.lastIndexOf("/");
  return `${part.slice(0, idx + 1)}_rels/${part.slice(idx + 1)}.rels`;
}

interface RawHyperlink {
  ref: string;
  rId?: string;
  location?: string;
}

function hyperlinkTarget(link: RawHyperlink, rels: Map<string, Relationship>): string | undefined {
  const rel = link.rId === undefined ? undefined : rels.get(link.rId);
  if (rel && link.location) {
    return `${rel.target}#${link.location}`;
  }
  if (rel) {
    return rel.target;
  }
  return link.location ? `#${link.location}` : undefined;
}

/**
 * Collect the merge regions and hyperlink anchors of one sheet.
 *
 * Both lists follow the cell data in the part, so this is a separate pass
 * over the sheet that skips everything else. Malformed regions are ignored.
 */
export async function scanSheetMetadata(
  archive: ArchiveReader,
  part: string,
  options: MetadataScanOptions
): Promise<SheetMetadata> {
  if (!options.merges && !options.hyperlinks) {
    return EMPTY_METADATA;
  }

  const merges: MergeRegion[] = [];
  const links: RawHyperlink[] = [];

  try {
    for await (const events of parseSax(archive.openEntry(part))) {
      for (const { eventType, value } of events) {
        if (eventType !== "opentag") {
          continue;
        }
        if (value.local === "mergeCell" && options.merges) {
          const region = decodeRange(value.attributes.ref ?? "");
          if (region) {
            merges.push(region);
          }
        } else if (value.local === "hyperlink" && options.hyperlinks) {
          const ref = value.attributes.ref;
          if (ref !== undefined) {
            links.push({ ref, rId: getAttribute(value, "id"), location: value.attributes.location });
          }
        }
      }
    }
  } catch (error) {
    if (error instanceof SheetpipeError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new MalformedSheetXmlError(detail, { part }, { cause: error });
  }

  const hyperlinks: HyperlinkAnchor[] = [];
  if (links.length) {
    const relsPart = relsPathFor(part);
    const rels = archive.hasEntry(relsPart)
      ? await loadRelationships(archive.openEntry(relsPart), relsPart)
      : new Map<string, Relationship>();
    for (const link of links) {
      const range = decodeRange(link.ref);
      const target = hyperlinkTarget(link, rels);
      if (range && target !== undefined) {
        hyperlinks.push({ range, target });
      }
    }
  }

  return { merges, hyperlinks };
}
