import { ArchiveCorruptError, partError } from "../../errors.js";
import type { DateSystem, SheetCatalog, SheetDescriptor } from "../../types.js";
import { getAttribute, parseSax } from "../../utils/parse-sax.js";
import type { ArchiveReader } from "../../utils/unzip/archive-reader.js";

const WORKBOOK_PART = "xl/workbook.xml";
const WORKBOOK_RELS_PART = "xl/_rels/workbook.xml.rels";
const SHARED_STRINGS_PART = "xl/sharedStrings.xml";
const STYLES_PART = "xl/styles.xml";

export interface Relationship {
  id: string;
  type: string;
  target: string;
  /** `External` for links that point outside the package */
  targetMode?: string;
}

/**
 * Resolve a relationship target against the folder of the part that owns the
 * relationship list. Targets starting with `/` are package-absolute.
 */
export function resolveTarget(baseDir: string, target: string): string {
  const segments = target.startsWith("/") ? [] : baseDir.split("/").filter(Boolean);
  for (const segment of target.split("/")) {
    if (segment === "..") {
      segments.pop();
    } else if (segment !== "." && segment !== "") {
      segments.push(segment);
    }
  }
  return segments.join("/");
}

/**
 * Read a `.rels` part into its relationships, keyed by id
 */
export async function loadRelationships(
  iterable: AsyncIterable<Uint8Array>,
  part: string
): Promise<Map<string, Relationship>> {
  const relationships = new Map<string, Relationship>();
  try {
    for await (const events of parseSax(iterable)) {
      for (const { eventType, value } of events) {
        if (eventType !== "opentag" || value.local !== "Relationship") {
          continue;
        }
        const id = value.attributes.Id;
        const target = value.attributes.Target;
        if (id === undefined || target === undefined) {
          continue;
        }
        relationships.set(id, {
          id,
          type: value.attributes.Type ?? "",
          target,
          targetMode: value.attributes.TargetMode
        });
      }
    }
  } catch (error) {
    throw partError(error, part);
  }
  return relationships;
}

/**
 * Path of the first relationship whose type ends in `/<kind>`, resolved
 * against `xl/`
 */
function findPart(relationships: Map<string, Relationship>, kind: string): string | undefined {
  for (const rel of relationships.values()) {
    if (rel.type.endsWith(`/${kind}`) && rel.targetMode !== "External") {
      return resolveTarget("xl", rel.target);
    }
  }
  return undefined;
}

interface DeclaredSheet {
  name: string;
  sheetId: number;
  state?: string;
  rId?: string;
}

/**
 * Read the workbook manifest and its relationships into the ordered list of
 * sheets, the workbook's date system and the locations of its shared-string
 * and style parts.
 *
 * Elements and the relationship-id attribute are matched by local name, so
 * any namespace prefix is accepted.
 */
export async function loadCatalog(archive: ArchiveReader): Promise<SheetCatalog> {
  const declared: DeclaredSheet[] = [];
  let dateSystem: DateSystem = "1900";

  try {
    for await (const events of parseSax(archive.openEntry(WORKBOOK_PART))) {
      for (const { eventType, value } of events) {
        if (eventType !== "opentag") {
          continue;
        }
        switch (value.local) {
          case "workbookPr": {
            const date1904 = value.attributes.date1904;
            if (date1904 === "1" || date1904 === "true") {
              dateSystem = "1904";
            }
            break;
          }
          case "sheet": {
            const name = value.attributes.name;
            if (name === undefined) {
              throw new ArchiveCorruptError("Sheet declaration without a name", { part: WORKBOOK_PART });
            }
            declared.push({
              name,
              sheetId: parseInt(value.attributes.sheetId ?? "", 10),
              state: value.attributes.state,
              rId: getAttribute(value, "id")
            });
            break;
          }
        }
      }
    }
  } catch (error) {
    throw partError(error, WORKBOOK_PART);
  }

  if (!declared.length) {
    throw new ArchiveCorruptError("Workbook declares no sheets", { part: WORKBOOK_PART });
  }

  const relationships = archive.hasEntry(WORKBOOK_RELS_PART)
    ? await loadRelationships(archive.openEntry(WORKBOOK_RELS_PART), WORKBOOK_RELS_PART)
    : new Map<string, Relationship>();

  const sheets = declared.map((sheet, i): SheetDescriptor => {
    const index = i + 1;
    const id = isNaN(sheet.sheetId) ? index : sheet.sheetId;
    const rel = sheet.rId === undefined ? undefined : relationships.get(sheet.rId);
    return {
      id,
      index,
      name: sheet.name,
      hidden: sheet.state === "hidden" || sheet.state === "veryHidden",
      path: rel ? resolveTarget("xl", rel.target) : `xl/worksheets/sheet${id}.xml`
    };
  });

  return {
    sheets,
    dateSystem,
    sharedStringsPath: findPart(relationships, "sharedStrings") ?? SHARED_STRINGS_PART,
    stylesPath: findPart(relationships, "styles") ?? STYLES_PART
  };
}
