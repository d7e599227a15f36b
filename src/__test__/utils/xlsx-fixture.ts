import { Writable } from "stream";
import { strToU8, zipSync } from "fflate";
import type { Zippable } from "fflate";
import type { Logger } from "pino";
import { createLogger } from "../../logger.js";
import { ArchiveReader } from "../../utils/unzip/archive-reader.js";
import { BufferSource } from "../../utils/unzip/byte-source.js";

const MAIN_NS = "http://schemas.openxmlformats.org/spreadsheetml/2006/main";
const REL_NS = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const PKG_REL_NS = "http://schemas.openxmlformats.org/package/2006/relationships";
const WORKSHEET_TYPE = `${REL_NS}/worksheet`;
const HYPERLINK_TYPE = `${REL_NS}/hyperlink`;

export interface FixtureHyperlink {
  ref: string;
  target?: string;
  location?: string;
}

export interface FixtureSheet {
  name: string;
  /** Inner XML of `<sheetData>` */
  data: string;
  state?: "hidden" | "veryHidden";
  merges?: string[];
  hyperlinks?: FixtureHyperlink[];
}

export interface FixtureWorkbook {
  sheets: FixtureSheet[];
  sharedStrings?: string[];
  /** Custom number formats by id */
  numFmts?: Record<number, string>;
  /** numFmtId of each `cellXfs` entry, in style-index order */
  cellXfs?: number[];
  date1904?: boolean;
  /** Write the SpreadsheetML elements with an `x:` prefix */
  prefixed?: boolean;
}

export function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

/**
 * Add a namespace prefix to every SpreadsheetML element of `xml`
 */
function prefixElements(xml: string): string {
  return xml.replace(/<(\/?)([A-Za-z][\w]*)(?=[\s/>])/g, "<$1x:$2");
}

function sheetPart(sheet: FixtureSheet, prefixed: boolean): string {
  const merges = sheet.merges?.length
    ? `<mergeCells count="${sheet.merges.length}">${sheet.merges
        .map(ref => `<mergeCell ref="${ref}"/>`)
        .join("")}</mergeCells>`
    : "";
  const hyperlinks = sheet.hyperlinks?.length
    ? `<hyperlinks>${sheet.hyperlinks
        .map((link, i) => {
          const rid = link.target === undefined ? "" : ` r:id="rIdLink${i + 1}"`;
          const location = link.location === undefined ? "" : ` location="${escapeXml(link.location)}"`;
          return `<hyperlink ref="${link.ref}"${rid}${location}/>`;
        })
        .join("")}</hyperlinks>`
    : "";
  const body = `<sheetData>${sheet.data}</sheetData>${merges}${hyperlinks}`;
  return prefixed
    ? `<?xml version="1.0" encoding="UTF-8"?><x:worksheet xmlns:x="${MAIN_NS}" xmlns:r="${REL_NS}">${prefixElements(body)}</x:worksheet>`
    : `<?xml version="1.0" encoding="UTF-8"?><worksheet xmlns="${MAIN_NS}" xmlns:r="${REL_NS}">${body}</worksheet>`;
}

function sheetRels(sheet: FixtureSheet): string | undefined {
  const links = (sheet.hyperlinks ?? [])
    .map((link, i) =>
      link.target === undefined
        ? ""
        : `<Relationship Id="rIdLink${i + 1}" Type="${HYPERLINK_TYPE}" Target="${escapeXml(link.target)}" TargetMode="External"/>`
    )
    .join("");
  return links ? `<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="${PKG_REL_NS}">${links}</Relationships>` : undefined;
}

export function buildXlsxFiles(workbook: FixtureWorkbook): Record<string, string> {
  const prefixed = workbook.prefixed ?? false;
  const files: Record<string, string> = {};

  const sheetDecls = workbook.sheets
    .map((sheet, i) => {
      const state = sheet.state ? ` state="${sheet.state}"` : "";
      return `<sheet name="${escapeXml(sheet.name)}" sheetId="${i + 1}"${state} r:id="rId${i + 1}"/>`;
    })
    .join("");
  const workbookPr = workbook.date1904 ? `<workbookPr date1904="1"/>` : `<workbookPr/>`;
  const workbookBody = `${workbookPr}<sheets>${sheetDecls}</sheets>`;
  files["xl/workbook.xml"] = prefixed
    ? `<?xml version="1.0" encoding="UTF-8"?><x:workbook xmlns:x="${MAIN_NS}" xmlns:r="${REL_NS}">${prefixElements(workbookBody)}</x:workbook>`
    : `<?xml version="1.0" encoding="UTF-8"?><workbook xmlns="${MAIN_NS}" xmlns:r="${REL_NS}">${workbookBody}</workbook>`;

  files["xl/_rels/workbook.xml.rels"] =
    `<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="${PKG_REL_NS}">` +
    workbook.sheets
      .map((_, i) => `<Relationship Id="rId${i + 1}" Type="${WORKSHEET_TYPE}" Target="worksheets/sheet${i + 1}.xml"/>`)
      .join("") +
    `</Relationships>`;

  workbook.sheets.forEach((sheet, i) => {
    files[`xl/worksheets/sheet${i + 1}.xml`] = sheetPart(sheet, prefixed);
    const rels = sheetRels(sheet);
    if (rels) {
      files[`xl/worksheets/_rels/sheet${i + 1}.xml.rels`] = rels;
    }
  });

  if (workbook.sharedStrings) {
    const items = workbook.sharedStrings.map(s => `<si><t xml:space="preserve">${escapeXml(s)}</t></si>`).join("");
    files["xl/sharedStrings.xml"] =
      `<?xml version="1.0" encoding="UTF-8"?><sst xmlns="${MAIN_NS}" count="${workbook.sharedStrings.length}" uniqueCount="${workbook.sharedStrings.length}">${items}</sst>`;
  }

  if (workbook.cellXfs || workbook.numFmts) {
    const numFmts = Object.entries(workbook.numFmts ?? {})
      .map(([id, code]) => `<numFmt numFmtId="${id}" formatCode="${escapeXml(code)}"/>`)
      .join("");
    const xfs = (workbook.cellXfs ?? [0]).map(id => `<xf numFmtId="${id}" fontId="0" fillId="0" borderId="0" xfId="0"/>`).join("");
    files["xl/styles.xml"] =
      `<?xml version="1.0" encoding="UTF-8"?><styleSheet xmlns="${MAIN_NS}">` +
      (numFmts ? `<numFmts>${numFmts}</numFmts>` : "") +
      `<cellStyleXfs count="1"><xf numFmtId="0" fontId="0" fillId="0" borderId="0"/></cellStyleXfs>` +
      `<cellXfs>${xfs}</cellXfs></styleSheet>`;
  }

  return files;
}

/**
 * Zip raw part texts into an archive
 */
export function zipParts(parts: Record<string, string>, level: 0 | 6 = 6): Uint8Array {
  const zippable: Zippable = {};
  for (const [path, text] of Object.entries(parts)) {
    zippable[path] = strToU8(text);
  }
  return zipSync(zippable, { level });
}

/**
 * Build an in-memory XLSX archive
 */
export function buildXlsx(workbook: FixtureWorkbook, level: 0 | 6 = 6): Uint8Array {
  return zipParts(buildXlsxFiles(workbook), level);
}

/**
 * Writable that keeps everything written to it
 */
export class MemorySink extends Writable {
  private readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    callback();
  }

  get text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}

export function openXlsx(workbook: FixtureWorkbook): Promise<ArchiveReader> {
  return ArchiveReader.open(new BufferSource(buildXlsx(workbook)));
}

/**
 * Feed `text` to a parser in small UTF-8 chunks, so element boundaries fall
 * inside chunks
 */
export async function* byteChunks(text: string, size = 7): AsyncGenerator<Uint8Array> {
  const bytes = strToU8(text);
  for (let i = 0; i < bytes.length; i += size) {
    yield bytes.subarray(i, i + size);
  }
}

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * Logger that records every line it writes
 */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger("debug", {
    write(line: string) {
      const parsed: LogLine = JSON.parse(line);
      lines.push(parsed);
    }
  });
  return { logger, lines };
}

export async function collectAll<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
