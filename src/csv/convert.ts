import { createWriteStream } from "fs";
import type { Writable } from "stream";
import { buffer } from "stream/consumers";
import { finished } from "stream/promises";
import { EntryMissingError, withSheet } from "../errors.js";
import { resolveOptions } from "../options.js";
import type { ConvertOptions, ResolvedOptions } from "../options.js";
import { loadCatalog } from "../stream/xlsx/catalog.js";
import { SharedStringTable, loadSharedStrings } from "../stream/xlsx/shared-strings.js";
import { scanSheetMetadata } from "../stream/xlsx/sheet-metadata.js";
import { selectSheets } from "../stream/xlsx/sheet-selector.js";
import { StyleTable, loadStyles } from "../stream/xlsx/styles.js";
import { parseWorksheet } from "../stream/xlsx/worksheet-reader.js";
import type { ConvertResult, DateSystem, SheetDescriptor } from "../types.js";
import { ArchiveReader } from "../utils/unzip/archive-reader.js";
import { BufferSource, FileSource } from "../utils/unzip/byte-source.js";
import type { ByteSource } from "../utils/unzip/byte-source.js";
import { CsvWriter, isClosedOutputError } from "./csv-writer.js";
import { assembleRows } from "./row-assembler.js";
import { createValueFormatter } from "./value-formatter.js";

interface WorkbookTables {
  sharedStrings: SharedStringTable;
  styles: StyleTable;
  dateSystem: DateSystem;
}

async function convertSheet(
  archive: ArchiveReader,
  sheet: SheetDescriptor,
  tables: WorkbookTables,
  writer: CsvWriter,
  options: ResolvedOptions
): Promise<void> {
  const { rows, dialect, logger } = options;
  const metadata = await scanSheetMetadata(archive, sheet.path, {
    merges: rows.mergeCells,
    hyperlinks: options.hyperlinks
  });
  const formatter = createValueFormatter({
    ...tables,
    overrides: options.formats,
    text: {
      noLineBreaks: options.noLineBreaks,
      escape: options.escape,
      delimiter: dialect.delimiter,
      quoting: dialect.quoting
    },
    hyperlinks: metadata.hyperlinks
  });

  const events = parseWorksheet(archive.openEntry(sheet.path), {
    sheet: sheet.name,
    strict: options.strict,
    logger
  });
  const assembled = assembleRows(events, {
    ...rows,
    render: event => formatter.format(event),
    merges: metadata.merges,
    placeholders: formatter.placeholders
  });

  for await (const row of assembled) {
    await writer.writeRow(row);
  }
}

/**
 * Convert the selected sheets of a workbook to delimited text on `sink`.
 *
 * Sheets are streamed one at a time; rows are written as soon as they are
 * complete. Sheet selection is resolved, and every selected sheet part
 * located, before anything is written, so an unknown sheet name or a missing
 * part fails with empty output. A failure while reading a later sheet leaves
 * the rows already written in place.
 *
 * A sink whose reader goes away (a closed pipe) ends the run early with
 * status `closed`; this is not an error. The sink is not ended.
 */
export async function convert(
  source: ByteSource | Uint8Array,
  sink: Writable,
  options: ConvertOptions = {}
): Promise<ConvertResult> {
  const byteSource = source instanceof Uint8Array ? new BufferSource(source) : source;

  let resolved: ResolvedOptions;
  try {
    resolved = resolveOptions(options);
  } catch (error) {
    await byteSource.close();
    throw error;
  }
  const { logger } = resolved;

  const archive = await ArchiveReader.open(byteSource);
  const written: string[] = [];
  let writer: CsvWriter | undefined;

  try {
    const catalog = await loadCatalog(archive);
    const selected = selectSheets(catalog, resolved.criteria);
    logger.debug(
      { sheets: selected.map(sheet => sheet.name), dateSystem: catalog.dateSystem },
      "Selected %d of %d sheets",
      selected.length,
      catalog.sheets.length
    );

    const missing = selected.find(sheet => !archive.hasEntry(sheet.path));
    if (missing) {
      throw new EntryMissingError(missing.path, { sheet: missing.name });
    }

    const { sharedStringsPath, stylesPath } = catalog;
    const tables: WorkbookTables = {
      sharedStrings: archive.hasEntry(sharedStringsPath)
        ? await loadSharedStrings(archive.openEntry(sharedStringsPath))
        : new SharedStringTable(),
      styles: archive.hasEntry(stylesPath) ? await loadStyles(archive.openEntry(stylesPath)) : new StyleTable(),
      dateSystem: catalog.dateSystem
    };

    writer = new CsvWriter(sink, resolved.dialect);
    for (const sheet of selected) {
      logger.debug({ sheet: sheet.name, part: sheet.path }, "Converting sheet");
      try {
        await writer.beginSheet();
        await convertSheet(archive, sheet, tables, writer, resolved);
      } catch (error) {
        throw withSheet(error, sheet.name);
      }
      written.push(sheet.name);
    }
    await writer.end();

    logger.debug({ sheets: written.length, rows: writer.rowsWritten }, "Conversion complete");
    return { status: "complete", sheets: written, rows: writer.rowsWritten };
  } catch (error) {
    if (isClosedOutputError(error)) {
      const rows = writer?.rowsWritten ?? 0;
      logger.debug({ rows }, "Output closed by consumer; stopping");
      return { status: "closed", sheets: written, rows };
    }
    throw error;
  } finally {
    await archive.close();
  }
}

/**
 * File-level entry point: `-` reads standard input (buffered in full, since
 * the archive directory sits at its end) or writes standard output.
 */
export async function convertFile(
  inputPath: string,
  outputPath: string | undefined,
  options: ConvertOptions = {}
): Promise<ConvertResult> {
  const source: ByteSource =
    inputPath === "-" ? new BufferSource(await buffer(process.stdin)) : await FileSource.open(inputPath);

  if (outputPath === undefined || outputPath === "-") {
    return convert(source, process.stdout, options);
  }

  const sink = createWriteStream(outputPath);
  try {
    const result = await convert(source, sink, options);
    if (!sink.destroyed) {
      sink.end();
      await finished(sink);
    }
    return result;
  } catch (error) {
    sink.destroy();
    throw error;
  }
}
