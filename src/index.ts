// Export conversion entry points
export { convert, convertFile } from "./csv/convert.js";
export { CsvWriter, DEFAULT_DIALECT, isClosedOutputError } from "./csv/csv-writer.js";
export { assembleRows } from "./csv/row-assembler.js";
export type { RowAssemblerOptions } from "./csv/row-assembler.js";
export { createValueFormatter, escapeText, flattenLineBreaks } from "./csv/value-formatter.js";
export type { TextOptions, ValueFormatter, ValueFormatterContext } from "./csv/value-formatter.js";

// Export streaming readers
export { loadCatalog, loadRelationships, resolveTarget } from "./stream/xlsx/catalog.js";
export type { Relationship } from "./stream/xlsx/catalog.js";
export { SharedStringTable, loadSharedStrings } from "./stream/xlsx/shared-strings.js";
export { StyleTable, loadStyles } from "./stream/xlsx/styles.js";
export type { CellStyle } from "./stream/xlsx/styles.js";
export { scanSheetMetadata } from "./stream/xlsx/sheet-metadata.js";
export { selectSheets } from "./stream/xlsx/sheet-selector.js";
export { parseWorksheet } from "./stream/xlsx/worksheet-reader.js";
export type { WorksheetContext } from "./stream/xlsx/worksheet-reader.js";

// Export archive access
export { ArchiveReader } from "./utils/unzip/archive-reader.js";
export type { ArchiveEntry, ArchiveReaderOptions } from "./utils/unzip/archive-reader.js";
export { BufferSource, FileSource } from "./utils/unzip/byte-source.js";
export type { ByteSource } from "./utils/unzip/byte-source.js";

// Export configuration and logging
export { ConvertOptionsSchema, resolveOptions, validateOptions } from "./options.js";
export type { CompleteOptions, ConvertOptions, ResolvedOptions } from "./options.js";
export { createLogger, silentLogger } from "./logger.js";

// Export errors and types
export * from "./errors.js";
export type * from "./types.js";
