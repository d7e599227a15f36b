/**
 * Random-access ZIP reader.
 *
 * The central directory is read once when the archive is opened; after that
 * entries can be opened in any order and only the requested ones are read and
 * inflated. Entry data is streamed from the source in bounded chunks, so a
 * large worksheet part is never held in memory in full.
 */

import { Inflate } from "fflate";
import { ArchiveCorruptError, EntryMissingError } from "../../errors.js";
import { BinaryReader } from "./binary-reader.js";
import type { ByteSource } from "./byte-source.js";

// ZIP file signatures
const LOCAL_FILE_HEADER_SIG = 0x04034b50;
const CENTRAL_DIR_HEADER_SIG = 0x02014b50;
const END_OF_CENTRAL_DIR_SIG = 0x06054b50;
const ZIP64_END_OF_CENTRAL_DIR_SIG = 0x06064b50;
const ZIP64_END_OF_CENTRAL_DIR_LOCATOR_SIG = 0x07064b50;

// Compression methods
const COMPRESSION_STORED = 0;
const COMPRESSION_DEFLATE = 8;

const EOCD_SIZE = 22;
const MAX_COMMENT_SIZE = 0xffff;
const LOCAL_HEADER_SIZE = 30;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_EOCD_SIZE = 56;

const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Parsed central directory entry
 */
export interface ArchiveEntry {
  /** File path within the archive, without a leading slash */
  path: string;
  isDirectory: boolean;
  isEncrypted: boolean;
  compressionMethod: number;
  compressedSize: number;
  uncompressedSize: number;
  localHeaderOffset: number;
}

export interface ArchiveReaderOptions {
  /** Bytes read from the source per step while streaming an entry */
  chunkSize?: number;
}

function normalizePath(path: string): string {
  return path.startsWith("/") ? path.slice(1) : path;
}

function applyZip64ExtraField(extraField: Uint8Array, entry: ArchiveEntry): void {
  const reader = new BinaryReader(extraField);
  while (reader.remaining >= 4) {
    const signature = reader.readUint16();
    const partSize = reader.readUint16();
    if (signature !== 0x0001) {
      reader.skip(partSize);
      continue;
    }
    // Only the fields saturated in the fixed header are present, in this order
    const end = reader.position + partSize;
    if (entry.uncompressedSize === 0xffffffff && reader.position + 8 <= end) {
      entry.uncompressedSize = reader.readUint64();
    }
    if (entry.compressedSize === 0xffffffff && reader.position + 8 <= end) {
      entry.compressedSize = reader.readUint64();
    }
    if (entry.localHeaderOffset === 0xffffffff && reader.position + 8 <= end) {
      entry.localHeaderOffset = reader.readUint64();
    }
    return;
  }
}

/**
 * Search backwards for the End of Central Directory record.
 * Returns the offset inside `tail`, or -1.
 */
function findEndOfCentralDir(tail: Uint8Array): number {
  const view = new DataView(tail.buffer, tail.byteOffset, tail.byteLength);
  for (let i = tail.length - EOCD_SIZE; i >= 0; i--) {
    if (view.getUint32(i, true) === END_OF_CENTRAL_DIR_SIG) {
      return i;
    }
  }
  return -1;
}

function parseCentralDirectory(data: Uint8Array, totalEntries: number): ArchiveEntry[] {
  const entries: ArchiveEntry[] = [];
  const reader = new BinaryReader(data);

  for (let i = 0; i < totalEntries; i++) {
    if (reader.remaining < 46) {
      throw new ArchiveCorruptError(`Central directory is truncated at entry ${i}`);
    }
    const sig = reader.readUint32();
    if (sig !== CENTRAL_DIR_HEADER_SIG) {
      throw new ArchiveCorruptError(`Invalid central directory header signature at entry ${i}`);
    }

    reader.skip(2); // version made by
    reader.skip(2); // version needed
    const flags = reader.readUint16();
    const compressionMethod = reader.readUint16();
    reader.skip(4); // last mod time + date
    reader.skip(4); // crc32
    const compressedSize = reader.readUint32();
    const uncompressedSize = reader.readUint32();
    const fileNameLength = reader.readUint16();
    const extraFieldLength = reader.readUint16();
    const commentLength = reader.readUint16();
    reader.skip(2); // disk number start
    reader.skip(2); // internal attributes
    const externalAttributes = reader.readUint32();
    const localHeaderOffset = reader.readUint32();

    if (reader.remaining < fileNameLength + extraFieldLength + commentLength) {
      throw new ArchiveCorruptError(`Central directory is truncated at entry ${i}`);
    }

    // Bit 11 marks UTF-8 names
    const fileName = reader.readString(fileNameLength, (flags & 0x800) !== 0);
    const extraField = reader.readBytes(extraFieldLength);
    reader.skip(commentLength);

    const entry: ArchiveEntry = {
      path: normalizePath(fileName),
      isDirectory: fileName.endsWith("/") || (externalAttributes & 0x10) !== 0,
      isEncrypted: (flags & 0x01) !== 0,
      compressionMethod,
      compressedSize,
      uncompressedSize,
      localHeaderOffset
    };
    if (extraFieldLength > 0) {
      applyZip64ExtraField(extraField, entry);
    }
    entries.push(entry);
  }

  return entries;
}

export class ArchiveReader {
  private source: ByteSource;
  private entryMap: Map<string, ArchiveEntry>;
  private chunkSize: number;

  private constructor(source: ByteSource, entries: ArchiveEntry[], chunkSize: number) {
    this.source = source;
    this.entryMap = new Map(entries.map(e => [e.path, e]));
    this.chunkSize = chunkSize;
  }

  /**
   * Read the central directory of `source`. The reader takes ownership of the
   * source: it is closed by {@link ArchiveReader.close}, or right away if the
   * archive turns out to be invalid.
   */
  static async open(source: ByteSource, options: ArchiveReaderOptions = {}): Promise<ArchiveReader> {
    try {
      const entries = await ArchiveReader.readDirectory(source);
      return new ArchiveReader(source, entries, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    } catch (error) {
      await source.close();
      throw error;
    }
  }

  private static async readDirectory(source: ByteSource): Promise<ArchiveEntry[]> {
    if (source.size < EOCD_SIZE) {
      throw new ArchiveCorruptError("Input is too small to be a ZIP archive");
    }

    const tailLength = Math.min(source.size, EOCD_SIZE + MAX_COMMENT_SIZE);
    const tailStart = source.size - tailLength;
    const tail = await source.read(tailStart, tailLength);
    const eocdOffset = findEndOfCentralDir(tail);
    if (eocdOffset === -1) {
      throw new ArchiveCorruptError("End of central directory not found; input is not a ZIP archive");
    }

    // Offset  Size  Description
    // 0       4     EOCD signature (0x06054b50)
    // 4       2     Number of this disk
    // 6       2     Disk where central directory starts
    // 8       2     Number of central directory records on this disk
    // 10      2     Total number of central directory records
    // 12      4     Size of central directory (bytes)
    // 16      4     Offset of start of central directory
    // 20      2     Comment length
    const eocd = new BinaryReader(tail, eocdOffset + 10);
    let totalEntries = eocd.readUint16();
    let directorySize = eocd.readUint32();
    let directoryOffset = eocd.readUint32();

    const locatorOffset = eocdOffset - ZIP64_LOCATOR_SIZE;
    if (locatorOffset >= 0 && new BinaryReader(tail, locatorOffset).readUint32() === ZIP64_END_OF_CENTRAL_DIR_LOCATOR_SIG) {
      const locator = new BinaryReader(tail, locatorOffset + 8);
      const zip64EocdOffset = locator.readUint64();
      const record = new BinaryReader(await source.read(zip64EocdOffset, ZIP64_EOCD_SIZE));
      if (record.remaining === ZIP64_EOCD_SIZE && record.readUint32() === ZIP64_END_OF_CENTRAL_DIR_SIG) {
        record.skip(8 + 2 + 2 + 4 + 4 + 8); // size, versions, disks, entries on this disk
        totalEntries = record.readUint64();
        directorySize = record.readUint64();
        directoryOffset = record.readUint64();
      }
    }

    if (directoryOffset + directorySize > tailStart + eocdOffset) {
      throw new ArchiveCorruptError("Central directory lies outside the archive");
    }

    const directory = await source.read(directoryOffset, directorySize);
    return parseCentralDirectory(directory, totalEntries);
  }

  /**
   * All file entries, in central directory order
   */
  entries(): ArchiveEntry[] {
    return [...this.entryMap.values()].filter(e => !e.isDirectory);
  }

  hasEntry(path: string): boolean {
    return this.entryMap.has(normalizePath(path));
  }

  getEntry(path: string): ArchiveEntry | undefined {
    return this.entryMap.get(normalizePath(path));
  }

  /**
   * Stream the decompressed bytes of one entry.
   *
   * Nothing is read until iteration starts. Breaking out of the loop early
   * releases the inflater.
   */
  openEntry(path: string): AsyncIterable<Uint8Array> {
    const entry = this.getEntry(path);
    if (!entry) {
      throw new EntryMissingError(normalizePath(path));
    }
    if (entry.isEncrypted) {
      throw new ArchiveCorruptError("Entry is encrypted and cannot be extracted", { part: entry.path });
    }
    if (entry.compressionMethod !== COMPRESSION_STORED && entry.compressionMethod !== COMPRESSION_DEFLATE) {
      throw new ArchiveCorruptError(`Unsupported compression method ${entry.compressionMethod}`, {
        part: entry.path
      });
    }
    return this.streamEntry(entry);
  }

  /**
   * Read an entry in full and decode it as UTF-8. Meant for small parts such
   * as relationship lists.
   */
  async readText(path: string): Promise<string> {
    const decoder = new TextDecoder("utf-8");
    let text = "";
    for await (const chunk of this.openEntry(path)) {
      text += decoder.decode(chunk, { stream: true });
    }
    return text + decoder.decode();
  }

  async close(): Promise<void> {
    await this.source.close();
  }

  private async *streamEntry(entry: ArchiveEntry): AsyncGenerator<Uint8Array> {
    const header = await this.source.read(entry.localHeaderOffset, LOCAL_HEADER_SIZE);
    if (header.length < LOCAL_HEADER_SIZE) {
      throw new ArchiveCorruptError("Local file header is truncated", { part: entry.path });
    }
    const reader = new BinaryReader(header);
    if (reader.readUint32() !== LOCAL_FILE_HEADER_SIG) {
      throw new ArchiveCorruptError("Invalid local file header signature", { part: entry.path });
    }
    reader.skip(22); // version, flags, method, time, date, crc32, sizes
    const fileNameLength = reader.readUint16();
    const extraFieldLength = reader.readUint16();

    let position = entry.localHeaderOffset + LOCAL_HEADER_SIZE + fileNameLength + extraFieldLength;
    const end = position + entry.compressedSize;
    if (end > this.source.size) {
      throw new ArchiveCorruptError("Entry data extends past the end of the archive", { part: entry.path });
    }

    const pending: Uint8Array[] = [];
    const inflater = entry.compressionMethod === COMPRESSION_DEFLATE ? new Inflate() : undefined;
    if (inflater) {
      inflater.ondata = chunk => {
        pending.push(chunk);
      };
    }

    while (position < end) {
      const length = Math.min(this.chunkSize, end - position);
      const chunk = await this.source.read(position, length);
      if (chunk.length === 0) {
        throw new ArchiveCorruptError("Unexpected end of archive", { part: entry.path });
      }
      position += chunk.length;

      if (!inflater) {
        yield chunk;
        continue;
      }
      try {
        inflater.push(chunk, position >= end);
      } catch (error) {
        throw new ArchiveCorruptError("Compressed data is corrupt", { part: entry.path }, { cause: error });
      }
      while (pending.length) {
        const out = pending.shift();
        if (out && out.length) {
          yield out;
        }
      }
    }
  }
}
