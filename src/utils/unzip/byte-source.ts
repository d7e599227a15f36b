import type { FileHandle } from "fs/promises";
import { open } from "fs/promises";

/**
 * Random-access input for the archive reader
 */
export interface ByteSource {
  readonly size: number;
  /** Read up to `length` bytes at `position`; shorter only at end of input */
  read(position: number, length: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

/**
 * A seekable file, read by position through one handle
 */
export class FileSource implements ByteSource {
  readonly size: number;
  private handle: FileHandle;
  private closed = false;

  private constructor(handle: FileHandle, size: number) {
    this.handle = handle;
    this.size = size;
  }

  static async open(path: string): Promise<FileSource> {
    const handle = await open(path, "r");
    try {
      const stats = await handle.stat();
      return new FileSource(handle, stats.size);
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  async read(position: number, length: number): Promise<Uint8Array> {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await this.handle.read(buffer, 0, length, position);
    return buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }
}

/**
 * A fully buffered input, e.g. everything read from standard input
 */
export class BufferSource implements ByteSource {
  readonly size: number;
  private data: Uint8Array;

  constructor(data: Uint8Array) {
    this.data = data;
    this.size = data.length;
  }

  async read(position: number, length: number): Promise<Uint8Array> {
    return this.data.subarray(position, Math.min(position + length, this.size));
  }

  async close(): Promise<void> {}
}
