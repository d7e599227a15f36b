import type { Writable } from "stream";
import { OutputClosedError } from "../errors.js";
import type { CsvDialect } from "../types.js";

export const DEFAULT_DIALECT: CsvDialect = Object.freeze({
  delimiter: ",",
  lineTerminator: "\n",
  sheetDelimiter: "--------",
  quoting: "minimal"
});

const CLOSED_CODES = new Set(["EPIPE", "ERR_STREAM_DESTROYED", "ERR_STREAM_WRITE_AFTER_END"]);

const PLAIN_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * True for the errors a sink reports once its reader has gone away
 */
export function isClosedOutputError(error: unknown): boolean {
  if (error instanceof OutputClosedError) {
    return true;
  }
  const code = errorCode(error);
  return code !== undefined && CLOSED_CODES.has(code);
}

/**
 * Delimited-text serializer over a writable stream.
 *
 * Every write waits for the sink to accept it, so a slow consumer slows the
 * whole pipeline down instead of growing a buffer. A consumer that goes
 * away surfaces as `OutputClosedError`.
 */
export class CsvWriter {
  readonly dialect: CsvDialect;
  rowsWritten = 0;
  private readonly sink: Writable;
  private failure: unknown;
  private sheets = 0;

  constructor(sink: Writable, dialect: Partial<CsvDialect> = {}) {
    this.sink = sink;
    this.dialect = { ...DEFAULT_DIALECT, ...dialect };
    this.sink.on("error", this.onError);
  }

  private readonly onError = (error: unknown): void => {
    this.failure ??= error;
  };

  formatField(field: string): string {
    const { delimiter, quoting } = this.dialect;
    let quote: boolean;
    switch (quoting) {
      case "all":
        quote = true;
        break;
      case "none":
        quote = false;
        break;
      case "nonnumeric":
        quote = !PLAIN_NUMBER.test(field);
        break;
      default:
        quote = field.includes(delimiter) || /["\r\n]/.test(field);
        break;
    }
    return quote ? `"${field.replace(/"/g, '""')}"` : field;
  }

  formatRow(fields: readonly string[]): string {
    return fields.map(field => this.formatField(field)).join(this.dialect.delimiter) + this.dialect.lineTerminator;
  }

  async writeRow(fields: readonly string[]): Promise<void> {
    await this.write(this.formatRow(fields));
    this.rowsWritten++;
  }

  /**
   * Mark the start of a sheet; from the second sheet on this writes the
   * separator line
   */
  async beginSheet(): Promise<void> {
    if (this.sheets++ > 0) {
      await this.writeSheetSeparator();
    }
  }

  async writeSheetSeparator(): Promise<void> {
    if (this.dialect.sheetDelimiter) {
      await this.write(this.dialect.sheetDelimiter + this.dialect.lineTerminator);
    }
  }

  /**
   * Wait until everything written so far has been handed to the sink. The
   * sink itself is left open; its owner ends it.
   */
  async end(): Promise<void> {
    try {
      this.check();
      if (this.sink.writableNeedDrain) {
        await this.drain();
      }
      this.check();
    } catch (error) {
      throw this.translate(error);
    } finally {
      this.sink.off("error", this.onError);
    }
  }

  private async write(text: string): Promise<void> {
    try {
      this.check();
      if (!this.sink.write(text)) {
        await this.drain();
      }
    } catch (error) {
      throw this.translate(error);
    }
  }

  private check(): void {
    if (this.failure !== undefined) {
      throw this.failure;
    }
    if (this.sink.destroyed || this.sink.writableEnded) {
      throw new OutputClosedError();
    }
  }

  private drain(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        this.sink.off("drain", onDrain);
        this.sink.off("error", onFailure);
        this.sink.off("close", onClose);
      };
      const onDrain = (): void => {
        cleanup();
        resolve();
      };
      const onFailure = (error: unknown): void => {
        cleanup();
        reject(error);
      };
      const onClose = (): void => {
        cleanup();
        reject(new OutputClosedError());
      };
      this.sink.on("drain", onDrain);
      this.sink.on("error", onFailure);
      this.sink.on("close", onClose);
      if (this.sink.closed) {
        cleanup();
        reject(this.failure ?? new OutputClosedError());
      }
    });
  }

  private translate(error: unknown): unknown {
    if (error instanceof OutputClosedError || !isClosedOutputError(error)) {
      return error;
    }
    return new OutputClosedError({ cause: error });
  }
}
