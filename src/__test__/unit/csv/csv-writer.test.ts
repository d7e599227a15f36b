import { Writable } from "stream";
import { parse } from "csv-parse/sync";
import { describe, it, expect } from "vitest";
import { CsvWriter, isClosedOutputError } from "../../../csv/csv-writer.js";
import { OutputClosedError } from "../../../errors.js";
import type { CsvDialect, QuotingPolicy } from "../../../types.js";
import { MemorySink } from "../../utils/xlsx-fixture.js";

class FailingSink extends Writable {
  constructor(private readonly code: string) {
    super();
  }

  override _write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    callback(Object.assign(new Error(`write ${this.code}`), { code: this.code }));
  }
}

describe("CsvWriter", () => {
  describe("formatField", () => {
    it("should quote only when needed by default", () => {
      const writer = new CsvWriter(new MemorySink());
      expect(writer.formatField("plain")).toBe("plain");
      expect(writer.formatField("a,b")).toBe('"a,b"');
      expect(writer.formatField('say "hi"')).toBe('"say ""hi"""');
      expect(writer.formatField("x\ny")).toBe('"x\ny"');
      expect(writer.formatField("x\ry")).toBe('"x\ry"');
      expect(writer.formatField("")).toBe("");
    });

    it("should quote against the configured delimiter", () => {
      const writer = new CsvWriter(new MemorySink(), { delimiter: ";" });
      expect(writer.formatField("a,b")).toBe("a,b");
      expect(writer.formatField("a;b")).toBe('"a;b"');
    });

    it("should quote non-numeric fields", () => {
      const writer = new CsvWriter(new MemorySink(), { quoting: "nonnumeric" });
      expect(writer.formatField("12.5")).toBe("12.5");
      expect(writer.formatField("-1e5")).toBe("-1e5");
      expect(writer.formatField("abc")).toBe('"abc"');
      expect(writer.formatField("1,000")).toBe('"1,000"');
      expect(writer.formatField("")).toBe('""');
    });

    it("should quote every field", () => {
      const writer = new CsvWriter(new MemorySink(), { quoting: "all" });
      expect(writer.formatField("1")).toBe('"1"');
      expect(writer.formatField("")).toBe('""');
    });

    it("should never quote", () => {
      const writer = new CsvWriter(new MemorySink(), { quoting: "none" });
      expect(writer.formatField('a,"b"')).toBe('a,"b"');
    });
  });

  describe("writeRow", () => {
    it("should write delimited lines", async () => {
      const sink = new MemorySink();
      const writer = new CsvWriter(sink);
      await writer.writeRow(["a", "b"]);
      await writer.writeRow(["1", "x,y"]);
      await writer.writeRow([]);
      await writer.end();
      expect(sink.text).toBe('a,b\n1,"x,y"\n\n');
      expect(writer.rowsWritten).toBe(3);
    });

    it("should use the configured terminator and delimiter", async () => {
      const sink = new MemorySink();
      const writer = new CsvWriter(sink, { delimiter: "\t", lineTerminator: "\r\n" });
      await writer.writeRow(["a", "b c"]);
      await writer.end();
      expect(sink.text).toBe("a\tb c\r\n");
    });

    it("should separate sheets", async () => {
      const sink = new MemorySink();
      const writer = new CsvWriter(sink);
      await writer.beginSheet();
      await writer.writeRow(["1"]);
      await writer.beginSheet();
      await writer.writeRow(["2"]);
      await writer.end();
      expect(sink.text).toBe("1\n--------\n2\n");
    });

    it("should write nothing between sheets with an empty separator", async () => {
      const sink = new MemorySink();
      const writer = new CsvWriter(sink, { sheetDelimiter: "" });
      await writer.beginSheet();
      await writer.writeRow(["1"]);
      await writer.beginSheet();
      await writer.writeRow(["2"]);
      await writer.end();
      expect(sink.text).toBe("1\n2\n");
    });

    it("should wait for a slow sink to drain", async () => {
      const chunks: string[] = [];
      const sink = new Writable({
        highWaterMark: 4,
        write(chunk: Buffer, _encoding, callback) {
          chunks.push(chunk.toString());
          setImmediate(callback);
        }
      });
      const writer = new CsvWriter(sink);
      for (let i = 0; i < 20; i++) {
        await writer.writeRow([`row-${i}`]);
      }
      await writer.end();
      expect(chunks.join("")).toBe(Array.from({ length: 20 }, (_, i) => `row-${i}\n`).join(""));
    });
  });

  describe("round trip", () => {
    const ROWS = [
      ["a,b", 'say "hi"', "cr\rhere", "lf\nhere", "crlf\r\nhere", "12.5", ""],
      ["plain", "", "-1e5", "x;y", " spaced ", "0", "end"]
    ];

    async function write(rows: string[][], dialect: Partial<CsvDialect>): Promise<string> {
      const sink = new MemorySink();
      const writer = new CsvWriter(sink, dialect);
      for (const row of rows) {
        await writer.writeRow(row);
      }
      await writer.end();
      return sink.text;
    }

    const policies: QuotingPolicy[] = ["minimal", "nonnumeric", "all"];
    for (const quoting of policies) {
      it(`should read back the same fields under ${quoting} quoting`, async () => {
        const records: string[][] = parse(await write(ROWS, { quoting }));
        expect(records).toEqual(ROWS);
      });
    }

    it("should read back the same fields with another delimiter and terminator", async () => {
      const text = await write(ROWS, { delimiter: ";", lineTerminator: "\r\n" });
      const records: string[][] = parse(text, { delimiter: ";" });
      expect(records).toEqual(ROWS);
    });
  });

  describe("closed output", () => {
    it("should report a destroyed sink as closed", async () => {
      const sink = new MemorySink();
      sink.destroy();
      await expect(new CsvWriter(sink).writeRow(["a"])).rejects.toBeInstanceOf(OutputClosedError);
    });

    it("should report a broken pipe as closed", async () => {
      const writer = new CsvWriter(new FailingSink("EPIPE"));
      await expect(writer.writeRow(["a"])).rejects.toBeInstanceOf(OutputClosedError);
      await expect(writer.writeRow(["b"])).rejects.toBeInstanceOf(OutputClosedError);
      expect(writer.rowsWritten).toBe(0);
    });

    it("should pass other write failures through", async () => {
      const writer = new CsvWriter(new FailingSink("ENOSPC"));
      const error: unknown = await writer.writeRow(["a"]).catch(e => e);
      expect(error).not.toBeInstanceOf(OutputClosedError);
      expect(error).toMatchObject({ message: "write ENOSPC", code: "ENOSPC" });
    });
  });

  describe("isClosedOutputError", () => {
    it("should recognize closed-pipe errors", () => {
      expect(isClosedOutputError(new OutputClosedError())).toBe(true);
      expect(isClosedOutputError(Object.assign(new Error("write EPIPE"), { code: "EPIPE" }))).toBe(true);
      expect(isClosedOutputError(Object.assign(new Error("gone"), { code: "ERR_STREAM_DESTROYED" }))).toBe(true);
      expect(isClosedOutputError(new Error("other"))).toBe(false);
      expect(isClosedOutputError("EPIPE")).toBe(false);
    });
  });
});
