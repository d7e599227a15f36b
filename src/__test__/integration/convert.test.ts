import { Writable } from "stream";
import { describe, it, expect } from "vitest";
import { convert } from "../../csv/convert.js";
import {
  ArchiveCorruptError,
  EntryMissingError,
  FormatError,
  MalformedSheetXmlError,
  SelectionError,
  UnknownCellTypeError
} from "../../errors.js";
import type { ConvertOptions } from "../../options.js";
import { MemorySink, buildXlsx, buildXlsxFiles, captureLogger, escapeXml, zipParts } from "../utils/xlsx-fixture.js";
import type { FixtureSheet, FixtureWorkbook } from "../utils/xlsx-fixture.js";

function inline(ref: string, text: string): string {
  return `<c r="${ref}" t="inlineStr"><is><t>${escapeXml(text)}</t></is></c>`;
}

function num(ref: string, value: string, style?: number): string {
  return `<c r="${ref}"${style === undefined ? "" : ` s="${style}"`}><v>${value}</v></c>`;
}

const WORKBOOK: FixtureWorkbook = {
  sharedStrings: ["Name", "Amount", "Date", "Widget", "has, comma"],
  numFmts: { 164: "yyyy-mm-dd" },
  cellXfs: [0, 14, 2, 164],
  sheets: [
    {
      name: "Data",
      data:
        `<row r="1"><c r="A1" t="s"><v>0</v></c><c r="B1" t="s"><v>1</v></c><c r="C1" t="s"><v>2</v></c></row>` +
        `<row r="2"><c r="A2" t="s"><v>3</v></c>${num("B2", "12.5", 2)}${num("C2", "45000", 1)}</row>` +
        `<row r="4"><c r="A4" t="s"><v>4</v></c>${num("B4", "7")}${num("C4", "45000.5", 3)}</row>`
    },
    { name: "Notes", state: "hidden", data: `<row r="1">${inline("A1", "secret")}</row>` },
    { name: "Extra", data: `<row r="1">${inline("A1", "x")}<c r="B1" t="b"><v>1</v></c></row>` }
  ]
};

const DATA_CSV = "Name,Amount,Date\nWidget,12.5,3/15/23\n,,\n" + '"has, comma",7,2023-03-15\n';

async function run(
  workbook: FixtureWorkbook,
  options: ConvertOptions = {}
): Promise<{ text: string; result: Awaited<ReturnType<typeof convert>> }> {
  const sink = new MemorySink();
  const result = await convert(buildXlsx(workbook), sink, options);
  return { text: sink.text, result };
}

function single(sheet: FixtureSheet): FixtureWorkbook {
  return { sheets: [sheet] };
}

/** Accepts the first `accepted` writes, then fails like a pipe whose reader has gone */
class FailingSink extends Writable {
  private writes = 0;
  private readonly chunks: string[] = [];

  constructor(private readonly accepted = 0) {
    super();
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (this.writes++ < this.accepted) {
      this.chunks.push(chunk.toString());
      callback();
      return;
    }
    callback(Object.assign(new Error("write EPIPE"), { code: "EPIPE" }));
  }

  get text(): string {
    return this.chunks.join("");
  }
}

describe("convert", () => {
  describe("sheets", () => {
    it("should convert every visible sheet with separators", async () => {
      const { text, result } = await run(WORKBOOK);
      expect(text).toBe(DATA_CSV + "--------\nx,true\n");
      expect(result).toEqual({ status: "complete", sheets: ["Data", "Extra"], rows: 5 });
    });

    it("should read stored archives too", async () => {
      const sink = new MemorySink();
      await convert(buildXlsx(WORKBOOK, 0), sink, { sheetNames: ["Data"] });
      expect(sink.text).toBe(DATA_CSV);
    });

    it("should include hidden sheets with all", async () => {
      const { text } = await run(WORKBOOK, { all: true, sheetDelimiter: "" });
      expect(text).toBe(DATA_CSV + "secret\nx,true\n");
    });

    it("should convert named sheets in the order given", async () => {
      const { text, result } = await run(WORKBOOK, { sheetNames: ["Extra", "Notes"], sheetDelimiter: "==" });
      expect(text).toBe("x,true\n==\nsecret\n");
      expect(result.sheets).toEqual(["Extra", "Notes"]);
    });

    it("should select sheets by number and pattern", async () => {
      expect((await run(WORKBOOK, { sheetIds: [3] })).text).toBe("x,true\n");
      expect((await run(WORKBOOK, { includeSheetPatterns: ["E*"] })).text).toBe("x,true\n");
      expect((await run(WORKBOOK, { excludeSheetPatterns: ["D*"], excludeHiddenSheets: true })).text).toBe("x,true\n");
    });

    it("should fail with empty output for an unknown sheet name", async () => {
      const sink = new MemorySink();
      await expect(convert(buildXlsx(WORKBOOK), sink, { sheetNames: ["Missing"] })).rejects.toBeInstanceOf(
        SelectionError
      );
      expect(sink.text).toBe("");
    });

    it("should write nothing for an empty selection", async () => {
      const { text, result } = await run(WORKBOOK, { includeSheetPatterns: ["Nothing*"] });
      expect(text).toBe("");
      expect(result).toEqual({ status: "complete", sheets: [], rows: 0 });
    });

    it("should accept prefixed SpreadsheetML", async () => {
      const { text } = await run({ ...WORKBOOK, prefixed: true }, { sheetNames: ["Data"] });
      expect(text).toBe(DATA_CSV);
    });

    it("should log the selection", async () => {
      const { logger, lines } = captureLogger();
      await run(WORKBOOK, { logger });
      expect(lines.map(line => line.msg)).toContain("Selected 2 of 3 sheets");
    });
  });

  describe("values", () => {
    it("should apply date overrides in either date system", async () => {
      const options: ConvertOptions = { sheetNames: ["Data"], dateFormat: "YYYY-MM-DD" };
      expect((await run(WORKBOOK, options)).text).toBe(
        "Name,Amount,Date\nWidget,12.5,2023-03-15\n,,\n" + '"has, comma",7,2023-03-15\n'
      );
      expect((await run({ ...WORKBOOK, date1904: true }, options)).text).toBe(
        "Name,Amount,Date\nWidget,12.5,2027-03-16\n,,\n" + '"has, comma",7,2027-03-16\n'
      );
    });

    it("should leave ignored formats raw", async () => {
      const { text } = await run(WORKBOOK, { sheetNames: ["Data"], ignoreFormats: ["date"] });
      expect(text).toBe("Name,Amount,Date\nWidget,12.5,45000\n,,\n" + '"has, comma",7,45000.5\n');
    });

    it("should format floats on request", async () => {
      const workbook = single({ name: "N", data: `<row r="1">${num("A1", "1.5E-7")}${num("B1", "3.14159")}${num("C1", "42")}</row>` });
      expect((await run(workbook)).text).toBe("1.5E-7,3.14159,42\n");
      expect((await run(workbook, { sciFloat: true })).text).toBe("0.00000015,3.14159,42\n");
      expect((await run(workbook, { floatFormat: "%.2f" })).text).toBe("0.00,3.14,42\n");
      expect((await run(workbook, { floatFormat: "%.2f", sciFloat: true })).text).toBe("0.00000015,3.14,42\n");
    });

    it("should read shared strings from the part the workbook relates", async () => {
      const files = buildXlsxFiles({
        sharedStrings: ["hello"],
        sheets: [{ name: "S", data: `<row r="1"><c r="A1" t="s"><v>0</v></c></row>` }]
      });
      files["xl/text/strings.xml"] = files["xl/sharedStrings.xml"];
      delete files["xl/sharedStrings.xml"];
      files["xl/_rels/workbook.xml.rels"] = files["xl/_rels/workbook.xml.rels"].replace(
        "</Relationships>",
        `<Relationship Id="rIdText" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/sharedStrings" Target="text/strings.xml"/></Relationships>`
      );
      const sink = new MemorySink();
      await convert(zipParts(files), sink);
      expect(sink.text).toBe("hello\n");
    });

    it("should report a shared string index with no table", async () => {
      const workbook = single({ name: "S", data: `<row r="1"><c r="A1" t="s"><v>0</v></c></row>` });
      const error: unknown = await run(workbook).catch(e => e);
      expect(error).toBeInstanceOf(FormatError);
      expect(error).toMatchObject({
        message: 'Shared string index "0" is invalid (table has 0 entries) (sheet "S", cell A1)'
      });
    });

    it("should fail on unknown cell types only in strict mode", async () => {
      const workbook = single({ name: "U", data: `<row r="1"><c r="A1" t="q"><v>raw</v></c></row>` });
      expect((await run(workbook)).text).toBe("raw\n");
      await expect(run(workbook, { strict: true })).rejects.toBeInstanceOf(UnknownCellTypeError);
    });
  });

  describe("text", () => {
    const TEXT = single({
      name: "T",
      data: `<row r="1">${inline("A1", 'say "hi"')}${inline("B1", "a,b")}${num("C1", "12")}${inline("D1", "multi\nline")}</row>`
    });

    it("should quote fields that need it", async () => {
      expect((await run(TEXT)).text).toBe('"say ""hi""","a,b",12,"multi\nline"\n');
    });

    it("should honour every quoting policy", async () => {
      expect((await run(TEXT, { quoting: "all" })).text).toBe('"say ""hi""","a,b","12","multi\nline"\n');
      expect((await run(TEXT, { quoting: "nonnumeric" })).text).toBe('"say ""hi""","a,b",12,"multi\nline"\n');
      expect((await run(TEXT, { quoting: "none" })).text).toBe('say "hi",a,b,12,multi\nline\n');
    });

    it("should flatten or escape line breaks", async () => {
      expect((await run(TEXT, { noLineBreaks: true })).text).toBe('"say ""hi""","a,b",12,multi line\n');
      expect((await run(TEXT, { escape: true })).text).toBe('"say ""hi""","a,b",12,multi\\nline\n');
      expect((await run(TEXT, { escape: true, quoting: "none" })).text).toBe('say \\"hi\\",a\\,b,12,multi\\nline\n');
    });

    it("should use the configured delimiter and terminator", async () => {
      expect((await run(TEXT, { delimiter: ";", lineTerminator: "\r\n", noLineBreaks: true })).text).toBe(
        '"say ""hi""";a,b;12;multi line\r\n'
      );
    });
  });

  describe("rows", () => {
    const SPARSE = single({
      name: "R",
      data:
        `<row r="1">${inline("A1", "a")}<c r="C1"/></row>` +
        `<row r="3" hidden="1">${inline("A3", "hidden")}</row>` +
        `<row r="5">${inline("B5", "b")}</row>`
    });

    it("should emit every row up to the last one", async () => {
      expect((await run(SPARSE)).text).toBe("a,,\n,,\n,,\n,b,\n");
      expect((await run(SPARSE, { includeHiddenRows: true })).text).toBe("a,,\n,,\nhidden,,\n,,\n,b,\n");
    });

    it("should skip empty rows and trailing columns", async () => {
      const options: ConvertOptions = { skipEmptyRows: true, skipTrailingEmptyColumns: true };
      expect((await run(SPARSE, options)).text).toBe("a\n,b\n");
    });

    it("should fill merged cells on request", async () => {
      const workbook = single({
        name: "M",
        data: `<row r="1">${inline("A1", "Region")}${num("C1", "1")}</row><row r="2">${num("C2", "2")}</row>`,
        merges: ["A1:B3"]
      });
      expect((await run(workbook)).text).toBe("Region,,1\n,,2\n");
      expect((await run(workbook, { mergeCells: true })).text).toBe("Region,Region,1\nRegion,Region,2\nRegion,Region,\n");
    });

    it("should render hyperlinks on request", async () => {
      const workbook = single({
        name: "L",
        data: `<row r="1">${inline("A1", "Home")}${inline("B1", "plain")}</row>`,
        hyperlinks: [
          { ref: "A1", target: "https://example.com/" },
          { ref: "C1", location: "L!A1" }
        ]
      });
      expect((await run(workbook)).text).toBe("Home,plain\n");
      expect((await run(workbook, { hyperlinks: true })).text).toBe("Home (https://example.com/),plain,#L!A1\n");
    });
  });

  describe("failures", () => {
    it("should stop quietly when the output is closed", async () => {
      const result = await convert(buildXlsx(WORKBOOK), new FailingSink());
      expect(result).toEqual({ status: "closed", sheets: [], rows: 0 });
    });

    it("should stop quietly when the output closes partway through a sheet", async () => {
      const sink = new FailingSink(2);
      const result = await convert(buildXlsx(WORKBOOK), sink);
      expect(result).toEqual({ status: "closed", sheets: [], rows: 2 });
      expect(sink.text).toBe("Name,Amount,Date\nWidget,12.5,3/15/23\n");
    });

    it("should count finished sheets when the output closes in a later one", async () => {
      const sink = new FailingSink(5);
      const result = await convert(buildXlsx(WORKBOOK), sink);
      expect(result).toEqual({ status: "closed", sheets: ["Data"], rows: 4 });
      expect(sink.text).toBe(DATA_CSV + "--------\n");
    });

    it("should stop quietly on an already destroyed sink", async () => {
      const sink = new MemorySink();
      sink.destroy();
      const result = await convert(buildXlsx(WORKBOOK), sink);
      expect(result.status).toBe("closed");
    });

    it("should fail with empty output when a selected sheet part is missing", async () => {
      const files = buildXlsxFiles(WORKBOOK);
      delete files["xl/worksheets/sheet3.xml"];
      const sink = new MemorySink();
      const error: unknown = await convert(zipParts(files), sink).catch(e => e);
      expect(error).toBeInstanceOf(EntryMissingError);
      expect(error).toMatchObject({
        message: 'Part not found in archive: xl/worksheets/sheet3.xml (sheet "Extra")',
        path: "xl/worksheets/sheet3.xml"
      });
      expect(sink.text).toBe("");
    });

    it("should keep rows written before a failing sheet", async () => {
      const workbook: FixtureWorkbook = {
        sheets: [
          { name: "Good", data: `<row r="1">${inline("A1", "g")}</row>` },
          { name: "Bad", data: `<row r="2"/><row r="1"/>` }
        ]
      };
      const sink = new MemorySink();
      const error: unknown = await convert(buildXlsx(workbook), sink).catch(e => e);
      expect(error).toBeInstanceOf(MalformedSheetXmlError);
      expect(error).toMatchObject({ message: 'Row 1 is out of order (sheet "Bad")' });
      expect(sink.text).toBe("g\n--------\n");
    });

    it("should reject input that is not a workbook", async () => {
      const sink = new MemorySink();
      await expect(convert(new TextEncoder().encode("a,b\n1,2\n".repeat(4)), sink)).rejects.toBeInstanceOf(
        ArchiveCorruptError
      );
    });
  });
});
