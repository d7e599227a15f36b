import { describe, it, expect } from "vitest";
import { assembleRows } from "../../../csv/row-assembler.js";
import type { RowAssemblerOptions } from "../../../csv/row-assembler.js";
import type { CellEvent, MergeRegion, SheetEvent } from "../../../types.js";
import { decodeCell, decodeRange } from "../../../utils/cell-address.js";
import { collectAll } from "../../utils/xlsx-fixture.js";

function row(n: number, hidden = false): SheetEvent {
  return { type: "row", row: n - 1, hidden };
}

function cell(address: string, raw: string): SheetEvent {
  const ref = decodeCell(address);
  if (!ref) {
    throw new Error(`bad address ${address}`);
  }
  return { type: "cell", ref, kind: raw === "" ? "empty" : "string", raw };
}

function region(range: string): MergeRegion {
  const decoded = decodeRange(range);
  if (!decoded) {
    throw new Error(`bad range ${range}`);
  }
  return decoded;
}

async function* stream(events: SheetEvent[]): AsyncGenerator<SheetEvent> {
  yield* events;
}

function assemble(events: SheetEvent[], options: Partial<RowAssemblerOptions> = {}): Promise<string[][]> {
  return collectAll(assembleRows(stream(events), { render: (event: CellEvent) => event.raw, ...options }));
}

describe("assembleRows", () => {
  it("should fill gaps between cells and rows", async () => {
    const rows = await assemble([row(1), cell("A1", "a"), cell("C1", "c"), row(3), cell("B3", "b")]);
    expect(rows).toEqual([
      ["a", "", "c"],
      ["", "", ""],
      ["", "b", ""]
    ]);
  });

  it("should size rows by the widest column seen so far", async () => {
    const rows = await assemble([row(1), cell("A1", "a"), row(2), cell("A2", "x"), cell("C2", "z")]);
    expect(rows).toEqual([["a"], ["x", "", "z"]]);
  });

  it("should start rows for cells without a row boundary", async () => {
    const rows = await assemble([cell("A1", "a"), cell("B2", "b")]);
    expect(rows).toEqual([["a"], ["", "b"]]);
  });

  it("should emit nothing for an empty sheet", async () => {
    expect(await assemble([])).toEqual([]);
  });

  it("should skip empty rows", async () => {
    const rows = await assemble([row(1), cell("A1", "a"), cell("B1", ""), row(2), cell("A2", ""), row(4), cell("B4", "b")], {
      skipEmptyRows: true
    });
    expect(rows).toEqual([
      ["a", ""],
      ["", "b"]
    ]);
  });

  it("should trim trailing empty columns", async () => {
    const events = [row(1), cell("A1", "a"), cell("C1", ""), row(2), cell("B2", "b")];
    expect(await assemble(events)).toEqual([
      ["a", "", ""],
      ["", "b", ""]
    ]);
    expect(await assemble(events, { skipTrailingEmptyColumns: true })).toEqual([["a"], ["", "b"]]);
  });

  it("should let a repeated column overwrite the earlier value", async () => {
    const rows = await assemble([row(1), cell("A1", "1"), cell("A1", "2"), cell("B1", "3")]);
    expect(rows).toEqual([["2", "3"]]);
  });

  it("should give the same rows when the skips are applied twice", async () => {
    const options = { skipEmptyRows: true, skipTrailingEmptyColumns: true };
    const once = await assemble(
      [
        row(1),
        cell("A1", "a"),
        cell("C1", ""),
        row(2),
        cell("A2", ""),
        row(3),
        cell("B3", "b"),
        cell("D3", ""),
        row(5),
        cell("A5", "e")
      ],
      options
    );
    expect(once).toEqual([["a"], ["", "b"], ["e"]]);

    const replay = once.flatMap((values, i) => [
      row(i + 1),
      ...values.map((value, col) => cell(`${String.fromCharCode(65 + col)}${i + 1}`, value))
    ]);
    expect(await assemble(replay, options)).toEqual(once);
  });

  it("should fill regions given in any order only across their own rows", async () => {
    const rows = await assemble([row(1), cell("A1", "x"), cell("B1", "z"), row(3), cell("A3", "y")], {
      merges: [region("A3:B4"), region("A1:A2")],
      mergeCells: true
    });
    expect(rows).toEqual([
      ["x", "z"],
      ["x", ""],
      ["y", "y"],
      ["y", "y"]
    ]);
  });

  it("should drop hidden rows unless asked to keep them", async () => {
    const events = [row(1), cell("A1", "a"), row(2, true), cell("A2", "h"), row(3), cell("A3", "c")];
    expect(await assemble(events)).toEqual([["a"], ["c"]]);
    expect(await assemble(events, { includeHiddenRows: true })).toEqual([["a"], ["h"], ["c"]]);
  });

  it("should fill merge regions from their top-left value", async () => {
    const events = [row(1), cell("A1", "m"), cell("C1", "x"), row(2), cell("C2", "y")];
    const merges = [region("A1:B2")];
    expect(await assemble(events, { merges, mergeCells: true })).toEqual([
      ["m", "m", "x"],
      ["m", "m", "y"]
    ]);
    expect(await assemble(events, { merges })).toEqual([
      ["m", "", "x"],
      ["", "", "y"]
    ]);
  });

  it("should emit rows that only a merge region reaches", async () => {
    const rows = await assemble([row(1), cell("A1", "m")], { merges: [region("A1:A3")], mergeCells: true });
    expect(rows).toEqual([["m"], ["m"], ["m"]]);
  });

  it("should leave a merge region empty when its top-left cell is", async () => {
    const rows = await assemble([row(1), cell("C1", "x"), row(2), cell("A2", "y")], {
      merges: [region("A1:B1")],
      mergeCells: true
    });
    expect(rows).toEqual([
      ["", "", "x"],
      ["y", "", ""]
    ]);
  });

  it("should render placeholders for missing cells", async () => {
    const rows = await assemble([row(1), cell("A1", "a"), row(3), cell("A3", "b")], {
      placeholders: [{ row: 1, col: 1 }],
      render: event => (event.kind === "empty" ? "link" : event.raw)
    });
    expect(rows).toEqual([["a"], ["", "link"], ["b"]]);
  });

  it("should stop pulling events when the consumer stops", async () => {
    let pulled = 0;
    async function* counting(): AsyncGenerator<SheetEvent> {
      for (let i = 1; i <= 1000; i++) {
        pulled++;
        yield row(i);
        yield cell(`A${i}`, String(i));
      }
    }
    for await (const values of assembleRows(counting(), { render: event => event.raw })) {
      expect(values).toEqual(["1"]);
      break;
    }
    expect(pulled).toBe(2);
  });
});
