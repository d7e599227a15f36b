import { describe, it, expect } from "vitest";
import {
  decodeCell,
  decodeCol,
  decodeRange,
  encodeCell,
  encodeCol,
  rangeContains
} from "../../../utils/cell-address.js";

describe("cell-address", () => {
  it("should decode and encode columns", () => {
    expect(decodeCol("A")).toBe(0);
    expect(decodeCol("Z")).toBe(25);
    expect(decodeCol("AA")).toBe(26);
    expect(decodeCol("xfd")).toBe(16383);
    expect(encodeCol(0)).toBe("A");
    expect(encodeCol(26)).toBe("AA");
    expect(encodeCol(16383)).toBe("XFD");
  });

  it("should decode cell addresses", () => {
    expect(decodeCell("B3")).toEqual({ row: 2, col: 1 });
    expect(decodeCell("$C$10")).toEqual({ row: 9, col: 2 });
    expect(encodeCell({ row: 2, col: 1 })).toBe("B3");
  });

  it("should reject invalid addresses", () => {
    expect(decodeCell("3B")).toBeUndefined();
    expect(decodeCell("A0")).toBeUndefined();
    expect(decodeCell("")).toBeUndefined();
  });

  it("should decode ranges with normalized corners", () => {
    expect(decodeRange("A1:C3")).toEqual({ start: { row: 0, col: 0 }, end: { row: 2, col: 2 } });
    expect(decodeRange("C3:A1")).toEqual({ start: { row: 0, col: 0 }, end: { row: 2, col: 2 } });
    expect(decodeRange("B2")).toEqual({ start: { row: 1, col: 1 }, end: { row: 1, col: 1 } });
    expect(decodeRange("A1:?")).toBeUndefined();
  });

  it("should test range membership", () => {
    const range = { start: { row: 1, col: 1 }, end: { row: 2, col: 3 } };
    expect(rangeContains(range, 1, 1)).toBe(true);
    expect(rangeContains(range, 2, 3)).toBe(true);
    expect(rangeContains(range, 0, 1)).toBe(false);
    expect(rangeContains(range, 1, 4)).toBe(false);
  });
});
