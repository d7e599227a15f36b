import type { CellRef, MergeRegion } from "../types.js";

const ADDRESS_REGEX = /^\$?([A-Za-z]{1,3})\$?(\d+)$/;

/**
 * Decode column letters to a 0-indexed number
 * @example decodeCol("A") => 0, decodeCol("Z") => 25, decodeCol("AA") => 26
 */
export function decodeCol(colstr: string): number {
  let col = 0;
  for (const ch of colstr.toUpperCase()) {
    col = col * 26 + (ch.charCodeAt(0) - 64);
  }
  return col - 1;
}

/**
 * Encode a 0-indexed column number to letters
 * @example encodeCol(0) => "A", encodeCol(26) => "AA"
 */
export function encodeCol(col: number): string {
  let s = "";
  for (let n = col + 1; n > 0; n = Math.floor((n - 1) / 26)) {
    s = String.fromCharCode(65 + ((n - 1) % 26)) + s;
  }
  return s;
}

/**
 * Decode an A1-style address; returns undefined when it is not one
 * @example decodeCell("B3") => { row: 2, col: 1 }
 */
export function decodeCell(address: string): CellRef | undefined {
  const match = ADDRESS_REGEX.exec(address.trim());
  if (!match) {
    return undefined;
  }
  const row = parseInt(match[2], 10) - 1;
  if (row < 0) {
    return undefined;
  }
  return { row, col: decodeCol(match[1]) };
}

export function encodeCell(ref: CellRef): string {
  return `${encodeCol(ref.col)}${ref.row + 1}`;
}

/**
 * Decode a range such as `A1:C3`; a single address is a one-cell range.
 * Corners are normalized so `start` is the top-left.
 */
export function decodeRange(range: string): MergeRegion | undefined {
  const idx = range.indexOf(":");
  const first = decodeCell(idx === -1 ? range : range.slice(0, idx));
  const second = idx === -1 ? first : decodeCell(range.slice(idx + 1));
  if (!first || !second) {
    return undefined;
  }
  return {
    start: { row: Math.min(first.row, second.row), col: Math.min(first.col, second.col) },
    end: { row: Math.max(first.row, second.row), col: Math.max(first.col, second.col) }
  };
}

export function rangeContains(range: MergeRegion, row: number, col: number): boolean {
  return row >= range.start.row && row <= range.end.row && col >= range.start.col && col <= range.end.col;
}
