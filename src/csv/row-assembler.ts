import type { AssembledRow, CellEvent, CellRef, MergeRegion, SheetEvent } from "../types.js";

export interface RowAssemblerOptions {
  /** Turns a cell event into its output text */
  render(event: CellEvent): string;
  merges?: readonly MergeRegion[];
  /** Copy a merge region's top-left value into its other cells */
  mergeCells?: boolean;
  /** Positions rendered as empty cells when the sheet has no entry there */
  placeholders?: readonly CellRef[];
  skipEmptyRows?: boolean;
  skipTrailingEmptyColumns?: boolean;
  includeHiddenRows?: boolean;
}

/**
 * Rebuild dense rows from a sparse stream of cell events.
 *
 * Rows come out in order from row 0 to the last row that has data (or that
 * a merge region reaches), one array per row index. Each row is as wide as
 * the widest column seen so far in the sheet, gaps being empty strings.
 */
export async function* assembleRows(
  events: AsyncIterable<SheetEvent>,
  options: RowAssemblerOptions
): AsyncGenerator<AssembledRow> {
  const {
    render,
    merges = [],
    mergeCells = false,
    placeholders = [],
    skipEmptyRows = false,
    skipTrailingEmptyColumns = false,
    includeHiddenRows = false
  } = options;

  const mergeStarts = new Map<string, MergeRegion>();
  for (const region of merges) {
    mergeStarts.set(`${region.start.row}:${region.start.col}`, region);
  }
  const mergeValues = new Map<MergeRegion, string>();
  const lastMergeRow = merges.reduce((max, region) => Math.max(max, region.end.row), -1);

  // Rows are built once each, in order: regions join the active list at their
  // first row and leave it after their last
  const pendingMerges = mergeCells ? [...merges].sort((a, b) => a.start.row - b.start.row) : [];
  let mergeCursor = 0;
  let activeMerges: MergeRegion[] = [];

  const placeholdersByRow = new Map<number, CellRef[]>();
  for (const ref of placeholders) {
    const list = placeholdersByRow.get(ref.row);
    if (list) {
      list.push(ref);
    } else {
      placeholdersByRow.set(ref.row, [ref]);
    }
  }

  let width = 0;
  let nextRow = 0;
  let current = -1;
  let hidden = false;
  let cells = new Map<number, string>();

  const build = (row: number, rowCells: Map<number, string>, rowHidden: boolean): AssembledRow | undefined => {
    for (const ref of placeholdersByRow.get(row) ?? []) {
      if (!rowCells.has(ref.col)) {
        rowCells.set(ref.col, render({ type: "cell", ref, kind: "empty", raw: "" }));
      }
    }
    placeholdersByRow.delete(row);

    if (mergeCells) {
      for (
        let next = pendingMerges[mergeCursor];
        next !== undefined && next.start.row <= row;
        next = pendingMerges[++mergeCursor]
      ) {
        activeMerges.push(next);
      }
      activeMerges = activeMerges.filter(region => region.end.row >= row);
      for (const region of activeMerges) {
        const value = mergeValues.get(region);
        if (value === undefined) {
          continue;
        }
        for (let col = region.start.col; col <= region.end.col; col++) {
          if (row !== region.start.row || col !== region.start.col) {
            rowCells.set(col, value);
          }
        }
      }
    }

    if (rowHidden && !includeHiddenRows) {
      return undefined;
    }

    let rowWidth = width;
    for (const col of rowCells.keys()) {
      rowWidth = Math.max(rowWidth, col + 1);
    }
    const values: AssembledRow = new Array<string>(rowWidth).fill("");
    for (const [col, value] of rowCells) {
      values[col] = value;
    }

    if (skipEmptyRows && values.every(value => value === "")) {
      return undefined;
    }
    if (skipTrailingEmptyColumns) {
      while (values.length && values[values.length - 1] === "") {
        values.pop();
      }
    }
    return values;
  };

  /** Finish the row in progress and every row before `target` */
  function* flushBefore(target: number): Generator<AssembledRow> {
    for (; nextRow < target; nextRow++) {
      const isCurrent = nextRow === current;
      const row = build(nextRow, isCurrent ? cells : new Map<number, string>(), isCurrent && hidden);
      if (row) {
        yield row;
      }
    }
  }

  function* startRow(row: number, rowHidden: boolean): Generator<AssembledRow> {
    if (row === current) {
      hidden ||= rowHidden;
      return;
    }
    yield* flushBefore(row);
    current = row;
    hidden = rowHidden;
    cells = new Map<number, string>();
  }

  for await (const event of events) {
    if (event.type === "row") {
      yield* startRow(event.row, event.hidden);
      continue;
    }
    const { row, col } = event.ref;
    if (row < nextRow) {
      continue;
    }
    if (row !== current) {
      yield* startRow(row, false);
    }
    const value = render(event);
    cells.set(col, value);
    width = Math.max(width, col + 1);
    const region = mergeStarts.get(`${row}:${col}`);
    if (region) {
      mergeValues.set(region, value);
    }
  }

  yield* flushBefore(Math.max(current, lastMergeRow) + 1);
}
