import { SelectionError } from "../../errors.js";
import type { SheetCatalog, SheetCriteria, SheetDescriptor } from "../../types.js";
import { globToRegExp } from "../../utils/glob.js";

export const NO_CRITERIA: SheetCriteria = Object.freeze({
  sheetNames: [],
  sheetIds: [],
  includeSheetPatterns: [],
  excludeSheetPatterns: [],
  excludeHiddenSheets: false,
  all: false
});

function pickExplicit(catalog: SheetCatalog, criteria: SheetCriteria): SheetDescriptor[] {
  const picked: SheetDescriptor[] = [];
  const add = (sheet: SheetDescriptor): void => {
    if (!picked.includes(sheet)) {
      picked.push(sheet);
    }
  };

  for (const name of criteria.sheetNames) {
    const sheet = catalog.sheets.find(s => s.name === name);
    if (!sheet) {
      throw new SelectionError(`Cannot find sheet named "${name}"`);
    }
    add(sheet);
  }
  for (const id of criteria.sheetIds) {
    const sheet = catalog.sheets.find(s => s.index === id);
    if (!sheet) {
      throw new SelectionError(`Sheet number ${id} out of range (1-${catalog.sheets.length})`);
    }
    add(sheet);
  }
  return picked;
}

/**
 * Choose the sheets to convert, in output order.
 *
 * Explicit names and numbers take precedence over patterns and keep the order
 * they were given in. Patterns filter the whole workbook in declaration
 * order. Without any criteria, every visible sheet is chosen; `all` adds the
 * hidden ones. An empty result is not an error.
 */
export function selectSheets(catalog: SheetCatalog, criteria: SheetCriteria = NO_CRITERIA): SheetDescriptor[] {
  let selected: SheetDescriptor[];

  if (criteria.sheetNames.length || criteria.sheetIds.length) {
    selected = pickExplicit(catalog, criteria);
  } else if (criteria.includeSheetPatterns.length || criteria.excludeSheetPatterns.length) {
    const include = criteria.includeSheetPatterns.map(globToRegExp);
    const exclude = criteria.excludeSheetPatterns.map(globToRegExp);
    selected = catalog.sheets.filter(
      sheet =>
        (!include.length || include.some(re => re.test(sheet.name))) &&
        !exclude.some(re => re.test(sheet.name))
    );
  } else {
    selected = criteria.all ? [...catalog.sheets] : catalog.sheets.filter(sheet => !sheet.hidden);
  }

  if (criteria.excludeHiddenSheets) {
    selected = selected.filter(sheet => !sheet.hidden);
  }
  return selected;
}
