/**
 * Number-format codes.
 *
 * Classifies a cell's format code (is it a date, a time, a plain number?) and
 * renders values through the subset of codes that matter for text export:
 * date and time codes, elapsed time, fixed decimals, thousands separators,
 * percentages and scientific notation.
 */

import type { DateSystem, FormatKind } from "../types.js";
import { DAYS_LONG, DAYS_SHORT, MONTHS_LONG, MONTHS_SHORT, serialToDateParts } from "./date.js";
import type { DateParts } from "./date.js";

// =============================================================================
// Built-in Format Table (numFmtId to format string mapping)
// =============================================================================

const TABLE_FMT: Record<number, string> = {
  0: "General",
  1: "0",
  2: "0.00",
  3: "#,##0",
  4: "#,##0.00",
  9: "0%",
  10: "0.00%",
  11: "0.00E+00",
  12: "# ?/?",
  13: "# ??/??",
  14: "m/d/yy",
  15: "d-mmm-yy",
  16: "d-mmm",
  17: "mmm-yy",
  18: "h:mm AM/PM",
  19: "h:mm:ss AM/PM",
  20: "h:mm",
  21: "h:mm:ss",
  22: "m/d/yy h:mm",
  37: "#,##0 ;(#,##0)",
  38: "#,##0 ;[Red](#,##0)",
  39: "#,##0.00;(#,##0.00)",
  40: "#,##0.00;[Red](#,##0.00)",
  45: "mm:ss",
  46: "[h]:mm:ss",
  47: "mmss.0",
  48: "##0.0E+0",
  49: "@"
};

/**
 * Locale-dependent ids that fall back to a known built-in
 */
function defaultFormatId(numFmtId: number): number | undefined {
  if (numFmtId >= 5 && numFmtId <= 8) {
    return numFmtId + 32;
  }
  if ((numFmtId >= 27 && numFmtId <= 31) || (numFmtId >= 50 && numFmtId <= 58)) {
    return 14;
  }
  if (numFmtId >= 59 && numFmtId <= 62) {
    return numFmtId - 58;
  }
  if (numFmtId === 67 || numFmtId === 68) {
    return numFmtId - 58;
  }
  if (numFmtId >= 72 && numFmtId <= 75) {
    return numFmtId - 58;
  }
  if (numFmtId >= 76 && numFmtId <= 78) {
    return numFmtId - 56;
  }
  if (numFmtId >= 79 && numFmtId <= 81) {
    return numFmtId - 34;
  }
  return undefined;
}

/**
 * Get the built-in format string for a numFmtId; unknown ids are "General"
 */
export function getFormat(numFmtId: number): string {
  const direct = TABLE_FMT[numFmtId];
  if (direct !== undefined) {
    return direct;
  }
  const fallback = defaultFormatId(numFmtId);
  return (fallback !== undefined && TABLE_FMT[fallback]) || "General";
}

// =============================================================================
// Tokenizer
// =============================================================================

type DateTokenType = "y" | "M" | "d" | "h" | "m" | "s";

type Token =
  | { type: DateTokenType; count: number }
  | { type: "elapsed"; unit: "h" | "m" | "s"; count: number }
  | { type: "fraction"; digits: number }
  | { type: "ampm"; short: boolean }
  | { type: "literal"; text: string }
  | { type: "digit"; char: string };

/**
 * Split one format section into tokens. Quoted text and escaped characters
 * become literals; colors, conditions and locale tags are dropped.
 */
function tokenize(section: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < section.length) {
    const ch = section[i];
    const lower = ch.toLowerCase();

    if (ch === '"') {
      const close = section.indexOf('"', i + 1);
      const end = close === -1 ? section.length : close;
      tokens.push({ type: "literal", text: section.slice(i + 1, end) });
      i = end + 1;
    } else if (ch === "\\") {
      tokens.push({ type: "literal", text: section[i + 1] ?? "" });
      i += 2;
    } else if (ch === "_") {
      tokens.push({ type: "literal", text: " " });
      i += 2;
    } else if (ch === "*") {
      i += 2;
    } else if (ch === "[") {
      const close = section.indexOf("]", i);
      const end = close === -1 ? section.length : close;
      const inner = section.slice(i + 1, end);
      const elapsed = /^(h+|m+|s+)$/i.exec(inner);
      if (elapsed) {
        const unit = elapsed[1][0].toLowerCase();
        if (unit === "h" || unit === "m" || unit === "s") {
          tokens.push({ type: "elapsed", unit, count: elapsed[1].length });
        }
      }
      i = end + 1;
    } else if (/^am\/pm/i.test(section.slice(i, i + 5))) {
      tokens.push({ type: "ampm", short: false });
      i += 5;
    } else if (/^a\/p/i.test(section.slice(i, i + 3))) {
      tokens.push({ type: "ampm", short: true });
      i += 3;
    } else if (lower === "y" || lower === "m" || lower === "d" || lower === "h" || lower === "s") {
      let count = 1;
      while (section[i + count]?.toLowerCase() === lower) {
        count++;
      }
      tokens.push({ type: lower === "m" ? "M" : lower, count });
      i += count;
    } else if (ch === "." && section[i + 1] === "0" && lastDateToken(tokens)?.type === "s") {
      let digits = 0;
      while (section[i + 1 + digits] === "0") {
        digits++;
      }
      tokens.push({ type: "fraction", digits });
      i += 1 + digits;
    } else if (ch === "0" || ch === "#" || ch === "?" || ch === "@") {
      tokens.push({ type: "digit", char: ch });
      i++;
    } else {
      tokens.push({ type: "literal", text: ch });
      i++;
    }
  }
  return resolveMinutes(tokens);
}

function lastDateToken(tokens: Token[]): Token | undefined {
  for (let j = tokens.length - 1; j >= 0; j--) {
    const type = tokens[j].type;
    if (type !== "literal" && type !== "digit") {
      return tokens[j];
    }
  }
  return undefined;
}

/**
 * `m` means minutes right after an hour token or right before a seconds
 * token, and month everywhere else.
 */
function resolveMinutes(tokens: Token[]): Token[] {
  const significant = tokens.filter(t => t.type !== "literal" && t.type !== "digit");
  return tokens.map(token => {
    if (token.type !== "M" || token.count > 2) {
      return token;
    }
    const pos = significant.indexOf(token);
    const prev = significant[pos - 1];
    const next = significant[pos + 1];
    const afterHour = prev !== undefined && (prev.type === "h" || (prev.type === "elapsed" && prev.unit === "h"));
    const beforeSecond = next !== undefined && (next.type === "s" || (next.type === "elapsed" && next.unit === "s"));
    return afterHour || beforeSecond ? { type: "m", count: token.count } : token;
  });
}

/**
 * Split a format into its `;`-separated sections, respecting quotes and brackets
 */
function splitSections(code: string): string[] {
  const sections: string[] = [];
  let current = "";
  let inQuote = false;
  let inBracket = false;
  for (let i = 0; i < code.length; i++) {
    const ch = code[i];
    if (ch === "\\" && !inQuote) {
      current += ch + (code[i + 1] ?? "");
      i++;
      continue;
    }
    if (ch === '"') {
      inQuote = !inQuote;
    } else if (ch === "[" && !inQuote) {
      inBracket = true;
    } else if (ch === "]" && !inQuote) {
      inBracket = false;
    } else if (ch === ";" && !inQuote && !inBracket) {
      sections.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  sections.push(current);
  return sections;
}

// =============================================================================
// Classification
// =============================================================================

export function isGeneral(code: string): boolean {
  return /^general$/i.test(code.trim());
}

/**
 * Decide how a format code presents a number
 */
export function classifyFormat(code: string): FormatKind {
  if (!code.trim() || isGeneral(code)) {
    return "general";
  }
  const tokens = tokenize(splitSections(code)[0]);
  let hasDate = false;
  let hasTime = false;
  let hasDigits = false;
  let hasText = false;
  for (const token of tokens) {
    switch (token.type) {
      case "y":
      case "M":
      case "d":
        hasDate = true;
        break;
      case "h":
      case "m":
      case "s":
      case "elapsed":
      case "ampm":
      case "fraction":
        hasTime = true;
        break;
      case "digit":
        if (token.char === "@") {
          hasText = true;
        } else {
          hasDigits = true;
        }
        break;
      default:
        break;
    }
  }
  if (hasDate) {
    return "date";
  }
  if (hasTime) {
    return "time";
  }
  if (hasText && !hasDigits) {
    return "text";
  }
  return hasDigits ? "float" : "general";
}

/**
 * True when the code contains at least one date or time field
 */
export function isDateTimeFormat(code: string): boolean {
  const kind = classifyFormat(code);
  return kind === "date" || kind === "time";
}

// =============================================================================
// Date and time rendering
// =============================================================================

function pad(value: number, width: number): string {
  return value.toString().padStart(width, "0");
}

function renderDateToken(token: Token, d: DateParts, twelveHour: boolean): string {
  switch (token.type) {
    case "y":
      return token.count <= 2 ? pad(d.year % 100, 2) : pad(d.year, 4);
    case "M":
      switch (token.count) {
        case 1:
          return (d.month + 1).toString();
        case 2:
          return pad(d.month + 1, 2);
        case 3:
          return MONTHS_SHORT[d.month];
        case 5:
          return MONTHS_LONG[d.month][0];
        default:
          return MONTHS_LONG[d.month];
      }
    case "d":
      if (token.count === 3) {
        return DAYS_SHORT[d.dayOfWeek];
      }
      if (token.count > 3) {
        return DAYS_LONG[d.dayOfWeek];
      }
      return token.count === 2 ? pad(d.day, 2) : d.day.toString();
    case "h": {
      const hours = twelveHour ? d.hours % 12 || 12 : d.hours;
      return token.count >= 2 ? pad(hours, 2) : hours.toString();
    }
    case "m":
      return token.count >= 2 ? pad(d.minutes, 2) : d.minutes.toString();
    case "s":
      return token.count >= 2 ? pad(d.seconds, 2) : d.seconds.toString();
    case "fraction":
      return "." + pad(Math.floor(d.milliseconds / Math.pow(10, 3 - Math.min(token.digits, 3))), Math.min(token.digits, 3));
    case "elapsed": {
      const total =
        token.unit === "h"
          ? Math.floor(d.totalSeconds / 3600)
          : token.unit === "m"
            ? Math.floor(d.totalSeconds / 60)
            : d.totalSeconds;
      return pad(total, token.count);
    }
    case "ampm": {
      const pm = d.hours >= 12;
      return token.short ? (pm ? "P" : "A") : pm ? "PM" : "AM";
    }
    case "literal":
      return token.text;
    case "digit":
      return token.char === "@" ? "" : token.char;
  }
}

/**
 * Render a serial date/time value with a date or time format code
 * @param serial Serial day count (fraction = time of day)
 * @param code Format code such as "yyyy-mm-dd" or "[h]:mm:ss"
 */
export function formatSerial(serial: number, code: string, dateSystem: DateSystem): string {
  const section = splitSections(code)[serial < 0 ? 1 : 0] ?? splitSections(code)[0];
  const tokens = tokenize(section);
  const parts = serialToDateParts(Math.abs(serial), dateSystem);
  const twelveHour = tokens.some(t => t.type === "ampm");
  return tokens.map(token => renderDateToken(token, parts, twelveHour)).join("");
}

// =============================================================================
// Number rendering
// =============================================================================

/**
 * Add thousand separators to a string of digits
 */
function commaify(s: string): string {
  const w = 3;
  if (s.length <= w) {
    return s;
  }
  const j = s.length % w;
  let o = s.substring(0, j);
  for (let i = j; i < s.length; i += w) {
    o += (o.length > 0 ? "," : "") + s.substring(i, i + w);
  }
  return o;
}

function formatScientific(absVal: number, pattern: string): string {
  const decMatch = /\.([0#]+)E/i.exec(pattern);
  const decPlaces = decMatch ? decMatch[1].length : 0;
  const hasPlus = /E\+/i.test(pattern);
  const expDigits = (/E[+-]?(0+)/i.exec(pattern)?.[1] ?? "00").length;

  const [mantissa, exponent] = absVal.toExponential(decPlaces).split("e");
  const exp = parseInt(exponent, 10);
  const expSign = exp < 0 ? "-" : hasPlus ? "+" : "";
  return mantissa + "E" + expSign + pad(Math.abs(exp), expDigits);
}

function formatFixed(absVal: number, pattern: string): string {
  const decimalIdx = pattern.indexOf(".");
  const intFmt = decimalIdx === -1 ? pattern : pattern.slice(0, decimalIdx);
  const decFmt = decimalIdx === -1 ? "" : pattern.slice(decimalIdx + 1);
  const decimalPlaces = decFmt.replace(/[^0#?]/g, "").length;
  const optionalPlaces = decFmt.replace(/[^#]/g, "").length;

  let [intPart, decPart = ""] = absVal.toFixed(decimalPlaces).split(".");
  if (intFmt.includes(",")) {
    intPart = commaify(intPart);
  }
  const minIntDigits = (intFmt.match(/0/g) ?? []).length;
  if (intPart === "0" && minIntDigits === 0) {
    intPart = "";
  }
  if (intPart.length < minIntDigits) {
    intPart = "0".repeat(minIntDigits - intPart.length) + intPart;
  }
  // Trailing "#" places are shown only when non-zero
  let trim = 0;
  while (trim < optionalPlaces && decPart.endsWith("0".repeat(trim + 1))) {
    trim++;
  }
  decPart = decPart.slice(0, decPart.length - trim);
  return decPart ? `${intPart}.${decPart}` : intPart;
}

/**
 * Render a number with a numeric format code ("0.00", "#,##0", "0.0%", "0.00E+00")
 */
export function formatNumber(value: number, code: string): string {
  if (isGeneral(code)) {
    return Number.isInteger(value) ? value.toString() : value.toPrecision(11).replace(/\.?0+$/, "");
  }
  const sections = splitSections(code);
  const useNegative = value < 0 && sections.length > 1;
  const section = useNegative ? sections[1] : sections[0];
  const tokens = tokenize(section);

  let pattern = "";
  let prefix = "";
  let suffix = "";
  let percent = 0;
  for (const token of tokens) {
    if (token.type === "digit" && token.char !== "@") {
      pattern += token.char;
    } else if (token.type === "literal") {
      if (token.text === "%") {
        percent++;
      }
      if (pattern && /^[.,]$/.test(token.text)) {
        pattern += token.text;
      } else if (pattern && /^E$/i.test(token.text)) {
        pattern += token.text;
      } else if (pattern && /^E/i.test(pattern.slice(-1)) && /^[+-]$/.test(token.text)) {
        pattern += token.text;
      } else if (pattern) {
        suffix += token.text;
      } else {
        prefix += token.text;
      }
    }
  }

  const scaled = Math.abs(value) * Math.pow(100, percent);
  const body = /E/i.test(pattern) ? formatScientific(scaled, pattern) : formatFixed(scaled, pattern || "0");
  const sign = value < 0 && !useNegative ? "-" : "";
  return sign + prefix + body + suffix;
}
