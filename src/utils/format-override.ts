/**
 * User-supplied format overrides.
 *
 * Date and time overrides accept strftime directives (`%Y-%m-%d`) or
 * spreadsheet format codes (`YYYY-MM-DD`). Float overrides accept printf
 * conversions (`%.2f`, `%.3e`, `%g`, `%d`) or numeric format codes (`0.00`).
 * Each override is validated once and compiled to a render function.
 */

import { FormatError } from "../errors.js";
import type { DateSystem, FormatOverrides } from "../types.js";
import { formatNumber, formatSerial, isDateTimeFormat } from "./cell-format.js";
import { findUnknownDirective, serialToDateParts, strftime } from "./date.js";

export type DateRenderer = (serial: number, dateSystem: DateSystem) => string;
export type NumberRenderer = (value: number) => string;

export function compileDateOverride(pattern: string): DateRenderer {
  if (pattern.includes("%")) {
    const unknown = findUnknownDirective(pattern);
    if (unknown !== undefined) {
      throw new FormatError(`Unknown directive ${unknown} in date/time format "${pattern}"`);
    }
    return (serial, dateSystem) => strftime(serialToDateParts(serial, dateSystem), pattern);
  }
  if (!isDateTimeFormat(pattern)) {
    throw new FormatError(`Date/time format "${pattern}" contains no date or time fields`);
  }
  return (serial, dateSystem) => formatSerial(serial, pattern, dateSystem);
}

const PRINTF_REGEX = /^([^%]*(?:%%[^%]*)*)%([-+ 0]*)(\d+)?(?:\.(\d+))?([dieEfFgG])((?:[^%]|%%)*)$/;

function padField(text: string, width: number, flags: string): string {
  if (text.length >= width) {
    return text;
  }
  if (flags.includes("-")) {
    return text.padEnd(width, " ");
  }
  if (flags.includes("0")) {
    const sign = /^[+ -]/.test(text) ? text[0] : "";
    return sign + text.slice(sign.length).padStart(width - sign.length, "0");
  }
  return text.padStart(width, " ");
}

/**
 * C-style exponent: at least two digits, always signed
 */
function cExponential(value: number, precision: number): string {
  const [mantissa, exponent] = value.toExponential(precision).split("e");
  const exp = parseInt(exponent, 10);
  return `${mantissa}e${exp < 0 ? "-" : "+"}${Math.abs(exp).toString().padStart(2, "0")}`;
}

function cGeneral(value: number, precision: number): string {
  const p = precision === 0 ? 1 : precision;
  if (value === 0) {
    return "0";
  }
  const exp = Math.floor(Math.log10(Math.abs(value)));
  if (exp < -4 || exp >= p) {
    return cExponential(value, p - 1).replace(/\.?0+e/, "e");
  }
  const fixed = value.toFixed(Math.max(0, p - 1 - exp));
  return fixed.includes(".") ? fixed.replace(/\.?0+$/, "") : fixed;
}

function printfNumber(value: number, flags: string, precision: number | undefined, conversion: string): string {
  let body: string;
  switch (conversion) {
    case "d":
    case "i":
      body = Math.trunc(Math.abs(value)).toString();
      break;
    case "e":
    case "E":
      body = cExponential(Math.abs(value), precision ?? 6);
      break;
    case "g":
    case "G":
      body = cGeneral(Math.abs(value), precision ?? 6);
      break;
    default:
      body = Math.abs(value).toFixed(precision ?? 6);
      break;
  }
  if (conversion === "E" || conversion === "G") {
    body = body.toUpperCase();
  }
  const negative = value < 0 || Object.is(value, -0);
  const sign = negative && Number(body.replace(/e.*$/i, "")) !== 0 ? "-" : flags.includes("+") ? "+" : flags.includes(" ") ? " " : "";
  return sign + body;
}

export function compileFloatOverride(pattern: string): NumberRenderer {
  if (pattern.includes("%")) {
    const match = PRINTF_REGEX.exec(pattern);
    if (!match) {
      throw new FormatError(`Float format "${pattern}" must contain exactly one numeric conversion such as %.2f`);
    }
    const [, prefix, flags, width, precision, conversion, suffix] = match;
    const unescape = (s: string): string => s.replace(/%%/g, "%");
    return value => {
      const text = printfNumber(value, flags, precision === undefined ? undefined : parseInt(precision, 10), conversion);
      return unescape(prefix) + padField(text, width === undefined ? 0 : parseInt(width, 10), flags) + unescape(suffix);
    };
  }
  if (!/[0#?]/.test(pattern) || isDateTimeFormat(pattern)) {
    throw new FormatError(`Float format "${pattern}" is not a numeric format`);
  }
  return value => formatNumber(value, pattern);
}

/**
 * Rewrite a decimal literal in exponent notation without the exponent,
 * shifting digits instead of going through floating point.
 * @example expandExponent("1.5E-7") => "0.00000015"
 */
export function expandExponent(raw: string): string {
  const match = /^\s*([+-]?)(\d*)(?:\.(\d*))?[eE]([+-]?\d+)\s*$/.exec(raw);
  if (!match || (match[2] === "" && !match[3])) {
    return raw;
  }
  const [, sign, intDigits, fracDigits = "", exponent] = match;
  const digits = intDigits + fracDigits;
  const point = intDigits.length + parseInt(exponent, 10);

  let intPart: string;
  let fracPart: string;
  if (point <= 0) {
    intPart = "0";
    fracPart = "0".repeat(-point) + digits;
  } else if (point >= digits.length) {
    intPart = digits + "0".repeat(point - digits.length);
    fracPart = "";
  } else {
    intPart = digits.slice(0, point);
    fracPart = digits.slice(point);
  }

  intPart = intPart.replace(/^0+(?=\d)/, "");
  fracPart = fracPart.replace(/0+$/, "");
  const isZero = /^0*$/.test(intPart) && fracPart === "";
  return (isZero || sign !== "-" ? "" : "-") + (fracPart ? `${intPart}.${fracPart}` : intPart);
}

export interface CompiledOverrides {
  date?: DateRenderer;
  time?: DateRenderer;
  float?: NumberRenderer;
  sciFloat: boolean;
  ignoreFormats: FormatOverrides["ignoreFormats"];
}

/**
 * Validate and compile every override up front, so a bad format string
 * fails before any output is written
 */
export function compileOverrides(overrides: FormatOverrides): CompiledOverrides {
  return {
    date: overrides.dateFormat === undefined ? undefined : compileDateOverride(overrides.dateFormat),
    time: overrides.timeFormat === undefined ? undefined : compileDateOverride(overrides.timeFormat),
    float: overrides.floatFormat === undefined ? undefined : compileFloatOverride(overrides.floatFormat),
    sciFloat: overrides.sciFloat,
    ignoreFormats: overrides.ignoreFormats
  };
}
