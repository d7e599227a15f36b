import type { DateSystem } from "../types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Serial 0 in the 1900 system, counted so that serial 61 is 1900-03-01
const EPOCH_1900 = Date.UTC(1899, 11, 30);

// Days between 1899-12-30 and 1904-01-01
const OFFSET_1904 = 1462;

/**
 * Calendar and clock fields of a serial date value
 */
export interface DateParts {
  year: number;
  /** 0-indexed */
  month: number;
  day: number;
  /** 0 = Sunday */
  dayOfWeek: number;
  hours: number;
  minutes: number;
  seconds: number;
  /** Sub-second part, in milliseconds */
  milliseconds: number;
  /** The whole value in seconds, for elapsed-time formats */
  totalSeconds: number;
}

/**
 * Convert a serial day count to calendar fields.
 *
 * The 1900 system counts a fictitious 1900-02-29 as serial 60. Serials below
 * it are shifted forward one day so that serial 1 is 1900-01-01; serial 60
 * itself has no real date and lands on 1900-02-28.
 */
export function serialToDateParts(serial: number, dateSystem: DateSystem): DateParts {
  // Work in whole milliseconds to keep clock fields stable under float noise
  const totalMs = Math.round(serial * MS_PER_DAY);
  let days = Math.floor(totalMs / MS_PER_DAY);
  const msOfDay = totalMs - days * MS_PER_DAY;

  if (dateSystem === "1904") {
    days += OFFSET_1904;
  } else if (days < 60 && days > 0) {
    days += 1;
  }

  const date = new Date(EPOCH_1900 + days * MS_PER_DAY);
  const secondsOfDay = Math.floor(msOfDay / 1000);

  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth(),
    day: date.getUTCDate(),
    dayOfWeek: date.getUTCDay(),
    hours: Math.floor(secondsOfDay / 3600),
    minutes: Math.floor((secondsOfDay % 3600) / 60),
    seconds: secondsOfDay % 60,
    milliseconds: msOfDay % 1000,
    totalSeconds: Math.floor(totalMs / 1000)
  };
}

export const MONTHS_SHORT = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
export const MONTHS_LONG = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December"
];
export const DAYS_SHORT = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
export const DAYS_LONG = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

function pad(value: number, width: number): string {
  return value.toString().padStart(width, "0");
}

/**
 * strftime directives understood by {@link strftime}
 */
const STRFTIME_DIRECTIVES: Record<string, (d: DateParts) => string> = {
  Y: d => pad(d.year, 4),
  y: d => pad(d.year % 100, 2),
  m: d => pad(d.month + 1, 2),
  d: d => pad(d.day, 2),
  e: d => d.day.toString().padStart(2, " "),
  b: d => MONTHS_SHORT[d.month],
  h: d => MONTHS_SHORT[d.month],
  B: d => MONTHS_LONG[d.month],
  a: d => DAYS_SHORT[d.dayOfWeek],
  A: d => DAYS_LONG[d.dayOfWeek],
  w: d => d.dayOfWeek.toString(),
  j: d => pad(dayOfYear(d), 3),
  H: d => pad(d.hours, 2),
  I: d => pad(d.hours % 12 || 12, 2),
  M: d => pad(d.minutes, 2),
  S: d => pad(d.seconds, 2),
  f: d => pad(d.milliseconds * 1000, 6),
  p: d => (d.hours >= 12 ? "PM" : "AM"),
  F: d => `${pad(d.year, 4)}-${pad(d.month + 1, 2)}-${pad(d.day, 2)}`,
  T: d => `${pad(d.hours, 2)}:${pad(d.minutes, 2)}:${pad(d.seconds, 2)}`,
  "%": () => "%"
};

function dayOfYear(d: DateParts): number {
  return Math.round((Date.UTC(d.year, d.month, d.day) - Date.UTC(d.year, 0, 1)) / MS_PER_DAY) + 1;
}

/**
 * Returns the first directive in `pattern` that {@link strftime} does not
 * know, or undefined when all are valid.
 */
export function findUnknownDirective(pattern: string): string | undefined {
  for (let i = 0; i < pattern.length; i++) {
    if (pattern[i] !== "%") {
      continue;
    }
    const directive = pattern[i + 1];
    if (directive === undefined || !(directive in STRFTIME_DIRECTIVES)) {
      return `%${directive ?? ""}`;
    }
    i++;
  }
  return undefined;
}

/**
 * C-style date formatting, e.g. `%Y-%m-%d %H:%M:%S`
 */
export function strftime(parts: DateParts, pattern: string): string {
  let result = "";
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch !== "%" || i + 1 >= pattern.length) {
      result += ch;
      continue;
    }
    const render = STRFTIME_DIRECTIVES[pattern[i + 1]];
    result += render ? render(parts) : ch + pattern[i + 1];
    i++;
  }
  return result;
}
