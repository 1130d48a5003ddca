/**
 * Time window resolution.
 *
 * Turns the three user time options (years back, year range, month range)
 * into one canonical TimeWindow. Supplying more than one is a ConfigError.
 * Precedence when only one is given: monthRange > yearRange > yearsBack,
 * falling back to the last 10 years.
 */

import { ConfigError, InvalidFormatError, InvalidRangeError } from "./errors.js";
import type { TimeWindow } from "./types.js";

export const DEFAULT_YEARS_BACK = 10;

export interface TimeOptions {
  yearsBack?: number | undefined;
  yearRange?: string | undefined;
  monthRange?: string | undefined;
}

/** Inclusive calendar bounds of a window, as YYYY-MM-DD strings. */
export interface WindowBounds {
  start: string;
  end: string;
}

const YEAR_RANGE_PATTERN = /^(\d{4})(?:-(\d{4}))?$/;
const MONTH_RANGE_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])-(\d{4})-(0[1-9]|1[0-2])$/;

/** Parse "YYYY" or "YYYY-YYYY". */
export function parseYearRange(value: string): TimeWindow {
  const match = YEAR_RANGE_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidFormatError(
      `Invalid year range "${value}": use YYYY or YYYY-YYYY (e.g. 2020-2025)`
    );
  }
  const startYear = Number(match[1]);
  const endYear = match[2] !== undefined ? Number(match[2]) : startYear;
  if (startYear > endYear) {
    throw new InvalidRangeError(`Invalid year range "${value}": ${startYear} is after ${endYear}`);
  }
  return { kind: "year-range", startYear, endYear };
}

/** Parse "YYYY-MM-YYYY-MM" with zero-padded months. */
export function parseMonthRange(value: string): TimeWindow {
  const match = MONTH_RANGE_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidFormatError(
      `Invalid month range "${value}": use YYYY-MM-YYYY-MM with months 01-12 (e.g. 2025-01-2025-06)`
    );
  }
  const startYear = Number(match[1]);
  const startMonth = Number(match[2]);
  const endYear = Number(match[3]);
  const endMonth = Number(match[4]);
  if (startYear * 12 + startMonth > endYear * 12 + endMonth) {
    throw new InvalidRangeError(`Invalid month range "${value}": start month is after end month`);
  }
  return { kind: "month-range", startYear, startMonth, endYear, endMonth };
}

function validateYearsBack(years: number): TimeWindow {
  if (!Number.isInteger(years) || years < 0) {
    throw new InvalidFormatError(`Invalid years back "${years}": must be a non-negative integer`);
  }
  return { kind: "years-back", years };
}

/**
 * Resolve the user's time options into a single window.
 * An option counts as supplied when it is not undefined.
 */
export function resolveTimeWindow(options: TimeOptions): TimeWindow {
  const supplied = [options.yearsBack, options.yearRange, options.monthRange].filter(
    (v) => v !== undefined
  ).length;
  if (supplied > 1) {
    throw new ConfigError(
      "Specify only one time filter: --years-back, --year-range or --month-range"
    );
  }

  if (options.monthRange !== undefined) return parseMonthRange(options.monthRange);
  if (options.yearRange !== undefined) return parseYearRange(options.yearRange);
  if (options.yearsBack !== undefined) return validateYearsBack(options.yearsBack);
  return { kind: "years-back", years: DEFAULT_YEARS_BACK };
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Number of days in a 1-based month. */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Inclusive first and last years covered by a window. */
export function windowYears(window: TimeWindow, now: Date = new Date()): { start: number; end: number } {
  switch (window.kind) {
    case "years-back": {
      const current = now.getFullYear();
      return { start: current - window.years, end: current };
    }
    case "year-range":
      return { start: window.startYear, end: window.endYear };
    case "month-range":
      return { start: window.startYear, end: window.endYear };
  }
}

/**
 * Inclusive calendar bounds of a window.
 * A month range runs from the first day of its start month to the last day of its end month.
 */
export function windowBounds(window: TimeWindow, now: Date = new Date()): WindowBounds {
  if (window.kind === "month-range") {
    const lastDay = daysInMonth(window.endYear, window.endMonth);
    return {
      start: `${window.startYear}-${pad2(window.startMonth)}-01`,
      end: `${window.endYear}-${pad2(window.endMonth)}-${pad2(lastDay)}`,
    };
  }
  const years = windowYears(window, now);
  return { start: `${years.start}-01-01`, end: `${years.end}-12-31` };
}

/** Human-readable period stored in the export's search_period field. */
export function formatSearchPeriod(window: TimeWindow, now: Date = new Date()): string {
  if (window.kind === "month-range") {
    return `${window.startYear}-${pad2(window.startMonth)}-${window.endYear}-${pad2(window.endMonth)}`;
  }
  const years = windowYears(window, now);
  return `${years.start}-${years.end}`;
}

/** The years_back export field: set only for years-back windows. */
export function yearsBackOf(window: TimeWindow): number | null {
  return window.kind === "years-back" ? window.years : null;
}

/**
 * Split a window into one sub-window per calendar year, most recent first.
 * Month windows keep their month bounds in the first and last year.
 */
export function splitByYear(window: TimeWindow, now: Date = new Date()): TimeWindow[] {
  const years = windowYears(window, now);
  const parts: TimeWindow[] = [];
  for (let year = years.end; year >= years.start; year--) {
    if (window.kind === "month-range") {
      parts.push({
        kind: "month-range",
        startYear: year,
        startMonth: year === window.startYear ? window.startMonth : 1,
        endYear: year,
        endMonth: year === window.endYear ? window.endMonth : 12,
      });
    } else {
      parts.push({ kind: "year-range", startYear: year, endYear: year });
    }
  }
  return parts;
}
