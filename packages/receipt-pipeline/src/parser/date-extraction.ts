import { hasDateKeyword } from "../heuristics/text-heuristics.js";

export type ExtractedDate = {
  value: string;
  confidence: number;
  line: string;
};

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

const ISO_PATTERN = /\b(\d{4})[-/](\d{1,2})[-/](\d{1,2})\b/;
const MONTH_NAME_PATTERN =
  /\b(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?\s+(\d{1,2}),?\s+(\d{4})\b/i;
const NUMERIC_LONG_YEAR_PATTERN = /\b(\d{1,2})[-/](\d{1,2})[-/](\d{4})\b/;
const NUMERIC_SHORT_YEAR_PATTERN = /\b(\d{1,2})[-/](\d{1,2})[-/](\d{2})\b/;

type DateParts = { year: number; month: number; day: number };
type DateReader = (line: string) => DateParts | null;

const READERS: DateReader[] = [
  (line) => {
    const match = line.match(ISO_PATTERN);
    return match ? validParts(toInt(match[1]), toInt(match[2]), toInt(match[3])) : null;
  },
  (line) => {
    const match = line.match(MONTH_NAME_PATTERN);
    if (!match) {
      return null;
    }
    const month = MONTHS.indexOf((match[1] ?? "").toLowerCase()) + 1;
    return validParts(toInt(match[3]), month, toInt(match[2]));
  },
  (line) => readNumeric(line.match(NUMERIC_LONG_YEAR_PATTERN)),
  (line) => readNumeric(line.match(NUMERIC_SHORT_YEAR_PATTERN)),
];

/**
 * Finds the first line holding a recognizable calendar date.
 *
 * Ambiguous numeric dates such as 03/04/2024 are read month-first; the
 * day-first reading is only used when the month-first one is impossible.
 */
export function extractDate(lines: readonly string[]): ExtractedDate | null {
  for (const line of lines) {
    for (const read of READERS) {
      const parts = read(line);
      if (parts) {
        return {
          value: formatIsoDate(parts),
          confidence: hasDateKeyword(line) ? 0.9 : 0.7,
          line,
        };
      }
    }
  }
  return null;
}

const TWELVE_HOUR_PATTERN = /\b(\d{1,2}):(\d{2})\s*(am|pm)\b/i;
const TWENTY_FOUR_HOUR_PATTERN = /\b([01]?\d|2[0-3]):([0-5]\d)\b(?![\d/])/;

export function extractTime(text: string): string | null {
  const twelveHour = text.match(TWELVE_HOUR_PATTERN);
  if (twelveHour) {
    const hour = toInt(twelveHour[1]);
    const minute = toInt(twelveHour[2]);
    if (hour >= 1 && hour <= 12 && minute <= 59) {
      return twelveHour[0];
    }
  }

  const twentyFourHour = text.match(TWENTY_FOUR_HOUR_PATTERN);
  return twentyFourHour ? twentyFourHour[0] : null;
}

export function formatIsoDate(parts: DateParts): string {
  const month = String(parts.month).padStart(2, "0");
  const day = String(parts.day).padStart(2, "0");
  return `${String(parts.year).padStart(4, "0")}-${month}-${day}`;
}

export function localIsoDate(date: Date): string {
  return formatIsoDate({
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  });
}

function readNumeric(match: RegExpMatchArray | null): DateParts | null {
  if (!match) {
    return null;
  }

  const first = toInt(match[1]);
  const second = toInt(match[2]);
  let year = toInt(match[3]);
  if (year < 100) {
    year += year < 50 ? 2000 : 1900;
  }

  return validParts(year, first, second) ?? validParts(year, second, first);
}

function validParts(year: number, month: number, day: number): DateParts | null {
  if (![year, month, day].every(Number.isInteger)) {
    return null;
  }
  if (year < 1900 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= lastDay ? { year, month, day } : null;
}

function toInt(value: string | undefined): number {
  return value === undefined ? Number.NaN : Number.parseInt(value, 10);
}
