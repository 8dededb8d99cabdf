/**
 * Tag CSV rows
 *
 * Expected columns: CAUSE,JOURNEY_NUM,DEP_DATE. The header line is optional.
 */

import { parseCsvRecords } from '@journey-extractor/shared';

export const TAG_HEADER = ['CAUSE', 'JOURNEY_NUM', 'DEP_DATE'];

export interface TagRow {
  /** 1-based position among the file's non-blank records */
  position: number;
  cause: string;
  journeyNum: string;
  depDate: string;
}

export interface ParsedTagFile {
  hasHeader: boolean;
  rows: TagRow[];
}

function isHeader(record: string[]): boolean {
  return TAG_HEADER.every((name, index) => record[index]?.trim().toUpperCase() === name);
}

export function parseTagRows(content: string): ParsedTagFile {
  const records = parseCsvRecords(content);
  const hasHeader = records.length > 0 && isHeader(records[0] ?? []);

  const rows = records.slice(hasHeader ? 1 : 0).map((record, index) => ({
    position: index + (hasHeader ? 2 : 1),
    cause: (record[0] ?? '').trim(),
    journeyNum: (record[1] ?? '').trim(),
    depDate: (record[2] ?? '').trim(),
  }));

  return { hasHeader, rows };
}

/** Causes in first-seen order, without duplicates or blanks */
export function uniqueCauses(rows: TagRow[]): string[] {
  return Array.from(new Set(rows.map((row) => row.cause).filter((cause) => cause !== '')));
}

const DATE_FORMATS: Array<{ pattern: RegExp; year: number; month: number; day: number }> = [
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, year: 1, month: 2, day: 3 },
  { pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, year: 1, month: 2, day: 3 },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, year: 3, month: 2, day: 1 },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, year: 3, month: 2, day: 1 },
];

/**
 * Normalize a departure date to YYYY-MM-DD. Accepts YYYY-MM-DD, YYYY/MM/DD,
 * DD-MM-YYYY and DD/MM/YYYY; returns null for anything else, including
 * impossible calendar dates.
 */
export function normalizeDepartureDate(value: string): string | null {
  const trimmed = value.trim();

  for (const format of DATE_FORMATS) {
    const match = format.pattern.exec(trimmed);
    if (!match) {
      continue;
    }

    const year = Number(match[format.year]);
    const month = Number(match[format.month]);
    const day = Number(match[format.day]);

    const date = new Date(Date.UTC(year, month - 1, day));
    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day
    ) {
      return null;
    }

    return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  }

  return null;
}
