/**
 * CSV Utilities for Attendance Reconciliation
 *
 * Reads uploaded roster / sign-in files and writes the absentee list.
 *
 * Key features:
 * - Stream-based parsing using csv-parser
 * - Name column detection from conventional header names
 * - CSV output using csv-stringify
 */

import { createReadStream } from 'fs';
import { parse as parsePath } from 'path';
import csvParser from 'csv-parser';
import { stringify } from 'csv-stringify/sync';
import { InvalidInputError } from '../matching';

// ============================================
// Types
// ============================================

/**
 * A parsed CSV line, keyed by header
 */
export type CsvRow = Record<string, string>;

export interface ParsedCsv {
  headers: string[];
  rows: CsvRow[];
}

export interface NameColumnResolution {
  column: string;
  /** How the column was chosen */
  source: 'requested' | 'conventional' | 'first-column';
}

/**
 * Header spellings treated as the name column, in order of preference.
 * Compared after lowercasing and dropping everything but letters and digits,
 * so "Student Name", "student_name" and "StudentName" are all one entry.
 */
export const NAME_COLUMN_CANDIDATES = ['studentname', 'name', 'fullname'] as const;

const headerKey = (header: string): string => header.toLowerCase().replace(/[^a-z0-9]/g, '');

// ============================================
// Parsing
// ============================================

/**
 * Parses a CSV file into header-keyed rows.
 * Headers are trimmed and a leading byte order mark is removed. Every row
 * carries every header: cells missing from a short row read as "".
 *
 * @throws InvalidInputError when two columns share a header
 *
 * @example
 * const { headers, rows } = await parseCsvFile('/tmp/uploads/total.csv');
 * // headers: ['StudentName', 'Roll'], rows: [{ StudentName: 'Alice Kumar', Roll: '1' }]
 */
export async function parseCsvFile(filePath: string): Promise<ParsedCsv> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: CsvRow[] = [];

    const parser = csvParser({
      mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
    });

    const source = createReadStream(filePath);

    source
      .on('error', reject)
      .pipe(parser)
      .on('headers', (parsedHeaders: string[]) => {
        const duplicate = findDuplicateHeader(parsedHeaders);
        if (duplicate !== undefined) {
          reject(new InvalidInputError(`Duplicate column "${duplicate}" in CSV header`));
          source.destroy();
          parser.destroy();
          return;
        }
        headers = parsedHeaders;
      })
      .on('data', (row: CsvRow) => {
        rows.push(fillMissingCells(headers, row));
      })
      .on('error', reject)
      .on('end', () => {
        resolve({ headers, rows });
      });
  });
}

// Blank headers from trailing commas may repeat
function findDuplicateHeader(headers: string[]): string | undefined {
  const seen = new Set<string>();
  return headers.find((header) => {
    if (!header) return false;
    if (seen.has(header)) return true;
    seen.add(header);
    return false;
  });
}

function fillMissingCells(headers: string[], row: CsvRow): CsvRow {
  const filled: CsvRow = {};
  for (const header of headers) {
    filled[header] = row[header] ?? '';
  }
  return filled;
}

// ============================================
// Column detection
// ============================================

/**
 * Decides which column holds the names.
 *
 * 1. A requested column wins (exact header, then case-insensitive)
 * 2. Otherwise the first conventional name header (see NAME_COLUMN_CANDIDATES)
 * 3. Otherwise the first column
 *
 * @throws InvalidInputError when the file has no headers or the requested column is missing
 *
 * @example
 * resolveNameColumn(['Roll', 'Full Name']) // { column: 'Full Name', source: 'conventional' }
 * resolveNameColumn(['Roll', 'Student'], 'student') // { column: 'Student', source: 'requested' }
 */
export function resolveNameColumn(headers: string[], requested?: string): NameColumnResolution {
  if (headers.length === 0) {
    throw new InvalidInputError('CSV file has no header row');
  }

  if (requested) {
    const column =
      headers.find((header) => header === requested) ??
      headers.find((header) => header.toLowerCase() === requested.toLowerCase());

    if (!column) {
      throw new InvalidInputError(
        `Column "${requested}" not found. Available columns: ${headers.join(', ')}`
      );
    }
    return { column, source: 'requested' };
  }

  for (const candidate of NAME_COLUMN_CANDIDATES) {
    const column = headers.find((header) => headerKey(header) === candidate);
    if (column) {
      return { column, source: 'conventional' };
    }
  }

  return { column: headers[0], source: 'first-column' };
}

// ============================================
// Output
// ============================================

/**
 * Serializes rows under the given headers (header line included).
 *
 * @example
 * toCsv(['StudentName'], [{ StudentName: 'Bob Singh' }]) // "StudentName\nBob Singh\n"
 */
export function toCsv(headers: string[], rows: CsvRow[]): string {
  const lines = rows.map((row) => headers.map((header) => row[header] ?? ''));
  return stringify([headers, ...lines]);
}

/**
 * Builds the download name of the absentee list from the sign-in file name.
 *
 * @example
 * buildAbsenteeFilename('Day 1 (morning).csv') // "absentees_Day_1_morning.csv"
 * buildAbsenteeFilename(undefined) // "absentees.csv"
 */
export function buildAbsenteeFilename(presentFilename?: string): string {
  const base = presentFilename
    ? parsePath(presentFilename)
        .name.replace(/[^A-Za-z0-9_-]+/g, '_')
        .replace(/^_+|_+$/g, '')
    : '';

  return base ? `absentees_${base}.csv` : 'absentees.csv';
}

export default {
  parseCsvFile,
  resolveNameColumn,
  toCsv,
  buildAbsenteeFilename,
};
