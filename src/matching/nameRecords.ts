/**
 * Builds NameRecords from caller-supplied rows.
 *
 * Rows are plain objects (parsed CSV lines, JSON bodies); the caller names the
 * field that holds the person's name.
 */

import { normalizeName } from './normalizeName';
import { InvalidInputError } from './errors';
import type { DatasetKind, NameRecord } from './types';

export type RawRow = Record<string, unknown>;

function isRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the name field of a row as a string.
 * Missing values become "", numbers and booleans are stringified.
 */
function readName(value: unknown, dataset: DatasetKind, rowNumber: number, field: string): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  throw new InvalidInputError(
    `${dataset} row ${rowNumber}: field "${field}" must be text, received ${typeof value}`
  );
}

/**
 * Creates one NameRecord per row, in row order.
 *
 * @throws InvalidInputError if `rows` is not a list of objects or a row lacks `nameField`
 *
 * @example
 * buildNameRecords([{ StudentName: 'Dr. Meera Rao' }], 'StudentName', 'total')
 * // Returns: [{ original: 'Dr. Meera Rao', normalized: 'meera rao', sourceIndex: 0 }]
 */
export function buildNameRecords(
  rows: unknown,
  nameField: string,
  dataset: DatasetKind
): NameRecord[] {
  if (!Array.isArray(rows)) {
    throw new InvalidInputError(`${dataset} dataset must be a list of records`);
  }

  if (!nameField) {
    throw new InvalidInputError(`${dataset} dataset: name field must be specified`);
  }

  return rows.map((row: unknown, index) => {
    const rowNumber = index + 1;

    if (!isRow(row)) {
      throw new InvalidInputError(`${dataset} row ${rowNumber}: expected a record`);
    }

    if (!Object.prototype.hasOwnProperty.call(row, nameField)) {
      throw new InvalidInputError(`${dataset} row ${rowNumber}: missing field "${nameField}"`);
    }

    const original = readName(row[nameField], dataset, rowNumber, nameField);

    return {
      original,
      normalized: normalizeName(original),
      sourceIndex: index,
    };
  });
}

/**
 * Creates NameRecords straight from name strings.
 */
export function fromNames(names: readonly string[]): NameRecord[] {
  return names.map((original, sourceIndex) => ({
    original,
    normalized: normalizeName(original),
    sourceIndex,
  }));
}

export default buildNameRecords;
