/**
 * Attendance Service for Attendance Reconciliation
 *
 * Orchestrates a reconciliation run between the HTTP layer and the matching
 * engine:
 * - Reading the uploaded roster and sign-in CSV files
 * - Resolving which column holds the names
 * - Applying service-wide cutoff defaults
 * - Building the absentee CSV
 *
 * Nothing is stored between runs; every request gets a fresh report.
 */

import { env } from '../config';
import { logger } from '../utils';
import { parseCsvFile, resolveNameColumn, toCsv } from '../utils/csv';
import type { CsvRow, NameColumnResolution, ParsedCsv } from '../utils/csv';
import { reconcileRecords, resolveThresholds } from '../matching';
import type { MatchReport, Thresholds } from '../matching';

// ============================================
// Types
// ============================================

export interface ReconcileOptions extends Partial<Thresholds> {
  /** Name column of the roster file (auto-detected when omitted) */
  totalColumn?: string;
  /** Name column of the sign-in file (auto-detected when omitted) */
  presentColumn?: string;
}

export interface UploadedFiles {
  totalPath: string;
  presentPath: string;
}

export interface AttendanceResult {
  report: MatchReport;
  columns: {
    total: NameColumnResolution;
    present: NameColumnResolution;
  };
  thresholds: Thresholds;
}

export interface FileAttendanceResult extends AttendanceResult {
  /** Parsed roster, kept to write absentee rows with all their columns */
  total: ParsedCsv;
}

// ============================================
// Defaults
// ============================================

/**
 * Cutoffs configured for this service instance.
 */
export function getDefaultThresholds(): Thresholds {
  return {
    fuzzyCutoff: env.FUZZY_CUTOFF,
    tokenCutoff: env.TOKEN_CUTOFF,
  };
}

function logSummary(label: string, report: MatchReport): void {
  const { counts } = report;
  logger.info(
    `📋 ${label}: ${counts.matched}/${counts.present} sign-ins matched ` +
      `(exact ${counts.byStage.exact}, token ${counts.byStage.token}, ` +
      `fuzzy ${counts.byStage.fuzzy}, close ${counts.byStage.closeMatch}); ` +
      `${counts.absent}/${counts.total} absent, ${counts.unmatchedPresent} unmatched sign-ins`
  );
}

function warnOnGuessedColumn(dataset: string, resolution: NameColumnResolution): void {
  if (resolution.source === 'first-column') {
    logger.warn(
      `No name column recognised in ${dataset} file, using first column "${resolution.column}"`
    );
  }
}

// ============================================
// Reconciliation
// ============================================

/**
 * Reconciles already-parsed rows.
 *
 * @param totalRows - Roster rows
 * @param presentRows - Sign-in rows
 * @param columns - Resolved name column of each dataset
 * @param options - Cutoff overrides
 */
export function reconcileDatasets(
  totalRows: unknown,
  presentRows: unknown,
  columns: AttendanceResult['columns'],
  options: Partial<Thresholds> = {}
): AttendanceResult {
  const thresholds = resolveThresholds(
    { fuzzyCutoff: options.fuzzyCutoff, tokenCutoff: options.tokenCutoff },
    getDefaultThresholds()
  );

  const report = reconcileRecords(totalRows, presentRows, {
    totalField: columns.total.column,
    presentField: columns.present.column,
    ...thresholds,
  });

  logSummary('Reconciliation complete', report);

  return { report, columns, thresholds };
}

/**
 * Reads both uploaded CSV files and reconciles them.
 *
 * @throws InvalidInputError when a file has no header row or a requested column is missing
 * @throws InvalidConfigurationError when a cutoff is outside [0, 1]
 */
export async function reconcileFiles(
  files: UploadedFiles,
  options: ReconcileOptions = {}
): Promise<FileAttendanceResult> {
  const [total, present] = await Promise.all([
    parseCsvFile(files.totalPath),
    parseCsvFile(files.presentPath),
  ]);

  logger.debug(`Parsed ${total.rows.length} roster rows and ${present.rows.length} sign-in rows`);

  const columns = {
    total: resolveNameColumn(total.headers, options.totalColumn),
    present: resolveNameColumn(present.headers, options.presentColumn),
  };
  warnOnGuessedColumn('roster', columns.total);
  warnOnGuessedColumn('sign-in', columns.present);

  const result = reconcileDatasets(total.rows, present.rows, columns, options);

  return { ...result, total };
}

// ============================================
// Output
// ============================================

/**
 * Absent roster rows, every original column kept, in roster order.
 */
export function getAbsenteeRows(result: FileAttendanceResult): CsvRow[] {
  return result.report.unmatchedTotal.map((record) => result.total.rows[record.sourceIndex]);
}

/**
 * Serializes the absentee rows under the roster's original headers.
 */
export function buildAbsenteeCsv(result: FileAttendanceResult): string {
  return toCsv(result.total.headers, getAbsenteeRows(result));
}

export const attendanceService = {
  getDefaultThresholds,
  reconcileDatasets,
  reconcileFiles,
  getAbsenteeRows,
  buildAbsenteeCsv,
};

export default attendanceService;
