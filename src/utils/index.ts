export { default as logger, Logging } from './logger';
export { sendSuccess, sendError, sendCsv } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
export {
  parseCsvFile,
  toCsv,
  resolveNameColumn,
  buildAbsenteeFilename,
  NAME_COLUMN_CANDIDATES,
} from './csv';
export type { ParsedCsv, CsvRow, NameColumnResolution } from './csv';
