/**
 * Attendance API Routes
 *
 * Endpoints for reconciling a roster against a sign-in list.
 * These routes handle HTTP concerns only - business logic is delegated to services.
 *
 * Endpoints:
 * - POST /reconcile - Upload roster + sign-in CSVs, get the match report
 * - POST /absentees - Upload roster + sign-in CSVs, download absentees as CSV
 * - POST /reconcile/json - Reconcile records sent as JSON
 */

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { resolve } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { rm } from 'fs/promises';
import { z } from 'zod';
import { env } from '../config';
import { asyncHandler, sendSuccess, sendCsv, AppError, Logging, logger } from '../utils';
import { buildAbsenteeFilename } from '../utils/csv';
import { validateRequest, commonSchemas } from '../middlewares/validateRequest';
import { reconcileFiles, reconcileDatasets, buildAbsenteeCsv } from '../services/attendance.service';
import type { ReconcileOptions } from '../services/attendance.service';

const router = Router();

// ============================================
// Multer Configuration
// ============================================

// Ensure uploads directory exists
const UPLOADS_DIR = resolve(process.cwd(), env.UPLOADS_DIR);
if (!existsSync(UPLOADS_DIR)) {
  mkdirSync(UPLOADS_DIR, { recursive: true });
}

export const TOTAL_FILE_FIELD = 'total_file';
export const PRESENT_FILE_FIELD = 'present_file';

/**
 * Multer storage configuration
 * Files live on disk only while the request is being handled
 */
const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    cb(null, UPLOADS_DIR);
  },
  filename: (_req, file, cb) => {
    const uniqueSuffix = `${Date.now()}-${Math.round(Math.random() * 1e9)}`;
    cb(null, `${file.fieldname}_${uniqueSuffix}.csv`);
  },
});

/**
 * File filter to only accept CSV files
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const allowedMimeTypes = ['text/csv', 'application/csv', 'text/plain'];

  const mimeTypeOk = allowedMimeTypes.includes(file.mimetype);
  const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

  if (mimeTypeOk || extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.badRequest(`Only CSV files are allowed (${file.fieldname})`));
  }
};

/**
 * Multer upload middleware
 * - One roster file and one sign-in file
 * - Max file size from MAX_UPLOAD_SIZE_MB
 * - CSV files only
 */
const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: env.MAX_UPLOAD_SIZE_MB * 1024 * 1024,
    files: 2,
  },
}).fields([
  { name: TOTAL_FILE_FIELD, maxCount: 1 },
  { name: PRESENT_FILE_FIELD, maxCount: 1 },
]);

/**
 * Deletes the uploaded files once the response is done, whatever the outcome
 */
const removeUploadsAfterResponse = (req: Request, res: Response, next: NextFunction): void => {
  res.on('close', () => {
    const files = req.files && !Array.isArray(req.files) ? Object.values(req.files).flat() : [];

    for (const file of files) {
      void rm(file.path, { force: true }).catch((error: unknown) => {
        logger.warn(`Could not remove upload ${file.path}: ${String(error)}`);
      });
    }
  });
  next();
};

/**
 * Returns the single file uploaded under a field
 */
const requireFile = (req: Request, field: string): Express.Multer.File => {
  const file = req.files && !Array.isArray(req.files) ? req.files[field]?.[0] : undefined;

  if (!file) {
    throw AppError.badRequest(
      `No file uploaded for "${field}". Please upload both ${TOTAL_FILE_FIELD} and ${PRESENT_FILE_FIELD}.`
    );
  }
  return file;
};

// ============================================
// Validation Schemas
// ============================================

const uploadOptionsSchema = z.object({
  totalColumn: commonSchemas.column,
  presentColumn: commonSchemas.column,
  fuzzyCutoff: commonSchemas.cutoff,
  tokenCutoff: commonSchemas.cutoff,
});

const jsonBodySchema = z.object({
  total: z.array(z.record(z.unknown())),
  present: z.array(z.record(z.unknown())),
  totalField: z.string().trim().min(1).default('name'),
  presentField: z.string().trim().min(1).default('name'),
  fuzzyCutoff: z.number().optional(),
  tokenCutoff: z.number().optional(),
});

type JsonBody = z.infer<typeof jsonBodySchema>;

const uploadPipeline: RequestHandler[] = [
  upload,
  removeUploadsAfterResponse,
  validateRequest({ body: uploadOptionsSchema }),
];

/**
 * Validates the uploads and runs the reconciliation
 */
const reconcileUpload = async (req: Request) => {
  const totalFile = requireFile(req, TOTAL_FILE_FIELD);
  const presentFile = requireFile(req, PRESENT_FILE_FIELD);
  const options: ReconcileOptions = req.body;

  Logging.info(`📥 Reconciling "${presentFile.originalname}" against "${totalFile.originalname}"`);

  const result = await reconcileFiles(
    { totalPath: totalFile.path, presentPath: presentFile.path },
    options
  );

  return { result, presentFile };
};

// ============================================
// Routes
// ============================================

/**
 * @route   POST /api/v1/attendance/reconcile
 * @desc    Match the sign-in list against the roster
 * @access  Public
 *
 * Request:
 * - Content-Type: multipart/form-data
 * - Files: "total_file" (roster CSV), "present_file" (sign-in CSV)
 * - Fields (optional): totalColumn, presentColumn, fuzzyCutoff, tokenCutoff
 *
 * Response:
 * - 200 OK: { columns, thresholds, report }
 * - 400 Bad Request: Missing/invalid file, unknown column, cutoff outside [0, 1]
 */
router.post(
  '/reconcile',
  ...uploadPipeline,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { result } = await reconcileUpload(req);
    const { counts } = result.report;

    sendSuccess(
      res,
      {
        columns: {
          total: result.columns.total.column,
          present: result.columns.present.column,
        },
        thresholds: result.thresholds,
        report: result.report,
      },
      `${counts.absent} of ${counts.total} students absent`
    );
  })
);

/**
 * @route   POST /api/v1/attendance/absentees
 * @desc    Download the absent roster rows as CSV
 * @access  Public
 *
 * Request: same as /reconcile
 *
 * Response:
 * - 200 OK: text/csv attachment "absentees_<sign-in file name>.csv"
 * - 400 Bad Request: Missing/invalid file, unknown column, cutoff outside [0, 1]
 */
router.post(
  '/absentees',
  ...uploadPipeline,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { result, presentFile } = await reconcileUpload(req);
    const filename = buildAbsenteeFilename(presentFile.originalname);

    Logging.success(`📤 Sending ${result.report.counts.absent} absentees as ${filename}`);

    sendCsv(res, filename, buildAbsenteeCsv(result));
  })
);

/**
 * @route   POST /api/v1/attendance/reconcile/json
 * @desc    Reconcile records sent as JSON
 * @access  Public
 *
 * Request body:
 * - total: object[] (roster records)
 * - present: object[] (sign-in records)
 * - totalField / presentField: string (name field, default "name")
 * - fuzzyCutoff / tokenCutoff: number (optional)
 *
 * Response:
 * - 200 OK: { thresholds, report }
 * - 400 Bad Request: Malformed body, missing name field, cutoff outside [0, 1]
 */
router.post(
  '/reconcile/json',
  validateRequest({ body: jsonBodySchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body: JsonBody = req.body;

    const result = reconcileDatasets(
      body.total,
      body.present,
      {
        total: { column: body.totalField, source: 'requested' },
        present: { column: body.presentField, source: 'requested' },
      },
      { fuzzyCutoff: body.fuzzyCutoff, tokenCutoff: body.tokenCutoff }
    );
    const { counts } = result.report;

    sendSuccess(
      res,
      { thresholds: result.thresholds, report: result.report },
      `${counts.absent} of ${counts.total} students absent`
    );
  })
);

export default router;
