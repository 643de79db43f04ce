import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodSchema } from 'zod';
import { AppError } from '../utils';

interface ValidationSchemas {
  body?: ZodSchema;
  query?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Middleware to validate request body, query, and params using Zod schemas
 */
export const validateRequest = (schemas: ValidationSchemas) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body);
      }
      if (schemas.query) {
        req.query = await schemas.query.parseAsync(req.query);
      }
      if (schemas.params) {
        req.params = await schemas.params.parseAsync(req.params);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const errorMessages = error.errors.map((err) => ({
          field: err.path.join('.'),
          message: err.message,
        }));
        next(AppError.badRequest(`Validation failed: ${JSON.stringify(errorMessages)}`));
      } else {
        next(error);
      }
    }
  };
};

// Blank form fields count as absent
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

// Common validation schemas
export const commonSchemas = {
  cutoff: z.preprocess(
    blankToUndefined,
    z.coerce.number({ invalid_type_error: 'must be a number' }).optional()
  ),
  column: z.preprocess(blankToUndefined, z.string().trim().min(1).optional()),
};

export default validateRequest;
