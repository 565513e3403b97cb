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

// ============================================
// Reconciliation schemas
// ============================================

const identifier = z.string().trim().min(1, 'Required');

export const reconciliationSchemas = {
  score: z.object({
    invoiceId: identifier,
    poNumber: identifier,
  }),
  run: z.object({
    invoices: z
      .array(
        z.object({
          invoiceId: identifier,
          poNumber: identifier,
          vendorName: identifier,
        })
      )
      .min(1, 'At least one invoice is required')
      .max(1000, 'At most 1000 invoices per run'),
    minConf: z.number().min(0).max(1).optional(),
  }),
  runId: z.object({
    runId: z.string().uuid('Invalid run ID format'),
  }),
};

export type ScoreRequest = z.infer<typeof reconciliationSchemas.score>;
export type RunRequest = z.infer<typeof reconciliationSchemas.run>;

export default validateRequest;
