// =====================================================
// Zod Validation Middleware
// =====================================================
// Validates request body, query params, or URL params at the boundary.
// Controllers only ever see parsed data.

import { Request, Response, NextFunction } from 'express';
import { ZodSchema, z } from 'zod';
import { ERROR_CODES } from '@triviaduel/shared-types';
import { ValidationError } from '../utils/errors';

export type ValidatedRequestProperty = 'body' | 'query' | 'params';

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * @example
 * router.get('/:matchId', validateRequest(matchIdParamsSchema, 'params'), getMatch);
 */
export function validateRequest<T extends ZodSchema>(schema: T, property: ValidatedRequestProperty = 'body') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[property]);

    if (!result.success) {
      const errors = formatZodErrors(result.error);
      next(
        new ValidationError(
          `Validation failed: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`,
          ERROR_CODES.VALIDATION_ERROR
        )
      );
      return;
    }

    // Keep zod transforms (defaults, trimming)
    req[property] = result.data;
    next();
  };
}

function formatZodErrors(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((err) => ({
    field: err.path.join('.') || 'unknown',
    message: err.message,
  }));
}
