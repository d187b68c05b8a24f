import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { createLogger } from '../services/logger.js';

const logger = createLogger('Validation');

export interface ValidationIssue {
  field: string;
  message: string;
}

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = toValidationIssues(error);
        logger.warn('Validation failed', { path: req.path, requestId: req.id, issues });
        res.status(400).json({
          error: 'Validation failed',
          issues,
        });
        return;
      }
      next(error);
    }
  };
}
