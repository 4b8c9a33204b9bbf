/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - VALIDATION MIDDLEWARE
 * ============================================================================
 *
 * Path and query parameter checks. Request bodies are validated by the
 * patient gateway itself so that the same rules apply to every caller.
 */

import type { Request, Response, NextFunction } from 'express';
import { param, query, validationResult } from 'express-validator';
import { ValidationError } from './errorHandler';
import logger from '../config/logger';
import type { FieldError } from '../types';

/**
 * Validation result handler
 */
export function handleValidationErrors() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = validationResult(req);

    if (result.isEmpty()) {
      next();
      return;
    }

    const fieldErrors: FieldError[] = result.array().map((error) => ({
      field: error.type === 'field' ? error.path : error.type,
      message: String(error.msg),
    }));

    logger.warn('Parameter validation failed', {
      errors: fieldErrors,
      path: req.path,
      method: req.method,
    });

    next(new ValidationError('Validation failed', fieldErrors));
  };
}

const nonBlank = (value: unknown): boolean => typeof value === 'string' && value.trim().length > 0;

/**
 * Parameter rules for the patient routes
 */
export const patientValidations = {
  id: [
    param('id')
      .custom(nonBlank)
      .withMessage('Patient id is required'),
  ],

  list: [
    query('count')
      .optional()
      .custom((value) => typeof value === 'string')
      .withMessage('Count must be a non-negative integer')
      .bail()
      .isInt({ min: 0 })
      .withMessage('Count must be a non-negative integer'),
  ],

  searchByName: [
    query('name')
      .custom(nonBlank)
      .withMessage('Search name is required'),
  ],

  searchByIdentifier: [
    query('system')
      .custom(nonBlank)
      .withMessage('Identifier system is required'),
    query('value')
      .custom(nonBlank)
      .withMessage('Identifier value is required'),
  ],
};
