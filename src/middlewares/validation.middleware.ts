// src/middlewares/validation.middleware.ts
import { Request, Response, NextFunction } from 'express';
import { body, validationResult } from 'express-validator';
import { PASTE_LIMITS } from '../config/limits';

/**
 * Handle validation errors from express-validator
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    const details: Record<string, string> = {};
    for (const error of errors.array()) {
      const field = error.type === 'field' ? error.path : error.type;
      details[field] ??= String(error.msg);
    }
    return res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details
      }
    });
  }

  next();
};

/**
 * Shape checks for paste creation. Size and TTL bounds are enforced by the
 * paste service so every caller gets the same rules.
 */
export const validatePasteCreation = [
  body('content')
    .exists()
    .withMessage('content is required')
    .bail()
    .isString()
    .withMessage('content must be a string'),

  body('expires_in_seconds')
    .optional()
    .isInt()
    .withMessage('expires_in_seconds must be an integer')
    .toInt(),

  body('content_type')
    .optional()
    .isString()
    .withMessage('content_type must be a string')
    .bail()
    .isLength({ max: PASTE_LIMITS.maxContentTypeLength })
    .withMessage(`content_type cannot exceed ${PASTE_LIMITS.maxContentTypeLength} characters`)
    .bail()
    .matches(/^[\x20-\x7e]*$/)
    .withMessage('content_type must be printable ASCII')
    .bail()
    .isMimeType()
    .withMessage('content_type must be a valid MIME type'),

  handleValidationErrors
];
