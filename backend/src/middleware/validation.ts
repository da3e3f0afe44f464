/**
 * Validation Middleware
 * Provides Zod-based request validation with comprehensive error handling
 */

import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodSchema } from 'zod';
import { logger } from '../config/logger';
import '../types/auth.types';

/**
 * Chat send request validation schema
 */
export const sendMessageSchema = z.object({
  message: z.string().trim().min(1).max(10000).describe('Natural language question'),
  session_id: z.string().min(1).max(100).optional().nullable().describe('Existing session identifier'),
  stream: z.boolean().optional().default(false).describe('Stream progress as server-sent events')
});

export type SendMessageRequest = z.infer<typeof sendMessageSchema>;

/**
 * Session rename validation schema
 */
export const renameSessionSchema = z.object({
  title: z.string().trim().min(1).max(200)
});

export type RenameSessionRequest = z.infer<typeof renameSessionSchema>;

/**
 * Google id token login schema
 */
export const loginSchema = z.object({
  id_token: z.string().min(1)
});

export type LoginRequest = z.infer<typeof loginSchema>;

/**
 * Query parameter validation schemas
 */
export const exportQuerySchema = z.object({
  format: z
    .string()
    .toLowerCase()
    .pipe(z.enum(['json', 'csv', 'txt'], {
      errorMap: () => ({ message: 'Unsupported format. Use json, csv or txt' })
    }))
    .optional()
    .default('json')
});

export const cleanupQuerySchema = z.object({
  days_old: z.coerce.number().int().min(0).max(3650).optional().default(30)
});

export const devLoginQuerySchema = z.object({
  user_id: z.string().min(1).max(100).optional().default('dev_user')
});

/**
 * Validation error response
 */
interface ValidationErrorResponse {
  success: false;
  error: 'Validation Error';
  message: string;
  details: Array<{
    field: string;
    message: string;
    code?: string;
  }>;
  requestId?: string;
}

/**
 * Format Zod validation errors for API response
 */
export function formatZodErrors(error: ZodError): ValidationErrorResponse['details'] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code
  }));
}

function sendValidationError(req: Request, res: Response, error: ZodError, message: string) {
  const validationError: ValidationErrorResponse = {
    success: false,
    error: 'Validation Error',
    message,
    details: formatZodErrors(error),
    requestId: req.id
  };

  logger.warn('Request validation failed', {
    endpoint: req.path,
    method: req.method,
    errors: validationError.details
  });

  return res.status(400).json(validationError);
}

/**
 * Generic body validation middleware factory
 */
export function validate<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      return sendValidationError(req, res, result.error, 'Request validation failed');
    }

    // Attach validated data to request
    req.body = result.data;

    logger.debug('Request validation successful', {
      endpoint: req.path,
      method: req.method
    });

    next();
  };
}

/**
 * Validate query parameters; handlers re-read them with the same schema
 */
export function validateQueryParams<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      return sendValidationError(req, res, result.error, 'Query parameter validation failed');
    }
    next();
  };
}

export const validateSendMessage = validate(sendMessageSchema);
export const validateRenameSession = validate(renameSessionSchema);
export const validateLogin = validate(loginSchema);
