/**
 * Maps the error taxonomy onto HTTP responses
 */

import { Response } from 'express';
import {
  DatabaseNotConfiguredError,
  NotFoundError,
  ValidationError
} from '../errors';

export const GENERIC_ERROR_MESSAGE = 'An unexpected error occurred';

export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({
      success: false,
      error: error.message,
      field: error.field,
      constraint: error.constraint,
      bound: error.bound
    });
    return;
  }

  if (error instanceof NotFoundError) {
    res.status(404).json({ success: false, error: error.message });
    return;
  }

  if (error instanceof DatabaseNotConfiguredError) {
    res.status(503).json({ success: false, error: error.message });
    return;
  }

  // InternalCalculationError and anything unexpected: log, never expose detail
  console.error(`❌ ${context}:`, error);
  res.status(500).json({ success: false, error: GENERIC_ERROR_MESSAGE });
}
