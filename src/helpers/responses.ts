import { Response } from 'express';
import winston from 'winston';
import { ErrorResponse } from '../types/response';
import { HttpError } from './errors';

export const createErrorResponse = (error: string): ErrorResponse => ({
  success: false,
  error,
});

/**
 * Writes the `{ success: false, error }` body for a failed request.
 * Client errors keep their message; anything unexpected becomes a logged 500.
 */
export const sendError = (res: Response, err: unknown, logger: winston.Logger): Response => {
  if (err instanceof HttpError) {
    if (err.status >= 500) {
      logger.error(`${err.name}: ${err.message}`);
    } else {
      logger.debug(`Rejected request: ${err.message}`);
    }
    return res.status(err.status).json(createErrorResponse(err.message));
  }

  const message = err instanceof Error ? err.message : String(err);
  logger.error(`Unexpected error while handling request: ${message}`);
  if (err instanceof Error && err.stack) {
    logger.debug(err.stack);
  }

  return res.status(500).json(createErrorResponse(`Internal server error: ${message}`));
};
