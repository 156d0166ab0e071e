import { NextFunction, Request, Response } from 'express';
import { HttpError } from '../helpers/errors';
import { createErrorResponse, sendError } from '../helpers/responses';
import logger from '../logger';

export const notFound = (req: Request, res: Response) => {
  logger.debug(`No route for ${req.method} ${req.path}`);
  res.status(404).json(createErrorResponse('Not found'));
};

/**
 * Last middleware in the chain. body-parser errors carry their own 4xx
 * status; everything else is reported as a 500.
 */
export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    const message =
      err.status === 413 ? 'Request body exceeds the maximum size' : `Invalid request: ${err.message}`;
    return sendError(res, new HttpError(message, err.status), logger);
  }

  return sendError(res, err, logger);
};
