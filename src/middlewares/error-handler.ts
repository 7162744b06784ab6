import { Request, Response, NextFunction } from 'express';
import { errorMessage, logger } from '../utils';

/**
 * HTTP status carried by an error raised inside express (body-parser sets `status`), 500 otherwise
 */
export function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number' && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

export function notFound(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: `No route for ${req.method} ${req.path}; try GET /api/health`
  });
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const statusCode = errorStatus(error);

  if (statusCode >= 500) {
    logger.error('Status surface error', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
      url: req.originalUrl
    });
  }

  res.status(statusCode).json({
    success: false,
    error: statusCode >= 500 ? 'Internal server error' : errorMessage(error)
  });
}
