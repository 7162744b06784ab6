import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils';

// Hit every few seconds by uptime checks; logging them would drown the message log
const QUIET_PATHS = ['/api/health'];

export function isQuietPath(url: string): boolean {
  const pathname = url.split('?')[0];
  return QUIET_PATHS.includes(pathname);
}

/**
 * Logs completed requests to the status surface, health checks excepted unless they fail
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    if (isQuietPath(req.originalUrl) && res.statusCode < 500) {
      return;
    }

    logger.info('Status request', {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime
    });
  });

  next();
}
