import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '@funnelreport/shared';

export interface RequestWithStartTime extends Request {
  startTime?: number;
}

// Request logger middleware
export const requestLogger = (req: RequestWithStartTime, res: Response, next: NextFunction) => {
  req.startTime = Date.now();

  const requestId = req.get('x-request-id') ?? `req_${uuidv4()}`;
  req.headers['x-request-id'] = requestId;
  res.setHeader('x-request-id', requestId);

  logger.debug('Incoming Request', {
    requestId,
    method: req.method,
    url: req.url,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
    contentType: req.get('Content-Type'),
    contentLength: req.get('Content-Length'),
  });

  res.on('finish', () => {
    const duration = Date.now() - (req.startTime ?? Date.now());

    const logData = {
      requestId,
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      ip: req.ip,
    };

    if (res.statusCode >= 500) {
      logger.error('Server Error Response', logData);
    } else if (res.statusCode >= 400) {
      logger.warn('Client Error Response', logData);
    } else {
      logger.info('Success Response', logData);
    }
  });

  next();
};

// Skip logging for health checks and metrics scrapes
export const skipLogger = (paths: string[]) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const shouldSkip = paths.some((path) =>
      path.endsWith('/*') ? req.path.startsWith(path.slice(0, -1)) : req.path === path
    );

    if (shouldSkip) {
      return next();
    }

    return requestLogger(req, res, next);
  };
};
