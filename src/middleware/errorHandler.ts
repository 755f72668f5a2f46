import { Request, Response, NextFunction } from 'express';
import { ReportingError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export class HttpError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  let statusCode = 500;
  let code = 'SERVER_ERROR';
  let message = 'Server Error';

  if (err instanceof HttpError) {
    statusCode = err.statusCode;
    code = err.code;
    message = err.message;
  } else if (err instanceof ReportingError) {
    statusCode = err.code === 'SOURCE_UNAVAILABLE' ? 503 : 500;
    code = err.code;
    message = err.message;
  } else {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, { error: err.message });
  }

  res.status(statusCode).json({
    success: false,
    error: { code, message },
  });
};
