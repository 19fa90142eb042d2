import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import { TelemetryValidationError } from '../services/telemetry/TelemetryValidationError';

/**
 * Centralized error handling middleware
 * Catches all errors and formats consistent responses
 */
const errorHandler = (
  err: Error & { statusCode?: number; type?: string },
  req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  if (err instanceof TelemetryValidationError) {
    logger.warn('Request validation failed', {
      path: req.path,
      method: req.method,
      error: err.message,
    });
    res.status(err.statusCode).json({
      error: 'Validation Error',
      details: err.issues,
    });
    return;
  }

  // express.json() body parse failures
  if (err.type === 'entity.parse.failed') {
    res.status(400).json({
      error: 'Validation Error',
      details: ['body: malformed JSON'],
    });
    return;
  }

  logger.error('Request error', {
    path: req.path,
    method: req.method,
    error: err.message,
    stack: err.stack,
  });

  const statusCode = err.statusCode || 500;
  res.status(statusCode).json({
    error: err.message || 'Internal Server Error',
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
  });
};

export default errorHandler;
