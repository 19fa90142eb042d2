import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

/**
 * Request logging middleware
 * Polling endpoints (health, radar picture, telemetry intake) log at debug
 */
const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;

    const isNoisy = req.path === '/api/health'
      || req.path === '/api/traffic'
      || req.path === '/api/traffic/telemetry';
    const logLevel = isNoisy && res.statusCode < 400 ? 'debug' : 'info';

    logger[logLevel]('HTTP Request', {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      ip: req.ip,
    });
  });

  next();
};

export default requestLogger;
