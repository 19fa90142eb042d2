import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import errorHandler from './middlewares/errorHandler';
import requestLogger from './middlewares/requestLogger';
import { createTrafficRouter, type TrafficRouteDeps } from './routes/traffic.routes';
import { createHealthRouter, type HealthRouteDeps } from './routes/health.routes';

export interface AppDeps extends TrafficRouteDeps, HealthRouteDeps {
  allowedOrigins: string[];
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(cors({
    origin: (origin, callback) => {
      // Same-host tools (curl, simulator bridges) send no Origin header
      if (!origin || deps.allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }
      callback(new Error('CORS policy violation'), false);
    },
  }));

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.use('/api', createHealthRouter(deps));
  app.use('/api', createTrafficRouter(deps));

  app.use((_req: Request, res: Response): void => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling (must be last)
  app.use(errorHandler);

  return app;
}

export default createApp;
