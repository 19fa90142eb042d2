import {
  Router, Request, Response, NextFunction,
} from 'express';
import logger from '../utils/logger';
import type { TrackingRegistry } from '../services/traffic/TrackingRegistry';
import type { TelemetryQueue } from '../services/telemetry/TelemetryQueue';
import { TelemetryValidationError } from '../services/telemetry/TelemetryValidationError';
import {
  contextParamsSchema,
  formatZodIssues,
  isKnownContextTag,
  telemetryBatchSchema,
} from '../schemas/telemetry.schemas';

export interface TrafficRouteDeps {
  registry: TrackingRegistry;
  queue: TelemetryQueue;
  now?: () => number;
}

export function createTrafficHandlers({ registry, queue, now = Date.now }: TrafficRouteDeps) {
  /**
   * GET /api/traffic
   * Current radar picture
   */
  const listTraffic = (_req: Request, res: Response): void => {
    const aircraft = registry.snapshot();
    res.json({
      count: aircraft.length,
      timestamp: new Date(now()).toISOString(),
      aircraft,
    });
  };

  /**
   * GET /api/traffic/context/:tag
   * Aircraft relevant to a frequency (ground, tower, approach, center); other tags return all
   */
  const getContextTraffic = (req: Request, res: Response, next: NextFunction): void => {
    const parsed = contextParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      next(new TelemetryValidationError('Invalid context tag', formatZodIssues(parsed.error)));
      return;
    }

    const { tag } = parsed.data;
    const aircraft = registry.getInContext(tag);
    res.json({
      context: tag,
      filtered: isKnownContextTag(tag),
      count: aircraft.length,
      aircraft,
    });
  };

  /**
   * GET /api/traffic/:id
   */
  const getAircraft = (req: Request, res: Response): void => {
    const aircraft = registry.get(req.params.id);
    if (!aircraft) {
      res.status(404).json({ error: 'Aircraft not tracked', id: req.params.id });
      return;
    }
    res.json({ ...aircraft, lastSeen: new Date(aircraft.lastSeen).toISOString() });
  };

  /**
   * POST /api/traffic/telemetry
   * Queue a batch of observations for the next tick
   */
  const ingestTelemetry = (req: Request, res: Response, next: NextFunction): void => {
    const parsed = telemetryBatchSchema.safeParse(req.body);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      logger.warn('Rejected telemetry batch', { issues: issues.slice(0, 5), ip: req.ip });
      next(new TelemetryValidationError('Invalid telemetry payload', issues));
      return;
    }

    queue.pushMany(parsed.data.observations);

    res.status(202).json({
      accepted: parsed.data.observations.length,
      queued: queue.size(),
    });
  };

  return {
    listTraffic,
    getContextTraffic,
    getAircraft,
    ingestTelemetry,
  };
}

export function createTrafficRouter(deps: TrafficRouteDeps): Router {
  const router = Router();
  const handlers = createTrafficHandlers(deps);

  router.get('/traffic', handlers.listTraffic);
  router.get('/traffic/context/:tag', handlers.getContextTraffic);
  router.get('/traffic/:id', handlers.getAircraft);
  router.post('/traffic/telemetry', handlers.ingestTelemetry);

  return router;
}

export default createTrafficRouter;
