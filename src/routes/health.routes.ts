import { Router, Request, Response } from 'express';
import type { TrafficScheduler } from '../services/TrafficScheduler';
import type { TelemetryQueue } from '../services/telemetry/TelemetryQueue';
import type { RedisTelemetrySource } from '../services/telemetry/RedisTelemetrySource';
import type { RealtimeBroadcaster } from '../services/RealtimeBroadcaster';
import type { RedisClientManager } from '../lib/redis/RedisClientManager';

export interface HealthRouteDeps {
  scheduler: TrafficScheduler;
  queue: TelemetryQueue;
  redisSource?: RedisTelemetrySource | null;
  broadcaster?: RealtimeBroadcaster | null;
  redisClients?: RedisClientManager | null;
}

export function createHealthHandler({
  scheduler, queue, redisSource, broadcaster, redisClients,
}: HealthRouteDeps) {
  /**
   * Health check endpoint for load balancers and monitoring.
   * Returns 200 while the process serves requests; a stopped tick loop reports as degraded.
   */
  return (_req: Request, res: Response): void => {
    const schedulerStatus = scheduler.getStatus();

    res.status(200).json({
      status: schedulerStatus.running ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      service: 'traffic-awareness',
      tracked: schedulerStatus.tracked,
      scheduler: schedulerStatus,
      telemetry: {
        queued: queue.size(),
        dropped: queue.getDroppedTotal(),
        redis: redisSource ? redisSource.getStatus() : null,
        redisConnections: redisClients ? redisClients.getConnectionStates() : {},
      },
      realtimeClients: broadcaster ? broadcaster.getConnectedClientsCount() : 0,
    });
  };
}

export function createHealthRouter(deps: HealthRouteDeps): Router {
  const router = Router();
  router.get('/health', createHealthHandler(deps));
  return router;
}

export default createHealthRouter;
