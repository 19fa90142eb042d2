import { createServer } from 'http';
import config from './config';
import logger from './utils/logger';
import { createApp } from './app';
import { TrackingRegistry } from './services/traffic/TrackingRegistry';
import { TelemetryQueue } from './services/telemetry/TelemetryQueue';
import { MockTrafficGenerator } from './services/telemetry/MockTrafficGenerator';
import { RedisTelemetrySource } from './services/telemetry/RedisTelemetrySource';
import { TrafficScheduler } from './services/TrafficScheduler';
import { RealtimeBroadcaster } from './services/RealtimeBroadcaster';
import { RedisClientManager } from './lib/redis/RedisClientManager';

const registry = new TrackingRegistry({
  hysteresisMs: config.traffic.hysteresisMs,
  teleportThresholdNm: config.traffic.teleportThresholdNm,
  staleTimeoutMs: config.traffic.staleTimeoutMs,
  voicePool: config.traffic.voicePool,
  pushbackDetection: config.traffic.pushbackDetection,
});
const queue = new TelemetryQueue(config.telemetry.maxQueueSize);
const scheduler = new TrafficScheduler(registry, queue, {
  tickIntervalMs: config.traffic.tickIntervalMs,
  snapshotIntervalMs: config.traffic.snapshotIntervalMs,
  evictionIntervalMs: config.traffic.evictionIntervalMs,
});

const redisClients = new RedisClientManager();
const redisSource = config.telemetry.redis.enabled
  ? new RedisTelemetrySource(redisClients, queue, {
    url: config.telemetry.redis.url,
    channel: config.telemetry.redis.channel,
  })
  : null;

if (config.telemetry.mock.enabled) {
  scheduler.addProducer(new MockTrafficGenerator(queue, config.telemetry.mock));
}

const broadcaster = new RealtimeBroadcaster(registry.events);

const app = createApp({
  registry,
  queue,
  scheduler,
  redisSource,
  broadcaster,
  redisClients,
  allowedOrigins: config.cors.allowedOrigins,
});
const server = createServer(app);

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down', { signal });
  scheduler.stop();

  try {
    if (redisSource) {
      await redisSource.stop();
    }
    await redisClients.disconnect();
    // Socket.IO closes the underlying HTTP server as well
    await broadcaster.close();
  } catch (error) {
    logger.error('Error during shutdown', { error: (error as Error).message });
    process.exitCode = 1;
  }
}

async function startServer(): Promise<void> {
  broadcaster.initialize(server, config.cors.allowedOrigins);

  const { port, host } = config.server;
  server.listen(port, host, () => {
    logger.info(`Server listening on ${host}:${port}`);
  });

  if (!config.traffic.enabled) {
    logger.warn('Traffic tracking disabled via configuration');
    return;
  }

  if (redisSource) {
    await redisSource.start();
  } else {
    logger.info('Redis telemetry source disabled via configuration');
  }

  scheduler.start();
}

['SIGINT', 'SIGTERM'].forEach((signal) => {
  process.once(signal, () => {
    shutdown(signal).catch((error: Error) => {
      logger.error('Shutdown failed', { error: error.message });
      process.exitCode = 1;
    });
  });
});

startServer().catch((error: Error) => {
  logger.error('Failed to start server', { error: error.message, stack: error.stack });
  process.exit(1);
});
