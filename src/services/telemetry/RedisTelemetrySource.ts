import type Redis from 'ioredis';
import logger from '../../utils/logger';
import type { RedisClientManager } from '../../lib/redis/RedisClientManager';
import type { TelemetryQueue } from './TelemetryQueue';
import { parseTelemetryMessage } from '../../schemas/telemetry.schemas';
import { TelemetryValidationError } from './TelemetryValidationError';

export interface RedisTelemetrySourceOptions {
  url: string;
  channel: string;
  clientName?: string;
}

export interface RedisTelemetryStatus {
  subscribed: boolean;
  channel: string;
  received: number;
  rejected: number;
}

/**
 * Redis pub/sub telemetry intake.
 * Each message is one observation or an `{ observations: [...] }` batch; valid ones go on the queue.
 */
export class RedisTelemetrySource {
  private redisSub: Redis | null = null;

  private isSubscribed = false;

  private received = 0;

  private rejected = 0;

  private readonly clientName: string;

  constructor(
    private readonly clients: RedisClientManager,
    private readonly queue: TelemetryQueue,
    private readonly options: RedisTelemetrySourceOptions,
  ) {
    this.clientName = options.clientName ?? 'telemetry-sub';
  }

  async start(): Promise<void> {
    if (this.isSubscribed) {
      return;
    }

    try {
      this.redisSub = this.clients.getClient(this.clientName, this.options.url);
      this.redisSub.on('message', (channel: string, message: string) => {
        if (channel === this.options.channel) {
          this.handleMessage(message);
        }
      });

      await this.redisSub.connect();
      await this.redisSub.subscribe(this.options.channel);
      this.isSubscribed = true;

      logger.info('Redis telemetry source subscribed', { channel: this.options.channel });
    } catch (error) {
      logger.error('Failed to start Redis telemetry source', {
        channel: this.options.channel,
        error: (error as Error).message,
      });
    }
  }

  /**
   * Parse and enqueue one pub/sub payload. Returns the number of observations queued.
   */
  handleMessage(message: string): number {
    let payload: unknown;
    try {
      payload = JSON.parse(message);
    } catch (error) {
      this.rejected += 1;
      logger.warn('Failed to parse telemetry message', {
        error: (error as Error).message,
      });
      return 0;
    }

    try {
      const observations = parseTelemetryMessage(payload);
      this.queue.pushMany(observations);
      this.received += observations.length;
      return observations.length;
    } catch (error) {
      if (!(error instanceof TelemetryValidationError)) {
        throw error;
      }
      this.rejected += 1;
      logger.warn('Rejected telemetry message', { issues: error.issues.slice(0, 5) });
      return 0;
    }
  }

  async stop(): Promise<void> {
    if (this.redisSub && this.isSubscribed) {
      await this.redisSub.unsubscribe(this.options.channel);
      this.isSubscribed = false;
    }
    if (this.redisSub) {
      await this.clients.disconnect(this.clientName);
      this.redisSub = null;
    }
    logger.info('Redis telemetry source stopped');
  }

  getStatus(): RedisTelemetryStatus {
    return {
      subscribed: this.isSubscribed,
      channel: this.options.channel,
      received: this.received,
      rejected: this.rejected,
    };
  }
}

export default RedisTelemetrySource;
