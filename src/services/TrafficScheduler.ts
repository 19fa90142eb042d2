import logger from '../utils/logger';
import type { TrackingRegistry } from './traffic/TrackingRegistry';
import type { TelemetryQueue } from './telemetry/TelemetryQueue';
import type { TelemetryProducer } from './telemetry/MockTrafficGenerator';

export interface TrafficSchedulerOptions {
  tickIntervalMs: number;
  snapshotIntervalMs: number;
  evictionIntervalMs: number;
  producers?: TelemetryProducer[];
  now?: () => number;
}

export interface TickResult {
  processed: number;
  failed: number;
  snapshotEmitted: boolean;
  evicted: string[];
}

export interface TrafficSchedulerStatus {
  running: boolean;
  tickIntervalMs: number;
  ticks: number;
  processedTotal: number;
  failedTotal: number;
  lastTickAt: string | null;
  lastSnapshotAt: string | null;
  lastEvictionAt: string | null;
  tracked: number;
}

const toIso = (timestamp: number | null): string | null => (
  timestamp === null ? null : new Date(timestamp).toISOString()
);

/**
 * Fixed-cadence driver and the sole writer to the registry.
 *
 * Each tick applies every queued observation, then publishes a snapshot and runs the
 * eviction sweep when their own intervals have elapsed (tracked by timestamp, one timer).
 */
export class TrafficScheduler {
  private interval: NodeJS.Timeout | null = null;

  private producers: TelemetryProducer[];

  private now: () => number;

  private ticks = 0;

  private processedTotal = 0;

  private failedTotal = 0;

  private lastTickAt: number | null = null;

  private lastSnapshotAt: number | null = null;

  private lastEvictionAt: number | null = null;

  constructor(
    private readonly registry: TrackingRegistry,
    private readonly queue: TelemetryQueue,
    private readonly options: TrafficSchedulerOptions,
  ) {
    this.producers = options.producers ?? [];
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.interval) {
      logger.warn('Traffic scheduler already running');
      return;
    }

    this.interval = setInterval(() => {
      this.tick(this.now());
    }, this.options.tickIntervalMs);
    this.interval.unref?.();

    logger.info('Traffic scheduler started', {
      tickIntervalMs: this.options.tickIntervalMs,
      snapshotIntervalMs: this.options.snapshotIntervalMs,
      evictionIntervalMs: this.options.evictionIntervalMs,
      producers: this.producers.length,
    });
  }

  /**
   * Takes effect between ticks; a tick already running finishes.
   */
  stop(): void {
    if (!this.interval) {
      return;
    }
    clearInterval(this.interval);
    this.interval = null;
    logger.info('Traffic scheduler stopped', { ticks: this.ticks });
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  addProducer(producer: TelemetryProducer): void {
    this.producers.push(producer);
  }

  tick(now: number): TickResult {
    this.producers.forEach((producer) => {
      try {
        producer.produce(now);
      } catch (error) {
        logger.error('Telemetry producer failed', { error: (error as Error).message });
      }
    });

    let processed = 0;
    let failed = 0;
    for (const observation of this.queue.drain()) {
      try {
        this.registry.update(observation.id, observation.sample, now);
        processed += 1;
      } catch (error) {
        failed += 1;
        logger.error('Failed to apply telemetry update', {
          id: observation.id,
          error: (error as Error).message,
          stack: (error as Error).stack,
        });
      }
    }

    let snapshotEmitted = false;
    if (this.lastSnapshotAt === null || now - this.lastSnapshotAt >= this.options.snapshotIntervalMs) {
      this.lastSnapshotAt = now;
      this.registry.events.emit('snapshot', this.registry.snapshot());
      snapshotEmitted = true;
    }

    let evicted: string[] = [];
    if (this.lastEvictionAt === null) {
      this.lastEvictionAt = now;
    } else if (now - this.lastEvictionAt >= this.options.evictionIntervalMs) {
      this.lastEvictionAt = now;
      evicted = this.registry.evict(now);
    }

    this.ticks += 1;
    this.processedTotal += processed;
    this.failedTotal += failed;
    this.lastTickAt = now;

    return {
      processed, failed, snapshotEmitted, evicted,
    };
  }

  getStatus(): TrafficSchedulerStatus {
    return {
      running: this.isRunning(),
      tickIntervalMs: this.options.tickIntervalMs,
      ticks: this.ticks,
      processedTotal: this.processedTotal,
      failedTotal: this.failedTotal,
      lastTickAt: toIso(this.lastTickAt),
      lastSnapshotAt: toIso(this.lastSnapshotAt),
      lastEvictionAt: toIso(this.lastEvictionAt),
      tracked: this.registry.getSize(),
    };
  }
}

export default TrafficScheduler;
