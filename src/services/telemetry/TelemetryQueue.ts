import logger from '../../utils/logger';
import type { TelemetryObservation } from '../../types/traffic.types';

export const DEFAULT_MAX_QUEUE_SIZE = 10000;

/**
 * FIFO hand-off between telemetry sources and the tick loop.
 * Order of submission is preserved so one aircraft's samples are applied in sequence.
 */
export class TelemetryQueue {
  private items: TelemetryObservation[] = [];

  private maxSize: number;

  private droppedTotal = 0;

  constructor(maxSize: number = DEFAULT_MAX_QUEUE_SIZE) {
    this.maxSize = Math.max(1, maxSize);
  }

  push(observation: TelemetryObservation): void {
    this.items.push(observation);
    if (this.items.length > this.maxSize) {
      const dropped = this.items.shift();
      this.droppedTotal += 1;
      logger.warn('Telemetry queue full, dropped oldest observation', {
        id: dropped?.id,
        maxSize: this.maxSize,
        droppedTotal: this.droppedTotal,
      });
    }
  }

  pushMany(observations: TelemetryObservation[]): void {
    observations.forEach((observation) => this.push(observation));
  }

  drain(): TelemetryObservation[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  size(): number {
    return this.items.length;
  }

  getDroppedTotal(): number {
    return this.droppedTotal;
  }
}

export default TelemetryQueue;
