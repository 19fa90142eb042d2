import { TrafficScheduler } from '../TrafficScheduler';
import { TrackingRegistry } from '../traffic/TrackingRegistry';
import { TelemetryQueue } from '../telemetry/TelemetryQueue';
import { createSample } from '../../__tests__/fixtures/trafficFixtures';
import type { SnapshotEntry } from '../../types/traffic.types';

jest.mock('../../utils/logger', () => ({
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
}));

const intervals = {
  tickIntervalMs: 500,
  snapshotIntervalMs: 1000,
  evictionIntervalMs: 5000,
};

describe('TrafficScheduler', () => {
  let registry: TrackingRegistry;
  let queue: TelemetryQueue;
  let scheduler: TrafficScheduler;

  beforeEach(() => {
    registry = new TrackingRegistry({ hysteresisMs: 2000, staleTimeoutMs: 30000 });
    queue = new TelemetryQueue();
    scheduler = new TrafficScheduler(registry, queue, intervals);
  });

  afterEach(() => {
    scheduler.stop();
    jest.useRealTimers();
  });

  describe('tick', () => {
    it('applies queued observations in submission order', () => {
      queue.pushMany([
        { id: 'CCA101', sample: createSample({ airspeedKt: 0 }) },
        { id: 'UAL108', sample: createSample() },
        { id: 'CCA101', sample: createSample({ airspeedKt: 12 }) },
      ]);

      const result = scheduler.tick(0);

      expect(result.processed).toBe(3);
      expect(result.failed).toBe(0);
      expect(queue.size()).toBe(0);
      expect(registry.get('CCA101')?.telemetry.airspeedKt).toBe(12);
      expect(registry.getSize()).toBe(2);
    });

    it('publishes snapshots on their own cadence', () => {
      const snapshots: SnapshotEntry[][] = [];
      registry.events.on('snapshot', (entries) => {
        snapshots.push(entries);
      });
      queue.push({ id: 'CCA101', sample: createSample() });

      expect(scheduler.tick(0).snapshotEmitted).toBe(true);
      expect(scheduler.tick(500).snapshotEmitted).toBe(false);
      expect(scheduler.tick(1000).snapshotEmitted).toBe(true);
      expect(scheduler.tick(1500).snapshotEmitted).toBe(false);

      expect(snapshots).toHaveLength(2);
      expect(snapshots[0].map((entry) => entry.id)).toEqual(['CCA101']);
    });

    it('does not sweep on the first tick', () => {
      registry.update('CCA101', createSample(), 0);

      expect(scheduler.tick(100000).evicted).toEqual([]);
      expect(registry.get('CCA101')).not.toBeNull();
    });

    it('evicts stale aircraft once the eviction interval has elapsed', () => {
      const removed = jest.fn();
      registry.events.on('entityRemoved', removed);
      queue.push({ id: 'CCA101', sample: createSample() });
      scheduler.tick(0);

      expect(scheduler.tick(4999).evicted).toEqual([]);
      expect(scheduler.tick(29999).evicted).toEqual([]);
      expect(scheduler.tick(34999).evicted).toEqual(['CCA101']);
      expect(removed).toHaveBeenCalledWith({ id: 'CCA101', lastState: 'UNKNOWN', lastSeen: 0 });
    });

    it('isolates a failing update', () => {
      jest.spyOn(registry, 'update').mockImplementationOnce(() => {
        throw new Error('bad sample');
      });
      queue.pushMany([
        { id: 'CCA101', sample: createSample() },
        { id: 'UAL108', sample: createSample() },
      ]);

      const result = scheduler.tick(0);

      expect(result).toMatchObject({ processed: 1, failed: 1 });
      expect(registry.get('UAL108')).not.toBeNull();
      expect(scheduler.getStatus().failedTotal).toBe(1);
    });

    it('runs producers before draining the queue', () => {
      const produce = jest.fn(() => {
        queue.push({ id: 'CCA101', sample: createSample() });
      });
      scheduler.addProducer({ produce });

      expect(scheduler.tick(500).processed).toBe(1);
      expect(produce).toHaveBeenCalledWith(500);
    });

    it('keeps ticking when a producer throws', () => {
      scheduler.addProducer({
        produce: () => {
          throw new Error('generator failure');
        },
      });
      queue.push({ id: 'CCA101', sample: createSample() });

      expect(scheduler.tick(0).processed).toBe(1);
    });
  });

  describe('lifecycle', () => {
    it('ticks on the configured interval until stopped', () => {
      jest.useFakeTimers();
      const tick = jest.spyOn(scheduler, 'tick');

      scheduler.start();
      expect(scheduler.isRunning()).toBe(true);
      jest.advanceTimersByTime(1500);
      expect(tick).toHaveBeenCalledTimes(3);

      scheduler.stop();
      jest.advanceTimersByTime(1500);
      expect(tick).toHaveBeenCalledTimes(3);
      expect(scheduler.isRunning()).toBe(false);
    });

    it('reports status', () => {
      scheduler.tick(1700000000000);

      expect(scheduler.getStatus()).toEqual({
        running: false,
        tickIntervalMs: 500,
        ticks: 1,
        processedTotal: 0,
        failedTotal: 0,
        lastTickAt: '2023-11-14T22:13:20.000Z',
        lastSnapshotAt: '2023-11-14T22:13:20.000Z',
        lastEvictionAt: '2023-11-14T22:13:20.000Z',
        tracked: 0,
      });
    });
  });
});
