import { TelemetryQueue } from '../TelemetryQueue';
import logger from '../../../utils/logger';
import { createSample } from '../../../__tests__/fixtures/trafficFixtures';
import type { TelemetryObservation } from '../../../types/traffic.types';

jest.mock('../../../utils/logger', () => ({
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
}));

const observation = (id: string): TelemetryObservation => ({ id, sample: createSample() });

describe('TelemetryQueue', () => {
  it('drains in submission order and empties the queue', () => {
    const queue = new TelemetryQueue();
    queue.push(observation('CCA101'));
    queue.pushMany([observation('UAL108'), observation('CCA101')]);

    expect(queue.size()).toBe(3);
    expect(queue.drain().map((entry) => entry.id)).toEqual(['CCA101', 'UAL108', 'CCA101']);
    expect(queue.size()).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  it('drops the oldest observation when full', () => {
    const queue = new TelemetryQueue(2);
    queue.pushMany([observation('A1'), observation('B2'), observation('C3')]);

    expect(queue.drain().map((entry) => entry.id)).toEqual(['B2', 'C3']);
    expect(queue.getDroppedTotal()).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('Telemetry queue full, dropped oldest observation', {
      id: 'A1',
      maxSize: 2,
      droppedTotal: 1,
    });
  });

  it('holds at least one observation', () => {
    const queue = new TelemetryQueue(0);
    queue.pushMany([observation('A1'), observation('B2')]);

    expect(queue.drain().map((entry) => entry.id)).toEqual(['B2']);
  });
});
