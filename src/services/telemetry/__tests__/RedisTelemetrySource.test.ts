import type Redis from 'ioredis';
import { RedisTelemetrySource } from '../RedisTelemetrySource';
import { TelemetryQueue } from '../TelemetryQueue';
import { RedisClientManager } from '../../../lib/redis/RedisClientManager';
import { createSample } from '../../../__tests__/fixtures/trafficFixtures';

jest.mock('../../../utils/logger', () => ({
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
}));

type MessageHandler = (channel: string, message: string) => void;

const CHANNEL = 'traffic:telemetry';

describe('RedisTelemetrySource', () => {
  let queue: TelemetryQueue;
  let clients: RedisClientManager;
  let source: RedisTelemetrySource;
  let handlers: MessageHandler[];
  let mockRedis: {
    on: jest.Mock;
    connect: jest.Mock;
    subscribe: jest.Mock;
    unsubscribe: jest.Mock;
  };

  beforeEach(() => {
    handlers = [];
    mockRedis = {
      on: jest.fn((event: string, handler: MessageHandler) => {
        if (event === 'message') {
          handlers.push(handler);
        }
      }),
      connect: jest.fn().mockResolvedValue(undefined),
      subscribe: jest.fn().mockResolvedValue(1),
      unsubscribe: jest.fn().mockResolvedValue(0),
    };

    queue = new TelemetryQueue();
    clients = new RedisClientManager();
    jest.spyOn(clients, 'getClient').mockReturnValue(mockRedis as unknown as Redis);
    jest.spyOn(clients, 'disconnect').mockResolvedValue(undefined);
    source = new RedisTelemetrySource(clients, queue, { url: 'redis://localhost:6379', channel: CHANNEL });
  });

  describe('handleMessage', () => {
    it('queues a single observation', () => {
      const queued = source.handleMessage(JSON.stringify({ id: 'CCA101', sample: createSample() }));

      expect(queued).toBe(1);
      expect(queue.drain()).toEqual([{ id: 'CCA101', sample: createSample() }]);
    });

    it('queues a batch in order', () => {
      const message = JSON.stringify({
        observations: [
          { id: 'CCA101', sample: createSample() },
          { id: 'UAL108', sample: createSample({ airspeedKt: 15 }) },
        ],
      });

      expect(source.handleMessage(message)).toBe(2);
      expect(queue.drain().map((entry) => entry.id)).toEqual(['CCA101', 'UAL108']);
      expect(source.getStatus().received).toBe(2);
    });

    it('rejects malformed JSON', () => {
      expect(source.handleMessage('{not json')).toBe(0);
      expect(queue.size()).toBe(0);
      expect(source.getStatus().rejected).toBe(1);
    });

    it('rejects payloads that fail validation', () => {
      expect(source.handleMessage(JSON.stringify({ id: 'CCA101' }))).toBe(0);
      expect(source.getStatus()).toEqual({
        subscribed: false,
        channel: CHANNEL,
        received: 0,
        rejected: 1,
      });
    });
  });

  describe('lifecycle', () => {
    it('subscribes and routes messages from its channel only', async () => {
      await source.start();

      expect(clients.getClient).toHaveBeenCalledWith('telemetry-sub', 'redis://localhost:6379');
      expect(mockRedis.connect).toHaveBeenCalledTimes(1);
      expect(mockRedis.subscribe).toHaveBeenCalledWith(CHANNEL);
      expect(source.getStatus().subscribed).toBe(true);

      const payload = JSON.stringify({ id: 'CCA101', sample: createSample() });
      handlers.forEach((handler) => handler('other:channel', payload));
      expect(queue.size()).toBe(0);

      handlers.forEach((handler) => handler(CHANNEL, payload));
      expect(queue.size()).toBe(1);
    });

    it('does not subscribe twice', async () => {
      await source.start();
      await source.start();

      expect(mockRedis.subscribe).toHaveBeenCalledTimes(1);
    });

    it('stays unsubscribed when the connection fails', async () => {
      mockRedis.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(source.start()).resolves.toBeUndefined();
      expect(source.getStatus().subscribed).toBe(false);
    });

    it('unsubscribes and releases the connection on stop', async () => {
      await source.start();
      await source.stop();

      expect(mockRedis.unsubscribe).toHaveBeenCalledWith(CHANNEL);
      expect(clients.disconnect).toHaveBeenCalledWith('telemetry-sub');
      expect(source.getStatus().subscribed).toBe(false);
    });
  });
});
