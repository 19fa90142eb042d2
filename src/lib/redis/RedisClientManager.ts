import Redis, { RedisOptions } from 'ioredis';
import logger from '../../utils/logger';

export type RedisLinkStatus = 'connecting' | 'ready' | 'reconnecting' | 'error' | 'closed';

export interface RedisLinkState {
  status: RedisLinkStatus;
  lastError: string | null;
  reconnects: number;
  /** ISO time of the last status change */
  since: string;
}

interface RedisLink {
  client: Redis;
  state: RedisLinkState;
}

const LINK_OPTIONS: RedisOptions = {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
};

/**
 * Telemetry subscribers by name. A subscribed ioredis connection cannot issue
 * other commands, so each source holds its own link; the caller connects it.
 */
export class RedisClientManager {
  private links = new Map<string, RedisLink>();

  constructor(private readonly now: () => number = Date.now) {}

  getClient(name: string, url: string, overrides: RedisOptions = {}): Redis {
    const existing = this.links.get(name);
    if (existing) {
      return existing.client;
    }

    const options: RedisOptions = { ...LINK_OPTIONS, ...overrides };
    if (url.startsWith('rediss:')) {
      options.tls = {
        rejectUnauthorized: process.env.REDIS_REJECT_UNAUTHORIZED === 'true',
        ...options.tls,
      };
    }

    const link: RedisLink = {
      client: new Redis(url, options),
      state: {
        status: 'connecting',
        lastError: null,
        reconnects: 0,
        since: new Date(this.now()).toISOString(),
      },
    };
    this.links.set(name, link);
    this.track(name, link);
    return link.client;
  }

  /**
   * Per-link status for the health endpoint.
   */
  getConnectionStates(): Record<string, RedisLinkState> {
    const states: Record<string, RedisLinkState> = {};
    this.links.forEach((link, name) => {
      states[name] = { ...link.state };
    });
    return states;
  }

  async disconnect(name?: string): Promise<void> {
    const names = name ? [name] : Array.from(this.links.keys());
    await Promise.all(names.map(async (linkName) => {
      const link = this.links.get(linkName);
      if (!link) {
        return;
      }
      this.links.delete(linkName);
      await link.client.quit();
    }));
  }

  private track(name: string, link: RedisLink): void {
    const { client, state } = link;
    const moveTo = (status: RedisLinkStatus): void => {
      state.status = status;
      state.since = new Date(this.now()).toISOString();
    };

    client.on('ready', () => {
      moveTo('ready');
      state.lastError = null;
      logger.info('Telemetry Redis link ready', { name });
    });

    client.on('error', (error: Error) => {
      moveTo('error');
      state.lastError = error.message;
      logger.error('Telemetry Redis link error', { name, error: error.message });
    });

    client.on('reconnecting', () => {
      moveTo('reconnecting');
      state.reconnects += 1;
      logger.warn('Telemetry Redis link reconnecting', { name, reconnects: state.reconnects });
    });

    client.on('end', () => {
      moveTo('closed');
      logger.warn('Telemetry Redis link closed', { name });
    });
  }
}

export default RedisClientManager;
