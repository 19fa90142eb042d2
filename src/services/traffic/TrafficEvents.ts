import logger from '../../utils/logger';
import type {
  TrafficEventMap, TrafficEventName, TrafficListener,
} from '../../types/traffic.types';

type ListenerSets = {
  [K in TrafficEventName]: Set<TrafficListener<K>>;
};

/**
 * Synchronous pub/sub for traffic events.
 * A throwing listener is logged and skipped; the remaining listeners still run.
 */
export class TrafficEvents {
  private listeners: ListenerSets = {
    stateChanged: new Set(),
    snapshot: new Set(),
    entityRemoved: new Set(),
  };

  on<K extends TrafficEventName>(event: K, listener: TrafficListener<K>): () => void {
    const set: Set<TrafficListener<K>> = this.listeners[event];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  emit<K extends TrafficEventName>(event: K, payload: TrafficEventMap[K]): void {
    const set: Set<TrafficListener<K>> = this.listeners[event];
    for (const listener of Array.from(set)) {
      try {
        listener(payload);
      } catch (error) {
        logger.error('Traffic event listener failed', {
          event,
          error: (error as Error).message,
        });
      }
    }
  }
}

export default TrafficEvents;
