import type { StateChangedEvent, TrackedEntity, TrafficState } from '../../types/traffic.types';

export const DEFAULT_HYSTERESIS_MS = 2000;

/**
 * Debounce for per-aircraft state changes.
 *
 * A candidate is promoted to confirmed only after it has been observed continuously
 * for the full window. Any different candidate restarts the timer; a candidate equal
 * to the confirmed state drops whatever was pending.
 */
export class HysteresisGate {
  private readonly windowMs: number;

  constructor(windowMs: number = DEFAULT_HYSTERESIS_MS) {
    this.windowMs = windowMs;
  }

  /**
   * Returns the transition when this observation confirms one, otherwise null.
   */
  apply(entity: TrackedEntity, candidate: TrafficState, now: number): StateChangedEvent | null {
    if (candidate === entity.confirmedState) {
      entity.pendingState = null;
      entity.pendingSince = null;
      return null;
    }

    if (candidate === entity.pendingState && entity.pendingSince !== null) {
      if (now - entity.pendingSince < this.windowMs) {
        return null;
      }

      const oldState = entity.confirmedState;
      entity.confirmedState = candidate;
      entity.pendingState = null;
      entity.pendingSince = null;

      return {
        id: entity.id,
        oldState,
        newState: candidate,
        telemetry: { ...entity.telemetry },
        voice: entity.voice,
        occurredAt: now,
      };
    }

    entity.pendingState = candidate;
    entity.pendingSince = now;
    return null;
  }
}

export default HysteresisGate;
