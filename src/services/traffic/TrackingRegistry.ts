import logger from '../../utils/logger';
import type {
  ContextEntry,
  ContextTag,
  SnapshotEntry,
  TelemetrySample,
  TrackedEntity,
  TrackedEntityView,
  TrafficState,
} from '../../types/traffic.types';
import { classifyState } from './StateClassifier';
import { isTeleport, DEFAULT_TELEPORT_THRESHOLD_NM } from './TeleportDetector';
import { HysteresisGate, DEFAULT_HYSTERESIS_MS } from './HysteresisGate';
import { assignVoice, DEFAULT_VOICE_POOL } from './VoiceAssigner';
import { matchesContext } from './ContextFilter';
import { TrafficEvents } from './TrafficEvents';

export const DEFAULT_STALE_TIMEOUT_MS = 30000;

export interface TrackingRegistryOptions {
  hysteresisMs?: number;
  teleportThresholdNm?: number;
  staleTimeoutMs?: number;
  voicePool?: readonly string[];
  pushbackDetection?: boolean;
  events?: TrafficEvents;
}

export type UpdateOutcome = 'teleported' | 'confirmed' | 'pending' | 'stable';

/**
 * Initial telemetry for a new aircraft: position at the 0/0 sentinel, on the ground.
 */
const createEmptyTelemetry = (): TelemetrySample => ({
  lat: 0,
  lon: 0,
  altitudeFt: 0,
  headingDeg: 0,
  airspeedKt: 0,
  verticalSpeedFpm: 0,
  onGround: true,
});

const toView = (entity: TrackedEntity): TrackedEntityView => ({
  id: entity.id,
  state: entity.confirmedState,
  pendingState: entity.pendingState,
  telemetry: { ...entity.telemetry },
  lastSeen: entity.lastSeen,
  voice: entity.voice,
});

/**
 * Owns every tracked aircraft and runs the per-observation pipeline:
 * teleport check, classification, hysteresis, event emission.
 *
 * All mutation goes through update() and evict(). Both run synchronously on the
 * event loop, so no caller can observe a half-applied update; readers only ever
 * receive copies.
 */
export class TrackingRegistry {
  readonly events: TrafficEvents;

  private entities: Map<string, TrackedEntity> = new Map();

  private gate: HysteresisGate;

  private teleportThresholdNm: number;

  private staleTimeoutMs: number;

  private voicePool: readonly string[];

  private pushbackDetection: boolean;

  constructor(options: TrackingRegistryOptions = {}) {
    this.gate = new HysteresisGate(options.hysteresisMs ?? DEFAULT_HYSTERESIS_MS);
    this.teleportThresholdNm = options.teleportThresholdNm ?? DEFAULT_TELEPORT_THRESHOLD_NM;
    this.staleTimeoutMs = options.staleTimeoutMs ?? DEFAULT_STALE_TIMEOUT_MS;
    this.voicePool = options.voicePool ?? DEFAULT_VOICE_POOL;
    this.pushbackDetection = options.pushbackDetection ?? true;
    this.events = options.events ?? new TrafficEvents();
  }

  update(id: string, sample: TelemetrySample, now: number): UpdateOutcome {
    const entity = this.getOrCreate(id, now);

    entity.prevTelemetry = entity.telemetry;
    entity.telemetry = { ...sample };
    entity.lastSeen = now;

    if (isTeleport(entity.prevTelemetry, sample, this.teleportThresholdNm)) {
      logger.info('Aircraft teleported, resetting state', {
        id,
        from: { lat: entity.prevTelemetry.lat, lon: entity.prevTelemetry.lon },
        to: { lat: sample.lat, lon: sample.lon },
        previousState: entity.confirmedState,
      });
      entity.confirmedState = 'UNKNOWN';
      entity.pendingState = null;
      entity.pendingSince = null;
      return 'teleported';
    }

    const candidate = classifyState(sample, {
      wasOnGround: entity.prevTelemetry.onGround,
      previousPosition: entity.prevTelemetry,
      pushbackDetection: this.pushbackDetection,
    });

    const transition = this.gate.apply(entity, candidate, now);
    if (transition) {
      logger.info('Aircraft state changed', {
        id,
        oldState: transition.oldState,
        newState: transition.newState,
      });
      this.events.emit('stateChanged', transition);
      return 'confirmed';
    }

    return entity.pendingState ? 'pending' : 'stable';
  }

  /**
   * Drop every aircraft not observed within the staleness timeout. Returns removed ids.
   */
  evict(now: number): string[] {
    const removed: Array<{ id: string; lastState: TrafficState; lastSeen: number }> = [];

    for (const [id, entity] of this.entities.entries()) {
      if (now - entity.lastSeen >= this.staleTimeoutMs) {
        this.entities.delete(id);
        removed.push({ id, lastState: entity.confirmedState, lastSeen: entity.lastSeen });
        logger.debug('Removed stale aircraft', { id, lastSeen: entity.lastSeen });
      }
    }

    if (removed.length > 0) {
      logger.info('Traffic eviction sweep', {
        removed: removed.length,
        remaining: this.entities.size,
      });
      removed.forEach((entry) => this.events.emit('entityRemoved', entry));
    }

    return removed.map((entry) => entry.id);
  }

  snapshot(): SnapshotEntry[] {
    return Array.from(this.entities.values(), (entity) => ({
      id: entity.id,
      lat: entity.telemetry.lat,
      lon: entity.telemetry.lon,
      altitudeFt: entity.telemetry.altitudeFt,
      headingDeg: entity.telemetry.headingDeg,
      airspeedKt: entity.telemetry.airspeedKt,
      verticalSpeedFpm: entity.telemetry.verticalSpeedFpm,
      state: entity.confirmedState,
      onGround: entity.telemetry.onGround,
    }));
  }

  getInContext(tag: ContextTag): ContextEntry[] {
    const results: ContextEntry[] = [];
    for (const entity of this.entities.values()) {
      if (matchesContext(entity, tag)) {
        results.push({
          id: entity.id,
          state: entity.confirmedState,
          altitudeFt: entity.telemetry.altitudeFt,
          airspeedKt: entity.telemetry.airspeedKt,
        });
      }
    }
    return results;
  }

  get(id: string): TrackedEntityView | null {
    const entity = this.entities.get(id);
    return entity ? toView(entity) : null;
  }

  getSize(): number {
    return this.entities.size;
  }

  private getOrCreate(id: string, now: number): TrackedEntity {
    const existing = this.entities.get(id);
    if (existing) {
      return existing;
    }

    const telemetry = createEmptyTelemetry();
    const entity: TrackedEntity = {
      id,
      confirmedState: 'UNKNOWN',
      pendingState: null,
      pendingSince: null,
      telemetry,
      prevTelemetry: telemetry,
      lastSeen: now,
      voice: assignVoice(id, this.voicePool),
    };
    this.entities.set(id, entity);
    logger.debug('New aircraft detected', { id, voice: entity.voice });
    return entity;
  }
}

export default TrackingRegistry;
