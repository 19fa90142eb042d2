/**
 * Traffic tracking type definitions
 */

export const TRAFFIC_STATES = [
  'UNKNOWN',
  'PARKED',
  'PUSHBACK',
  'TAXIING',
  'TAKEOFF_ROLL',
  'AIRBORNE',
  'APPROACH',
  // LANDING and VACATING are reserved; the classifier never produces them yet
  'LANDING',
  'VACATING',
] as const;

export type TrafficState = typeof TRAFFIC_STATES[number];

export const CONTEXT_TAGS = ['ground', 'tower', 'approach', 'center'] as const;

export type KnownContextTag = typeof CONTEXT_TAGS[number];

/**
 * Unknown tags are accepted and match every entity.
 */
export type ContextTag = KnownContextTag | (string & {});

export interface GeoPosition {
  lat: number;
  lon: number;
}

/**
 * One kinematic observation of an aircraft, as delivered by a telemetry source.
 */
export interface TelemetrySample extends GeoPosition {
  altitudeFt: number;
  headingDeg: number;
  airspeedKt: number;
  verticalSpeedFpm: number;
  onGround: boolean;
}

export interface TelemetryObservation {
  id: string;
  sample: TelemetrySample;
}

/**
 * Registry-owned record. Timestamps are epoch milliseconds.
 */
export interface TrackedEntity {
  readonly id: string;
  confirmedState: TrafficState;
  pendingState: TrafficState | null;
  pendingSince: number | null;
  telemetry: TelemetrySample;
  prevTelemetry: TelemetrySample;
  lastSeen: number;
  readonly voice: string;
}

export interface TrackedEntityView {
  id: string;
  state: TrafficState;
  pendingState: TrafficState | null;
  telemetry: TelemetrySample;
  lastSeen: number;
  voice: string;
}

export interface StateChangedEvent {
  id: string;
  oldState: TrafficState;
  newState: TrafficState;
  telemetry: TelemetrySample;
  voice: string;
  occurredAt: number;
}

export interface EntityRemovedEvent {
  id: string;
  lastState: TrafficState;
  lastSeen: number;
}

export interface SnapshotEntry {
  id: string;
  lat: number;
  lon: number;
  altitudeFt: number;
  headingDeg: number;
  airspeedKt: number;
  verticalSpeedFpm: number;
  state: TrafficState;
  onGround: boolean;
}

export interface ContextEntry {
  id: string;
  state: TrafficState;
  altitudeFt: number;
  airspeedKt: number;
}

export interface TrafficEventMap {
  stateChanged: StateChangedEvent;
  snapshot: SnapshotEntry[];
  entityRemoved: EntityRemovedEvent;
}

export type TrafficEventName = keyof TrafficEventMap;

export type TrafficListener<K extends TrafficEventName> = (payload: TrafficEventMap[K]) => void;
