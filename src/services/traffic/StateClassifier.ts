import type { GeoPosition, TelemetrySample, TrafficState } from '../../types/traffic.types';
import { haversineNm, headingDifferenceDeg, initialBearingDeg } from '../../utils/geo';

export const PARKED_MAX_SPEED_KT = 1;
export const PUSHBACK_MAX_SPEED_KT = 5;
export const TAXI_MAX_SPEED_KT = 40;
export const APPROACH_MAX_ALTITUDE_FT = 3000;
export const APPROACH_MAX_VERTICAL_SPEED_FPM = -200;

// ~0.2 m; below this the ground track is noise
export const MIN_TRACK_DISTANCE_NM = 0.0001;
export const REVERSING_HEADING_DELTA_DEG = 90;

export interface ClassifierOptions {
  wasOnGround: boolean;
  /** Position at the previous observation; omit when there is none. */
  previousPosition?: GeoPosition | null;
  pushbackDetection?: boolean;
}

export const isNoPositionSentinel = (position: GeoPosition): boolean => (
  position.lat === 0 && position.lon === 0
);

/**
 * Ground track opposes the nose heading: the aircraft is being pushed back.
 */
export function isReversing(
  previousPosition: GeoPosition | null | undefined,
  sample: TelemetrySample,
): boolean {
  if (!previousPosition || isNoPositionSentinel(previousPosition)) {
    return false;
  }

  if (haversineNm(previousPosition, sample) < MIN_TRACK_DISTANCE_NM) {
    return false;
  }

  const groundTrack = initialBearingDeg(previousPosition, sample);
  return headingDifferenceDeg(groundTrack, sample.headingDeg) > REVERSING_HEADING_DELTA_DEG;
}

/**
 * Map one sample to a candidate flight phase. Rules are evaluated in order, first match wins.
 */
export function classifyState(sample: TelemetrySample, options: ClassifierOptions): TrafficState {
  const {
    airspeedKt, altitudeFt, verticalSpeedFpm, onGround,
  } = sample;

  if (onGround) {
    if (airspeedKt < PARKED_MAX_SPEED_KT) {
      return 'PARKED';
    }
    if (airspeedKt < PUSHBACK_MAX_SPEED_KT) {
      const reversing = options.pushbackDetection !== false
        && isReversing(options.previousPosition, sample);
      return reversing ? 'PUSHBACK' : 'TAXIING';
    }
    if (airspeedKt < TAXI_MAX_SPEED_KT) {
      return 'TAXIING';
    }
    return 'TAKEOFF_ROLL';
  }

  if (options.wasOnGround) {
    return 'AIRBORNE';
  }

  if (altitudeFt < APPROACH_MAX_ALTITUDE_FT && verticalSpeedFpm < APPROACH_MAX_VERTICAL_SPEED_FPM) {
    return 'APPROACH';
  }

  return 'AIRBORNE';
}
