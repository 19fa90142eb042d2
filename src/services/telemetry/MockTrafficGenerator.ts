import logger from '../../utils/logger';
import type { GeoPosition, TelemetrySample } from '../../types/traffic.types';
import { projectPosition } from '../../utils/geo';
import type { TelemetryQueue } from './TelemetryQueue';

export interface TelemetryProducer {
  produce(now: number): void;
}

interface FlightPhase {
  name: string;
  durationSec: number;
  onGround: boolean;
  airspeedKt: number;
  verticalSpeedFpm: number;
  /** Ground track points opposite the nose (pushback). */
  reverse?: boolean;
}

/**
 * One full gate-to-gate circuit. Speeds and rates are constant within a phase.
 */
export const MOCK_FLIGHT_PROFILE: readonly FlightPhase[] = [
  { name: 'parked', durationSec: 20, onGround: true, airspeedKt: 0, verticalSpeedFpm: 0 },
  { name: 'pushback', durationSec: 15, onGround: true, airspeedKt: 3, verticalSpeedFpm: 0, reverse: true },
  { name: 'taxi-out', durationSec: 40, onGround: true, airspeedKt: 15, verticalSpeedFpm: 0 },
  { name: 'takeoff-roll', durationSec: 25, onGround: true, airspeedKt: 120, verticalSpeedFpm: 0 },
  { name: 'climb', durationSec: 120, onGround: false, airspeedKt: 250, verticalSpeedFpm: 2000 },
  { name: 'cruise', durationSec: 120, onGround: false, airspeedKt: 300, verticalSpeedFpm: 0 },
  { name: 'approach', durationSec: 100, onGround: false, airspeedKt: 160, verticalSpeedFpm: -1000 },
  { name: 'rollout', durationSec: 20, onGround: true, airspeedKt: 80, verticalSpeedFpm: 0 },
  { name: 'taxi-in', durationSec: 40, onGround: true, airspeedKt: 15, verticalSpeedFpm: 0 },
];

const AIRLINE_PREFIXES = ['CCA', 'UAL', 'DAL', 'BAW', 'DLH', 'AFR', 'JAL', 'SWA'];

const PROFILE_DURATION_SEC = MOCK_FLIGHT_PROFILE.reduce((sum, phase) => sum + phase.durationSec, 0);

// Spread the starting phases so a fresh fleet does not move in lockstep
const START_OFFSET_STEP_SEC = 37;

interface MockAircraft {
  id: string;
  position: GeoPosition;
  headingDeg: number;
  altitudeFt: number;
  phaseIndex: number;
  phaseElapsedSec: number;
}

export interface MockTrafficOptions {
  aircraftCount: number;
  originLat: number;
  originLon: number;
}

export const mockCallsign = (index: number): string => (
  `${AIRLINE_PREFIXES[index % AIRLINE_PREFIXES.length]}${101 + index * 7}`
);

/**
 * Synthetic telemetry for running without a simulator.
 * Feeds the same queue as the real sources, one observation per aircraft per produce() call.
 */
export class MockTrafficGenerator implements TelemetryProducer {
  private fleet: MockAircraft[];

  private lastProducedAt: number | null = null;

  constructor(private readonly queue: TelemetryQueue, options: MockTrafficOptions) {
    const origin: GeoPosition = { lat: options.originLat, lon: options.originLon };
    this.fleet = Array.from({ length: options.aircraftCount }, (_, index) => {
      const aircraft: MockAircraft = {
        id: mockCallsign(index),
        position: { ...origin },
        headingDeg: (index * 60) % 360,
        altitudeFt: 0,
        phaseIndex: 0,
        phaseElapsedSec: 0,
      };
      this.advance(aircraft, (index * START_OFFSET_STEP_SEC) % PROFILE_DURATION_SEC);
      return aircraft;
    });

    logger.info('Mock traffic generator initialized', {
      aircraft: this.fleet.length,
      origin,
    });
  }

  produce(now: number): void {
    const dtSec = this.lastProducedAt === null ? 0 : Math.max(0, (now - this.lastProducedAt) / 1000);
    this.lastProducedAt = now;

    this.fleet.forEach((aircraft) => {
      this.advance(aircraft, dtSec);
      this.queue.push({ id: aircraft.id, sample: this.toSample(aircraft) });
    });
  }

  private advance(aircraft: MockAircraft, dtSec: number): void {
    let remaining = dtSec;
    while (remaining > 0) {
      const phase = MOCK_FLIGHT_PROFILE[aircraft.phaseIndex];
      const step = Math.min(remaining, phase.durationSec - aircraft.phaseElapsedSec);
      this.move(aircraft, phase, step);
      aircraft.phaseElapsedSec += step;
      remaining -= step;

      if (aircraft.phaseElapsedSec >= phase.durationSec) {
        this.enterNextPhase(aircraft);
      }
    }
  }

  private move(aircraft: MockAircraft, phase: FlightPhase, dtSec: number): void {
    const distanceNm = (phase.airspeedKt * dtSec) / 3600;
    if (distanceNm > 0) {
      const track = phase.reverse ? (aircraft.headingDeg + 180) % 360 : aircraft.headingDeg;
      aircraft.position = projectPosition(aircraft.position, track, distanceNm);
    }
    aircraft.altitudeFt = Math.max(0, aircraft.altitudeFt + (phase.verticalSpeedFpm * dtSec) / 60);
  }

  private enterNextPhase(aircraft: MockAircraft): void {
    aircraft.phaseIndex = (aircraft.phaseIndex + 1) % MOCK_FLIGHT_PROFILE.length;
    aircraft.phaseElapsedSec = 0;

    const next = MOCK_FLIGHT_PROFILE[aircraft.phaseIndex];
    if (next.name === 'approach') {
      // head back toward the field
      aircraft.headingDeg = (aircraft.headingDeg + 180) % 360;
    }
    if (next.onGround) {
      aircraft.altitudeFt = 0;
    }
  }

  private toSample(aircraft: MockAircraft): TelemetrySample {
    const phase = MOCK_FLIGHT_PROFILE[aircraft.phaseIndex];
    return {
      lat: aircraft.position.lat,
      lon: aircraft.position.lon,
      altitudeFt: Math.round(aircraft.altitudeFt),
      headingDeg: aircraft.headingDeg,
      airspeedKt: phase.airspeedKt,
      verticalSpeedFpm: phase.verticalSpeedFpm,
      onGround: phase.onGround,
    };
  }
}

export default MockTrafficGenerator;
