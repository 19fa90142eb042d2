import type {
  ContextTag, TelemetrySample, TrackedEntityView,
} from '../../types/traffic.types';

export const TOWER_MAX_ALTITUDE_FT = 3000;
export const APPROACH_CEILING_FT = 10000;
export const GROUND_MAX_SPEED_KT = 40;

type ContextPredicate = (telemetry: TelemetrySample) => boolean;

const CONTEXT_PREDICATES: Record<string, ContextPredicate> = {
  ground: (t) => t.onGround && t.airspeedKt < GROUND_MAX_SPEED_KT,
  tower: (t) => (t.onGround && t.airspeedKt >= GROUND_MAX_SPEED_KT)
    || (!t.onGround && t.altitudeFt < TOWER_MAX_ALTITUDE_FT),
  approach: (t) => !t.onGround && t.altitudeFt < APPROACH_CEILING_FT && t.verticalSpeedFpm < 0,
  center: (t) => !t.onGround && t.altitudeFt >= APPROACH_CEILING_FT,
};

/**
 * Whether an aircraft belongs on the given frequency. Unknown tags match everything.
 */
export function matchesContext(entity: Pick<TrackedEntityView, 'telemetry'>, tag: ContextTag): boolean {
  const predicate = Object.prototype.hasOwnProperty.call(CONTEXT_PREDICATES, tag)
    ? CONTEXT_PREDICATES[tag]
    : undefined;
  return predicate ? predicate(entity.telemetry) : true;
}
