import type { GeoPosition } from '../../types/traffic.types';
import { haversineNm } from '../../utils/geo';
import { isNoPositionSentinel } from './StateClassifier';

export const DEFAULT_TELEPORT_THRESHOLD_NM = 5.0;

/**
 * A jump no aircraft can make between two consecutive ticks (sim slew, reposition, bad fix).
 * The 0/0 sentinel means there was no previous observation.
 */
export function isTeleport(
  previous: GeoPosition,
  current: GeoPosition,
  thresholdNm: number = DEFAULT_TELEPORT_THRESHOLD_NM,
): boolean {
  if (isNoPositionSentinel(previous)) {
    return false;
  }
  return haversineNm(previous, current) > thresholdNm;
}
