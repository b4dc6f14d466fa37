import type { Position } from './position.js';

/**
 * Whether a report comes from the station that was asked for. Only an
 * airfield request names a station; coordinate and geoip requests accept
 * whichever station answers.
 */
export const isExactMatch = (station: string, position: Position): boolean => {
  if (position.kind !== 'airfield') {
    return true;
  }
  return station.trim().toUpperCase() === position.icao.trim().toUpperCase();
};
