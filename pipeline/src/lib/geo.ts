import { ImplausibleCoordinateError } from './errors.js';

/**
 * Check a coordinate before it becomes a candidate.
 * Returns the reason it must be dropped, or null when it is usable.
 */
export function checkCoordinate(
  latitude: number,
  longitude: number,
  nullIslandTolerance: number
): ImplausibleCoordinateError | null {
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return new ImplausibleCoordinateError(latitude, longitude, 'not a finite number');
  }
  if (latitude < -90 || latitude > 90) {
    return new ImplausibleCoordinateError(latitude, longitude, 'latitude outside [-90, 90]');
  }
  if (longitude < -180 || longitude > 180) {
    return new ImplausibleCoordinateError(latitude, longitude, 'longitude outside [-180, 180]');
  }
  // (0, 0) is the "null island" sentinel some geocoders return for no result
  if (Math.abs(latitude) <= nullIslandTolerance && Math.abs(longitude) <= nullIslandTolerance) {
    return new ImplausibleCoordinateError(latitude, longitude, 'null island sentinel');
  }
  return null;
}

export function isPlausibleCoordinate(latitude: number, longitude: number, nullIslandTolerance: number): boolean {
  return checkCoordinate(latitude, longitude, nullIslandTolerance) === null;
}

// Dedupe key: both coordinates rounded to `precision` decimal degrees
export function coordinateKey(latitude: number, longitude: number, precision: number): string {
  return `${roundTo(latitude, precision).toFixed(precision)},${roundTo(longitude, precision).toFixed(precision)}`;
}

function roundTo(value: number, precision: number): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}
