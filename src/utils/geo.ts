import { Location } from '../types/facility.types';
import { invalidInput } from '../types/error.types';

const EARTH_RADIUS_KM = 6371.0;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function assertValidLocation(location: Location): Location {
  if (!Number.isFinite(location.latitude) || location.latitude < -90 || location.latitude > 90) {
    throw invalidInput('Latitude must be between -90 and 90', { latitude: location.latitude });
  }
  if (!Number.isFinite(location.longitude) || location.longitude < -180 || location.longitude > 180) {
    throw invalidInput('Longitude must be between -180 and 180', { longitude: location.longitude });
  }
  return location;
}

/**
 * Great-circle distance in kilometers (haversine)
 */
export function distanceKm(from: Location, to: Location): number {
  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);
  const deltaLat = toRadians(to.latitude - from.latitude);
  const deltaLon = toRadians(to.longitude - from.longitude);

  const a =
    Math.sin(deltaLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(deltaLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}
