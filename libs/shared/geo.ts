const EARTH_RADIUS_KM = 6371;

export type GeoPoint = {
  latitude: number;
  longitude: number;
};

export function deg2rad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Straight-line (haversine) distance between two points. */
export function calculateDistanceKm(from: GeoPoint, to: GeoPoint): number {
  const dLat = deg2rad(to.latitude - from.latitude);
  const dLon = deg2rad(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(deg2rad(from.latitude)) *
      Math.cos(deg2rad(to.latitude)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
}

type MaybeGeoPoint = {
  latitude?: number | null;
  longitude?: number | null;
};

export function formatDistanceKm(
  from: MaybeGeoPoint | null | undefined,
  to: MaybeGeoPoint | null | undefined,
): string {
  const fromLat = from?.latitude;
  const fromLng = from?.longitude;
  const toLat = to?.latitude;
  const toLng = to?.longitude;
  if (
    typeof fromLat !== 'number' ||
    typeof fromLng !== 'number' ||
    typeof toLat !== 'number' ||
    typeof toLng !== 'number'
  ) {
    return '?';
  }
  return calculateDistanceKm(
    { latitude: fromLat, longitude: fromLng },
    { latitude: toLat, longitude: toLng },
  ).toFixed(1);
}
