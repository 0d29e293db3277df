import { EARTH_RADIUS_METERS } from "./constants";

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Great-circle distance in meters between two points given in degrees.
 * Haversine form on a spherical Earth; stays accurate below one meter where
 * the spherical law of cosines rounds to zero.
 */
export function metersApart(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLon / 2) ** 2;

  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Devices that have never reported a fix carry (0,0); such points are left
 * out of every distance-based scan.
 */
export function hasKnownLocation(point: GeoPoint): boolean {
  return point.latitude !== 0 || point.longitude !== 0;
}
