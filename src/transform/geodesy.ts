/**
 * Great-circle distance on a spherical Earth
 */

import type { GeoPoint } from '../types.js';

/** WGS84 equatorial radius, used as the sphere radius */
export const EARTH_RADIUS_METERS = 6378137.0;

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Haversine distance in meters between two GPS coordinates
 */
export function haversineDistance(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);

  const sinLat = Math.sin(dLat / 2);
  const sinLon = Math.sin(dLon / 2);
  const h =
    sinLat * sinLat +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * sinLon * sinLon;

  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_METERS * c;
}

/**
 * Plain Euclidean distance between two plan pixels
 */
export function pixelDistance(a: { x: number; y: number }, b: { x: number; y: number }): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}
