/**
 * Coordinate Projection using proj4
 *
 * Site plans are often surveyed in a projected grid (UTM, national grids).
 * These helpers turn such coordinates into the WGS84 latitude/longitude the
 * engine calibrates against.
 */

import proj4 from 'proj4';
import { ProjectionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { GeoPoint } from '../types.js';

const logger = createLogger('projection');

// WGS84 definition (EPSG:4326)
const WGS84 = 'EPSG:4326';

// Definitions registered at runtime take precedence over proj4's own
const EPSG_DEFINITIONS: Record<number, string> = {};

/**
 * Get proj4 definition string for an EPSG code
 */
function getEPSGDefinition(epsg: number): string {
  const registered = EPSG_DEFINITIONS[epsg];
  if (registered) {
    return registered;
  }

  // UTM zones on the WGS84 datum
  if (epsg >= 32601 && epsg <= 32660) {
    return `+proj=utm +zone=${epsg - 32600} +datum=WGS84 +units=m +no_defs`;
  }
  if (epsg >= 32701 && epsg <= 32760) {
    return `+proj=utm +zone=${epsg - 32700} +south +datum=WGS84 +units=m +no_defs`;
  }

  const epsgString = `EPSG:${epsg}`;
  if (proj4.defs(epsgString)) {
    return epsgString;
  }

  throw new ProjectionError(
    `Unknown EPSG code: ${epsg}. Register its proj4 definition first.`,
    { epsg }
  );
}

/**
 * Register a custom EPSG definition
 */
export function registerEPSG(epsg: number, definition: string): void {
  EPSG_DEFINITIONS[epsg] = definition;
  proj4.defs(`EPSG:${epsg}`, definition);
  logger.debug({ epsg, definition }, 'Registered custom EPSG definition');
}

/**
 * Convert projected coordinates (Easting/Northing) to WGS84
 */
export function projectToGeo(easting: number, northing: number, epsg: number): GeoPoint {
  const sourceProj = getEPSGDefinition(epsg);

  let longitude: number;
  let latitude: number;
  try {
    [longitude, latitude] = proj4(sourceProj, WGS84, [easting, northing]);
  } catch (error) {
    throw new ProjectionError(
      `Failed to project coordinates from EPSG:${epsg} to WGS84`,
      { easting, northing, epsg, error }
    );
  }

  if (!Number.isFinite(longitude) || !Number.isFinite(latitude)) {
    throw new ProjectionError(
      `Coordinates lie outside the valid area of EPSG:${epsg}`,
      { easting, northing, epsg }
    );
  }

  logger.debug({ easting, northing, epsg, longitude, latitude }, 'Projected to WGS84');
  return { latitude, longitude };
}

/**
 * Convert WGS84 to projected coordinates (Easting/Northing)
 */
export function projectFromGeo(
  point: GeoPoint,
  epsg: number
): { easting: number; northing: number } {
  const targetProj = getEPSGDefinition(epsg);

  try {
    const [easting, northing] = proj4(WGS84, targetProj, [point.longitude, point.latitude]);
    return { easting, northing };
  } catch (error) {
    throw new ProjectionError(
      `Failed to project coordinates from WGS84 to EPSG:${epsg}`,
      { ...point, epsg, error }
    );
  }
}
