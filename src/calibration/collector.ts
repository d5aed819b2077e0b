/**
 * Calibration Collection
 *
 * Gathers the three reference pairs one at a time, the way a user walks to
 * a spot, taps it on the plan and records the GPS fix. Taps arrive in
 * display coordinates and are stored in native plan pixels.
 */

import { DEFAULT_COLLECTOR_OPTIONS } from '../config.js';
import { CalibrationError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { TransformEngine } from '../engine/transform-engine.js';
import type { Calibration, CalibrationPair, CollectorOptions, GeoPoint, PixelPoint } from '../types.js';
import { haversineDistance } from '../transform/geodesy.js';

const logger = createLogger('collector');

const REQUIRED_PAIRS = 3;

/**
 * Validate a GPS coordinate
 */
export function validateGeoPoint(point: GeoPoint): void {
  const { latitude, longitude } = point;
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new ValidationError(`Invalid latitude: ${latitude}`, { point });
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new ValidationError(`Invalid longitude: ${longitude}`, { point });
  }
}

function validatePixel(point: PixelPoint): void {
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
    throw new ValidationError(`Invalid plan position: (${point.x}, ${point.y})`, { point });
  }
}

export class CalibrationCollector {
  private readonly options: CollectorOptions;
  private readonly pairs: CalibrationPair[] = [];

  constructor(options: Partial<CollectorOptions> = {}) {
    this.options = { ...DEFAULT_COLLECTOR_OPTIONS, ...options };
  }

  get count(): number {
    return this.pairs.length;
  }

  /** 1-based number of the pair being collected next */
  get step(): number {
    return Math.min(this.pairs.length + 1, REQUIRED_PAIRS);
  }

  get isComplete(): boolean {
    return this.pairs.length === REQUIRED_PAIRS;
  }

  /**
   * Record a reference pair
   *
   * @param tap - Position on the displayed plan (display coordinates)
   * @returns The stored pair, in native plan pixels
   */
  add(world: GeoPoint, tap: PixelPoint): CalibrationPair {
    if (this.isComplete) {
      throw new CalibrationError('All three calibration points are already collected');
    }

    validateGeoPoint(world);
    validatePixel(tap);

    for (const existing of this.pairs) {
      const distance = haversineDistance(existing.world, world);
      if (distance < this.options.minSeparationMeters) {
        throw new CalibrationError(
          `Points must be at least ${this.options.minSeparationMeters}m apart (got ${distance.toFixed(2)}m)`,
          { existing: existing.world, candidate: world, distance }
        );
      }
    }

    const pair: CalibrationPair = {
      world: { latitude: world.latitude, longitude: world.longitude },
      pixel: { x: tap.x / this.options.displayScale, y: tap.y / this.options.displayScale },
    };
    this.pairs.push(pair);

    logger.debug({ step: this.pairs.length, pair }, 'Calibration point collected');
    return pair;
  }

  reset(): void {
    this.pairs.length = 0;
  }

  toCalibration(): Calibration {
    const [first, second, third] = this.pairs;
    if (!first || !second || !third) {
      throw new CalibrationError(
        `Calibration needs ${REQUIRED_PAIRS} points, ${this.pairs.length} collected`
      );
    }
    return [first, second, third];
  }

  /**
   * Hand the completed calibration to an engine
   */
  commit(engine: TransformEngine): Calibration {
    const calibration = this.toCalibration();
    engine.setCalibration(...calibration);
    logger.info('Calibration complete');
    return calibration;
  }
}
