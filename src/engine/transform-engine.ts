/**
 * Transform Engine
 *
 * Holds the calibration for the currently loaded plan and answers
 * world ↔ pixel queries against it. The transform is re-derived from the
 * stored pairs on every query, so it always matches the latest calibration.
 *
 * One engine belongs to one loaded plan: call clearCalibration() (or make a
 * new engine) before a different plan is shown.
 */

import { createLogger } from '../utils/logger.js';
import { DEFAULT_ENGINE_OPTIONS } from '../config.js';
import type {
  Calibration,
  CalibrationIndex,
  CalibrationListener,
  CalibrationPair,
  Derivation,
  EngineOptions,
  GeoPoint,
  PixelPoint,
} from '../types.js';
import { invert, transformPoint } from '../transform/matrix.js';
import { northAngleOf, solveTransform, type SolvedTransform } from '../transform/solve.js';
import { pixelDistance } from '../transform/geodesy.js';

const logger = createLogger('engine');

/** Relative determinant below which the pixel → world inverse is refused */
const INVERSE_RELATIVE_EPSILON = 1e-10;

function copyPair(pair: CalibrationPair): CalibrationPair {
  return Object.freeze({
    world: Object.freeze({ latitude: pair.world.latitude, longitude: pair.world.longitude }),
    pixel: Object.freeze({ x: pair.pixel.x, y: pair.pixel.y }),
  });
}

function unwrap<T>(derivation: Derivation<T>): T | null {
  return derivation.status === 'ok' ? derivation.value : null;
}

export class TransformEngine {
  private readonly options: EngineOptions;
  private readonly listeners = new Set<CalibrationListener>();
  private current: Calibration | null = null;
  private revision = 0;

  constructor(options: Partial<EngineOptions> = {}) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get isCalibrated(): boolean {
    return this.current !== null;
  }

  /** Incremented on every committed change */
  get version(): number {
    return this.revision;
  }

  /** The stored pairs, for persistence */
  get calibration(): Calibration | null {
    return this.current;
  }

  pair(index: CalibrationIndex): CalibrationPair | null {
    return this.current ? this.current[index] : null;
  }

  /**
   * Replace the calibration with three new pairs
   *
   * No validation happens here; unusable geometry shows up as a
   * `degenerate` derivation.
   */
  setCalibration(first: CalibrationPair, second: CalibrationPair, third: CalibrationPair): void {
    this.current = Object.freeze([copyPair(first), copyPair(second), copyPair(third)] as const);
    this.revision++;

    logger.info({ version: this.revision, calibration: this.current }, 'Calibration set');
    this.notify();
  }

  clearCalibration(): void {
    if (this.current === null) return;

    this.current = null;
    this.revision++;

    logger.info({ version: this.revision }, 'Calibration cleared');
    this.notify();
  }

  /**
   * Register a listener for calibration changes
   *
   * @returns Function that removes the listener
   */
  onChange(listener: CalibrationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const change = { version: this.revision, calibration: this.current };
    for (const listener of [...this.listeners]) {
      listener(change);
    }
  }

  // ==========================================================================
  // Derivations
  // ==========================================================================

  /**
   * Derive the current world → pixel transform
   */
  solve(): Derivation<SolvedTransform> {
    if (!this.current) return { status: 'not-calibrated' };

    const solved = solveTransform(this.current, this.options);
    if (solved.kind === 'degenerate') {
      return { status: 'degenerate', reason: solved.reason };
    }
    return { status: 'ok', value: solved };
  }

  /**
   * Plan pixel for a GPS coordinate
   */
  locate(latitude: number, longitude: number): Derivation<PixelPoint> {
    const solved = this.solve();
    if (solved.status !== 'ok') return solved;

    const [x, y] = transformPoint(solved.value.matrix, [longitude, latitude]);
    return { status: 'ok', value: { x, y } };
  }

  /**
   * GPS coordinate for a plan pixel
   */
  unlocate(x: number, y: number): Derivation<GeoPoint> {
    const solved = this.solve();
    if (solved.status !== 'ok') return solved;

    const inverse = invert(solved.value.matrix, INVERSE_RELATIVE_EPSILON);
    if (!inverse) {
      return { status: 'degenerate', reason: 'Calibration pixels are collinear, the transform cannot be inverted' };
    }

    const [longitude, latitude] = transformPoint(inverse, [x, y]);
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      return { status: 'degenerate', reason: 'Plan position maps outside representable coordinates' };
    }
    return { status: 'ok', value: { latitude, longitude } };
  }

  /**
   * Pixel-space angle of geographic north, radians from +x
   */
  bearing(): Derivation<number> {
    const solved = this.solve();
    if (solved.status !== 'ok') return solved;

    return { status: 'ok', value: northAngleOf(solved.value.matrix) };
  }

  /**
   * Plan pixels per real-world meter
   *
   * Always measured between calibration pairs 1 and 2; pair 3 is not used.
   */
  scale(): Derivation<number> {
    if (!this.current) return { status: 'not-calibrated' };

    const [first, second] = this.current;
    const meters = this.options.distance(first.world, second.world);
    if (meters === 0) {
      return { status: 'degenerate', reason: 'First two calibration points share a GPS position' };
    }

    const pixels = pixelDistance(first.pixel, second.pixel);
    if (pixels === 0) {
      return { status: 'degenerate', reason: 'First two calibration points share a plan pixel' };
    }

    return { status: 'ok', value: pixels / meters };
  }

  // ==========================================================================
  // Plain-value queries
  // ==========================================================================

  worldToPixel(latitude: number, longitude: number): PixelPoint | null {
    return unwrap(this.locate(latitude, longitude));
  }

  pixelToWorld(x: number, y: number): GeoPoint | null {
    return unwrap(this.unlocate(x, y));
  }

  /** 0 when no angle can be derived; check isCalibrated to tell the cases apart */
  northAngle(): number {
    return unwrap(this.bearing()) ?? 0;
  }

  pixelsPerMeter(): number | null {
    return unwrap(this.scale());
  }
}
