/**
 * Plan Locator Type Definitions
 */

// ============================================================================
// Coordinates
// ============================================================================

/** Real-world position in decimal degrees (WGS84) */
export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/** Position on the plan image, in the plan's native raster resolution */
export interface PixelPoint {
  x: number;
  y: number;
}

// ============================================================================
// Calibration
// ============================================================================

/** One reference point: where a GPS coordinate sits on the plan */
export interface CalibrationPair {
  world: GeoPoint;
  pixel: PixelPoint;
}

/** The three reference pairs that align a plan with the world */
export type Calibration = readonly [CalibrationPair, CalibrationPair, CalibrationPair];

export type CalibrationIndex = 0 | 1 | 2;

/**
 * Outcome of a query against the engine.
 *
 * `not-calibrated` means nothing has been set up yet; `degenerate` means the
 * calibration exists but cannot support the requested derivation.
 */
export type Derivation<T> =
  | { status: 'ok'; value: T }
  | { status: 'not-calibrated' }
  | { status: 'degenerate'; reason: string };

/** Emitted after every committed calibration change */
export interface CalibrationChange {
  /** Engine version after the change */
  version: number;

  /** New calibration, or null once cleared */
  calibration: Calibration | null;
}

export type CalibrationListener = (change: CalibrationChange) => void;

// ============================================================================
// Configuration
// ============================================================================

/** Great-circle distance in meters between two GPS coordinates */
export type GeodesicDistance = (a: GeoPoint, b: GeoPoint) => number;

export interface EngineOptions {
  /** Below this |det| the world points count as collinear */
  determinantEpsilon: number;

  /** Below this squared world distance two points count as identical */
  distanceSquaredEpsilon: number;

  /** Geodesic primitive used for the scale derivation */
  distance: GeodesicDistance;
}

export interface ViewportOptions {
  /** Real-world width shown when zooming to the user's position */
  visibleMeters: number;

  /** Display pixels per native plan pixel */
  displayScale: number;

  minScale: number;
  maxScale: number;
}

export interface CollectorOptions {
  /** Minimum distance between collected GPS points */
  minSeparationMeters: number;

  /** Display pixels per native plan pixel for incoming taps */
  displayScale: number;
}

export interface PlanLocatorConfig {
  engine: EngineOptions;
  viewport: ViewportOptions;
  collector: CollectorOptions;

  /** JSON file holding saved plans */
  storePath: string;
}

// ============================================================================
// Persistence
// ============================================================================

/** A plan file together with the calibration that was made for it */
export interface SavedPlan {
  id: string;
  name: string;
  filePath: string;
  calibration: Calibration;
  lastOpened: Date;
}
