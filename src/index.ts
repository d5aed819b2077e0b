/**
 * Plan Locator
 *
 * Calibrate a floor-plan or site-plan image against GPS with three reference
 * points, then map live GPS fixes onto plan pixels.
 */

// Engine
export { TransformEngine } from './engine/transform-engine.js';

// Configuration
export {
  createDefaultConfig,
  DEFAULT_ENGINE_OPTIONS,
  DEFAULT_VIEWPORT_OPTIONS,
  DEFAULT_COLLECTOR_OPTIONS,
  DEFAULT_STORE_PATH,
} from './config.js';

// Types
export type {
  // Coordinates
  GeoPoint,
  PixelPoint,

  // Calibration
  CalibrationPair,
  Calibration,
  CalibrationIndex,
  CalibrationChange,
  CalibrationListener,
  Derivation,

  // Configuration
  GeodesicDistance,
  EngineOptions,
  ViewportOptions,
  CollectorOptions,
  PlanLocatorConfig,

  // Persistence
  SavedPlan,
} from './types.js';

// Transform utilities
export {
  solveTransform,
  solveAffine,
  solveSimilarity,
  bestSeparatedPair,
  northAngleOf,
  haversineDistance,
  pixelDistance,
  projectToGeo,
  projectFromGeo,
  registerEPSG,
  transformPoint,
  invert,
  type SolvedTransform,
  type Affine2D,
} from './transform/index.js';

// Calibration flow
export { CalibrationCollector, validateGeoPoint } from './calibration/collector.js';
export {
  computeFocusTransform,
  headingMarkerRotation,
  GPS_HEADING_MIN_SPEED,
  type FocusRequest,
  type FocusTransform,
  type HeadingInput,
  type ViewportSize,
} from './calibration/viewport.js';

// Persistence
export {
  PlanStore,
  planFromEngine,
  restorePlan,
  toRecord,
  fromRecord,
  type SavedPlanRecord,
} from './persistence/plan-store.js';

// Error types
export {
  PlanLocatorError,
  ValidationError,
  CalibrationError,
  ProjectionError,
  PersistenceError,
} from './utils/errors.js';

// Logger
export { createLogger, setLogLevel } from './utils/logger.js';
