/**
 * Transform Module
 *
 * World ↔ plan-pixel transform derivation and the geometry it relies on.
 */

export {
  solveTransform,
  solveAffine,
  solveSimilarity,
  bestSeparatedPair,
  worldDeterminant,
  northAngleOf,
  type SolveOptions,
  type SolvedTransform,
  type AffineSolution,
  type SimilaritySolution,
  type DegenerateSolution,
} from './solve.js';

export {
  haversineDistance,
  pixelDistance,
  EARTH_RADIUS_METERS,
} from './geodesy.js';

export {
  projectToGeo,
  projectFromGeo,
  registerEPSG,
} from './projection.js';

export {
  fromCoefficients,
  fromSimilarity,
  transformPoint,
  determinant,
  invert,
  type Affine2D,
  type Vector2,
} from './matrix.js';
