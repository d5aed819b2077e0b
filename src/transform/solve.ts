/**
 * Calibration Solve
 *
 * Derives the world → pixel mapping from three calibration pairs.
 * World points are treated as planar (x = longitude, y = latitude), which
 * holds for plan-sized areas.
 *
 * 1. Full affine fit through all three pairs (Cramer's rule)
 * 2. If the world points are collinear: similarity fit through the two
 *    best-separated pairs
 */

import { createLogger } from '../utils/logger.js';
import type { Calibration, CalibrationIndex, EngineOptions } from '../types.js';
import { fromCoefficients, fromSimilarity, type Affine2D } from './matrix.js';

const logger = createLogger('solve');

export type SolveOptions = Pick<EngineOptions, 'determinantEpsilon' | 'distanceSquaredEpsilon'>;

export interface AffineSolution {
  kind: 'affine';
  matrix: Affine2D;
}

export interface SimilaritySolution {
  kind: 'similarity';
  matrix: Affine2D;

  /** Calibration pairs the similarity was fitted through */
  pair: [CalibrationIndex, CalibrationIndex];
}

export type SolvedTransform = AffineSolution | SimilaritySolution;

export interface DegenerateSolution {
  kind: 'degenerate';
  reason: string;
}

const PAIRS: ReadonlyArray<[CalibrationIndex, CalibrationIndex]> = [
  [0, 1],
  [0, 2],
  [1, 2],
];

/**
 * Signed double area of the world triangle (the 3×3 system determinant)
 */
export function worldDeterminant(calibration: Calibration): number {
  const [p1, p2, p3] = calibration;
  const x1 = p1.world.longitude, y1 = p1.world.latitude;
  const x2 = p2.world.longitude, y2 = p2.world.latitude;
  const x3 = p3.world.longitude, y3 = p3.world.latitude;

  return x1 * (y2 - y3) - y1 * (x2 - x3) + (x2 * y3 - x3 * y2);
}

/**
 * Solve u = a·x + b·y + tx, v = c·x + d·y + ty through all three pairs
 *
 * Returns null when the world points are (nearly) collinear.
 */
export function solveAffine(calibration: Calibration, determinantEpsilon: number): AffineSolution | null {
  const det = worldDeterminant(calibration);
  if (Math.abs(det) < determinantEpsilon) return null;

  const [p1, p2, p3] = calibration;
  const x1 = p1.world.longitude, y1 = p1.world.latitude;
  const x2 = p2.world.longitude, y2 = p2.world.latitude;
  const x3 = p3.world.longitude, y3 = p3.world.latitude;

  const u1 = p1.pixel.x, v1 = p1.pixel.y;
  const u2 = p2.pixel.x, v2 = p2.pixel.y;
  const u3 = p3.pixel.x, v3 = p3.pixel.y;

  const a = (u1 * (y2 - y3) + u2 * (y3 - y1) + u3 * (y1 - y2)) / det;
  const b = (u1 * (x3 - x2) + u2 * (x1 - x3) + u3 * (x2 - x1)) / det;
  const tx = (u1 * (x2 * y3 - x3 * y2) + u2 * (x3 * y1 - x1 * y3) + u3 * (x1 * y2 - x2 * y1)) / det;

  const c = (v1 * (y2 - y3) + v2 * (y3 - y1) + v3 * (y1 - y2)) / det;
  const d = (v1 * (x3 - x2) + v2 * (x1 - x3) + v3 * (x2 - x1)) / det;
  const ty = (v1 * (x2 * y3 - x3 * y2) + v2 * (x3 * y1 - x1 * y3) + v3 * (x1 * y2 - x2 * y1)) / det;

  return { kind: 'affine', matrix: fromCoefficients(a, b, tx, c, d, ty) };
}

/**
 * Pick the two calibration pairs furthest apart in world space
 */
export function bestSeparatedPair(calibration: Calibration): {
  pair: [CalibrationIndex, CalibrationIndex];
  distanceSquared: number;
} {
  let best = PAIRS[0];
  let bestDistance = -1;

  for (const candidate of PAIRS) {
    const a = calibration[candidate[0]].world;
    const b = calibration[candidate[1]].world;
    const dx = b.longitude - a.longitude;
    const dy = b.latitude - a.latitude;
    const distanceSquared = dx * dx + dy * dy;

    if (distanceSquared > bestDistance) {
      best = candidate;
      bestDistance = distanceSquared;
    }
  }

  return { pair: best, distanceSquared: bestDistance };
}

/**
 * Fit a similarity transform through the best-separated pair
 *
 * Exact at both of its defining points. Returns null when even those two
 * points coincide.
 */
export function solveSimilarity(
  calibration: Calibration,
  distanceSquaredEpsilon: number
): SimilaritySolution | null {
  const { pair, distanceSquared } = bestSeparatedPair(calibration);
  if (distanceSquared < distanceSquaredEpsilon) return null;

  const first = calibration[pair[0]];
  const second = calibration[pair[1]];

  const xA = first.world.longitude, yA = first.world.latitude;
  const dx = second.world.longitude - xA;
  const dy = second.world.latitude - yA;
  const du = second.pixel.x - first.pixel.x;
  const dv = second.pixel.y - first.pixel.y;

  const re = (du * dx + dv * dy) / distanceSquared;
  const im = (dv * dx - du * dy) / distanceSquared;

  const tx = first.pixel.x - (re * xA - im * yA);
  const ty = first.pixel.y - (im * xA + re * yA);

  return { kind: 'similarity', matrix: fromSimilarity(re, im, tx, ty), pair };
}

/**
 * Derive the world → pixel transform for a calibration
 */
export function solveTransform(
  calibration: Calibration,
  options: SolveOptions
): SolvedTransform | DegenerateSolution {
  const affine = solveAffine(calibration, options.determinantEpsilon);
  if (affine) return affine;

  const similarity = solveSimilarity(calibration, options.distanceSquaredEpsilon);
  if (similarity) {
    logger.debug({ pair: similarity.pair }, 'Calibration points collinear, using similarity fit');
    return similarity;
  }

  logger.debug('Calibration points coincide, no transform can be derived');
  return { kind: 'degenerate', reason: 'Calibration points are effectively identical' };
}

/**
 * Pixel-space direction of increasing latitude, in radians from +x
 *
 * The latitude column of the matrix is (b, d) for an affine fit and
 * (−im, re) for a similarity fit; both sit at m[2], m[3].
 */
export function northAngleOf(matrix: Affine2D): number {
  return Math.atan2(matrix[3], matrix[2]);
}
