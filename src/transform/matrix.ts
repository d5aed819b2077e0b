/**
 * 2-D Affine Matrix Operations
 *
 * Matrices use the gl-matrix mat2d layout [a, c, b, d, tx, ty]:
 *
 *   x' = m[0]·x + m[2]·y + m[4]
 *   y' = m[1]·x + m[3]·y + m[5]
 *
 * They are kept in plain arrays so every operation runs in double precision
 * (gl-matrix's own create() allocates Float32Array).
 */

import { mat2d, vec2 } from 'gl-matrix';

export type Affine2D = [number, number, number, number, number, number];
export type Vector2 = [number, number];

/**
 * Build a matrix from the row-form coefficients
 * u = a·x + b·y + tx, v = c·x + d·y + ty
 */
export function fromCoefficients(
  a: number,
  b: number,
  tx: number,
  c: number,
  d: number,
  ty: number
): Affine2D {
  return [a, c, b, d, tx, ty];
}

/**
 * Build a similarity matrix (uniform scale + rotation + translation)
 *
 * (re, im) is the complex scale-rotation factor.
 */
export function fromSimilarity(re: number, im: number, tx: number, ty: number): Affine2D {
  return [re, im, -im, re, tx, ty];
}

/**
 * Transform a point by a matrix
 */
export function transformPoint(matrix: Affine2D, point: Vector2): Vector2 {
  const out: Vector2 = [0, 0];
  vec2.transformMat2d(out, point, matrix);
  return out;
}

export function determinant(matrix: Affine2D): number {
  return mat2d.determinant(matrix);
}

/**
 * Invert a matrix
 *
 * Fails when |det| is at most `relativeEpsilon` times the magnitude of its
 * two products, i.e. when the linear part is (nearly) singular.
 */
export function invert(matrix: Affine2D, relativeEpsilon = 0): Affine2D | null {
  const scale = Math.abs(matrix[0] * matrix[3]) + Math.abs(matrix[1] * matrix[2]);
  if (Math.abs(determinant(matrix)) <= relativeEpsilon * scale) return null;

  const result: Affine2D = [0, 0, 0, 0, 0, 0];
  const success = mat2d.invert(result, matrix);
  if (!success || !result.every(Number.isFinite)) return null;
  return result;
}
