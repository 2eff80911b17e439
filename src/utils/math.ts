/**
 * Vector math helpers for signature comparison.
 *
 * Loops instead of reduce/spread: signature vectors are compared against
 * every accepted entry on each decision.
 */

/**
 * Euclidean norm of a numeric vector
 */
export function l2Norm(values: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i] * values[i];
  }
  return Math.sqrt(sum);
}

/**
 * Dot product of two equal-length vectors. Throws on length mismatch.
 */
export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Round to a fixed number of decimal places. Used to make floating point
 * weights reproducible byte-for-byte.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Clamp a similarity score into [-1, 1] (float error can overshoot)
 */
export function clampUnit(value: number): number {
  if (value > 1) return 1;
  if (value < -1) return -1;
  return value;
}
