import type { NormalizedVector } from "@domain/rag/ports";

/**
 * Scales `vector` to unit L2 length so that a dot product against other
 * normalized vectors equals their cosine similarity.
 *
 * A zero vector is returned as zeros, which scores 0 against every row.
 * Components must be finite; NaN or Infinity propagate into the result.
 */
export function normalize(vector: readonly number[]): NormalizedVector {
  const norm = l2Norm(vector);
  if (norm === 0) {
    return vector.slice();
  }

  return vector.map((value) => value / norm);
}

/**
 * Euclidean length, scaled by the largest component first so that very large
 * or very small finite values neither overflow nor underflow.
 */
export function l2Norm(vector: readonly number[]): number {
  let scale = 0;
  for (const value of vector) {
    scale = Math.max(scale, Math.abs(value));
  }
  if (scale === 0 || !Number.isFinite(scale)) {
    return scale;
  }

  let sumOfSquares = 0;
  for (const value of vector) {
    const scaled = value / scale;
    sumOfSquares += scaled * scaled;
  }
  return scale * Math.sqrt(sumOfSquares);
}

export function dot(a: readonly number[], b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}
