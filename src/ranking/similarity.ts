/**
 * Sparse vector similarity helpers
 */

import type { SparseVector } from "@/types/ranking";

function dot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let sum = 0;
  for (const [index, value] of small) {
    const other = large.get(index);
    if (other !== undefined) sum += value * other;
  }
  return sum;
}

function norm(v: SparseVector): number {
  let sum = 0;
  for (const value of v.values()) sum += value * value;
  return Math.sqrt(sum);
}

/**
 * Cosine similarity of two sparse vectors.
 *
 * Returns 0 when either vector is zero.
 */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  const normA = norm(a);
  const normB = norm(b);
  if (normA === 0 || normB === 0) return 0;
  return dot(a, b) / (normA * normB);
}

/**
 * Cosine similarity of every row vector against every column vector.
 *
 * @returns rows.length × columns.length matrix
 */
export function similarityMatrix(
  rows: readonly SparseVector[],
  columns: readonly SparseVector[],
): number[][] {
  return rows.map((row) => columns.map((column) => cosineSimilarity(row, column)));
}

/**
 * Index of the largest value; the lowest index wins ties.
 *
 * @returns -1 for an empty array
 */
export function stableArgmax(values: readonly number[]): number {
  let best = -1;
  for (let i = 0; i < values.length; i++) {
    if (best === -1 || values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}
