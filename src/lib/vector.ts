import { embeddingError } from "./errors.js";

// ============================================
// Vector helpers — unit normalization + similarity
// ============================================

/**
 * Check dimensionality and scale a vector to unit length.
 * Throws INVALID_EMBEDDING instead of padding or truncating.
 */
export function normalizeEmbedding(embedding: readonly number[], expectedDimensions: number): number[] {
  if (embedding.length !== expectedDimensions) {
    throw embeddingError(
      `Embedding dimension ${embedding.length} does not match expected ${expectedDimensions}`,
      { actual: embedding.length, expected: expectedDimensions }
    );
  }

  let sumOfSquares = 0;
  for (const value of embedding) {
    sumOfSquares += value * value;
  }
  const norm = Math.sqrt(sumOfSquares);

  if (!Number.isFinite(norm) || norm === 0) {
    throw embeddingError("Embedding norm must be finite and non-zero", { norm });
  }

  return embedding.map((value) => value / norm);
}

/**
 * Dot product of two vectors of the same length. Equals cosine similarity
 * when both are unit length.
 */
export function dotProduct(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw embeddingError(`Cannot compare embeddings of dimension ${a.length} and ${b.length}`, {
      left: a.length,
      right: b.length,
    });
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}
