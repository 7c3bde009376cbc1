/**
 * Vector helpers shared by the Postgres and in-memory stores.
 */

/**
 * Cosine distance in [0, 2], matching pgvector's `<=>` operator.
 * A zero vector has no direction; it is treated as orthogonal to everything.
 * The stores reject zero query vectors before this is reached, since
 * pgvector yields NaN for them.
 */
export const cosineDistance = (a: readonly number[], b: readonly number[]): number => {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions differ: ${String(a.length)} vs ${String(b.length)}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 1;
  }
  return 1 - dot / Math.sqrt(normA * normB);
};

/**
 * pgvector text form: `[0.1,0.2,0.3]`.
 */
export const toVectorLiteral = (vector: readonly number[]): string => `[${vector.join(',')}]`;

/** True when every component is 0, so the vector has no cosine direction. */
export const isZeroVector = (vector: readonly number[]): boolean =>
  vector.every((value) => value === 0);
