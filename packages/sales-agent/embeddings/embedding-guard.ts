// Embedding guard — validates provider vectors before they reach the store.
// A vector that fails here is treated like a failed provider call.

/**
 * Thrown when a provider returns a vector that cannot be stored or compared.
 */
export class EmbeddingQualityError extends Error {
  constructor(
    message: string,
    public readonly dimension: number,
    public readonly l2Norm: number,
  ) {
    super(message);
    this.name = 'EmbeddingQualityError';
  }
}

export function l2Norm(vec: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vec.length; i++) sum += vec[i] * vec[i];
  return Math.sqrt(sum);
}

/**
 * Checks:
 * 1. Length equals the configured dimension.
 * 2. Every component is finite.
 * 3. Non-zero L2 norm, so cosine similarity is defined. The zero vector is
 *    reserved for the fallback and must never come from the provider.
 *
 * @throws EmbeddingQualityError
 */
export function validateEmbedding(embedding: Float32Array, expectedDimension: number, text?: string): void {
  const context = text ? ` for text "${text.slice(0, 50)}..."` : '';
  const n = embedding.length;

  if (n !== expectedDimension) {
    throw new EmbeddingQualityError(
      `Embedding dimension mismatch (${n}, expected ${expectedDimension})${context}`,
      n,
      0,
    );
  }

  for (let i = 0; i < n; i++) {
    if (!Number.isFinite(embedding[i])) {
      throw new EmbeddingQualityError(`Embedding component ${i} is not finite${context}`, n, Number.NaN);
    }
  }

  const norm = l2Norm(embedding);
  if (norm === 0) {
    throw new EmbeddingQualityError(`Embedding has zero norm${context}`, n, 0);
  }
}
