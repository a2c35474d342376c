/**
 * Embedding Dimension Validation
 *
 * Checks provider output before it reaches the vector store: every vector
 * non-empty, finite and of the expected length.
 */

import { z } from 'zod';

import { EmbeddingError, EmbeddingErrorCode } from './types.js';

// ============================================================================
// Zod Schemas
// ============================================================================

/**
 * Schema for a single embedding vector
 */
export const EmbeddingVectorSchema = z
  .array(z.number().finite())
  .min(1, 'Embedding vector cannot be empty');

export const DimensionValidationResultSchema = z.object({
  valid: z.boolean(),
  actualDimensions: z.number().int().nonnegative(),
  expectedDimensions: z.number().int().positive(),
  error: z.string().optional(),
});

export type DimensionValidationResult = z.infer<typeof DimensionValidationResultSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate one vector against the expected dimension
 *
 * @example
 * ```typescript
 * const result = checkEmbeddingDimensions(vector, 1536);
 * if (!result.valid) {
 *   logger.warn(result.error ?? 'invalid vector');
 * }
 * ```
 */
export function checkEmbeddingDimensions(
  vector: readonly number[],
  expectedDimensions: number
): DimensionValidationResult {
  const actualDimensions = vector.length;
  const parsed = EmbeddingVectorSchema.safeParse(vector);

  if (!parsed.success) {
    return {
      valid: false,
      actualDimensions,
      expectedDimensions,
      error: parsed.error.issues[0]?.message ?? 'Invalid embedding vector',
    };
  }
  if (actualDimensions !== expectedDimensions) {
    return {
      valid: false,
      actualDimensions,
      expectedDimensions,
      error: `Dimension mismatch: expected ${expectedDimensions}, got ${actualDimensions}`,
    };
  }
  return { valid: true, actualDimensions, expectedDimensions };
}

/**
 * Throw on the first vector that fails validation
 *
 * @throws {EmbeddingError} DIMENSION_MISMATCH
 */
export function validateEmbeddingDimensions(
  vectors: readonly (readonly number[])[],
  expectedDimensions: number
): void {
  for (let i = 0; i < vectors.length; i++) {
    const result = checkEmbeddingDimensions(vectors[i]!, expectedDimensions);
    if (!result.valid) {
      throw new EmbeddingError(
        `Embedding at index ${i}: ${result.error ?? 'invalid vector'}`,
        EmbeddingErrorCode.DIMENSION_MISMATCH
      );
    }
  }
}

/**
 * Check if embedding dimensions are consistent within a batch
 */
export function areDimensionsConsistent(vectors: readonly (readonly number[])[]): boolean {
  if (vectors.length <= 1) {
    return true;
  }
  const first = vectors[0]!.length;
  return vectors.every((v) => v.length === first);
}
