/**
 * Embedding gateway.
 *
 * Validates every provider response (count, dimension, finite values) and
 * fails with ProviderError otherwise. A transient network failure is reissued
 * once, immediately; any further retry policy belongs to the caller.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createProviderError,
  describeError,
  type ProviderError,
} from '../../../common/types/errors.js';
import { isTransientNetworkError, retryOnceIfTransient } from '../../llm/index.js';

import type { EmbeddingGateway, EmbeddingProvider } from './ports.js';
import type { Logger } from 'pino';

export interface EmbeddingGatewayDeps {
  provider: EmbeddingProvider;
  dimensions: number;
  logger: Logger;
}

/**
 * Newlines degrade embedding quality for some models; they carry no meaning here.
 */
export const cleanEmbeddingInput = (text: string): string => text.replace(/\r?\n/g, ' ');

const validateVectors = (
  vectors: unknown,
  expectedCount: number,
  dimensions: number
): Result<number[][], ProviderError> => {
  if (!Array.isArray(vectors) || vectors.length !== expectedCount) {
    return err(
      createProviderError(
        'embedding',
        `Embedding provider returned ${Array.isArray(vectors) ? String(vectors.length) : 'no'} vectors for ${String(expectedCount)} inputs`
      )
    );
  }

  const checked: number[][] = [];
  for (const [index, vector] of vectors.entries()) {
    if (!Array.isArray(vector) || vector.length !== dimensions) {
      const length = Array.isArray(vector) ? String(vector.length) : 'non-array';
      return err(
        createProviderError(
          'embedding',
          `Embedding ${String(index)} has dimension ${length}, expected ${String(dimensions)}`
        )
      );
    }
    const values: number[] = [];
    for (const value of vector) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return err(
          createProviderError('embedding', `Embedding ${String(index)} contains a non-numeric value`)
        );
      }
      values.push(value);
    }
    if (values.every((value) => value === 0)) {
      return err(createProviderError('embedding', `Embedding ${String(index)} has zero magnitude`));
    }
    checked.push(values);
  }
  return ok(checked);
};

export const makeEmbeddingGateway = (deps: EmbeddingGatewayDeps): EmbeddingGateway => {
  const { provider, dimensions } = deps;
  const log = deps.logger.child({ component: 'EmbeddingGateway' });

  const embedBatch = async (texts: readonly string[]): Promise<Result<number[][], ProviderError>> => {
    if (texts.length === 0) {
      return ok([]);
    }
    const inputs = texts.map(cleanEmbeddingInput);

    let vectors: unknown;
    try {
      vectors = await retryOnceIfTransient(() => provider.embedDocuments(inputs), log, 'embedBatch');
    } catch (error) {
      log.error({ err: error, count: texts.length }, 'Embedding provider failed');
      return err(
        createProviderError(
          'embedding',
          `Embedding provider failed: ${describeError(error)}`,
          error,
          isTransientNetworkError(error)
        )
      );
    }

    const validated = validateVectors(vectors, texts.length, dimensions);
    if (validated.isErr()) {
      log.error({ count: texts.length, reason: validated.error.message }, 'Malformed embedding response');
    }
    return validated;
  };

  return {
    dimensions,
    embedBatch,
    async embed(text) {
      const result = await embedBatch([text]);
      return result.andThen((vectors) => {
        const [vector] = vectors;
        return vector === undefined
          ? err(createProviderError('embedding', 'Embedding provider returned no vector'))
          : ok(vector);
      });
    },
  };
};
