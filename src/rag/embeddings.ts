import { embed, embedMany, type EmbeddingModel } from 'ai';
import { EmbeddingError, describeCause, isRagError } from './errors';
import type { ModelIdentity, ProviderCallOptions } from './types';

/**
 * Turns text into fixed-length vectors. One instance always produces vectors
 * of a single model, named by `identity`.
 */
export interface EmbeddingProvider {
  readonly identity: ModelIdentity;
  /** One vector per input, in input order */
  embed(texts: string[], options?: ProviderCallOptions): Promise<number[][]>;
  embedOne(text: string, options?: ProviderCallOptions): Promise<number[]>;
}

export interface AiSdkEmbeddingOptions {
  identity: ModelIdentity;
  model: EmbeddingModel<string>;
  /** Retries performed by the SDK itself on transport errors */
  maxRetries?: number;
}

/**
 * EmbeddingProvider backed by an AI SDK embedding model.
 */
export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  readonly identity: ModelIdentity;
  private model: EmbeddingModel<string>;
  private maxRetries: number;

  constructor(options: AiSdkEmbeddingOptions) {
    this.identity = options.identity;
    this.model = options.model;
    this.maxRetries = options.maxRetries ?? 1;
  }

  async embed(
    texts: string[],
    options: ProviderCallOptions = {}
  ): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const { embeddings } = await embedMany({
        model: this.model,
        values: texts,
        maxRetries: this.maxRetries,
        abortSignal: options.signal,
      });
      return embeddings;
    } catch (error) {
      throw wrapProviderError(error, options.signal);
    }
  }

  async embedOne(
    text: string,
    options: ProviderCallOptions = {}
  ): Promise<number[]> {
    try {
      const { embedding } = await embed({
        model: this.model,
        value: text,
        maxRetries: this.maxRetries,
        abortSignal: options.signal,
      });
      return embedding;
    } catch (error) {
      throw wrapProviderError(error, options.signal);
    }
  }
}

function wrapProviderError(error: unknown, signal?: AbortSignal): unknown {
  // Cancellation and timeouts keep their own identity
  if (signal?.aborted || isRagError(error)) return error;
  return new EmbeddingError(
    `Embedding request failed: ${describeCause(error)}`,
    error
  );
}
