import type { EmbeddingProvider } from './embeddings';
import { EmbeddingError, IndexNotFoundError, InvalidConfigurationError } from './errors';
import { type VectorStore, loadIndex } from './store';
import { withTimeout } from './timeout';
import type { RetrievalResult, Session } from './types';
import { createLogger } from '../core/logger';

const log = createLogger('Retriever');

/**
 * A loaded, read-only view of one session's index.
 */
export interface RetrieverHandle {
  readonly sessionId: string;
  readonly store: VectorStore;
}

export interface SearchOptions {
  /** Drop results scoring below this cosine similarity */
  scoreThreshold?: number;
  signal?: AbortSignal;
}

export interface RetrieverOptions {
  embeddings: EmbeddingProvider;
  embeddingTimeoutMs: number;
}

export class Retriever {
  private embeddings: EmbeddingProvider;
  private embeddingTimeoutMs: number;

  constructor(options: RetrieverOptions) {
    this.embeddings = options.embeddings;
    this.embeddingTimeoutMs = options.embeddingTimeoutMs;
  }

  async load(session: Session): Promise<RetrieverHandle> {
    const store = await loadIndex(session.indexDir);
    if (!store) {
      throw new IndexNotFoundError(session.id);
    }
    return { sessionId: session.id, store };
  }

  /**
   * Up to `k` chunks most similar to the query, best first. `k` larger than
   * the index is clamped; an empty result is not an error.
   */
  async search(
    handle: RetrieverHandle,
    query: string,
    k: number,
    options: SearchOptions = {}
  ): Promise<RetrievalResult[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidConfigurationError('k', `must be an integer >= 1, got ${k}`);
    }
    const { store } = handle;
    store.assertModel(this.embeddings.identity);

    const limit = Math.min(k, store.size);
    if (limit === 0) return [];

    const queryVector = await withTimeout(
      'query embedding',
      this.embeddingTimeoutMs,
      (signal) => this.embeddings.embedOne(query, { signal }),
      options.signal
    );

    if (queryVector.length !== store.dimensions) {
      throw new EmbeddingError(
        `Query vector has ${queryVector.length} dimensions, index uses ${store.dimensions}`
      );
    }
    if (queryVector.some((x) => !Number.isFinite(x))) {
      throw new EmbeddingError('Query vector has non-finite components');
    }

    let hits = store.search(queryVector, limit);
    const threshold = options.scoreThreshold;
    if (threshold !== undefined) {
      hits = hits.filter((hit) => hit.score >= threshold);
    }
    log.debug(`Session ${handle.sessionId}: ${hits.length}/${limit} results for k=${k}`);

    return hits.map(({ chunk, score }) => {
      const result: RetrievalResult = {
        chunkText: chunk.text,
        sourceDocument: chunk.sourceDocument,
        position: chunk.position,
        charSpan: [chunk.charSpan[0], chunk.charSpan[1]],
        score,
      };
      if (chunk.page !== undefined) result.page = chunk.page;
      return result;
    });
  }
}
