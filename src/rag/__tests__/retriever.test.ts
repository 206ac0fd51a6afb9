// @vitest-environment node
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import { Indexer } from '../ingest';
import { Retriever } from '../retriever';
import { SessionStore } from '../sessionStore';
import { indexPath } from '../store';
import {
  EmbeddingError,
  EmbeddingModelMismatchError,
  IndexCorruptError,
  IndexNotFoundError,
  InvalidConfigurationError,
  SessionNotFoundError,
} from '../errors';
import type { Session } from '../types';
import { HashEmbeddings, makeTempDir, removeDir, textFile } from './helpers';

describe('Retriever', () => {
  let root: string;
  let sessions: SessionStore;
  let session: Session;
  let embeddings: HashEmbeddings;
  let retriever: Retriever;

  beforeEach(async () => {
    root = makeTempDir('retriever-');
    sessions = new SessionStore({ root });
    session = await sessions.createSession();
    embeddings = new HashEmbeddings();
    retriever = new Retriever({ embeddings, embeddingTimeoutMs: 1000 });
  });

  afterEach(() => {
    removeDir(root);
  });

  async function ingestAnimals() {
    const indexer = new Indexer({
      sessions,
      embeddings,
      chunkSize: 1000,
      chunkOverlap: 200,
      embeddingTimeoutMs: 1000,
    });
    await indexer.ingest(session, [
      textFile('cats.txt', 'cats purr softly'),
      textFile('dogs.txt', 'dogs bark loudly'),
      textFile('fish.txt', 'fish swim quietly'),
    ]);
  }

  it('should fail to load a session that was never indexed', async () => {
    const error = await retriever.load(session).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IndexNotFoundError);
    expect(error).toBeInstanceOf(SessionNotFoundError);
  });

  it('should fail to load a corrupt index', async () => {
    fs.writeFileSync(indexPath(session.indexDir), '[]');
    await expect(retriever.load(session)).rejects.toBeInstanceOf(IndexCorruptError);
  });

  it('should rank the closest chunk first', async () => {
    await ingestAnimals();
    const handle = await retriever.load(session);

    const results = await retriever.search(handle, 'dogs bark loudly', 3);

    expect(results.map((r) => r.sourceDocument)).toEqual(['dogs.txt', 'fish.txt', 'cats.txt']);
    expect(results[0].score).toBeCloseTo(1, 10);
    expect(results[0]).toMatchObject({
      chunkText: 'dogs bark loudly',
      position: 0,
      charSpan: [0, 16],
      page: 1,
    });
    expect(embeddings.queries).toEqual(['dogs bark loudly']);
  });

  it('should keep insertion order for equal scores', async () => {
    await ingestAnimals();
    const handle = await retriever.load(session);

    // No tokens, so every chunk scores 0
    const results = await retriever.search(handle, '???', 3);

    expect(results.map((r) => r.score)).toEqual([0, 0, 0]);
    expect(results.map((r) => r.sourceDocument)).toEqual(['cats.txt', 'dogs.txt', 'fish.txt']);
  });

  it('should clamp k to the number of chunks', async () => {
    await ingestAnimals();
    const handle = await retriever.load(session);

    expect(await retriever.search(handle, 'cats', 50)).toHaveLength(3);
  });

  it('should reject k below 1 or fractional k', async () => {
    await ingestAnimals();
    const handle = await retriever.load(session);

    for (const k of [0, -3, 1.5]) {
      await expect(retriever.search(handle, 'cats', k)).rejects.toBeInstanceOf(
        InvalidConfigurationError
      );
    }
    expect(embeddings.queries).toEqual([]);
  });

  it('should drop results under the score threshold', async () => {
    await ingestAnimals();
    const handle = await retriever.load(session);

    const results = await retriever.search(handle, 'dogs bark loudly', 3, {
      scoreThreshold: 0.5,
    });

    expect(results.map((r) => r.sourceDocument)).toEqual(['dogs.txt']);
  });

  it('should reject a query vector of the wrong size', async () => {
    await ingestAnimals();
    const handle = await retriever.load(session);
    embeddings.embedOne = async () => [1, 2, 3];

    const error = await retriever.search(handle, 'cats', 3).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toHaveProperty('message', 'Query vector has 3 dimensions, index uses 64');
  });

  it('should reject a query vector with non-finite components', async () => {
    await ingestAnimals();
    const handle = await retriever.load(session);
    embeddings.embedOne = async () => Array.from({ length: 64 }, (_, i) => (i === 0 ? Infinity : 0));

    await expect(retriever.search(handle, 'cats', 3)).rejects.toThrow(
      'Query vector has non-finite components'
    );
  });

  it('should refuse to query with a different embedding model', async () => {
    await ingestAnimals();
    const other = new HashEmbeddings('hash-64-v2');
    const otherRetriever = new Retriever({ embeddings: other, embeddingTimeoutMs: 1000 });
    const handle = await otherRetriever.load(session);

    await expect(otherRetriever.search(handle, 'cats', 1)).rejects.toBeInstanceOf(
      EmbeddingModelMismatchError
    );
    expect(other.calls).toBe(0);
  });
});
