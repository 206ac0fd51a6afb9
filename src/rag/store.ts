import path from 'node:path';
import fs from 'node:fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  EmbeddingModelMismatchError,
  IndexCorruptError,
  IndexPersistenceError,
  hasErrorCode,
} from './errors';
import {
  formatModelIdentity,
  type Chunk,
  type IndexedDocument,
  type ModelIdentity,
} from './types';
import { createLogger } from '../core/logger';

const log = createLogger('VectorStore');

export const INDEX_FILE = 'index.json';
export const INDEX_VERSION = 1;

// ============================================================================
// ARTIFACT SCHEMA
// ============================================================================

const chunkSchema = z.object({
  text: z.string(),
  sourceDocument: z.string(),
  position: z.number().int().nonnegative(),
  charSpan: z.tuple([z.number().int(), z.number().int()]),
  page: z.number().int().positive().optional(),
});

const documentSchema = z.object({
  filename: z.string(),
  extension: z.string(),
  pageCount: z.number().int().nonnegative(),
  characters: z.number().int().nonnegative(),
  chunkCount: z.number().int().nonnegative(),
  bytes: z.number().int().nonnegative(),
  ingestedAt: z.string(),
});

const indexFileSchema = z
  .object({
    version: z.literal(INDEX_VERSION),
    embeddingModel: z.object({
      provider: z.string().min(1),
      modelId: z.string().min(1),
    }),
    dimensions: z.number().int().nonnegative(),
    createdAt: z.string(),
    updatedAt: z.string(),
    documents: z.array(documentSchema),
    chunks: z.array(chunkSchema),
    vectors: z.array(z.array(z.number())),
  })
  .superRefine((file, ctx) => {
    if (file.chunks.length !== file.vectors.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${file.chunks.length} chunks but ${file.vectors.length} vectors`,
        path: ['vectors'],
      });
    }
    file.vectors.forEach((vector, i) => {
      if (vector.length !== file.dimensions) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `vector has ${vector.length} dimensions, expected ${file.dimensions}`,
          path: ['vectors', i],
        });
      }
    });
  });

export type IndexFile = z.infer<typeof indexFileSchema>;

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

// ============================================================================
// SIMILARITY
// ============================================================================

/**
 * Cosine similarity in [-1, 1]. Zero vectors score 0 against everything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// ============================================================================
// VECTOR STORE
// ============================================================================

/**
 * In-memory flat index over one session's chunks. Chunks and vectors are
 * kept in lockstep and in insertion order.
 */
export class VectorStore {
  readonly embeddingModel: ModelIdentity;
  private dims: number;
  private createdAt: string;
  private updatedAt: string;
  private documentEntries: IndexedDocument[];
  private chunkEntries: Chunk[];
  private vectorEntries: number[][];

  private constructor(file: IndexFile) {
    this.embeddingModel = file.embeddingModel;
    this.dims = file.dimensions;
    this.createdAt = file.createdAt;
    this.updatedAt = file.updatedAt;
    this.documentEntries = file.documents;
    this.chunkEntries = file.chunks;
    this.vectorEntries = file.vectors;
  }

  static create(embeddingModel: ModelIdentity, now = new Date()): VectorStore {
    const timestamp = now.toISOString();
    return new VectorStore({
      version: INDEX_VERSION,
      embeddingModel: { ...embeddingModel },
      dimensions: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
      documents: [],
      chunks: [],
      vectors: [],
    });
  }

  /**
   * Validate parsed JSON and build a store from it. `source` names the file
   * in errors.
   */
  static fromJSON(data: unknown, source: string): VectorStore {
    const parsed = indexFileSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new IndexCorruptError(source, `${where}${issue.message}`, parsed.error);
    }
    return new VectorStore(parsed.data);
  }

  get size(): number {
    return this.chunkEntries.length;
  }

  get dimensions(): number {
    return this.dims;
  }

  get documents(): readonly IndexedDocument[] {
    return this.documentEntries;
  }

  get chunks(): readonly Chunk[] {
    return this.chunkEntries;
  }

  /**
   * Fail unless vectors from `identity` can be compared with this index.
   */
  assertModel(identity: ModelIdentity): void {
    const recorded = formatModelIdentity(this.embeddingModel);
    const configured = formatModelIdentity(identity);
    if (recorded !== configured) {
      throw new EmbeddingModelMismatchError(recorded, configured);
    }
  }

  /**
   * Append chunks with their vectors. Every vector must match the index
   * dimension, which an empty index takes from the first vector.
   */
  append(
    documents: readonly IndexedDocument[],
    chunks: readonly Chunk[],
    vectors: readonly number[][],
    now = new Date()
  ): void {
    if (chunks.length !== vectors.length) {
      throw new Error(
        `Cannot append ${chunks.length} chunks with ${vectors.length} vectors`
      );
    }
    if (vectors.length > 0) {
      const expected = this.size > 0 ? this.dims : vectors[0].length;
      const bad = vectors.find((v) => v.length !== expected);
      if (bad) {
        throw new Error(
          `Vector has ${bad.length} dimensions, index uses ${expected}`
        );
      }
      this.dims = expected;
    }

    this.documentEntries.push(...documents);
    this.chunkEntries.push(...chunks);
    this.vectorEntries.push(...vectors.map((v) => [...v]));
    this.updatedAt = now.toISOString();
  }

  /**
   * Top `k` chunks by cosine similarity, highest first. Equal scores keep
   * insertion order.
   */
  search(queryVector: readonly number[], k: number): ScoredChunk[] {
    const scored = this.chunkEntries.map((chunk, i) => ({
      chunk,
      score: cosineSimilarity(queryVector, this.vectorEntries[i]),
      order: i,
    }));
    scored.sort((a, b) => b.score - a.score || a.order - b.order);
    return scored.slice(0, k).map(({ chunk, score }) => ({ chunk, score }));
  }

  toJSON(): IndexFile {
    return {
      version: INDEX_VERSION,
      embeddingModel: this.embeddingModel,
      dimensions: this.dims,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      documents: this.documentEntries,
      chunks: this.chunkEntries,
      vectors: this.vectorEntries,
    };
  }
}

// ============================================================================
// PERSISTENCE
// ============================================================================

export function indexPath(indexDir: string): string {
  return path.join(indexDir, INDEX_FILE);
}

/**
 * Read a session's index. Returns null when nothing was persisted yet.
 */
export async function loadIndex(indexDir: string): Promise<VectorStore | null> {
  const file = indexPath(indexDir);

  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw new IndexCorruptError(file, 'unreadable', error);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new IndexCorruptError(file, 'invalid JSON', error);
  }

  const store = VectorStore.fromJSON(data, file);
  log.debug(`Loaded ${store.size} chunks from ${file}`);
  return store;
}

/**
 * Write the index next to its final location and rename it into place, so
 * readers see either the previous artifact or the new one.
 */
export async function persistIndex(
  indexDir: string,
  store: VectorStore
): Promise<void> {
  const file = indexPath(indexDir);
  const temp = path.join(indexDir, `.${INDEX_FILE}.${uuidv4()}.tmp`);

  try {
    await fs.mkdir(indexDir, { recursive: true });
    await fs.writeFile(temp, JSON.stringify(store.toJSON()), 'utf-8');
    await fs.rename(temp, file);
  } catch (error) {
    await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
      log.warn(`Could not remove ${temp}`, cleanupError);
    });
    log.error(`Failed to persist index at ${file}`, error);
    throw new IndexPersistenceError(file, error);
  }
  log.debug(`Persisted ${store.size} chunks to ${file}`);
}
