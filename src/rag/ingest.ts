import { chunkText, validateChunkOptions } from './chunker';
import type { EmbeddingProvider } from './embeddings';
import { EmbeddingError } from './errors';
import { extract } from './extractor';
import { SessionLock } from './sessionLock';
import type { SessionStore } from './sessionStore';
import { VectorStore, loadIndex, persistIndex } from './store';
import { withTimeout } from './timeout';
import type {
  Chunk,
  ExtractedDocument,
  IndexedDocument,
  IngestionReport,
  IngestProgressEvent,
  Session,
  UploadedFile,
} from './types';
import { createLogger } from '../core/logger';

const log = createLogger('Indexer');

export interface IndexerOptions {
  sessions: SessionStore;
  embeddings: EmbeddingProvider;
  chunkSize: number;
  chunkOverlap: number;
  embeddingTimeoutMs: number;
  /** Shared with other writers of the same storage root */
  lock?: SessionLock;
  now?: () => Date;
}

export interface IngestOptions {
  chunkSize?: number;
  overlap?: number;
  signal?: AbortSignal;
  onProgress?: (event: IngestProgressEvent) => void;
}

interface PreparedFile {
  file: UploadedFile;
  storedName: string;
  document: IndexedDocument;
  chunks: Chunk[];
}

/**
 * Turns uploaded files into searchable chunks of a session's index.
 *
 * Everything fallible that does not touch the session (extraction, chunking,
 * embedding) happens before the first write, so a failed call leaves the
 * session exactly as it was.
 */
export class Indexer {
  private sessions: SessionStore;
  private embeddings: EmbeddingProvider;
  private chunkSize: number;
  private chunkOverlap: number;
  private embeddingTimeoutMs: number;
  private lock: SessionLock;
  private now: () => Date;

  constructor(options: IndexerOptions) {
    this.sessions = options.sessions;
    this.embeddings = options.embeddings;
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.embeddingTimeoutMs = options.embeddingTimeoutMs;
    this.lock = options.lock ?? new SessionLock();
    this.now = options.now ?? (() => new Date());
  }

  ingest(
    session: Session,
    files: readonly UploadedFile[],
    options: IngestOptions = {}
  ): Promise<IngestionReport> {
    return this.lock.run(session.id, () =>
      this.ingestLocked(session, files, options)
    );
  }

  private async ingestLocked(
    session: Session,
    files: readonly UploadedFile[],
    options: IngestOptions
  ): Promise<IngestionReport> {
    const chunkSize = options.chunkSize ?? this.chunkSize;
    const overlap = options.overlap ?? this.chunkOverlap;
    validateChunkOptions(chunkSize, overlap);

    const progress = (event: Omit<IngestProgressEvent, 'sessionId'>) => {
      options.onProgress?.({ sessionId: session.id, ...event });
    };

    log.info(`Ingesting ${files.length} file(s) into ${session.id}`);
    const ingestedAt = this.now().toISOString();

    // Provenance uses the stored upload name, unique within the session
    const existing = await loadIndex(session.indexDir);
    const taken = new Set<string>([
      ...(await this.sessions.listUploads(session)),
      ...(existing?.documents.map((d) => d.filename) ?? []),
    ]);

    // 1. Extract and chunk every file before anything is written
    const prepared: PreparedFile[] = [];
    for (const [i, file] of files.entries()) {
      options.signal?.throwIfAborted();
      progress({
        stage: 'extracting',
        message: `Extracting ${file.filename}`,
        filename: file.filename,
        progress: Math.round((i / Math.max(files.length, 1)) * 40),
      });

      let extracted: ExtractedDocument;
      try {
        extracted = await extract(file.data, file.filename);
      } catch (error) {
        log.warn(`Extraction failed for ${file.filename}`, error);
        throw error;
      }

      const storedName = this.sessions.uploadName(file.filename, taken);
      taken.add(storedName);

      progress({
        stage: 'chunking',
        message: `Chunking ${file.filename}`,
        filename: file.filename,
      });
      const chunks = chunkText(
        extracted.text,
        chunkSize,
        overlap,
        storedName,
        extracted.pageOffsets
      );
      log.debug(`${file.filename}: ${extracted.text.length} chars, ${chunks.length} chunks`);

      prepared.push({
        file,
        storedName,
        chunks,
        document: {
          filename: storedName,
          extension: extracted.extension,
          pageCount: extracted.pageCount,
          characters: extracted.text.length,
          chunkCount: chunks.length,
          bytes: file.data.byteLength,
          ingestedAt,
        },
      });
    }

    const newChunks = prepared.flatMap((p) => p.chunks);

    // The recorded model must match before any vectors are requested
    existing?.assertModel(this.embeddings.identity);

    // 2. One batched embedding call for all new chunks
    progress({
      stage: 'embedding',
      message: `Embedding ${newChunks.length} chunks`,
      progress: 40,
    });
    const vectors = await this.embedChunks(newChunks, options.signal);

    // 3. Merge with the existing index, if any
    progress({ stage: 'merging', message: 'Merging into session index', progress: 80 });
    const store = existing ?? VectorStore.create(this.embeddings.identity, this.now());
    if (store.size > 0 && vectors.length > 0 && vectors[0].length !== store.dimensions) {
      throw new EmbeddingError(
        `Embedding provider returned ${vectors[0].length}-dimensional vectors; index uses ${store.dimensions}`
      );
    }
    store.append(
      prepared.map((p) => p.document),
      newChunks,
      vectors,
      this.now()
    );

    // 4. Keep the raw uploads, then swap the index in atomically
    options.signal?.throwIfAborted();
    progress({ stage: 'persisting', message: 'Saving uploads and index', progress: 90 });
    const saved: string[] = [];
    try {
      for (const { file, storedName } of prepared) {
        saved.push(await this.sessions.saveUpload(session, storedName, file.data));
      }
      await persistIndex(session.indexDir, store);
    } catch (error) {
      await this.discardUploads(session, saved);
      throw error;
    }

    const report: IngestionReport = {
      sessionId: session.id,
      documentsIngested: prepared.length,
      chunksCreated: newChunks.length,
      totalChunks: store.size,
      documents: prepared.map((p) => p.document),
    };
    progress({
      stage: 'done',
      message: `Indexed ${report.chunksCreated} chunks from ${report.documentsIngested} document(s)`,
      progress: 100,
    });
    log.info(
      `Session ${session.id}: +${report.chunksCreated} chunks (${report.totalChunks} total)`
    );
    return report;
  }

  private async embedChunks(
    chunks: readonly Chunk[],
    signal?: AbortSignal
  ): Promise<number[][]> {
    if (chunks.length === 0) return [];

    const texts = chunks.map((c) => c.text);
    const vectors = await withTimeout(
      'embedding',
      this.embeddingTimeoutMs,
      (timeoutSignal) => this.embeddings.embed(texts, { signal: timeoutSignal }),
      signal
    );

    if (vectors.length !== chunks.length) {
      throw new EmbeddingError(
        `Embedding provider returned ${vectors.length} vectors for ${chunks.length} chunks`
      );
    }
    const dimensions = vectors[0].length;
    if (dimensions === 0 || vectors.some((v) => v.length !== dimensions)) {
      throw new EmbeddingError('Embedding provider returned vectors of inconsistent length');
    }
    if (vectors.some((v) => v.some((x) => !Number.isFinite(x)))) {
      throw new EmbeddingError('Embedding provider returned non-finite vector components');
    }
    return vectors;
  }

  /**
   * Remove the blobs a failed call wrote. Names are unique to the call, so
   * nothing older is touched.
   */
  private async discardUploads(session: Session, storedNames: readonly string[]): Promise<void> {
    for (const name of storedNames) {
      await this.sessions.removeUpload(session, name).catch((cleanupError: unknown) => {
        log.warn(`Could not remove upload ${name} from ${session.id}`, cleanupError);
      });
    }
  }
}
