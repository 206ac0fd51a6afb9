/**
 * Session-scoped document ingestion and retrieval-augmented question
 * answering.
 *
 * @example
 * const engine = createRagEngine(await loadRagConfig());
 * const session = await engine.createSession();
 * await engine.ingest(session, [{ filename: 'notes.md', data }]);
 * const { answer, sourceChunks } = await engine.answer(session.id, 'What changed?', []);
 */

import { AiSdkEmbeddingProvider, type EmbeddingProvider } from './embeddings';
import { AiSdkGenerationProvider, type GenerationProvider } from './generation';
import { Indexer, type IngestOptions } from './ingest';
import { createEmbeddingModel, createLanguageModel, identityOf } from './providers';
import { QueryEngine, type AnswerOptions } from './queryEngine';
import type { RagConfig } from './ragConfig';
import { Retriever, type RetrieverHandle, type SearchOptions } from './retriever';
import { SessionLock } from './sessionLock';
import { SessionStore } from './sessionStore';
import type {
  Answer,
  ChatTurn,
  IngestionReport,
  RetrievalResult,
  Session,
  UploadedFile,
} from './types';
import { engineLogger } from '../core/logger';

export interface RagEngineDependencies {
  /** Replaces the provider built from config.embedding */
  embeddingProvider?: EmbeddingProvider;
  /** Replaces the provider built from config.generation */
  generationProvider?: GenerationProvider;
  now?: () => Date;
}

export interface RagEngine {
  readonly config: RagConfig;
  readonly sessions: SessionStore;
  createSession(): Promise<Session>;
  resolveSession(sessionId: string): Promise<Session>;
  ingest(
    session: Session,
    files: readonly UploadedFile[],
    options?: IngestOptions
  ): Promise<IngestionReport>;
  loadRetriever(session: Session): Promise<RetrieverHandle>;
  search(
    handle: RetrieverHandle,
    query: string,
    k: number,
    options?: SearchOptions
  ): Promise<RetrievalResult[]>;
  answer(
    sessionId: string,
    question: string,
    chatHistory?: readonly ChatTurn[],
    options?: AnswerOptions
  ): Promise<Answer>;
}

export function createEmbeddingProvider(config: RagConfig): EmbeddingProvider {
  return new AiSdkEmbeddingProvider({
    identity: identityOf(config.embedding),
    model: createEmbeddingModel(config.embedding),
    maxRetries: config.providerMaxRetries,
  });
}

export function createGenerationProvider(config: RagConfig): GenerationProvider {
  return new AiSdkGenerationProvider({
    identity: identityOf(config.generation),
    model: createLanguageModel(config.generation),
    maxTokens: config.generation.maxTokens,
    maxRetries: config.providerMaxRetries,
  });
}

/**
 * Wire one explicit instance of every component from a validated config.
 * Providers are built from config unless supplied.
 */
export function createRagEngine(
  config: RagConfig,
  deps: RagEngineDependencies = {}
): RagEngine {
  engineLogger.configure({ minLevel: config.logLevel, logFile: config.logFile });

  const sessions = new SessionStore({ root: config.storageRoot, now: deps.now });
  const embeddings = deps.embeddingProvider ?? createEmbeddingProvider(config);
  const generation = deps.generationProvider ?? createGenerationProvider(config);

  const indexer = new Indexer({
    sessions,
    embeddings,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    embeddingTimeoutMs: config.embeddingTimeoutMs,
    lock: new SessionLock(),
    now: deps.now,
  });
  const retriever = new Retriever({
    embeddings,
    embeddingTimeoutMs: config.embeddingTimeoutMs,
  });
  const queryEngine = new QueryEngine({
    sessions,
    retriever,
    generation,
    retrievalLimit: config.retrievalLimit,
    generationTimeoutMs: config.generationTimeoutMs,
    generationRetries: config.generationRetries,
    scoreThreshold: config.scoreThreshold,
  });

  return {
    config,
    sessions,
    createSession: () => sessions.createSession(),
    resolveSession: (sessionId) => sessions.resolve(sessionId),
    ingest: (session, files, options) => indexer.ingest(session, files, options),
    loadRetriever: (session) => retriever.load(session),
    search: (handle, query, k, options) => retriever.search(handle, query, k, options),
    answer: (sessionId, question, chatHistory, options) =>
      queryEngine.answer(sessionId, question, chatHistory, options),
  };
}

export * from './errors';
export * from './types';
export { chunkText, joinChunks, pageAt, validateChunkOptions } from './chunker';
export { extract, isSupportedFile, SUPPORTED_EXTENSIONS } from './extractor';
export { AiSdkEmbeddingProvider, type EmbeddingProvider } from './embeddings';
export {
  AiSdkGenerationProvider,
  type GenerationProvider,
  type GenerationRequest,
} from './generation';
export { createEmbeddingModel, createLanguageModel } from './providers';
export {
  DEFAULT_RAG_CONFIG,
  loadRagConfig,
  validateRagConfig,
  type RagConfig,
  type RagConfigInput,
} from './ragConfig';
export { SessionStore, createSessionId, parseSessionId } from './sessionStore';
export { SessionLock } from './sessionLock';
export { VectorStore, cosineSimilarity, loadIndex, persistIndex } from './store';
export { withTimeout } from './timeout';
export { Indexer, type IngestOptions } from './ingest';
export { Retriever, type RetrieverHandle, type SearchOptions } from './retriever';
export { QueryEngine, type AnswerOptions } from './queryEngine';
export { createLogger, engineLogger, type LogEntry } from '../core/logger';
