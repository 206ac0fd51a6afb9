import {
  GenerationError,
  ProviderTimeoutError,
  describeCause,
  isRagError,
} from './errors';
import type { GenerationProvider, GenerationRequest } from './generation';
import type { Retriever } from './retriever';
import type { SessionStore } from './sessionStore';
import { withTimeout } from './timeout';
import type { Answer, ChatTurn } from './types';
import { createLogger } from '../core/logger';

const log = createLogger('QueryEngine');

export interface QueryEngineOptions {
  sessions: SessionStore;
  retriever: Retriever;
  generation: GenerationProvider;
  retrievalLimit: number;
  generationTimeoutMs: number;
  /** Extra attempts after a generation timeout (0 or 1) */
  generationRetries: number;
  scoreThreshold?: number;
}

export interface AnswerOptions {
  signal?: AbortSignal;
}

/**
 * Answers questions against an indexed session. Read-only: nothing here
 * writes to the session, and conversation history is owned by the caller.
 */
export class QueryEngine {
  private sessions: SessionStore;
  private retriever: Retriever;
  private generation: GenerationProvider;
  private retrievalLimit: number;
  private generationTimeoutMs: number;
  private generationRetries: number;
  private scoreThreshold?: number;

  constructor(options: QueryEngineOptions) {
    this.sessions = options.sessions;
    this.retriever = options.retriever;
    this.generation = options.generation;
    this.retrievalLimit = options.retrievalLimit;
    this.generationTimeoutMs = options.generationTimeoutMs;
    this.generationRetries = Math.min(1, Math.max(0, options.generationRetries));
    this.scoreThreshold = options.scoreThreshold;
  }

  async answer(
    sessionId: string,
    question: string,
    chatHistory: readonly ChatTurn[] = [],
    options: AnswerOptions = {}
  ): Promise<Answer> {
    const session = await this.sessions.resolve(sessionId);
    const handle = await this.retriever.load(session);
    const sourceChunks = await this.retriever.search(
      handle,
      question,
      this.retrievalLimit,
      { scoreThreshold: this.scoreThreshold, signal: options.signal }
    );
    log.debug(
      `Session ${sessionId}: ${sourceChunks.length} passages, ${chatHistory.length} history turns`
    );

    const answer = await this.generateWithRetry(
      { contextChunks: sourceChunks, chatHistory, question },
      options.signal
    );
    return { answer, sourceChunks };
  }

  private async generateWithRetry(
    request: GenerationRequest,
    signal?: AbortSignal
  ): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.generateOnce(request, signal);
      } catch (error) {
        if (error instanceof ProviderTimeoutError && attempt < this.generationRetries) {
          log.warn(`Generation timed out, retrying (attempt ${attempt + 2})`);
          continue;
        }
        log.error('Generation failed', describeCause(error));
        throw error;
      }
    }
  }

  private async generateOnce(
    request: GenerationRequest,
    signal?: AbortSignal
  ): Promise<string> {
    let text: string;
    try {
      text = await withTimeout(
        'generation',
        this.generationTimeoutMs,
        (timeoutSignal) => this.generation.generate(request, { signal: timeoutSignal }),
        signal
      );
    } catch (error) {
      if (signal?.aborted || isRagError(error)) throw error;
      throw new GenerationError(`Generation failed: ${describeCause(error)}`, error);
    }

    const answer = text.trim();
    if (!answer) {
      throw new GenerationError('Model returned an empty answer');
    }
    return answer;
  }
}
