import { generateText, type CoreMessage, type LanguageModel } from 'ai';
import { GenerationError, describeCause, isRagError } from './errors';
import { SYSTEM_PROMPTS, buildQuestionPrompt } from './prompts';
import type {
  ChatTurn,
  ModelIdentity,
  ProviderCallOptions,
  RetrievalResult,
} from './types';

export interface GenerationRequest {
  contextChunks: readonly RetrievalResult[];
  /** Earlier turns, oldest first */
  chatHistory: readonly ChatTurn[];
  question: string;
}

/**
 * Produces one answer per call. Implementations must not keep conversation
 * state between calls.
 */
export interface GenerationProvider {
  readonly identity: ModelIdentity;
  generate(
    request: GenerationRequest,
    options?: ProviderCallOptions
  ): Promise<string>;
}

export interface AiSdkGenerationOptions {
  identity: ModelIdentity;
  model: LanguageModel;
  maxTokens?: number;
  maxRetries?: number;
  systemPrompt?: string;
}

export function buildMessages(request: GenerationRequest): CoreMessage[] {
  const messages = request.chatHistory.map(
    (turn): CoreMessage =>
      turn.role === 'user'
        ? { role: 'user', content: turn.content }
        : { role: 'assistant', content: turn.content }
  );
  messages.push({
    role: 'user',
    content: buildQuestionPrompt(request.question, request.contextChunks),
  });
  return messages;
}

export class AiSdkGenerationProvider implements GenerationProvider {
  readonly identity: ModelIdentity;
  private model: LanguageModel;
  private maxTokens: number;
  private maxRetries: number;
  private systemPrompt: string;

  constructor(options: AiSdkGenerationOptions) {
    this.identity = options.identity;
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1024;
    this.maxRetries = options.maxRetries ?? 1;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPTS.groundedAnswer;
  }

  async generate(
    request: GenerationRequest,
    options: ProviderCallOptions = {}
  ): Promise<string> {
    try {
      const result = await generateText({
        model: this.model,
        system: this.systemPrompt,
        messages: buildMessages(request),
        maxTokens: this.maxTokens,
        maxRetries: this.maxRetries,
        abortSignal: options.signal,
      });
      return result.text;
    } catch (error) {
      if (options.signal?.aborted || isRagError(error)) throw error;
      throw new GenerationError(
        `Generation request failed: ${describeCause(error)}`,
        error
      );
    }
  }
}
