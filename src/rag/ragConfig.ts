import path from 'node:path';
import fs from 'node:fs/promises';
import { z } from 'zod';
import { InvalidConfigurationError, hasErrorCode } from './errors';

const embeddingSettingsSchema = z.object({
  provider: z.enum(['openai', 'google', 'local']),
  modelId: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
});

const generationSettingsSchema = z.object({
  provider: z.enum(['openai', 'google', 'anthropic', 'local']),
  modelId: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
  maxTokens: z.number().int().positive().optional(),
});

const ragConfigShape = z.object({
  storageRoot: z.string().min(1),
  chunkSize: z.number().int().positive(),
  chunkOverlap: z.number().int().nonnegative(),
  retrievalLimit: z.number().int().positive(),
  scoreThreshold: z.number().min(-1).max(1).optional(),
  embeddingTimeoutMs: z.number().int().positive(),
  generationTimeoutMs: z.number().int().positive(),
  generationRetries: z.number().int().min(0).max(1),
  providerMaxRetries: z.number().int().min(0).max(3),
  embedding: embeddingSettingsSchema,
  generation: generationSettingsSchema,
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  logFile: z.string().min(1).optional(),
});

export const ragConfigSchema = ragConfigShape.refine(
  (c) => c.chunkOverlap < c.chunkSize,
  {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  }
);

const ragConfigFileSchema = ragConfigShape.deepPartial().strict();

export type RagConfig = z.infer<typeof ragConfigSchema>;
export type EmbeddingSettings = z.infer<typeof embeddingSettingsSchema>;
export type GenerationSettings = z.infer<typeof generationSettingsSchema>;

export type RagConfigInput = Partial<
  Omit<RagConfig, 'embedding' | 'generation'>
> & {
  embedding?: Partial<EmbeddingSettings>;
  generation?: Partial<GenerationSettings>;
};

export const DEFAULT_RAG_CONFIG: RagConfig = {
  storageRoot: path.join('data', 'sessions'),
  chunkSize: 1000,
  chunkOverlap: 200,
  retrievalLimit: 4,
  embeddingTimeoutMs: 30_000,
  generationTimeoutMs: 60_000,
  generationRetries: 1,
  providerMaxRetries: 1,
  embedding: { provider: 'openai', modelId: 'text-embedding-3-small' },
  generation: { provider: 'openai', modelId: 'gpt-4o-mini' },
  logLevel: 'info',
};

export interface LoadConfigOptions {
  /** JSON file with a partial config; a missing file is ignored */
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: RagConfigInput;
}

type NumericKey =
  | 'chunkSize'
  | 'chunkOverlap'
  | 'retrievalLimit'
  | 'scoreThreshold'
  | 'embeddingTimeoutMs'
  | 'generationTimeoutMs';

const NUMERIC_ENV: Array<[string, NumericKey]> = [
  ['RAG_CHUNK_SIZE', 'chunkSize'],
  ['RAG_CHUNK_OVERLAP', 'chunkOverlap'],
  ['RAG_RETRIEVAL_LIMIT', 'retrievalLimit'],
  ['RAG_SCORE_THRESHOLD', 'scoreThreshold'],
  ['RAG_EMBEDDING_TIMEOUT_MS', 'embeddingTimeoutMs'],
  ['RAG_GENERATION_TIMEOUT_MS', 'generationTimeoutMs'],
];

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidConfigurationError(key, `"${raw}" is not a number`);
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/**
 * Collect RAG_* environment variables into a partial config.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): RagConfigInput {
  const input: RagConfigInput = {};

  for (const [envKey, key] of NUMERIC_ENV) {
    const value = readNumber(env, envKey);
    if (value !== undefined) input[key] = value;
  }

  const storageRoot = readString(env, 'RAG_STORAGE_ROOT');
  if (storageRoot) input.storageRoot = storageRoot;
  const logFile = readString(env, 'RAG_LOG_FILE');
  if (logFile) input.logFile = logFile;

  const embeddingModel = readString(env, 'RAG_EMBEDDING_MODEL');
  if (embeddingModel) input.embedding = { modelId: embeddingModel };
  const generationModel = readString(env, 'RAG_GENERATION_MODEL');
  if (generationModel) input.generation = { modelId: generationModel };

  return input;
}

function merge(base: RagConfigInput, next: RagConfigInput): RagConfigInput {
  return {
    ...base,
    ...next,
    embedding: { ...base.embedding, ...next.embedding },
    generation: { ...base.generation, ...next.generation },
  };
}

async function readConfigFile(file: string): Promise<RagConfigInput> {
  let data: string;
  try {
    data = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return {};
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new InvalidConfigurationError(
      file,
      error instanceof Error ? error.message : String(error)
    );
  }

  const result = ragConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidConfigurationError(
      issue.path.join('.') || file,
      issue.message
    );
  }
  return result.data;
}

/**
 * Validate a merged config, turning schema failures into
 * InvalidConfigurationError naming the first offending field.
 */
export function validateRagConfig(input: unknown): RagConfig {
  const result = ragConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidConfigurationError(
      issue.path.join('.') || 'config',
      issue.message
    );
  }
  return result.data;
}

/**
 * Resolve the engine config: defaults, then the JSON file, then RAG_*
 * environment variables, then explicit overrides.
 */
export async function loadRagConfig(
  options: LoadConfigOptions = {}
): Promise<RagConfig> {
  let merged: RagConfigInput = DEFAULT_RAG_CONFIG;
  if (options.file) {
    merged = merge(merged, await readConfigFile(options.file));
  }
  merged = merge(merged, configFromEnv(options.env ?? process.env));
  if (options.overrides) {
    merged = merge(merged, options.overrides);
  }
  return validateRagConfig(merged);
}
