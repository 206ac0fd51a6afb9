import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { EmbeddingProvider } from '../embeddings';
import type { GenerationProvider, GenerationRequest } from '../generation';
import { DEFAULT_RAG_CONFIG, validateRagConfig, type RagConfig } from '../ragConfig';
import type { ModelIdentity, ProviderCallOptions, UploadedFile } from '../types';

export const HASH_DIMENSIONS = 64;

export function makeTempDir(prefix = 'rag-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function textFile(filename: string, content: string): UploadedFile {
  return { filename, data: new TextEncoder().encode(content) };
}

export function testConfig(storageRoot: string, overrides: Partial<RagConfig> = {}): RagConfig {
  return validateRagConfig({
    ...DEFAULT_RAG_CONFIG,
    embedding: { provider: 'local', modelId: 'hash-64', baseURL: 'http://localhost:1234/v1' },
    generation: { provider: 'local', modelId: 'echo', baseURL: 'http://localhost:1234/v1' },
    storageRoot,
    ...overrides,
  });
}

// FNV-1a, 32 bit
function hashToken(token: string): number {
  let h = 2166136261;
  for (let i = 0; i < token.length; i++) {
    h ^= token.charCodeAt(i);
    h = Math.imul(h, 16777619) >>> 0;
  }
  return h;
}

/**
 * Bag-of-words vector: one bucket per hashed lowercase token.
 */
export function hashVector(text: string, dimensions = HASH_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    vector[hashToken(token) % dimensions] += 1;
  }
  return vector;
}

/**
 * Deterministic embedding provider that records every call.
 */
export class HashEmbeddings implements EmbeddingProvider {
  readonly identity: ModelIdentity;
  readonly batches: string[][] = [];
  readonly queries: string[] = [];

  constructor(modelId = 'hash-64') {
    this.identity = { provider: 'test', modelId };
  }

  get calls(): number {
    return this.batches.length + this.queries.length;
  }

  async embed(texts: string[], _options?: ProviderCallOptions): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map((t) => hashVector(t));
  }

  async embedOne(text: string, _options?: ProviderCallOptions): Promise<number[]> {
    this.queries.push(text);
    return hashVector(text);
  }
}

type Reply = (request: GenerationRequest, signal?: AbortSignal) => Promise<string>;

/**
 * Generation provider returning scripted replies, one per call; the last
 * reply repeats.
 */
export class ScriptedGenerator implements GenerationProvider {
  readonly identity: ModelIdentity = { provider: 'test', modelId: 'scripted' };
  readonly requests: GenerationRequest[] = [];
  private replies: Reply[];

  constructor(...replies: Array<string | Reply>) {
    this.replies = replies.map((r) => (typeof r === 'string' ? async () => r : r));
  }

  async generate(request: GenerationRequest, options: ProviderCallOptions = {}): Promise<string> {
    this.requests.push(request);
    const reply = this.replies[Math.min(this.requests.length, this.replies.length) - 1];
    if (!reply) return `Answer to: ${request.question}`;
    return reply(request, options.signal);
  }
}

/** Never settles on its own; rejects when the signal aborts */
export function hang(_request: GenerationRequest, signal?: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
