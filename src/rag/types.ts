export interface Session {
  id: string;
  createdAt: Date;
  /** Directory holding both areas below */
  rootDir: string;
  uploadDir: string;
  indexDir: string;
}

export interface UploadedFile {
  filename: string;
  data: Uint8Array;
}

export interface ExtractedDocument {
  filename: string;
  extension: string;
  text: string;
  pageCount: number;
  /** Character offset where each page starts; pageOffsets[0] is 0 when text is non-empty */
  pageOffsets: number[];
}

export interface Chunk {
  text: string;
  sourceDocument: string;
  /** Index of the chunk within its document */
  position: number;
  /** Half-open [start, end) character range in the extracted text */
  charSpan: [number, number];
  page?: number;
}

/** Provider + model pair recorded with every index */
export interface ModelIdentity {
  provider: string;
  modelId: string;
}

export function formatModelIdentity(identity: ModelIdentity): string {
  return `${identity.provider}:${identity.modelId}`;
}

export interface IndexedDocument {
  filename: string;
  extension: string;
  pageCount: number;
  characters: number;
  chunkCount: number;
  bytes: number;
  ingestedAt: string;
}

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface RetrievalResult {
  chunkText: string;
  sourceDocument: string;
  position: number;
  charSpan: [number, number];
  page?: number;
  score: number;
}

export interface IngestionReport {
  sessionId: string;
  documentsIngested: number;
  /** Chunks added by this call */
  chunksCreated: number;
  /** Chunks in the session index after this call */
  totalChunks: number;
  documents: IndexedDocument[];
}

export interface Answer {
  answer: string;
  /** Exactly the passages handed to the model, in rank order */
  sourceChunks: RetrievalResult[];
}

// Progress events with sub-steps
export type IngestStage =
  | 'extracting'
  | 'chunking'
  | 'embedding'
  | 'merging'
  | 'persisting'
  | 'done';

export interface IngestProgressEvent {
  sessionId: string;
  stage: IngestStage;
  message: string;
  filename?: string;
  /** 0-100 */
  progress?: number;
}

export interface ProviderCallOptions {
  signal?: AbortSignal;
}
