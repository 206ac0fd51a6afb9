// Prompt templates for grounded question answering

import type { RetrievalResult } from './types';

export const SYSTEM_PROMPTS = {
  groundedAnswer: `You answer questions about documents the user uploaded.

Guidelines:
- Use ONLY the numbered context passages supplied with the question.
- If the passages do not contain the answer, say that the documents do not cover it.
- Refer to sources by their document name (and page, when given).
- Keep answers concise and factual.
- Use the earlier conversation to resolve follow-up questions.`,
};

function sourceLabel(chunk: RetrievalResult): string {
  return chunk.page !== undefined
    ? `${chunk.sourceDocument}, page ${chunk.page}`
    : chunk.sourceDocument;
}

// Build the context block handed to the model, best match first
export function formatContext(chunks: readonly RetrievalResult[]): string {
  if (chunks.length === 0) return 'No relevant passages were found.';

  return chunks
    .map((chunk, i) => `[${i + 1}] (${sourceLabel(chunk)})\n${chunk.chunkText}`)
    .join('\n\n');
}

export function buildQuestionPrompt(
  question: string,
  chunks: readonly RetrievalResult[]
): string {
  return `Context passages:
${formatContext(chunks)}

Question: ${question}`;
}
