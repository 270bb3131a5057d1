import type { ScoredChunk } from '../types';

export const ASSISTANT_SYSTEM_PROMPT = `You are JobMatch AI, a helpful assistant for job seekers.

Instructions:
1. Answer using the job excerpts in the context and the previous conversation
2. When recommending openings, mention their job IDs (e.g. JOB001) so the candidate can apply
3. If the context has no suitable opening, say so plainly
4. Keep answers short and conversational
5. To apply, the candidate says "apply" together with the job ID`;

/**
 * Formats retrieved chunks as numbered context blocks for the chat model.
 */
export function formatJobContext(chunks: readonly ScoredChunk[]): string {
  if (chunks.length === 0) return 'No matching job excerpts were found.';
  return chunks
    .map(({ chunk }, i) => `[Excerpt ${i + 1} | ${chunk.metadata.job_id}]\n${chunk.text}`)
    .join('\n\n');
}

export function buildUserPrompt(question: string, context: string): string {
  return `Context:
${context}

Question: ${question}`;
}
