import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { Document } from '@langchain/core/documents';
import type { IndexedChunk, JobChunkMetadata } from '../types';

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

/**
 * Splits job documents into overlapping windows for embedding.
 *
 * The splitter breaks on paragraphs, then lines, then words, so a window can
 * end slightly before `chunkSize`. Each chunk gets a copy of its parent's
 * metadata and nothing else: `splitDocuments` would add a `loc` entry, so the
 * text is split per document and the metadata reattached here.
 *
 * @param chunkSize maximum characters per chunk
 * @param overlap characters shared by consecutive chunks of one document
 */
export async function splitJobDocuments(
  documents: readonly Document<JobChunkMetadata>[],
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP
): Promise<IndexedChunk[]> {
  if (!Number.isInteger(chunkSize) || !Number.isInteger(overlap) || overlap < 0) {
    throw new RangeError(`Invalid chunking parameters: size ${chunkSize}, overlap ${overlap}`);
  }
  if (chunkSize <= overlap) {
    throw new RangeError(`Chunk size (${chunkSize}) must be larger than overlap (${overlap})`);
  }

  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize,
    chunkOverlap: overlap,
    separators: ['\n\n', '\n', '. ', ' ', ''],
  });

  const chunks: IndexedChunk[] = [];
  for (const doc of documents) {
    const texts = await splitter.splitText(doc.pageContent);
    for (const text of texts) {
      chunks.push({ text, metadata: { ...doc.metadata } });
    }
  }

  console.log(`📦 Split ${documents.length} job documents into ${chunks.length} chunks`);
  return chunks;
}
