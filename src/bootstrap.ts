import type { Config } from './config';
import { type IndexStore, LocalIndexStore } from './db/index-store';
import { QdrantIndexStore } from './db/qdrant';
import { JobVectorIndex } from './db/vector-index';
import { JobCatalog } from './jobs/catalog';
import { splitJobDocuments } from './jobs/chunking';
import { loadJobs } from './jobs/corpus';
import { buildJobDocuments } from './jobs/documents';
import { OpenAIClient } from './openai';

export function createIndexStore(config: Config): IndexStore {
  if (config.INDEX_STORE === 'qdrant') {
    return new QdrantIndexStore({
      url: config.QDRANT_URL,
      apiKey: config.QDRANT_API_KEY,
      collectionName: config.QDRANT_COLLECTION,
    });
  }
  return new LocalIndexStore(config.INDEX_DIR);
}

export function createOpenAIClient(config: Config): OpenAIClient {
  return new OpenAIClient({
    apiKey: config.OPENAI_API_KEY,
    embeddingModel: config.EMBEDDING_MODEL,
    chatModel: config.CHAT_MODEL,
    minDelayMs: config.OPENAI_MIN_DELAY_MS,
  });
}

/**
 * Loads the corpus and brings the index to a ready state, reusing the stored
 * snapshot when the corpus is unchanged.
 */
export async function prepareJobIndex(config: Config, openai: OpenAIClient) {
  console.log(`📖 Loading jobs from ${config.JOBS_FILE}`);
  const jobs = await loadJobs(config.JOBS_FILE);
  const catalog = new JobCatalog(jobs);
  const chunks = await splitJobDocuments(
    buildJobDocuments(jobs),
    config.CHUNK_SIZE,
    config.CHUNK_OVERLAP
  );

  const index = new JobVectorIndex(createIndexStore(config), openai);
  const state = await index.initialize(config.JOBS_FILE, chunks);
  console.log(`✅ Job index ready (${state}, ${index.size} vectors, ${catalog.size} jobs)`);

  return { catalog, index };
}
