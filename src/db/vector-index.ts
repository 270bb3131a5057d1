import { EmbeddingProviderError, IndexNotReadyError, errorMessage } from '../errors';
import { getCorpusFingerprint } from '../jobs/corpus';
import type { Embedder, IndexRecord, IndexState, IndexedChunk, ScoredChunk } from '../types';
import { squaredEuclideanDistance } from '../utils';
import type { IndexStore } from './index-store';

/**
 * Flat nearest-neighbour index over job chunk embeddings.
 *
 * `initialize` reuses the stored snapshot when its fingerprint matches the
 * corpus on disk and otherwise embeds every chunk and saves a new snapshot.
 * Distances are squared Euclidean, lower is closer.
 */
export class JobVectorIndex {
  private currentState: IndexState = 'uninitialized';
  private records: IndexRecord[] = [];
  private pending: Promise<IndexState> | null = null;

  constructor(
    private readonly store: IndexStore,
    private readonly embedder: Embedder
  ) {}

  get state(): IndexState {
    return this.currentState;
  }

  get isReady(): boolean {
    return this.currentState === 'valid_cache_loaded' || this.currentState === 'freshly_built';
  }

  get size(): number {
    return this.records.length;
  }

  initialize(corpusPath: string, chunks: readonly IndexedChunk[]): Promise<IndexState> {
    if (!this.pending) {
      this.pending = this.loadOrBuild(corpusPath, chunks).finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async loadOrBuild(corpusPath: string, chunks: readonly IndexedChunk[]): Promise<IndexState> {
    try {
      const fingerprint = await getCorpusFingerprint(corpusPath);

      if (await this.tryLoad(fingerprint)) {
        this.currentState = 'valid_cache_loaded';
        return this.currentState;
      }

      this.records = await this.build(fingerprint, chunks);
      this.currentState = 'freshly_built';
      return this.currentState;
    } catch (error) {
      this.records = [];
      this.currentState = 'unavailable';
      console.error(`❌ Job index unavailable: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async tryLoad(fingerprint: string): Promise<boolean> {
    let stored: string | null;
    try {
      stored = await this.store.readFingerprint();
    } catch (error) {
      console.warn(`⚠️ Cannot read index fingerprint at ${this.store.location}: ${errorMessage(error)}`);
      return false;
    }

    if (stored === null) {
      console.log(`📝 No job index at ${this.store.location}, building one`);
      return false;
    }
    if (stored !== fingerprint) {
      console.log('⚠️ Jobs data changed, recreating index...');
      return false;
    }

    try {
      const snapshot = await this.store.load();
      if (snapshot.embeddingModel !== this.embedder.model) {
        console.log(
          `⚠️ Index was built with ${snapshot.embeddingModel}, current model is ${this.embedder.model}; rebuilding`
        );
        return false;
      }
      this.records = snapshot.records;
      console.log(`✅ Loaded existing job index (${snapshot.records.length} vectors, jobs unchanged)`);
      return true;
    } catch (error) {
      console.warn(`⚠️ Error loading index: ${errorMessage(error)}. Creating new index...`);
      return false;
    }
  }

  private async build(fingerprint: string, chunks: readonly IndexedChunk[]): Promise<IndexRecord[]> {
    console.log(`🔧 Embedding ${chunks.length} chunks with ${this.embedder.model}...`);
    const perJob = new Map<string, number>();
    const records: IndexRecord[] = [];
    let dimension = -1;

    for (const chunk of chunks) {
      const vector = await this.embed(chunk.text);
      if (dimension === -1) dimension = vector.length;
      if (vector.length !== dimension) {
        throw new EmbeddingProviderError(
          `Embedding dimension changed mid-build: expected ${dimension}, got ${vector.length}`
        );
      }
      const n = perJob.get(chunk.metadata.job_id) ?? 0;
      perJob.set(chunk.metadata.job_id, n + 1);
      records.push({
        id: `${chunk.metadata.job_id}#${n}`,
        text: chunk.text,
        metadata: chunk.metadata,
        vector,
      });
    }

    await this.store.save({
      fingerprint,
      embeddingModel: this.embedder.model,
      dimension: Math.max(dimension, 0),
      records,
    });
    console.log('✅ Job index created and saved successfully');
    return records;
  }

  private async embed(text: string): Promise<number[]> {
    try {
      return await this.embedder.embed(text);
    } catch (error) {
      if (error instanceof EmbeddingProviderError) throw error;
      throw new EmbeddingProviderError(`Embedding failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * The `k` chunks closest to `text`, closest first. Ties keep build order.
   */
  async query(text: string, k: number): Promise<ScoredChunk[]> {
    if (!this.isReady) throw new IndexNotReadyError();
    if (k <= 0 || this.records.length === 0) return [];

    const queryVector = await this.embed(text);
    return this.records
      .map((record, position) => ({
        position,
        record,
        distance: squaredEuclideanDistance(queryVector, record.vector),
      }))
      .sort((a, b) => a.distance - b.distance || a.position - b.position)
      .slice(0, k)
      .map(({ record, distance }) => ({
        chunk: { text: record.text, metadata: record.metadata },
        distance,
      }));
  }
}
