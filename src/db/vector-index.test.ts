import { readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CorpusReadError, EmbeddingProviderError, IndexNotReadyError } from '../errors';
import { renderJobText, toChunkMetadata } from '../jobs/documents';
import { FakeEmbedder, MemoryIndexStore, TableEmbedder } from '../test/fakes';
import { makeTempDir, removeDir, sampleJobs, writeCorpus } from '../test/fixtures';
import type { IndexedChunk, JobPosting } from '../types';
import { INDEX_FILE, LocalIndexStore } from './index-store';
import { JobVectorIndex } from './vector-index';

function wholeJobChunks(jobs: JobPosting[] = sampleJobs()): IndexedChunk[] {
  return jobs.map((job) => ({ text: renderJobText(job), metadata: toChunkMetadata(job) }));
}

describe('JobVectorIndex', () => {
  let dir: string;
  let corpusPath: string;
  let indexDir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    corpusPath = await writeCorpus(dir);
    indexDir = join(dir, 'job_index');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('starts uninitialized and refuses queries', async () => {
    const index = new JobVectorIndex(new MemoryIndexStore(), new FakeEmbedder());
    expect(index.state).toBe('uninitialized');
    expect(index.isReady).toBe(false);
    await expect(index.query('ml', 3)).rejects.toBeInstanceOf(IndexNotReadyError);
  });

  it('builds and persists on first start', async () => {
    const embedder = new FakeEmbedder();
    const index = new JobVectorIndex(new LocalIndexStore(indexDir), embedder);

    expect(await index.initialize(corpusPath, wholeJobChunks())).toBe('freshly_built');
    expect(index.isReady).toBe(true);
    expect(index.size).toBe(3);
    expect(embedder.calls).toBe(3);
    expect((await readdir(indexDir)).sort()).toEqual(['.jobs_hash', INDEX_FILE]);
  });

  it('reuses the stored index while the corpus is unchanged', async () => {
    await new JobVectorIndex(new LocalIndexStore(indexDir), new FakeEmbedder()).initialize(
      corpusPath,
      wholeJobChunks()
    );

    const embedder = new FakeEmbedder();
    const index = new JobVectorIndex(new LocalIndexStore(indexDir), embedder);
    expect(await index.initialize(corpusPath, wholeJobChunks())).toBe('valid_cache_loaded');
    expect(index.size).toBe(3);
    expect(embedder.calls).toBe(0);
  });

  it('rebuilds when the corpus changes', async () => {
    await new JobVectorIndex(new LocalIndexStore(indexDir), new FakeEmbedder()).initialize(
      corpusPath,
      wholeJobChunks()
    );

    const twoJobs = sampleJobs().slice(0, 2);
    await writeCorpus(dir, twoJobs);
    const index = new JobVectorIndex(new LocalIndexStore(indexDir), new FakeEmbedder());
    expect(await index.initialize(corpusPath, wholeJobChunks(twoJobs))).toBe('freshly_built');
    expect(index.size).toBe(2);
  });

  it('rebuilds when one character of a description changes', async () => {
    await new JobVectorIndex(new LocalIndexStore(indexDir), new FakeEmbedder()).initialize(
      corpusPath,
      wholeJobChunks()
    );

    const edited = sampleJobs();
    edited[1] = { ...edited[1], description: `${edited[1].description}!` };
    await writeCorpus(dir, edited);
    const embedder = new FakeEmbedder();
    const index = new JobVectorIndex(new LocalIndexStore(indexDir), embedder);

    expect(await index.initialize(corpusPath, wholeJobChunks(edited))).toBe('freshly_built');
    expect(embedder.calls).toBeGreaterThanOrEqual(1);
    expect(embedder.calls).toBe(3);
  });

  it('rebuilds when the embedding model changes', async () => {
    const store = new MemoryIndexStore();
    await new JobVectorIndex(store, new FakeEmbedder('model-a')).initialize(corpusPath, wholeJobChunks());

    const index = new JobVectorIndex(store, new FakeEmbedder('model-b'));
    expect(await index.initialize(corpusPath, wholeJobChunks())).toBe('freshly_built');
    expect(store.saves).toBe(2);
    expect(store.snapshot?.embeddingModel).toBe('model-b');
  });

  it('rebuilds over a corrupted index file', async () => {
    await new JobVectorIndex(new LocalIndexStore(indexDir), new FakeEmbedder()).initialize(
      corpusPath,
      wholeJobChunks()
    );
    await writeFile(join(indexDir, INDEX_FILE), '{"broken":');

    const index = new JobVectorIndex(new LocalIndexStore(indexDir), new FakeEmbedder());
    expect(await index.initialize(corpusPath, wholeJobChunks())).toBe('freshly_built');
  });

  it('shares one build between concurrent callers', async () => {
    const embedder = new FakeEmbedder();
    const index = new JobVectorIndex(new MemoryIndexStore(), embedder);
    const chunks = wholeJobChunks();

    const [a, b] = await Promise.all([
      index.initialize(corpusPath, chunks),
      index.initialize(corpusPath, chunks),
    ]);
    expect(a).toBe('freshly_built');
    expect(b).toBe('freshly_built');
    expect(embedder.calls).toBe(3);
  });

  it('becomes unavailable when embedding fails', async () => {
    const embedder = new FakeEmbedder();
    embedder.failWith = new Error('quota exceeded');
    const index = new JobVectorIndex(new MemoryIndexStore(), embedder);

    await expect(index.initialize(corpusPath, wholeJobChunks())).rejects.toBeInstanceOf(
      EmbeddingProviderError
    );
    expect(index.state).toBe('unavailable');
    await expect(index.query('ml', 3)).rejects.toBeInstanceOf(IndexNotReadyError);
  });

  it('becomes unavailable when the corpus cannot be read', async () => {
    const index = new JobVectorIndex(new MemoryIndexStore(), new FakeEmbedder());
    await expect(index.initialize(join(dir, 'gone.json'), [])).rejects.toBeInstanceOf(CorpusReadError);
    expect(index.state).toBe('unavailable');
  });

  it('rejects embeddings whose dimension changes mid-build', async () => {
    const [first, second] = wholeJobChunks();
    const embedder = new TableEmbedder({ [first.text]: [1], [second.text]: [1, 2] }, 1);
    const index = new JobVectorIndex(new MemoryIndexStore(), embedder);

    await expect(index.initialize(corpusPath, [first, second])).rejects.toThrow(
      'Embedding dimension changed mid-build: expected 1, got 2'
    );
  });

  it('returns the closest chunks first', async () => {
    const index = new JobVectorIndex(new MemoryIndexStore(), new FakeEmbedder());
    await index.initialize(corpusPath, wholeJobChunks());

    const hits = await index.query('machine learning models', 2);
    expect(hits).toHaveLength(2);
    expect(hits[0].chunk.metadata.job_id).toBe('JOB001');
    expect(hits[0].distance).toBeLessThan(hits[1].distance);
    expect(await index.query('machine learning models', 0)).toEqual([]);
  });

  it('breaks distance ties by build order', async () => {
    const index = new JobVectorIndex(new MemoryIndexStore(), new TableEmbedder({}, 2));
    await index.initialize(corpusPath, wholeJobChunks());

    const hits = await index.query('anything', 3);
    expect(hits.map((hit) => hit.chunk.metadata.job_id)).toEqual(['JOB001', 'JOB002', 'JOB003']);
    expect(hits.every((hit) => hit.distance === 0)).toBe(true);
  });
});
