import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import { IndexLoadError, errorMessage } from '../errors';
import type { IndexRecord, IndexSnapshot } from '../types';
import { generateUniqueId } from '../utils';
import { type IndexStore, assertConsistentDimensions, chunkMetadataSchema } from './index-store';

export const COLLECTION_NAME = 'job_postings';
const UPSERT_BATCH_SIZE = 256;
const SCROLL_PAGE_SIZE = 256;

const payloadSchema = z.object({
  chunkId: z.string(),
  position: z.number().int().nonnegative(),
  text: z.string(),
  embeddingModel: z.string(),
  metadata: chunkMetadataSchema,
});

function isDenseVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((x) => typeof x === 'number');
}

/**
 * Keeps index snapshots in Qdrant. Every snapshot is written to its own
 * collection `<alias>_<fingerprint>_<build>`; the alias is then repointed in
 * one request, which is the commit. The fingerprint is read back from the
 * name of the collection the alias targets.
 */
export class QdrantIndexStore implements IndexStore {
  client;
  aliasName;

  constructor(options?: { url?: string; apiKey?: string; collectionName?: string }) {
    const url = options?.url || process.env.QDRANT_URL || 'http://localhost:6333';
    const apiKey = options?.apiKey || process.env.QDRANT_API_KEY;
    this.aliasName = options?.collectionName || COLLECTION_NAME;
    this.client = new QdrantClient({ url, apiKey });
  }

  get location(): string {
    return `qdrant:${this.aliasName}`;
  }

  private collectionFor(fingerprint: string): string {
    return `${this.aliasName}_${fingerprint}_${Date.now()}`;
  }

  /** Null for any collection this store did not create. */
  private fingerprintOf(collection: string): string | null {
    const alias = this.aliasName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const match = new RegExp(`^${alias}_([0-9a-f]{32})_(\\d+)$`).exec(collection);
    return match ? match[1] : null;
  }

  private async currentCollection(): Promise<string | null> {
    const { aliases } = await this.client.getAliases();
    const alias = aliases.find((entry) => entry.alias_name === this.aliasName);
    return alias ? alias.collection_name : null;
  }

  async readFingerprint(): Promise<string | null> {
    const collection = await this.currentCollection();
    return collection ? this.fingerprintOf(collection) : null;
  }

  async load(): Promise<IndexSnapshot> {
    let collection: string | null;
    try {
      collection = await this.currentCollection();
    } catch (error) {
      throw new IndexLoadError(`Cannot reach Qdrant: ${errorMessage(error)}`, { cause: error });
    }
    const fingerprint = collection ? this.fingerprintOf(collection) : null;
    if (!collection || !fingerprint) {
      throw new IndexLoadError(`Qdrant alias ${this.aliasName} does not point to an index`);
    }

    const positioned: { position: number; record: IndexRecord }[] = [];
    let embeddingModel = '';
    let offset: string | number | undefined;
    try {
      do {
        const page = await this.client.scroll(collection, {
          limit: SCROLL_PAGE_SIZE,
          offset,
          with_payload: true,
          with_vector: true,
        });
        for (const point of page.points) {
          const payload = payloadSchema.safeParse(point.payload);
          if (!payload.success || !isDenseVector(point.vector)) {
            throw new IndexLoadError(`Point ${point.id} in ${collection} is malformed`);
          }
          embeddingModel = payload.data.embeddingModel;
          positioned.push({
            position: payload.data.position,
            record: {
              id: payload.data.chunkId,
              text: payload.data.text,
              metadata: payload.data.metadata,
              vector: point.vector,
            },
          });
        }
        const next = page.next_page_offset;
        offset = typeof next === 'string' || typeof next === 'number' ? next : undefined;
      } while (offset !== undefined);
    } catch (error) {
      if (error instanceof IndexLoadError) throw error;
      throw new IndexLoadError(`Cannot read ${collection}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    // Scroll order is by point id; restore build order.
    const records = positioned
      .sort((a, b) => a.position - b.position)
      .map((entry) => entry.record);

    const snapshot: IndexSnapshot = {
      fingerprint,
      embeddingModel,
      dimension: records[0]?.vector.length ?? 0,
      records,
    };
    assertConsistentDimensions(snapshot, collection);
    console.log(`📊 Loaded ${records.length} vectors from Qdrant collection ${collection}`);
    return snapshot;
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    const target = this.collectionFor(snapshot.fingerprint);

    console.log(`🏗️ Creating collection ${target} with dimension ${snapshot.dimension}...`);
    await this.client.createCollection(target, {
      vectors: { size: snapshot.dimension, distance: 'Euclid' },
    });

    try {
      for (let i = 0; i < snapshot.records.length; i += UPSERT_BATCH_SIZE) {
        const batch = snapshot.records.slice(i, i + UPSERT_BATCH_SIZE);
        await this.client.upsert(target, {
          wait: true,
          points: batch.map((record, j) => ({
            id: generateUniqueId(record.id),
            vector: record.vector,
            payload: {
              chunkId: record.id,
              position: i + j,
              text: record.text,
              embeddingModel: snapshot.embeddingModel,
              metadata: record.metadata,
            },
          })),
        });
      }
    } catch (error) {
      console.error(`❌ Qdrant storage error: ${errorMessage(error)}`);
      try {
        await this.client.deleteCollection(target);
      } catch (cleanupError) {
        console.error(
          `❌ Could not delete unfinished collection ${target}: ${errorMessage(cleanupError)}`
        );
      }
      throw error;
    }

    const previous = await this.currentCollection();
    await this.client.updateCollectionAliases({
      actions: [
        ...(previous ? [{ delete_alias: { alias_name: this.aliasName } }] : []),
        { create_alias: { collection_name: target, alias_name: this.aliasName } },
      ],
    });
    console.log(`✅ Alias ${this.aliasName} now points to ${target}`);

    const { collections } = await this.client.getCollections();
    for (const collection of collections) {
      if (this.fingerprintOf(collection.name) && collection.name !== target) {
        console.log(`🗑️ Deleting retired collection ${collection.name}`);
        await this.client.deleteCollection(collection.name);
      }
    }
  }
}
