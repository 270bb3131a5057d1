import { mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import { z } from 'zod';
import { IndexLoadError, errorMessage } from '../errors';
import type { IndexSnapshot } from '../types';

export const INDEX_FILE = 'index.json';
export const FINGERPRINT_FILE = '.jobs_hash';

/**
 * Durable home of an index snapshot. `save` must be all-or-nothing: a reader
 * never sees a fingerprint paired with vectors from another build.
 */
export interface IndexStore {
  readonly location: string;
  /** Fingerprint of the stored snapshot, or null when there is none. */
  readFingerprint(): Promise<string | null>;
  /** Throws IndexLoadError when the stored snapshot cannot be used. */
  load(): Promise<IndexSnapshot>;
  save(snapshot: IndexSnapshot): Promise<void>;
}

export const chunkMetadataSchema = z.object({
  job_id: z.string().min(1),
  title: z.string(),
  company: z.string(),
  location: z.string(),
  salary_range: z.string(),
  experience_required: z.string(),
  skills: z.string(),
  description: z.string(),
});

const snapshotSchema = z.object({
  fingerprint: z.string().min(1),
  embeddingModel: z.string(),
  dimension: z.number().int().nonnegative(),
  records: z.array(
    z.object({
      id: z.string(),
      text: z.string(),
      metadata: chunkMetadataSchema,
      vector: z.array(z.number()),
    })
  ),
});

/**
 * Checks that every vector has the snapshot's dimension.
 */
export function assertConsistentDimensions(snapshot: IndexSnapshot, location: string): void {
  const bad = snapshot.records.find((record) => record.vector.length !== snapshot.dimension);
  if (bad) {
    throw new IndexLoadError(
      `Record ${bad.id} in ${location} has dimension ${bad.vector.length}, expected ${snapshot.dimension}`
    );
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Keeps the snapshot in a directory holding `index.json` and a `.jobs_hash`
 * sidecar with the corpus fingerprint as plain text.
 *
 * Saves go to a sibling staging directory that is renamed into place once
 * both files are written, so an interrupted build leaves either the previous
 * directory or nothing at the target path.
 */
export class LocalIndexStore implements IndexStore {
  readonly location: string;

  constructor(directory: string) {
    this.location = resolve(directory);
  }

  async readFingerprint(): Promise<string | null> {
    if (!(await exists(join(this.location, INDEX_FILE)))) return null;
    try {
      const stored = await readFile(join(this.location, FINGERPRINT_FILE), 'utf8');
      return stored.trim() || null;
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async load(): Promise<IndexSnapshot> {
    let raw: string;
    let sidecar: string;
    try {
      raw = await readFile(join(this.location, INDEX_FILE), 'utf8');
      sidecar = (await readFile(join(this.location, FINGERPRINT_FILE), 'utf8')).trim();
    } catch (error) {
      throw new IndexLoadError(`Cannot read index at ${this.location}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new IndexLoadError(`Index at ${this.location} is not valid JSON`, { cause: error });
    }

    const parsed = snapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw new IndexLoadError(`Index at ${this.location} is malformed: ${parsed.error.message}`);
    }
    if (parsed.data.fingerprint !== sidecar) {
      throw new IndexLoadError(`Index at ${this.location} does not match its fingerprint file`);
    }
    assertConsistentDimensions(parsed.data, this.location);
    return parsed.data;
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    const parent = dirname(this.location);
    const name = basename(this.location);
    const suffix = `${process.pid}-${Date.now()}`;
    const staging = join(parent, `.${name}.tmp-${suffix}`);
    const retired = join(parent, `.${name}.old-${suffix}`);

    await mkdir(staging, { recursive: true });
    try {
      await writeFile(join(staging, INDEX_FILE), JSON.stringify(snapshot));
      await writeFile(join(staging, FINGERPRINT_FILE), snapshot.fingerprint);

      const hadPrevious = await exists(this.location);
      if (hadPrevious) await rename(this.location, retired);
      await rename(staging, this.location);
      if (hadPrevious) await rm(retired, { recursive: true, force: true });
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      throw error;
    }

    console.log(`💾 Saved ${snapshot.records.length} vectors to ${this.location}`);
  }
}
