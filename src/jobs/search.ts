import { errorMessage } from '../errors';
import { JobVectorIndex } from '../db/vector-index';
import type { IndexedChunk, JobPosting, ScreeningQuestion, SearchFilters, SearchResult } from '../types';
import { JobCatalog } from './catalog';
import { passesFilters, toMatchScore } from './filters';

export const DEFAULT_CANDIDATE_MULTIPLIER = 4;

function parseSkills(serialized: string): string[] {
  try {
    const value: unknown = JSON.parse(serialized);
    return Array.isArray(value) ? value.filter((s): s is string => typeof s === 'string') : [];
  } catch {
    return [];
  }
}

export function toSearchResult(chunk: IndexedChunk, distance: number): SearchResult {
  const { metadata } = chunk;
  return {
    job_id: metadata.job_id,
    title: metadata.title,
    company: metadata.company,
    location: metadata.location,
    salary_range: metadata.salary_range,
    experience_required: metadata.experience_required,
    match_score: toMatchScore(distance),
    description: metadata.description,
    skills_required: parseSkills(metadata.skills),
  };
}

/**
 * Semantic job search over the chunk index, plus lookups against the corpus.
 */
export class JobSearchEngine {
  constructor(
    private readonly index: JobVectorIndex,
    private readonly catalog: JobCatalog,
    private readonly candidateMultiplier: number = DEFAULT_CANDIDATE_MULTIPLIER
  ) {}

  /**
   * Up to `k` distinct jobs, best match first.
   *
   * More than `k` chunks are fetched so that deduplication and filtering
   * still leave enough jobs. Chunks arrive closest first, so the first chunk
   * seen for a job is its best one.
   */
  async searchJobs(query: string, k: number = 5, filters?: SearchFilters): Promise<SearchResult[]> {
    if (k <= 0) return [];
    const scored = await this.index.query(query, k * this.candidateMultiplier);

    const results: SearchResult[] = [];
    const seenJobs = new Set<string>();
    for (const { chunk, distance } of scored) {
      const jobId = chunk.metadata.job_id;
      if (seenJobs.has(jobId)) continue;
      seenJobs.add(jobId);

      const result = toSearchResult(chunk, distance);
      let keep = true;
      try {
        keep = passesFilters(result, filters);
      } catch (error) {
        console.warn(`⚠️ Filter evaluation failed for ${jobId}: ${errorMessage(error)}`);
      }
      if (keep) results.push(result);
      if (results.length === k) break;
    }

    return results;
  }

  getJobById(jobId: string): JobPosting | undefined {
    return this.catalog.get(jobId);
  }

  getScreeningQuestions(jobId: string): ScreeningQuestion[] {
    return this.catalog.getScreeningQuestions(jobId);
  }
}
