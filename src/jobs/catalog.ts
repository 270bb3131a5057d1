import type { JobPosting, ScreeningQuestion } from '../types';

/**
 * Read-only lookup of postings by job id, built once from the loaded corpus.
 */
export class JobCatalog {
  private readonly jobs: ReadonlyMap<string, JobPosting>;

  constructor(postings: readonly JobPosting[]) {
    this.jobs = new Map(postings.map((job) => [job.job_id, job]));
  }

  get size(): number {
    return this.jobs.size;
  }

  get(jobId: string): JobPosting | undefined {
    return this.jobs.get(jobId);
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  all(): JobPosting[] {
    return [...this.jobs.values()];
  }

  getScreeningQuestions(jobId: string): ScreeningQuestion[] {
    return this.jobs.get(jobId)?.screening_questions ?? [];
  }
}
