import { Document } from '@langchain/core/documents';
import type { JobChunkMetadata, JobPosting } from '../types';

/**
 * Renders a posting as the text that gets embedded. Field order is fixed:
 * identity first, then compensation and skills, then the long-form sections.
 */
export function renderJobText(job: JobPosting): string {
  return [
    `Job ID: ${job.job_id}`,
    `Title: ${job.title}`,
    `Company: ${job.company}`,
    `Location: ${job.location}`,
    `Experience Required: ${job.experience_required}`,
    `Salary Range: ${job.salary_range}`,
    `Skills: ${job.skills_required.join(', ')}`,
    `Description: ${job.description}`,
    `Responsibilities: ${job.responsibilities.join('. ')}`,
    `Qualifications: ${job.qualifications.join('. ')}`,
  ].join('\n');
}

export function toChunkMetadata(job: JobPosting): JobChunkMetadata {
  return {
    job_id: job.job_id,
    title: job.title,
    company: job.company,
    location: job.location,
    salary_range: job.salary_range,
    experience_required: job.experience_required,
    skills: JSON.stringify(job.skills_required),
    description: job.description,
  };
}

/**
 * One document per posting. The metadata carries everything a search result
 * needs, so the query path never goes back to the corpus.
 */
export function buildJobDocuments(jobs: readonly JobPosting[]): Document<JobChunkMetadata>[] {
  return jobs.map(
    (job) =>
      new Document<JobChunkMetadata>({
        pageContent: renderJobText(job),
        metadata: toChunkMetadata(job),
      })
  );
}
