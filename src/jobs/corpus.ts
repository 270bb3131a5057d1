import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { CorpusFormatError, CorpusReadError, errorMessage } from '../errors';
import type { JobPosting } from '../types';

const screeningQuestionSchema = z.object({
  question: z.string().min(1),
  type: z.enum(['text', 'multiple_choice', 'yes_no', 'number']).default('text'),
  options: z.array(z.string()).optional(),
});

export const jobPostingSchema = z.object({
  job_id: z.string().min(1),
  title: z.string(),
  company: z.string(),
  location: z.string(),
  experience_required: z.string(),
  salary_range: z.string(),
  skills_required: z.array(z.string()),
  description: z.string(),
  responsibilities: z.array(z.string()),
  qualifications: z.array(z.string()),
  screening_questions: z.array(screeningQuestionSchema).optional(),
});

async function readCorpusBytes(sourcePath: string): Promise<Buffer> {
  try {
    return await readFile(sourcePath);
  } catch (error) {
    throw new CorpusReadError(`Cannot read job corpus at ${sourcePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads job postings from a JSON file shaped `{ "jobs": [...] }`.
 *
 * Throws CorpusReadError when the file is missing, is not JSON, or a posting
 * misses a required field, and CorpusFormatError when the `jobs` collection
 * itself is absent.
 */
export async function loadJobs(sourcePath: string): Promise<JobPosting[]> {
  const raw = await readCorpusBytes(sourcePath);

  let data: unknown;
  try {
    data = JSON.parse(raw.toString('utf8'));
  } catch (error) {
    throw new CorpusReadError(`Job corpus at ${sourcePath} is not valid JSON`, { cause: error });
  }

  if (!isRecord(data) || !('jobs' in data)) {
    throw new CorpusFormatError(`Job corpus at ${sourcePath} has no "jobs" collection`);
  }
  if (!Array.isArray(data.jobs)) {
    throw new CorpusFormatError(`"jobs" in ${sourcePath} must be an array`);
  }

  const jobs: JobPosting[] = [];
  const seen = new Set<string>();
  data.jobs.forEach((entry, i) => {
    const parsed = jobPostingSchema.safeParse(entry);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
      throw new CorpusReadError(`Malformed job at index ${i}: ${issues.join('; ')}`);
    }
    if (seen.has(parsed.data.job_id)) {
      throw new CorpusReadError(`Duplicate job_id ${parsed.data.job_id} at index ${i}`);
    }
    seen.add(parsed.data.job_id);
    jobs.push(parsed.data);
  });

  return jobs;
}

export async function getCorpusFingerprint(sourcePath: string): Promise<string> {
  const raw = await readCorpusBytes(sourcePath);
  return createHash('md5').update(raw).digest('hex');
}
