import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JobVectorIndex } from '../db/vector-index';
import { JobCatalog } from '../jobs/catalog';
import { splitJobDocuments } from '../jobs/chunking';
import { buildJobDocuments } from '../jobs/documents';
import type { Embedder, JobPosting } from '../types';
import { MemoryIndexStore } from './fakes';

export function sampleJobs(): JobPosting[] {
  return [
    {
      job_id: 'JOB001',
      title: 'Machine Learning Engineer',
      company: 'Northwind Labs',
      location: 'Bangalore, India',
      experience_required: '1-2 years preferred',
      salary_range: '10-15 LPA',
      skills_required: ['Python', 'PyTorch', 'TensorFlow', 'NLP'],
      description:
        'We are hiring a machine learning engineer to build machine learning models. ' +
        'The machine learning engineer trains, evaluates and ships ML models for AI products.',
      responsibilities: ['Train ML models', 'Deploy machine learning pipelines'],
      qualifications: ['Degree in computer science', 'Experience with PyTorch'],
      screening_questions: [
        { question: 'How many years of ML experience do you have?', type: 'number' },
        {
          question: 'Which framework do you prefer?',
          type: 'multiple_choice',
          options: ['PyTorch', 'TensorFlow'],
        },
      ],
    },
    {
      job_id: 'JOB002',
      title: 'Frontend Developer',
      company: 'Blue Harbor',
      location: 'Remote',
      experience_required: '3-4 years',
      salary_range: '5-8 LPA',
      skills_required: ['React', 'TypeScript', 'CSS'],
      description: 'Build accessible React interfaces with TypeScript for our booking product.',
      responsibilities: ['Ship UI features', 'Review pull requests'],
      qualifications: ['Strong JavaScript fundamentals'],
      screening_questions: [{ question: 'Are you comfortable working remotely?', type: 'yes_no' }],
    },
    {
      job_id: 'JOB003',
      title: 'Sales Executive',
      company: 'Crescent Traders',
      location: 'Mumbai, India',
      experience_required: '5+ years',
      salary_range: 'Competitive',
      skills_required: ['Negotiation', 'CRM'],
      description: 'Grow regional sales and manage key clients across western India.',
      responsibilities: ['Close deals', 'Maintain CRM records'],
      qualifications: ['Track record in sales'],
    },
  ];
}

export async function makeTempDir(prefix: string = 'job-match-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeCorpus(
  dir: string,
  jobs: JobPosting[] = sampleJobs(),
  fileName: string = 'jobs.json'
): Promise<string> {
  const path = join(dir, fileName);
  await writeFile(path, JSON.stringify({ jobs }, null, 2));
  return path;
}

/**
 * Writes the jobs to a fresh corpus file and builds an index over them in
 * memory. Callers remove `dir` when done.
 */
export async function readyIndex(embedder: Embedder, jobs: JobPosting[] = sampleJobs()) {
  const dir = await makeTempDir();
  const corpusPath = await writeCorpus(dir, jobs);
  const chunks = await splitJobDocuments(buildJobDocuments(jobs), 500, 50);
  const store = new MemoryIndexStore();
  const index = new JobVectorIndex(store, embedder);
  await index.initialize(corpusPath, chunks);
  return { dir, corpusPath, chunks, store, index, catalog: new JobCatalog(jobs) };
}
