import { describe, expect, it } from 'vitest';
import { sampleJobs } from '../test/fixtures';
import { buildJobDocuments, renderJobText } from './documents';

describe('renderJobText', () => {
  it('renders every field in a fixed order', () => {
    const job = sampleJobs()[1];
    expect(renderJobText(job)).toBe(
      [
        'Job ID: JOB002',
        'Title: Frontend Developer',
        'Company: Blue Harbor',
        'Location: Remote',
        'Experience Required: 3-4 years',
        'Salary Range: 5-8 LPA',
        'Skills: React, TypeScript, CSS',
        'Description: Build accessible React interfaces with TypeScript for our booking product.',
        'Responsibilities: Ship UI features. Review pull requests',
        'Qualifications: Strong JavaScript fundamentals',
      ].join('\n')
    );
  });
});

describe('buildJobDocuments', () => {
  it('creates one document per posting with search metadata', () => {
    const docs = buildJobDocuments(sampleJobs());
    expect(docs).toHaveLength(3);
    expect(docs[2].metadata).toEqual({
      job_id: 'JOB003',
      title: 'Sales Executive',
      company: 'Crescent Traders',
      location: 'Mumbai, India',
      salary_range: 'Competitive',
      experience_required: '5+ years',
      skills: '["Negotiation","CRM"]',
      description: 'Grow regional sales and manage key clients across western India.',
    });
  });
});
