import { describe, expect, it } from 'vitest';
import { sampleJobs } from '../test/fixtures';
import { JobCatalog } from './catalog';

describe('JobCatalog', () => {
  const catalog = new JobCatalog(sampleJobs());

  it('looks postings up by id', () => {
    expect(catalog.size).toBe(3);
    expect(catalog.get('JOB002')?.title).toBe('Frontend Developer');
    expect(catalog.get('JOB999')).toBeUndefined();
    expect(catalog.has('JOB003')).toBe(true);
  });

  it('returns screening questions, or none', () => {
    expect(catalog.getScreeningQuestions('JOB002')).toEqual([
      { question: 'Are you comfortable working remotely?', type: 'yes_no' },
    ]);
    expect(catalog.getScreeningQuestions('JOB003')).toEqual([]);
    expect(catalog.getScreeningQuestions('JOB999')).toEqual([]);
  });
});
