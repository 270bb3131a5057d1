import type { ExperienceBucket, SearchFilters, SearchResult } from '../types';

/**
 * Substrings that place a posting's experience text in a filter bucket.
 * A keyword only counts where it is not part of a longer number, so "1.5-3"
 * holds no "5-" and "10-15" holds no "0-1". An experience filter outside
 * this table does not filter.
 */
export const EXPERIENCE_BUCKET_KEYWORDS: Record<ExperienceBucket, readonly string[]> = {
  '0-2 years': ['0-2', '0-1', '1-2'],
  '2-4 years': ['2-4', '2-3', '3-4'],
  '3-5 years': ['3-5', '3-4', '4-5'],
  '4-7 years': ['4-7', '4-5', '5-6', '5-7', '6-7'],
  '5+ years': ['5+', '5-', '6+', '7+', '8+', '10+'],
};

function isExperienceBucket(value: string): value is ExperienceBucket {
  return Object.prototype.hasOwnProperty.call(EXPERIENCE_BUCKET_KEYWORDS, value);
}

/** Maps a distance onto (0, 1]; 1 only at distance 0. */
export function toMatchScore(distance: number): number {
  return 1 / (1 + distance);
}

/**
 * Lower bound of a `"<min>-<max> LPA"` range, or null when it does not start
 * with a whole number ("Competitive", "₹10-15 LPA", "12.5-20 LPA").
 */
export function parseMinSalary(salaryRange: string): number | null {
  const head = salaryRange.split('-')[0].replace(/\s*[A-Za-z]+\s*$/, '').trim();
  if (!/^[+-]?\d+$/.test(head)) return null;
  return Number.parseInt(head, 10);
}

export function matchesLocation(result: SearchResult, location: string): boolean {
  return result.location.toLowerCase().includes(location.toLowerCase());
}

/** Unparseable salaries pass. */
export function meetsMinSalary(result: SearchResult, minSalary: number): boolean {
  const salaryMin = parseMinSalary(result.salary_range);
  return salaryMin === null || salaryMin >= minSalary;
}

export function containsExperienceKeyword(text: string, keyword: string): boolean {
  const openEnded = !/\d$/.test(keyword);
  for (let at = text.indexOf(keyword); at !== -1; at = text.indexOf(keyword, at + 1)) {
    if (/[\d.]/.test(text.charAt(at - 1))) continue;
    if (!openEnded && /^\.?\d/.test(text.slice(at + keyword.length))) continue;
    return true;
  }
  return false;
}

export function matchesExperience(result: SearchResult, bucket: string): boolean {
  if (!isExperienceBucket(bucket)) return true;
  const jobExperience = result.experience_required.toLowerCase();
  return EXPERIENCE_BUCKET_KEYWORDS[bucket].some((keyword) =>
    containsExperienceKeyword(jobExperience, keyword)
  );
}

/**
 * Runs the filters in order (location, salary, experience) and stops at the
 * first one that rejects.
 */
export function passesFilters(result: SearchResult, filters?: SearchFilters): boolean {
  if (!filters) return true;
  if (filters.location !== undefined && !matchesLocation(result, filters.location)) return false;
  if (filters.min_salary !== undefined && !meetsMinSalary(result, filters.min_salary)) return false;
  if (filters.experience !== undefined && !matchesExperience(result, filters.experience)) {
    return false;
  }
  return true;
}
