export type ScreeningQuestionType = 'text' | 'multiple_choice' | 'yes_no' | 'number';

export interface ScreeningQuestion {
  question: string;
  type: ScreeningQuestionType;
  options?: string[];
}

export interface JobPosting {
  job_id: string;
  title: string;
  company: string;
  location: string;
  experience_required: string;
  salary_range: string; // "<min>-<max> LPA"
  skills_required: string[];
  description: string;
  responsibilities: string[];
  qualifications: string[];
  screening_questions?: ScreeningQuestion[];
}

export type JobChunkMetadata = {
  job_id: string;
  title: string;
  company: string;
  location: string;
  salary_range: string;
  experience_required: string;
  skills: string; // JSON-serialized skills_required
  description: string;
};

export interface IndexedChunk {
  text: string;
  metadata: JobChunkMetadata;
}

export interface ScoredChunk {
  chunk: IndexedChunk;
  distance: number;
}

export interface SearchResult {
  job_id: string;
  title: string;
  company: string;
  location: string;
  salary_range: string;
  experience_required: string;
  match_score: number;
  description: string;
  skills_required: string[];
}

export const EXPERIENCE_BUCKETS = [
  '0-2 years',
  '2-4 years',
  '3-5 years',
  '4-7 years',
  '5+ years',
] as const;

export type ExperienceBucket = (typeof EXPERIENCE_BUCKETS)[number];

export interface SearchFilters {
  location?: string;
  min_salary?: number;
  experience?: string;
}

export interface IndexRecord {
  id: string;
  text: string;
  metadata: JobChunkMetadata;
  vector: number[];
}

export interface IndexSnapshot {
  fingerprint: string;
  embeddingModel: string;
  dimension: number;
  records: IndexRecord[];
}

export type IndexState = 'uninitialized' | 'valid_cache_loaded' | 'freshly_built' | 'unavailable';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CandidateProfile {
  name: string;
  email: string;
  phone?: string;
  location?: string;
}

export interface ResumeUpload {
  fileName: string;
  fileType: string;
  content: Buffer;
}

export interface StoredResume extends ResumeUpload {
  uploadedAt: string;
}

export interface ScreeningAnswer {
  question: string;
  answer: string;
  type: ScreeningQuestionType;
}

export const APPLICATION_STATUSES = ['submitted', 'reviewed', 'accepted', 'rejected'] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export interface NewApplication {
  jobId: string;
  jobTitle: string;
  company: string;
  candidate: CandidateProfile;
  screeningAnswers?: ScreeningAnswer[];
  resume?: ResumeUpload;
}

export interface ApplicationRecord {
  id: number;
  job_id: string;
  job_title: string;
  company: string;
  candidate: CandidateProfile;
  status: ApplicationStatus;
  submitted_at: string;
  screening_responses: ScreeningAnswer[];
  has_resume: boolean;
}

export interface ApplicationSummary {
  id: number;
  job_id: string;
  job_title: string;
  company: string;
  candidate_name: string;
  candidate_email: string;
  status: ApplicationStatus;
  submitted_at: string;
}

export interface ApplicationStats {
  total_applications: number;
  submitted: number;
  reviewed: number;
  accepted: number;
  rejected: number;
}

export interface ApplicationListOptions {
  status?: ApplicationStatus;
  jobId?: string;
  limit?: number;
}

export interface ApplicationRepository {
  createApplication(application: NewApplication): Promise<number>;
  getApplication(id: number): Promise<ApplicationRecord | null>;
  listApplications(options?: ApplicationListOptions): Promise<ApplicationSummary[]>;
  updateApplicationStatus(id: number, status: ApplicationStatus): Promise<boolean>;
  saveResume(applicationId: number, resume: ResumeUpload): Promise<boolean>;
  getResume(applicationId: number): Promise<StoredResume | null>;
  getApplicationStats(): Promise<ApplicationStats>;
  searchApplications(term: string): Promise<ApplicationSummary[]>;
}

export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

export interface ChatModel {
  complete(messages: ChatMessage[]): Promise<string>;
}
