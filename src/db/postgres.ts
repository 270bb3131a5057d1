import postgres from 'postgres';
import {
  APPLICATION_STATUSES,
  type ApplicationListOptions,
  type ApplicationRecord,
  type ApplicationRepository,
  type ApplicationStats,
  type ApplicationStatus,
  type ApplicationSummary,
  type NewApplication,
  type ResumeUpload,
  type ScreeningAnswer,
  type ScreeningQuestionType,
  type StoredResume,
} from '../types';

export interface PostgresConfig {
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
}

type ApplicationRow = {
  id: number;
  job_id: string;
  job_title: string;
  company: string;
  candidate_name: string;
  candidate_email: string;
  candidate_phone: string | null;
  candidate_location: string | null;
  status: string;
  submitted_at: Date;
};

type ResponseRow = {
  question: string;
  answer: string;
  question_type: string | null;
};

type ResumeRow = {
  file_name: string;
  file_content: Buffer;
  file_type: string | null;
  uploaded_at: Date;
};

const QUESTION_TYPES: readonly ScreeningQuestionType[] = ['text', 'multiple_choice', 'yes_no', 'number'];

function toStatus(value: string): ApplicationStatus {
  return APPLICATION_STATUSES.find((status) => status === value) ?? 'submitted';
}

function toQuestionType(value: string | null): ScreeningQuestionType {
  return QUESTION_TYPES.find((type) => type === value) ?? 'text';
}

function toSummary(row: ApplicationRow): ApplicationSummary {
  return {
    id: row.id,
    job_id: row.job_id,
    job_title: row.job_title,
    company: row.company,
    candidate_name: row.candidate_name,
    candidate_email: row.candidate_email,
    status: toStatus(row.status),
    submitted_at: row.submitted_at.toISOString(),
  };
}

function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, '\\$&')}%`;
}

/**
 * Applications, screening responses and resumes in PostgreSQL.
 */
export class PostgresApplicationRepository implements ApplicationRepository {
  private client;

  constructor(config?: PostgresConfig) {
    const cfg = {
      host: config?.host || process.env.POSTGRES_HOST || 'localhost',
      port: config?.port || parseInt(process.env.POSTGRES_PORT || '5432'),
      database: config?.database || process.env.POSTGRES_DB || 'jobs_db',
      username: config?.username || process.env.POSTGRES_USER || 'postgres',
      password: config?.password || process.env.POSTGRES_PASSWORD || 'password',
    };
    this.client = postgres(cfg);
  }

  async setup() {
    console.log('🔧 Setting up PostgreSQL schema...');
    await this.client`
      CREATE TABLE IF NOT EXISTS applications (
        id SERIAL PRIMARY KEY,
        job_id VARCHAR(50) NOT NULL,
        job_title VARCHAR(200) NOT NULL,
        company VARCHAR(200) NOT NULL,
        candidate_name VARCHAR(200) NOT NULL,
        candidate_email VARCHAR(200) NOT NULL,
        candidate_phone VARCHAR(30),
        candidate_location VARCHAR(200),
        status VARCHAR(20) NOT NULL DEFAULT 'submitted'
          CHECK (status IN ('submitted', 'reviewed', 'accepted', 'rejected')),
        submitted_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `;
    await this.client`
      CREATE TABLE IF NOT EXISTS screening_responses (
        id SERIAL PRIMARY KEY,
        application_id INTEGER NOT NULL REFERENCES applications(id) ON DELETE CASCADE,
        question TEXT NOT NULL,
        answer TEXT NOT NULL,
        question_type VARCHAR(50)
      )
    `;
    await this.client`
      CREATE TABLE IF NOT EXISTS resumes (
        id SERIAL PRIMARY KEY,
        application_id INTEGER NOT NULL UNIQUE REFERENCES applications(id) ON DELETE CASCADE,
        file_name VARCHAR(255) NOT NULL,
        file_content BYTEA NOT NULL,
        file_type VARCHAR(100),
        uploaded_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `;
    await this.client`CREATE INDEX IF NOT EXISTS idx_applications_job_id ON applications(job_id)`;
    await this.client`CREATE INDEX IF NOT EXISTS idx_applications_status ON applications(status)`;
    await this.client`CREATE INDEX IF NOT EXISTS idx_responses_application ON screening_responses(application_id)`;

    console.log('✅ PostgreSQL schema ready');
  }

  /**
   * Inserts the application with its answers and resume in one statement,
   * so a failure leaves nothing behind.
   */
  async createApplication(application: NewApplication): Promise<number> {
    const { candidate, resume } = application;
    const answers = JSON.stringify(application.screeningAnswers ?? []);

    const rows = await this.client<{ id: number }[]>`
      WITH app AS (
        INSERT INTO applications (
          job_id, job_title, company,
          candidate_name, candidate_email, candidate_phone, candidate_location,
          status
        ) VALUES (
          ${application.jobId},
          ${application.jobTitle},
          ${application.company},
          ${candidate.name},
          ${candidate.email},
          ${candidate.phone || null},
          ${candidate.location || null},
          'submitted'
        )
        RETURNING id
      ),
      responses AS (
        INSERT INTO screening_responses (application_id, question, answer, question_type)
        SELECT app.id, r.question, r.answer, r.type
        FROM app, jsonb_to_recordset(${answers}::jsonb) AS r(question TEXT, answer TEXT, type TEXT)
      ),
      resume AS (
        INSERT INTO resumes (application_id, file_name, file_content, file_type)
        SELECT app.id, ${resume?.fileName ?? null}::varchar, ${resume?.content ?? null}::bytea, ${resume?.fileType ?? null}::varchar
        FROM app
        WHERE ${resume !== undefined}
      )
      SELECT id FROM app
    `;

    console.log(`💾 Application ${rows[0].id} stored for ${application.jobId}`);
    return rows[0].id;
  }

  async getApplication(id: number): Promise<ApplicationRecord | null> {
    const [row] = await this.client<ApplicationRow[]>`
      SELECT * FROM applications WHERE id = ${id}
    `;
    if (!row) return null;

    const responses = await this.client<ResponseRow[]>`
      SELECT question, answer, question_type FROM screening_responses
      WHERE application_id = ${id}
      ORDER BY id
    `;
    const [resume] = await this.client<{ id: number }[]>`
      SELECT id FROM resumes WHERE application_id = ${id}
    `;

    const screening_responses: ScreeningAnswer[] = responses.map((r) => ({
      question: r.question,
      answer: r.answer,
      type: toQuestionType(r.question_type),
    }));

    return {
      id: row.id,
      job_id: row.job_id,
      job_title: row.job_title,
      company: row.company,
      candidate: {
        name: row.candidate_name,
        email: row.candidate_email,
        phone: row.candidate_phone ?? undefined,
        location: row.candidate_location ?? undefined,
      },
      status: toStatus(row.status),
      submitted_at: row.submitted_at.toISOString(),
      screening_responses,
      has_resume: resume !== undefined,
    };
  }

  async listApplications(options: ApplicationListOptions = {}): Promise<ApplicationSummary[]> {
    const status = options.status ?? null;
    const jobId = options.jobId ?? null;
    const rows = await this.client<ApplicationRow[]>`
      SELECT * FROM applications
      WHERE (${status}::text IS NULL OR status = ${status})
        AND (${jobId}::text IS NULL OR job_id = ${jobId})
      ORDER BY submitted_at DESC, id DESC
      LIMIT ${options.limit ?? 100}
    `;
    return rows.map(toSummary);
  }

  async updateApplicationStatus(id: number, status: ApplicationStatus): Promise<boolean> {
    const rows = await this.client<{ id: number }[]>`
      UPDATE applications SET status = ${status}
      WHERE id = ${id}
      RETURNING id
    `;
    if (rows.length > 0) console.log(`✅ Application ${id} marked as ${status}`);
    return rows.length > 0;
  }

  async saveResume(applicationId: number, resume: ResumeUpload): Promise<boolean> {
    const rows = await this.client<{ id: number }[]>`
      INSERT INTO resumes (application_id, file_name, file_content, file_type)
      SELECT id, ${resume.fileName}, ${resume.content}, ${resume.fileType}
      FROM applications WHERE id = ${applicationId}
      ON CONFLICT (application_id) DO UPDATE SET
        file_name = EXCLUDED.file_name,
        file_content = EXCLUDED.file_content,
        file_type = EXCLUDED.file_type,
        uploaded_at = NOW()
      RETURNING id
    `;
    return rows.length > 0;
  }

  async getResume(applicationId: number): Promise<StoredResume | null> {
    const [row] = await this.client<ResumeRow[]>`
      SELECT file_name, file_content, file_type, uploaded_at FROM resumes
      WHERE application_id = ${applicationId}
    `;
    if (!row) return null;
    return {
      fileName: row.file_name,
      content: row.file_content,
      fileType: row.file_type ?? 'application/octet-stream',
      uploadedAt: row.uploaded_at.toISOString(),
    };
  }

  async getApplicationStats(): Promise<ApplicationStats> {
    const [row] = await this.client<ApplicationStats[]>`
      SELECT
        count(*)::int AS total_applications,
        count(*) FILTER (WHERE status = 'submitted')::int AS submitted,
        count(*) FILTER (WHERE status = 'reviewed')::int AS reviewed,
        count(*) FILTER (WHERE status = 'accepted')::int AS accepted,
        count(*) FILTER (WHERE status = 'rejected')::int AS rejected
      FROM applications
    `;
    return row;
  }

  async searchApplications(term: string): Promise<ApplicationSummary[]> {
    const pattern = likePattern(term);
    const rows = await this.client<ApplicationRow[]>`
      SELECT * FROM applications
      WHERE candidate_name ILIKE ${pattern}
        OR candidate_email ILIKE ${pattern}
        OR job_title ILIKE ${pattern}
        OR company ILIKE ${pattern}
      ORDER BY submitted_at DESC, id DESC
      LIMIT 50
    `;
    return rows.map(toSummary);
  }

  async disconnect() {
    await this.client.end();
    console.log('🔌 PostgreSQL connection closed');
  }
}
