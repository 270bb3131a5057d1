import { z } from 'zod';

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  JOBS_FILE: z.string().min(1).default('data/jobs.json'),
  INDEX_STORE: z.enum(['local', 'qdrant']).default('local'),
  INDEX_DIR: z.string().min(1).default('job_index'),
  QDRANT_URL: z.string().url().default('http://localhost:6333'),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION: z.string().min(1).default('job_postings'),
  OPENAI_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(0),
  CHUNK_SIZE: z.coerce.number().int().positive().default(500),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_DB: z.string().default('jobs_db'),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.string().default('password'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Reads settings from the environment. Empty strings count as unset so a
 * blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = configSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${issues.join('\n')}`);
  }
  if (parsed.data.CHUNK_OVERLAP >= parsed.data.CHUNK_SIZE) {
    throw new Error('Invalid configuration:\nCHUNK_OVERLAP must be smaller than CHUNK_SIZE');
  }
  return parsed.data;
}
