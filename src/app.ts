import { randomUUID } from 'crypto';
import { type Context, Hono } from 'hono';
import { z } from 'zod';
import { ApplicationSession, type FlowEvent } from './chat/application-flow';
import { JobAssistant } from './chat/assistant';
import { JobVectorIndex } from './db/vector-index';
import { JobMatchError, NotFoundError, ValidationError } from './errors';
import { JobCatalog } from './jobs/catalog';
import { JobSearchEngine } from './jobs/search';
import { APPLICATION_STATUSES, type ApplicationRepository, type ResumeUpload } from './types';

export interface AppServices {
  index: JobVectorIndex;
  catalog: JobCatalog;
  search: JobSearchEngine;
  assistant: JobAssistant;
  applications: ApplicationRepository;
}

const filtersSchema = z.object({
  location: z.string().min(1).optional(),
  min_salary: z.number().nonnegative().optional(),
  experience: z.string().min(1).optional(),
});

const searchSchema = z.object({
  query: z.string().trim().min(1),
  k: z.number().int().positive().max(50).default(5),
  filters: filtersSchema.optional(),
});

const candidateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().email().max(200),
  phone: z.string().max(30).optional(),
  location: z.string().max(200).optional(),
});

const resumeSchema = z.object({
  fileName: z.string().min(1).max(255),
  fileType: z.string().min(1).default('application/pdf'),
  contentBase64: z.string().min(1),
});

const screeningAnswerSchema = z.object({
  question: z.string().min(1),
  answer: z.string(),
  type: z.enum(['text', 'multiple_choice', 'yes_no', 'number']).default('text'),
});

const chatSchema = z.object({
  sessionId: z.string().min(1).optional(),
  message: z.string().trim().min(1),
});

const eventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('message'), text: z.string().trim().min(1) }),
  z.object({ type: z.literal('select_job'), jobId: z.string().min(1) }),
  z.object({ type: z.literal('profile'), candidate: candidateSchema, resume: resumeSchema.optional() }),
  z.object({ type: z.literal('answer'), answer: z.string() }),
  z.object({ type: z.literal('reset') }),
]);

const newApplicationSchema = z.object({
  jobId: z.string().min(1),
  candidate: candidateSchema,
  screeningAnswers: z.array(screeningAnswerSchema).optional(),
  resume: resumeSchema.optional(),
});

const statusSchema = z.object({ status: z.enum(APPLICATION_STATUSES) });

const listQuerySchema = z.object({
  status: z.enum(APPLICATION_STATUSES).optional(),
  jobId: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(500).default(100),
});

async function readJson<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
  return parseInput(schema, body);
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid request',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function toResume(resume: z.infer<typeof resumeSchema>): ResumeUpload {
  return {
    fileName: resume.fileName,
    fileType: resume.fileType,
    content: Buffer.from(resume.contentBase64, 'base64'),
  };
}

function toFlowEvent(event: z.infer<typeof eventSchema>): FlowEvent {
  switch (event.type) {
    case 'profile':
      return {
        type: 'profile',
        candidate: event.candidate,
        resume: event.resume ? toResume(event.resume) : undefined,
      };
    default:
      return event;
  }
}

function statusFor(error: unknown): 400 | 404 | 503 | 500 {
  if (!(error instanceof JobMatchError)) return 500;
  switch (error.code) {
    case 'VALIDATION_ERROR':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'INDEX_NOT_READY':
      return 503;
    default:
      return 500;
  }
}

function applicationId(c: Context): number {
  return Number(c.req.param('id'));
}

export function createApp(services: AppServices) {
  const { index, catalog, search, assistant, applications } = services;
  const app = new Hono();
  const sessions = new Map<string, ApplicationSession>();

  function sessionFor(sessionId?: string): { id: string; session: ApplicationSession } {
    const id = sessionId || randomUUID();
    let session = sessions.get(id);
    if (!session) {
      session = new ApplicationSession({ assistant, catalog, applications });
      sessions.set(id, session);
    }
    return { id, session };
  }

  app.onError((err, c) => {
    const status = statusFor(err);
    if (status === 500) console.error('❌ Request failed:', err);
    const details = err instanceof ValidationError ? err.details : undefined;
    return c.json({ error: err.message, ...(details ? { details } : {}) }, status);
  });

  app.get('/health', (c) => {
    return c.json({
      status: index.isReady ? 'OK' : 'DEGRADED',
      index: index.state,
      jobs: catalog.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.post('/search', async (c) => {
    const { query, k, filters } = await readJson(c, searchSchema);
    const results = await search.searchJobs(query, k, filters);
    return c.json({ query, results, count: results.length, filters: filters || null });
  });

  app.get('/jobs', (c) => {
    const jobs = catalog.all();
    return c.json({ jobs, count: jobs.length });
  });

  app.get('/jobs/:id', (c) => {
    const job = search.getJobById(c.req.param('id'));
    if (!job) throw new NotFoundError(`Job ${c.req.param('id')} not found`);
    return c.json(job);
  });

  app.get('/jobs/:id/questions', (c) => {
    const jobId = c.req.param('id');
    if (!catalog.has(jobId)) throw new NotFoundError(`Job ${jobId} not found`);
    return c.json({ job_id: jobId, questions: search.getScreeningQuestions(jobId) });
  });

  app.post('/chat', async (c) => {
    const { sessionId, message } = await readJson(c, chatSchema);
    const { id, session } = sessionFor(sessionId);
    const response = await session.handle({ type: 'message', text: message });
    return c.json({ sessionId: id, ...response });
  });

  app.post('/sessions/:id/events', async (c) => {
    const event = toFlowEvent(await readJson(c, eventSchema));
    const { id, session } = sessionFor(c.req.param('id'));
    const response = await session.handle(event);
    return c.json({ sessionId: id, ...response });
  });

  app.delete('/sessions/:id', (c) => {
    const removed = sessions.delete(c.req.param('id'));
    return c.json({ success: removed });
  });

  app.post('/applications', async (c) => {
    const input = await readJson(c, newApplicationSchema);
    const job = catalog.get(input.jobId);
    if (!job) throw new NotFoundError(`Job ${input.jobId} not found`);

    const id = await applications.createApplication({
      jobId: job.job_id,
      jobTitle: job.title,
      company: job.company,
      candidate: input.candidate,
      screeningAnswers: input.screeningAnswers,
      resume: input.resume ? toResume(input.resume) : undefined,
    });
    return c.json({ success: true, id, message: 'Application submitted successfully' }, 201);
  });

  app.get('/applications', async (c) => {
    const options = parseInput(listQuerySchema, c.req.query());
    const results = await applications.listApplications(options);
    return c.json({ applications: results, count: results.length });
  });

  app.get('/applications/search', async (c) => {
    const term = (c.req.query('q') || '').trim();
    if (!term) throw new ValidationError('Query parameter q is required');
    const results = await applications.searchApplications(term);
    return c.json({ applications: results, count: results.length });
  });

  app.get('/applications/stats', async (c) => {
    return c.json(await applications.getApplicationStats());
  });

  app.get('/applications/:id{[0-9]+}', async (c) => {
    const record = await applications.getApplication(applicationId(c));
    if (!record) throw new NotFoundError(`Application ${c.req.param('id')} not found`);
    return c.json(record);
  });

  app.patch('/applications/:id{[0-9]+}/status', async (c) => {
    const { status } = await readJson(c, statusSchema);
    const updated = await applications.updateApplicationStatus(applicationId(c), status);
    if (!updated) throw new NotFoundError(`Application ${c.req.param('id')} not found`);
    return c.json({ success: true, id: applicationId(c), status });
  });

  app.put('/applications/:id{[0-9]+}/resume', async (c) => {
    const resume = toResume(await readJson(c, resumeSchema));
    const saved = await applications.saveResume(applicationId(c), resume);
    if (!saved) throw new NotFoundError(`Application ${c.req.param('id')} not found`);
    return c.json({ success: true, id: applicationId(c), fileName: resume.fileName });
  });

  app.get('/applications/:id{[0-9]+}/resume', async (c) => {
    const resume = await applications.getResume(applicationId(c));
    if (!resume) throw new NotFoundError(`No resume for application ${c.req.param('id')}`);
    return c.json({
      fileName: resume.fileName,
      fileType: resume.fileType,
      uploadedAt: resume.uploadedAt,
      contentBase64: resume.content.toString('base64'),
    });
  });

  return app;
}
