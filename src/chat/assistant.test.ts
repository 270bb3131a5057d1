import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { JobVectorIndex } from '../db/vector-index';
import { JobSearchEngine } from '../jobs/search';
import { FakeChatModel, FakeEmbedder } from '../test/fakes';
import { readyIndex, removeDir } from '../test/fixtures';
import { ConversationSession, FALLBACK_ANSWER, JobAssistant } from './assistant';
import { ASSISTANT_SYSTEM_PROMPT, formatJobContext } from './prompts';

describe('ConversationSession', () => {
  it('keeps only the most recent messages for the model', () => {
    const session = new ConversationSession(2);
    session.append('user', 'one');
    session.append('assistant', 'two');
    session.append('user', 'three');

    expect(session.messages).toHaveLength(3);
    expect(session.recent()).toEqual([
      { role: 'assistant', content: 'two' },
      { role: 'user', content: 'three' },
    ]);

    session.clear();
    expect(session.messages).toEqual([]);
  });
});

describe('formatJobContext', () => {
  it('says so when nothing was retrieved', () => {
    expect(formatJobContext([])).toBe('No matching job excerpts were found.');
  });
});

describe('JobAssistant', () => {
  let dir: string;
  let index: JobVectorIndex;
  let search: JobSearchEngine;

  beforeAll(async () => {
    const ready = await readyIndex(new FakeEmbedder());
    dir = ready.dir;
    index = ready.index;
    search = new JobSearchEngine(index, ready.catalog);
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('answers from retrieved excerpts and records the turn', async () => {
    const model = new FakeChatModel('JOB001 looks like a fit.');
    const assistant = new JobAssistant(index, search, model);
    const session = new ConversationSession();

    const reply = await assistant.respond(session, 'machine learning roles');

    expect(reply.response).toBe('JOB001 looks like a fit.');
    expect(reply.sourceJobs[0].job_id).toBe('JOB001');
    expect(reply.sourceJobs.length).toBeLessThanOrEqual(3);
    expect(reply.chatHistory).toEqual([
      { role: 'user', content: 'machine learning roles' },
      { role: 'assistant', content: 'JOB001 looks like a fit.' },
    ]);

    const [sent] = model.received;
    expect(sent[0]).toEqual({ role: 'system', content: ASSISTANT_SYSTEM_PROMPT });
    expect(sent).toHaveLength(2);
    expect(sent[1].content).toMatch(/^Context:\n\[Excerpt 1 \| JOB001\]\n/);
    expect(sent[1].content.endsWith('\n\nQuestion: machine learning roles')).toBe(true);
  });

  it('sends earlier turns with the next question', async () => {
    const model = new FakeChatModel();
    const assistant = new JobAssistant(index, search, model);
    const session = new ConversationSession();

    await assistant.respond(session, 'machine learning roles');
    await assistant.respond(session, 'anything remote?');

    const second = model.received[1];
    expect(second).toHaveLength(4);
    expect(second[1]).toEqual({ role: 'user', content: 'machine learning roles' });
    expect(second[2]).toEqual({ role: 'assistant', content: 'Here are some openings for you.' });
  });

  it('falls back to an apology when the model fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const model = new FakeChatModel();
    model.failWith = new Error('upstream timeout');
    const session = new ConversationSession();

    const reply = await new JobAssistant(index, search, model).respond(session, 'sales jobs');
    expect(reply.response).toBe(FALLBACK_ANSWER);
    expect(session.messages[1]).toEqual({ role: 'assistant', content: FALLBACK_ANSWER });
  });

  it('falls back when the model returns nothing', async () => {
    const reply = await new JobAssistant(index, search, new FakeChatModel('')).respond(
      new ConversationSession(),
      'sales jobs'
    );
    expect(reply.response).toBe(FALLBACK_ANSWER);
  });
});
