import { JobCatalog } from '../jobs/catalog';
import type {
  ApplicationRepository,
  CandidateProfile,
  ResumeUpload,
  ScreeningAnswer,
  ScreeningQuestion,
  SearchResult,
} from '../types';
import { ConversationSession, JobAssistant } from './assistant';

export type FlowState = 'searching' | 'applying' | 'answering' | 'completed';

export type FlowEvent =
  | { type: 'message'; text: string }
  | { type: 'select_job'; jobId: string }
  | { type: 'profile'; candidate: CandidateProfile; resume?: ResumeUpload }
  | { type: 'answer'; answer: string }
  | { type: 'reset' };

export type FlowEventType = FlowEvent['type'];

export type FlowResponse =
  | { kind: 'reply'; state: FlowState; response: string; jobs: SearchResult[] }
  | { kind: 'apply_started'; state: FlowState; jobId: string; message: string; needsResume: true }
  | {
      kind: 'question';
      state: FlowState;
      message?: string;
      question: ScreeningQuestion;
      questionIndex: number;
      totalQuestions: number;
    }
  | { kind: 'submitted'; state: FlowState; jobId: string; applicationId: number; message: string }
  | { kind: 'reset'; state: FlowState; message: string }
  | {
      kind: 'rejected';
      state: FlowState;
      reason: 'invalid_transition' | 'job_not_found';
      message: string;
    };

/**
 * Events each state accepts and the states they may lead to.
 *
 * - searching/completed + message: to `applying` when `isApplyRequest` holds
 *   and the job exists, else an assistant reply in `searching`
 * - searching/completed + select_job: to `applying` for a known job id
 * - applying + profile: to `answering`, or `completed` when the job has no
 *   screening questions
 * - answering + answer: next question, or `completed` after the last one
 * - any + reset: back to `searching`
 */
export const TRANSITIONS: Record<FlowState, Partial<Record<FlowEventType, readonly FlowState[]>>> = {
  searching: {
    message: ['searching', 'applying'],
    select_job: ['searching', 'applying'],
    reset: ['searching'],
  },
  applying: {
    profile: ['answering', 'completed'],
    reset: ['searching'],
  },
  answering: {
    answer: ['answering', 'completed'],
    reset: ['searching'],
  },
  completed: {
    message: ['searching', 'applying'],
    select_job: ['searching', 'applying'],
    reset: ['searching'],
  },
};

const APPLY_KEYWORDS = /\b(apply|interested|select)/i;
const JOB_ID_PATTERN = /JOB\d{3}/g;

export function extractJobIds(text: string): string[] {
  return text.toUpperCase().match(JOB_ID_PATTERN) ?? [];
}

/** Trigger for searching → applying: an apply keyword plus a job id. */
export function isApplyRequest(text: string): boolean {
  return APPLY_KEYWORDS.test(text) && extractJobIds(text).length > 0;
}

export interface ApplicationSessionDeps {
  assistant: JobAssistant;
  catalog: JobCatalog;
  applications: ApplicationRepository;
}

/**
 * One candidate's way from search to a submitted application. The caller
 * keeps the session between messages.
 */
export class ApplicationSession {
  readonly conversation = new ConversationSession();
  private currentState: FlowState = 'searching';
  private selectedJobId: string | null = null;
  private candidate: CandidateProfile | null = null;
  private resume: ResumeUpload | undefined;
  private answers: ScreeningAnswer[] = [];
  private questionIndex = 0;

  constructor(private readonly deps: ApplicationSessionDeps) {}

  get state(): FlowState {
    return this.currentState;
  }

  get jobId(): string | null {
    return this.selectedJobId;
  }

  accepts(type: FlowEventType): boolean {
    return TRANSITIONS[this.currentState][type] !== undefined;
  }

  async handle(event: FlowEvent): Promise<FlowResponse> {
    const allowed = TRANSITIONS[this.currentState][event.type];
    if (!allowed) {
      return {
        kind: 'rejected',
        state: this.currentState,
        reason: 'invalid_transition',
        message: `Cannot handle "${event.type}" while ${this.currentState}`,
      };
    }

    const response = await this.dispatch(event);
    if (!allowed.includes(this.currentState)) {
      throw new Error(`Illegal transition on ${event.type}: ended in ${this.currentState}`);
    }
    return response;
  }

  private async dispatch(event: FlowEvent): Promise<FlowResponse> {
    switch (event.type) {
      case 'message':
        return this.onMessage(event.text);
      case 'select_job':
        return this.startApplication(event.jobId);
      case 'profile':
        return this.onProfile(event.candidate, event.resume);
      case 'answer':
        return this.onAnswer(event.answer);
      case 'reset':
        this.reset();
        return {
          kind: 'reset',
          state: this.currentState,
          message: 'Starting over. What kind of role are you looking for?',
        };
    }
  }

  private async onMessage(text: string): Promise<FlowResponse> {
    if (this.currentState === 'completed') this.clearApplication();

    if (isApplyRequest(text)) {
      const known = extractJobIds(text).find((id) => this.deps.catalog.has(id));
      if (known) return this.startApplication(known);
    }

    const reply = await this.deps.assistant.respond(this.conversation, text);
    this.currentState = 'searching';
    return { kind: 'reply', state: this.currentState, response: reply.response, jobs: reply.sourceJobs };
  }

  private startApplication(jobId: string): FlowResponse {
    if (this.currentState === 'completed') this.clearApplication();

    const job = this.deps.catalog.get(jobId);
    if (!job) {
      this.currentState = 'searching';
      return {
        kind: 'rejected',
        state: this.currentState,
        reason: 'job_not_found',
        message: `Job ${jobId} was not found`,
      };
    }

    this.selectedJobId = job.job_id;
    this.currentState = 'applying';
    return {
      kind: 'apply_started',
      state: this.currentState,
      jobId: job.job_id,
      message: `Great! Please share your details and upload your resume to apply for ${job.title} at ${job.company}.`,
      needsResume: true,
    };
  }

  private async onProfile(candidate: CandidateProfile, resume?: ResumeUpload): Promise<FlowResponse> {
    this.candidate = candidate;
    this.resume = resume;
    const questions = this.questions();
    if (questions.length === 0) return this.submit();

    this.currentState = 'answering';
    this.questionIndex = 0;
    return {
      kind: 'question',
      state: this.currentState,
      message: `Now I'll ask you ${questions.length} screening questions.`,
      question: questions[0],
      questionIndex: 0,
      totalQuestions: questions.length,
    };
  }

  private async onAnswer(answer: string): Promise<FlowResponse> {
    const questions = this.questions();
    const current = questions[this.questionIndex];
    this.answers.push({ question: current.question, answer, type: current.type });

    if (this.questionIndex + 1 < questions.length) {
      this.questionIndex += 1;
      return {
        kind: 'question',
        state: this.currentState,
        question: questions[this.questionIndex],
        questionIndex: this.questionIndex,
        totalQuestions: questions.length,
      };
    }

    try {
      return await this.submit();
    } catch (error) {
      // keep the last question open so the candidate can resend it
      this.answers.pop();
      throw error;
    }
  }

  private async submit(): Promise<FlowResponse> {
    const job = this.selectedJobId ? this.deps.catalog.get(this.selectedJobId) : undefined;
    if (!job || !this.candidate) {
      throw new Error('Cannot submit an application without a job and a candidate profile');
    }

    const applicationId = await this.deps.applications.createApplication({
      jobId: job.job_id,
      jobTitle: job.title,
      company: job.company,
      candidate: this.candidate,
      screeningAnswers: this.answers,
      resume: this.resume,
    });

    this.currentState = 'completed';
    return {
      kind: 'submitted',
      state: this.currentState,
      jobId: job.job_id,
      applicationId,
      message: 'Your application has been submitted successfully!',
    };
  }

  private questions(): ScreeningQuestion[] {
    return this.selectedJobId ? this.deps.catalog.getScreeningQuestions(this.selectedJobId) : [];
  }

  private clearApplication(): void {
    this.selectedJobId = null;
    this.candidate = null;
    this.resume = undefined;
    this.answers = [];
    this.questionIndex = 0;
  }

  reset(): void {
    this.clearApplication();
    this.conversation.clear();
    this.currentState = 'searching';
  }
}
