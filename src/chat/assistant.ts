import { errorMessage } from '../errors';
import { JobVectorIndex } from '../db/vector-index';
import { JobSearchEngine } from '../jobs/search';
import type { ChatMessage, ChatModel, SearchResult } from '../types';
import { ASSISTANT_SYSTEM_PROMPT, buildUserPrompt, formatJobContext } from './prompts';

export const CONTEXT_CHUNKS = 3;
export const SOURCE_JOBS = 3;
export const FALLBACK_ANSWER = 'Sorry, I encountered an error while generating the response.';

/**
 * Chat history for one conversation. Owned by the caller and handed to
 * every assistant call.
 */
export class ConversationSession {
  private history: ChatMessage[] = [];

  constructor(private readonly maxHistory: number = 20) {}

  get messages(): readonly ChatMessage[] {
    return this.history;
  }

  append(role: 'user' | 'assistant', content: string): void {
    this.history.push({ role, content });
  }

  /** The most recent messages, as sent to the model. */
  recent(): ChatMessage[] {
    return this.history.slice(-this.maxHistory);
  }

  clear(): void {
    this.history = [];
  }
}

export interface AssistantReply {
  response: string;
  sourceJobs: SearchResult[];
  chatHistory: ChatMessage[];
}

export class JobAssistant {
  constructor(
    private readonly index: JobVectorIndex,
    private readonly search: JobSearchEngine,
    private readonly model: ChatModel
  ) {}

  async respond(session: ConversationSession, userInput: string): Promise<AssistantReply> {
    const context = await this.index.query(userInput, CONTEXT_CHUNKS);
    const messages: ChatMessage[] = [
      { role: 'system', content: ASSISTANT_SYSTEM_PROMPT },
      ...session.recent(),
      { role: 'user', content: buildUserPrompt(userInput, formatJobContext(context)) },
    ];

    let answer: string;
    try {
      answer = (await this.model.complete(messages)) || FALLBACK_ANSWER;
    } catch (error) {
      console.warn('Answer generation failed:', errorMessage(error));
      answer = FALLBACK_ANSWER;
    }

    session.append('user', userInput);
    session.append('assistant', answer);

    const sourceJobs = await this.search.searchJobs(userInput, SOURCE_JOBS);
    return { response: answer, sourceJobs, chatHistory: [...session.messages] };
  }
}
