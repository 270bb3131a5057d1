import OpenAI from 'openai';
import { EmbeddingProviderError, errorMessage } from './errors';
import { sleep } from './utils';
import type { ChatMessage, ChatModel, Embedder } from './types';

export const MAX_CHARS_PER_EMBEDDING = 8000;
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';
const RATE_LIMIT_BACKOFF_MS = 5000;
const MAX_RATE_LIMIT_RETRIES = 3;

export interface OpenAIClientOptions {
  apiKey?: string;
  embeddingModel?: string;
  chatModel?: string;
  minDelayMs?: number;
}

function isRateLimited(error: unknown): boolean {
  return error instanceof OpenAI.APIError && error.status === 429;
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * Embedding and chat access to OpenAI, with a minimum delay between calls
 * and a bounded retry on 429 responses.
 */
export class OpenAIClient implements Embedder, ChatModel {
  readonly model: string;
  readonly chatModel: string;
  private client: OpenAI;
  private minDelayMs: number;
  private lastCall: number;

  constructor(options: OpenAIClientOptions = {}) {
    this.client = new OpenAI({
      apiKey: options.apiKey || process.env.OPENAI_API_KEY,
    });
    this.model = options.embeddingModel || DEFAULT_EMBEDDING_MODEL;
    this.chatModel = options.chatModel || DEFAULT_CHAT_MODEL;
    this.minDelayMs = options.minDelayMs ?? 0;
    this.lastCall = 0;
  }

  private async rateLimit() {
    const now = Date.now();
    const wait = Math.max(0, this.lastCall + this.minDelayMs - now);
    if (wait > 0) await sleep(wait);
    this.lastCall = Date.now();
  }

  async createEmbedding(
    text: string,
    attempt: number = 0
  ): Promise<{ embedding: number[]; tokensUsed: number }> {
    await this.rateLimit();

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: text.substring(0, MAX_CHARS_PER_EMBEDDING),
      });
      const first = response.data[0];
      if (!first) {
        throw new EmbeddingProviderError('Embedding response contained no vectors');
      }

      return {
        embedding: first.embedding,
        tokensUsed: response.usage?.total_tokens || 0,
      };
    } catch (error) {
      if (isRateLimited(error) && attempt < MAX_RATE_LIMIT_RETRIES) {
        console.warn('🔄 Rate limited. Waiting...');
        await sleep(RATE_LIMIT_BACKOFF_MS);
        return this.createEmbedding(text, attempt + 1);
      }
      if (error instanceof EmbeddingProviderError) throw error;
      throw new EmbeddingProviderError(`Embedding request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async embed(text: string): Promise<number[]> {
    const { embedding } = await this.createEmbedding(text);
    return embedding;
  }

  async complete(messages: ChatMessage[], attempt: number = 0): Promise<string> {
    await this.rateLimit();

    try {
      const response = await this.client.chat.completions.create({
        model: this.chatModel,
        messages: messages.map(toOpenAIMessage),
        max_tokens: 1000,
        temperature: 0.7,
      });

      return response.choices[0]?.message.content?.trim() || '';
    } catch (error) {
      if (isRateLimited(error) && attempt < MAX_RATE_LIMIT_RETRIES) {
        console.warn('🔄 Rate limited. Waiting...');
        await sleep(RATE_LIMIT_BACKOFF_MS);
        return this.complete(messages, attempt + 1);
      }
      throw error;
    }
  }
}
