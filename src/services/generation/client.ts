/**
 * ChatCompletionsClient - minimal OpenAI-compatible chat client over fetch
 *
 * One non-streaming POST to `${baseUrl}/chat/completions` per call, retried
 * with bounded exponential backoff on network errors, 429 and 5xx.
 */

import { z } from 'zod';
import { retryWithBackoff, isTransientError } from '../../utils/backoff.js';
import type { GenerationConfig } from './config.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ChatResponse {
  text: string;
  model: string;
  usage: TokenUsage;
  processingTimeMs: number;
}

const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
      total_tokens: z.number().default(0),
    })
    .optional(),
});

export class ChatRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number | null
  ) {
    super(message);
    this.name = 'ChatRequestError';
  }
}

export interface ChatClientOptions {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export class ChatCompletionsClient {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(
    private readonly config: GenerationConfig,
    options: ChatClientOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep;
  }

  get model(): string {
    return this.config.model;
  }

  async complete(messages: readonly ChatMessage[], temperature?: number): Promise<ChatResponse> {
    const start = Date.now();
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;
    const result = await retryWithBackoff(() => this.post(messages, temperature), {
      label: 'Generation',
      shouldRetry: isTransientError,
      backoff: { maxAttempts, baseDelayMs, maxDelayMs },
      sleep: this.sleep,
    });
    return { ...result, processingTimeMs: Date.now() - start };
  }

  private async post(
    messages: readonly ChatMessage[],
    temperature?: number
  ): Promise<Omit<ChatResponse, 'processingTimeMs'>> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        messages,
        temperature: temperature ?? this.config.temperature,
        max_tokens: this.config.maxOutputTokens,
      }),
      signal: AbortSignal.timeout(this.config.requestTimeoutMs),
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new ChatRequestError(
        `Chat completions error ${response.status}: ${response.statusText}. ${body.slice(0, 200)}`,
        response.status
      );
    }

    const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ChatRequestError(`Unexpected chat completions response: ${parsed.error.message}`, null);
    }

    const data = parsed.data;
    const inputTokens = data.usage?.prompt_tokens ?? 0;
    const outputTokens = data.usage?.completion_tokens ?? 0;
    return {
      text: (data.choices[0]?.message.content ?? '').trim(),
      model: data.model ?? this.config.model,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: data.usage?.total_tokens || inputTokens + outputTokens,
      },
    };
  }
}
