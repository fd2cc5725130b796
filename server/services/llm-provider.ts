import { Mistral } from '@mistralai/mistralai';
import OpenAI from 'openai';
import type { LLMProviderName } from '../config';

export interface LLMConfig {
  provider: LLMProviderName;
  apiKey: string;
  model: string;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatResponse {
  content: string;
}

export interface ChatOptions {
  responseFormat?: 'text' | 'json';
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/** The one capability agents and the intent verifier need from a provider. */
export interface ChatCompletionClient {
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;
}

type ProviderMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

function toProviderMessage(message: ChatMessage): ProviderMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

function textFromChunks(chunks: readonly unknown[]): string {
  return chunks
    .map((chunk) => {
      if (typeof chunk === 'string') return chunk;
      if (typeof chunk === 'object' && chunk !== null && 'text' in chunk && typeof chunk.text === 'string') {
        return chunk.text;
      }
      return '';
    })
    .join('');
}

export class LLMProvider implements ChatCompletionClient {
  private config: LLMConfig;
  private openai?: OpenAI;
  private mistral?: Mistral;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  get model(): string {
    return this.config.model;
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    switch (this.config.provider) {
      case 'openai':
        return this.chatOpenAI(messages, options);
      case 'mistral':
        return this.chatMistral(messages, options);
      default:
        throw new Error(`Unsupported provider: ${String(this.config.provider)}`);
    }
  }

  private async chatOpenAI(messages: ChatMessage[], options: ChatOptions): Promise<ChatResponse> {
    this.openai ??= new OpenAI({ apiKey: this.config.apiKey, maxRetries: 0 });

    const response = await this.openai.chat.completions.create(
      {
        model: this.config.model,
        messages: messages.map(toProviderMessage),
        ...(options.temperature !== undefined && { temperature: options.temperature }),
        ...(options.maxTokens !== undefined && { max_tokens: options.maxTokens }),
        ...(options.responseFormat === 'json' && { response_format: { type: 'json_object' as const } })
      },
      { signal: options.signal }
    );

    return {
      content: response.choices[0]?.message?.content ?? ''
    };
  }

  private async chatMistral(messages: ChatMessage[], options: ChatOptions): Promise<ChatResponse> {
    this.mistral ??= new Mistral({ apiKey: this.config.apiKey });

    const response = await this.mistral.chat.complete(
      {
        model: this.config.model,
        messages: messages.map(toProviderMessage),
        ...(options.temperature !== undefined && { temperature: options.temperature }),
        ...(options.maxTokens !== undefined && { maxTokens: options.maxTokens }),
        ...(options.responseFormat === 'json' && { responseFormat: { type: 'json_object' as const } })
      },
      { fetchOptions: { signal: options.signal } }
    );

    const rawContent = response.choices?.[0]?.message?.content;
    if (typeof rawContent === 'string') {
      return { content: rawContent };
    }
    if (Array.isArray(rawContent)) {
      return { content: textFromChunks(rawContent) };
    }
    return { content: '' };
  }
}

// Default models for each provider
export const DEFAULT_MODELS = {
  openai: ['gpt-4o-mini', 'gpt-4o', 'gpt-3.5-turbo'],
  mistral: ['mistral-small-latest', 'mistral-medium-latest', 'mistral-large-latest']
} satisfies Record<LLMProviderName, string[]>;
