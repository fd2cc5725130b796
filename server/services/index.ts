import type { AppConfig } from '../config';
import { MemStorage, type IStorage } from '../storage';
import { AppointmentAgent } from './appointment-agent';
import { ChatService } from './chat-service';
import { createIntentRouter, type IntentRouter } from './intent-router';
import { LLMConfigService } from './llm-config';
import { LLMProvider, type ChatCompletionClient } from './llm-provider';
import { QnaAgent } from './qna-agent';

export interface AppServices {
  router: IntentRouter;
  /** Null when no LLM provider is configured; chat then answers 503. */
  chat: ChatService | null;
  storage: IStorage;
  llmConfig: LLMConfigService;
}

export interface ServiceOverrides {
  storage?: IStorage;
  routerClient?: ChatCompletionClient | null;
  chatClient?: ChatCompletionClient | null;
  now?: () => Date;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const llmConfig = new LLMConfigService(config.llm);
  const storage = overrides.storage ?? new MemStorage();

  const clientFor = (purpose: 'router' | 'chat', override: ChatCompletionClient | null | undefined) => {
    if (override !== undefined) return override;
    const resolved = llmConfig.getConfig(purpose);
    return resolved ? new LLMProvider(resolved) : null;
  };

  const routerClient = clientFor('router', overrides.routerClient);
  const chatClient = clientFor('chat', overrides.chatClient);

  const router = createIntentRouter(config.router, routerClient);
  const chat = chatClient
    ? new ChatService(
        router,
        new QnaAgent(chatClient),
        new AppointmentAgent(chatClient, storage, {
          maxDaysAhead: config.appointments.maxDaysAhead,
          now: overrides.now
        }),
        storage
      )
    : null;

  return { router, chat, storage, llmConfig };
}
