import type { AppConfig } from '../config';
import { DEFAULT_MODELS, type LLMConfig } from './llm-provider';

export type LLMPurpose = 'router' | 'chat';

export class LLMConfigService {
  constructor(private readonly llm: AppConfig['llm']) {}

  /** Provider settings for a purpose, or null when the provider has no API key. */
  getConfig(purpose: LLMPurpose): LLMConfig | null {
    const provider = this.llm.provider;
    const apiKey = this.getEnvKey();
    if (!apiKey) return null;

    const override = purpose === 'router' ? this.llm.routerModel : this.llm.chatModel;
    return {
      provider,
      apiKey,
      model: override ?? DEFAULT_MODELS[provider][0]
    };
  }

  describe(): { provider: string; chatModel: string | null; routerModel: string | null; hasApiKey: boolean } {
    return {
      provider: this.llm.provider,
      chatModel: this.getConfig('chat')?.model ?? null,
      routerModel: this.getConfig('router')?.model ?? null,
      hasApiKey: !!this.getEnvKey()
    };
  }

  private getEnvKey(): string | undefined {
    return this.llm.provider === 'openai' ? this.llm.openaiApiKey : this.llm.mistralApiKey;
  }
}
