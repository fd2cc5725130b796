import type { ConversationTurn } from '@shared/schema';
import { toDependencyError, type DependencyError } from '../errors';
import { fail, ok, type Result } from '../utils/result';
import type { ChatCompletionClient, ChatMessage } from './llm-provider';

const QNA_SYSTEM_PROMPT =
  'You are a knowledgeable and responsible medical assistant. ' +
  'Provide clear, concise, medically accurate answers. ' +
  'Include disclaimers when appropriate and recommend consulting ' +
  'healthcare professionals for diagnostic or treatment decisions.';

export interface QnaAgentOptions {
  temperature?: number;
  maxTokens?: number;
}

export class QnaAgent {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly options: QnaAgentOptions = {}
  ) {}

  async generateResponse(
    userMessage: string,
    history: ConversationTurn[] = [],
    signal?: AbortSignal
  ): Promise<Result<string, DependencyError>> {
    const messages: ChatMessage[] = [
      { role: 'system', content: QNA_SYSTEM_PROMPT },
      ...history.map((turn): ChatMessage => ({ role: turn.role, content: turn.text })),
      { role: 'user', content: userMessage }
    ];

    try {
      const response = await this.client.chat(messages, {
        temperature: this.options.temperature ?? 0.7,
        maxTokens: this.options.maxTokens ?? 1000,
        signal
      });
      return ok(response.content.trim());
    } catch (error) {
      return fail(toDependencyError(error));
    }
  }
}
