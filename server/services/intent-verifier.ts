import { RouterVerdictSchema, type ConversationTurn, type RouterVerdict } from '@shared/schema';
import { MalformedResponseError, toDependencyError, type DependencyError } from '../errors';
import { withDeadline } from '../utils/deadline';
import { fail, ok, type Result } from '../utils/result';
import type { ChatCompletionClient, ChatMessage } from './llm-provider';

export const ROUTER_SYSTEM_PROMPT = `You are an intent router for healthcare chat messages.
Classify the user's latest message into EXACTLY ONE of:
- "scheduling": booking, changing or cancelling an appointment, asking about availability, OR describing symptoms or health complaints that call for a visit
- "qna": informational questions about medications, dosages, side effects, policies, insurance, costs, opening hours or general health

Return ONLY a JSON object with these keys and no text around it:
{
  "intent": "scheduling" | "qna",
  "rationale": "short reason, at most 20 words",
  "confidence": 0.0
}

Rules:
- Be deterministic and concise.
- "intent" must be lowercase and exactly one of the two values.
- "confidence" is a number between 0 and 1.
- Earlier conversation turns are context only; classify the latest message.`;

export interface VerificationRequest {
  message: string;
  history: ConversationTurn[];
  signal?: AbortSignal;
}

export interface IntentVerifier {
  verify(request: VerificationRequest): Promise<Result<RouterVerdict, DependencyError>>;
}

export interface LLMIntentVerifierOptions {
  timeoutMs: number;
  maxTokens?: number;
  systemPrompt?: string;
}

export class LLMIntentVerifier implements IntentVerifier {
  private readonly systemPrompt: string;

  constructor(
    private readonly client: ChatCompletionClient,
    private readonly options: LLMIntentVerifierOptions
  ) {
    this.systemPrompt = options.systemPrompt ?? ROUTER_SYSTEM_PROMPT;
  }

  async verify({ message, history, signal }: VerificationRequest): Promise<Result<RouterVerdict, DependencyError>> {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.systemPrompt },
      ...history.map((turn): ChatMessage => ({ role: turn.role, content: turn.text })),
      { role: 'user', content: `message: ${message}` }
    ];

    let content: string;
    try {
      const response = await withDeadline(
        (deadlineSignal) =>
          this.client.chat(messages, {
            temperature: 0,
            responseFormat: 'json',
            maxTokens: this.options.maxTokens ?? 300,
            signal: deadlineSignal
          }),
        { timeoutMs: this.options.timeoutMs, signal }
      );
      content = response.content.trim();
    } catch (error) {
      return fail(toDependencyError(error));
    }

    return parseVerdict(content);
  }
}

export function parseVerdict(content: string): Result<RouterVerdict, DependencyError> {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return fail(new MalformedResponseError('Router response is not valid JSON'));
  }

  const parsed = RouterVerdictSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
    return fail(new MalformedResponseError(`Router response does not match the verdict schema: ${fields}`));
  }
  return ok(parsed.data);
}
