import type {
  ClassificationResult,
  ConversationTurn,
  RouterAction,
  RoutingDecision,
  ServiceIntent
} from '@shared/schema';
import type { RouterConfig } from '../config';
import { InvalidInputError } from '../errors';
import logger from '../utils/logger';
import {
  LexicalClassifier,
  VerifiedLexicalClassifier,
  type Classifier,
  type ClassifyOptions
} from './intent-classifier';
import { LLMIntentVerifier } from './intent-verifier';
import { buildKeywordTable, keywordCounts, type KeywordTable } from './keyword-table';
import type { ChatCompletionClient } from './llm-provider';

const ACTION_FOR_INTENT: Record<ServiceIntent, RouterAction> = {
  appointment_service: 'book_appointment',
  qna_service: 'answer_question',
  user_decision: 'ask_user_decision'
};

export class IntentRouter {
  constructor(
    private readonly classifier: Classifier,
    readonly table: KeywordTable,
    readonly threshold: number,
    readonly llmEnabled: boolean
  ) {}

  /**
   * Throws InvalidInputError synchronously for an empty or non-string
   * message; otherwise resolves, falling back to user_decision.
   */
  classify(message: string, history: ConversationTurn[] = [], options: ClassifyOptions = {}): Promise<ClassificationResult> {
    if (typeof message !== 'string' || message.trim().length === 0) {
      throw new InvalidInputError();
    }
    return this.classifier.classify({ message: message.trim(), history }, options);
  }

  async route(message: string, history: ConversationTurn[] = [], options: ClassifyOptions = {}): Promise<RoutingDecision> {
    const result = await this.classify(message, history, options);
    return { ...result, action: ACTION_FOR_INTENT[result.intent] };
  }

  describe() {
    return {
      threshold: this.threshold,
      llmEnabled: this.llmEnabled,
      keywords: keywordCounts(this.table)
    };
  }
}

export function createIntentRouter(config: RouterConfig, client?: ChatCompletionClient | null): IntentRouter {
  const table = buildKeywordTable(config.keywords);
  const lexical = new LexicalClassifier(table, config.confidenceThreshold);

  if (client && config.llmEnabled) {
    const verifier = new LLMIntentVerifier(client, { timeoutMs: config.llmTimeoutMs });
    return new IntentRouter(new VerifiedLexicalClassifier(lexical, verifier), table, config.confidenceThreshold, true);
  }

  logger.info('Intent router running keyword-only (LLM verification disabled)');
  return new IntentRouter(lexical, table, config.confidenceThreshold, false);
}
