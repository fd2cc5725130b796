import type {
  ClassificationResult,
  ConversationTurn,
  IntentEvidence,
  IntentLabel,
  RouterVerdict,
  ServiceIntent
} from '@shared/schema';
import logger from '../utils/logger';
import { sanitizeForLog } from '../utils/sanitizer';
import type { IntentVerifier } from './intent-verifier';
import { matchTriggers, toStems, type KeywordTable } from './keyword-table';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;

export interface ClassificationInput {
  message: string;
  history: ConversationTurn[];
}

export interface ClassifyOptions {
  signal?: AbortSignal;
}

export interface Classifier {
  classify(input: ClassificationInput, options?: ClassifyOptions): Promise<ClassificationResult>;
}

export interface LexicalVote {
  counts: Record<IntentLabel, number>;
  evidence: IntentEvidence[];
  confidence: number;
  /** Label with the strictly greater count; null on zero evidence or a tie. */
  leader: IntentLabel | null;
}

const SERVICE_FOR_LABEL: Record<IntentLabel, ServiceIntent> = {
  scheduling: 'appointment_service',
  qna: 'qna_service'
};

const log = logger.child({ component: 'intent-router' });

/** Keyword/stem voting. Never calls out of process. */
export class LexicalClassifier implements Classifier {
  constructor(
    private readonly table: KeywordTable,
    private readonly threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
  ) {}

  score(message: string): LexicalVote {
    const stems = toStems(message);
    const evidence: IntentEvidence[] = [];

    for (const label of ['scheduling', 'qna'] as const) {
      for (const match of matchTriggers(stems, this.table[label])) {
        evidence.push({ keyword: match.phrase, label, index: match.index });
      }
    }
    evidence.sort((a, b) => a.index - b.index);

    const counts = {
      scheduling: evidence.filter((e) => e.label === 'scheduling').length,
      qna: evidence.filter((e) => e.label === 'qna').length
    };

    const total = Math.max(1, counts.scheduling + counts.qna);
    const distance = Math.abs(counts.scheduling - counts.qna);
    const confidence = 0.5 + 0.5 * (distance / total);

    let leader: IntentLabel | null = null;
    if (counts.scheduling > counts.qna) leader = 'scheduling';
    else if (counts.qna > counts.scheduling) leader = 'qna';

    return { counts, evidence, confidence, leader };
  }

  isDecisive(vote: LexicalVote): boolean {
    return vote.leader !== null && vote.confidence >= this.threshold;
  }

  async classify({ message }: ClassificationInput): Promise<ClassificationResult> {
    return this.resolve(this.score(message));
  }

  /** Keyword-only outcome: the leader when decisive, otherwise user_decision. */
  resolve(vote: LexicalVote): ClassificationResult {
    const { counts, evidence, confidence, leader } = vote;
    if (leader !== null && this.isDecisive(vote)) {
      return {
        intent: SERVICE_FOR_LABEL[leader],
        confidence,
        source: 'keyword',
        counts,
        evidence,
        rationale: `keyword votes favor ${leader}`
      };
    }
    return {
      intent: 'user_decision',
      confidence,
      source: 'keyword',
      counts,
      evidence,
      rationale: leader === null ? 'keyword votes equal or unclear' : `keyword votes lean ${leader} below threshold`
    };
  }
}

/**
 * Lexical voting first; the verifier is consulted only when the vote is not
 * decisive. Verifier failures resolve to user_decision with source "llm".
 */
export class VerifiedLexicalClassifier implements Classifier {
  constructor(
    private readonly lexical: LexicalClassifier,
    private readonly verifier: IntentVerifier
  ) {}

  async classify(input: ClassificationInput, options: ClassifyOptions = {}): Promise<ClassificationResult> {
    const vote = this.lexical.score(input.message);
    if (this.lexical.isDecisive(vote)) {
      return this.lexical.resolve(vote);
    }

    log.debug('Lexical vote below threshold, verifying with LLM', {
      confidence: vote.confidence,
      counts: vote.counts
    });

    const outcome = await this.verifier.verify({
      message: input.message,
      history: input.history,
      signal: options.signal
    });

    if (!outcome.success) {
      log.warn('Intent verification failed, deferring to user', {
        kind: outcome.error.kind,
        error: sanitizeForLog(outcome.error.message)
      });
      return {
        intent: 'user_decision',
        confidence: vote.confidence,
        source: 'llm',
        counts: vote.counts,
        evidence: vote.evidence,
        rationale: outcome.error.kind === 'malformed' ? 'llm response unusable' : 'llm verification unavailable'
      };
    }

    return fromVerdict(outcome.data, vote);
  }
}

// The verdict decides the intent; its self-reported confidence stays in `raw`.
function fromVerdict(verdict: RouterVerdict, vote: LexicalVote): ClassificationResult {
  return {
    intent: SERVICE_FOR_LABEL[verdict.intent],
    confidence: vote.confidence,
    source: 'llm',
    counts: vote.counts,
    evidence: vote.evidence,
    rationale: verdict.rationale,
    raw: verdict
  };
}
