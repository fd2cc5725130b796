import { stemmer } from 'stemmer';
import type { IntentLabel, KeywordLists } from '@shared/schema';

export interface TriggerPhrase {
  phrase: string;
  stems: readonly string[];
}

/** Stem-normalized trigger phrases per label. Frozen once built. */
export type KeywordTable = Readonly<Record<IntentLabel, readonly TriggerPhrase[]>>;

export interface PhraseMatch {
  phrase: string;
  index: number;
}

const TOKEN_PATTERN = /[a-z]+(?:'[a-z]+)?|[0-9]+/g;

export function tokenize(text: string): string[] {
  return text.toLowerCase().replace(/[‘’]/g, "'").match(TOKEN_PATTERN) ?? [];
}

// Trigger phrases and messages must go through this same function.
export function toStems(text: string): string[] {
  return tokenize(text).map((token) => stemmer(token));
}

export function buildKeywordTable(lists: KeywordLists): KeywordTable {
  const build = (phrases: string[]): readonly TriggerPhrase[] => {
    const seen = new Set<string>();
    const triggers: TriggerPhrase[] = [];
    for (const phrase of phrases) {
      const stems = toStems(phrase);
      const key = stems.join(' ');
      if (stems.length === 0 || seen.has(key)) continue;
      seen.add(key);
      triggers.push(Object.freeze({ phrase: phrase.trim().toLowerCase(), stems: Object.freeze(stems) }));
    }
    return Object.freeze(triggers);
  };

  return Object.freeze({
    scheduling: build(lists.scheduling),
    qna: build(lists.qna),
  });
}

function indexOfRun(haystack: readonly string[], needle: readonly string[]): number {
  outer: for (let start = 0; start + needle.length <= haystack.length; start++) {
    for (let offset = 0; offset < needle.length; offset++) {
      if (haystack[start + offset] !== needle[offset]) continue outer;
    }
    return start;
  }
  return -1;
}

/** Triggers of one label whose stems appear as a contiguous run in `stems`. */
export function matchTriggers(stems: readonly string[], triggers: readonly TriggerPhrase[]): PhraseMatch[] {
  const matches: PhraseMatch[] = [];
  for (const trigger of triggers) {
    const index = indexOfRun(stems, trigger.stems);
    if (index >= 0) {
      matches.push({ phrase: trigger.phrase, index });
    }
  }
  return matches;
}

export function keywordCounts(table: KeywordTable): Record<IntentLabel, number> {
  return {
    scheduling: table.scheduling.length,
    qna: table.qna.length,
  };
}
