import type { QueryIntent, RetrievalStrategy } from './types.js';

const FACTUAL_PATTERNS = [
  /\bwhat (is|are|was|were)\b/,
  /\bwho (is|was)\b/,
  /\bwhen (did|was|is)\b/,
  /\bwhere (is|are)\b/,
  /\bhow (many|much)\b/,
  /\bdefine\b/,
  /\bdefinition of\b/,
  /\bexplain\b/,
];

const CROSS_MODAL_PATTERNS = [
  /\bimages?\b/,
  /\bdiagrams?\b/,
  /\bpictures?\b/,
  /\bphotos?\b/,
  /\bfigures?\b/,
  /\bcharts?\b/,
  /\bscreenshots?\b/,
  /\bshown\b/,
  /\bvisual\b/,
  /\billustrations?\b/,
];

const EXPLORATORY_PATTERNS = [
  /\boverview\b/,
  /\btell me about\b/,
  /\binformation about\b/,
  /\banything about\b/,
  /\brecent\b/,
  /\brelated to\b/,
  /\bsimilar to\b/,
  /\bsummary\b/,
  /\bsummari[sz]e\b/,
];

const SHORT_QUERY_WORDS = 2;

export const DEFAULT_INTENT_STRATEGIES: Record<QueryIntent, RetrievalStrategy> = {
  factual: 'semantic',
  exploratory: 'expanded',
  cross_modal: 'hybrid',
};

/**
 * Query Classifier - rule-based intent detection used to pick a default strategy
 */
export class QueryClassifier {
  private strategies: Record<QueryIntent, RetrievalStrategy>;

  constructor(strategies: Partial<Record<QueryIntent, RetrievalStrategy>> = {}) {
    this.strategies = { ...DEFAULT_INTENT_STRATEGIES, ...strategies };
  }

  /**
   * Factual markers win over modality terms, which win over vague or short queries.
   */
  classify(query: string): QueryIntent {
    const normalized = query.toLowerCase().replace(/\s+/g, ' ').trim();

    if (FACTUAL_PATTERNS.some((pattern) => pattern.test(normalized))) {
      return 'factual';
    }

    if (CROSS_MODAL_PATTERNS.some((pattern) => pattern.test(normalized))) {
      return 'cross_modal';
    }

    const wordCount = normalized.split(' ').filter((word) => word.length > 0).length;
    if (wordCount <= SHORT_QUERY_WORDS || EXPLORATORY_PATTERNS.some((pattern) => pattern.test(normalized))) {
      return 'exploratory';
    }

    return 'factual';
  }

  strategyFor(intent: QueryIntent): RetrievalStrategy {
    return this.strategies[intent];
  }
}
