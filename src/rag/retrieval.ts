/**
 * Retrieval Engine
 *
 * Answers a query with one of three strategies:
 * - semantic: nearest neighbours of the query embedding
 * - hybrid: semantic candidates merged with term-overlap candidates
 * - expanded: the query plus LLM paraphrases, merged by best score
 *
 * Results may be reranked and are served through the result cache.
 */

import { z } from 'zod';
import { buildCacheKey, type ResultCache } from './cache.js';
import { callCapability, type CapabilityPolicy, DEFAULT_CAPABILITY_POLICY } from './capability.js';
import type { QueryClassifier } from './classifier.js';
import { embedMany } from './embedding-providers.js';
import { NoDataError, ValidationError, errorMessage } from './errors.js';
import { compareIds, lexicalSearch } from './lexical.js';
import type { Reranker } from './reranker.js';
import type {
  ChunkMetadata,
  EmbeddingProvider,
  MetadataFilter,
  QueryExpander,
  QueryIntent,
  RetrievalMatch,
  RetrievalRequest,
  RetrievalResult,
  RetrievalStrategy,
  StoreMatch,
  VectorStore,
} from './types.js';

const DEBUG_RAG = ['1', 'true', 'yes', 'on'].includes((process.env.DEBUG_RAG || '').toLowerCase());

export interface RetrievalOptions {
  defaultNResults: number;
  maxNResults: number;
  maxQueryLength: number;
  rerankByDefault: boolean;
  /** Candidates fetched per result when reranking */
  rerankCandidateMultiplier: number;
  semanticWeight: number;
  lexicalWeight: number;
  /** Upper bound on chunks scanned for lexical matching */
  lexicalScanLimit: number;
  expansionVariants: number;
  capabilityPolicy: CapabilityPolicy;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  defaultNResults: 5,
  maxNResults: 100,
  maxQueryLength: 2000,
  rerankByDefault: false,
  rerankCandidateMultiplier: 3,
  semanticWeight: 0.7,
  lexicalWeight: 0.3,
  lexicalScanLimit: 10_000,
  expansionVariants: 3,
  capabilityPolicy: DEFAULT_CAPABILITY_POLICY,
};

export interface RetrievalDependencies {
  store: VectorStore;
  embedder: EmbeddingProvider;
  classifier: QueryClassifier;
  reranker: Reranker;
  cache: ResultCache;
  /** Without an expander, expanded retrieval degrades to semantic */
  expander?: QueryExpander | null;
}

interface ResolvedRequest {
  query: string;
  nResults: number;
  strategy?: RetrievalStrategy;
  filter?: MetadataFilter;
  rerank: boolean;
}

interface StrategyOutcome {
  strategy: RetrievalStrategy;
  matches: RetrievalMatch[];
  expandedQueries?: string[];
  degraded?: boolean;
}

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

function requestSchema(options: RetrievalOptions) {
  return z.object({
    query: z
      .string()
      .transform((query) => query.replace(/\s+/g, ' ').trim())
      .pipe(
        z
          .string()
          .min(1, 'Query must not be empty')
          .max(options.maxQueryLength, `Query must be at most ${options.maxQueryLength} characters`)
      ),
    nResults: z.number().int().min(1).max(options.maxNResults).optional(),
    strategy: z.enum(['semantic', 'hybrid', 'expanded']).optional(),
    filter: z.record(metadataValueSchema).optional(),
    rerank: z.boolean().optional(),
  });
}

/**
 * Score desc, then chunk id asc.
 */
export function compareMatches(a: RetrievalMatch, b: RetrievalMatch): number {
  return b.score - a.score || compareIds(a.id, b.id);
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(1, Math.max(0, score));
}

function toMatch(storeMatch: StoreMatch, metadata: ChunkMetadata): RetrievalMatch {
  const score = clampScore(storeMatch.score);
  return {
    id: storeMatch.chunk.id,
    score,
    chunk: storeMatch.chunk,
    metadata,
  };
}

export class RetrievalEngine {
  private deps: RetrievalDependencies;
  private options: RetrievalOptions;
  private schema: ReturnType<typeof requestSchema>;

  constructor(deps: RetrievalDependencies, options: Partial<RetrievalOptions> = {}) {
    this.deps = deps;
    this.options = { ...DEFAULT_RETRIEVAL_OPTIONS, ...options };
    this.schema = requestSchema(this.options);
  }

  /**
   * Retrieve the top matches for a query. The strategy comes from the query's
   * intent unless the request names one.
   */
  async retrieve(request: RetrievalRequest): Promise<RetrievalResult> {
    const resolved = this.validate(request);
    const intent = this.deps.classifier.classify(resolved.query);
    const strategy = resolved.strategy ?? this.deps.classifier.strategyFor(intent);

    const key = buildCacheKey({
      query: resolved.query,
      strategy,
      nResults: resolved.nResults,
      rerank: resolved.rerank,
      filter: resolved.filter,
    });

    return this.deps.cache.getOrCompute(
      key,
      () => this.execute(resolved, strategy, intent),
      (result) => !result.degraded
    );
  }

  private async execute(
    resolved: ResolvedRequest,
    strategy: RetrievalStrategy,
    intent: QueryIntent
  ): Promise<RetrievalResult> {
    const startTime = Date.now();
    await this.ensureData();

    const candidates = resolved.rerank
      ? resolved.nResults * this.options.rerankCandidateMultiplier
      : resolved.nResults;
    const outcome = await this.runStrategy(strategy, resolved.query, candidates, resolved.filter);

    const matches = resolved.rerank
      ? this.deps.reranker.rerank(outcome.matches, resolved.nResults)
      : outcome.matches.slice(0, resolved.nResults);

    if (DEBUG_RAG) {
      console.log(
        `[Retrieval] "${resolved.query}" intent=${intent} strategy=${outcome.strategy} ` +
          `matches=${matches.length} reranked=${resolved.rerank} in ${Date.now() - startTime}ms`
      );
    }

    const result: RetrievalResult = {
      query: resolved.query,
      strategy: outcome.strategy,
      intent,
      matches,
      reranked: resolved.rerank,
    };
    if (outcome.expandedQueries) {
      result.expandedQueries = outcome.expandedQueries;
    }
    if (outcome.degraded) {
      result.degraded = true;
    }
    return result;
  }

  private validate(request: RetrievalRequest): ResolvedRequest {
    const parsed = this.schema.safeParse(request);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
        .join('; ');
      throw new ValidationError(`Invalid retrieval request: ${details}`);
    }

    const { query, nResults, strategy, filter, rerank } = parsed.data;
    return {
      query,
      nResults: nResults ?? this.options.defaultNResults,
      strategy,
      filter: filter && Object.keys(filter).length > 0 ? filter : undefined,
      rerank: rerank ?? this.options.rerankByDefault,
    };
  }

  private async ensureData(): Promise<void> {
    const policy = this.options.capabilityPolicy;
    const count = await callCapability('vector_store', () => this.deps.store.count(), policy);
    if (count === 0) {
      throw new NoDataError();
    }
  }

  private async runStrategy(
    strategy: RetrievalStrategy,
    query: string,
    k: number,
    filter: MetadataFilter | undefined
  ): Promise<StrategyOutcome> {
    switch (strategy) {
      case 'semantic':
        return { strategy, matches: await this.semantic(query, k, filter) };
      case 'hybrid':
        return { strategy, matches: await this.hybrid(query, k, filter) };
      case 'expanded':
        return this.expanded(query, k, filter);
    }
  }

  private async embedQueries(queries: string[]): Promise<number[][]> {
    const embeddings = await callCapability(
      'embedding',
      () => embedMany(this.deps.embedder, queries),
      this.options.capabilityPolicy
    );
    if (embeddings.length !== queries.length) {
      throw new ValidationError(`Embedding provider returned ${embeddings.length} vectors for ${queries.length} queries`);
    }
    return embeddings;
  }

  private async searchStore(embedding: number[], k: number, filter: MetadataFilter | undefined): Promise<StoreMatch[]> {
    return callCapability(
      'vector_store',
      () => this.deps.store.query(embedding, k, filter),
      this.options.capabilityPolicy
    );
  }

  private async semantic(query: string, k: number, filter: MetadataFilter | undefined): Promise<RetrievalMatch[]> {
    const [embedding] = await this.embedQueries([query]);
    const results = await this.searchStore(embedding, k, filter);

    return results
      .map((result) => toMatch(result, { semanticScore: clampScore(result.score) }))
      .sort(compareMatches)
      .slice(0, k);
  }

  /**
   * Weighted merge of semantic and lexical candidates. Lexical scores are
   * scaled by the best lexical score so both sides share the [0, 1] range.
   */
  private async hybrid(query: string, k: number, filter: MetadataFilter | undefined): Promise<RetrievalMatch[]> {
    const { semanticWeight, lexicalWeight, lexicalScanLimit, capabilityPolicy } = this.options;

    const [semanticResults, scanned] = await Promise.all([
      this.embedQueries([query]).then(([embedding]) => this.searchStore(embedding, k, filter)),
      callCapability('vector_store', () => this.deps.store.scan(filter, lexicalScanLimit), capabilityPolicy),
    ]);
    const lexicalResults = lexicalSearch(query, scanned, k);
    const maxLexical = lexicalResults.reduce((max, result) => Math.max(max, result.score), 0);

    const merged = new Map<string, { semantic: number; lexical: number; matchedTerms: string[]; match: StoreMatch }>();

    for (const result of semanticResults) {
      merged.set(result.chunk.id, {
        semantic: clampScore(result.score),
        lexical: 0,
        matchedTerms: [],
        match: result,
      });
    }

    for (const result of lexicalResults) {
      const lexical = maxLexical > 0 ? result.score / maxLexical : 0;
      const existing = merged.get(result.chunk.id);
      if (existing) {
        existing.lexical = Math.max(existing.lexical, lexical);
        existing.matchedTerms = result.matchedTerms;
      } else {
        merged.set(result.chunk.id, {
          semantic: 0,
          lexical,
          matchedTerms: result.matchedTerms,
          match: { chunk: result.chunk, score: 0 },
        });
      }
    }

    if (DEBUG_RAG) {
      console.log(
        `[Retrieval] hybrid: ${semanticResults.length} semantic, ${lexicalResults.length} lexical, ${merged.size} merged`
      );
    }

    return [...merged.values()]
      .map(({ semantic, lexical, matchedTerms, match }) =>
        toMatch(
          { chunk: match.chunk, score: semanticWeight * semantic + lexicalWeight * lexical },
          { semanticScore: semantic, lexicalScore: lexical, matchedTerms: matchedTerms.join(' ') }
        )
      )
      .sort(compareMatches)
      .slice(0, k);
  }

  /**
   * Search with the query and its paraphrases; every chunk keeps its best
   * score across sub-queries. Falls back to semantic when expansion fails.
   */
  private async expanded(query: string, k: number, filter: MetadataFilter | undefined): Promise<StrategyOutcome> {
    const { expander } = this.deps;
    if (!expander) {
      console.warn('[Retrieval] No query expander configured, using semantic retrieval');
      return { strategy: 'semantic', matches: await this.semantic(query, k, filter), degraded: true };
    }

    let variants: string[];
    try {
      variants = await expander.expandQuery(query, this.options.expansionVariants);
    } catch (error) {
      console.warn('[Retrieval] Query expansion failed, using semantic retrieval:', errorMessage(error));
      return { strategy: 'semantic', matches: await this.semantic(query, k, filter), degraded: true };
    }

    const seen = new Set([query.toLowerCase()]);
    const expandedQueries: string[] = [];
    for (const variant of variants) {
      const normalized = variant.replace(/\s+/g, ' ').trim();
      if (normalized && !seen.has(normalized.toLowerCase())) {
        seen.add(normalized.toLowerCase());
        expandedQueries.push(normalized);
      }
      if (expandedQueries.length >= this.options.expansionVariants) break;
    }

    const queries = [query, ...expandedQueries];
    const embeddings = await this.embedQueries(queries);
    const perQuery = await Promise.all(embeddings.map((embedding) => this.searchStore(embedding, k, filter)));

    const merged = new Map<string, { best: StoreMatch; hits: number }>();
    for (const results of perQuery) {
      for (const result of results) {
        const existing = merged.get(result.chunk.id);
        if (!existing) {
          merged.set(result.chunk.id, { best: result, hits: 1 });
        } else {
          existing.hits++;
          if (result.score > existing.best.score) {
            existing.best = result;
          }
        }
      }
    }

    if (DEBUG_RAG) {
      console.log(`[Retrieval] expanded: ${queries.length} queries, ${merged.size} distinct chunks`);
    }

    const matches = [...merged.values()]
      .map(({ best, hits }) => toMatch(best, { semanticScore: clampScore(best.score), subQueryHits: hits }))
      .sort(compareMatches)
      .slice(0, k);

    return { strategy: 'expanded', matches, expandedQueries };
  }
}
