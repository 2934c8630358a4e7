import type {
  AnswerContext,
  AnswerProvider,
  CaptionProvider,
  CompletionProvider,
  ImageInput,
  QueryExpander,
} from '../rag/types.js';
import type { LLMProvider } from './types.js';

export interface LLMServiceConfig {
  main: LLMProvider;
  fast: LLMProvider;
}

const CAPTION_PROMPT =
  'Describe this image for a search index. Include any visible text, labels, ' +
  'chart or diagram structure, and the main subjects. Reply with the description only.';

/**
 * Split an expansion reply into queries: one per line, list markers removed,
 * blanks, repeats and the original query dropped.
 */
export function parseExpansions(reply: string, original: string, count: number): string[] {
  const seen = new Set([original.trim().toLowerCase()]);
  const variants: string[] = [];

  for (const line of reply.split('\n')) {
    const variant = line
      .replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '')
      .replace(/^["']|["']$/g, '')
      .trim();
    const key = variant.toLowerCase();
    if (!variant || seen.has(key)) continue;
    seen.add(key);
    variants.push(variant);
    if (variants.length >= count) break;
  }

  return variants;
}

export class LLMService implements CompletionProvider, CaptionProvider, QueryExpander, AnswerProvider {
  private main: LLMProvider;
  private fast: LLMProvider;

  constructor(config: LLMServiceConfig) {
    this.main = config.main;
    this.fast = config.fast;
  }

  /**
   * Single-prompt completion using the Fast LLM
   */
  async complete(prompt: string, options?: { maxTokens?: number; temperature?: number }): Promise<string> {
    const response = await this.fast.complete([{ role: 'user', content: prompt }], options);
    return response.content;
  }

  /**
   * Caption an image with the Main LLM, which must support vision
   */
  async caption(image: ImageInput): Promise<string> {
    if (!this.main.describeImage) {
      throw new Error(`${this.main.name} provider does not support image input`);
    }

    const startTime = Date.now();
    const response = await this.main.describeImage(image, CAPTION_PROMPT, { maxTokens: 500, temperature: 0.2 });
    console.log(`[LLMService] Captioned ${image.filename} with ${this.main.model} (${Date.now() - startTime}ms)`);
    return response.content;
  }

  /**
   * Paraphrase a query into up to `count` alternative search queries
   */
  async expandQuery(query: string, count: number): Promise<string[]> {
    const prompt = `Given this query: "${query}"

Generate ${count} different variations of this query that could help find relevant information.
Return only the queries, one per line, without numbering or explanation.`;

    const reply = await this.complete(prompt, { maxTokens: 200, temperature: 0.7 });
    const variants = parseExpansions(reply, query, count);
    console.log(`[LLMService] Expanded query into ${variants.length} variations`);
    return variants;
  }

  /**
   * Answer a question from retrieved passages using the Main LLM
   */
  async answer(query: string, contexts: AnswerContext[]): Promise<string> {
    const contextText = contexts
      .map((context, i) => `[${i + 1}]${context.sourceName ? ` (${context.sourceName})` : ''} ${context.text}`)
      .join('\n\n');

    const systemPrompt =
      "Answer the user's query using only the provided context. Cite passages by their [number]. " +
      "If the context doesn't contain enough information, say so.";

    const response = await this.main.complete(
      [{ role: 'user', content: `Query: ${query}\n\nContext:\n${contextText}\n\nAnswer:` }],
      { systemPrompt, maxTokens: 500, temperature: 0.3 }
    );
    return response.content.trim();
  }

  getMainModel(): string {
    return this.main.model;
  }

  getFastModel(): string {
    return this.fast.model;
  }
}
