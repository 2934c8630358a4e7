import { z } from 'zod';
import type { ImageInput } from '../rag/types.js';
import type { LLMProvider, LLMMessage, LLMOptions, LLMResponse } from './types.js';

type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | OpenAIContentPart[];
}

/** Response from the chat completions endpoint */
const chatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
        finish_reason: z.string().nullish(),
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

/**
 * OpenAI LLM Provider
 *
 * Works with any OpenAI-compatible chat completions endpoint:
 * - gpt-4o (vision capable)
 * - gpt-4o-mini (fast, cheap)
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  readonly model: string;

  private apiKey: string;
  private baseUrl: string;

  constructor(
    apiKey: string,
    model: string = 'gpt-4o',
    baseUrl: string = 'https://api.openai.com/v1'
  ) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = baseUrl;
  }

  async complete(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    return this.send(this.convertMessages(messages, options?.systemPrompt), options);
  }

  /**
   * Describe an image by sending it inline as a data URL.
   */
  async describeImage(image: ImageInput, prompt: string, options?: LLMOptions): Promise<LLMResponse> {
    const messages: OpenAIMessage[] = [];
    if (options?.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({
      role: 'user',
      content: [
        {
          type: 'image_url',
          image_url: { url: `data:${image.mediaType};base64,${Buffer.from(image.data).toString('base64')}` },
        },
        { type: 'text', text: prompt },
      ],
    });

    return this.send(messages, options);
  }

  private async send(messages: OpenAIMessage[], options?: LLMOptions): Promise<LLMResponse> {
    const requestBody: Record<string, unknown> = {
      model: this.model,
      messages,
      max_completion_tokens: options?.maxTokens ?? 4096,
      temperature: options?.temperature ?? 0.7,
    };

    if (options?.stopSequences) {
      requestBody.stop = options.stopSequences;
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(requestBody),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} ${error}`);
    }

    const data = chatCompletionResponseSchema.parse(await response.json());

    const choice = data.choices?.[0];
    const content = choice?.message?.content || '';

    return {
      content,
      usage: data.usage
        ? {
            inputTokens: data.usage.prompt_tokens || 0,
            outputTokens: data.usage.completion_tokens || 0,
          }
        : undefined,
      model: data.model || this.model,
      finishReason: choice?.finish_reason ?? undefined,
    };
  }

  private convertMessages(messages: LLMMessage[], systemPrompt?: string): OpenAIMessage[] {
    const converted: OpenAIMessage[] = [];
    const system = systemPrompt ?? messages.find((m) => m.role === 'system')?.content;
    if (system) {
      converted.push({ role: 'system', content: system });
    }
    for (const message of messages) {
      if (message.role !== 'system') {
        converted.push({ role: message.role, content: message.content });
      }
    }
    return converted;
  }
}
