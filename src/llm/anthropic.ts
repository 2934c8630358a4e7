import Anthropic from '@anthropic-ai/sdk';
import type { ImageInput } from '../rag/types.js';
import type { LLMProvider, LLMMessage, LLMOptions, LLMResponse } from './types.js';

const DEBUG_LLM = ['1', 'true', 'yes', 'on'].includes((process.env.DEBUG_LLM || '').toLowerCase());

function toConversation(messages: LLMMessage[]): Anthropic.MessageParam[] {
  const conversation: Anthropic.MessageParam[] = [];
  for (const message of messages) {
    if (message.role === 'user' || message.role === 'assistant') {
      conversation.push({ role: message.role, content: message.content });
    }
  }
  return conversation;
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly model: string;

  private client: Anthropic;

  constructor(apiKey: string, model: string = 'claude-sonnet-4-20250514') {
    this.model = model;
    this.client = new Anthropic({ apiKey });
  }

  async complete(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    // Separate system message from conversation
    const systemMessage = messages.find((m) => m.role === 'system');

    return this.send(toConversation(messages), options?.systemPrompt ?? systemMessage?.content, options);
  }

  /**
   * Describe an image with a vision-capable Claude model.
   */
  async describeImage(image: ImageInput, prompt: string, options?: LLMOptions): Promise<LLMResponse> {
    const content: Anthropic.ContentBlockParam[] = [
      {
        type: 'image',
        source: {
          type: 'base64',
          media_type: image.mediaType,
          data: Buffer.from(image.data).toString('base64'),
        },
      },
      { type: 'text', text: prompt },
    ];

    if (DEBUG_LLM) {
      console.log('[Anthropic] describeImage request:', {
        model: this.model,
        filename: image.filename,
        mediaType: image.mediaType,
        bytes: image.data.length,
      });
    }

    return this.send([{ role: 'user', content }], options?.systemPrompt, options);
  }

  private async send(
    messages: Anthropic.MessageParam[],
    system: string | undefined,
    options?: LLMOptions
  ): Promise<LLMResponse> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: options?.maxTokens ?? 4096,
      system,
      messages,
      temperature: options?.temperature,
      stop_sequences: options?.stopSequences,
    });

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      content: text,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model: response.model,
      finishReason: response.stop_reason ?? undefined,
    };
  }
}
