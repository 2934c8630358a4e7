// LLM service abstraction types

import type { ImageInput } from '../rag/types.js';

export interface LLMMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface LLMOptions {
  maxTokens?: number;
  temperature?: number;
  stopSequences?: string[];
  systemPrompt?: string;
}

export interface LLMResponse {
  content: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  model: string;
  finishReason?: string;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;

  // Generate a completion
  complete(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse>;

  // Describe an image in text (vision models only)
  describeImage?(image: ImageInput, prompt: string, options?: LLMOptions): Promise<LLMResponse>;
}

export interface LLMConfig {
  provider: 'anthropic' | 'openai';
  model: string;
  apiKey: string;
  baseUrl?: string;
}
