export * from './types.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAIProvider } from './openai.js';
export { LLMService, parseExpansions, type LLMServiceConfig } from './service.js';
