// lib/llmClient.ts
// Provider-neutral chat completion interface plus OpenAI and Anthropic adapters

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';

export type ChatRole = 'system' | 'user';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionResult {
  /** Text of every returned choice, in provider order. Empty when the provider returned none. */
  choices: string[];
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  baseURL?: string;
  /** Sent as HTTP-Referer, which OpenRouter uses to attribute traffic */
  referer?: string;
}

export function createOpenAIClient(options: OpenAIClientOptions): CompletionClient {
  const openai = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    defaultHeaders: options.referer ? { 'HTTP-Referer': options.referer } : undefined
  });

  return {
    async complete(request) {
      const response = await openai.chat.completions.create({
        model: request.model,
        messages: request.messages.map(m =>
          m.role === 'system'
            ? { role: 'system' as const, content: m.content }
            : { role: 'user' as const, content: m.content }
        ),
        temperature: request.temperature,
        max_tokens: request.maxTokens
      });
      return { choices: response.choices.map(choice => choice.message.content ?? '') };
    }
  };
}

const ANTHROPIC_DEFAULT_MAX_TOKENS = 1024;

export function createAnthropicClient(options: { apiKey: string }): CompletionClient {
  const anthropic = new Anthropic({ apiKey: options.apiKey });

  return {
    async complete(request) {
      // Anthropic takes the system prompt as a separate field
      const system = request.messages
        .filter(m => m.role === 'system')
        .map(m => m.content)
        .join('\n\n');

      const response = await anthropic.messages.create({
        model: request.model,
        max_tokens: request.maxTokens ?? ANTHROPIC_DEFAULT_MAX_TOKENS,
        temperature: request.temperature,
        ...(system ? { system } : {}),
        messages: request.messages
          .filter(m => m.role === 'user')
          .map(m => ({ role: 'user' as const, content: m.content }))
      });

      const text = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');
      return { choices: text ? [text] : [] };
    }
  };
}
