import { generateText } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import type { AIProvider, AIProviderType, AIConfig } from '../types';

// Model mappings for each provider
const MODEL_DEFAULTS: Record<AIProviderType, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-latest',
  ollama: 'llama3.2',
};

function createModel(config: AIConfig) {
  const modelId = config.model || MODEL_DEFAULTS[config.provider];

  switch (config.provider) {
    case 'openai': {
      const openai = createOpenAI({
        apiKey: process.env.OPENAI_API_KEY,
      });
      return openai(modelId);
    }
    case 'anthropic': {
      const anthropic = createAnthropic({
        apiKey: process.env.ANTHROPIC_API_KEY,
      });
      return anthropic(modelId);
    }
    case 'ollama': {
      // Ollama uses OpenAI-compatible API
      let baseUrl = config.baseUrl ?? 'http://localhost:11434';
      if (!baseUrl.endsWith('/v1')) {
        baseUrl = baseUrl.replace(/\/$/, '') + '/v1';
      }
      const ollama = createOpenAI({
        baseURL: baseUrl,
        apiKey: 'ollama', // Ollama doesn't require an API key
      });
      return ollama(modelId);
    }
  }
}

class UnifiedAIProvider implements AIProvider {
  name: AIProviderType;
  private config: AIConfig;

  constructor(config: AIConfig) {
    this.name = config.provider;
    this.config = config;
  }

  async generateText(prompt: string, systemPrompt?: string): Promise<string> {
    const model = createModel(this.config);

    const result = await generateText({
      model,
      system: systemPrompt,
      prompt,
      temperature: this.config.temperature ?? 0.7,
    });

    return result.text;
  }
}

export function createAIProvider(config: AIConfig): AIProvider {
  return new UnifiedAIProvider(config);
}

export type { AIProvider };
