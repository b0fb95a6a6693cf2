import { EmbeddingProvider, TextGenerator } from '../../types/llm';
import { AnthropicService } from './anthropic.service';
import { OpenAIService } from './openai.service';

export interface LLMSettings {
  provider: 'anthropic' | 'openai';
  model?: string;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  embeddingModel?: string;
}

export class LLMFactory {
  static createTextGenerator(settings: LLMSettings): TextGenerator {
    switch (settings.provider) {
      case 'anthropic':
        if (!settings.anthropicApiKey) {
          throw new Error('ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic');
        }
        return new AnthropicService({ apiKey: settings.anthropicApiKey, model: settings.model });
      case 'openai':
        if (!settings.openaiApiKey) {
          throw new Error('OPENAI_API_KEY is required when LLM_PROVIDER=openai');
        }
        return new OpenAIService({ apiKey: settings.openaiApiKey, model: settings.model });
      default: {
        const unsupported: never = settings.provider;
        throw new Error(`Unsupported LLM provider: ${String(unsupported)}`);
      }
    }
  }

  static createEmbeddingProvider(settings: LLMSettings): EmbeddingProvider {
    if (!settings.openaiApiKey) {
      throw new Error('OPENAI_API_KEY is required for embeddings');
    }
    return new OpenAIService({ apiKey: settings.openaiApiKey, embeddingModel: settings.embeddingModel });
  }
}
