import OpenAI from 'openai';
import { logger } from '../../utils/logger';
import { EmbeddingProvider, GenerationRequest, TextGenerator } from '../../types/llm';
import { toProviderError } from '../../utils/errors';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export interface OpenAIConfig {
  apiKey: string;
  model?: string;
  embeddingModel?: string;
}

export class OpenAIService implements TextGenerator, EmbeddingProvider {
  readonly provider = 'openai';
  private client: OpenAI;
  private model: string;
  private embeddingModel: string;

  constructor(config: OpenAIConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model || DEFAULT_OPENAI_MODEL;
    this.embeddingModel = config.embeddingModel || DEFAULT_EMBEDDING_MODEL;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      });

      const content = response.choices[0]?.message?.content || '';
      logger.debug('OpenAI response generated', {
        model: this.model,
        tokens: {
          prompt: response.usage?.prompt_tokens || 0,
          completion: response.usage?.completion_tokens || 0,
        },
      });
      return content.trim();
    } catch (error) {
      const wrapped = toProviderError('OpenAI', 'generate', error);
      logger.error('OpenAI error', { error: wrapped.message, retryable: wrapped.retryable });
      throw wrapped;
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.embeddingModel,
        input: texts,
      });

      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (error) {
      const wrapped = toProviderError('OpenAI', 'embed', error);
      logger.error('OpenAI embedding error', { error: wrapped.message, count: texts.length });
      throw wrapped;
    }
  }
}
