import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger';
import { GenerationRequest, TextGenerator } from '../../types/llm';
import { toProviderError } from '../../utils/errors';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';

export interface AnthropicConfig {
  apiKey: string;
  model?: string;
}

export class AnthropicService implements TextGenerator {
  readonly provider = 'anthropic';
  private client: Anthropic;
  private model: string;

  constructor(config: AnthropicConfig) {
    this.client = new Anthropic({ apiKey: config.apiKey });
    this.model = config.model || DEFAULT_ANTHROPIC_MODEL;
  }

  async generate(request: GenerationRequest): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
        messages: [{ role: 'user', content: request.prompt }],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      });

      const content = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();

      logger.debug('Anthropic response generated', {
        model: this.model,
        tokens: {
          prompt: response.usage?.input_tokens || 0,
          completion: response.usage?.output_tokens || 0,
        },
      });
      return content;
    } catch (error) {
      const wrapped = toProviderError('Anthropic', 'generate', error);
      logger.error('Anthropic error', { error: wrapped.message, retryable: wrapped.retryable });
      throw wrapped;
    }
  }
}
