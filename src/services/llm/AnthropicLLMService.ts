import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger.js';
import { GenerationProviderError } from '../../utils/errors.js';
import type { GenerationRequest, GenerationResult, LLMService } from './LLMService.interface.js';

export class AnthropicLLMService implements LLMService {
  readonly provider = 'anthropic' as const;
  private client: Anthropic;

  constructor(apiKey: string, readonly model: string, timeoutMs?: number) {
    this.client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    try {
      logger.debug({ model: this.model, promptLength: request.prompt.length }, 'Sending generation request to Anthropic');

      const message = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: request.signal }
      );

      const text = message.content.flatMap(block => (block.type === 'text' ? [block.text] : [])).join('');

      return {
        replies: text ? [text] : [],
        model: message.model,
        tokensUsed: message.usage.input_tokens + message.usage.output_tokens,
      };
    } catch (error) {
      logger.error({ error }, 'Anthropic generation failed');
      throw new GenerationProviderError('anthropic generation failed', error);
    }
  }

  async *stream(request: GenerationRequest): AsyncIterable<string> {
    try {
      const events = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          messages: [{ role: 'user', content: request.prompt }],
          stream: true,
        },
        { signal: request.signal }
      );

      for await (const event of events) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        }
      }
    } catch (error) {
      logger.error({ error }, 'Anthropic stream failed');
      throw new GenerationProviderError('anthropic stream failed', error);
    }
  }
}
