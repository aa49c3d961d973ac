import type OpenAI from 'openai';
import { logger } from '../../utils/logger.js';
import { GenerationProviderError } from '../../utils/errors.js';
import type { LLMProvider } from '../../config/index.js';
import type { GenerationRequest, GenerationResult, LLMService } from './LLMService.interface.js';

export class OpenAILLMService implements LLMService {
  constructor(
    private client: OpenAI,
    readonly model: string,
    readonly provider: LLMProvider = 'openai'
  ) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    try {
      logger.debug(
        { provider: this.provider, model: this.model, promptLength: request.prompt.length },
        'Sending generation request'
      );

      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: request.prompt }],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal: request.signal }
      );

      const replies = completion.choices
        .map(choice => choice.message.content)
        .filter((content): content is string => typeof content === 'string' && content.length > 0);

      return {
        replies,
        model: completion.model,
        tokensUsed: completion.usage?.total_tokens,
      };
    } catch (error) {
      logger.error({ error, provider: this.provider }, 'Generation request failed');
      throw new GenerationProviderError(`${this.provider} generation failed`, error);
    }
  }

  async *stream(request: GenerationRequest): AsyncIterable<string> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: request.prompt }],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          stream: true,
        },
        { signal: request.signal }
      );

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    } catch (error) {
      logger.error({ error, provider: this.provider }, 'Generation stream failed');
      throw new GenerationProviderError(`${this.provider} stream failed`, error);
    }
  }
}
