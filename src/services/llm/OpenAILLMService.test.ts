import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { Stream } from 'openai/streaming';
import { OpenAILLMService } from './OpenAILLMService.js';
import { AnthropicLLMService } from './AnthropicLLMService.js';
import { LLMServiceFactory } from './LLMServiceFactory.js';
import { GenerationProviderError } from '../../utils/errors.js';
import type { Config } from '../../config/index.js';

function chunk(content: string | null): OpenAI.ChatCompletionChunk {
  return {
    id: 'chunk-1',
    object: 'chat.completion.chunk',
    created: 0,
    model: 'gpt-4o-mini',
    choices: [{ index: 0, delta: content === null ? {} : { content }, finish_reason: null }],
  };
}

function setup() {
  const client = new OpenAI({ apiKey: 'test-key' });
  const create = vi.spyOn(client.chat.completions, 'create');
  const service = new OpenAILLMService(client, 'gpt-4o-mini', 'groq');
  return { service, create };
}

const request = { prompt: 'Say hi', temperature: 0.2, maxTokens: 64 };

describe('OpenAILLMService', () => {
  it('sends the prompt as a single user message and returns non-empty replies', async () => {
    const { service, create } = setup();
    create.mockResolvedValue({
      id: 'cmpl-1',
      object: 'chat.completion',
      created: 0,
      model: 'gpt-4o-mini',
      choices: [
        { index: 0, finish_reason: 'stop', logprobs: null, message: { role: 'assistant', content: 'Hi!', refusal: null } },
        { index: 1, finish_reason: 'stop', logprobs: null, message: { role: 'assistant', content: '', refusal: null } },
      ],
      usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
    });

    const result = await service.generate(request);

    expect(result).toEqual({ replies: ['Hi!'], model: 'gpt-4o-mini', tokensUsed: 5 });
    expect(create).toHaveBeenCalledWith(
      { model: 'gpt-4o-mini', messages: [{ role: 'user', content: 'Say hi' }], temperature: 0.2, max_tokens: 64 },
      { signal: undefined }
    );
  });

  it('wraps provider failures', async () => {
    const { service, create } = setup();
    create.mockRejectedValue(new Error('overloaded'));

    await expect(service.generate(request)).rejects.toThrow(GenerationProviderError);
    await expect(service.generate(request)).rejects.toThrow('groq generation failed');
  });

  it('streams text deltas and skips empty chunks', async () => {
    const { service, create } = setup();
    create.mockResolvedValue(
      new Stream(async function* () {
        yield chunk('Hel');
        yield chunk(null);
        yield chunk('lo');
      }, new AbortController())
    );

    const tokens: string[] = [];
    for await (const token of service.stream(request)) tokens.push(token);

    expect(tokens).toEqual(['Hel', 'lo']);
    expect(create.mock.calls[0]?.[0]).toMatchObject({ stream: true });
  });

  it('wraps failures raised while streaming', async () => {
    const { service, create } = setup();
    create.mockRejectedValue(new Error('socket closed'));

    const consume = async () => {
      for await (const token of service.stream(request)) void token;
    };

    await expect(consume()).rejects.toThrow('groq stream failed');
  });
});

describe('LLMServiceFactory', () => {
  const settings: Config['llm'] = {
    provider: 'openai',
    model: 'gpt-4o-mini',
    apiKey: 'test-key',
    temperature: 0.7,
    maxTokens: 1024,
    timeoutMs: 60000,
  };

  it('uses the OpenAI-compatible client for groq and openrouter', () => {
    const groq = LLMServiceFactory.createLLMService({ ...settings, provider: 'groq', model: 'llama-3.1-8b-instant' });

    expect(groq).toBeInstanceOf(OpenAILLMService);
    expect(groq.provider).toBe('groq');
    expect(groq.model).toBe('llama-3.1-8b-instant');
    expect(LLMServiceFactory.createLLMService({ ...settings, provider: 'openrouter' }).provider).toBe('openrouter');
  });

  it('uses the Anthropic client for anthropic models', () => {
    const service = LLMServiceFactory.createLLMService({ ...settings, provider: 'anthropic', model: 'claude-3-5-haiku-latest' });

    expect(service).toBeInstanceOf(AnthropicLLMService);
    expect(service.provider).toBe('anthropic');
  });

  it('returns a new instance on every call', () => {
    expect(LLMServiceFactory.createLLMService(settings)).not.toBe(LLMServiceFactory.createLLMService(settings));
  });
});
