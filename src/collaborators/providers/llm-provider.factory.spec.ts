import { ConfigService } from '@nestjs/config';
import { ChatOllama } from '@langchain/ollama';
import { LLMProviderFactory } from './llm-provider.factory';

function factory(env: Record<string, string> = {}): LLMProviderFactory {
  return new LLMProviderFactory(new ConfigService(env));
}

describe('LLMProviderFactory', () => {
  it('uses a local Ollama model with the summary budget by default', () => {
    expect(factory().resolveSettings('summary')).toEqual({
      provider: 'ollama',
      model: 'gemma3:1b',
      apiKey: undefined,
      temperature: 0,
      maxTokens: 200,
    });
  });

  it('reads the provider, model and key from the environment', () => {
    const settings = factory({
      LLM_PROVIDER: 'anthropic',
      ANTHROPIC_CHAT_MODEL: 'claude-test',
      ANTHROPIC_API_KEY: 'test-secret',
    }).resolveSettings('synthesis');

    expect(settings).toEqual({
      provider: 'anthropic',
      model: 'claude-test',
      apiKey: 'test-secret',
      temperature: 0.2,
      maxTokens: 800,
    });
  });

  it('requires an API key for hosted providers', () => {
    expect(() =>
      factory({ LLM_PROVIDER: 'openai' }).createChatModel('synthesis'),
    ).toThrow('OPENAI_API_KEY is required for the openai chat provider');
  });

  it('falls back to Ollama for an unknown provider', () => {
    const model = factory({ LLM_PROVIDER: 'mystery' }).createChatModel(
      'synthesis',
    );

    expect(model).toBeInstanceOf(ChatOllama);
  });
});
