import { FakeListChatModel } from '@langchain/core/utils/testing';
import { ConfigService } from '@nestjs/config';
import type { RetrievalHit } from '../collaborator.interfaces';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import {
  AnswerSynthesizerService,
  formatContext,
  NO_CONTEXT_ANSWER,
} from './answer-synthesizer.service';

const hit: RetrievalHit = {
  chunkId: 'c1',
  url: 'https://example.com/ttl',
  title: 'Cache TTL',
  content: 'Entries expire after one hour.',
  score: 0.01,
  sources: ['vector'],
};

class FakeLLMProviderFactory extends LLMProviderFactory {
  calls = 0;

  constructor(private readonly responses: string[]) {
    super(new ConfigService());
  }

  createChatModel(): FakeListChatModel {
    this.calls += 1;
    return new FakeListChatModel({ responses: this.responses });
  }
}

describe('AnswerSynthesizerService', () => {
  it('numbers the excerpts in the prompt context', () => {
    const second = { ...hit, title: '', url: 'https://example.com/b' };
    expect(formatContext([hit, second])).toBe(
      '[1] Cache TTL\nURL: https://example.com/ttl\nEntries expire after one hour.' +
        '\n\n---\n\n' +
        '[2] https://example.com/b\nURL: https://example.com/b\nEntries expire after one hour.',
    );
  });

  it('returns the model answer', async () => {
    const factory = new FakeLLMProviderFactory([
      '  Entries live for one hour [1].  ',
    ]);
    const service = new AnswerSynthesizerService(factory);

    await expect(
      service.synthesize('How long do entries live?', [hit]),
    ).resolves.toBe('Entries live for one hour [1].');
  });

  it('does not call the model without context', async () => {
    const factory = new FakeLLMProviderFactory(['unused']);
    const service = new AnswerSynthesizerService(factory);

    await expect(service.synthesize('anything?', [])).resolves.toBe(
      NO_CONTEXT_ANSWER,
    );
    expect(factory.calls).toBe(0);
  });
});
