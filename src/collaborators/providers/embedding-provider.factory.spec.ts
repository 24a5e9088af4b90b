import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { EmbeddingProviderFactory } from './embedding-provider.factory';

function factory(env: Record<string, string> = {}): EmbeddingProviderFactory {
  return new EmbeddingProviderFactory(new ConfigService(env));
}

describe('EmbeddingProviderFactory', () => {
  it('defaults to bge-m3 on Ollama', () => {
    expect(factory().resolveSettings()).toEqual({
      provider: 'ollama',
      model: 'bge-m3:567m',
      dimensions: 1024,
    });
  });

  it.each<[Record<string, string>, number]>([
    [{ EMBEDDING_PROVIDER: 'openai' }, 1536],
    [
      {
        EMBEDDING_PROVIDER: 'openai',
        OPENAI_EMBEDDING_MODEL: 'text-embedding-3-large',
      },
      3072,
    ],
    [{ OLLAMA_EMBEDDING_MODEL: 'nomic-embed-text' }, 768],
    [{ OLLAMA_EMBEDDING_MODEL: 'house-model' }, 1024],
    [
      { OLLAMA_EMBEDDING_MODEL: 'house-model', EMBEDDING_DIMENSIONS: '384' },
      384,
    ],
  ])('sizes vectors for %j', (env, dimensions) => {
    expect(factory(env).getEmbeddingDimensions()).toBe(dimensions);
  });

  it('shares one embedding model between callers', () => {
    const embeddings = factory();

    const first = embeddings.getEmbeddingModel();

    expect(first).toBeInstanceOf(OllamaEmbeddings);
    expect(embeddings.getEmbeddingModel()).toBe(first);
  });

  it('requires an API key for hosted providers', () => {
    expect(() =>
      factory({ EMBEDDING_PROVIDER: 'google' }).getEmbeddingModel(),
    ).toThrow('GOOGLE_API_KEY is required for google embeddings');
  });
});
