/**
 * Embedding Provider Factory
 * Ingestion, retrieval and collection bootstrap all go through the one model
 * held here, so chunk vectors, query vectors and the collection's vector size
 * always agree.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  API_KEY_ENV_VARS,
  DEFAULT_OLLAMA_BASE_URL,
  EMBEDDING_PROVIDERS,
  type EmbeddingProvider,
} from './types';

const DIMENSIONS: Record<string, number> = {
  'bge-m3:567m': 1024,
  'bge-m3': 1024,
  'nomic-embed-text': 768,
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-004': 768,
};

const FALLBACK_DIMENSIONS = 1024;

const DEFAULT_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'bge-m3:567m',
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
};

const MODEL_ENV_VARS: Record<EmbeddingProvider, string> = {
  ollama: 'OLLAMA_EMBEDDING_MODEL',
  openai: 'OPENAI_EMBEDDING_MODEL',
  google: 'GOOGLE_EMBEDDING_MODEL',
};

function isEmbeddingProvider(value: string): value is EmbeddingProvider {
  return EMBEDDING_PROVIDERS.some((provider) => provider === value);
}

export interface EmbeddingSettings {
  provider: EmbeddingProvider;
  model: string;
  dimensions: number;
}

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);
  private embeddings: Embeddings | null = null;

  constructor(private readonly configService: ConfigService) {}

  /** The shared embedding model, created on first use. */
  getEmbeddingModel(): Embeddings {
    if (!this.embeddings) {
      this.embeddings = this.createEmbeddingModel();
    }
    return this.embeddings;
  }

  /** Vector size for collection creation. */
  getEmbeddingDimensions(): number {
    return this.resolveSettings().dimensions;
  }

  /**
   * `EMBEDDING_DIMENSIONS` wins over the built-in table; models missing from
   * the table get 1024.
   */
  resolveSettings(): EmbeddingSettings {
    const provider = this.getProvider();
    const model = this.configService.get<string>(
      MODEL_ENV_VARS[provider],
      DEFAULT_MODELS[provider],
    );
    const explicit = Number(
      this.configService.get<string>('EMBEDDING_DIMENSIONS'),
    );

    return {
      provider,
      model,
      dimensions:
        Number.isInteger(explicit) && explicit > 0
          ? explicit
          : (DIMENSIONS[model] ?? FALLBACK_DIMENSIONS),
    };
  }

  private createEmbeddingModel(): Embeddings {
    const { provider, model, dimensions } = this.resolveSettings();
    this.logger.log(
      `Creating embedding model: ${provider}/${model} (${dimensions}D)`,
    );

    switch (provider) {
      case 'ollama':
        return new OllamaEmbeddings({
          model,
          baseUrl: this.configService.get<string>(
            'OLLAMA_BASE_URL',
            DEFAULT_OLLAMA_BASE_URL,
          ),
        });
      case 'openai':
        return new OpenAIEmbeddings({
          model,
          openAIApiKey: this.requireApiKey(provider),
        });
      case 'google':
        return new GoogleGenerativeAIEmbeddings({
          model,
          apiKey: this.requireApiKey(provider),
        });
    }
  }

  private requireApiKey(provider: EmbeddingProvider): string {
    const keyVar = API_KEY_ENV_VARS[provider] ?? '';
    const apiKey = this.configService.get<string>(keyVar);
    if (!apiKey) {
      throw new Error(`${keyVar} is required for ${provider} embeddings`);
    }
    return apiKey;
  }

  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );
    if (!isEmbeddingProvider(provider)) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to ollama`,
      );
      return 'ollama';
    }
    return provider;
  }
}
