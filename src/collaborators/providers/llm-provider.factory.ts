/**
 * LLM Provider Factory
 * Chat models for answer synthesis and page summaries. The provider comes
 * from `LLM_PROVIDER`; the generation budget comes from the purpose.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  API_KEY_ENV_VARS,
  CHAT_MODEL_PROFILES,
  DEFAULT_OLLAMA_BASE_URL,
  LLM_PROVIDERS,
  type ChatModelPurpose,
  type ChatModelSettings,
  type LLMProvider,
} from './types';

const DEFAULT_CHAT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o-mini',
  google: 'gemini-2.5-flash-lite',
  anthropic: 'claude-3-5-haiku-latest',
  ollama: 'gemma3:1b',
};

const CHAT_MODEL_ENV_VARS: Record<LLMProvider, string> = {
  openai: 'OPENAI_CHAT_MODEL',
  google: 'GOOGLE_CHAT_MODEL',
  anthropic: 'ANTHROPIC_CHAT_MODEL',
  ollama: 'OLLAMA_CHAT_MODEL',
};

const MAX_RETRIES = 2;

function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  createChatModel(purpose: ChatModelPurpose): BaseChatModel {
    const settings = this.resolveSettings(purpose);
    this.logger.log(
      `Creating chat model for ${purpose}: ${settings.provider}/${settings.model}`,
    );

    switch (settings.provider) {
      case 'openai':
        return new ChatOpenAI({
          model: settings.model,
          temperature: settings.temperature,
          maxTokens: settings.maxTokens,
          maxRetries: MAX_RETRIES,
          configuration: {
            baseURL: this.configService.get<string>('OPENAI_BASE_URL'),
            apiKey: settings.apiKey,
          },
        });
      case 'google':
        return new ChatGoogleGenerativeAI({
          model: settings.model,
          temperature: settings.temperature,
          maxOutputTokens: settings.maxTokens,
          maxRetries: MAX_RETRIES,
          apiKey: settings.apiKey,
        });
      case 'anthropic':
        // ChatAnthropic's generics differ from BaseChatModel's defaults.
        return new ChatAnthropic({
          model: settings.model,
          temperature: settings.temperature,
          maxTokens: settings.maxTokens,
          maxRetries: MAX_RETRIES,
          apiKey: settings.apiKey,
        }) as unknown as BaseChatModel;
      case 'ollama':
        return new ChatOllama({
          model: settings.model,
          temperature: settings.temperature,
          numPredict: settings.maxTokens,
          baseUrl: this.configService.get<string>(
            'OLLAMA_BASE_URL',
            DEFAULT_OLLAMA_BASE_URL,
          ),
        });
    }
  }

  /**
   * Provider, model and key for `purpose`. Throws when the selected provider
   * needs an API key that is not configured.
   */
  resolveSettings(purpose: ChatModelPurpose): ChatModelSettings {
    const provider = this.getProvider();
    const keyVar = API_KEY_ENV_VARS[provider];
    const apiKey = keyVar ? this.configService.get<string>(keyVar) : undefined;
    if (keyVar && !apiKey) {
      throw new Error(`${keyVar} is required for the ${provider} chat provider`);
    }

    return {
      provider,
      model: this.configService.get<string>(
        CHAT_MODEL_ENV_VARS[provider],
        DEFAULT_CHAT_MODELS[provider],
      ),
      apiKey,
      ...CHAT_MODEL_PROFILES[purpose],
    };
  }

  private getProvider(): LLMProvider {
    const provider = this.configService.get<string>('LLM_PROVIDER', 'ollama');
    if (!isLLMProvider(provider)) {
      this.logger.warn(`Invalid LLM provider: ${provider}, defaulting to ollama`);
      return 'ollama';
    }
    return provider;
  }
}
