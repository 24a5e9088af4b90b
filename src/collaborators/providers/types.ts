export type EmbeddingProvider = 'ollama' | 'openai' | 'google';

export type LLMProvider = 'openai' | 'google' | 'anthropic' | 'ollama';

export const EMBEDDING_PROVIDERS: readonly EmbeddingProvider[] = [
  'ollama',
  'openai',
  'google',
];

export const LLM_PROVIDERS: readonly LLMProvider[] = [
  'openai',
  'google',
  'anthropic',
  'ollama',
];

/** What a chat model is used for; each use has its own generation budget. */
export type ChatModelPurpose = 'synthesis' | 'summary';

export interface ChatModelProfile {
  temperature: number;
  maxTokens: number;
}

export const CHAT_MODEL_PROFILES: Record<ChatModelPurpose, ChatModelProfile> = {
  synthesis: { temperature: 0.2, maxTokens: 800 },
  summary: { temperature: 0, maxTokens: 200 },
};

/** Resolved settings for one chat model instance. */
export interface ChatModelSettings extends ChatModelProfile {
  provider: LLMProvider;
  model: string;
  apiKey: string | undefined;
}

/** Env var holding each provider's API key; Ollama runs without one. */
export const API_KEY_ENV_VARS: Record<LLMProvider, string | null> = {
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  ollama: null,
};

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
