export interface OllamaProviderConfig {
  host?: string;
  headers?: Record<string, string>;
  model: string;
  /** Model used by the retrieval backend's embedder. */
  embeddingModel?: string;
  temperature?: number;
}

/** OpenAI, Anthropic, or an OpenAI-compatible endpoint such as DeepSeek. */
export interface HostedProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ProviderSettings {
  ollama?: OllamaProviderConfig;
  openai?: HostedProviderConfig;
  anthropic?: HostedProviderConfig;
  deepseek?: HostedProviderConfig;
}

export const DEEPSEEK_BASE_URL = 'https://api.deepseek.com/v1';
