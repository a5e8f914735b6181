import type { ChatRequest, ChatResponse, EmbedRequest, EmbedResponse, ModelResponse } from 'ollama';
import { ProviderUnavailableError } from '../../core/errors.js';
import type { OllamaProviderConfig } from '../provider-config.js';

export type OllamaChatReply = Pick<ChatResponse, 'message'>;
export type OllamaModelList = { models: Array<Pick<ModelResponse, 'name' | 'model'>> };
export type OllamaEmbedReply = Pick<EmbedResponse, 'embeddings'>;

/** The slice of ollama-js used here; tests substitute a fake. */
export interface OllamaClientPort {
  chat(req: ChatRequest): Promise<OllamaChatReply>;
  list(): Promise<OllamaModelList>;
  embed(req: EmbedRequest): Promise<OllamaEmbedReply>;
  /** Aborts every request in flight on this client. */
  abort(): void;
}

/** Loaded lazily so that hosted-only setups never touch the package. */
export async function createOllamaClient(cfg: Pick<OllamaProviderConfig, 'host' | 'headers'>): Promise<OllamaClientPort> {
  let mod: typeof import('ollama');
  try {
    mod = await import('ollama');
  } catch (e) {
    throw new ProviderUnavailableError('ollama', 'Install `ollama` (ollama-js)', e);
  }
  const client = new mod.Ollama({ host: cfg.host, headers: cfg.headers });
  return {
    chat: (req) => client.chat({ ...req, stream: false }),
    list: () => client.list(),
    embed: (req) => client.embed(req),
    abort: () => client.abort(),
  };
}
