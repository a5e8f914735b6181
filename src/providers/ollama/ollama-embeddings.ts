import type { EmbeddingProvider } from '../../retrieval/embedding.js';
import type { OllamaProviderConfig } from '../provider-config.js';
import { ProviderUnavailableError, errorMessage } from '../../core/errors.js';
import { raceAbort } from '../../core/turn-controller.js';
import { createOllamaClient, type OllamaClientPort } from './ollama-client.js';

export const DEFAULT_EMBEDDING_MODEL = 'nomic-embed-text';

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private clientPromise: Promise<OllamaClientPort> | null;

  constructor(
    private readonly cfg: Pick<OllamaProviderConfig, 'host' | 'headers' | 'embeddingModel'>,
    client?: OllamaClientPort
  ) {
    this.clientPromise = client ? Promise.resolve(client) : null;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    this.clientPromise ??= createOllamaClient(this.cfg);
    const client = await this.clientPromise;
    const request = client.embed({ model: this.cfg.embeddingModel ?? DEFAULT_EMBEDDING_MODEL, input: texts });
    try {
      const res = await (signal ? raceAbort(request, signal) : request);
      return res.embeddings;
    } catch (e) {
      if (signal?.aborted) throw e;
      throw new ProviderUnavailableError('ollama', `embedding failed: ${errorMessage(e)}`, e);
    }
  }
}
