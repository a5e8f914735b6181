import type { JsonObject } from '../core/types.js';
import type { RetrievedChunk, RetrieverPort } from './retriever.js';
import type { EmbeddingProvider } from './embedding.js';

function dot(a: number[], b: number[]): number {
  let s = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) s += (a[i] ?? 0) * (b[i] ?? 0);
  return s;
}
function cosine(a: number[], b: number[]): number {
  const na = Math.sqrt(dot(a, a));
  const nb = Math.sqrt(dot(b, b));
  if (na === 0 || nb === 0) return 0;
  return dot(a, b) / (na * nb);
}

export interface VectorDocument {
  id: string;
  text: string;
  embedding: number[];
  metadata?: JsonObject;
}

export interface IndexInfo {
  documents: number;
  dimensions: number | null;
}

/** Brute-force cosine index held in memory. Re-adding an id replaces the document. */
export class SimpleVectorIndex implements RetrieverPort {
  private readonly docs = new Map<string, VectorDocument>();

  constructor(private readonly embedder: EmbeddingProvider) {}

  async addDocuments(
    docs: Array<{ id: string; text: string; metadata?: JsonObject }>,
    signal?: AbortSignal
  ): Promise<void> {
    const embeddings = await this.embedder.embed(
      docs.map((d) => d.text),
      signal
    );
    if (embeddings.length !== docs.length) {
      throw new Error(`Embedder returned ${embeddings.length} vectors for ${docs.length} documents`);
    }
    docs.forEach((d, i) => {
      this.docs.set(d.id, { id: d.id, text: d.text, metadata: d.metadata, embedding: embeddings[i] ?? [] });
    });
  }

  /** Returns how many documents were removed. */
  removeWhere(match: (doc: VectorDocument) => boolean): number {
    let removed = 0;
    for (const [id, doc] of this.docs) {
      if (!match(doc)) continue;
      this.docs.delete(id);
      removed++;
    }
    return removed;
  }

  async retrieve(query: string, topK: number, signal?: AbortSignal): Promise<RetrievedChunk[]> {
    if (this.docs.size === 0) return [];
    const [qEmb] = await this.embedder.embed([query], signal);
    if (!qEmb) return [];
    return [...this.docs.values()]
      .map((d) => ({ d, score: cosine(qEmb, d.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(1, topK))
      .map(({ d, score }) => ({ id: d.id, text: d.text, metadata: d.metadata, score }));
  }

  info(): IndexInfo {
    const first = this.docs.values().next();
    return { documents: this.docs.size, dimensions: first.done ? null : first.value.embedding.length };
  }
}
