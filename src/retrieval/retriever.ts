import type { JsonObject } from '../core/types.js';

export interface RetrievedChunk {
  id: string;
  text: string;
  score: number;
  metadata?: JsonObject;
}

export interface RetrieverPort {
  retrieve(query: string, topK: number, signal?: AbortSignal): Promise<RetrievedChunk[]>;
}
