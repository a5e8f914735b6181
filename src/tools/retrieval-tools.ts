import type { JsonObject } from '../core/types.js';
import { ToolExecutionError } from '../core/errors.js';
import type { EmbeddingProvider } from '../retrieval/embedding.js';
import { splitIntoChunks, type ChunkOptions } from '../retrieval/chunking.js';
import { SimpleVectorIndex } from '../retrieval/simple-vector-index.js';
import { uuid } from '../utils/uuid.js';
import { ToolArgs } from './args.js';
import type { ToolBackend, ToolDefinition } from './tool-types.js';

export interface RetrievalToolsOptions extends ChunkOptions {
  defaultTopK?: number;
}

export function createRetrievalTools(index: SimpleVectorIndex, opts: RetrievalToolsOptions = {}): ToolDefinition[] {
  const defaultTopK = opts.defaultTopK ?? 5;
  return [
    {
      name: 'rag_add_document',
      description: 'Add a document to the retrieval index',
      inputSchema: {
        type: 'object',
        properties: {
          text: { type: 'string', description: 'Document text' },
          id: { type: 'string', description: 'Document id; generated when omitted' },
          metadata: { type: 'object', description: 'Free-form metadata stored with every chunk' },
        },
        required: ['text'],
        additionalProperties: false,
      },
      execute: async (raw, ctx) => {
        const args = new ToolArgs('rag_add_document', raw);
        const id = args.optionalString('id') ?? uuid();
        const extra = raw.metadata;
        const base: JsonObject = typeof extra === 'object' && extra !== null && !Array.isArray(extra) ? extra : {};
        const chunks = splitIntoChunks(args.string('text'), opts);
        if (chunks.length === 0) throw new ToolExecutionError('rag_add_document', 'document has no text');
        const docs = chunks.map((text, i) => ({ id: `${id}#${i}`, text, metadata: { ...base, document_id: id, chunk_index: i } }));
        await index.addDocuments(docs, ctx.signal);
        const fresh = new Set(docs.map((d) => d.id));
        const stale = index.removeWhere((d) => d.metadata?.document_id === id && !fresh.has(d.id));
        if (stale) ctx.logger.debug('Dropped chunks of the previous version', { id, stale });
        return { success: true, id, chunks: chunks.length };
      },
    },
    {
      name: 'rag_search',
      description: 'Find the indexed passages most similar to a query',
      inputSchema: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'Search text' },
          top_k: { type: 'integer', description: `Number of passages (default ${defaultTopK})` },
        },
        required: ['query'],
        additionalProperties: false,
      },
      execute: async (raw, ctx) => {
        const args = new ToolArgs('rag_search', raw);
        const chunks = await index.retrieve(args.string('query'), args.optionalNumber('top_k') ?? defaultTopK, ctx.signal);
        return chunks.map((c) => ({ id: c.id, text: c.text, score: c.score, metadata: c.metadata ?? {} }));
      },
    },
    {
      name: 'rag_info',
      description: 'Describe the retrieval index',
      inputSchema: { type: 'object', properties: {}, additionalProperties: false },
      execute: () => {
        const info = index.info();
        return { documents: info.documents, dimensions: info.dimensions };
      },
    },
  ];
}

export function createRetrievalBackend(embedder: EmbeddingProvider, opts: RetrievalToolsOptions = {}): ToolBackend {
  return { name: 'retrieval', version: '0.1.0', tools: createRetrievalTools(new SimpleVectorIndex(embedder), opts) };
}
