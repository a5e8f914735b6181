import type { ModelOutput, ProviderId, ToolDescriptor } from '../core/types.js';

export interface ModelMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ModelRequest {
  system: string;
  messages: ModelMessage[];
  /** Offered natively; names are mapped to provider-safe ones by the backend. */
  tools: readonly ToolDescriptor[];
  signal: AbortSignal;
}

export type AvailabilityResult = { ok: true } | { ok: false; reason: 'unreachable' | 'model_missing' | 'not_configured'; message: string };

/**
 * One language-model provider. `generate` throws `ProviderUnavailableError`
 * for anything that keeps the provider from answering, and rejects with the
 * signal's reason when aborted.
 */
export interface ModelBackend {
  readonly provider: ProviderId;
  readonly model: string;
  generate(req: ModelRequest): Promise<ModelOutput>;
  checkAvailability(signal?: AbortSignal): Promise<AvailabilityResult>;
}
