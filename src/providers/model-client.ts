import type { ModelOutput, ProviderId, ToolDescriptor, Turn } from '../core/types.js';
import { PROVIDER_IDS } from '../core/types.js';
import { ProviderUnavailableError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { ConversationContext } from '../session/conversation-context.js';
import { AiSdkBackend } from './ai-sdk/ai-sdk-backend.js';
import type { ModelBackend, ModelMessage, AvailabilityResult } from './backend.js';
import { OllamaBackend } from './ollama/ollama-backend.js';
import type { ProviderSettings } from './provider-config.js';

export interface SendOptions {
  system: string;
  signal?: AbortSignal;
}

/** Tool results are replayed as user messages so every provider sees the same history. */
export function toModelMessages(turns: readonly Turn[]): ModelMessage[] {
  return turns.map((t): ModelMessage => {
    if (t.role === 'tool') return { role: 'user', content: `Tool ${t.toolName ?? 'unknown'} returned: ${t.content}` };
    return { role: t.role, content: t.content };
  });
}

/**
 * Holds one backend per configured provider and dispatches on the provider
 * recorded in the conversation. Switching is a context change only.
 */
export class ModelClient {
  private readonly backends = new Map<ProviderId, ModelBackend>();

  constructor(
    backends: readonly ModelBackend[],
    private readonly logger?: Logger
  ) {
    for (const b of backends) this.backends.set(b.provider, b);
  }

  static fromSettings(settings: ProviderSettings, logger?: Logger): ModelClient {
    const backends: ModelBackend[] = [];
    if (settings.ollama) backends.push(new OllamaBackend(settings.ollama));
    if (settings.openai) backends.push(new AiSdkBackend('openai', settings.openai));
    if (settings.anthropic) backends.push(new AiSdkBackend('anthropic', settings.anthropic));
    if (settings.deepseek) backends.push(new AiSdkBackend('deepseek', settings.deepseek));
    return new ModelClient(backends, logger);
  }

  /** Configured providers in canonical order. */
  get providers(): ProviderId[] {
    return PROVIDER_IDS.filter((p) => this.backends.has(p));
  }

  has(provider: ProviderId): boolean {
    return this.backends.has(provider);
  }

  backend(provider: ProviderId): ModelBackend {
    const b = this.backends.get(provider);
    if (!b) throw new ProviderUnavailableError(provider, 'not configured');
    return b;
  }

  async send(context: ConversationContext, tools: readonly ToolDescriptor[], opts: SendOptions): Promise<ModelOutput> {
    const backend = this.backend(context.provider);
    this.logger?.debug('Sending to model', { provider: backend.provider, model: backend.model, turns: context.history.length });
    const output = await backend.generate({
      system: opts.system,
      messages: toModelMessages(context.history),
      tools,
      signal: opts.signal ?? new AbortController().signal,
    });
    this.logger?.debug('Model replied', { provider: backend.provider, kind: output.kind });
    return output;
  }

  async checkAvailability(provider: ProviderId, signal?: AbortSignal): Promise<AvailabilityResult> {
    const b = this.backends.get(provider);
    if (!b) return { ok: false, reason: 'not_configured', message: `${provider} is not configured` };
    return b.checkAvailability(signal);
  }
}
