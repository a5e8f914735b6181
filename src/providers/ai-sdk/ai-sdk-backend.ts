import { APICallError, generateText, jsonSchema, tool, type LanguageModel, type ToolSet } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import type { ModelOutput, ProviderId } from '../../core/types.js';
import { ProviderUnavailableError, errorMessage } from '../../core/errors.js';
import { parseModelReply } from '../../protocol/codec.js';
import { jsonObjectSchema } from '../../protocol/messages.js';
import { mapToolNames, toCatalogName } from '../../tools/tool-name-policy.js';
import type { ModelBackend, ModelRequest, AvailabilityResult } from '../backend.js';
import { DEEPSEEK_BASE_URL, type HostedProviderConfig } from '../provider-config.js';

export type HostedProviderId = Exclude<ProviderId, 'ollama'>;

export type LanguageModelFactory = (provider: HostedProviderId, cfg: HostedProviderConfig) => LanguageModel;

/** Direct provider packages; DeepSeek goes through its OpenAI-compatible chat endpoint. */
export const createHostedModel: LanguageModelFactory = (provider, cfg) => {
  switch (provider) {
    case 'openai':
      return createOpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseUrl })(cfg.model);
    case 'anthropic':
      return createAnthropic({ apiKey: cfg.apiKey, baseURL: cfg.baseUrl })(cfg.model);
    case 'deepseek':
      return createOpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseUrl ?? DEEPSEEK_BASE_URL }).chat(cfg.model);
  }
};

export class AiSdkBackend implements ModelBackend {
  private languageModel: LanguageModel | null = null;

  constructor(
    readonly provider: HostedProviderId,
    private readonly cfg: HostedProviderConfig,
    private readonly modelFactory: LanguageModelFactory = createHostedModel
  ) {}

  get model(): string {
    return this.cfg.model;
  }

  async generate(req: ModelRequest): Promise<ModelOutput> {
    const model = this.getModel();
    const mapping = mapToolNames(req.tools.map((t) => t.qualifiedName));
    const tools: ToolSet = {};
    for (const def of req.tools) {
      const name = mapping.providerByCatalog.get(def.qualifiedName) ?? def.qualifiedName;
      tools[name] = tool({ description: def.description, inputSchema: jsonSchema(def.inputSchema) });
    }

    try {
      const result = await generateText({
        model,
        system: req.system,
        messages: req.messages,
        tools: req.tools.length ? tools : undefined,
        temperature: this.cfg.temperature,
        maxOutputTokens: this.cfg.maxTokens,
        abortSignal: req.signal,
      });
      const call = result.toolCalls[0];
      if (call) {
        const args = jsonObjectSchema.safeParse(call.input);
        return { kind: 'tool_call', tool: toCatalogName(mapping, call.toolName), arguments: args.success ? args.data : {} };
      }
      return parseModelReply(result.text);
    } catch (e) {
      if (req.signal.aborted) throw req.signal.reason;
      throw this.classify(e);
    }
  }

  /** Hosted providers are only checked for credentials; nothing is sent. */
  async checkAvailability(): Promise<AvailabilityResult> {
    if (this.cfg.apiKey) return { ok: true };
    return { ok: false, reason: 'not_configured', message: `No API key configured for ${this.provider}` };
  }

  private getModel(): LanguageModel {
    if (!this.cfg.apiKey) throw new ProviderUnavailableError(this.provider, 'no API key configured');
    this.languageModel ??= this.modelFactory(this.provider, this.cfg);
    return this.languageModel;
  }

  private classify(e: unknown): ProviderUnavailableError {
    if (e instanceof ProviderUnavailableError) return e;
    if (APICallError.isInstance(e)) {
      const status = e.statusCode === undefined ? '' : `HTTP ${e.statusCode}: `;
      return new ProviderUnavailableError(this.provider, `${status}${e.message}`, e);
    }
    return new ProviderUnavailableError(this.provider, errorMessage(e), e);
  }
}
