import type { Tool } from 'ollama';
import type { ModelOutput, ToolDescriptor } from '../../core/types.js';
import { isObjectSchema } from '../../core/types.js';
import { ProviderUnavailableError, errorMessage } from '../../core/errors.js';
import { raceAbort } from '../../core/turn-controller.js';
import { parseModelReply } from '../../protocol/codec.js';
import { jsonObjectSchema } from '../../protocol/messages.js';
import { mapToolNames, toCatalogName, type ToolNameMapping } from '../../tools/tool-name-policy.js';
import type { ModelBackend, ModelRequest, AvailabilityResult } from '../backend.js';
import type { OllamaProviderConfig } from '../provider-config.js';
import { createOllamaClient, type OllamaChatReply, type OllamaClientPort } from './ollama-client.js';

const DEFAULT_HOST = 'http://127.0.0.1:11434';

function toOllamaTool(name: string, def: ToolDescriptor): Tool {
  const properties: Record<string, { type: string; description: string; enum?: string[] }> = {};
  const required: string[] = [];
  if (isObjectSchema(def.inputSchema)) {
    for (const [key, prop] of Object.entries(def.inputSchema.properties ?? {})) {
      properties[key] = {
        type: 'type' in prop ? prop.type : 'string',
        description: prop.description ?? '',
        ...('enum' in prop && prop.enum ? { enum: prop.enum } : {}),
      };
    }
    required.push(...(def.inputSchema.required ?? []));
  }
  return {
    type: 'function',
    function: { name, description: def.description, parameters: { type: 'object', required, properties } },
  };
}

export class OllamaBackend implements ModelBackend {
  readonly provider = 'ollama' as const;
  private clientPromise: Promise<OllamaClientPort> | null;

  constructor(
    private readonly cfg: OllamaProviderConfig,
    client?: OllamaClientPort
  ) {
    this.clientPromise = client ? Promise.resolve(client) : null;
  }

  get model(): string {
    return this.cfg.model;
  }

  async generate(req: ModelRequest): Promise<ModelOutput> {
    const client = await this.getClient();
    const mapping = mapToolNames(req.tools.map((t) => t.qualifiedName));
    const tools = req.tools.map((t) => toOllamaTool(mapping.providerByCatalog.get(t.qualifiedName) ?? t.qualifiedName, t));

    const onAbort = () => client.abort();
    req.signal.addEventListener('abort', onAbort, { once: true });
    try {
      const res = await raceAbort(
        client.chat({
          model: this.cfg.model,
          messages: [{ role: 'system', content: req.system }, ...req.messages],
          tools: tools.length ? tools : undefined,
          options: this.cfg.temperature === undefined ? undefined : { temperature: this.cfg.temperature },
        }),
        req.signal
      );
      return this.toModelOutput(res, mapping);
    } catch (e) {
      if (req.signal.aborted) throw e;
      throw this.classify(e);
    } finally {
      req.signal.removeEventListener('abort', onAbort);
    }
  }

  async checkAvailability(signal?: AbortSignal): Promise<AvailabilityResult> {
    try {
      const client = await this.getClient();
      const listed = client.list();
      const { models } = await (signal ? raceAbort(listed, signal) : listed);
      const wanted = this.cfg.model;
      const present = models.some((m) => m.name === wanted || m.model === wanted || m.name === `${wanted}:latest`);
      if (present) return { ok: true };
      return { ok: false, reason: 'model_missing', message: `Model ${wanted} is not available; run: ollama pull ${wanted}` };
    } catch (e) {
      if (signal?.aborted) throw e;
      return { ok: false, reason: 'unreachable', message: `Ollama is not reachable at ${this.host}: ${errorMessage(e)}` };
    }
  }

  private get host(): string {
    return this.cfg.host ?? DEFAULT_HOST;
  }

  private toModelOutput(res: OllamaChatReply, mapping: ToolNameMapping): ModelOutput {
    const call = res.message.tool_calls?.[0];
    if (call) {
      const args = jsonObjectSchema.safeParse(call.function.arguments);
      return {
        kind: 'tool_call',
        tool: toCatalogName(mapping, call.function.name),
        arguments: args.success ? args.data : {},
      };
    }
    return parseModelReply(res.message.content);
  }

  private classify(e: unknown): ProviderUnavailableError {
    if (e instanceof ProviderUnavailableError) return e;
    if (e instanceof Error && 'status_code' in e && e.status_code === 404) {
      return new ProviderUnavailableError('ollama', `model ${this.cfg.model} not found`, e);
    }
    return new ProviderUnavailableError('ollama', `connection to ${this.host} failed: ${errorMessage(e)}`, e);
  }

  private getClient(): Promise<OllamaClientPort> {
    this.clientPromise ??= createOllamaClient(this.cfg).catch((e: unknown) => {
      this.clientPromise = null;
      throw e;
    });
    return this.clientPromise;
  }
}
