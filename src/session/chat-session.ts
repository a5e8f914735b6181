import { z } from 'zod';
import type {
  InvocationRecord,
  JsonObject,
  JsonValue,
  ModelOutput,
  ProviderId,
  SessionEvent,
  SessionState,
  ToolCallRequest,
  TurnOutcome,
} from '../core/types.js';
import { ProviderUnavailableError, ToolhubError, errorMessage, toToolFailure } from '../core/errors.js';
import type { EventBus } from '../core/event-bus.js';
import { Logger } from '../core/logger.js';
import { TurnController, raceAbort } from '../core/turn-controller.js';
import type { ToolCatalog } from '../catalog/tool-catalog.js';
import type { PromptConfig } from '../config/app-config.js';
import type { ConfigStore } from '../config/config-store.js';
import type { RetryPolicy, ToolInvoker } from '../invoker/tool-invoker.js';
import type { ModelClient } from '../providers/model-client.js';
import { describeTool } from '../protocol/codec.js';
import { uuid } from '../utils/uuid.js';
import { ConversationContext, type ContextSnapshot } from './conversation-context.js';
import { fillTemplate, helpText, isCommandName, parseCommand, parseProviderId, type ParsedCommand } from './commands.js';

/** Where the session learns which prompt fragment belongs to which server. */
export interface ServerDirectory {
  servers(): Array<{ name: string; promptKey: string }>;
}

export interface ChatSessionOptions {
  catalog: ToolCatalog;
  invoker: ToolInvoker;
  models: ModelClient;
  prompts: PromptConfig;
  /** Initial provider when no context is given; defaults to the first configured one. */
  provider?: ProviderId;
  context?: ConversationContext;
  servers?: ServerDirectory;
  events?: EventBus;
  logger?: Logger;
  maxToolRounds?: number;
  retryPolicy?: Partial<RetryPolicy>;
  sessionId?: string;
}

export interface CommandResult {
  kind: 'command';
  output: string;
  exit: boolean;
}

export type SessionReply = TurnOutcome | CommandResult;

export const DEFAULT_MAX_TOOL_ROUNDS = 8;

const ragAddedSchema = z.object({ id: z.string(), chunks: z.number() });
const ragInfoSchema = z.object({ documents: z.number(), dimensions: z.number().nullable() });
const ragHitsSchema = z.array(z.object({ id: z.string(), text: z.string(), score: z.number() }));
const transcriptSchema = z.object({ text: z.string() });

function formatSearchHits(result: JsonValue): string | undefined {
  const hits = ragHitsSchema.safeParse(result);
  if (!hits.success) return undefined;
  if (hits.data.length === 0) return 'No matching passages.';
  return hits.data.map((h, i) => `--- Result ${i + 1} (score ${h.score.toFixed(3)}) ---\n${h.id}\n${h.text}`).join('\n\n');
}

/**
 * Drives one conversation: user input goes to the active model, tool calls are
 * resolved through the catalog and run by the invoker, and every result is fed
 * back until the model answers in text. One turn runs at a time.
 */
export class ChatSession {
  readonly id: string;
  readonly context: ConversationContext;
  private readonly logger: Logger;
  private readonly maxToolRounds: number;
  private current: SessionState = 'AwaitingInput';
  private active: TurnController | undefined;

  constructor(private readonly opts: ChatSessionOptions) {
    this.id = opts.sessionId ?? uuid();
    this.logger = (opts.logger ?? new Logger()).child('session');
    this.maxToolRounds = opts.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.context = opts.context ?? new ConversationContext(opts.provider ?? opts.models.providers[0] ?? 'ollama');
  }

  get state(): SessionState {
    return this.current;
  }

  get busy(): boolean {
    return this.active !== undefined;
  }

  get provider(): ProviderId {
    return this.context.provider;
  }

  welcome(): string {
    return this.opts.prompts.common.welcome;
  }

  /** Slash commands are answered locally; anything else starts a turn. */
  async handle(line: string): Promise<SessionReply> {
    const command = parseCommand(line);
    if (command) return this.runCommand(command);
    return this.send(line.trim());
  }

  /** A tool call left pending by a restored snapshot runs first, ahead of `input`. */
  async send(input: string): Promise<TurnOutcome> {
    if (!input) throw new ToolhubError('Cannot send an empty message');
    const turn = this.beginTurn();
    this.emit({ type: 'turn_start', input, provider: this.context.provider, at: Date.now() });
    return this.runTurn(turn, input);
  }

  /**
   * Asks the model again without new input, e.g. after switching away from a
   * provider that was unavailable. The last turn must still be unanswered, or
   * end in a tool call that has not run yet.
   */
  async continueTurn(): Promise<TurnOutcome> {
    const last = this.context.lastTurn;
    if (!last || (last.role === 'assistant' && !this.context.pending)) {
      throw new ToolhubError('There is no unanswered message to continue');
    }
    const turn = this.beginTurn();
    this.emit({ type: 'turn_start', input: last.content, provider: this.context.provider, at: Date.now() });
    return this.runTurn(turn);
  }

  /** Returns false when no turn was running. */
  cancel(reason?: string): boolean {
    if (!this.active) return false;
    this.logger.info('Cancelling turn', { state: this.current });
    this.active.cancel(reason);
    return true;
  }

  /** Returns the previous provider. The conversation carries over unchanged. */
  switchProvider(to: ProviderId): ProviderId {
    if (!this.opts.models.has(to)) throw new ProviderUnavailableError(to, 'not configured');
    const from = this.context.setProvider(to);
    if (from !== to) {
      this.logger.info('Switched provider', { from, to });
      this.emit({ type: 'provider_switch', from, to, at: Date.now() });
    }
    return from;
  }

  systemPrompt(): string {
    const prompts = this.opts.prompts;
    const parts = [prompts.defaultSystemPrompt];
    const servers = this.opts.servers?.servers() ?? this.opts.catalog.listServers().map((s) => ({ name: s.name, promptKey: s.name }));

    for (const { promptKey } of servers) {
      const prompt = prompts.serverPrompts[promptKey];
      if (prompt) parts.push(prompt);
    }

    const tools = this.opts.catalog.listAll();
    if (tools.length > 0) {
      parts.push(['Available tools:', ...tools.map((t) => describeTool(t.qualifiedName, t))].join('\n\n'));
    }

    const examples = servers.flatMap(({ promptKey }) => prompts.toolExamples[promptKey] ?? []);
    if (examples.length > 0) {
      parts.push(['Examples:', ...examples.map((e) => `- ${e.description}: ${e.example}`)].join('\n'));
    }

    if (this.context.lastTurn?.role === 'tool') parts.push(prompts.common.toolResponse);
    return parts.map((p) => p.trim()).join('\n\n');
  }

  async runCommand(command: ParsedCommand): Promise<SessionReply> {
    const reply = (output: string, exit = false): CommandResult => ({ kind: 'command', output, exit });
    if (!isCommandName(command.name)) {
      return reply(`Unknown command: /${command.name}. Type /help for the list of commands.`);
    }
    const catalog = this.opts.catalog;

    switch (command.name) {
      case 'servers': {
        const servers = catalog.listServers();
        if (servers.length === 0) return reply('No servers connected.');
        return reply(servers.map((s) => `- ${s.name} [${s.state}] ${s.tools} tool${s.tools === 1 ? '' : 's'}`).join('\n'));
      }
      case 'tools': {
        const tools = catalog.listAll();
        if (tools.length === 0) return reply('No tools available.');
        return reply(tools.map((t) => `- ${t.qualifiedName} (${t.server}): ${t.description}`).join('\n'));
      }
      case 'resources': {
        const resources = catalog.listResources();
        if (resources.length === 0) return reply('No resources available.');
        return reply(resources.map((r) => `- ${r.pattern} (${r.server}): ${r.description}`).join('\n'));
      }
      case 'debug': {
        const on = this.logger.toggleDebug();
        return reply(`Debug logging ${on ? 'enabled' : 'disabled'}.`);
      }
      case 'ai':
        return reply(this.aiCommand(command.args[0]));
      case 'rag-add': {
        if (!command.rest) return reply('Usage: /rag-add <text>');
        const metadata = { source: 'manual_input', added_at: new Date().toISOString() };
        return reply(
          await this.directTool('rag_add_document', { text: command.rest, metadata }, (result) => {
            const added = ragAddedSchema.safeParse(result);
            if (!added.success) return undefined;
            return `Document ${added.data.id} added (${added.data.chunks} chunk${added.data.chunks === 1 ? '' : 's'}).`;
          })
        );
      }
      case 'rag-search':
        if (!command.rest) return reply('Usage: /rag-search <query>');
        return reply(await this.directTool('rag_search', { query: command.rest }, formatSearchHits));
      case 'rag-info':
        return reply(
          await this.directTool('rag_info', {}, (result) => {
            const info = ragInfoSchema.safeParse(result);
            if (!info.success) return undefined;
            return `Indexed chunks: ${info.data.documents}\nVector size: ${info.data.dimensions ?? 'unknown'}`;
          })
        );
      case 'voice':
        return this.voiceCommand(command.rest);
      case 'usage':
        return reply(this.usageText());
      case 'help':
        return reply(helpText(this.opts.prompts.commands));
      case 'clear':
        if (this.busy) return reply('Cannot clear while a turn is running.');
        this.context.clear();
        return reply('Conversation cleared.');
      case 'exit':
        return reply('Goodbye!', true);
    }
  }

  /** About text followed by the commands and the tool examples of the connected servers. */
  usageText(): string {
    const prompts = this.opts.prompts;
    const parts = ['toolhub: chat with a language model that can call the tools of the connected servers.', helpText(prompts.commands)];
    const servers = this.opts.servers?.servers() ?? this.opts.catalog.listServers().map((s) => ({ name: s.name, promptKey: s.name }));
    const examples = servers.flatMap(({ name, promptKey }) => (prompts.toolExamples[promptKey] ?? []).map((e) => `  ${name}: ${e.description}\n    ${e.example}`));
    if (examples.length > 0) parts.push(['Tool examples:', ...examples].join('\n'));
    return parts.join('\n\n');
  }

  snapshot(): ContextSnapshot {
    return this.context.snapshot();
  }

  restore(snapshot: unknown): void {
    if (this.busy) throw new ToolhubError('Cannot restore while a turn is running');
    this.context.restore(snapshot);
  }

  async save(store: ConfigStore, key: string = this.id): Promise<void> {
    await store.set(key, this.snapshot());
    this.logger.debug('Session saved', { key, turns: this.context.history.length });
  }

  /** Returns false when nothing is stored under `key`. */
  async load(store: ConfigStore, key: string = this.id): Promise<boolean> {
    const raw = await store.get(key);
    if (raw === undefined) return false;
    this.restore(raw);
    this.logger.debug('Session loaded', { key, turns: this.context.history.length });
    return true;
  }

  private aiCommand(arg: string | undefined): string {
    const configured = this.opts.models.providers;
    let target: ProviderId | undefined;
    if (arg) {
      target = parseProviderId(arg);
      if (!target || !configured.includes(target)) {
        return `Unknown or unconfigured provider: ${arg}. Configured: ${configured.join(', ') || 'none'}`;
      }
    } else {
      const at = configured.indexOf(this.context.provider);
      target = configured[(at + 1) % configured.length];
    }
    if (!target || target === this.context.provider) return `Only ${this.context.provider} is configured.`;
    const from = this.switchProvider(target);
    return `Switched AI provider: ${from} -> ${target}`;
  }

  /** Calls a tool outside any turn; `format` returns undefined for results it does not recognise. */
  private async directTool(tool: string, args: JsonObject, format: (result: JsonValue) => string | undefined): Promise<string> {
    const record = await this.opts.invoker.invoke({ tool, arguments: args, correlationId: uuid() }, this.opts.retryPolicy);
    if (!record.result.ok) return `${tool} failed: ${record.result.error.message}`;
    return format(record.result.result) ?? JSON.stringify(record.result.result, null, 2);
  }

  private async voiceCommand(path: string): Promise<SessionReply> {
    if (!path) return { kind: 'command', output: 'Usage: /voice <audio file>', exit: false };
    const record = await this.opts.invoker.invoke({ tool: 'transcribe_audio', arguments: { path }, correlationId: uuid() }, this.opts.retryPolicy);
    if (!record.result.ok) return { kind: 'command', output: `transcribe_audio failed: ${record.result.error.message}`, exit: false };
    const transcript = transcriptSchema.safeParse(record.result.result);
    const text = transcript.success ? transcript.data.text.trim() : '';
    if (!text) return { kind: 'command', output: 'No speech was recognized.', exit: false };
    this.logger.info('Recognized speech', { path, chars: text.length });
    return this.send(text);
  }

  private beginTurn(): TurnController {
    if (this.active) throw new ToolhubError('A turn is already in progress');
    const turn = new TurnController();
    this.active = turn;
    return turn;
  }

  private async runTurn(turn: TurnController, input?: string): Promise<TurnOutcome> {
    let outcome: TurnOutcome;
    try {
      outcome = (await this.resumePending(turn)) ?? (await this.loop(turn, input));
    } catch (e) {
      this.logger.error('Turn failed', { error: errorMessage(e) });
      this.emit({ type: 'error', error: errorMessage(e), at: Date.now() });
      throw e;
    } finally {
      this.active = undefined;
      this.setState('AwaitingInput');
    }
    this.emit({ type: 'turn_finish', outcome: outcome.kind, at: Date.now() });
    return outcome;
  }

  /** Runs the call a restored snapshot left pending; returns an outcome only when that ends the turn. */
  private async resumePending(turn: TurnController): Promise<TurnOutcome | undefined> {
    const call = this.context.pending;
    if (!call) return undefined;
    this.logger.info('Running restored tool call', { tool: call.tool, correlationId: call.correlationId });
    this.emit({ type: 'tool_call', request: call, server: this.opts.catalog.lookup(call.tool)?.server, at: Date.now() });
    const record = await this.execute(call, turn);
    if (!record.result.ok && record.result.error.kind === 'Cancelled') {
      return { kind: 'cancelled', detail: record.result.error.message };
    }
    return undefined;
  }

  private async loop(turn: TurnController, input?: string): Promise<TurnOutcome> {
    if (input !== undefined) this.context.appendUser(input);
    for (let round = 0; ; round++) {
      this.setState('ModelThinking');
      let output: ModelOutput;
      try {
        const pending = this.opts.models.send(this.context, this.opts.catalog.listAll(), {
          system: this.systemPrompt(),
          signal: turn.signal,
        });
        output = await raceAbort(pending, turn.signal);
      } catch (e) {
        if (turn.isCancelled) return { kind: 'cancelled', detail: 'model request cancelled' };
        if (e instanceof ProviderUnavailableError) return this.providerUnavailable(e);
        throw e;
      }
      this.emit({ type: 'model_output', output, provider: this.context.provider, at: Date.now() });

      if (output.kind === 'text') {
        this.setState('RespondingText');
        this.context.appendAssistant(output.text);
        return { kind: 'text', text: output.text };
      }

      if (round >= this.maxToolRounds) {
        const notice = fillTemplate(this.opts.prompts.common.maxToolRoundsNotice, { max: this.maxToolRounds });
        this.logger.warn('Tool round limit reached', { max: this.maxToolRounds, tool: output.tool });
        this.context.appendAssistant(notice);
        return { kind: 'text', text: notice };
      }

      const record = await this.runTool({ tool: output.tool, arguments: output.arguments, correlationId: uuid() }, turn);
      if (!record.result.ok && record.result.error.kind === 'Cancelled') {
        return { kind: 'cancelled', detail: record.result.error.message };
      }
    }
  }

  private async runTool(request: ToolCallRequest, turn: TurnController): Promise<InvocationRecord> {
    this.setState('ToolPending', request.tool);
    this.context.beginToolCall(request);
    this.emit({ type: 'tool_call', request, server: this.opts.catalog.lookup(request.tool)?.server, at: Date.now() });
    return this.execute(request, turn);
  }

  /** Runs the pending call and records its result. */
  private async execute(request: ToolCallRequest, turn: TurnController): Promise<InvocationRecord> {
    this.setState('ToolExecuting', request.tool);
    let record: InvocationRecord;
    try {
      record = await this.opts.invoker.invoke(request, this.opts.retryPolicy, turn.signal);
    } catch (e) {
      this.context.completeToolCall(request.correlationId, { ok: false, error: toToolFailure(e, request.tool) });
      throw e;
    }
    this.context.completeToolCall(request.correlationId, record.result);

    if (!record.result.ok) {
      this.logger.info('Tool call failed', { tool: record.tool, kind: record.result.error.kind, attempts: record.attempts });
      this.setState('ToolFailed', record.result.error.kind);
    }
    this.setState('ContextUpdated');
    return record;
  }

  private providerUnavailable(e: ProviderUnavailableError): TurnOutcome {
    const provider = this.context.provider;
    const table = this.opts.prompts.common.providerUnavailable;
    const alternatives = this.opts.models.providers.filter((p) => p !== provider);
    const guidance = fillTemplate(table[provider] ?? table.default ?? '', {
      provider,
      alternatives: alternatives.join(', ') || 'none',
    });
    this.logger.warn('Provider unavailable', { provider, error: e.message });
    this.emit({ type: 'error', error: e.message, kind: e.kind, at: Date.now() });
    return { kind: 'provider_unavailable', provider, message: e.message, guidance };
  }

  private setState(state: SessionState, detail?: string): void {
    if (this.current === state) return;
    this.current = state;
    this.emit({ type: 'status', state, detail, at: Date.now() });
  }

  private emit(ev: SessionEvent): void {
    this.opts.events?.emit({ ...ev, sessionId: this.id });
  }
}
