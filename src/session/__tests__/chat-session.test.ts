import { describe, it, expect, vi } from 'vitest';
import { ProviderUnavailableError } from '../../core/errors.js';
import { EventBus } from '../../core/event-bus.js';
import type { ModelOutput, ProviderId, SessionState, ToolResult } from '../../core/types.js';
import { ToolCatalog } from '../../catalog/tool-catalog.js';
import type { PromptConfig } from '../../config/app-config.js';
import { MemoryConfigStore } from '../../config/config-store.js';
import { ToolInvoker } from '../../invoker/tool-invoker.js';
import type { ModelBackend, ModelRequest, AvailabilityResult } from '../../providers/backend.js';
import { ModelClient } from '../../providers/model-client.js';
import { InProcessConnector } from '../../servers/in-process-connector.js';
import { createMemoryBackend } from '../../tools/memory-tools.js';
import { FakeConnector, quietLogger, toolSchema, untilAborted } from '../../__tests__/fakes.js';
import { toolSchemaSchema } from '../../protocol/messages.js';
import { ChatSession } from '../chat-session.js';

type Step = ModelOutput | Error | 'hang';

class ScriptedBackend implements ModelBackend {
  readonly model = 'test-model';
  readonly requests: ModelRequest[] = [];
  private readonly script: Step[] = [];

  constructor(readonly provider: ProviderId) {}

  will(...steps: Step[]): void {
    this.script.push(...steps);
  }

  async generate(req: ModelRequest): Promise<ModelOutput> {
    this.requests.push(req);
    const next = this.script.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    if (next === 'hang') return untilAborted(req.signal);
    if (next instanceof Error) throw next;
    return next;
  }

  async checkAvailability(): Promise<AvailabilityResult> {
    return { ok: true };
  }
}

const prompts: PromptConfig = {
  defaultSystemPrompt: 'You are helpful.',
  serverPrompts: { memory: 'Use memory tools.' },
  common: {
    toolResponse: 'Explain the tool result.',
    welcome: 'Hi!',
    maxToolRoundsNotice: 'Stopped after {max} tool calls.',
    providerUnavailable: { ollama: 'Start Ollama. Others: {alternatives}', default: '{provider} is down.' },
  },
  commands: {},
  toolExamples: { memory: [{ description: 'Store', example: '{"tool":"memory_set"}' }] },
};

const call = (tool: string, args: Record<string, string> = {}): ModelOutput => ({ kind: 'tool_call', tool, arguments: args });
const text = (t: string): ModelOutput => ({ kind: 'text', text: t });

async function build(opts: { maxToolRounds?: number; extra?: FakeConnector } = {}) {
  const catalog = new ToolCatalog();
  const memory = new InProcessConnector('memory', createMemoryBackend(), { logger: quietLogger() });
  catalog.register(memory, await memory.initialize(), await memory.listResources());
  if (opts.extra) catalog.register(opts.extra, await opts.extra.initialize());

  const events = new EventBus();
  const invoker = new ToolInvoker({ catalog, events, sleep: async () => {} });
  const ollama = new ScriptedBackend('ollama');
  const openai = new ScriptedBackend('openai');
  const session = new ChatSession({
    catalog,
    invoker,
    models: new ModelClient([ollama, openai]),
    prompts,
    events,
    logger: quietLogger(),
    maxToolRounds: opts.maxToolRounds,
    sessionId: 'test-session',
  });
  return { session, ollama, openai, events };
}

describe('ChatSession turns', () => {
  it('stores a value through a tool and reads it back in a later turn', async () => {
    const { session, ollama } = await build();
    ollama.will(call('memory_set', { key: 'name', value: 'John' }), text('Saved.'));
    expect(await session.send('Remember my name is John')).toEqual({ kind: 'text', text: 'Saved.' });

    ollama.will(call('memory_get', { key: 'name' }), text('Your name is John.'));
    expect(await session.send('What is my name?')).toEqual({ kind: 'text', text: 'Your name is John.' });

    const history = session.context.history;
    expect(history.map((t) => t.role)).toEqual(['user', 'assistant', 'tool', 'assistant', 'user', 'assistant', 'tool', 'assistant']);
    expect(history[2]?.content).toBe('{"ok":true,"result":{"success":true}}');
    expect(history[6]?.content).toBe('{"ok":true,"result":"John"}');
    expect(session.state).toBe('AwaitingInput');

    const afterTool = ollama.requests[1];
    expect(afterTool?.messages.at(-1)).toEqual({ role: 'user', content: 'Tool memory_set returned: {"ok":true,"result":{"success":true}}' });
    expect(afterTool?.system.endsWith('\n\nExplain the tool result.')).toBe(true);
    expect(ollama.requests[0]?.system.endsWith('\n\nExplain the tool result.')).toBe(false);
  });

  it('builds the system prompt from servers, tools and examples', async () => {
    const { session } = await build();
    const prompt = session.systemPrompt();
    const head = [
      'You are helpful.',
      '',
      'Use memory tools.',
      '',
      'Available tools:',
      '',
      'Tool: memory_set',
      'Description: Set a value in memory',
      'Arguments:',
      '- key: Key to store the value under (required)',
      '- value: Value to store (any JSON value) (required)',
      '',
      'Tool: memory_get',
    ].join('\n');
    expect(prompt.slice(0, head.length)).toBe(head);
    expect(prompt.endsWith('Tool: memory_list\nDescription: List the keys currently stored in memory\nArguments:\n\nExamples:\n- Store: {"tool":"memory_set"}')).toBe(true);
  });

  it('keeps working when a server advertises a malformed argument schema', async () => {
    const odd = toolSchemaSchema.parse({
      name: 'odd_tool',
      description: 'Odd',
      inputSchema: { type: 'object', properties: { a: null }, required: ['a'] },
    });
    const { session, ollama } = await build({ extra: new FakeConnector('odd', [odd]) });
    ollama.will(text('Hello'));

    expect(await session.send('hi')).toEqual({ kind: 'text', text: 'Hello' });
    expect(ollama.requests[0]?.system).toContain('Tool: odd_tool\nDescription: Odd\nArguments:\n- a: No description (required)');
  });

  it('feeds tool failures back to the model and walks through each state', async () => {
    const { session, ollama, events } = await build();
    const states: SessionState[] = [];
    events.subscribe((ev) => {
      if (ev.type === 'status') states.push(ev.state);
    });
    ollama.will(call('ghost_tool'), text('Sorry.'));

    expect(await session.send('do something odd')).toEqual({ kind: 'text', text: 'Sorry.' });
    expect(session.context.history[2]?.content).toBe('{"ok":false,"error":{"kind":"ToolNotFound","message":"Tool not found: ghost_tool"}}');
    await vi.waitFor(() =>
      expect(states).toEqual([
        'ModelThinking',
        'ToolPending',
        'ToolExecuting',
        'ToolFailed',
        'ContextUpdated',
        'ModelThinking',
        'RespondingText',
        'AwaitingInput',
      ])
    );
  });

  it('stops a runaway tool loop with the configured notice', async () => {
    const { session, ollama } = await build({ maxToolRounds: 2 });
    ollama.will(call('memory_list'), call('memory_list'), call('memory_list'));

    expect(await session.send('loop')).toEqual({ kind: 'text', text: 'Stopped after 2 tool calls.' });
    expect(ollama.requests).toHaveLength(3);
    expect(session.context.history.map((t) => t.role)).toEqual(['user', 'assistant', 'tool', 'assistant', 'tool', 'assistant']);
    expect(session.context.lastTurn?.content).toBe('Stopped after 2 tool calls.');
  });
});

describe('ChatSession provider handling', () => {
  it('reports an unavailable provider and continues on another one', async () => {
    const { session, ollama, openai, events } = await build();
    const switches: string[] = [];
    events.subscribe((ev) => {
      if (ev.type === 'provider_switch') switches.push(`${ev.from}->${ev.to}`);
    });
    ollama.will(new ProviderUnavailableError('ollama', 'connection refused'));

    expect(await session.send('hi')).toEqual({
      kind: 'provider_unavailable',
      provider: 'ollama',
      message: 'Provider unavailable: ollama (connection refused)',
      guidance: 'Start Ollama. Others: openai',
    });
    expect(session.context.history.map((t) => t.role)).toEqual(['user']);

    openai.will(text('Hello from openai'));
    expect(session.switchProvider('openai')).toBe('ollama');
    expect(await session.continueTurn()).toEqual({ kind: 'text', text: 'Hello from openai' });
    expect(openai.requests[0]?.messages).toEqual([{ role: 'user', content: 'hi' }]);
    expect(session.context.history.map((t) => t.content)).toEqual(['hi', 'Hello from openai']);
    await vi.waitFor(() => expect(switches).toEqual(['ollama->openai']));
  });

  it('uses the default guidance for providers without their own', async () => {
    const { session, openai } = await build();
    session.switchProvider('openai');
    openai.will(new ProviderUnavailableError('openai', 'HTTP 401: bad key'));
    expect(await session.send('hi')).toMatchObject({ kind: 'provider_unavailable', guidance: 'openai is down.' });
  });

  it('refuses to switch to a provider that is not configured', async () => {
    const { session } = await build();
    expect(() => session.switchProvider('anthropic')).toThrow('Provider unavailable: anthropic (not configured)');
    expect(session.provider).toBe('ollama');
  });

  it('has nothing to continue after an answer', async () => {
    const { session, ollama } = await build();
    ollama.will(text('Hello'));
    await session.send('hi');
    await expect(session.continueTurn()).rejects.toThrow('There is no unanswered message to continue');
  });
});

describe('ChatSession cancellation', () => {
  it('ends the turn without appending anything while the model is thinking', async () => {
    const { session, ollama } = await build();
    ollama.will('hang');
    const turn = session.send('hi');
    await vi.waitFor(() => expect(ollama.requests).toHaveLength(1));

    await expect(session.send('again')).rejects.toThrow('A turn is already in progress');
    expect(session.cancel()).toBe(true);
    expect(await turn).toEqual({ kind: 'cancelled', detail: 'model request cancelled' });
    expect(session.context.history.map((t) => t.content)).toEqual(['hi']);
    expect(session.busy).toBe(false);
    expect(session.cancel()).toBe(false);
  });

  it('records a cancelled result for a tool that was running', async () => {
    const slow = new FakeConnector('slow', [toolSchema('wait_forever')], (_name, _args, signal) => untilAborted(signal));
    const { session, ollama } = await build({ extra: slow });
    ollama.will(call('wait_forever'));

    const turn = session.send('wait');
    await vi.waitFor(() => expect(slow.calls).toHaveLength(1));
    session.cancel();

    expect(await turn).toEqual({ kind: 'cancelled', detail: 'Cancelled: tool wait_forever' });
    expect(session.context.lastTurn).toMatchObject({
      role: 'tool',
      toolName: 'wait_forever',
      content: '{"ok":false,"error":{"kind":"Cancelled","message":"Cancelled: tool wait_forever"}}',
    });
    expect(session.context.pending).toBeNull();
    expect(session.state).toBe('AwaitingInput');
  });
});

describe('ChatSession commands', () => {
  it('lists servers, tools and resources', async () => {
    const { session } = await build();
    expect(await session.handle('/servers')).toEqual({ kind: 'command', output: '- memory [ready] 4 tools', exit: false });
    expect(await session.handle('/tools')).toEqual({
      kind: 'command',
      output: [
        '- memory_set (memory): Set a value in memory',
        '- memory_get (memory): Get a value from memory',
        '- memory_delete (memory): Delete a value from memory',
        '- memory_list (memory): List the keys currently stored in memory',
      ].join('\n'),
      exit: false,
    });
    expect(await session.handle('/resources')).toEqual({
      kind: 'command',
      output: '- memory://{key} (memory): A value stored in memory',
      exit: false,
    });
  });

  it('switches providers with /ai', async () => {
    const { session } = await build();
    expect(await session.handle('/ai')).toMatchObject({ output: 'Switched AI provider: ollama -> openai' });
    expect(await session.handle('/AI Ollama')).toMatchObject({ output: 'Switched AI provider: openai -> ollama' });
    expect(await session.handle('/ai anthropic')).toMatchObject({
      output: 'Unknown or unconfigured provider: anthropic. Configured: ollama, openai',
    });
    expect(session.provider).toBe('ollama');
  });

  it('answers the remaining commands locally', async () => {
    const { session, ollama } = await build();
    ollama.will(text('Hello'));
    await session.send('hi');

    expect(await session.handle('/debug')).toMatchObject({ output: 'Debug logging enabled.' });
    expect(await session.handle('/debug')).toMatchObject({ output: 'Debug logging disabled.' });
    expect(await session.handle('/nope')).toMatchObject({ output: 'Unknown command: /nope. Type /help for the list of commands.' });
    expect(await session.handle('/clear')).toMatchObject({ output: 'Conversation cleared.' });
    expect(session.context.history).toEqual([]);
    expect(await session.handle('/exit')).toEqual({ kind: 'command', output: 'Goodbye!', exit: true });

    const help = await session.handle('/help');
    expect(help.kind === 'command' && help.output.split('\n')[1]).toBe('  /servers - List connected servers and their state');
    expect(ollama.requests).toHaveLength(1);
  });
});

describe('ChatSession direct tool commands', () => {
  function helperServer() {
    return new FakeConnector(
      'helpers',
      [toolSchema('rag_add_document'), toolSchema('rag_search'), toolSchema('rag_info'), toolSchema('transcribe_audio')],
      async (name): Promise<ToolResult> => {
        switch (name) {
          case 'rag_add_document':
            return { ok: true, result: { success: true, id: 'doc-1', chunks: 2 } };
          case 'rag_search':
            return { ok: true, result: [{ id: 'doc-1#1', text: 'Dogs bark.', score: 0.91234, metadata: {} }] };
          case 'rag_info':
            return { ok: true, result: { documents: 2, dimensions: null } };
          default:
            return { ok: true, result: { text: '  what is stored?  ' } };
        }
      }
    );
  }

  it('runs the retrieval commands without asking the model', async () => {
    const helpers = helperServer();
    const { session, ollama } = await build({ extra: helpers });

    expect(await session.handle('/rag-add Cats purr.  Dogs bark.')).toEqual({
      kind: 'command',
      output: 'Document doc-1 added (2 chunks).',
      exit: false,
    });
    expect(helpers.calls[0]).toEqual({
      name: 'rag_add_document',
      args: { text: 'Cats purr.  Dogs bark.', metadata: { source: 'manual_input', added_at: expect.any(String) } },
    });
    expect(await session.handle('/rag-search dogs')).toMatchObject({ output: '--- Result 1 (score 0.912) ---\ndoc-1#1\nDogs bark.' });
    expect(helpers.calls[1]).toEqual({ name: 'rag_search', args: { query: 'dogs' } });
    expect(await session.handle('/rag-info')).toMatchObject({ output: 'Indexed chunks: 2\nVector size: unknown' });
    expect(await session.handle('/rag-add')).toMatchObject({ output: 'Usage: /rag-add <text>' });
    expect(ollama.requests).toHaveLength(0);
    expect(session.context.history).toEqual([]);
  });

  it('reports a missing retrieval server', async () => {
    const { session } = await build();
    expect(await session.handle('/rag-info')).toEqual({ kind: 'command', output: 'rag_info failed: Tool not found: rag_info', exit: false });
  });

  it('sends the transcript of /voice as the next message', async () => {
    const helpers = helperServer();
    const { session, ollama } = await build({ extra: helpers });
    ollama.will(text('Nothing yet.'));

    expect(await session.handle('/voice note.wav')).toEqual({ kind: 'text', text: 'Nothing yet.' });
    expect(helpers.calls).toEqual([{ name: 'transcribe_audio', args: { path: 'note.wav' } }]);
    expect(session.context.history.map((t) => t.content)).toEqual(['what is stored?', 'Nothing yet.']);
    expect(await session.handle('/voice')).toMatchObject({ output: 'Usage: /voice <audio file>' });
  });

  it('answers /usage and the /mcp-servers alias', async () => {
    const { session } = await build();
    expect(await session.handle('/mcp-servers')).toEqual({ kind: 'command', output: '- memory [ready] 4 tools', exit: false });

    const usage = await session.handle('/usage');
    const output = usage.kind === 'command' ? usage.output : '';
    expect(output.startsWith('toolhub: chat with a language model that can call the tools of the connected servers.\n\nCommands:\n')).toBe(true);
    expect(output.endsWith('\n\nTool examples:\n  memory: Store\n    {"tool":"memory_set"}')).toBe(true);
  });
});

describe('ChatSession persistence', () => {
  const pendingSnapshot = {
    version: 1,
    provider: 'ollama',
    turns: [
      { role: 'user', content: 'what keys are there?', at: 1 },
      { role: 'assistant', content: '{"tool":"memory_list","arguments":{}}', toolName: 'memory_list', correlationId: 'old', at: 2 },
    ],
    pending: { tool: 'memory_list', arguments: {}, correlationId: 'old' },
  };

  it('runs a restored pending tool call before the next message', async () => {
    const { session, ollama } = await build();
    session.restore(pendingSnapshot);
    ollama.will(call('memory_set', { key: 'k', value: 'v' }), text('Stored.'));

    expect(await session.send('store k')).toEqual({ kind: 'text', text: 'Stored.' });
    const history = session.context.history;
    expect(history.map((t) => t.role)).toEqual(['user', 'assistant', 'tool', 'user', 'assistant', 'tool', 'assistant']);
    expect(history[2]).toMatchObject({ role: 'tool', toolName: 'memory_list', correlationId: 'old', content: '{"ok":true,"result":[]}' });
    expect(history[3]?.content).toBe('store k');
    expect(session.context.pending).toBeNull();
  });

  it('continues a restored turn by running its pending call', async () => {
    const { session, ollama } = await build();
    session.restore(pendingSnapshot);
    ollama.will(text('There are no keys.'));

    expect(await session.continueTurn()).toEqual({ kind: 'text', text: 'There are no keys.' });
    expect(session.context.history.map((t) => t.role)).toEqual(['user', 'assistant', 'tool', 'assistant']);
    expect(ollama.requests[0]?.messages.at(-1)).toEqual({ role: 'user', content: 'Tool memory_list returned: {"ok":true,"result":[]}' });
  });

  it('saves and loads the conversation through a store', async () => {
    const { session, ollama } = await build();
    ollama.will(call('memory_set', { key: 'name', value: 'John' }), text('Saved.'));
    await session.send('Remember my name is John');
    session.switchProvider('openai');

    const store = new MemoryConfigStore();
    await session.save(store);
    expect(await store.keys()).toEqual(['test-session']);

    const { session: other } = await build();
    expect(await other.load(store, 'test-session')).toBe(true);
    expect(other.provider).toBe('openai');
    expect(other.context.history).toEqual(session.context.history);
    expect(await other.load(store, 'missing')).toBe(false);
  });
});
