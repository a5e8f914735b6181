import { PROVIDER_IDS, type ProviderId } from '../core/types.js';

export type CommandName =
  | 'servers'
  | 'tools'
  | 'resources'
  | 'debug'
  | 'ai'
  | 'rag-add'
  | 'rag-search'
  | 'rag-info'
  | 'voice'
  | 'usage'
  | 'help'
  | 'clear'
  | 'exit';

export const COMMAND_NAMES: readonly CommandName[] = [
  'servers',
  'tools',
  'resources',
  'debug',
  'ai',
  'rag-add',
  'rag-search',
  'rag-info',
  'voice',
  'usage',
  'help',
  'clear',
  'exit',
];

/** Alternative spellings, resolved before dispatch. */
export const COMMAND_ALIASES: ReadonlyMap<string, CommandName> = new Map<string, CommandName>([['mcp-servers', 'servers']]);

export const DEFAULT_COMMAND_HELP: Record<CommandName, string> = {
  servers: 'List connected servers and their state',
  tools: 'List available tools',
  resources: 'List available resources',
  debug: 'Toggle debug logging',
  ai: 'Switch AI provider (/ai [provider])',
  'rag-add': 'Add a document to the retrieval index (/rag-add <text>)',
  'rag-search': 'Search the retrieval index (/rag-search <query>)',
  'rag-info': 'Describe the retrieval index',
  voice: 'Transcribe an audio file and send the text (/voice <path>)',
  usage: 'Show what toolhub does and how to use it',
  help: 'Show this help',
  clear: 'Clear the conversation',
  exit: 'Exit',
};

export interface ParsedCommand {
  /** Lower-cased, without the leading slash. */
  name: string;
  args: string[];
  /** Everything after the name, spacing kept. */
  rest: string;
}

/** `undefined` when the line is not a command. Aliases come back under their command's name. */
export function parseCommand(line: string): ParsedCommand | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith('/')) return undefined;
  const body = trimmed.slice(1);
  const [head = '', ...args] = body.split(/\s+/);
  const name = head.toLowerCase();
  return { name: COMMAND_ALIASES.get(name) ?? name, args, rest: body.slice(head.length).trim() };
}

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((c) => c === name);
}

export function parseProviderId(raw: string): ProviderId | undefined {
  const lowered = raw.toLowerCase();
  return PROVIDER_IDS.find((p) => p === lowered);
}

/** Configured descriptions win over the built-in ones. */
export function helpText(configured: Record<string, string>): string {
  const lines = ['Commands:'];
  for (const name of COMMAND_NAMES) lines.push(`  /${name} - ${configured[name] ?? DEFAULT_COMMAND_HELP[name]}`);
  return lines.join('\n');
}

/** Replaces `{name}` placeholders; unknown placeholders are left as written. */
export function fillTemplate(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => {
    const v = vars[key];
    return v === undefined ? whole : String(v);
  });
}
