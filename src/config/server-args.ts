import { parseArgs } from 'node:util';
import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import type { BuiltinOptions } from '../servers/server-factory.js';
import { builtinKindSchema, type BuiltinKind } from './app-config.js';

export type ServerArgs =
  | { action: 'help' }
  | { action: 'serve'; kind: BuiltinKind; options: BuiltinOptions }
  | { action: 'invalid'; error: string };

const positiveInt = z
  .string()
  .regex(/^[1-9]\d*$/, 'expected a positive integer')
  .transform(Number);

const serverArgsSchema = z.object({
  kind: builtinKindSchema,
  filename: z.string().optional(),
  root: z.string().optional(),
  'embedding-model': z.string().optional(),
  'chunk-size': positiveInt.optional(),
  'max-entries': positiveInt.optional(),
  'ttl-ms': positiveInt.optional(),
});

function readArgv(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      filename: { type: 'string' },
      root: { type: 'string' },
      'embedding-model': { type: 'string' },
      'chunk-size': { type: 'string' },
      'max-entries': { type: 'string' },
      'ttl-ms': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/** Command line of the standalone backend server: `<kind> [--option value]...`. */
export function parseServerArgs(argv: string[]): ServerArgs {
  let read: ReturnType<typeof readArgv>;
  try {
    read = readArgv(argv);
  } catch (e) {
    return { action: 'invalid', error: errorMessage(e) };
  }
  if (read.values.help) return { action: 'help' };

  const kind = read.positionals[0];
  const parsed = serverArgsSchema.safeParse({ ...read.values, kind });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path[0];
    if (field === 'kind') return { action: 'invalid', error: `Unknown backend: ${kind ?? '(none)'}` };
    return { action: 'invalid', error: issue ? `--${String(field)}: ${issue.message}` : 'Invalid arguments' };
  }

  const v = parsed.data;
  return {
    action: 'serve',
    kind: v.kind,
    options: {
      filename: v.filename,
      root: v.root,
      embeddingModel: v['embedding-model'],
      chunkSize: v['chunk-size'],
      maxEntries: v['max-entries'],
      ttlMs: v['ttl-ms'],
    },
  };
}
