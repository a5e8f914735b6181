import { ToolArgs } from './args.js';
import type { ToolBackend, ToolDefinition } from './tool-types.js';

export interface TranscriptionRequest {
  /** Audio file path as the host application understands it. */
  path: string;
  language?: string;
  signal?: AbortSignal;
}

/** Speech-to-text engine supplied by the host application. */
export interface TranscriptionPort {
  transcribe(req: TranscriptionRequest): Promise<string>;
}

export function createTranscriptionTools(port: TranscriptionPort): ToolDefinition[] {
  return [
    {
      name: 'transcribe_audio',
      description: 'Transcribe speech in an audio file to text',
      inputSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'Audio file to transcribe' },
          language: { type: 'string', description: 'Spoken language code, e.g. en' },
        },
        required: ['path'],
        additionalProperties: false,
      },
      execute: async (raw, ctx) => {
        const args = new ToolArgs('transcribe_audio', raw);
        const text = await port.transcribe({
          path: args.string('path'),
          language: args.optionalString('language'),
          signal: ctx.signal,
        });
        return { text: text.trim() };
      },
    },
  ];
}

export function createTranscriptionBackend(port: TranscriptionPort): ToolBackend {
  return { name: 'transcription', version: '0.1.0', tools: createTranscriptionTools(port) };
}
