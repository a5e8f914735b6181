import { describe, it, expect } from 'vitest';
import { Logger } from '../../core/logger.js';
import { createTranscriptionTools } from '../../tools/transcription-tools.js';
import { AiSdkTranscription, transcriptionFromEnv, type TranscriptionModel } from '../ai-sdk/ai-sdk-transcription.js';

type ModelV2 = Exclude<TranscriptionModel, string>;
type GenerateCall = Parameters<ModelV2['doGenerate']>[0];

function engineWith(text: string) {
  const calls: GenerateCall[] = [];
  const reads: string[] = [];
  const model: ModelV2 = {
    specificationVersion: 'v2',
    provider: 'test',
    modelId: 'test-whisper',
    doGenerate: async (options) => {
      calls.push(options);
      return {
        text,
        segments: [],
        language: 'de',
        durationInSeconds: 1.5,
        warnings: [],
        response: { timestamp: new Date(0), modelId: 'test-whisper' },
      };
    },
  };
  const engine = new AiSdkTranscription(model, async (path) => {
    reads.push(path);
    return new Uint8Array([1, 2, 3, 4]);
  });
  return { calls, reads, engine };
}

describe('AiSdkTranscription', () => {
  it('reads the audio file and passes the language to the provider', async () => {
    const { calls, reads, engine } = engineWith('Hallo Welt');
    expect(await engine.transcribe({ path: 'clips/greeting.wav', language: 'de' })).toBe('Hallo Welt');
    expect(reads).toEqual(['clips/greeting.wav']);
    expect(calls[0]?.audio).toEqual(new Uint8Array([1, 2, 3, 4]));
    expect(calls[0]?.providerOptions).toEqual({ openai: { language: 'de' } });
  });

  it('backs the transcribe_audio tool', async () => {
    const { engine } = engineWith('  Hallo Welt \n');
    const [tool] = createTranscriptionTools(engine);
    const ctx = { signal: new AbortController().signal, logger: new Logger('error', () => {}) };
    expect(await tool?.execute({ path: 'clips/greeting.wav' }, ctx)).toEqual({ text: 'Hallo Welt' });
  });

  it('is only available with an OpenAI key', () => {
    expect(transcriptionFromEnv({})).toBeUndefined();
    expect(transcriptionFromEnv({ OPENAI_API_KEY: 'test-secret' })).toBeInstanceOf(AiSdkTranscription);
  });
});
