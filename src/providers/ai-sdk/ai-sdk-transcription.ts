import { readFile } from 'node:fs/promises';
import { experimental_transcribe as transcribe } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import type { Env } from '../../config/app-config.js';
import type { TranscriptionPort, TranscriptionRequest } from '../../tools/transcription-tools.js';

export type TranscriptionModel = Parameters<typeof transcribe>[0]['model'];

export type AudioReader = (path: string) => Promise<Uint8Array>;

export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-1';

/** Speech-to-text through an AI SDK transcription model. */
export class AiSdkTranscription implements TranscriptionPort {
  constructor(
    private readonly model: TranscriptionModel,
    private readonly readAudio: AudioReader = (path) => readFile(path)
  ) {}

  async transcribe(req: TranscriptionRequest): Promise<string> {
    const audio = await this.readAudio(req.path);
    const result = await transcribe({
      model: this.model,
      audio,
      abortSignal: req.signal,
      providerOptions: req.language ? { openai: { language: req.language } } : undefined,
    });
    return result.text;
  }
}

/** OpenAI's transcription endpoint when `OPENAI_API_KEY` is set; otherwise there is no engine. */
export function transcriptionFromEnv(env: Env): TranscriptionPort | undefined {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) return undefined;
  const openai = createOpenAI({ apiKey });
  return new AiSdkTranscription(openai.transcription(env.TOOLHUB_TRANSCRIPTION_MODEL ?? DEFAULT_TRANSCRIPTION_MODEL));
}
