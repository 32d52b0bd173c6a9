// src/services/transcription.ts
import OpenAI, { toFile } from "openai";
import { getOpenAiApiKey } from "../config.js";
import { logPreview, safeString } from "../server_safe_string.js";

export type TranscribeFn = (audio: Uint8Array, language: string) => Promise<string | null>;

export type TranscriptionRequest = {
  audio: Uint8Array;
  fileName: string;
  model: string;
  language: string;
};

/** The slice of the OpenAI audio API this module talks to. */
export type TranscriptionApi = {
  transcribe(request: TranscriptionRequest): Promise<{ text: string }>;
};

let _client: TranscriptionApi | null = null;
function getClient(): TranscriptionApi {
  if (_client) return _client;
  const openai = new OpenAI({ apiKey: getOpenAiApiKey() });
  _client = {
    transcribe: async ({ audio, fileName, model, language }) =>
      openai.audio.transcriptions.create({
        file: await toFile(audio, fileName),
        model,
        language,
      }),
  };
  return _client;
}

export function __setTestTranscriptionClient(client: TranscriptionApi | null): void {
  _client = client;
}

export type TranscriberOptions = {
  model?: string;
  fallbackModel?: string;
  fileName?: string;
};

/**
 * Voice bytes → text. Tries the primary model, then the fallback; null when
 * both fail or return nothing.
 */
export function createTranscriber(options: TranscriberOptions = {}): TranscribeFn {
  const models = [options.model ?? "gpt-4o-mini-transcribe", options.fallbackModel ?? "whisper-1"];
  const fileName = options.fileName ?? "voice.ogg";

  return async (audio, language) => {
    if (audio.byteLength === 0) return null;
    for (const model of [...new Set(models)]) {
      try {
        const { text } = await getClient().transcribe({ audio, fileName, model, language });
        const cleaned = text.trim();
        if (cleaned) {
          console.log(`[transcription] ${model} ok (${audio.byteLength} bytes): "${logPreview(cleaned)}"`);
          return cleaned;
        }
        console.warn(`[transcription] ${model} returned empty text`);
      } catch (err) {
        console.error(`[transcription] ${model} failed`, safeString(err));
      }
    }
    return null;
  };
}
