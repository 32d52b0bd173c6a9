import test from "node:test";
import assert from "node:assert/strict";
import {
  __setTestTranscriptionClient,
  createTranscriber,
  type TranscriptionRequest,
} from "./transcription.js";

const AUDIO = new Uint8Array([1, 2, 3, 4]);

test("transcriber returns trimmed text from the primary model", async () => {
  const requests: TranscriptionRequest[] = [];
  __setTestTranscriptionClient({
    transcribe: async (request) => {
      requests.push(request);
      return { text: "  заметил напряжение в плечах \n" };
    },
  });
  try {
    const text = await createTranscriber()(AUDIO, "ru");
    assert.equal(text, "заметил напряжение в плечах");
    assert.equal(requests.length, 1);
    assert.equal(requests[0].model, "gpt-4o-mini-transcribe");
    assert.equal(requests[0].language, "ru");
    assert.equal(requests[0].fileName, "voice.ogg");
  } finally {
    __setTestTranscriptionClient(null);
  }
});

test("transcriber falls back to the second model on failure", async () => {
  const models: string[] = [];
  __setTestTranscriptionClient({
    transcribe: async ({ model }) => {
      models.push(model);
      if (model === "gpt-4o-mini-transcribe") throw new Error("model unavailable");
      return { text: "резервный текст" };
    },
  });
  try {
    assert.equal(await createTranscriber()(AUDIO, "ru"), "резервный текст");
    assert.deepEqual(models, ["gpt-4o-mini-transcribe", "whisper-1"]);
  } finally {
    __setTestTranscriptionClient(null);
  }
});

test("transcriber returns null when every model fails or is silent", async () => {
  __setTestTranscriptionClient({
    transcribe: async ({ model }) => {
      if (model === "whisper-1") return { text: "   " };
      throw new Error("timeout");
    },
  });
  try {
    assert.equal(await createTranscriber()(AUDIO, "ru"), null);
  } finally {
    __setTestTranscriptionClient(null);
  }
});

test("transcriber skips empty audio without calling the API", async () => {
  let calls = 0;
  __setTestTranscriptionClient({
    transcribe: async () => {
      calls += 1;
      return { text: "x" };
    },
  });
  try {
    assert.equal(await createTranscriber()(new Uint8Array(0), "ru"), null);
    assert.equal(calls, 0);
  } finally {
    __setTestTranscriptionClient(null);
  }
});
