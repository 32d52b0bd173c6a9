import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { getOpenAiApiKey, loadConfig, loadDotEnv } from "./config.js";
import { ConfigurationError } from "./core/errors.js";

test("loadConfig applies defaults around the required password", () => {
  const config = loadConfig({ BOT_PASSWORD: "test-secret" });
  assert.equal(config.botPassword, "test-secret");
  assert.equal(config.databasePath, "data/practice.db");
  assert.equal(config.port, 3000);
  assert.equal(config.host, "0.0.0.0");
  assert.equal(config.inputDebounceMs, 500);
  assert.equal(config.llmTimeoutMs, 25000);
  assert.equal(config.scheduleModel, "gpt-4o-mini");
  assert.equal(config.transcriptionModel, "gpt-4o-mini-transcribe");
  assert.equal(config.transcriptionFallbackModel, "whisper-1");
  assert.equal(config.defaultTimezone, "Europe/Moscow");
  assert.equal(config.localDev, false);
});

test("loadConfig coerces numeric values and the dev flag", () => {
  const config = loadConfig({
    BOT_PASSWORD: "test-secret",
    PORT: "8081",
    INPUT_DEBOUNCE_MS: "250",
    LOCAL_DEV: "1",
  });
  assert.equal(config.port, 8081);
  assert.equal(config.inputDebounceMs, 250);
  assert.equal(config.localDev, true);
});

test("loadConfig rejects a missing or blank password", () => {
  assert.throws(() => loadConfig({}), ConfigurationError);
  assert.throws(() => loadConfig({ BOT_PASSWORD: "   " }), /BOT_PASSWORD/);
});

test("loadConfig rejects non-numeric debounce", () => {
  assert.throws(
    () => loadConfig({ BOT_PASSWORD: "test-secret", INPUT_DEBOUNCE_MS: "soon" }),
    /INPUT_DEBOUNCE_MS/
  );
});

test("getOpenAiApiKey is lazy and explicit about what is missing", () => {
  assert.throws(() => getOpenAiApiKey({}), /OPENAI_API_KEY/);
  assert.equal(getOpenAiApiKey({ OPENAI_API_KEY: "test-key" }), "test-key");
});

test("loadDotEnv fills only unset variables and strips quotes", () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), "practice-env-"));
  try {
    const file = path.join(dir, ".env");
    writeFileSync(file, '# comment\nBOT_PASSWORD="from-file"\nPORT=4000\nNO_EQUALS\n');
    const env: NodeJS.ProcessEnv = { PORT: "5000" };
    const applied = loadDotEnv(pathToFileURL(file), env);
    assert.equal(applied, 1);
    assert.equal(env.BOT_PASSWORD, "from-file");
    assert.equal(env.PORT, "5000");
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("loadDotEnv tolerates a missing file", () => {
  const env: NodeJS.ProcessEnv = {};
  assert.equal(loadDotEnv(pathToFileURL("/nonexistent/dir/.env"), env), 0);
});
