// src/config.ts
import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigurationError } from "./core/errors.js";

/**
 * Reads KEY=VALUE lines from a .env file without overwriting variables the
 * process already has. A missing file is not an error.
 */
export function loadDotEnv(
  file: URL = new URL("../.env", import.meta.url),
  env: NodeJS.ProcessEnv = process.env
): number {
  let raw: string;
  try {
    raw = readFileSync(file, "utf-8");
  } catch {
    return 0;
  }
  let applied = 0;
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const idx = trimmed.indexOf("=");
    if (idx === -1) continue;
    const key = trimmed.slice(0, idx).trim();
    let value = trimmed.slice(idx + 1).trim();
    if (!key) continue;
    // Strip surrounding quotes if present.
    if (
      (value.startsWith("\"") && value.endsWith("\"")) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    if (env[key] === undefined) {
      env[key] = value;
      applied += 1;
    }
  }
  return applied;
}

const PositiveIntZod = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const AppConfigZod = z.object({
  BOT_PASSWORD: z.string().min(1, "BOT_PASSWORD must be set"),
  DATABASE_PATH: z.string().min(1).default("data/practice.db"),
  PORT: PositiveIntZod(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  INPUT_DEBOUNCE_MS: PositiveIntZod(500),
  LLM_TIMEOUT_MS: PositiveIntZod(25000),
  SCHEDULE_MODEL: z.string().min(1).default("gpt-4o-mini"),
  TRANSCRIPTION_MODEL: z.string().min(1).default("gpt-4o-mini-transcribe"),
  TRANSCRIPTION_FALLBACK_MODEL: z.string().min(1).default("whisper-1"),
  DEFAULT_TIMEZONE: z.string().min(1).default("Europe/Moscow"),
  MAX_REQUEST_SIZE_BYTES: PositiveIntZod(8 * 1024 * 1024),
  REQUEST_TIMEOUT_MS: PositiveIntZod(60000),
  LOCAL_DEV: z
    .string()
    .optional()
    .transform((value) => value === "1"),
  VERSION: z.string().optional(),
});

export type AppConfig = {
  botPassword: string;
  databasePath: string;
  port: number;
  host: string;
  inputDebounceMs: number;
  llmTimeoutMs: number;
  scheduleModel: string;
  transcriptionModel: string;
  transcriptionFallbackModel: string;
  defaultTimezone: string;
  maxRequestSizeBytes: number;
  requestTimeoutMs: number;
  localDev: boolean;
  version: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings count as unset, the way a blank line in .env reads
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = AppConfigZod.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`, { problems });
  }
  const c = parsed.data;
  return {
    botPassword: c.BOT_PASSWORD,
    databasePath: c.DATABASE_PATH,
    port: c.PORT,
    host: c.HOST,
    inputDebounceMs: c.INPUT_DEBOUNCE_MS,
    llmTimeoutMs: c.LLM_TIMEOUT_MS,
    scheduleModel: c.SCHEDULE_MODEL,
    transcriptionModel: c.TRANSCRIPTION_MODEL,
    transcriptionFallbackModel: c.TRANSCRIPTION_FALLBACK_MODEL,
    defaultTimezone: c.DEFAULT_TIMEZONE,
    maxRequestSizeBytes: c.MAX_REQUEST_SIZE_BYTES,
    requestTimeoutMs: c.REQUEST_TIMEOUT_MS,
    localDev: c.LOCAL_DEV,
    version: c.VERSION ?? "v1",
  };
}

/** The key is only needed once an LLM or transcription call is made. */
export function getOpenAiApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (!apiKey) throw new ConfigurationError("Missing env OPENAI_API_KEY");
  return apiKey;
}
