// src/core/llm.ts
import { z } from "zod";
import OpenAI from "openai";
import { getOpenAiApiKey } from "../config.js";
import { LlmTimeoutError } from "./errors.js";

export type StrictJsonSchema = {
  type: "object";
  additionalProperties: boolean;
  // allow readonly arrays (when schemas are defined with `as const`)
  required: readonly string[];
  properties: Record<string, unknown>;
};

export type StrictJsonRequest = {
  model: string;
  input: Array<{ role: "system" | "user"; content: string }>;
  text: {
    format: {
      type: "json_schema";
      name: string;
      strict: boolean;
      schema: Record<string, unknown>;
    };
  };
  temperature: number;
  top_p: number;
  max_output_tokens: number;
};

export type StrictJsonResponse = {
  output_text?: string;
  output?: unknown;
};

/** The slice of the OpenAI client this module talks to. */
export type ResponsesApi = {
  create(body: StrictJsonRequest, options: { signal: AbortSignal; maxRetries: number }): Promise<StrictJsonResponse>;
};

export type StrictJsonCallArgs<T> = {
  model: string;
  /** System instructions for the model. */
  instructions: string;
  /** User-turn payload, usually a context line followed by the raw user text. */
  userInput: string;

  schemaName: string;
  jsonSchema: StrictJsonSchema;
  zodSchema: z.ZodType<T>;

  temperature?: number;
  topP?: number;
  maxOutputTokens?: number;
  timeoutMs?: number;

  debugLabel?: string;
};

let _client: ResponsesApi | null = null;
function getClient(): ResponsesApi {
  if (_client) return _client;
  const openai = new OpenAI({ apiKey: getOpenAiApiKey() });
  _client = {
    create: (body, options) => openai.responses.create(body, options),
  };
  return _client;
}

export function __setTestClient(client: ResponsesApi | null): void {
  _client = client;
}

const DEFAULT_TIMEOUT_MS = 25000;
const MAX_RETRIES = 2;
const RETRY_BACKOFF_MS = [500, 1200];
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ENOTFOUND",
  "ECONNREFUSED",
  "EPIPE",
]);

function readField(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Reflect.get(value, key);
}

function extractOutputText(resp: StrictJsonResponse): string {
  // Responses API provides output_text at top level
  if (typeof resp.output_text === "string" && resp.output_text.trim().length) {
    return resp.output_text.trim();
  }

  // Fallback: attempt to reconstruct from output array
  if (Array.isArray(resp.output)) {
    for (const item of resp.output) {
      const content = readField(item, "content");
      if (!Array.isArray(content)) continue;
      for (const c of content) {
        const t = readField(c, "text");
        if (typeof t === "string" && t.trim().length) return t.trim();
      }
    }
  }

  throw new Error("OpenAI response did not contain output_text");
}

function parseRetryAfterMs(value: unknown, msg: string): number | null {
  const raw = typeof value === "number" || typeof value === "string" ? String(value) : "";
  if (raw) {
    const n = Number(raw);
    if (!isNaN(n) && n > 0) {
      return n < 1000 ? Math.round(n * 1000) : Math.round(n);
    }
  }
  const fromMsg = msg.match(/retry after\s*(\d+(?:\.\d+)?)\s*(ms|s)?/i);
  if (fromMsg && fromMsg[1]) {
    const n = Number(fromMsg[1]);
    if (!isNaN(n) && n > 0) {
      const unit = (fromMsg[2] || "ms").toLowerCase();
      return unit === "s" ? Math.round(n * 1000) : Math.round(n);
    }
  }
  return null;
}

function resolveTimeoutMs(explicit?: number): number {
  if (explicit !== undefined && explicit > 0) return explicit;
  const raw = Number(process.env.LLM_TIMEOUT_MS);
  return Number.isFinite(raw) && raw > 0 ? raw : DEFAULT_TIMEOUT_MS;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getErrorMessage(err: unknown): string {
  const message = readField(err, "message") ?? readField(readField(err, "error"), "message");
  return typeof message === "string" && message ? message : "OpenAI API error";
}

function getErrorStatus(err: unknown): number | null {
  const status = readField(err, "status") ?? readField(readField(err, "response"), "status");
  return typeof status === "number" ? status : null;
}

function isRateLimitError(err: unknown): boolean {
  const code = readField(err, "code") ?? readField(readField(err, "error"), "code");
  return getErrorStatus(err) === 429 || code === "rate_limit_exceeded";
}

function isRetryableStatus(err: unknown): boolean {
  const status = getErrorStatus(err);
  return status !== null && status >= 500 && status < 600;
}

function isNetworkError(err: unknown): boolean {
  const code = readField(err, "code") ?? readField(readField(err, "cause"), "code");
  return typeof code === "string" && NETWORK_ERROR_CODES.has(code);
}

function getRetryAfterMs(err: unknown, msg: string): number {
  const headers = readField(err, "headers") ?? readField(readField(err, "response"), "headers");
  const retryFromHeader = readField(headers, "retry-after") ?? readField(headers, "retry-after-ms");
  return parseRetryAfterMs(retryFromHeader, msg) ?? 1500;
}

async function createResponseWithTimeout(
  client: ResponsesApi,
  body: StrictJsonRequest,
  timeoutMs: number,
  debugLabel: string
): Promise<StrictJsonResponse> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new LlmTimeoutError(timeoutMs, { debugLabel }));
      }, timeoutMs);
    });
    return await Promise.race([
      client.create(body, { signal: controller.signal, maxRetries: 0 }),
      timeoutPromise,
    ]);
  } catch (err) {
    if (err instanceof LlmTimeoutError) throw err;
    if (controller.signal.aborted) throw new LlmTimeoutError(timeoutMs, { debugLabel });
    throw err;
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

async function createResponseWithRetries(
  client: ResponsesApi,
  body: StrictJsonRequest,
  timeoutMs: number,
  debugLabel: string
): Promise<StrictJsonResponse> {
  let attempt = 0;
  while (true) {
    try {
      return await createResponseWithTimeout(client, body, timeoutMs, debugLabel);
    } catch (err) {
      if (err instanceof LlmTimeoutError) throw err;
      const msg = getErrorMessage(err);
      if (isRateLimitError(err)) {
        if (attempt < MAX_RETRIES) {
          await sleep(getRetryAfterMs(err, msg));
          attempt += 1;
          continue;
        }
      } else if ((isRetryableStatus(err) || isNetworkError(err)) && attempt < MAX_RETRIES) {
        const backoffMs = RETRY_BACKOFF_MS[Math.min(attempt, RETRY_BACKOFF_MS.length - 1)];
        console.warn(`[llm] ${debugLabel} attempt ${attempt + 1} failed (${msg}); retrying in ${backoffMs}ms`);
        await sleep(backoffMs);
        attempt += 1;
        continue;
      }
      throw err;
    }
  }
}

async function callOnceStrictJson(
  args: Omit<StrictJsonCallArgs<unknown>, "zodSchema">,
  debugLabel: string
): Promise<{ text: string; parsed: unknown }> {
  const resp = await createResponseWithRetries(
    getClient(),
    {
      model: args.model,
      input: [
        { role: "system", content: args.instructions },
        { role: "user", content: args.userInput },
      ],
      // In the Responses API, `response_format` lives under `text.format`.
      text: {
        format: {
          type: "json_schema",
          name: args.schemaName,
          strict: true,
          schema: { ...args.jsonSchema, required: [...args.jsonSchema.required] },
        },
      },
      temperature: args.temperature ?? 0.2,
      top_p: args.topP ?? 1,
      max_output_tokens: args.maxOutputTokens ?? 512,
    },
    resolveTimeoutMs(args.timeoutMs),
    debugLabel
  );

  const text = extractOutputText(resp);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    // let the zod pass report it and trigger the repair attempt
    parsed = text;
  }
  return { text, parsed };
}

export class StrictJsonError extends Error {
  constructor(
    message: string,
    readonly meta: Record<string, unknown>
  ) {
    super(message);
    this.name = "StrictJsonError";
  }
}

/**
 * Strict JSON call:
 * - Enforces json_schema strict at the source
 * - Validates with Zod
 * - On failure: 1 repair pass, same strict schema
 */
export async function callStrictJson<T>(
  args: StrictJsonCallArgs<T>
): Promise<{
  data: T;
  rawText: string;
  attempts: number;
}> {
  const debugLabel = args.debugLabel ?? args.schemaName;

  const attempt1 = await callOnceStrictJson(args, debugLabel);
  const parsed1 = args.zodSchema.safeParse(attempt1.parsed);
  if (parsed1.success) {
    return { data: parsed1.data, rawText: attempt1.text, attempts: 1 };
  }

  const repairInstructions = `${args.instructions}

REPAIR MODE (HARD)
- You must fix the JSON to match the schema exactly.
- Output ONLY valid JSON. No extra keys. No markdown. No commentary.
- Enums and time formats must match exactly.
`;

  const repairInput = `The previous output did not validate against the schema.

ZOD_ERROR:
${parsed1.error.toString()}

INVALID_JSON_OUTPUT:
${attempt1.text}

Now return a corrected JSON output that matches the schema exactly.`;

  const attempt2 = await callOnceStrictJson(
    {
      ...args,
      instructions: repairInstructions,
      userInput: repairInput,
      temperature: args.temperature ?? 0.0, // make repair deterministic
    },
    `${debugLabel}:repair`
  );

  const parsed2 = args.zodSchema.safeParse(attempt2.parsed);
  if (parsed2.success) {
    return { data: parsed2.data, rawText: attempt2.text, attempts: 2 };
  }

  throw new StrictJsonError(`Strict JSON call failed after repair pass for ${debugLabel}.`, {
    debugLabel,
    attempt1_text: attempt1.text,
    attempt1_zod_error: parsed1.error.toString(),
    attempt2_text: attempt2.text,
    attempt2_zod_error: parsed2.error.toString(),
  });
}
