// mcp-server/server.ts
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { createHash, randomUUID } from "node:crypto";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { z } from "zod";
import { createApp, type PracticeApp } from "./src/app.js";
import { loadConfig, loadDotEnv, type AppConfig } from "./src/config.js";
import { AccountActionZod, UserIdZod, type UserId } from "./src/contracts/events.js";
import type { Directive } from "./src/contracts/directives.js";
import { PracticeEventWireZod, ReminderActionWireZod, toPracticeEvent, toReminderAction } from "./src/adapters/tool_input.js";
import { describeState } from "./src/core/session_state.js";
import { applySecurityHeaders } from "./src/middleware/security.js";
import { safeString } from "./src/server_safe_string.js";

loadDotEnv();

process.on("uncaughtException", (err) => {
  console.error("[FATAL] Uncaught exception:", safeString(err));
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error("[FATAL] Unhandled rejection:", safeString(reason));
  process.exit(1);
});

const MCP_PATH = "/mcp";
const SERVER_NAME = "awareness-practice-agent";

class BodyReadError extends Error {
  constructor(readonly code: "body_too_large" | "aborted") {
    super(code);
    this.name = "BodyReadError";
  }
}

function getHeader(req: IncomingMessage, name: string): string {
  const value = req.headers[name.toLowerCase()];
  return Array.isArray(value) ? value.join(", ") : safeString(value ?? "");
}

function getCorrelationId(req: IncomingMessage): string {
  const existing =
    getHeader(req, "x-correlation-id") ||
    getHeader(req, "x-request-id") ||
    getHeader(req, "traceparent");
  return existing || randomUUID();
}

function jsonRpcErrorResponse(
  status: number,
  message: string,
  data: Record<string, unknown>,
  code = -32700
) {
  return {
    status,
    payload: {
      jsonrpc: "2.0",
      error: { code, message, data },
      id: null,
    },
  };
}

function sendJsonRpcError(res: ServerResponse, error: ReturnType<typeof jsonRpcErrorResponse>): void {
  res.writeHead(error.status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(error.payload));
}

async function readBodyWithLimit(req: IncomingMessage, maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let done = false;

    const cleanup = () => {
      req.off("data", onData);
      req.off("end", onEnd);
      req.off("error", onError);
      req.off("aborted", onAborted);
    };

    const onData = (chunk: Buffer) => {
      if (done) return;
      size += chunk.length;
      if (size > maxBytes) {
        done = true;
        cleanup();
        // drain the rest without destroying the socket
        req.resume();
        reject(new BodyReadError("body_too_large"));
        return;
      }
      chunks.push(chunk);
    };
    const onEnd = () => {
      if (done) return;
      done = true;
      cleanup();
      resolve(Buffer.concat(chunks, size));
    };
    const onError = (err: Error) => {
      if (done) return;
      done = true;
      cleanup();
      reject(err);
    };
    const onAborted = () => {
      if (done) return;
      done = true;
      cleanup();
      reject(new BodyReadError("aborted"));
    };

    req.on("data", onData);
    req.on("end", onEnd);
    req.on("error", onError);
    req.on("aborted", onAborted);
  });
}

/** Drains the user's outbox into one tool result. */
function toolResult(app: PracticeApp, userId: UserId, returned: readonly Directive[]) {
  const messages = app.pullUpdates(userId).map(({ seq, directive, view }) => ({
    seq,
    type: directive.type,
    text: view.text,
    buttons: view.buttons,
    ...(view.attachment ? { attachment: view.attachment } : {}),
  }));
  const text = messages.map((m) => m.text).join("\n\n");
  return {
    content: [{ type: "text" as const, text }],
    structuredContent: {
      messages,
      returned: returned.map((d) => d.type),
      session: describeState(app.session(userId)),
    },
  };
}

function createAppServer(app: PracticeApp, version: string): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version },
    { capabilities: { tools: {} } }
  );

  server.registerTool(
    "account",
    {
      title: "Account",
      description:
        "Start a conversation (START), authenticate with the shared password (AUTHENTICATE), export entries as json or txt (EXPORT_MENU, EXPORT) and erase all stored data (CLEAR_REQUEST, CLEAR_CONFIRM, CLEAR_CANCEL).",
      inputSchema: { user_id: UserIdZod, action: AccountActionZod },
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: true },
    },
    async ({ user_id, action }) => toolResult(app, user_id, await app.account(user_id, action))
  );

  server.registerTool(
    "practice",
    {
      title: "Awareness practice",
      description:
        "Drive the five-field practice wizard. START_PRACTICE opens it; SUBMIT_TEXT and SUBMIT_VOICE (base64 audio) answer the open field; answers arriving in quick succession are merged before confirmation.",
      inputSchema: { user_id: UserIdZod, event: PracticeEventWireZod },
      annotations: { readOnlyHint: false, openWorldHint: true, destructiveHint: false },
    },
    async ({ user_id, event }) => toolResult(app, user_id, await app.practice(user_id, toPracticeEvent(event)))
  );

  server.registerTool(
    "press_button",
    {
      title: "Press button",
      description: "Send the action_code of a button from a previous message.",
      inputSchema: { user_id: UserIdZod, action_code: z.string().trim().min(1).max(128) },
      annotations: { readOnlyHint: false, openWorldHint: true, destructiveHint: false },
    },
    async ({ user_id, action_code }) => toolResult(app, user_id, await app.pressButton(user_id, action_code))
  );

  server.registerTool(
    "reminders",
    {
      title: "Reminder settings",
      description:
        "Set the timezone and a reminder schedule described in natural language (text or base64 voice), view it or disable it.",
      inputSchema: { user_id: UserIdZod, action: ReminderActionWireZod },
      annotations: { readOnlyHint: false, openWorldHint: true, destructiveHint: false },
    },
    async ({ user_id, action }) =>
      toolResult(app, user_id, await app.configureReminders(user_id, toReminderAction(action)))
  );

  server.registerTool(
    "pull_updates",
    {
      title: "Pull updates",
      description: "Fetch messages produced since the last call: merged answers awaiting confirmation and reminders.",
      inputSchema: { user_id: UserIdZod },
      annotations: { readOnlyHint: true, openWorldHint: false, destructiveHint: false },
    },
    async ({ user_id }) => toolResult(app, user_id, [])
  );

  return server;
}

function createHttpHandler(app: PracticeApp, config: AppConfig) {
  const MCP_METHODS = new Set(["POST", "GET", "DELETE", "OPTIONS"]);

  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url || "/", `http://${getHeader(req, "host") || "localhost"}`);

    applySecurityHeaders(res);

    if ((req.method === "GET" || req.method === "HEAD") && url.pathname === "/version") {
      res.writeHead(200, { "content-type": "text/plain" });
      res.end(req.method === "GET" ? `VERSION=${config.version}` : undefined);
      return;
    }

    if (url.pathname !== MCP_PATH || !req.method || !MCP_METHODS.has(req.method)) {
      res.writeHead(404).end("Not Found");
      return;
    }

    const correlationId = getCorrelationId(req);
    res.setHeader("X-Correlation-Id", correlationId);

    const acceptHeader = getHeader(req, "accept");
    const contentType = getHeader(req, "content-type");

    const mcpServer = createAppServer(app, config.version);
    const transport = new StreamableHTTPServerTransport({ enableJsonResponse: true });
    const closeAll = () => {
      void transport.close().catch((err: unknown) => console.warn("[mcp] transport close failed", safeString(err)));
      void mcpServer.close().catch((err: unknown) => console.warn("[mcp] server close failed", safeString(err)));
    };
    res.on("close", closeAll);

    let timeout: NodeJS.Timeout | null = null;
    try {
      let parsedBody: unknown = undefined;

      // Pre-parse only when headers are compliant, otherwise the SDK answers 406/415.
      const shouldPreParse =
        req.method === "POST" &&
        acceptHeader.includes("application/json") &&
        acceptHeader.includes("text/event-stream") &&
        contentType.includes("application/json");

      if (shouldPreParse) {
        let raw: Buffer;
        try {
          raw = await readBodyWithLimit(req, config.maxRequestSizeBytes);
        } catch (err) {
          if (err instanceof BodyReadError && err.code === "body_too_large") {
            sendJsonRpcError(
              res,
              jsonRpcErrorResponse(
                413,
                "Request entity too large",
                { error_code: "body_too_large", correlation_id: correlationId, max_size: config.maxRequestSizeBytes },
                -32000
              )
            );
            return;
          }
          sendJsonRpcError(
            res,
            jsonRpcErrorResponse(400, "Request aborted", { error_code: "request_aborted", correlation_id: correlationId }, -32000)
          );
          return;
        }
        console.log(
          "[mcp] request",
          JSON.stringify({
            correlationId,
            method: req.method,
            bodySize: raw.length,
            bodyHashPrefix: createHash("sha256").update(raw.subarray(0, 256)).digest("hex").slice(0, 16),
          })
        );
        try {
          parsedBody = JSON.parse(raw.toString("utf-8"));
        } catch {
          sendJsonRpcError(
            res,
            jsonRpcErrorResponse(400, "Parse error: Invalid JSON", { error_code: "invalid_json", correlation_id: correlationId })
          );
          return;
        }
      }

      timeout = setTimeout(() => {
        if (!res.headersSent) {
          sendJsonRpcError(
            res,
            jsonRpcErrorResponse(408, "Request timeout", { error_code: "timeout", correlation_id: correlationId }, -32000)
          );
        }
        closeAll();
      }, config.requestTimeoutMs);

      await mcpServer.connect(transport);
      await transport.handleRequest(req, res, parsedBody);
    } catch (error) {
      console.error(`[mcp] correlation_id=${correlationId} request failed`, safeString(error));
      if (!res.headersSent) {
        sendJsonRpcError(
          res,
          jsonRpcErrorResponse(500, "Internal server error", { error_code: "server_error", correlation_id: correlationId }, -32000)
        );
      }
    } finally {
      if (timeout) clearTimeout(timeout);
    }
  };
}

async function startServer(): Promise<void> {
  const config = loadConfig();
  const app = createApp(config);
  await app.start();

  const handler = createHttpHandler(app, config);
  const httpServer = createServer((req, res) => {
    void handler(req, res).catch((err: unknown) => {
      console.error("[http] unhandled request failure", safeString(err));
      if (!res.headersSent) res.writeHead(500).end();
    });
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    httpServer.close();
    app.close();
    process.exit(0);
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  httpServer.listen(config.port, config.host, () => {
    console.log(`Practice agent MCP server listening on http://${config.host}:${config.port}${MCP_PATH} (${config.version})`);
    if (config.localDev) console.log(`Local dev: GET http://localhost:${config.port}/version`);
  });
}

startServer().catch((err: unknown) => {
  console.error("[FATAL] server failed to start:", safeString(err));
  process.exit(1);
});
