/**
 * HTTP API over the ChatbotEngine. JSON in, JSON out; POST /chat with `stream: true`
 * answers with server-sent events.
 */

import * as http from "http";
import type { ChatbotEngine, ChatStreamEvent } from "./chatbot/engine";
import {
  CapacityViolation,
  MemoryServiceError,
  ProviderError,
  SessionNotFound,
  ValidationError,
  errorMessage,
} from "./errors";
import { logger } from "./logging";
import type { ContextMeasure } from "./memory/context";
import { getMemoryMetrics } from "./metrics";

const MAX_BODY_BYTES = 1_000_000;

type JsonBody = Record<string, unknown>;

interface RouteContext {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  params: string[];
  query: URLSearchParams;
  signal: AbortSignal;
}

type RouteHandler = (ctx: RouteContext) => Promise<void>;

interface Route {
  method: string;
  /** Path segments; ":id" matches any single segment. */
  pattern: string[];
  handler: RouteHandler;
}

class BodyError extends Error {}

function isRecord(v: unknown): v is JsonBody {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseJsonBody(req: http.IncomingMessage): Promise<JsonBody> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new BodyError("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      const body = Buffer.concat(chunks).toString("utf8");
      if (!body) {
        resolve({});
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch {
        reject(new BodyError("Invalid JSON body"));
        return;
      }
      if (isRecord(parsed)) resolve(parsed);
      else reject(new BodyError("JSON body must be an object"));
    });
    req.on("error", reject);
  });
}

function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.setHeader("Content-Type", "application/json");
  res.writeHead(status);
  res.end(JSON.stringify(data));
}

function statusFor(err: unknown): number {
  if (err instanceof BodyError || err instanceof ValidationError) return 400;
  if (err instanceof SessionNotFound) return 404;
  if (err instanceof CapacityViolation) return 409;
  if (err instanceof ProviderError) {
    if (err.kind === "rate_limit") return 429;
    if (err.kind === "timeout") return 504;
    return 502;
  }
  return 500;
}

function errorBody(err: unknown): { error: string; code: string; session_id?: string } {
  if (err instanceof BodyError) return { error: err.message, code: "INVALID_BODY" };
  if (err instanceof MemoryServiceError) {
    const sessionId = err.context.sessionId;
    if (typeof sessionId === "string") return { error: err.message, code: err.code, session_id: sessionId };
    return { error: err.message, code: err.code };
  }
  return { error: "Internal server error", code: "INTERNAL" };
}

function optionalString(body: JsonBody, key: string): string | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new ValidationError(`${key} must be a string`);
  return v;
}

function requiredString(body: JsonBody, key: string): string {
  const v = optionalString(body, key);
  if (v === undefined) throw new ValidationError(`${key} is required`);
  return v;
}

function optionalNumber(body: JsonBody, key: string): number | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number") throw new ValidationError(`${key} must be a number`);
  return v;
}

function optionalInt(query: URLSearchParams, key: string): number | undefined {
  const raw = query.get(key);
  if (raw === null || raw === "") return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new ValidationError(`${key} must be an integer`, { [key]: raw });
  return n;
}

function parseMeasure(body: JsonBody): ContextMeasure | undefined {
  const v = body.measure;
  if (v === undefined || v === null) return undefined;
  if (v === "count" || v === "chars") return v;
  throw new ValidationError('measure must be "count" or "chars"');
}

function sseEvent(res: http.ServerResponse, data: unknown): void {
  res.write(`data: ${JSON.stringify(data)}\n\n`);
}

function doneEvent(event: Extract<ChatStreamEvent, { type: "done" }>): Record<string, unknown> {
  return {
    done: true,
    session_id: event.sessionId,
    response: event.response,
    provider: event.provider,
    model: event.model,
    timestamp: event.timestamp,
    warnings: event.warnings,
  };
}

async function streamChat(ctx: RouteContext, events: AsyncGenerator<ChatStreamEvent>): Promise<void> {
  const { res } = ctx;
  // Pull the first event before committing to SSE so early failures get a normal status.
  const first = await events.next();
  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
  });
  let current = first;
  try {
    while (!current.done) {
      if (ctx.signal.aborted) {
        await events.return(undefined);
        return;
      }
      const event = current.value;
      if (event.type === "chunk") sseEvent(res, { chunk: event.text, session_id: event.sessionId });
      else sseEvent(res, doneEvent(event));
      current = await events.next();
    }
  } catch (err) {
    logger.warn({ event: "CHAT_STREAM_FAILED", err: errorMessage(err) }, "Chat stream ended with an error");
    if (!res.destroyed) sseEvent(res, { ...errorBody(err), status: statusFor(err) });
  }
  if (!res.destroyed) res.end();
}

function buildRoutes(engine: ChatbotEngine): Route[] {
  const route = (method: string, path: string, handler: RouteHandler): Route => ({
    method,
    pattern: path.split("/").filter(Boolean),
    handler,
  });

  return [
    route("GET", "/health", async ({ res }) => {
      sendJson(res, 200, { ok: true, sessions: engine.listSessions().length });
    }),
    route("GET", "/providers", async ({ res }) => {
      sendJson(res, 200, { providers: engine.listProviders() });
    }),
    route("GET", "/metrics", async ({ res }) => {
      sendJson(res, 200, getMemoryMetrics());
    }),
    route("POST", "/sessions", async ({ req, res }) => {
      const body = await parseJsonBody(req);
      const info = engine.createSession({
        provider: optionalString(body, "provider"),
        model: optionalString(body, "model"),
        temperature: optionalNumber(body, "temperature"),
        maxTokens: optionalNumber(body, "max_tokens"),
        systemPrompt: optionalString(body, "system_prompt"),
      });
      sendJson(res, 201, info);
    }),
    route("GET", "/sessions", async ({ res }) => {
      sendJson(res, 200, { sessions: engine.listSessions() });
    }),
    route("DELETE", "/sessions/:id", async ({ res, params }) => {
      engine.deleteSession(params[0]);
      sendJson(res, 200, { deleted: params[0] });
    }),
    route("POST", "/sessions/:id/turns", async ({ req, res, params }) => {
      const body = await parseJsonBody(req);
      const result = await engine.addTurn(params[0], requiredString(body, "role"), requiredString(body, "content"));
      sendJson(res, 201, result);
    }),
    route("POST", "/chat", async (ctx) => {
      const body = await parseJsonBody(ctx.req);
      const sessionId = optionalString(body, "session_id");
      const message = requiredString(body, "message");
      const opts = {
        temperature: optionalNumber(body, "temperature"),
        maxTokens: optionalNumber(body, "max_tokens"),
        signal: ctx.signal,
      };
      if (body.stream === true) {
        await streamChat(ctx, engine.chatStream(sessionId, message, opts));
        return;
      }
      const result = await engine.chat(sessionId, message, opts);
      sendJson(ctx.res, 200, {
        session_id: result.sessionId,
        response: result.response,
        provider: result.provider,
        model: result.model,
        timestamp: result.timestamp,
        warnings: result.warnings,
      });
    }),
    route("POST", "/sessions/:id/context", async ({ req, res, params }) => {
      const body = await parseJsonBody(req);
      const pendingRaw = body.pending_turn;
      let pending: { role: string; content: string } | undefined;
      if (pendingRaw !== undefined && pendingRaw !== null) {
        if (!isRecord(pendingRaw)) throw new ValidationError("pending_turn must be an object");
        pending = { role: requiredString(pendingRaw, "role"), content: requiredString(pendingRaw, "content") };
      }
      const context = await engine.getContext(params[0], pending, optionalNumber(body, "budget"), parseMeasure(body));
      sendJson(res, 200, context);
    }),
    route("GET", "/sessions/:id/summary", async ({ res, params }) => {
      sendJson(res, 200, await engine.getSummaryText(params[0]));
    }),
    route("GET", "/sessions/:id/facts", async ({ res, params }) => {
      sendJson(res, 200, await engine.getFacts(params[0]));
    }),
    route("GET", "/sessions/:id/search", async ({ res, params, query }) => {
      const q = query.get("q") ?? "";
      const results = await engine.search(params[0], q, optionalInt(query, "top_k"));
      sendJson(res, 200, { query: q, results });
    }),
    route("GET", "/sessions/:id/history", async ({ res, params, query }) => {
      sendJson(res, 200, { turns: await engine.getHistory(params[0], optionalInt(query, "limit")) });
    }),
    route("GET", "/sessions/:id/stats", async ({ res, params }) => {
      sendJson(res, 200, await engine.getStats(params[0]));
    }),
    route("POST", "/sessions/:id/provider", async ({ req, res, params }) => {
      const body = await parseJsonBody(req);
      const identity = await engine.switchProvider(params[0], requiredString(body, "provider"), optionalString(body, "model"));
      sendJson(res, 200, identity);
    }),
    route("GET", "/sessions/:id/export", async ({ res, params }) => {
      sendJson(res, 200, await engine.exportSession(params[0]));
    }),
    route("POST", "/import", async ({ req, res }) => {
      const body = await parseJsonBody(req);
      sendJson(res, 201, { session_id: engine.importSession(body) });
    }),
  ];
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    throw new BodyError(`Malformed path segment: ${segment} (${errorMessage(err)})`);
  }
}

function match(route: Route, method: string, segments: string[]): string[] | undefined {
  if (route.method !== method || route.pattern.length !== segments.length) return undefined;
  const params: string[] = [];
  for (let i = 0; i < segments.length; i++) {
    if (route.pattern[i] === ":id") params.push(decodeSegment(segments[i]));
    else if (route.pattern[i] !== segments[i]) return undefined;
  }
  return params;
}

export function createApiServer(engine: ChatbotEngine): http.Server {
  const routes = buildRoutes(engine);

  return http.createServer(async (req, res) => {
    const method = req.method ?? "";
    const url = new URL(req.url ?? "/", "http://localhost");
    const segments = url.pathname.split("/").filter(Boolean);

    let handler: RouteHandler | undefined;
    let params: string[] = [];
    try {
      for (const route of routes) {
        const matched = match(route, method, segments);
        if (matched) {
          handler = route.handler;
          params = matched;
          break;
        }
      }
    } catch (err) {
      sendJson(res, statusFor(err), errorBody(err));
      return;
    }
    if (!handler) {
      sendJson(res, 404, { error: `No route for ${method} ${url.pathname}`, code: "NOT_FOUND" });
      return;
    }

    // Client went away before the response finished: cancel in-flight LLM calls.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      await handler({ req, res, params, query: url.searchParams, signal: controller.signal });
    } catch (err) {
      const status = statusFor(err);
      if (status >= 500) {
        logger.error({ event: "API_ERROR", method, path: url.pathname, status, err: errorMessage(err) }, "Request failed");
      } else {
        logger.debug({ event: "API_REJECTED", method, path: url.pathname, status, err: errorMessage(err) }, "Request rejected");
      }
      if (res.headersSent) {
        res.end();
        return;
      }
      sendJson(res, status, errorBody(err));
    }
  });
}

/** Listen on `port` (0 picks a free one) and resolve once bound. */
export function startApiServer(engine: ChatbotEngine, port: number, host?: string): Promise<http.Server> {
  const server = createApiServer(engine);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      const boundPort = typeof address === "object" && address ? address.port : port;
      logger.info({ event: "API_SERVER_STARTED", port: boundPort }, "API server listening");
      resolve(server);
    });
  });
}
