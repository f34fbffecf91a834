/**
 * REST HTTP Server - thin adapter over core handlers
 * Provides REST API endpoints that call the same handlers as MCP tools
 */
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { randomUUID } from "crypto";
import { DEFAULT_PRECEDENCE, tableToRecord } from "@pebble/runtime";
import { VERSION } from "../config.js";
import { parse, tokenize, type HandlerOptions } from "../core/handlers.js";
import { RateLimiter } from "../core/rate-limit.js";
import type { HandlerOutputT } from "../core/schema.js";

export interface HttpServerOptions {
  port?: number;
  maxSourceLength?: number;
  limiter?: RateLimiter;
  startTime?: number;
}

type Handler = (input: unknown, opts?: HandlerOptions) => HandlerOutputT;

const ROUTES = new Map<string, Handler>([
  ["/v1/tokenize", tokenize],
  ["/v1/parse", parse]
]);

/**
 * Fetch-style request handler with REST endpoints
 */
export function createRequestHandler(opts: HttpServerOptions = {}): (req: Request) => Promise<Response> {
  const limiter = opts.limiter ?? new RateLimiter();
  const startTime = opts.startTime ?? Date.now();

  return async (req) => {
    const url = new URL(req.url);
    const reqId = req.headers.get("x-request-id") ?? randomUUID();

    // CORS headers
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
      "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
      "Access-Control-Allow-Headers": "Content-Type, x-client-id, x-request-id",
      "X-Request-ID": reqId
    };
    const json = (body: unknown, status = 200, extra: Record<string, string> = {}) =>
      new Response(JSON.stringify(body, null, 2), { status, headers: { ...headers, ...extra } });
    const reject = (status: number, code: string, message: string, extra?: Record<string, string>) =>
      json({ value: null, diagnostics: [{ code, message, severity: "error" }] }, status, extra);

    // Handle CORS preflight
    if (req.method === "OPTIONS") {
      return new Response(null, { status: 204, headers });
    }

    // Health check
    if (url.pathname === "/health" && req.method === "GET") {
      return json({
        status: "ok",
        version: VERSION,
        uptimeSec: Math.floor((Date.now() - startTime) / 1000)
      });
    }

    // Default operator table
    if (url.pathname === "/v1/precedence" && req.method === "GET") {
      return json(tableToRecord(DEFAULT_PRECEDENCE));
    }

    const handler = ROUTES.get(url.pathname);
    if (handler && req.method === "POST") {
      const contentType = req.headers.get("content-type");
      if (!contentType || !contentType.includes("application/json")) {
        return reject(415, "bad_request", "Content-Type must be application/json");
      }

      const clientId = req.headers.get("x-client-id") ?? "public";
      const ip = req.headers.get("x-forwarded-for")?.split(",")[0]?.trim() ??
                 req.headers.get("x-real-ip") ??
                 "unknown";
      const rateCheck = limiter.check(clientId, ip);
      if (!rateCheck.allowed) {
        return reject(429, "rate_limited", `Rate limit exceeded: ${rateCheck.reason}`, { "Retry-After": "60" });
      }

      let body: unknown;
      try {
        body = await req.json();
      } catch {
        return reject(400, "bad_request", "Request body must be valid JSON");
      }

      // Handlers never throw; diagnostics decide the status
      const result = handler(body, { reqId, maxSourceLength: opts.maxSourceLength });
      const status = result.diagnostics.some((d) => d.severity === "error") ? 400 : 200;
      return json(result, status);
    }

    // 404 for unknown routes
    return json({ error: "Not found" }, 404);
  };
}

async function toFetchRequest(req: IncomingMessage): Promise<Request> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }

  const method = req.method ?? "GET";
  const base = `http://${req.headers.host ?? "localhost"}`;
  const body = method === "GET" || method === "HEAD" || chunks.length === 0 ? undefined : Buffer.concat(chunks).toString("utf8");
  return new Request(new URL(req.url ?? "/", base), { method, headers, body });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(response.status, headers);
  res.end(Buffer.from(await response.arrayBuffer()));
}

/**
 * Create a node:http server mounting the REST handler
 */
export function makeHttpServer(opts: HttpServerOptions = {}): Server {
  const limiter = opts.limiter ?? new RateLimiter();
  const handle = createRequestHandler({ ...opts, limiter });

  const server = createServer((req, res) => {
    toFetchRequest(req)
      .then(handle)
      .then((response) => writeResponse(res, response))
      .catch((error: unknown) => {
        console.error("[http] request failed:", error);
        if (!res.headersSent) res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: "Internal error" }));
      });
  });

  // Evict idle rate limit entries every 5 minutes
  const cleanup = setInterval(() => limiter.cleanup(), 5 * 60 * 1000);
  cleanup.unref();
  server.on("close", () => clearInterval(cleanup));

  return server;
}

/**
 * Listen on the configured port
 */
export function startHttpServer(opts: HttpServerOptions = {}): Promise<Server> {
  const server = makeHttpServer(opts);
  const port = opts.port ?? 3001;
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      console.error(`[http] Pebble REST server running at http://localhost:${port}`);
      console.error(`[http]   POST /v1/tokenize - Tokenize Pebble source`);
      console.error(`[http]   POST /v1/parse    - Parse Pebble source`);
      console.error(`[http]   GET  /health      - Health check`);
      resolve(server);
    });
  });
}
