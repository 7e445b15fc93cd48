import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { z } from "zod";
import { errorMessage } from "../agent/errors.js";
import { resultText } from "../agent/loop.js";
import type { AgentResult } from "../agent/types.js";
import { log } from "../logger.js";

// ── Web API — HTTP ───────────────────────────────────────

export interface WebServerOptions {
  /** Runs one agent session per request. */
  ask: (prompt: string) => Promise<AgentResult>;
  /** Chat page served at "/". */
  pagePath?: string;
}

const DEFAULT_PAGE = fileURLToPath(new URL("../../public/index.html", import.meta.url));

/** Request bodies beyond this many bytes get a 413. */
export const MAX_BODY_BYTES = 16 * 1024;

const ChatRequestSchema = z.object({
  prompt: z.string().trim().min(1).max(4000),
});

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

// ── Helper: read POST body ───────────────────────────────

type Body = { ok: true; text: string } | { ok: false; bytes: number };

/**
 * Buffers the raw bytes and decodes once, so multi-byte characters split
 * across chunks survive. Past `limit` the rest is drained but not kept.
 */
function readBody(req: IncomingMessage, limit: number): Promise<Body> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let bytes = 0;
    req.on("data", (chunk: Buffer) => {
      bytes += chunk.length;
      if (bytes <= limit) chunks.push(chunk);
    });
    req.on("end", () => {
      resolve(
        bytes > limit
          ? { ok: false, bytes }
          : { ok: true, text: Buffer.concat(chunks).toString("utf-8") },
      );
    });
    req.on("error", reject);
  });
}

function parseJson(body: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

async function servePage(res: ServerResponse, pagePath: string): Promise<void> {
  try {
    const html = await readFile(pagePath, "utf-8");
    res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
    res.end(html);
  } catch (err) {
    log.warn({ err, pagePath }, "Chat page not found");
    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("Chat page not found");
  }
}

async function handleChat(
  req: IncomingMessage,
  res: ServerResponse,
  ask: WebServerOptions["ask"],
): Promise<void> {
  const raw = await readBody(req, MAX_BODY_BYTES);
  if (!raw.ok) {
    log.warn({ bytes: raw.bytes, limit: MAX_BODY_BYTES }, "Chat request body too large");
    sendJson(res, 413, { error: `Request body exceeds ${MAX_BODY_BYTES} bytes` });
    return;
  }

  const body = parseJson(raw.text);
  if (!body.ok) {
    sendJson(res, 400, { error: "Request body must be valid JSON" });
    return;
  }

  const request = ChatRequestSchema.safeParse(body.value);
  if (!request.success) {
    const detail = request.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    sendJson(res, 400, { error: `Invalid request: ${detail}` });
    return;
  }

  try {
    const result = await ask(request.data.prompt);
    if (result.status === "exhausted") {
      sendJson(res, 200, { reply: resultText(result), exhausted: true });
    } else {
      sendJson(res, 200, { reply: result.finalAnswer });
    }
  } catch (err) {
    log.error({ err }, "Chat request failed");
    sendJson(res, 500, { error: errorMessage(err) });
  }
}

/** Builds the HTTP server without binding a port. */
export function createWebServer(options: WebServerOptions): Server {
  const pagePath = options.pagePath ?? DEFAULT_PAGE;

  return createServer((req, res) => {
    // CORS headers for local dev
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    let handled: Promise<void>;
    if ((path === "/" || path === "/index.html") && req.method === "GET") {
      handled = servePage(res, pagePath);
    } else if (path === "/health" && req.method === "GET") {
      sendJson(res, 200, { ok: true });
      return;
    } else if (path === "/api/chat") {
      if (req.method !== "POST") {
        sendJson(res, 405, { error: "Method not allowed" });
        return;
      }
      handled = handleChat(req, res, options.ask);
    } else {
      sendJson(res, 404, { error: "Not found" });
      return;
    }

    void handled.catch((err: unknown) => {
      log.error({ err, path }, "Request handler failed");
      if (!res.headersSent) sendJson(res, 500, { error: errorMessage(err) });
      else res.end();
    });
  });
}

/** Binds the server and resolves once it is listening. */
export function startWebServer(options: WebServerOptions & { port: number }): Promise<Server> {
  const server = createWebServer(options);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, () => {
      server.off("error", reject);
      log.info({ port: options.port }, "🌐 Web API listening");
      resolve(server);
    });
  });
}
