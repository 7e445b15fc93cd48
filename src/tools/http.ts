import type { z } from "zod";
import { log } from "../logger.js";

// ── HTTP helpers for API-backed tools ────────────────────

export interface HttpToolOptions {
  /** Per-request timeout (default: 10s). */
  timeoutMs?: number;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

const USER_AGENT = "react-utility-agent/0.1";

type QueryParams = Record<string, string | number>;

function buildUrl(base: string, params: QueryParams): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function request(
  base: string,
  params: QueryParams,
  accept: string,
  timeoutMs: number,
): Promise<Response> {
  const url = buildUrl(base, params);
  log.debug({ url }, "HTTP GET");

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: accept, "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
      throw new Error(`Request to ${new URL(base).host} timed out after ${timeoutMs}ms`, {
        cause: err,
      });
    }
    throw err;
  }

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
  }
  return response;
}

/** GET a JSON document and validate it before handing it back. */
export async function getJson<T extends z.ZodTypeAny>(
  base: string,
  params: QueryParams,
  schema: T,
  timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS,
): Promise<z.output<T>> {
  const response = await request(base, params, "application/json", timeoutMs);
  const body: unknown = await response.json();
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Unexpected response format from ${new URL(base).host}` +
        (issue ? ` (${issue.path.join(".") || "body"}: ${issue.message})` : ""),
    );
  }
  return parsed.data;
}

export async function getText(
  base: string,
  params: QueryParams,
  timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS,
): Promise<string> {
  const response = await request(base, params, "application/atom+xml, text/xml, */*", timeoutMs);
  return response.text();
}
