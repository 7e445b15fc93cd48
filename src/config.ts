import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./agent/errors.js";

dotenv.config();

// ── Config ───────────────────────────────────────────────

export interface AgentConfig {
  /** OpenRouter credential. Only the model client requires it. */
  apiKey: string | undefined;
  model: string;
  temperature: number;
  maxTokens: number;
  maxIterations: number;
  /** Format reminders before an unmarked reply is taken as the answer. */
  formatRetries: number;
  /** Print intermediate reasoning and observations. */
  verbose: boolean;
  /** Per-request timeout for the HTTP-backed tools. */
  httpTimeoutMs: number;
  port: number;
}

export const DEFAULT_MODEL = "xiaomi/mimo-v2-flash:free";

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z
  .object({
    OPENROUTER_API_KEY: z.string().optional(),
    OPENROUTER_MODEL: z.string().optional(),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
    LLM_MAX_TOKENS: positiveInt.optional(),
    AGENT_MAX_ITERATIONS: positiveInt.optional(),
    AGENT_FORMAT_RETRIES: z.coerce.number().int().min(0).optional(),
    AGENT_VERBOSE: z.string().optional(),
    TOOL_HTTP_TIMEOUT_MS: positiveInt.optional(),
    PORT: positiveInt.max(65535).optional(),
  })
  .passthrough();

function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "n", "off"].includes(normalized)) return false;
  return defaultValue;
}

/** Empty strings in the environment count as unset. */
function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }
  return cleaned;
}

/**
 * Merge explicit overrides (CLI flags) over the environment.
 * Throws ConfigError when a variable is present but malformed.
 */
export function loadConfig(
  overrides: Partial<AgentConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): AgentConfig {
  const parsed = EnvSchema.safeParse(readEnv(env));
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigError(
      `Invalid environment configuration: ${keys.join(", ")}`,
      keys,
    );
  }
  const vars = parsed.data;

  const config: AgentConfig = {
    apiKey: overrides.apiKey ?? vars.OPENROUTER_API_KEY,
    model: overrides.model ?? vars.OPENROUTER_MODEL ?? DEFAULT_MODEL,
    temperature: overrides.temperature ?? vars.LLM_TEMPERATURE ?? 0.7,
    maxTokens: overrides.maxTokens ?? vars.LLM_MAX_TOKENS ?? 2000,
    maxIterations: overrides.maxIterations ?? vars.AGENT_MAX_ITERATIONS ?? 10,
    formatRetries: overrides.formatRetries ?? vars.AGENT_FORMAT_RETRIES ?? 1,
    verbose: overrides.verbose ?? parseBool(vars.AGENT_VERBOSE, true),
    httpTimeoutMs: overrides.httpTimeoutMs ?? vars.TOOL_HTTP_TIMEOUT_MS ?? 10_000,
    port: overrides.port ?? vars.PORT ?? 8000,
  };

  // ── Validation ─────────────────────────────────────────
  if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
    throw new ConfigError("maxIterations must be a positive integer", [
      "maxIterations",
    ]);
  }
  if (!Number.isInteger(config.formatRetries) || config.formatRetries < 0) {
    throw new ConfigError("formatRetries must be a non-negative integer", [
      "formatRetries",
    ]);
  }

  return config;
}
