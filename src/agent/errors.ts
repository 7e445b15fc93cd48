import type { Message } from "./types.js";

// ── Error Taxonomy ───────────────────────────────────────
// Fatal: AuthError, TransportError, ConfigError.
// Recoverable (become observations): UnknownToolError, ToolExecutionError.
// Terminal outcome: IterationLimitExceededError.

export type AgentErrorCode =
  | "AUTH"
  | "TRANSPORT"
  | "CONFIG"
  | "UNKNOWN_TOOL"
  | "TOOL_EXECUTION"
  | "ITERATION_LIMIT";

export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or rejected model credential. */
export class AuthError extends AgentError {
  readonly code = "AUTH";
}

/** Network or API failure while talking to the model. */
export class TransportError extends AgentError {
  readonly code = "TRANSPORT";

  constructor(
    message: string,
    readonly status: number | undefined = undefined,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConfigError extends AgentError {
  readonly code = "CONFIG";

  constructor(
    message: string,
    readonly keys: readonly string[],
  ) {
    super(message);
  }
}

export class UnknownToolError extends AgentError {
  readonly code = "UNKNOWN_TOOL";

  constructor(
    readonly toolName: string,
    readonly available: readonly string[],
  ) {
    super(
      `Unknown tool '${toolName}'. Available tools: ${available.join(", ") || "none"}`,
    );
  }
}

export class ToolExecutionError extends AgentError {
  readonly code = "TOOL_EXECUTION";

  constructor(
    readonly toolName: string,
    message: string,
    /** "arguments" when binding/validation failed before the tool ran. */
    readonly stage: "arguments" | "execution",
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class IterationLimitExceededError extends AgentError {
  readonly code = "ITERATION_LIMIT";

  constructor(
    readonly maxIterations: number,
    readonly history: readonly Message[],
  ) {
    super(`Stopped after reaching the limit of ${maxIterations} iterations`);
  }
}

export type ToolFailure = UnknownToolError | ToolExecutionError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
