import { ulid } from "ulid";
import type { ModelClient } from "../llm/client.js";
import type { ToolRegistry } from "../tools/registry.js";
import { log, type Logger } from "../logger.js";
import { IterationLimitExceededError } from "./errors.js";
import { formatToolCall, parseResponse } from "./parser.js";
import { FORMAT_REMINDER, OBSERVATION_PREFIX, buildSystemPrompt } from "./prompt.js";
import type { AgentEvent, AgentResult, Message } from "./types.js";

export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_FORMAT_RETRIES = 1;

export interface LoopOptions {
  client: ModelClient;
  /** Tools available to this controller; never shared implicitly. */
  registry: ToolRegistry;
  /** Hard cap on reasoning cycles, i.e. model calls (default: 10). */
  maxIterations?: number;
  /**
   * Reminders sent after turns with neither marker before the raw text is
   * accepted as the answer (default: 1). Resets after every tool call.
   */
  formatRetries?: number;
  /** Overrides the prompt built from the registry. */
  systemPrompt?: string;
  onEvent?: (event: AgentEvent) => void;
}

function assertCount(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${name} must be an integer >= ${min} (got ${value})`);
  }
  return value;
}

/**
 * Drives the reason → act → observe cycle:
 *   INIT → REASONING → (DISPATCHING → OBSERVING → REASONING)* → DONE | EXHAUSTED
 *
 * Each run() owns its history, so one controller can serve concurrent sessions.
 * Model-client errors (TransportError, AuthError) propagate and end the session.
 */
export class LoopController {
  readonly maxIterations: number;
  readonly formatRetries: number;
  private readonly client: ModelClient;
  private readonly registry: ToolRegistry;
  private readonly systemPrompt: string;
  private readonly onEvent: ((event: AgentEvent) => void) | undefined;

  constructor(options: LoopOptions) {
    this.client = options.client;
    this.registry = options.registry;
    this.maxIterations = assertCount(
      "maxIterations",
      options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
      1,
    );
    this.formatRetries = assertCount(
      "formatRetries",
      options.formatRetries ?? DEFAULT_FORMAT_RETRIES,
      0,
    );
    this.systemPrompt = options.systemPrompt ?? buildSystemPrompt(options.registry);
    this.onEvent = options.onEvent;
  }

  async run(question: string): Promise<AgentResult> {
    const sessionId = ulid();
    const logger = log.child({ session: sessionId });
    const startTime = Date.now();

    // ── INIT ─────────────────────────────────────────────
    const history: Message[] = [
      { role: "system", content: this.systemPrompt },
      { role: "user", content: question },
    ];
    let iteration = 0;
    let reminders = 0;

    logger.info({ model: this.client.model, maxIterations: this.maxIterations }, "Session started");
    this.emit({ type: "start", sessionId, question });

    while (iteration < this.maxIterations) {
      iteration++;

      // ── REASONING ──────────────────────────────────────
      const content = await this.client.complete(history);
      history.push({ role: "assistant", content });
      this.emit({ type: "model_response", iteration, content });

      const parsed = parseResponse(content);
      let followUp: string;

      if (parsed.kind === "final_answer") {
        return this.done(logger, sessionId, iteration, history, parsed.answer, startTime);
      }

      if (parsed.kind === "parse_failure") {
        if (reminders >= this.formatRetries) {
          logger.warn({ iteration, reason: parsed.reason }, "Unparseable turn accepted as the answer");
          return this.done(logger, sessionId, iteration, history, content.trim(), startTime);
        }
        reminders++;
        logger.warn({ iteration, reason: parsed.reason }, "Model turn had no marker, reminding it of the format");
        this.emit({ type: "parse_failure", iteration, reason: parsed.reason });
        followUp = FORMAT_REMINDER;
      } else {
        // ── DISPATCHING ──────────────────────────────────
        reminders = 0;
        logger.info({ iteration, call: formatToolCall(parsed.call) }, "Tool call");
        this.emit({ type: "tool_call", iteration, call: parsed.call });
        const observation = await this.registry.dispatch(parsed.call);

        // ── OBSERVING ────────────────────────────────────
        this.emit({ type: "observation", iteration, observation });
        followUp = `${OBSERVATION_PREFIX} ${observation.text}`;
      }

      history.push({ role: "user", content: followUp });
    }

    // ── EXHAUSTED ────────────────────────────────────────
    logger.warn(
      { iterations: iteration, latencyMs: Date.now() - startTime },
      "Agent reached maximum iterations",
    );
    this.emit({ type: "exhausted", maxIterations: this.maxIterations });
    return {
      status: "exhausted",
      error: new IterationLimitExceededError(this.maxIterations, [...history]),
      sessionId,
      iterations: iteration,
      history,
    };
  }

  private done(
    logger: Logger,
    sessionId: string,
    iteration: number,
    history: Message[],
    finalAnswer: string,
    startTime: number,
  ): AgentResult {
    logger.info({ iterations: iteration, latencyMs: Date.now() - startTime }, "Final answer reached");
    this.emit({ type: "final_answer", iteration, answer: finalAnswer });
    return { status: "done", finalAnswer, sessionId, iterations: iteration, history };
  }

  private emit(event: AgentEvent): void {
    this.onEvent?.(event);
  }
}

/** User-facing text for a result: the answer, or an apology once the cap is hit. */
export function resultText(result: AgentResult): string {
  if (result.status === "done") return result.finalAnswer;
  return `I apologize, but I couldn't complete the task within ${result.error.maxIterations} steps. Please try rephrasing your question or breaking it into smaller parts.`;
}
