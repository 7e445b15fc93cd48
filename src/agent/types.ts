import type {
  IterationLimitExceededError,
  ToolFailure,
} from "./errors.js";

export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export type Primitive = string | number;

export interface ToolCall {
  name: string;
  /** Positional arguments, in the order the model wrote them. */
  arguments: Primitive[];
  keywordArguments: Record<string, Primitive>;
}

export interface Observation {
  sourceTool: string;
  text: string;
  /** Set when the call failed; the text then describes the failure. */
  failure: ToolFailure | null;
}

interface ResultBase {
  sessionId: string;
  /** Model calls made in this session. */
  iterations: number;
  history: readonly Message[];
}

export type AgentResult =
  | (ResultBase & { status: "done"; finalAnswer: string })
  | (ResultBase & { status: "exhausted"; error: IterationLimitExceededError });

/** Progress notifications for verbose output. */
export type AgentEvent =
  | { type: "start"; sessionId: string; question: string }
  | { type: "model_response"; iteration: number; content: string }
  | { type: "tool_call"; iteration: number; call: ToolCall }
  | { type: "observation"; iteration: number; observation: Observation }
  | { type: "parse_failure"; iteration: number; reason: string }
  | { type: "final_answer"; iteration: number; answer: string }
  | { type: "exhausted"; maxIterations: number };
