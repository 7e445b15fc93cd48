import { formatToolCall } from "../agent/parser.js";
import type { AgentEvent } from "../agent/types.js";

const RULE = "=".repeat(60);

export const BANNER = `
╔═══════════════════════════════════════════════════════════════╗
║                                                               ║
║           ReAct Utility Agent                                 ║
║           Reason + Act + Observe                              ║
║                                                               ║
╚═══════════════════════════════════════════════════════════════╝

Type 'exit' or 'quit' to end the session.
Type 'examples' to see example questions.
`;

export const EXAMPLE_QUESTIONS = [
  "If it's 15% colder tomorrow than today in Boise, what will the temperature be?",
  "Are there any recent earthquakes near California with magnitude above 4?",
  "Find a recent paper on transformers and summarize it briefly",
  "Convert 200 USD to EUR and tell me if it's enough for a weekend trip",
  "What's the weather like in New York and Paris?",
  "Calculate 15% tip on a $87.50 restaurant bill",
  "Find papers on neural networks published recently",
  "Check for earthquakes in Japan with magnitude over 5",
] as const;

export function formatExamples(): string {
  const lines = EXAMPLE_QUESTIONS.map((question, i) => `${i + 1}. "${question}"`);
  return `\nExample Questions:\n\n${lines.join("\n\n")}\n`;
}

export function formatAnswer(answer: string): string {
  return `\n${RULE}\n💡 FINAL ANSWER:\n${RULE}\n\n${answer}\n`;
}

/** Verbose trace line for an agent event, or null when there is nothing to show. */
export function formatEvent(event: AgentEvent): string | null {
  switch (event.type) {
    case "start":
      return `\n${RULE}\n🤔 Question: ${event.question}\n${RULE}`;
    case "model_response":
      return `\n--- Iteration ${event.iteration} ---\n${event.content}`;
    case "tool_call":
      return `🔧 Executing: ${formatToolCall(event.call)}`;
    case "observation":
      return `👁️  Observation: ${event.observation.text}`;
    case "parse_failure":
      return `⚠️  ${event.reason}; reminding the model of the format`;
    case "exhausted":
      return `⚠️  Reached maximum iterations (${event.maxIterations})`;
    case "final_answer":
      return null;
  }
}
