#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { createInterface } from "readline";
import { AuthError, ConfigError, errorMessage } from "./agent/errors.js";
import { LoopController, resultText } from "./agent/loop.js";
import type { AgentEvent } from "./agent/types.js";
import { formatAnswer, formatEvent, formatExamples, BANNER } from "./cli/output.js";
import { loadConfig, type AgentConfig } from "./config.js";
import { OpenRouterClient } from "./llm/client.js";
import { log } from "./logger.js";
import { createDefaultRegistry } from "./tools/index.js";
import { startWebServer } from "./web/server.js";

const EXIT_COMMANDS = new Set(["exit", "quit", "q"]);

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function printEvent(event: AgentEvent): void {
  const line = formatEvent(event);
  if (line !== null) process.stdout.write(`${line}\n`);
}

/** One client, one registry, one controller per CLI process. */
function createAgent(config: AgentConfig): LoopController {
  const client = new OpenRouterClient({
    apiKey: config.apiKey,
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  });
  return new LoopController({
    client,
    registry: createDefaultRegistry({ timeoutMs: config.httpTimeoutMs }),
    maxIterations: config.maxIterations,
    formatRetries: config.formatRetries,
    onEvent: config.verbose ? printEvent : undefined,
  });
}

// ── Commands ─────────────────────────────────────────────

interface AgentFlags {
  maxIterations?: number;
  model?: string;
  quiet?: boolean;
}

function overridesFrom(flags: AgentFlags): Partial<AgentConfig> {
  return {
    maxIterations: flags.maxIterations,
    model: flags.model,
    verbose: flags.quiet ? false : undefined,
  };
}

async function ask(words: string[], flags: AgentFlags): Promise<void> {
  const config = loadConfig(overridesFrom(flags));
  const agent = createAgent(config);
  const result = await agent.run(words.join(" "));

  if (result.status === "exhausted") {
    process.stdout.write(`${resultText(result)}\n`);
    process.stderr.write(
      `${result.error.message} (${result.history.length} messages in trace)\n`,
    );
    process.exitCode = 2;
    return;
  }
  process.stdout.write(config.verbose ? formatAnswer(result.finalAnswer) : `${result.finalAnswer}\n`);
}

async function chat(flags: AgentFlags): Promise<void> {
  const config = loadConfig(overridesFrom(flags));
  const agent = createAgent(config);

  process.stdout.write(BANNER);
  process.stdout.write(`\n✓ Agent initialized with model: ${config.model}\n`);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("\n🤔 Your question: ");
  rl.prompt();

  try {
    for await (const line of rl) {
      const input = line.trim();
      if (EXIT_COMMANDS.has(input.toLowerCase())) break;

      if (input.toLowerCase() === "examples") {
        process.stdout.write(formatExamples());
      } else if (input) {
        try {
          const result = await agent.run(input);
          process.stdout.write(formatAnswer(resultText(result)));
        } catch (err) {
          log.error({ err }, "Session failed");
          process.stdout.write(`\n❌ ERROR: ${errorMessage(err)}\n`);
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
  process.stdout.write("\n👋 Goodbye!\n");
}

function listTools(): void {
  const config = loadConfig();
  const registry = createDefaultRegistry({ timeoutMs: config.httpTimeoutMs });
  process.stdout.write(`${registry.describe()}\n`);
}

async function serve(flags: AgentFlags & { port?: number }): Promise<void> {
  const config = loadConfig({ ...overridesFrom(flags), port: flags.port, verbose: false });
  const agent = createAgent(config);
  const server = await startWebServer({
    port: config.port,
    ask: (prompt) => agent.run(prompt),
  });

  const shutdown = () => {
    log.info("👋 Shutting down web API...");
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

// ── Main ─────────────────────────────────────────────────

async function main() {
  const program = new Command();

  program
    .name("react-agent")
    .description("A ReAct (Reason + Act + Observe) agent with utility tools")
    .version("0.1.0");

  const withAgentOptions = (cmd: Command) =>
    cmd
      .option("--max-iterations <n>", "maximum reasoning cycles", parsePositiveInt)
      .option("--model <id>", "OpenRouter model id")
      .option("-q, --quiet", "print only the answer");

  withAgentOptions(
    program
      .command("ask")
      .description("answer a single question")
      .argument("<question...>", "the question to answer"),
  ).action(ask);

  withAgentOptions(
    program.command("chat").description("interactive session"),
  ).action(chat);

  program.command("tools").description("list the available tools").action(listTools);

  withAgentOptions(
    program
      .command("serve")
      .description("start the web API")
      .option("--port <port>", "port to listen on", parsePositiveInt),
  ).action(serve);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof AuthError || error instanceof ConfigError) {
    process.stderr.write(`❌ ERROR: ${error.message}\n`);
    if (error instanceof AuthError) {
      process.stderr.write("Get an API key at https://openrouter.ai/keys\n");
    }
  } else {
    log.fatal(error, "💀 Fatal error");
  }
  process.exit(1);
});
