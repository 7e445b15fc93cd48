import { z } from "zod";
import { log } from "../logger.js";
import {
  ToolExecutionError,
  UnknownToolError,
  errorMessage,
  type ToolFailure,
} from "../agent/errors.js";
import type { Observation, Primitive, ToolCall } from "../agent/types.js";

// ── Tool Definition ──────────────────────────────────────
// Every tool returns a string; observations are plain text.

export interface ToolParameter {
  name: string;
  type: "string" | "number";
  required: boolean;
  defaultValue?: Primitive;
  description?: string;
}

type Prepared =
  | { ok: true; run: () => Promise<string> }
  | { ok: false; issues: string[] };

export interface ToolDefinition {
  name: string;
  description: string;
  /** A sample call shown to the model, e.g. `calculator("100 * 0.15")`. */
  example: string;
  /** Positional order of the arguments. */
  parameters: readonly ToolParameter[];
  /** Validates bound arguments and returns the call to run. */
  prepare(input: Record<string, Primitive>): Prepared;
}

export interface ToolSpec<S extends z.ZodRawShape> {
  name: string;
  description: string;
  example: string;
  /** Declaration order of the keys is the positional order. */
  parameters: S;
  execute: (input: z.output<z.ZodObject<S>>) => Promise<string>;
}

function describeParameter(name: string, schema: z.ZodTypeAny): ToolParameter {
  let current = schema;
  let description = schema.description;
  let required = true;
  let defaultValue: Primitive | undefined;

  for (;;) {
    description ??= current.description;
    if (current instanceof z.ZodDefault) {
      required = false;
      const value: unknown = current._def.defaultValue();
      if (typeof value === "string" || typeof value === "number") defaultValue = value;
      current = current.removeDefault();
    } else if (current instanceof z.ZodOptional) {
      required = false;
      current = current.unwrap();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      break;
    }
  }

  return {
    name,
    type: current instanceof z.ZodNumber ? "number" : "string",
    required,
    ...(defaultValue !== undefined ? { defaultValue } : {}),
    ...(description !== undefined ? { description } : {}),
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`);
}

export function defineTool<S extends z.ZodRawShape>(spec: ToolSpec<S>): ToolDefinition {
  const schema = z.object(spec.parameters);
  const parameters = Object.entries(spec.parameters).map(([name, field]) =>
    describeParameter(name, field),
  );

  return {
    name: spec.name,
    description: spec.description,
    example: spec.example,
    parameters,
    prepare(input) {
      const parsed = schema.safeParse(input);
      if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error) };
      return { ok: true, run: () => spec.execute(parsed.data) };
    },
  };
}

export function formatSignature(tool: ToolDefinition): string {
  const params = tool.parameters.map((p) => {
    const base = `${p.name}: ${p.type}`;
    return p.defaultValue === undefined ? base : `${base} = ${JSON.stringify(p.defaultValue)}`;
  });
  return `${tool.name}(${params.join(", ")}) -> string`;
}

// ── Argument Binding ─────────────────────────────────────

type Bound = { ok: true; input: Record<string, Primitive> } | { ok: false; issues: string[] };

/** Maps positional values onto the declared parameter order, then merges keywords. */
export function bindArguments(tool: ToolDefinition, call: ToolCall): Bound {
  const names = tool.parameters.map((p) => p.name);
  const input: Record<string, Primitive> = {};
  const issues: string[] = [];

  if (call.arguments.length > names.length) {
    issues.push(
      `${tool.name} takes at most ${names.length} argument(s) (${call.arguments.length} given)`,
    );
  }
  call.arguments.forEach((value, index) => {
    const name = names[index];
    if (name !== undefined) input[name] = value;
  });

  for (const [name, value] of Object.entries(call.keywordArguments)) {
    if (!names.includes(name)) {
      issues.push(`unexpected argument '${name}'`);
    } else if (name in input) {
      issues.push(`got multiple values for '${name}'`);
    } else {
      input[name] = value;
    }
  }

  // Checked here because coercing schemas would turn undefined into "undefined".
  for (const param of tool.parameters) {
    if (param.required && !(param.name in input)) {
      issues.push(`missing required argument '${param.name}'`);
    }
  }

  return issues.length > 0 ? { ok: false, issues } : { ok: true, input };
}

// ── Tool Registry ────────────────────────────────────────

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(tool: ToolDefinition): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Numbered tool list for the system prompt. */
  describe(): string {
    return this.list()
      .map(
        (tool, i) =>
          `${i + 1}. ${formatSignature(tool)}\n   - ${tool.description}\n   - Example: ACTION: ${tool.example}`,
      )
      .join("\n\n");
  }

  /** Runs a parsed call. Never throws: failures come back as error observations. */
  async dispatch(call: ToolCall): Promise<Observation> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      return this.failed(call.name, new UnknownToolError(call.name, this.names()));
    }

    const bound = bindArguments(tool, call);
    const prepared = bound.ok ? tool.prepare(bound.input) : bound;
    if (!prepared.ok) {
      return this.failed(
        call.name,
        new ToolExecutionError(
          call.name,
          `Invalid arguments for tool '${call.name}': ${prepared.issues.join("; ")}`,
          "arguments",
        ),
      );
    }

    try {
      const text = await prepared.run();
      log.debug({ tool: call.name, chars: text.length }, "Tool result");
      return { sourceTool: call.name, text, failure: null };
    } catch (err) {
      return this.failed(
        call.name,
        new ToolExecutionError(call.name, `Tool '${call.name}' failed: ${errorMessage(err)}`, "execution", {
          cause: err,
        }),
      );
    }
  }

  /** `invoke(name, args) -> text`: the plain tool capability contract. */
  async invoke(
    name: string,
    args: Primitive[] = [],
    keywordArguments: Record<string, Primitive> = {},
  ): Promise<string> {
    const observation = await this.dispatch({ name, arguments: args, keywordArguments });
    return observation.text;
  }

  private failed(name: string, failure: ToolFailure): Observation {
    log.error({ tool: name, code: failure.code, error: failure.message }, "Tool call failed");
    return { sourceTool: name, text: `ERROR: ${failure.message}`, failure };
  }
}
