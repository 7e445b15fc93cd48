import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ToolExecutionError, UnknownToolError } from "../src/agent/errors.js";
import { calculator } from "../src/tools/calculator.js";
import { ToolRegistry, defineTool, formatSignature } from "../src/tools/registry.js";

const greet = defineTool({
  name: "greet",
  description: "Greets someone.",
  example: 'greet("Ada")',
  parameters: {
    name: z.string().min(1).describe("Who to greet"),
    times: z.coerce.number().int().min(1).default(1),
  },
  execute: async ({ name, times }) => Array.from({ length: times }, () => `Hello, ${name}!`).join(" "),
});

const boom = defineTool({
  name: "boom",
  description: "Always fails.",
  example: "boom()",
  parameters: {},
  execute: async () => {
    throw new Error("kaput");
  },
});

function makeRegistry(): ToolRegistry {
  return new ToolRegistry().register(greet).register(boom).register(calculator);
}

describe("defineTool", () => {
  it("derives parameters in declaration order", () => {
    expect(greet.parameters).toEqual([
      { name: "name", type: "string", required: true, description: "Who to greet" },
      { name: "times", type: "number", required: false, defaultValue: 1 },
    ]);
  });

  it("renders a signature with defaults", () => {
    expect(formatSignature(greet)).toBe("greet(name: string, times: number = 1) -> string");
  });
});

describe("ToolRegistry", () => {
  // ── Registration ───────────────────────────────────────

  it("rejects duplicate names", () => {
    const registry = new ToolRegistry().register(greet);
    expect(() => registry.register(greet)).toThrow('Tool "greet" is already registered');
  });

  it("describes tools for the system prompt", () => {
    const registry = new ToolRegistry().register(greet);
    expect(registry.describe()).toBe(
      '1. greet(name: string, times: number = 1) -> string\n   - Greets someone.\n   - Example: ACTION: greet("Ada")',
    );
  });

  it("lists names in registration order", () => {
    expect(makeRegistry().names()).toEqual(["greet", "boom", "calculator"]);
  });

  // ── Dispatch ───────────────────────────────────────────

  it("binds positional and keyword arguments", async () => {
    const registry = makeRegistry();
    const positional = await registry.dispatch({
      name: "greet",
      arguments: ["Ada", 2],
      keywordArguments: {},
    });
    expect(positional).toEqual({
      sourceTool: "greet",
      text: "Hello, Ada! Hello, Ada!",
      failure: null,
    });

    expect(await registry.invoke("greet", [], { name: "Grace" })).toBe("Hello, Grace!");
  });

  it("turns an unknown tool into an error observation", async () => {
    const observation = await makeRegistry().dispatch({
      name: "nope",
      arguments: [],
      keywordArguments: {},
    });
    expect(observation.text).toBe(
      "ERROR: Unknown tool 'nope'. Available tools: greet, boom, calculator",
    );
    expect(observation.failure).toBeInstanceOf(UnknownToolError);
  });

  it("reports binding problems as invalid arguments", async () => {
    const registry = makeRegistry();
    expect(await registry.invoke("greet", ["Ada", 1, 2])).toBe(
      "ERROR: Invalid arguments for tool 'greet': greet takes at most 2 argument(s) (3 given)",
    );
    expect(await registry.invoke("greet", ["Ada"], { colour: "red" })).toBe(
      "ERROR: Invalid arguments for tool 'greet': unexpected argument 'colour'",
    );
    expect(await registry.invoke("greet", ["Ada"], { name: "Bob" })).toBe(
      "ERROR: Invalid arguments for tool 'greet': got multiple values for 'name'",
    );
    expect(await registry.invoke("greet")).toBe(
      "ERROR: Invalid arguments for tool 'greet': missing required argument 'name'",
    );
  });

  it("reports schema violations with the parameter path", async () => {
    const observation = await makeRegistry().dispatch({
      name: "greet",
      arguments: ["Ada", "many"],
      keywordArguments: {},
    });
    expect(observation.text).toBe(
      "ERROR: Invalid arguments for tool 'greet': times: Expected number, received nan",
    );
    expect(observation.failure).toBeInstanceOf(ToolExecutionError);
    expect(observation.failure).toMatchObject({ stage: "arguments" });
  });

  it("catches tool exceptions", async () => {
    const observation = await makeRegistry().dispatch({
      name: "boom",
      arguments: [],
      keywordArguments: {},
    });
    expect(observation.text).toBe("ERROR: Tool 'boom' failed: kaput");
    expect(observation.failure).toMatchObject({ stage: "execution", toolName: "boom" });
  });

  // ── Calculator ─────────────────────────────────────────

  it("runs the calculator", async () => {
    const registry = makeRegistry();
    expect(await registry.invoke("calculator", ["100 * 0.15"])).toBe(
      "Calculation result: 100 * 0.15 = 15",
    );
    expect(await registry.invoke("calculator", [42])).toBe("Calculation result: 42 = 42");
  });

  it("reports rejected expressions without evaluating them", async () => {
    expect(await makeRegistry().invoke("calculator", ["import os"])).toBe(
      "ERROR: Tool 'calculator' failed: Unexpected character 'i' at position 0",
    );
  });
});
