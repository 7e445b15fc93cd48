import { describe, it, expect } from "vitest";
import {
  formatToolCall,
  parseArgumentList,
  parseResponse,
} from "../src/agent/parser.js";

describe("parseResponse", () => {
  // ── Final answers ──────────────────────────────────────

  it("returns the text after the final answer marker", () => {
    expect(parseResponse("I know this one.\nFINAL ANSWER: 42")).toEqual({
      kind: "final_answer",
      answer: "42",
    });
  });

  it("prefers a final answer over an action in the same turn", () => {
    const text = 'ACTION: calculator("1 + 1")\nFINAL ANSWER: 2';
    expect(parseResponse(text)).toEqual({ kind: "final_answer", answer: "2" });
  });

  it("matches markers case-insensitively", () => {
    expect(parseResponse("final answer: done")).toEqual({ kind: "final_answer", answer: "done" });
  });

  it("keeps multi-line answers and allows an empty one", () => {
    expect(parseResponse("FINAL ANSWER: line one\nline two")).toEqual({
      kind: "final_answer",
      answer: "line one\nline two",
    });
    expect(parseResponse("FINAL ANSWER:   ")).toEqual({ kind: "final_answer", answer: "" });
  });

  // ── Tool calls ─────────────────────────────────────────

  it("parses a quoted positional argument", () => {
    const parsed = parseResponse('I will compute it.\nACTION: calculator("100 * 0.15")');
    expect(parsed).toEqual({
      kind: "tool_call",
      call: { name: "calculator", arguments: ["100 * 0.15"], keywordArguments: {} },
    });
  });

  it("parses strings and numbers", () => {
    const parsed = parseResponse('ACTION: get_earthquake_data("Japan", 5)');
    expect(parsed).toEqual({
      kind: "tool_call",
      call: { name: "get_earthquake_data", arguments: ["Japan", 5], keywordArguments: {} },
    });
  });

  it("parses keyword arguments", () => {
    const parsed = parseResponse('ACTION: get_earthquake_data(region="Japan", min_magnitude=5.5)');
    expect(parsed).toEqual({
      kind: "tool_call",
      call: {
        name: "get_earthquake_data",
        arguments: [],
        keywordArguments: { region: "Japan", min_magnitude: 5.5 },
      },
    });
  });

  it("does not split on commas or parentheses inside quotes", () => {
    expect(parseResponse('ACTION: search_arxiv("transformers, attention", 2)')).toEqual({
      kind: "tool_call",
      call: { name: "search_arxiv", arguments: ["transformers, attention", 2], keywordArguments: {} },
    });
    expect(parseResponse("ACTION: calculator('(2 + 3) * 4')")).toEqual({
      kind: "tool_call",
      call: { name: "calculator", arguments: ["(2 + 3) * 4"], keywordArguments: {} },
    });
  });

  it("accepts an empty argument list and bare words", () => {
    expect(parseResponse("ACTION: get_weather()")).toEqual({
      kind: "tool_call",
      call: { name: "get_weather", arguments: [], keywordArguments: {} },
    });
    expect(parseResponse("ACTION: get_weather(Boise)")).toEqual({
      kind: "tool_call",
      call: { name: "get_weather", arguments: ["Boise"], keywordArguments: {} },
    });
  });

  it("takes only the first action in a turn", () => {
    const parsed = parseResponse("ACTION: first(1)\nACTION: second(2)");
    expect(parsed).toEqual({
      kind: "tool_call",
      call: { name: "first", arguments: [1], keywordArguments: {} },
    });
  });

  it("decodes escapes inside string literals", () => {
    const parsed = parseResponse('ACTION: echo("say \\"hi\\"\\n")');
    expect(parsed).toEqual({
      kind: "tool_call",
      call: { name: "echo", arguments: ['say "hi"\n'], keywordArguments: {} },
    });
  });

  it("reads the older TOOL/ARGS form", () => {
    const parsed = parseResponse('TOOL: get_weather\nARGS: {"location": "Paris"}');
    expect(parsed).toEqual({
      kind: "tool_call",
      call: { name: "get_weather", arguments: [], keywordArguments: { location: "Paris" } },
    });
  });

  // ── Failures ───────────────────────────────────────────

  it("fails when neither marker is present", () => {
    expect(parseResponse("Let me think about this.")).toEqual({
      kind: "parse_failure",
      reason: 'Response contains neither "FINAL ANSWER:" nor "ACTION:"',
    });
  });

  it("explains an action marker without a call", () => {
    expect(parseResponse('ACTION: get_weather "Boise"')).toEqual({
      kind: "parse_failure",
      reason: 'Expected "tool_name(arguments)" after "ACTION:"',
    });
  });

  it("fails on a missing closing parenthesis", () => {
    expect(parseResponse('ACTION: calculator("1 + 1"')).toEqual({
      kind: "parse_failure",
      reason: 'Malformed call to calculator: missing closing ")"',
    });
  });

  it("fails on an unterminated string", () => {
    expect(parseResponse('ACTION: calculator("1 + 1)')).toEqual({
      kind: "parse_failure",
      reason: "Malformed call to calculator: unterminated string literal",
    });
  });

  it("fails on a positional argument after a keyword", () => {
    expect(parseResponse("ACTION: f(a=1, 2)")).toEqual({
      kind: "parse_failure",
      reason: "Malformed call to f: positional argument follows keyword argument",
    });
  });

  it("fails on non-primitive JSON values in ARGS", () => {
    expect(parseResponse('TOOL: f\nARGS: {"x": true}')).toEqual({
      kind: "parse_failure",
      reason: "ARGS value for 'x' must be a string or number",
    });
  });
});

describe("parseArgumentList", () => {
  it("reports the position of an empty argument", () => {
    expect(parseArgumentList("1,,2")).toEqual({ ok: false, reason: "empty argument at position 2" });
  });

  it("rejects duplicate keywords and missing values", () => {
    expect(parseArgumentList("a=1, a=2")).toEqual({ ok: false, reason: "duplicate argument 'a'" });
    expect(parseArgumentList("a=")).toEqual({ ok: false, reason: "missing value for 'a'" });
  });

  it("keeps numbers too long for a double as strings", () => {
    expect(parseArgumentList("12345678901234567890, 123456789012345")).toEqual({
      ok: true,
      value: { positional: ["12345678901234567890", 123456789012345], keyword: {} },
    });
    expect(parseResponse("ACTION: calculator(12345678901234567890)")).toEqual({
      kind: "tool_call",
      call: { name: "calculator", arguments: ["12345678901234567890"], keywordArguments: {} },
    });
  });

  it("keeps signed and exponent numbers as numbers", () => {
    expect(parseArgumentList("-3, +2.5, 1e3, .5")).toEqual({
      ok: true,
      value: { positional: [-3, 2.5, 1000, 0.5], keyword: {} },
    });
  });
});

describe("formatToolCall", () => {
  it("renders a call the way the model writes one", () => {
    expect(
      formatToolCall({ name: "f", arguments: ["a b", 3], keywordArguments: { k: "v" } }),
    ).toBe('f("a b", 3, k="v")');
  });
});
