import type { Primitive, ToolCall } from "./types.js";

// ── Response Parser ──────────────────────────────────────
// Turns one raw model turn into a final answer, a tool call, or a failure.
// Arguments are tokenised as data only; nothing is evaluated.

export const FINAL_ANSWER_MARKER = "FINAL ANSWER:";
export const ACTION_MARKER = "ACTION:";

const FINAL_ANSWER_RE = /\bFINAL ANSWER:/i;
const ACTION_MARKER_RE = /\bACTION:/i;
const ACTION_RE = /\bACTION:\s*([A-Za-z_][A-Za-z0-9_]*)\s*\(/i;
// Older protocol: "TOOL: name" followed by "ARGS: {json}".
const TOOL_RE = /\bTOOL:\s*([A-Za-z_][A-Za-z0-9_]*)/i;
const ARGS_RE = /\bARGS:\s*(?=\{)/i;

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
/** Longer mantissas would lose digits as a double; they stay strings. */
const MAX_NUMBER_DIGITS = 15;
const KEYWORD_RE = /^([A-Za-z_][A-Za-z0-9_]*)\s*=(?!=)\s*([\s\S]*)$/;

export interface FinalAnswer {
  kind: "final_answer";
  answer: string;
}

export interface ToolRequest {
  kind: "tool_call";
  call: ToolCall;
}

export interface ParseFailure {
  kind: "parse_failure";
  reason: string;
}

export type ParsedResponse = FinalAnswer | ToolRequest | ParseFailure;

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

export function parseResponse(text: string): ParsedResponse {
  const final = FINAL_ANSWER_RE.exec(text);
  if (final) {
    return {
      kind: "final_answer",
      answer: text.slice(final.index + final[0].length).trim(),
    };
  }

  const action = ACTION_RE.exec(text);
  if (action) {
    return parseActionCall(text, action[1] ?? "", action.index + action[0].length - 1);
  }
  if (ACTION_MARKER_RE.test(text)) {
    return failure(`Expected "tool_name(arguments)" after "${ACTION_MARKER}"`);
  }

  const tool = TOOL_RE.exec(text);
  if (tool) {
    return parseLegacyCall(text, tool[1] ?? "");
  }

  return {
    kind: "parse_failure",
    reason: `Response contains neither "${FINAL_ANSWER_MARKER}" nor "${ACTION_MARKER}"`,
  };
}

function failure(reason: string): ParseFailure {
  return { kind: "parse_failure", reason };
}

function parseActionCall(text: string, name: string, openIndex: number): ParsedResponse {
  const close = findClosing(text, openIndex);
  if (!close.ok) return failure(`Malformed call to ${name}: ${close.reason}`);

  const args = parseArgumentList(text.slice(openIndex + 1, close.value));
  if (!args.ok) return failure(`Malformed call to ${name}: ${args.reason}`);

  return {
    kind: "tool_call",
    call: { name, arguments: args.value.positional, keywordArguments: args.value.keyword },
  };
}

function parseLegacyCall(text: string, name: string): ParsedResponse {
  const argsMarker = ARGS_RE.exec(text);
  if (!argsMarker) {
    return { kind: "tool_call", call: { name, arguments: [], keywordArguments: {} } };
  }

  const open = argsMarker.index + argsMarker[0].length;
  const close = findClosing(text, open);
  if (!close.ok) return failure(`Malformed ARGS for ${name}: ${close.reason}`);

  let decoded: unknown;
  try {
    decoded = JSON.parse(text.slice(open, close.value + 1));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return failure(`ARGS for ${name} is not valid JSON: ${detail}`);
  }
  if (decoded === null || typeof decoded !== "object" || Array.isArray(decoded)) {
    return failure(`ARGS for ${name} must be a JSON object`);
  }

  const keywordArguments: Record<string, Primitive> = {};
  for (const [key, value] of Object.entries(decoded)) {
    if (typeof value !== "string" && typeof value !== "number") {
      return failure(`ARGS value for '${key}' must be a string or number`);
    }
    keywordArguments[key] = value;
  }
  return { kind: "tool_call", call: { name, arguments: [], keywordArguments } };
}

// ── Scanning ─────────────────────────────────────────────

const CLOSERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };

/** Index just past the quote that closes the literal opened at `start`. */
function skipQuoted(text: string, start: number): Parsed<number> {
  const quote = text[start];
  for (let i = start + 1; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\\") {
      i++;
    } else if (ch === quote) {
      return { ok: true, value: i + 1 };
    }
  }
  return { ok: false, reason: "unterminated string literal" };
}

/** Finds the bracket matching the one at `openIndex`, honouring quotes and nesting. */
function findClosing(text: string, openIndex: number): Parsed<number> {
  const stack: string[] = [];
  let i = openIndex;
  while (i < text.length) {
    const ch = text[i] ?? "";
    if (ch === '"' || ch === "'") {
      const end = skipQuoted(text, i);
      if (!end.ok) return end;
      i = end.value;
      continue;
    }
    const closer = CLOSERS[ch];
    if (closer) {
      stack.push(closer);
    } else if (ch === stack[stack.length - 1]) {
      stack.pop();
      if (stack.length === 0) return { ok: true, value: i };
    }
    i++;
  }
  return { ok: false, reason: `missing closing "${CLOSERS[text[openIndex] ?? ""] ?? ")"}"` };
}

/** Splits on top-level commas only. */
function splitTopLevel(inner: string): Parsed<string[]> {
  const pieces: string[] = [];
  let depth = 0;
  let start = 0;
  let i = 0;
  while (i < inner.length) {
    const ch = inner[i] ?? "";
    if (ch === '"' || ch === "'") {
      const end = skipQuoted(inner, i);
      if (!end.ok) return end;
      i = end.value;
      continue;
    }
    if (CLOSERS[ch]) depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth--;
    else if (ch === "," && depth === 0) {
      pieces.push(inner.slice(start, i));
      start = i + 1;
    }
    i++;
  }
  pieces.push(inner.slice(start));
  return { ok: true, value: pieces };
}

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "\\": "\\", '"': '"', "'": "'" };

function unquote(raw: string): Parsed<string> {
  const end = skipQuoted(raw, 0);
  if (!end.ok) return end;
  if (end.value !== raw.length) {
    return { ok: false, reason: `unexpected text after string literal in ${raw}` };
  }

  let out = "";
  for (let i = 1; i < raw.length - 1; i++) {
    const ch = raw[i] ?? "";
    if (ch === "\\" && i + 1 < raw.length - 1) {
      const next = raw[i + 1] ?? "";
      out += ESCAPES[next] ?? `\\${next}`;
      i++;
    } else {
      out += ch;
    }
  }
  return { ok: true, value: out };
}

function mantissaDigits(raw: string): number {
  const mantissa = raw.split(/[eE]/)[0] ?? "";
  return mantissa.replace(/\D/g, "").replace(/^0+/, "").length;
}

function parseValue(raw: string): Parsed<Primitive> {
  if (raw.startsWith('"') || raw.startsWith("'")) return unquote(raw);
  if (NUMBER_RE.test(raw) && mantissaDigits(raw) <= MAX_NUMBER_DIGITS) {
    return { ok: true, value: Number(raw) };
  }
  return { ok: true, value: raw };
}

export interface ArgumentList {
  positional: Primitive[];
  keyword: Record<string, Primitive>;
}

/** Parses the text between the parentheses of a call. */
export function parseArgumentList(inner: string): Parsed<ArgumentList> {
  const result: ArgumentList = { positional: [], keyword: {} };
  if (inner.trim() === "") return { ok: true, value: result };

  const pieces = splitTopLevel(inner);
  if (!pieces.ok) return pieces;

  for (const [index, piece] of pieces.value.entries()) {
    const trimmed = piece.trim();
    if (trimmed === "") {
      return { ok: false, reason: `empty argument at position ${index + 1}` };
    }

    const keyword = trimmed.startsWith('"') || trimmed.startsWith("'")
      ? null
      : KEYWORD_RE.exec(trimmed);
    if (keyword) {
      const key = keyword[1] ?? "";
      const rawValue = (keyword[2] ?? "").trim();
      if (rawValue === "") return { ok: false, reason: `missing value for '${key}'` };
      if (key in result.keyword) return { ok: false, reason: `duplicate argument '${key}'` };
      const value = parseValue(rawValue);
      if (!value.ok) return value;
      result.keyword[key] = value.value;
      continue;
    }

    if (Object.keys(result.keyword).length > 0) {
      return { ok: false, reason: "positional argument follows keyword argument" };
    }
    const value = parseValue(trimmed);
    if (!value.ok) return value;
    result.positional.push(value.value);
  }

  return { ok: true, value: result };
}

/** Renders a call the way the model is asked to write it. */
export function formatToolCall(call: ToolCall): string {
  const render = (value: Primitive): string =>
    typeof value === "string" ? JSON.stringify(value) : String(value);
  const parts = [
    ...call.arguments.map(render),
    ...Object.entries(call.keywordArguments).map(([key, value]) => `${key}=${render(value)}`),
  ];
  return `${call.name}(${parts.join(", ")})`;
}
