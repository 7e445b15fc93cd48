// ── Constrained Arithmetic ───────────────────────────────
// Grammar:
//   expr   := term (("+" | "-") term)*
//   term   := unary (("*" | "/" | "%") unary)*
//   unary  := ("+" | "-") unary | atom
//   atom   := number | "(" expr ")"
// Characters outside the grammar are rejected before evaluation starts.

export class ExpressionError extends Error {
  constructor(
    message: string,
    readonly position: number,
  ) {
    super(message);
    this.name = "ExpressionError";
  }
}

type Token =
  | { type: "number"; value: number; position: number }
  | { type: "op"; value: "+" | "-" | "*" | "/" | "%" | "(" | ")"; position: number };

const NUMBER_AT = /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const OPERATORS = new Set(["+", "-", "*", "/", "%", "(", ")"]);
const MAX_DEPTH = 100;
const SIGNIFICANT_DIGITS = 15;

function isOperator(ch: string): ch is Extract<Token, { type: "op" }>["value"] {
  return OPERATORS.has(ch);
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i] ?? "";
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (isOperator(ch)) {
      tokens.push({ type: "op", value: ch, position: i });
      i++;
      continue;
    }
    NUMBER_AT.lastIndex = i;
    const match = NUMBER_AT.exec(source);
    if (match) {
      tokens.push({ type: "number", value: Number(match[0]), position: i });
      i += match[0].length;
      continue;
    }
    throw new ExpressionError(`Unexpected character '${ch}' at position ${i}`, i);
  }
  return tokens;
}

class Parser {
  private index = 0;
  private depth = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly length: number,
  ) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new ExpressionError("Empty expression", 0);
    }
    const value = this.expr();
    const extra = this.tokens[this.index];
    if (extra) {
      throw new ExpressionError(`Unexpected '${String(extra.value)}' at position ${extra.position}`, extra.position);
    }
    return value;
  }

  private peekOp(): string | null {
    const token = this.tokens[this.index];
    return token?.type === "op" ? token.value : null;
  }

  private expr(): number {
    let value = this.term();
    for (let op = this.peekOp(); op === "+" || op === "-"; op = this.peekOp()) {
      this.index++;
      const rhs = this.term();
      value = op === "+" ? value + rhs : value - rhs;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.peekOp(); op === "*" || op === "/" || op === "%"; op = this.peekOp()) {
      const position = this.tokens[this.index]?.position ?? this.length;
      this.index++;
      const rhs = this.unary();
      if (op === "*") {
        value *= rhs;
      } else if (rhs === 0) {
        throw new ExpressionError(op === "/" ? "Division by zero" : "Modulo by zero", position);
      } else if (op === "/") {
        value /= rhs;
      } else {
        // Floored modulo: the result takes the sign of the divisor.
        value = ((value % rhs) + rhs) % rhs;
      }
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp();
    if (op === "+" || op === "-") {
      this.index++;
      const operand = this.nested(() => this.unary());
      return op === "-" ? -operand : operand;
    }
    return this.atom();
  }

  private atom(): number {
    const token = this.tokens[this.index];
    if (!token) {
      throw new ExpressionError("Unexpected end of expression", this.length);
    }
    if (token.type === "number") {
      this.index++;
      return token.value;
    }
    if (token.value === "(") {
      this.index++;
      const value = this.nested(() => this.expr());
      const close = this.tokens[this.index];
      if (close?.type !== "op" || close.value !== ")") {
        throw new ExpressionError(`Missing ')' for '(' at position ${token.position}`, token.position);
      }
      this.index++;
      return value;
    }
    throw new ExpressionError(`Unexpected '${token.value}' at position ${token.position}`, token.position);
  }

  private nested(fn: () => number): number {
    if (++this.depth > MAX_DEPTH) {
      throw new ExpressionError("Expression is nested too deeply", this.tokens[this.index]?.position ?? 0);
    }
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }
}

/** Evaluates an arithmetic expression. Throws ExpressionError on anything outside the grammar. */
export function evaluate(expression: string): number {
  const result = new Parser(tokenize(expression), expression.length).parse();
  if (!Number.isFinite(result)) {
    throw new ExpressionError("Result is not a finite number", 0);
  }
  if (Number.isInteger(result)) return result;
  // Trim binary floating-point noise: 100 * 0.15 → 15, not 15.000000000000002.
  return Number(result.toPrecision(SIGNIFICANT_DIGITS));
}
