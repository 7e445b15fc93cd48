import { z } from "zod";
import { defineTool } from "./registry.js";
import { evaluate } from "./arithmetic.js";

export const calculator = defineTool({
  name: "calculator",
  description:
    "Performs arithmetic and percentage calculations. Supports numbers, + - * / %, and parentheses.",
  example: 'calculator("100 * 0.15")',
  parameters: {
    expression: z.coerce.string().trim().min(1).describe('Arithmetic expression, e.g. "50 + 25"'),
  },
  execute: async ({ expression }) =>
    `Calculation result: ${expression} = ${evaluate(expression)}`,
});
