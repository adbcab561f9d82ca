/**
 * Math agent — binary arithmetic, `ax ± b = c` equations, square roots.
 */

import { defineAgent, type AgentHandler } from "../agent/handle.ts";
import type { AgentCard } from "../agent/types.ts";

export const MATH_CARD: AgentCard = {
  name: "Math Agent",
  description: "Performs mathematical calculations and solves math problems",
  version: "1.0.0",
  skills: [
    {
      name: "Basic Arithmetic",
      description: "Perform basic arithmetic operations",
      tags: ["math", "arithmetic", "calculate", "add", "subtract", "multiply", "divide"],
      examples: ["What is 12 * 4?", "Calculate 125 / 5"],
    },
    {
      name: "Advanced Math",
      description: "Solve equations and evaluate expressions",
      tags: ["math", "algebra", "equation", "solve", "evaluate", "expression"],
      examples: ["Solve 3x + 7 = 22", "What is the square root of 16?"],
    },
  ],
};

export const MATH_FALLBACK =
  "I couldn't understand or solve the mathematical problem. Please provide a clearer expression or equation.";

const ARITHMETIC = /(\d+(\.\d+)?)\s*([+\-*/^])\s*(\d+(\.\d+)?)/;
const EQUATION = /(\d*x)\s*([+-])\s*(\d+)\s*=\s*(\d+)/;
const SQUARE_ROOT = /square root of (\d+(\.\d+)?)/;

/** Operands are echoed as floats: 12 → "12.0" */
export function formatOperand(n: number): string {
  return Number.isInteger(n) ? n.toFixed(1) : String(n);
}

/** Whole results drop the fraction: 48.0 → "48" */
function formatResult(n: number): string {
  return Number.isInteger(n) ? n.toFixed(0) : String(n);
}

function arithmetic(query: string): string | undefined {
  const match = ARITHMETIC.exec(query);
  if (!match) return undefined;
  const [, left = "", , operator = "", right = ""] = match;
  const a = Number.parseFloat(left);
  const b = Number.parseFloat(right);

  let result: number;
  switch (operator) {
    case "+":
      result = a + b;
      break;
    case "-":
      result = a - b;
      break;
    case "*":
      result = a * b;
      break;
    case "/":
      if (b === 0) return "Error: Division by zero is not allowed.";
      result = a / b;
      break;
    default:
      result = a ** b;
  }
  if (!Number.isFinite(result)) return undefined;
  return `The result of ${formatOperand(a)} ${operator} ${formatOperand(b)} is ${formatResult(result)}`;
}

function equation(query: string): string | undefined {
  const match = EQUATION.exec(query);
  if (!match) return undefined;
  const [, term = "x", operator = "+", first = "0", second = "0"] = match;
  const coefficient = term === "x" ? 1 : Number.parseInt(term.slice(0, -1), 10);
  if (coefficient === 0) return undefined;
  const b = Number.parseInt(first, 10);
  const c = Number.parseInt(second, 10);

  const x = operator === "+" ? (c - b) / coefficient : (c + b) / coefficient;
  return `Solving the equation ${term} ${operator} ${b} = ${c}:\nx = ${formatResult(x)}`;
}

function squareRoot(query: string): string | undefined {
  const match = SQUARE_ROOT.exec(query.toLowerCase());
  if (!match) return undefined;
  const n = Number.parseFloat(match[1] ?? "");
  return `The square root of ${formatOperand(n)} is ${formatResult(Math.sqrt(n))}`;
}

/** First recognized problem wins: arithmetic, then equation, then square root */
export function solveMathProblem(query: string): string {
  return arithmetic(query) ?? equation(query) ?? squareRoot(query) ?? MATH_FALLBACK;
}

export function createMathAgent(): AgentHandler {
  return defineAgent(MATH_CARD, solveMathProblem);
}
