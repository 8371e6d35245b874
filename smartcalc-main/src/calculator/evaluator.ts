import { inRange } from "./integer.js";
import { normalize } from "./normalizer.js";
import { toPostfix } from "./postfix.js";
import type { VariableScope } from "./scope.js";
import { CalcError, type CalcResult, type Operator, type Token } from "./types.js";

function checked(value: bigint, pos: number): bigint {
  if (!inRange(value)) {
    throw new CalcError("Integer overflow", pos, "OVERFLOW");
  }
  return value;
}

// Exponentiation goes through floating point and truncates, so a negative
// exponent yields 0 and very large powers lose precision.
function power(base: bigint, exponent: bigint, pos: number): bigint {
  const result = Math.trunc(Number(base) ** Number(exponent));
  if (!Number.isFinite(result)) {
    throw new CalcError("Integer overflow", pos, "OVERFLOW");
  }
  return checked(BigInt(result), pos);
}

export function applyOperator(op: Operator, left: bigint, right: bigint, pos: number): bigint {
  switch (op) {
    case "+":
      return checked(left + right, pos);
    case "-":
      return checked(left - right, pos);
    case "*":
      return checked(left * right, pos);
    case "/":
      if (right === 0n) {
        throw new CalcError("Division by zero", pos, "DIVISION_BY_ZERO");
      }
      // bigint division truncates toward zero
      return checked(left / right, pos);
    case "^":
      return power(left, right, pos);
  }
}

export function evaluatePostfix(postfix: readonly Token[]): bigint {
  const stack: bigint[] = [];

  for (const tok of postfix) {
    if (tok.type === "NUMBER") {
      stack.push(tok.value);
      continue;
    }
    if (tok.type !== "OPERATOR") {
      throw new Error(`Parenthesis in postfix sequence at ${tok.pos}`);
    }

    const right = stack.pop();
    const left = stack.pop();
    if (right === undefined || left === undefined) {
      throw new CalcError(`Missing operand for '${tok.op}'`, tok.pos, "INVALID_EXPRESSION");
    }
    stack.push(applyOperator(tok.op, left, right, tok.pos));
  }

  const [result] = stack;
  if (result === undefined || stack.length !== 1) {
    const pos = postfix.at(-1)?.pos ?? 0;
    throw new CalcError(
      `Expected a single result, got ${stack.length} values`,
      pos,
      "INVALID_EXPRESSION",
    );
  }
  return result;
}

export function formatResult(value: bigint): string {
  return value.toString();
}

export function calculate(expression: string, scope: VariableScope): bigint {
  const infix = normalize(expression, scope);
  const postfix = toPostfix(infix);
  return evaluatePostfix(postfix);
}

/** Same pipeline as `calculate`, returning the failure instead of throwing it. */
export function tryCalculate(expression: string, scope: VariableScope): CalcResult {
  try {
    return { ok: true, value: calculate(expression, scope) };
  } catch (err) {
    if (err instanceof CalcError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
