import { isValidName, parseInteger } from "./integer.js";
import type { VariableScope } from "./scope.js";
import { CalcError } from "./types.js";

export function isAssignment(line: string): boolean {
  return line.includes("=");
}

/**
 * Applies `name = literal` or `name = otherName` to the scope.
 * Returns the assigned name and value.
 */
export function applyAssignment(
  line: string,
  scope: VariableScope,
): { name: string; value: bigint } {
  const eq = line.indexOf("=");
  if (eq === -1) {
    throw new CalcError("Not an assignment", 0, "INVALID_ASSIGNMENT");
  }

  const name = line.slice(0, eq).trim();
  const rhs = line.slice(eq + 1).trim();
  const rhsPos = line.length - line.slice(eq + 1).trimStart().length;

  if (!isValidName(name)) {
    throw new CalcError(`Invalid identifier: '${name}'`, 0, "INVALID_IDENTIFIER");
  }

  const literal = parseInteger(rhs);
  if (literal !== null) {
    scope.set(name, literal);
    return { name, value: literal };
  }

  if (!isValidName(rhs)) {
    throw new CalcError(`Invalid assignment: '${rhs}'`, rhsPos, "INVALID_ASSIGNMENT");
  }

  const value = scope.get(rhs, rhsPos);
  scope.set(name, value);
  return { name, value };
}
