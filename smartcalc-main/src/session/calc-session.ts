import {
  CalcError,
  VariableScope,
  applyAssignment,
  calculate,
  formatResult,
  isAssignment,
  type CalcErrorCode,
} from "../calculator/index.js";

export type SessionReply =
  | { type: "silent" }
  | { type: "result"; content: string }
  | { type: "error"; content: string; code: CalcErrorCode }
  | { type: "info"; content: string }
  | { type: "exit"; content: string };

export const ERROR_MESSAGES: Readonly<Record<CalcErrorCode, string>> = {
  INVALID_EXPRESSION: "Invalid expression",
  UNKNOWN_VARIABLE: "Unknown variable",
  DIVISION_BY_ZERO: "Division by zero",
  OVERFLOW: "Integer overflow",
  INVALID_IDENTIFIER: "Invalid identifier",
  INVALID_ASSIGNMENT: "Invalid assignment",
};

export const HELP_TEXT = [
  "The program evaluates integer expressions.",
  "Operators: + - * / ^ and parentheses; runs like -- or +++ collapse to one sign.",
  "Division truncates toward zero; a negative exponent gives 0.",
  "Assign variables with name = value (names are Latin letters only).",
  "Commands: /help, /exit",
].join("\n");

const EXIT_TEXT = "Bye!";

/**
 * One user's calculator session: owns a variable scope and turns each input
 * line into a reply. Failures never end the session.
 */
export class CalcSession {
  readonly scope: VariableScope;

  constructor(scope?: VariableScope) {
    this.scope = scope ?? new VariableScope();
  }

  handleLine(raw: string): SessionReply {
    const line = raw.trim();
    if (line.length === 0) {
      return { type: "silent" };
    }

    if (line.startsWith("/")) {
      return this.handleCommand(line);
    }

    try {
      if (isAssignment(line)) {
        applyAssignment(line, this.scope);
        return { type: "silent" };
      }
      return { type: "result", content: formatResult(calculate(line, this.scope)) };
    } catch (err) {
      if (err instanceof CalcError) {
        return { type: "error", content: ERROR_MESSAGES[err.code], code: err.code };
      }
      throw err;
    }
  }

  private handleCommand(line: string): SessionReply {
    switch (line) {
      case "/help":
        return { type: "info", content: HELP_TEXT };
      case "/exit":
        return { type: "exit", content: EXIT_TEXT };
      default:
        return { type: "info", content: "Unknown command" };
    }
  }
}
