import { inRange, isDigit, isLetter } from "./integer.js";
import type { VariableScope } from "./scope.js";
import { CalcError, type Operator, type Token } from "./types.js";

/**
 * Scanner states. `start` expects an operand (beginning of input, after `(`
 * or after `* / ^`). A sign run opened right after an operand is binary,
 * anywhere else it is unary.
 */
type ScanState =
  | { kind: "start" }
  | { kind: "signRun"; plus: number; minus: number; binary: boolean; pos: number }
  | { kind: "number"; digits: string; negative: boolean; pos: number }
  | { kind: "afterOperand" };

type SignRun = Extract<ScanState, { kind: "signRun" }>;

function invalid(message: string, pos: number): CalcError {
  return new CalcError(message, pos, "INVALID_EXPRESSION");
}

function effectiveSign(run: SignRun): "+" | "-" {
  if (run.plus > 0) return "+";
  return run.minus % 2 === 1 ? "-" : "+";
}

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}

/**
 * Turns a raw expression line into infix tokens: strips whitespace, resolves
 * variables through the scope and collapses runs of `+`/`-` into one sign.
 */
export function normalize(input: string, scope: VariableScope): Token[] {
  const tokens: Token[] = [];
  // One entry per open paren; true when a unary minus opened an extra group around it.
  const groups: boolean[] = [];
  let state: ScanState = { kind: "start" };
  let name = "";
  let namePos = 0;

  function closeNumber(): void {
    const s = state;
    if (s.kind !== "number") return;
    const magnitude = BigInt(s.digits);
    const value = s.negative ? -magnitude : magnitude;
    if (!inRange(value)) {
      throw invalid(`Integer literal out of range: ${s.negative ? "-" : ""}${s.digits}`, s.pos);
    }
    tokens.push({ type: "NUMBER", value, pos: s.pos });
    state = { kind: "afterOperand" };
  }

  // Consumes a pending sign run ahead of an operand; returns true when the operand is negated.
  function beginOperand(pos: number): boolean {
    const s = state;
    switch (s.kind) {
      case "start":
        return false;
      case "signRun":
        if (s.binary) {
          tokens.push({ type: "OPERATOR", op: effectiveSign(s), pos: s.pos });
          return false;
        }
        return effectiveSign(s) === "-";
      default:
        throw invalid("Missing operator between operands", pos);
    }
  }

  function feedDigit(ch: string, pos: number): void {
    const s = state;
    if (s.kind === "number") {
      state = { ...s, digits: s.digits + ch };
      return;
    }
    const negative = beginOperand(pos);
    state = { kind: "number", digits: ch, negative, pos };
  }

  function feedValue(value: bigint, pos: number): void {
    closeNumber();
    const signed = beginOperand(pos) ? -value : value;
    if (!inRange(signed)) {
      throw new CalcError("Integer overflow", pos, "OVERFLOW");
    }
    tokens.push({ type: "NUMBER", value: signed, pos });
    state = { kind: "afterOperand" };
  }

  function flushName(): void {
    if (name === "") return;
    const value = scope.get(name, namePos);
    name = "";
    feedValue(value, namePos);
  }

  function feedSign(ch: "+" | "-", pos: number): void {
    closeNumber();
    const s = state;
    const plus = ch === "+" ? 1 : 0;
    const minus = ch === "-" ? 1 : 0;
    switch (s.kind) {
      case "start":
        state = { kind: "signRun", plus, minus, binary: false, pos };
        return;
      case "afterOperand":
        state = { kind: "signRun", plus, minus, binary: true, pos };
        return;
      case "signRun":
        if ((plus > 0 && s.minus > 0) || (minus > 0 && s.plus > 0)) {
          throw invalid("Mixed '+' and '-' in sign run", pos);
        }
        state = { ...s, plus: s.plus + plus, minus: s.minus + minus };
        return;
    }
  }

  function feedOperator(op: Exclude<Operator, "+" | "-">, pos: number): void {
    closeNumber();
    if (state.kind !== "afterOperand") {
      throw invalid(`Operator '${op}' needs a left operand`, pos);
    }
    tokens.push({ type: "OPERATOR", op, pos });
    state = { kind: "start" };
  }

  function feedOpenParen(pos: number): void {
    closeNumber();
    const s = state;
    if (s.kind === "afterOperand") {
      throw invalid("Missing operator before '('", pos);
    }
    if (s.kind === "signRun") {
      const sign = effectiveSign(s);
      if (s.binary) {
        tokens.push({ type: "OPERATOR", op: sign, pos: s.pos });
      } else if (sign === "-") {
        // -(x) becomes (0 - (x)); the matching ')' closes both groups.
        tokens.push(
          { type: "LPAREN", pos: s.pos },
          { type: "NUMBER", value: 0n, pos: s.pos },
          { type: "OPERATOR", op: "-", pos: s.pos },
          { type: "LPAREN", pos },
        );
        groups.push(true);
        state = { kind: "start" };
        return;
      }
    }
    tokens.push({ type: "LPAREN", pos });
    groups.push(false);
    state = { kind: "start" };
  }

  function feedCloseParen(pos: number): void {
    closeNumber();
    if (state.kind !== "afterOperand") {
      throw invalid("Unexpected ')'", pos);
    }
    tokens.push({ type: "RPAREN", pos });
    if (groups.pop() === true) {
      tokens.push({ type: "RPAREN", pos });
    }
  }

  function finish(): void {
    flushName();
    closeNumber();
    if (state.kind !== "afterOperand") {
      throw invalid("Unexpected end of expression", input.length);
    }
  }

  for (let i = 0; i < input.length; i++) {
    const ch = input.charAt(i);

    if (isWhitespace(ch)) {
      flushName();
      continue;
    }

    if (isLetter(ch)) {
      if (name === "") namePos = i;
      name += ch;
      continue;
    }

    flushName();

    if (isDigit(ch)) {
      feedDigit(ch, i);
      continue;
    }

    switch (ch) {
      case "+":
      case "-":
        feedSign(ch, i);
        break;
      case "*":
      case "/":
      case "^":
        feedOperator(ch, i);
        break;
      case "(":
        feedOpenParen(i);
        break;
      case ")":
        feedCloseParen(i);
        break;
      default:
        throw invalid(`Unexpected character: '${ch}'`, i);
    }
  }

  finish();
  return tokens;
}
