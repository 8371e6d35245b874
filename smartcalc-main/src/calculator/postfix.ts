import { CalcError, type Operator, type Token } from "./types.js";

// Equal precedence pops, so every operator (including ^) groups left to right.
export const PRECEDENCE: Readonly<Record<Operator, number>> = {
  "+": 1,
  "-": 1,
  "*": 2,
  "/": 2,
  "^": 3,
};

/** Shunting-yard conversion of infix tokens to Reverse Polish order. */
export function toPostfix(infix: readonly Token[]): Token[] {
  const output: Token[] = [];
  const stack: Token[] = [];

  for (const tok of infix) {
    switch (tok.type) {
      case "NUMBER":
        output.push(tok);
        break;

      case "LPAREN":
        stack.push(tok);
        break;

      case "RPAREN": {
        let top = stack.pop();
        while (top && top.type !== "LPAREN") {
          output.push(top);
          top = stack.pop();
        }
        if (!top) {
          throw new CalcError("Unmatched ')'", tok.pos, "INVALID_EXPRESSION");
        }
        break;
      }

      case "OPERATOR": {
        let top = stack.at(-1);
        while (top?.type === "OPERATOR" && PRECEDENCE[top.op] >= PRECEDENCE[tok.op]) {
          output.push(top);
          stack.pop();
          top = stack.at(-1);
        }
        stack.push(tok);
        break;
      }
    }
  }

  for (let top = stack.pop(); top; top = stack.pop()) {
    if (top.type === "LPAREN") {
      throw new CalcError("Unmatched '('", top.pos, "INVALID_EXPRESSION");
    }
    output.push(top);
  }

  return output;
}
