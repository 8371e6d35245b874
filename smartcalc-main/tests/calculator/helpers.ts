import { CalcError, type Token } from "../../src/calculator/types.js";

/** Compact view of a token sequence, e.g. ["1", "+", "(", "2", ")"]. */
export function shape(tokens: readonly Token[]): string[] {
  return tokens.map((tok) => {
    switch (tok.type) {
      case "NUMBER":
        return tok.value.toString();
      case "OPERATOR":
        return tok.op;
      case "LPAREN":
        return "(";
      case "RPAREN":
        return ")";
    }
  });
}

export function errorOf(fn: () => unknown): CalcError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CalcError) return err;
    throw err;
  }
  throw new Error("expected a CalcError");
}
