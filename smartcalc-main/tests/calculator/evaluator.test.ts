import { describe, expect, it } from "vitest";
import {
  applyOperator,
  calculate,
  evaluatePostfix,
  formatResult,
  tryCalculate,
} from "../../src/calculator/evaluator.js";
import { INT_MAX, INT_MIN } from "../../src/calculator/integer.js";
import { PRECEDENCE, toPostfix } from "../../src/calculator/postfix.js";
import { VariableScope } from "../../src/calculator/scope.js";
import { CalcError, type Operator, type Token } from "../../src/calculator/types.js";
import { errorOf } from "./helpers.js";

function calc(expression: string, scope = new VariableScope()): string {
  return formatResult(calculate(expression, scope));
}

describe("evaluator (end-to-end)", () => {
  describe("arithmetic", () => {
    it("1 + 2 * 3 = 7", () => {
      expect(calc("1 + 2 * 3")).toBe("7");
    });

    it("(1 + 2) * 3 = 9", () => {
      expect(calc("(1 + 2) * 3")).toBe("9");
    });

    it("2 ^ 3 ^ 2 = 64", () => {
      expect(calc("2 ^ 3 ^ 2")).toBe("64");
    });

    it("10 / 3 = 3", () => {
      expect(calc("10 / 3")).toBe("3");
    });

    it("8 * 3 + 12 * (4 - 2) = 48", () => {
      expect(calc("8 * 3 + 12 * (4 - 2)")).toBe("48");
    });

    it("long left-to-right chain", () => {
      expect(calc("33 + 20 + 11 + 49 - 32 - 9 + 1 - 80 + 4")).toBe("-3");
    });

    it("single literal", () => {
      expect(calc("42")).toBe("42");
    });
  });

  describe("signs", () => {
    it("--5 = 5", () => {
      expect(calc("--5")).toBe("5");
    });

    it("---5 = -5", () => {
      expect(calc("---5")).toBe("-5");
    });

    it("3 --- 2 = 1", () => {
      expect(calc("3 --- 2")).toBe("1");
    });

    it("-(2 + 3) * 2 = -10", () => {
      expect(calc("-(2 + 3) * 2")).toBe("-10");
    });

    it("-(-(3)) = 3", () => {
      expect(calc("-(-(3))")).toBe("3");
    });

    it("2 * -3 = -6", () => {
      expect(calc("2 * -3")).toBe("-6");
    });
  });

  describe("division and powers", () => {
    it("truncates toward zero", () => {
      expect(calc("-7 / 2")).toBe("-3");
      expect(calc("7 / -2")).toBe("-3");
    });

    it("negative exponent truncates to 0", () => {
      expect(calc("2 ^ -1")).toBe("0");
    });

    it("negative base with odd exponent", () => {
      expect(calc("(-2) ^ 3")).toBe("-8");
    });

    it("0 ^ 0 = 1", () => {
      expect(calc("0 ^ 0")).toBe("1");
    });

    it("2 ^ 62 fits", () => {
      expect(calc("2 ^ 62")).toBe("4611686018427387904");
    });
  });

  describe("variables", () => {
    it("a + 3 = 8 with a = 5", () => {
      const scope = new VariableScope();
      scope.set("a", 5n);
      expect(calc("a + 3", scope)).toBe("8");
    });

    it("mixes several variables", () => {
      const scope = new VariableScope();
      scope.set("a", 4n);
      scope.set("b", 5n);
      scope.set("c", 6n);
      expect(calc("a*2+b*3+c*(2+3)", scope)).toBe("53");
    });

    it("subtracting a negative variable", () => {
      const scope = new VariableScope();
      scope.set("n", -5n);
      expect(calc("3 - n", scope)).toBe("8");
    });

    it("same input twice gives the same result", () => {
      const scope = new VariableScope();
      scope.set("x", 12n);
      expect(calc("x / 5 + x", scope)).toBe("14");
      expect(calc("x / 5 + x", scope)).toBe("14");
    });
  });

  describe("errors", () => {
    it("5 / 0 fails with DIVISION_BY_ZERO", () => {
      const err = errorOf(() => calculate("5 / 0", new VariableScope()));
      expect(err.code).toBe("DIVISION_BY_ZERO");
      expect(err.pos).toBe(2);
    });

    it("unbound variable fails with UNKNOWN_VARIABLE", () => {
      expect(errorOf(() => calc("b + 1")).code).toBe("UNKNOWN_VARIABLE");
    });

    it("trailing operator fails with INVALID_EXPRESSION", () => {
      expect(errorOf(() => calc("1 + ")).code).toBe("INVALID_EXPRESSION");
    });

    it("unmatched '(' fails with INVALID_EXPRESSION", () => {
      expect(errorOf(() => calc("1 + (2")).code).toBe("INVALID_EXPRESSION");
    });

    it("unmatched ')' fails with INVALID_EXPRESSION", () => {
      expect(errorOf(() => calc("1 )")).code).toBe("INVALID_EXPRESSION");
    });

    it("2 ^ 63 overflows", () => {
      expect(errorOf(() => calc("2 ^ 63")).code).toBe("OVERFLOW");
    });

    it("INT_MAX + 1 overflows", () => {
      expect(errorOf(() => calc("9223372036854775807 + 1")).code).toBe("OVERFLOW");
    });
  });
});

describe("tryCalculate", () => {
  it("returns the value on success", () => {
    expect(tryCalculate("6 * 7", new VariableScope())).toEqual({ ok: true, value: 42n });
  });

  it("returns the failure instead of throwing", () => {
    const result = tryCalculate("1 / 0", new VariableScope());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CalcError);
      expect(result.error.code).toBe("DIVISION_BY_ZERO");
    }
  });
});

describe("evaluatePostfix", () => {
  const num = (value: bigint): Token => ({ type: "NUMBER", value, pos: 0 });
  const op = (symbol: Operator, pos = 0): Token => ({ type: "OPERATOR", op: symbol, pos });

  it("evaluates a well-formed sequence", () => {
    expect(evaluatePostfix([num(1n), num(2n), num(3n), op("*"), op("+")])).toBe(7n);
  });

  it("operator without operands fails at the operator", () => {
    const err = errorOf(() => evaluatePostfix([num(1n), op("+", 3)]));
    expect(err.code).toBe("INVALID_EXPRESSION");
    expect(err.pos).toBe(3);
  });

  it("leftover values fail", () => {
    expect(errorOf(() => evaluatePostfix([num(1n), num(2n)])).code).toBe("INVALID_EXPRESSION");
  });

  it("empty sequence fails", () => {
    expect(errorOf(() => evaluatePostfix([])).code).toBe("INVALID_EXPRESSION");
  });

  it("a parenthesis is an internal error, not a CalcError", () => {
    expect(() => evaluatePostfix([{ type: "LPAREN", pos: 0 }])).toThrow(Error);
    expect(() => evaluatePostfix([{ type: "LPAREN", pos: 0 }])).not.toThrow(CalcError);
  });
});

describe("applyOperator", () => {
  it("exact integer arithmetic", () => {
    expect(applyOperator("+", 2n, 3n, 0)).toBe(5n);
    expect(applyOperator("-", 2n, 3n, 0)).toBe(-1n);
    expect(applyOperator("*", -4n, 3n, 0)).toBe(-12n);
    expect(applyOperator("/", -9n, 4n, 0)).toBe(-2n);
  });

  it("power through floating point", () => {
    expect(applyOperator("^", 3n, 4n, 0)).toBe(81n);
    expect(applyOperator("^", -2n, -1n, 0)).toBe(0n);
    expect(applyOperator("^", 1n, -5n, 0)).toBe(1n);
  });

  it("0 ^ -1 overflows", () => {
    expect(errorOf(() => applyOperator("^", 0n, -1n, 0)).code).toBe("OVERFLOW");
  });

  it("results outside 64 bits overflow", () => {
    expect(errorOf(() => applyOperator("-", INT_MIN, 1n, 0)).code).toBe("OVERFLOW");
    expect(errorOf(() => applyOperator("*", INT_MAX, 2n, 0)).code).toBe("OVERFLOW");
    expect(errorOf(() => applyOperator("/", INT_MIN, -1n, 0)).code).toBe("OVERFLOW");
  });
});

// Random balanced infix sequences: postfix evaluation must agree with a direct
// precedence-climbing evaluation of the same tokens.
describe("postfix conversion preserves meaning", () => {
  function mulberry32(seed: number): () => number {
    let a = seed;
    return () => {
      a = (a + 0x6d2b79f5) | 0;
      let t = Math.imul(a ^ (a >>> 15), 1 | a);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
  }

  const OPS: Operator[] = ["+", "-", "*", "/", "^"];

  function generate(random: () => number, depth: number, out: Token[]): void {
    const terms = 1 + Math.floor(random() * 4);
    for (let t = 0; t < terms; t++) {
      if (t > 0) {
        out.push({ type: "OPERATOR", op: OPS[Math.floor(random() * OPS.length)] ?? "+", pos: out.length });
      }
      if (depth < 2 && random() < 0.3) {
        out.push({ type: "LPAREN", pos: out.length });
        generate(random, depth + 1, out);
        out.push({ type: "RPAREN", pos: out.length });
      } else {
        out.push({ type: "NUMBER", value: BigInt(Math.floor(random() * 10)), pos: out.length });
      }
    }
  }

  function direct(tokens: Token[]): bigint {
    let i = 0;

    function primary(): bigint {
      const tok = tokens[i++];
      if (tok?.type === "NUMBER") return tok.value;
      if (tok?.type === "LPAREN") {
        const value = expr(1);
        i++; // skip RPAREN
        return value;
      }
      throw new Error("malformed test input");
    }

    function expr(minPrec: number): bigint {
      let left = primary();
      let tok = tokens[i];
      while (tok?.type === "OPERATOR" && PRECEDENCE[tok.op] >= minPrec) {
        i++;
        const right = expr(PRECEDENCE[tok.op] + 1);
        left = applyOperator(tok.op, left, right, tok.pos);
        tok = tokens[i];
      }
      return left;
    }

    return expr(1);
  }

  function outcome(fn: () => bigint): string {
    try {
      return fn().toString();
    } catch (err) {
      if (err instanceof CalcError) return err.code;
      throw err;
    }
  }

  it("agrees on 300 random expressions", () => {
    const random = mulberry32(20240611);
    for (let n = 0; n < 300; n++) {
      const tokens: Token[] = [];
      generate(random, 0, tokens);
      const expected = outcome(() => direct(tokens));
      const actual = outcome(() => evaluatePostfix(toPostfix(tokens)));
      expect(actual).toBe(expected);
    }
  });
});
