export type Operator = "+" | "-" | "*" | "/" | "^";

export type Token =
  | { readonly type: "NUMBER"; readonly value: bigint; readonly pos: number }
  | { readonly type: "OPERATOR"; readonly op: Operator; readonly pos: number }
  | { readonly type: "LPAREN"; readonly pos: number }
  | { readonly type: "RPAREN"; readonly pos: number };

export type CalcErrorCode =
  | "INVALID_EXPRESSION"
  | "UNKNOWN_VARIABLE"
  | "DIVISION_BY_ZERO"
  | "OVERFLOW"
  | "INVALID_IDENTIFIER"
  | "INVALID_ASSIGNMENT";

export class CalcError extends Error {
  constructor(
    message: string,
    public pos: number,
    public code: CalcErrorCode,
  ) {
    super(message);
    this.name = "CalcError";
  }
}

export type CalcResult =
  | { ok: true; value: bigint }
  | { ok: false; error: CalcError };
