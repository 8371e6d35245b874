import { CalcError } from "./types.js";

/**
 * Named integer variables for one session. Names are validated by callers;
 * the scope only stores them.
 */
export class VariableScope {
  private readonly values = new Map<string, bigint>();

  get(name: string, pos = 0): bigint {
    const value = this.values.get(name);
    if (value === undefined) {
      throw new CalcError(`Unknown variable: ${name}`, pos, "UNKNOWN_VARIABLE");
    }
    return value;
  }

  set(name: string, value: bigint): void {
    this.values.set(name, value);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get size(): number {
    return this.values.size;
  }

  entries(): Array<[string, bigint]> {
    return [...this.values.entries()];
  }
}
