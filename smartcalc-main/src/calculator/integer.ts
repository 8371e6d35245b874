// Values are signed 64-bit integers carried as bigint.
export const INT_MIN = -(2n ** 63n);
export const INT_MAX = 2n ** 63n - 1n;

const INTEGER_LITERAL = /^[+-]?[0-9]+$/;
const NAME = /^[A-Za-z]+$/;

export function inRange(value: bigint): boolean {
  return value >= INT_MIN && value <= INT_MAX;
}

/** Parses an optionally signed decimal literal; null when malformed or out of range. */
export function parseInteger(text: string): bigint | null {
  if (!INTEGER_LITERAL.test(text)) return null;
  const value = BigInt(text);
  return inRange(value) ? value : null;
}

export function isValidName(text: string): boolean {
  return NAME.test(text);
}

export function isLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

export function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}
