/**
 * Numeric helpers for values that cross the ledger boundary.
 *
 * u64 values travel as decimal strings because they exceed the JSON safe
 * integer range.
 * @module
 */

export const U64_MAX = (1n << 64n) - 1n;

const DECIMAL_RE = /^(0|[1-9][0-9]*)$/;

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

/**
 * Parse a stringified u64. Leading zeros, signs, whitespace and values
 * outside `[0, 2^64)` are rejected.
 */
export function parseStringifiedU64(text: string): bigint {
  if (!DECIMAL_RE.test(text)) {
    throw new RangeError(`Invalid stringified u64: "${text}"`);
  }
  const value = BigInt(text);
  if (value > U64_MAX) {
    throw new RangeError(`Stringified u64 out of range: ${text}`);
  }
  return value;
}

export function serializeStringifiedU64(value: bigint): string {
  if (!isU64(value)) {
    throw new RangeError(`Value ${value} is not a u64`);
  }
  return value.toString(10);
}

/**
 * Convert a bigint to number, refusing values a number cannot hold exactly.
 */
export function toNumber(value: bigint): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(-Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(
      `bigint ${value} exceeds Number.MAX_SAFE_INTEGER and cannot be safely converted`,
    );
  }
  return Number(value);
}

export function toBigInt(value: bigint | number | string): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number") {
    if (!Number.isInteger(value)) {
      throw new RangeError(`Cannot convert non-integer ${value} to bigint`);
    }
    return BigInt(value);
  }
  try {
    return BigInt(value);
  } catch {
    throw new RangeError(`Cannot convert "${value}" to bigint`);
  }
}

/** JSON.stringify replacer that writes bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
