/**
 * Financial Types
 *
 * Core primitives for custody accounting.
 *
 * Rules:
 * - Amounts are unsigned bigint values in the indivisible unit
 * - Amounts never exceed the configured integer width
 * - A party is an opaque identity; the zero identity is never a valid holder
 */

/**
 * An opaque identity capable of holding a balance and issuing calls.
 */
export type Party = string;

/**
 * An unsigned amount of the indivisible unit (e.g., wei, satoshi).
 */
export type Amount = bigint;

/**
 * The null identity. Ownership can never be transferred to it and
 * no operation accepts it as a counterparty.
 */
export const ZERO_PARTY: Party = "0x0000000000000000000000000000000000000000";

/** Default integer width for balances and totals. */
export const UINT256_BITS = 256;

/** Largest value representable in a 256-bit unsigned integer. */
export const UINT256_MAX: Amount = (1n << 256n) - 1n;

/**
 * Largest value representable in an unsigned integer of `bits` width.
 */
export function maxUint(bits: number): Amount {
  if (!Number.isInteger(bits) || bits <= 0) {
    throw new RangeError(`Integer width must be a positive integer, got ${String(bits)}`);
  }
  return (1n << BigInt(bits)) - 1n;
}
