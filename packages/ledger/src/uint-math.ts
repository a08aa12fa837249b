/**
 * @custody/ledger — Checked unsigned arithmetic.
 *
 * All arithmetic uses bigint and is bounded by an explicit width.
 * Overflow and underflow throw instead of wrapping.
 *
 * Rules:
 * - No floating-point operations
 * - No negative results
 * - Zero runtime dependencies
 */

import type { Amount } from "@custody/types";
import { UINT256_MAX } from "@custody/types";
import { LedgerError } from "./types.js";

/**
 * a + b, failing with ARITHMETIC_OVERFLOW when the sum exceeds `max`.
 */
export function checkedAdd(a: Amount, b: Amount, max: Amount = UINT256_MAX): Amount {
  const sum = a + b;
  if (sum > max) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${a.toString()} + ${b.toString()} exceeds the maximum ${max.toString()}`,
    );
  }
  return sum;
}

/**
 * a - b, failing with ARITHMETIC_UNDERFLOW when the result would be negative.
 */
export function checkedSub(a: Amount, b: Amount): Amount {
  if (b > a) {
    throw new LedgerError(
      "ARITHMETIC_UNDERFLOW",
      `${a.toString()} - ${b.toString()} is below zero`,
    );
  }
  return a - b;
}

/**
 * Parse a decimal string into an unsigned amount of the smallest unit.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * "100" with decimals=0 → 100n
 */
export function parseUnits(value: string, decimals = 0, max: Amount = UINT256_MAX): Amount {
  const trimmed = value.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid unsigned amount: "${value}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const parsed = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  if (parsed > max) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `Amount "${trimmed}" exceeds the maximum ${max.toString()}`,
    );
  }
  return parsed;
}
