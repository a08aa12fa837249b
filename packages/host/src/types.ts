/**
 * Host Types
 *
 * The value host is the execution environment the vault runs in:
 * it holds native value for every party and moves it on request.
 * Moving value to a party runs that party's receive hook synchronously,
 * and the hook may call straight back into whoever sent the value.
 */

import type { Amount, Party } from "@custody/types";

// =============================================================================
// Receivers
// =============================================================================

/**
 * Code attached to a party that runs whenever the party receives value.
 *
 * Returning `false` or throwing rejects the transfer.
 */
export interface ValueReceiver {
  onReceive(from: Party, amount: Amount): boolean | void;
}

// =============================================================================
// Transfer Primitive
// =============================================================================

export type TransferFailureReason =
  | "INVALID_AMOUNT"
  | "INVALID_PARTY"
  | "INSUFFICIENT_FUNDS"
  | "RECEIVER_REJECTED"
  | "RECEIVER_THREW"
  | "CALL_DEPTH_EXCEEDED";

export type TransferOutcome =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly reason: TransferFailureReason;
      readonly cause?: unknown;
    };

/**
 * Send `amount` from one party to another and report whether it happened.
 *
 * Implementations may run arbitrary receiver code before returning;
 * callers must not assume the call is a closed, non-reentrant frame.
 */
export interface TransferPrimitive {
  transfer(from: Party, to: Party, amount: Amount): TransferOutcome;
  holdingsOf(party: Party): Amount;
}

/**
 * One transfer attempt, recorded when it resolves.
 * Nested transfers therefore appear before the transfer that triggered them.
 */
export interface TransferRecord {
  readonly sequence: number;
  readonly from: Party;
  readonly to: Party;
  readonly amount: Amount;
  /** Nesting depth at which the transfer ran (1 = top level) */
  readonly depth: number;
  readonly ok: boolean;
  readonly reason?: TransferFailureReason;
}

export interface ValueHostOptions {
  /** Maximum nesting of transfers. Default: 64 */
  readonly maxCallDepth?: number;
}

// =============================================================================
// Errors
// =============================================================================

export type HostErrorCode =
  | "INVALID_PARTY"
  | "INVALID_AMOUNT"
  | "RECEIVER_EXISTS"
  | "INVALID_CONFIG"
  | "UNREVERTIBLE_TRANSFER";

export class HostError extends Error {
  public readonly code: HostErrorCode;

  constructor(code: HostErrorCode, message: string) {
    super(message);
    this.name = "HostError";
    this.code = code;
  }
}
