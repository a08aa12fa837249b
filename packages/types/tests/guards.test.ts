/**
 * Runtime type guard tests for @custody/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isParty,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import { UINT256_MAX, ZERO_PARTY, maxUint } from "../src/financial.js";

// =============================================================================
// Financial guards
// =============================================================================

describe("isParty", () => {
  it("accepts a named identity", () => {
    expect(isParty("alice")).toBe(true);
    expect(isParty("0x1111111111111111111111111111111111111111")).toBe(true);
  });

  it("rejects the zero identity", () => {
    expect(isParty(ZERO_PARTY)).toBe(false);
  });

  it("rejects the zero identity regardless of hex case", () => {
    expect(isParty("0X0000000000000000000000000000000000000000")).toBe(false);
  });

  it("rejects empty and blank strings", () => {
    expect(isParty("")).toBe(false);
    expect(isParty("   ")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isParty(null)).toBe(false);
    expect(isParty(undefined)).toBe(false);
    expect(isParty(42)).toBe(false);
  });
});

describe("maxUint", () => {
  it("computes width bounds", () => {
    expect(maxUint(8)).toBe(255n);
    expect(maxUint(256)).toBe(UINT256_MAX);
  });

  it("rejects non-positive widths", () => {
    expect(() => maxUint(0)).toThrow(RangeError);
    expect(() => maxUint(1.5)).toThrow(RangeError);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const METADATA = {
  eventId: "evt-1",
  timestamp: "2024-01-15T10:00:00.000Z",
  actor: "alice",
  correlationId: "vault-op-1",
  source: "vault",
};

describe("isEventSource", () => {
  it("accepts known sources", () => {
    for (const source of ["vault", "registry", "host", "adversary"]) {
      expect(isEventSource(source)).toBe(true);
    }
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("treasury")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(METADATA)).toBe(true);
  });

  it("rejects missing correlationId", () => {
    const { correlationId: _omit, ...rest } = METADATA;
    expect(isEventMetadata(rest)).toBe(false);
  });

  it("rejects null", () => {
    expect(isEventMetadata(null)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({ type: "vault.deposit", metadata: METADATA, payload: { amount: "10" } }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(isDomainEvent({ type: "vault.deposit", metadata: METADATA, payload: null })).toBe(false);
  });

  it("rejects a non-string type", () => {
    expect(isDomainEvent({ type: 1, metadata: METADATA, payload: {} })).toBe(false);
  });
});
