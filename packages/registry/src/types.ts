/**
 * Registry Types
 */

import { z } from "zod";
import type { Party } from "@custody/types";

// =============================================================================
// Schemas
// =============================================================================

export const ProfileSchema = z.object({
  name: z.string().min(1).max(50),
  age: z.number().int().min(1).max(150),
  email: z.string().min(3).max(100),
});

export const ProfileUpdateSchema = ProfileSchema.partial();

export type ProfileInput = z.infer<typeof ProfileSchema>;
export type ProfileUpdate = z.infer<typeof ProfileUpdateSchema>;

export interface Profile extends ProfileInput {
  readonly party: Party;
  readonly registeredAt: string;
  readonly updatedAt: string;
}

// =============================================================================
// Errors
// =============================================================================

export type RegistryErrorCode =
  | "ALREADY_REGISTERED"
  | "NOT_REGISTERED"
  | "VALIDATION_FAILED"
  | "INVALID_ADDRESS";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly issues: readonly ValidationIssue[];

  constructor(code: RegistryErrorCode, message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.issues = issues;
  }
}

// =============================================================================
// Events
// =============================================================================

export const REGISTRY_EVENTS = {
  PROFILE_REGISTERED: "registry.profile_registered",
  PROFILE_UPDATED: "registry.profile_updated",
} as const;
