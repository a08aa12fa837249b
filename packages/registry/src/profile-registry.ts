/**
 * ProfileRegistry — one validated profile per party.
 *
 * Independent of the vault: it holds no value and never touches a ledger.
 */

import { randomUUID } from "node:crypto";
import type { ZodError, ZodType } from "zod";
import type { Party } from "@custody/types";
import { isParty } from "@custody/types";
import { InMemoryEventStore } from "@custody/event-store";
import type { EventStore } from "@custody/event-store";
import { ProfileSchema, ProfileUpdateSchema, REGISTRY_EVENTS, RegistryError } from "./types.js";
import type { Profile, ProfileInput, ProfileUpdate, ValidationIssue } from "./types.js";

const STREAM_ID = "registry";

export class ProfileRegistry {
  private readonly profiles: Map<Party, Profile> = new Map();
  private readonly events: EventStore;
  private operationSeq = 0;

  constructor(events: EventStore = new InMemoryEventStore()) {
    this.events = events;
  }

  register(caller: Party, input: ProfileInput): Profile {
    this.assertParty(caller);
    if (this.profiles.has(caller)) {
      throw new RegistryError("ALREADY_REGISTERED", `"${caller}" is already registered`);
    }
    const data: ProfileInput = parse(ProfileSchema, input);

    const now = new Date().toISOString();
    const profile: Profile = { party: caller, ...data, registeredAt: now, updatedAt: now };
    this.profiles.set(caller, profile);
    this.emit(REGISTRY_EVENTS.PROFILE_REGISTERED, caller, { party: caller, name: profile.name });
    return profile;
  }

  /**
   * Replace the supplied fields; omitted fields keep their values.
   */
  update(caller: Party, input: ProfileUpdate): Profile {
    const existing = this.profiles.get(caller);
    if (existing === undefined) {
      throw new RegistryError("NOT_REGISTERED", `"${caller}" is not registered`);
    }
    const changes: ProfileUpdate = parse(ProfileUpdateSchema, input);

    const profile: Profile = {
      ...existing,
      name: changes.name ?? existing.name,
      age: changes.age ?? existing.age,
      email: changes.email ?? existing.email,
      updatedAt: new Date().toISOString(),
    };
    this.profiles.set(caller, profile);
    this.emit(REGISTRY_EVENTS.PROFILE_UPDATED, caller, {
      party: caller,
      fields: Object.keys(changes).sort(),
    });
    return profile;
  }

  get(party: Party): Profile | undefined {
    return this.profiles.get(party);
  }

  isRegistered(party: Party): boolean {
    return this.profiles.has(party);
  }

  count(): number {
    return this.profiles.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private assertParty(party: Party): void {
    if (!isParty(party)) {
      throw new RegistryError("INVALID_ADDRESS", `Invalid party: "${party}"`);
    }
  }

  private emit(type: string, actor: Party, payload: Readonly<Record<string, unknown>>): void {
    this.operationSeq++;
    this.events.append(STREAM_ID, [
      {
        type,
        metadata: {
          eventId: randomUUID(),
          timestamp: new Date().toISOString(),
          actor,
          correlationId: `${STREAM_ID}:op-${String(this.operationSeq)}`,
          source: "registry",
        },
        payload,
      },
    ]);
  }
}

function parse<T>(schema: ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodErrors(result.error);
    throw new RegistryError(
      "VALIDATION_FAILED",
      `Invalid profile: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      issues,
    );
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
