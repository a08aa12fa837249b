/**
 * @custody/registry — Profile registry.
 *
 * Stores one name/age/email profile per party, validated with zod.
 * Has no access to any vault or ledger.
 */

export { ProfileRegistry } from "./profile-registry.js";
export {
  ProfileSchema,
  ProfileUpdateSchema,
  RegistryError,
  REGISTRY_EVENTS,
} from "./types.js";
export type {
  Profile,
  ProfileInput,
  ProfileUpdate,
  RegistryErrorCode,
  ValidationIssue,
} from "./types.js";
