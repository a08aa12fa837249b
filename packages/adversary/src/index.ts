/**
 * @custody/adversary — Re-entrancy attack harness.
 *
 * A host receiver that calls back into whichever vault pays it, used to
 * show that SecureVault refuses nested withdrawals and VulnerableVault
 * does not.
 */

export { ReentrancyAttacker } from "./reentrancy-attacker.js";

export type { AttackerConfig, AttackReport, ReentryObservation } from "./types.js";
