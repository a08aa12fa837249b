/**
 * @custody/host — External value transfer.
 *
 * Models the environment the vault runs in: native value held per party,
 * a transfer primitive, and receive hooks that run synchronously inside
 * a transfer and may re-enter the sender.
 */

export { ValueHost } from "./value-host.js";
export { HostError } from "./types.js";

export type {
  ValueReceiver,
  TransferFailureReason,
  TransferOutcome,
  TransferPrimitive,
  TransferRecord,
  ValueHostOptions,
  HostErrorCode,
} from "./types.js";
