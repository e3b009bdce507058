/**
 * @coinwrap/wrapper — Custody accounts and 1:1 wrapping.
 *
 * - CustodyAccount: per-user holding address, controller-gated collection
 * - WrapperLedger: the synthetic token, wrap / unwrap
 * - auditConservation: supply vs. reserve check
 *
 * Design rules:
 * - The wrapper never issues a unit it has not collected
 * - All state changes go through the shared journal
 */

export { WrapperLedger } from "./wrapper-ledger.js";
export { CustodyAccount } from "./custody-account.js";
export { CustodyRegistry } from "./custody-registry.js";
export { deriveAccountAddress } from "./address.js";
export { auditConservation } from "./conservation.js";

export type {
  WrapperConfig,
  WrapperDependencies,
  WrapperSnapshot,
  CustodyRecord,
  ConservationReport,
  WrapperErrorCode,
} from "./types.js";

export { WrapperError } from "./types.js";
