/**
 * Custody account address derivation.
 *
 * Same wrapper and nonce → same address. The nonce travels in the
 * snapshot, so a restored wrapper continues the same sequence.
 */

import { createHash } from "node:crypto";
import type { Address } from "@coinwrap/types";

export function deriveAccountAddress(wrapper: Address, nonce: number): Address {
  const digest = createHash("sha256")
    .update(`${wrapper.toLowerCase()}:custody:${nonce}`)
    .digest("hex");
  return `0x${digest.slice(0, 40)}`;
}
