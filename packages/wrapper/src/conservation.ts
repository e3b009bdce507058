/**
 * Conservation audit.
 *
 * Compares the synthetic side (supply, balances) with the coins the
 * wrapper actually holds. Read-only.
 */

import { sumAmounts } from "@coinwrap/ledger";
import type { ConservationReport } from "./types.js";
import type { WrapperLedger } from "./wrapper-ledger.js";

export function auditConservation(wrapper: WrapperLedger): ConservationReport {
  const totalSupply = wrapper.totalSupply();
  const sumOfBalances = sumAmounts(wrapper.holders().map((h) => wrapper.balanceOf(h)));
  const reserve = wrapper.reserve();

  return {
    totalSupply,
    sumOfBalances,
    reserve,
    surplus: reserve - totalSupply,
    balanced: sumOfBalances === totalSupply && totalSupply === reserve,
    backed: totalSupply <= reserve,
  };
}
