// Synth Engine - Totals Reconciliation
//
// Compares the global totals against the sum of every position. Drift is
// expected on totalCollateral after liquidations (seized collateral and
// penalty are removed from the position only) and is reported, not fixed.

import { EngineState } from "./state";

export interface ReconciliationReport {
  positions: number;
  sumCollateral: bigint;
  sumSynthetic: bigint;
  totalCollateral: bigint;
  totalSyntheticSupply: bigint;
  /** totalCollateral - sumCollateral */
  collateralDrift: bigint;
  /** totalSyntheticSupply - sumSynthetic */
  syntheticDrift: bigint;
  balanced: boolean;
}

export function reconcile(state: EngineState): ReconciliationReport {
  let sumCollateral = 0n;
  let sumSynthetic = 0n;
  for (const position of state.positions.values()) {
    sumCollateral += position.collateralDeposited;
    sumSynthetic += position.syntheticMinted;
  }

  const { totalCollateral, totalSyntheticSupply } = state.global;
  const collateralDrift = totalCollateral - sumCollateral;
  const syntheticDrift = totalSyntheticSupply - sumSynthetic;

  return {
    positions: state.positions.size,
    sumCollateral,
    sumSynthetic,
    totalCollateral,
    totalSyntheticSupply,
    collateralDrift,
    syntheticDrift,
    balanced: collateralDrift === 0n && syntheticDrift === 0n,
  };
}
