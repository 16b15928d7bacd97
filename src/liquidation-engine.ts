/**
 * Synth Engine - Liquidation Engine
 *
 * Partial liquidation of positions whose live health is below
 * LIQUIDATION_THRESHOLD. A single call may cover at most half of the
 * outstanding debt.
 *
 *   collateralValue = debtToCover * 1e8 / price
 *   reward          = collateralValue * (100 + bonus) / 100   → liquidator
 *   penalty         = collateralValue * penalty / 100         → deducted
 *
 * The position loses collateralValue + penalty. totalCollateral is left
 * untouched, so it drifts above the sum of position balances after each
 * liquidation; see reconcile().
 */

import {
  Health,
  calculateLiquidationAmounts,
  calculatePositionHealth,
  checkedAdd,
  checkedDiv,
  checkedSub,
  compareHealth,
  isHealthBelow,
} from "./calculator";
import { LIQUIDATION_THRESHOLD } from "./constants";
import { EngineError } from "./errors";
import { PositionLedger } from "./position-ledger";
import { PriceOracleFeed, isFresh } from "./price-feed";
import { EngineState, Identity, LiquidationRecord } from "./state";

/** Moves `amount` between identities; throws to abort the liquidation */
export type RewardTransfer = (amount: bigint, to: Identity) => void;

export interface LiquidationAssessment {
  account: Identity;
  health: Health;
  liquidatable: boolean;
  priceFresh: boolean;
  /** Largest debtToCover a single liquidation may request */
  maxDebtToCover: bigint;
}

export class LiquidationEngine {
  constructor(
    private readonly state: EngineState,
    private readonly ledger: PositionLedger,
    private readonly feed: PriceOracleFeed,
  ) {}

  liquidate(
    liquidator: Identity,
    account: Identity,
    debtToCover: bigint,
    now: bigint,
    transferReward: RewardTransfer,
  ): bigint {
    if (this.state.global.paused) {
      throw new EngineError("ContractPaused", "liquidations are paused");
    }
    const position = this.ledger.get(account);
    if (!position) {
      throw new EngineError("PositionNotFound", `no position for ${account}`);
    }
    const price = this.feed.getCurrentPrice();
    const health = calculatePositionHealth(
      position.collateralDeposited,
      position.syntheticMinted,
      price,
    );
    if (!isHealthBelow(health, LIQUIDATION_THRESHOLD)) {
      throw new EngineError(
        "LiquidationNotAllowed",
        `${account} health is not below ${LIQUIDATION_THRESHOLD}`,
      );
    }
    this.feed.requireFreshPrice(now);
    const maxDebtToCover = checkedDiv(position.syntheticMinted, 2n);
    if (debtToCover > maxDebtToCover) {
      throw new EngineError(
        "InvalidAmount",
        `debtToCover ${debtToCover} exceeds half of outstanding debt (${maxDebtToCover})`,
      );
    }
    if (debtToCover <= 0n) {
      throw new EngineError("InvalidAmount", "debtToCover must be positive");
    }

    const { collateralValue, reward, penalty } = calculateLiquidationAmounts(debtToCover, price);
    const collateralSeized = checkedAdd(collateralValue, penalty);

    position.collateralDeposited = checkedSub(position.collateralDeposited, collateralSeized);
    position.syntheticMinted = checkedSub(position.syntheticMinted, debtToCover);
    position.positionHealth = calculatePositionHealth(
      position.collateralDeposited,
      position.syntheticMinted,
      price,
    );
    position.lastInteractionBlock = now;
    this.ledger.put(account, position);

    const global = this.state.global;
    const liquidationId = global.liquidationNonce;
    const record: LiquidationRecord = {
      account,
      liquidator,
      collateralSeized,
      debtCovered: debtToCover,
      reward,
      blockHeight: now,
    };
    this.state.liquidations.set(liquidationId, record);
    global.liquidationNonce = checkedAdd(liquidationId, 1n);
    global.totalSyntheticSupply = checkedSub(global.totalSyntheticSupply, debtToCover);

    // Last: nothing after a successful transfer can fail
    transferReward(reward, liquidator);
    return liquidationId;
  }

  assess(account: Identity, now: bigint): LiquidationAssessment | undefined {
    const position = this.ledger.get(account);
    if (!position) return undefined;
    const health = calculatePositionHealth(
      position.collateralDeposited,
      position.syntheticMinted,
      this.feed.getCurrentPrice(),
    );
    return {
      account,
      health,
      liquidatable: isHealthBelow(health, LIQUIDATION_THRESHOLD),
      priceFresh: isFresh(this.feed.getLastPriceUpdate(), now),
      maxDebtToCover: checkedDiv(position.syntheticMinted, 2n),
    };
  }

  /** Liquidatable positions, unhealthiest first */
  findLiquidatable(now: bigint): LiquidationAssessment[] {
    const found: LiquidationAssessment[] = [];
    for (const account of this.ledger.accounts()) {
      const assessment = this.assess(account, now);
      if (assessment?.liquidatable) found.push(assessment);
    }
    return found.sort((a, b) => compareHealth(a.health, b.health));
  }

  get(liquidationId: bigint): LiquidationRecord | undefined {
    const record = this.state.liquidations.get(liquidationId);
    return record ? { ...record } : undefined;
  }

  count(): bigint {
    return this.state.global.liquidationNonce;
  }
}
