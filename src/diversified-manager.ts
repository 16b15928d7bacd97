/**
 * Synth Engine - Diversified Position Manager
 *
 * Multi-asset deposits (2 to MAX_DIVERSIFIED_ASSETS legs) earn a lower
 * required collateral ratio. "mint" commits the projected position;
 * "deposit-only" is a quote: the same figures are returned, nothing is
 * written.
 */

import {
  Health,
  calculateMaxMintable,
  calculatePositionHealth,
  checkedAdd,
  checkedDiv,
  checkedMul,
  checkedSub,
  isHealthBelow,
} from "./calculator";
import {
  DIVERSIFICATION_BONUS_HIGH,
  DIVERSIFICATION_BONUS_LOW,
  MAX_DIVERSIFIED_ASSETS,
  MAX_POSITION_PERCENTAGE,
  MIN_AVG_RISK_SCORE,
  MIN_COLLATERAL_RATIO,
  PROTECTION_BONUS_THRESHOLD,
} from "./constants";
import { EngineError } from "./errors";
import { PositionLedger } from "./position-ledger";
import { PriceOracleFeed } from "./price-feed";
import { EngineState, Identity } from "./state";

export type DiversifiedOperation = "mint" | "deposit-only";

export interface DiversifiedRequest {
  assetIds: string[];
  amounts: bigint[];
  operation: DiversifiedOperation;
  /** Debt to mint; only applied when operation is "mint" */
  syntheticAmount: bigint;
  riskScores: bigint[];
}

export interface DiversifiedResult {
  healthRatio: Health;
  diversificationBonus: bigint;
  maxAdditionalMintable: bigint;
  avgRiskScore: bigint;
  collateralLocked: bigint;
}

function sum(values: bigint[]): bigint {
  return values.reduce((acc, v) => checkedAdd(acc, v), 0n);
}

export class DiversifiedPositionManager {
  constructor(
    private readonly state: EngineState,
    private readonly ledger: PositionLedger,
    private readonly feed: PriceOracleFeed,
  ) {}

  manage(account: Identity, request: DiversifiedRequest, now: bigint): DiversifiedResult {
    const { assetIds, amounts, riskScores, operation, syntheticAmount } = request;
    const count = assetIds.length;
    if (amounts.length !== count || riskScores.length !== count) {
      throw new EngineError("InvalidAmount", "assetIds, amounts and riskScores must have equal length");
    }
    if (count <= 1) {
      throw new EngineError("InvalidAmount", "diversified positions need at least two assets");
    }
    if (count > MAX_DIVERSIFIED_ASSETS) {
      throw new EngineError("InvalidAmount", `at most ${MAX_DIVERSIFIED_ASSETS} assets per position`);
    }
    if (this.state.global.paused) {
      throw new EngineError("ContractPaused", "diversified positions are paused");
    }
    const price = this.feed.requireFreshPrice(now);

    const totalCollateralValue = sum(amounts);
    const avgRiskScore = checkedDiv(sum(riskScores), BigInt(count));
    const diversificationBonus = count > 2 ? DIVERSIFICATION_BONUS_HIGH : DIVERSIFICATION_BONUS_LOW;
    const adjustedRatio = checkedSub(MIN_COLLATERAL_RATIO, diversificationBonus);
    const maxMintable = calculateMaxMintable(totalCollateralValue, price, adjustedRatio);

    const position = this.ledger.openOrGet(account);
    const minting = operation === "mint";
    const projectedDebt = minting
      ? checkedAdd(position.syntheticMinted, syntheticAmount)
      : position.syntheticMinted;
    const projectedCollateral = checkedAdd(position.collateralDeposited, totalCollateralValue);
    const newHealth = calculatePositionHealth(projectedCollateral, projectedDebt, price);

    // Share is measured against the committed system total, before this basket
    const global = this.state.global;
    const positionShare = checkedDiv(checkedMul(projectedCollateral, 100n), global.totalCollateral);

    if (positionShare > MAX_POSITION_PERCENTAGE) {
      throw new EngineError(
        "ExceedsMaxPosition",
        `position would hold ${positionShare}% of collateral (max ${MAX_POSITION_PERCENTAGE}%)`,
      );
    }
    if (isHealthBelow(newHealth, MIN_COLLATERAL_RATIO)) {
      throw new EngineError("InsufficientCollateral", `projected health below ${MIN_COLLATERAL_RATIO}`);
    }
    if (syntheticAmount > maxMintable) {
      throw new EngineError(
        "InsufficientCollateral",
        `syntheticAmount ${syntheticAmount} exceeds max mintable ${maxMintable}`,
      );
    }
    if (avgRiskScore < MIN_AVG_RISK_SCORE) {
      throw new EngineError(
        "InvalidAmount",
        `average risk score ${avgRiskScore} below ${MIN_AVG_RISK_SCORE}`,
      );
    }

    if (minting) {
      position.collateralDeposited = projectedCollateral;
      position.syntheticMinted = projectedDebt;
      position.positionHealth = newHealth;
      position.lastInteractionBlock = now;
      position.liquidationProtected = diversificationBonus > PROTECTION_BONUS_THRESHOLD;
      this.ledger.put(account, position);

      global.totalCollateral = checkedAdd(global.totalCollateral, totalCollateralValue);
      global.totalSyntheticSupply = checkedAdd(global.totalSyntheticSupply, syntheticAmount);
    }

    return {
      healthRatio: newHealth,
      diversificationBonus,
      maxAdditionalMintable: maxMintable,
      avgRiskScore,
      collateralLocked: projectedCollateral,
    };
  }
}
