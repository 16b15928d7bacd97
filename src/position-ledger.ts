/**
 * Synth Engine - Position Ledger
 *
 * Per-account collateral/debt bookkeeping plus the deposit and mint paths.
 *
 * Mint rules:
 *   1. position must exist and the engine must not be paused
 *   2. the price must be fresh and total debt after the mint must stay
 *      within calculateMaxMintable()
 *   3. COOLDOWN_BLOCKS must have elapsed since the position's last
 *      interaction (deposits reset it)
 *   4. the minting fee is withheld from the returned amount; the position
 *      and total supply are charged the gross amount
 */

import {
  calculateMaxMintable,
  calculateMintingFee,
  calculatePositionHealth,
  checkedAdd,
  checkedSub,
} from "./calculator";
import { COOLDOWN_BLOCKS } from "./constants";
import { EngineError } from "./errors";
import { PriceOracleFeed } from "./price-feed";
import { EngineState, Identity, Position, copyPosition, emptyPosition } from "./state";

export interface MintResult {
  gross: bigint;
  fee: bigint;
  net: bigint;
}

export class PositionLedger {
  constructor(
    private readonly state: EngineState,
    private readonly feed: PriceOracleFeed,
  ) {}

  get(account: Identity): Position | undefined {
    const position = this.state.positions.get(account);
    return position ? copyPosition(position) : undefined;
  }

  /** Existing position, or a zero position that is not stored until committed */
  openOrGet(account: Identity): Position {
    return this.get(account) ?? emptyPosition();
  }

  /** Replace the stored position; callers validate before writing */
  put(account: Identity, position: Position): void {
    this.state.positions.set(account, copyPosition(position));
  }

  applyDeposit(account: Identity, amount: bigint, now: bigint): void {
    if (this.state.global.paused) {
      throw new EngineError("ContractPaused", "deposits are paused");
    }
    if (amount <= 0n) {
      throw new EngineError("InvalidAmount", "deposit amount must be positive");
    }

    const position = this.openOrGet(account);
    position.collateralDeposited = checkedAdd(position.collateralDeposited, amount);
    position.lastInteractionBlock = now;

    const global = this.state.global;
    global.totalCollateral = checkedAdd(global.totalCollateral, amount);
    this.put(account, position);
  }

  applyMint(account: Identity, amount: bigint, now: bigint): MintResult {
    const position = this.get(account);
    if (!position) {
      throw new EngineError("PositionNotFound", `no position for ${account}`);
    }
    if (this.state.global.paused) {
      throw new EngineError("ContractPaused", "minting is paused");
    }
    if (amount <= 0n) {
      throw new EngineError("InvalidAmount", "mint amount must be positive");
    }
    const price = this.feed.requireFreshPrice(now);

    // Capacity before cooldown: an over-limit mint reports InsufficientCollateral in any block
    const newDebt = checkedAdd(position.syntheticMinted, amount);
    const maxMintable = calculateMaxMintable(position.collateralDeposited, price);
    if (newDebt > maxMintable) {
      throw new EngineError(
        "InsufficientCollateral",
        `debt ${newDebt} would exceed max mintable ${maxMintable}`,
      );
    }
    const elapsed = checkedSub(now, position.lastInteractionBlock);
    if (elapsed < COOLDOWN_BLOCKS) {
      throw new EngineError(
        "InvalidAmount",
        `cooldown: ${elapsed} of ${COOLDOWN_BLOCKS} blocks elapsed`,
      );
    }

    position.syntheticMinted = newDebt;
    position.positionHealth = calculatePositionHealth(position.collateralDeposited, newDebt, price);
    position.lastInteractionBlock = now;

    const global = this.state.global;
    global.totalSyntheticSupply = checkedAdd(global.totalSyntheticSupply, amount);
    this.put(account, position);

    const fee = calculateMintingFee(amount);
    return { gross: amount, fee, net: checkedSub(amount, fee) };
  }

  accounts(): Identity[] {
    return [...this.state.positions.keys()];
  }
}
