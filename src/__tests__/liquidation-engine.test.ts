/**
 * LiquidationEngine tests
 *
 * Baseline: ALICE deposits 200 and mints 100 at price 1.0 (health 200).
 * Dropping the price to 0.55 puts her at health 110, under the 120
 * threshold.
 */

import { ratio } from "../calculator";
import { isEngineError } from "../errors";
import {
  ADMIN,
  ALICE,
  BOB,
  CAROL,
  CUSTODY,
  LIQUIDATOR,
  START_BLOCK,
  TestContext,
  catchEngineError,
  depositAs,
  publish,
  setup,
  withPrice,
} from "./fixtures";

const CRASH_PRICE = 55_000_000n;

function openPosition(ctx: TestContext, account: string, collateral: bigint, debt: bigint): void {
  depositAs(ctx, account, collateral);
  ctx.host.advanceBlocks(10n);
  ctx.engine.mint(debt);
}

describe("LiquidationEngine", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = withPrice(setup());
    ctx.host.fund(CUSTODY, 1_000_000n);
    openPosition(ctx, ALICE, 200n, 100n);
  });

  it("should refuse to liquidate a healthy position", () => {
    ctx.host.actAs(LIQUIDATOR);
    expect(catchEngineError(() => ctx.engine.liquidate(ALICE, 10n)).code).toBe("LiquidationNotAllowed");
  });

  it("should refuse at exactly the threshold", () => {
    // 200 * 0.6 / 100 = 120%
    publish(ctx, 60_000_000n);
    ctx.host.actAs(LIQUIDATOR);
    expect(catchEngineError(() => ctx.engine.liquidate(ALICE, 10n)).code).toBe("LiquidationNotAllowed");
  });

  it("should refuse positions without debt and unknown accounts", () => {
    depositAs(ctx, BOB, 500n);
    publish(ctx, CRASH_PRICE);
    ctx.host.actAs(LIQUIDATOR);

    expect(catchEngineError(() => ctx.engine.liquidate(BOB, 1n)).code).toBe("LiquidationNotAllowed");
    expect(catchEngineError(() => ctx.engine.liquidate("nobody", 1n)).code).toBe("PositionNotFound");
  });

  it("should never seize more collateral than the position holds", () => {
    // At 0.1: collateralValue = 50 * 1e8 / 1e7 = 500, penalty 25, seizure 525 > 200
    publish(ctx, 10_000_000n);
    ctx.host.actAs(LIQUIDATOR);
    const before = ctx.engine.snapshot();

    expect(catchEngineError(() => ctx.engine.liquidate(ALICE, 50n)).code).toBe("ArithmeticError");
    expect(ctx.engine.snapshot()).toEqual(before);
    expect(ctx.engine.getPosition(ALICE)?.collateralDeposited).toBe(200n);
    expect(ctx.host.balanceOf(CUSTODY)).toBe(1_000_000n);
    expect(ctx.host.transfers).toEqual([]);
    expect(ctx.engine.liquidationCount()).toBe(0n);
  });

  describe("after a price drop", () => {
    beforeEach(() => {
      publish(ctx, CRASH_PRICE);
      ctx.host.actAs(LIQUIDATOR);
    });

    it("should seize collateral, pay the reward and record the liquidation", () => {
      const now = ctx.host.blockHeight();
      const id = ctx.engine.liquidate(ALICE, 50n);

      // collateralValue = 50 * 1e8 / 0.55e8 = 90; reward = 99; penalty = 4
      expect(id).toBe(0n);
      expect(ctx.engine.getLiquidation(0n)).toEqual({
        account: ALICE,
        liquidator: LIQUIDATOR,
        collateralSeized: 94n,
        debtCovered: 50n,
        reward: 99n,
        blockHeight: now,
      });
      expect(ctx.engine.getPosition(ALICE)).toEqual({
        collateralDeposited: 106n,
        syntheticMinted: 50n,
        lastInteractionBlock: now,
        positionHealth: ratio(116n),
        liquidationProtected: false,
      });
      expect(ctx.host.balanceOf(LIQUIDATOR)).toBe(99n);
      expect(ctx.host.balanceOf(CUSTODY)).toBe(999_901n);
      expect(ctx.engine.getGlobalState().totalSyntheticSupply).toBe(50n);
    });

    it("should leave totalCollateral untouched so it drifts above the sum of positions", () => {
      ctx.engine.liquidate(ALICE, 50n);

      const report = ctx.engine.reconcile();
      expect(report.totalCollateral).toBe(200n);
      expect(report.sumCollateral).toBe(106n);
      expect(report.collateralDrift).toBe(94n);
      expect(report.syntheticDrift).toBe(0n);
      expect(report.balanced).toBe(false);
    });

    it("should issue increasing liquidation ids", () => {
      ctx.engine.liquidate(ALICE, 50n);
      // health 116 is still liquidatable; cap is now 25
      const second = ctx.engine.liquidate(ALICE, 25n);

      expect(second).toBe(1n);
      expect(ctx.engine.liquidationCount()).toBe(2n);
      expect(ctx.engine.getPosition(ALICE)?.collateralDeposited).toBe(59n);
      expect(ctx.engine.getPosition(ALICE)?.syntheticMinted).toBe(25n);
    });

    it("should cap a single liquidation at half the outstanding debt", () => {
      expect(catchEngineError(() => ctx.engine.liquidate(ALICE, 51n)).code).toBe("InvalidAmount");
      expect(catchEngineError(() => ctx.engine.liquidate(ALICE, 0n)).code).toBe("InvalidAmount");
    });

    it("should reject a stale price even when health qualifies", () => {
      ctx.host.advanceBlocks(100n);
      expect(catchEngineError(() => ctx.engine.liquidate(ALICE, 10n)).code).toBe("StalePrice");
    });

    it("should reject liquidations while paused", () => {
      ctx.host.actAs(ADMIN);
      ctx.engine.pause();
      ctx.host.actAs(LIQUIDATOR);
      expect(catchEngineError(() => ctx.engine.liquidate(ALICE, 10n)).code).toBe("ContractPaused");
    });

    it("should roll back everything when the reward transfer fails", () => {
      const before = ctx.engine.snapshot();
      ctx.host.failTransfers = true;

      expect(catchEngineError(() => ctx.engine.liquidate(ALICE, 50n)).code).toBe("TransferFailed");
      expect(ctx.engine.snapshot()).toEqual(before);
      expect(ctx.engine.liquidationCount()).toBe(0n);
    });

    it("should fail with TransferFailed when custody cannot cover the reward", () => {
      const drained = withPrice(setup());
      openPosition(drained, ALICE, 200n, 100n);
      publish(drained, CRASH_PRICE);
      drained.host.actAs(LIQUIDATOR);

      expect(catchEngineError(() => drained.engine.liquidate(ALICE, 50n)).code).toBe("TransferFailed");
      expect(drained.engine.getPosition(ALICE)?.syntheticMinted).toBe(100n);
    });

    it("should wrap unexpected transfer errors as TransferFailed", () => {
      jest.spyOn(ctx.host, "transfer").mockImplementation(() => {
        throw new Error("ledger offline");
      });

      const err = catchEngineError(() => ctx.engine.liquidate(ALICE, 50n));
      expect(err.code).toBe("TransferFailed");
      expect(err.cause).toBeInstanceOf(Error);
      expect(isEngineError(err.cause)).toBe(false);
    });
  });

  describe("scanning", () => {
    it("should assess a single position", () => {
      publish(ctx, CRASH_PRICE);
      expect(ctx.engine.assessLiquidation(ALICE)).toEqual({
        account: ALICE,
        health: ratio(110n),
        liquidatable: true,
        priceFresh: true,
        maxDebtToCover: 50n,
      });
      expect(ctx.engine.assessLiquidation("nobody")).toBeUndefined();
    });

    it("should list liquidatable positions, unhealthiest first", () => {
      openPosition(ctx, BOB, 1_000n, 100n);
      openPosition(ctx, CAROL, 150n, 100n);
      publish(ctx, CRASH_PRICE);

      // ALICE 110, BOB 550, CAROL 82
      const found = ctx.engine.findLiquidatable();
      expect(found.map((a) => a.account)).toEqual([CAROL, ALICE]);
      expect(found.map((a) => a.health)).toEqual([ratio(82n), ratio(110n)]);
      expect(ctx.host.blockHeight()).toBe(START_BLOCK + 30n);
    });
  });
});
