/**
 * Synth Engine - Calculator Utilities
 *
 * Pure fixed-point math for health ratio, mint capacity, fees and
 * liquidation amounts. Every operation is checked: values are unsigned
 * 128-bit integers and any overflow, underflow or division by zero throws
 * ArithmeticError instead of wrapping. Division truncates toward zero.
 */

import { formatUnits } from "ethers";
import {
  LIQUIDATION_BONUS,
  LIQUIDATION_PENALTY,
  MIN_COLLATERAL_RATIO,
  MINTING_FEE_BPS,
} from "./constants";
import { EngineError } from "./errors";

/** 1.0 in 8-decimal fixed point */
export const PRICE_PRECISION = 100_000_000n;
export const PRICE_DECIMALS = 8;

/** Basis points denominator */
export const BPS = 10_000n;

/** Percent denominator */
export const PERCENT = 100n;

/** Collateral ratio (percent) scaled down to price precision: 1e8 / 100 */
export const RATIO_SCALE = 1_000_000n;

export const MAX_UINT = (1n << 128n) - 1n;

/** Legacy wire value for a position without debt */
export const HEALTH_SENTINEL = 999_999n;

// ============================================================
//                     CHECKED ARITHMETIC
// ============================================================

function requireUint(value: bigint, op: string): bigint {
  if (value < 0n) {
    throw new EngineError("ArithmeticError", `${op} underflow`);
  }
  if (value > MAX_UINT) {
    throw new EngineError("ArithmeticError", `${op} overflow`);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  requireUint(a, "add");
  requireUint(b, "add");
  return requireUint(a + b, "add");
}

export function checkedSub(a: bigint, b: bigint): bigint {
  requireUint(a, "sub");
  requireUint(b, "sub");
  return requireUint(a - b, "sub");
}

export function checkedMul(a: bigint, b: bigint): bigint {
  requireUint(a, "mul");
  requireUint(b, "mul");
  return requireUint(a * b, "mul");
}

export function checkedDiv(a: bigint, b: bigint): bigint {
  requireUint(a, "div");
  requireUint(b, "div");
  if (b === 0n) {
    throw new EngineError("ArithmeticError", "division by zero");
  }
  return a / b;
}

// ============================================================
//                     HEALTH
// ============================================================

/** Collateral ratio of a position; `unbounded` when there is no debt */
export type Health =
  | { readonly kind: "ratio"; readonly value: bigint }
  | { readonly kind: "unbounded" };

export const UNBOUNDED: Health = { kind: "unbounded" };

export function ratio(value: bigint): Health {
  return { kind: "ratio", value };
}

/**
 * Calculate position health as a percentage.
 * health = (collateral * price * 100) / (debt * 1e8)
 */
export function calculatePositionHealth(
  collateral: bigint,
  debt: bigint,
  price: bigint,
): Health {
  if (debt === 0n) return UNBOUNDED;
  const numerator = checkedMul(checkedMul(collateral, price), PERCENT);
  const denominator = checkedMul(debt, PRICE_PRECISION);
  return ratio(checkedDiv(numerator, denominator));
}

/** An unbounded health is never below any threshold */
export function isHealthBelow(health: Health, threshold: bigint): boolean {
  return health.kind === "ratio" && health.value < threshold;
}

export function isHealthAtLeast(health: Health, threshold: bigint): boolean {
  return !isHealthBelow(health, threshold);
}

/** Serialized form; the sentinel stands in for `unbounded` */
export function healthToNumber(health: Health): bigint {
  return health.kind === "unbounded" ? HEALTH_SENTINEL : health.value;
}

/** Sorts unbounded last */
export function compareHealth(a: Health, b: Health): number {
  if (a.kind === "unbounded") return b.kind === "unbounded" ? 0 : 1;
  if (b.kind === "unbounded") return -1;
  if (a.value === b.value) return 0;
  return a.value < b.value ? -1 : 1;
}

// ============================================================
//                     MINTING
// ============================================================

/**
 * Maximum total debt a collateral amount supports at a given price.
 * max = (collateral * price) / (ratio * 1e6)
 */
export function calculateMaxMintable(
  collateral: bigint,
  price: bigint,
  collateralRatio: bigint = MIN_COLLATERAL_RATIO,
): bigint {
  return checkedDiv(
    checkedMul(collateral, price),
    checkedMul(collateralRatio, RATIO_SCALE),
  );
}

export function calculateMintingFee(amount: bigint): bigint {
  return checkedDiv(checkedMul(amount, MINTING_FEE_BPS), BPS);
}

// ============================================================
//                     LIQUIDATION
// ============================================================

export interface LiquidationAmounts {
  /** Collateral equivalent of the covered debt at the current price */
  collateralValue: bigint;
  /** Paid to the liquidator from custody */
  reward: bigint;
  /** Deducted from the position on top of collateralValue */
  penalty: bigint;
}

export function calculateLiquidationAmounts(
  debtToCover: bigint,
  price: bigint,
): LiquidationAmounts {
  const collateralValue = checkedDiv(checkedMul(debtToCover, PRICE_PRECISION), price);
  const reward = checkedDiv(
    checkedMul(collateralValue, checkedAdd(PERCENT, LIQUIDATION_BONUS)),
    PERCENT,
  );
  const penalty = checkedDiv(checkedMul(collateralValue, LIQUIDATION_PENALTY), PERCENT);
  return { collateralValue, reward, penalty };
}

/** Human-readable 8-decimal price, e.g. 90000000n → "0.9" */
export function formatPrice(price: bigint): string {
  return formatUnits(price, PRICE_DECIMALS);
}
