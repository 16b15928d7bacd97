/**
 * Synth Engine - State Model
 *
 * Everything the engine mutates lives in one EngineState value, owned by a
 * SolvencyEngine instance and handed to the components per transaction.
 * There is no module-level state.
 */

import { Health, UNBOUNDED } from "./calculator";

/** Opaque account / oracle / custody identifier */
export type Identity = string;

export interface Position {
  collateralDeposited: bigint;
  syntheticMinted: bigint;
  lastInteractionBlock: bigint;
  positionHealth: Health;
  liquidationProtected: boolean;
}

export interface Oracle {
  isActive: boolean;
  totalSubmissions: bigint;
  credibilityScore: bigint;
}

export interface PriceSubmission {
  oracle: Identity;
  assetId: string;
  /** 8-decimal fixed point */
  price: bigint;
  /** 0–100 */
  confidence: bigint;
  timestamp: bigint;
}

export interface LiquidationRecord {
  account: Identity;
  liquidator: Identity;
  collateralSeized: bigint;
  debtCovered: bigint;
  reward: bigint;
  blockHeight: bigint;
}

export interface GlobalState {
  totalCollateral: bigint;
  totalSyntheticSupply: bigint;
  currentPrice: bigint;
  lastPriceUpdate: bigint;
  paused: boolean;
  submissionNonce: bigint;
  liquidationNonce: bigint;
}

export interface EngineState {
  global: GlobalState;
  positions: Map<Identity, Position>;
  oracles: Map<Identity, Oracle>;
  /** Keyed by submissionKey(assetId, submissionId) */
  submissions: Map<string, PriceSubmission>;
  liquidations: Map<bigint, LiquidationRecord>;
}

export function createInitialState(): EngineState {
  return {
    global: {
      totalCollateral: 0n,
      totalSyntheticSupply: 0n,
      currentPrice: 0n,
      lastPriceUpdate: 0n,
      paused: false,
      submissionNonce: 0n,
      liquidationNonce: 0n,
    },
    positions: new Map(),
    oracles: new Map(),
    submissions: new Map(),
    liquidations: new Map(),
  };
}

export function emptyPosition(): Position {
  return {
    collateralDeposited: 0n,
    syntheticMinted: 0n,
    lastInteractionBlock: 0n,
    positionHealth: UNBOUNDED,
    liquidationProtected: false,
  };
}

export function submissionKey(assetId: string, submissionId: bigint): string {
  return `${assetId}:${submissionId}`;
}

/** Deep copy; bigint, Map and plain objects all survive structuredClone */
export function cloneState(state: EngineState): EngineState {
  return structuredClone(state);
}

export function copyPosition(position: Position): Position {
  return { ...position };
}
