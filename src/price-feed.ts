/**
 * Synth Engine - Price Oracle Feed
 *
 * Validates and records oracle price submissions. Submissions are stored
 * per (assetId, submissionId) for audit, but every accepted submission
 * overwrites the one global current price: the feed does not partition the
 * price signal by asset.
 */

import { checkedAdd, checkedSub } from "./calculator";
import {
  MAX_ORACLE_CONFIDENCE,
  MIN_ORACLE_CONFIDENCE,
  ORACLE_STALENESS_LIMIT,
} from "./constants";
import { EngineError } from "./errors";
import { OracleRegistry } from "./oracle-registry";
import { EngineState, Identity, PriceSubmission, submissionKey } from "./state";

/**
 * A price is fresh while fewer than ORACLE_STALENESS_LIMIT blocks have
 * passed since its update.
 */
export function isFresh(lastUpdate: bigint, now: bigint): boolean {
  return checkedSub(now, lastUpdate) < ORACLE_STALENESS_LIMIT;
}

export class PriceOracleFeed {
  constructor(
    private readonly state: EngineState,
    private readonly registry: OracleRegistry,
  ) {}

  submit(
    oracleId: Identity,
    assetId: string,
    price: bigint,
    confidence: bigint,
    now: bigint,
  ): bigint {
    this.registry.requireActive(oracleId);
    if (this.state.global.paused) {
      throw new EngineError("ContractPaused", "price submissions are paused");
    }
    if (confidence < MIN_ORACLE_CONFIDENCE) {
      throw new EngineError(
        "InvalidAmount",
        `confidence ${confidence} below minimum ${MIN_ORACLE_CONFIDENCE}`,
      );
    }
    if (confidence > MAX_ORACLE_CONFIDENCE) {
      throw new EngineError("InvalidAmount", `confidence ${confidence} above ${MAX_ORACLE_CONFIDENCE}`);
    }
    if (price <= 0n) {
      throw new EngineError("InvalidAmount", "price must be positive");
    }

    const global = this.state.global;
    const submissionId = global.submissionNonce;
    const submission: PriceSubmission = {
      oracle: oracleId,
      assetId,
      price,
      confidence,
      timestamp: now,
    };
    this.state.submissions.set(submissionKey(assetId, submissionId), submission);
    global.submissionNonce = checkedAdd(submissionId, 1n);
    this.registry.recordSubmission(oracleId);

    global.currentPrice = price;
    global.lastPriceUpdate = now;
    return submissionId;
  }

  requireFreshPrice(now: bigint): bigint {
    const { currentPrice, lastPriceUpdate } = this.state.global;
    if (!isFresh(lastPriceUpdate, now)) {
      throw new EngineError(
        "StalePrice",
        `price last updated at block ${lastPriceUpdate}, now ${now}`,
      );
    }
    return currentPrice;
  }

  getCurrentPrice(): bigint {
    return this.state.global.currentPrice;
  }

  getLastPriceUpdate(): bigint {
    return this.state.global.lastPriceUpdate;
  }

  getSubmission(assetId: string, submissionId: bigint): PriceSubmission | undefined {
    const submission = this.state.submissions.get(submissionKey(assetId, submissionId));
    return submission ? { ...submission } : undefined;
  }
}
