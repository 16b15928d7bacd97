/**
 * Synth Engine - Oracle Registry
 *
 * Tracks which identities may submit prices. Only the administrator can
 * register; registering an existing oracle reactivates it and keeps its
 * submission count and credibility.
 */

import { checkedAdd } from "./calculator";
import { INITIAL_CREDIBILITY_SCORE } from "./constants";
import { EngineError } from "./errors";
import { EngineState, Identity, Oracle } from "./state";

export class OracleRegistry {
  constructor(
    private readonly state: EngineState,
    private readonly adminIdentity: Identity,
  ) {}

  register(caller: Identity, oracleId: Identity): void {
    if (caller !== this.adminIdentity) {
      throw new EngineError("NotAuthorized", `${caller} cannot register oracles`);
    }
    const existing = this.state.oracles.get(oracleId);
    if (existing) {
      existing.isActive = true;
      return;
    }
    this.state.oracles.set(oracleId, {
      isActive: true,
      totalSubmissions: 0n,
      credibilityScore: INITIAL_CREDIBILITY_SCORE,
    });
  }

  isActive(oracleId: Identity): boolean {
    return this.state.oracles.get(oracleId)?.isActive ?? false;
  }

  /** Throws OracleNotRegistered or NotAuthorized unless the oracle may submit */
  requireActive(oracleId: Identity): void {
    const oracle = this.state.oracles.get(oracleId);
    if (!oracle) {
      throw new EngineError("OracleNotRegistered", `${oracleId} is not a registered oracle`);
    }
    if (!oracle.isActive) {
      throw new EngineError("NotAuthorized", `oracle ${oracleId} is inactive`);
    }
  }

  recordSubmission(oracleId: Identity): void {
    const oracle = this.state.oracles.get(oracleId);
    if (!oracle) {
      throw new EngineError("OracleNotRegistered", `${oracleId} is not a registered oracle`);
    }
    oracle.totalSubmissions = checkedAdd(oracle.totalSubmissions, 1n);
  }

  get(oracleId: Identity): Oracle | undefined {
    const oracle = this.state.oracles.get(oracleId);
    return oracle ? { ...oracle } : undefined;
  }
}
