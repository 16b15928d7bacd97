/**
 * Synth Engine - Solvency Engine
 *
 * Public surface of the protocol core. Each mutating call resolves the
 * caller and block height through the host capabilities, then runs as one
 * transaction over a draft of the state (see TransactionManager). The
 * component classes are bound to that draft for the duration of the call.
 *
 * Administrative calls (registerOracle, pause, resume) require the caller
 * to be the configured administrator.
 */

import type { Logger } from "winston";
import { MintResult, PositionLedger } from "./position-ledger";
import { DiversifiedPositionManager, DiversifiedRequest, DiversifiedResult } from "./diversified-manager";
import { EngineError, isEngineError } from "./errors";
import { LiquidationAssessment, LiquidationEngine } from "./liquidation-engine";
import { createEngineLogger } from "./logger";
import { EngineMetrics, refreshStateGauges } from "./metrics";
import { OracleRegistry } from "./oracle-registry";
import { PriceOracleFeed } from "./price-feed";
import { ReconciliationReport, reconcile } from "./reconciliation";
import {
  EngineState,
  GlobalState,
  Identity,
  LiquidationRecord,
  Oracle,
  Position,
  PriceSubmission,
  createInitialState,
} from "./state";
import { TransactionManager } from "./transaction";
import { formatPrice } from "./calculator";

// ============================================================
//                     HOST CAPABILITIES
// ============================================================

/** Services the host provides; none of them is implemented by the engine */
export interface EngineCapabilities {
  /** Authenticated identity of the current caller */
  currentCaller(): Identity;
  /** Monotonic, non-decreasing block height */
  blockHeight(): bigint;
  /** Atomic value movement; throws to abort the calling operation */
  transfer(amount: bigint, from: Identity, to: Identity): void;
  /** Identity holding protocol funds */
  custodyIdentity(): Identity;
}

export interface SolvencyEngineOptions {
  adminIdentity: Identity;
  capabilities: EngineCapabilities;
  logger?: Logger;
  metrics?: EngineMetrics;
  initialState?: EngineState;
}

interface Components {
  registry: OracleRegistry;
  feed: PriceOracleFeed;
  ledger: PositionLedger;
  liquidations: LiquidationEngine;
  diversified: DiversifiedPositionManager;
}

export class SolvencyEngine {
  private readonly adminIdentity: Identity;
  private readonly capabilities: EngineCapabilities;
  private readonly logger: Logger;
  private readonly metrics?: EngineMetrics;
  private readonly tx: TransactionManager;

  constructor(options: SolvencyEngineOptions) {
    this.adminIdentity = options.adminIdentity;
    this.capabilities = options.capabilities;
    this.logger = options.logger ?? createEngineLogger("ENGINE");
    this.metrics = options.metrics;
    this.tx = new TransactionManager(options.initialState ?? createInitialState(), this.logger);

    const metrics = this.metrics;
    if (metrics) {
      refreshStateGauges(metrics, this.tx.snapshot());
      this.tx.onCommit((_label, state) => refreshStateGauges(metrics, state));
    }
  }

  // ============================================================
  //                     ADMINISTRATION
  // ============================================================

  registerOracle(oracleId: Identity): void {
    const caller = this.capabilities.currentCaller();
    this.run("registerOracle", `registerOracle(${oracleId}) by ${caller}`, ({ registry }) =>
      registry.register(caller, oracleId),
    );
  }

  pause(): void {
    this.setPaused(true);
  }

  resume(): void {
    this.setPaused(false);
  }

  private setPaused(paused: boolean): void {
    const caller = this.capabilities.currentCaller();
    const operation = paused ? "pause" : "resume";
    this.run(operation, `${operation} by ${caller}`, (_components, state) => {
      this.requireAdmin(caller);
      state.global.paused = paused;
    });
  }

  // ============================================================
  //                     USER OPERATIONS
  // ============================================================

  deposit(amount: bigint): void {
    const caller = this.capabilities.currentCaller();
    const now = this.capabilities.blockHeight();
    this.run("deposit", `deposit(${caller}, ${amount})`, ({ ledger }) =>
      ledger.applyDeposit(caller, amount, now),
    );
  }

  mint(amount: bigint): MintResult {
    const caller = this.capabilities.currentCaller();
    const now = this.capabilities.blockHeight();
    return this.run("mint", `mint(${caller}, ${amount})`, ({ ledger }) =>
      ledger.applyMint(caller, amount, now),
    );
  }

  /** The caller is the submitting oracle */
  submitPrice(assetId: string, price: bigint, confidence: bigint): bigint {
    const caller = this.capabilities.currentCaller();
    const now = this.capabilities.blockHeight();
    const label = `submitPrice(${caller}, ${assetId}, ${formatPrice(price)}, ${confidence}%)`;
    return this.run("submitPrice", label, ({ feed }) =>
      feed.submit(caller, assetId, price, confidence, now),
    );
  }

  /** The caller is the liquidator; the reward is paid from custody */
  liquidate(account: Identity, debtToCover: bigint): bigint {
    const caller = this.capabilities.currentCaller();
    const now = this.capabilities.blockHeight();
    const custody = this.capabilities.custodyIdentity();
    const id = this.run(
      "liquidate",
      `liquidate(${account}, ${debtToCover}) by ${caller}`,
      ({ liquidations }) =>
        liquidations.liquidate(caller, account, debtToCover, now, (reward, to) =>
          this.transfer(reward, custody, to),
        ),
    );
    this.metrics?.liquidationsTotal.inc();
    return id;
  }

  /**
   * "mint" commits the projected position. "deposit-only" computes the
   * same figures against a private copy and commits nothing.
   */
  manageDiversified(request: DiversifiedRequest): DiversifiedResult {
    const caller = this.capabilities.currentCaller();
    const now = this.capabilities.blockHeight();
    const label = `manageDiversified(${caller}, ${request.operation}, ${request.assetIds.length} assets)`;
    if (request.operation === "deposit-only") {
      return this.observe("manageDiversified", () =>
        this.tx.simulate(label, (view) => this.bind(view).diversified.manage(caller, request, now)),
      );
    }
    return this.run("manageDiversified", label, ({ diversified }) =>
      diversified.manage(caller, request, now),
    );
  }

  // ============================================================
  //                     QUERIES
  // ============================================================

  getPosition(account: Identity): Position | undefined {
    return this.read(({ ledger }) => ledger.get(account));
  }

  getCurrentPrice(): bigint {
    return this.read(({ feed }) => feed.getCurrentPrice());
  }

  getLastPriceUpdate(): bigint {
    return this.read(({ feed }) => feed.getLastPriceUpdate());
  }

  getOracle(oracleId: Identity): Oracle | undefined {
    return this.read(({ registry }) => registry.get(oracleId));
  }

  isOracleActive(oracleId: Identity): boolean {
    return this.read(({ registry }) => registry.isActive(oracleId));
  }

  getSubmission(assetId: string, submissionId: bigint): PriceSubmission | undefined {
    return this.read(({ feed }) => feed.getSubmission(assetId, submissionId));
  }

  getLiquidation(liquidationId: bigint): LiquidationRecord | undefined {
    return this.read(({ liquidations }) => liquidations.get(liquidationId));
  }

  liquidationCount(): bigint {
    return this.read(({ liquidations }) => liquidations.count());
  }

  assessLiquidation(account: Identity): LiquidationAssessment | undefined {
    const now = this.capabilities.blockHeight();
    return this.read(({ liquidations }) => liquidations.assess(account, now));
  }

  findLiquidatable(): LiquidationAssessment[] {
    const now = this.capabilities.blockHeight();
    return this.read(({ liquidations }) => liquidations.findLiquidatable(now));
  }

  isPaused(): boolean {
    return this.tx.snapshot().global.paused;
  }

  getGlobalState(): GlobalState {
    return this.tx.snapshot().global;
  }

  reconcile(): ReconciliationReport {
    return reconcile(this.tx.snapshot());
  }

  snapshot(): EngineState {
    return this.tx.snapshot();
  }

  // ============================================================
  //                     INTERNALS
  // ============================================================

  private bind(state: EngineState): Components {
    const registry = new OracleRegistry(state, this.adminIdentity);
    const feed = new PriceOracleFeed(state, registry);
    const ledger = new PositionLedger(state, feed);
    return {
      registry,
      feed,
      ledger,
      liquidations: new LiquidationEngine(state, ledger, feed),
      diversified: new DiversifiedPositionManager(state, ledger, feed),
    };
  }

  private run<T>(
    operation: string,
    label: string,
    fn: (components: Components, state: EngineState) => T,
  ): T {
    return this.observe(operation, () =>
      this.tx.execute(label, (draft) => fn(this.bind(draft), draft)),
    );
  }

  private read<T>(fn: (components: Components) => T): T {
    return this.tx.query((view) => fn(this.bind(view)));
  }

  private observe<T>(operation: string, fn: () => T): T {
    try {
      const result = fn();
      this.metrics?.operationsTotal.inc({ operation, status: "committed" });
      return result;
    } catch (err) {
      this.metrics?.operationsTotal.inc({ operation, status: "rejected" });
      throw err;
    }
  }

  private requireAdmin(caller: Identity): void {
    if (caller !== this.adminIdentity) {
      throw new EngineError("NotAuthorized", `${caller} is not the administrator`);
    }
  }

  private transfer(amount: bigint, from: Identity, to: Identity): void {
    try {
      this.capabilities.transfer(amount, from, to);
    } catch (err) {
      if (isEngineError(err, "TransferFailed")) throw err;
      throw new EngineError("TransferFailed", `transfer of ${amount} from ${from} to ${to} failed`, {
        cause: err,
      });
    }
  }
}
