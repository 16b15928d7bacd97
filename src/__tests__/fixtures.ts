/**
 * Shared test setup: an engine over the in-memory host, starting at a
 * block far enough from zero that the never-updated price is stale.
 */

import { SolvencyEngine } from "../engine";
import { EngineError } from "../errors";
import { InMemoryHost } from "../host";
import { EngineMetrics } from "../metrics";

export const ADMIN = "admin";
export const CUSTODY = "custody";
export const ORACLE = "oracle-1";
export const ALICE = "alice";
export const BOB = "bob";
export const CAROL = "carol";
export const LIQUIDATOR = "liquidator";

/** 1.0 in 8-decimal fixed point */
export const ONE = 100_000_000n;
export const START_BLOCK = 1_000n;

export interface TestContext {
  engine: SolvencyEngine;
  host: InMemoryHost;
}

export function setup(options: { metrics?: EngineMetrics } = {}): TestContext {
  const host = new InMemoryHost(CUSTODY, { caller: ADMIN, block: START_BLOCK });
  const engine = new SolvencyEngine({
    adminIdentity: ADMIN,
    capabilities: host,
    metrics: options.metrics,
  });
  return { engine, host };
}

/** Registers ORACLE and publishes `price` at the current block */
export function withPrice(ctx: TestContext, price: bigint = ONE): TestContext {
  ctx.host.actAs(ADMIN);
  ctx.engine.registerOracle(ORACLE);
  publish(ctx, price);
  return ctx;
}

export function publish(ctx: TestContext, price: bigint, assetId = "SYN"): bigint {
  ctx.host.actAs(ORACLE);
  return ctx.engine.submitPrice(assetId, price, 90n);
}

export function depositAs(ctx: TestContext, account: string, amount: bigint): void {
  ctx.host.actAs(account);
  ctx.engine.deposit(amount);
}

/** Runs `fn` and returns the EngineError it throws; fails the test otherwise */
export function catchEngineError(fn: () => unknown): EngineError {
  try {
    fn();
  } catch (err) {
    if (err instanceof EngineError) return err;
    throw err;
  }
  throw new Error("expected an EngineError to be thrown");
}
