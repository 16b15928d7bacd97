/**
 * Synth Engine - Query API Server
 *
 * Read-only Express API over engine snapshots. There are no mutating
 * routes: state changes go through the host that owns the engine.
 *
 *   GET  /health                   Liveness probe
 *   GET  /api/state                Global totals, price, pause flag
 *   GET  /api/price                Current price and freshness
 *   GET  /api/positions/:account   Position view (404 if never opened)
 *   GET  /api/liquidations/:id     Liquidation record (404 if unknown)
 *   GET  /api/liquidatable         Positions below the liquidation threshold
 *   GET  /api/reconciliation       Totals vs. sum of positions
 *   GET  /metrics                  Prometheus exposition
 *
 * Bigints are rendered as decimal strings; health uses the legacy 999999
 * sentinel for positions without debt.
 */

import express, { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import { Server } from "http";
import type { Logger } from "winston";
import { formatPrice, healthToNumber } from "./calculator";
import { SolvencyEngine } from "./engine";
import { describeError } from "./errors";
import { LiquidationAssessment } from "./liquidation-engine";
import { createEngineLogger } from "./logger";
import { EngineMetrics } from "./metrics";
import { isFresh } from "./price-feed";
import { ReconciliationReport } from "./reconciliation";
import { GlobalState, Identity, LiquidationRecord, Position } from "./state";

// ═══════════════════════════════════════════════════════════════
// Views
// ═══════════════════════════════════════════════════════════════

export interface PositionView {
  account: string;
  collateralDeposited: string;
  syntheticMinted: string;
  lastInteractionBlock: string;
  positionHealth: string;
  liquidationProtected: boolean;
}

export interface PriceView {
  price: string;
  formatted: string;
  lastUpdate: string;
  fresh: boolean;
}

export function toPositionView(account: Identity, position: Position): PositionView {
  return {
    account,
    collateralDeposited: position.collateralDeposited.toString(),
    syntheticMinted: position.syntheticMinted.toString(),
    lastInteractionBlock: position.lastInteractionBlock.toString(),
    positionHealth: healthToNumber(position.positionHealth).toString(),
    liquidationProtected: position.liquidationProtected,
  };
}

export function toPriceView(price: bigint, lastUpdate: bigint, now: bigint): PriceView {
  return {
    price: price.toString(),
    formatted: formatPrice(price),
    lastUpdate: lastUpdate.toString(),
    fresh: isFresh(lastUpdate, now),
  };
}

export function toGlobalView(global: GlobalState): Record<string, string | boolean> {
  return {
    totalCollateral: global.totalCollateral.toString(),
    totalSyntheticSupply: global.totalSyntheticSupply.toString(),
    currentPrice: global.currentPrice.toString(),
    lastPriceUpdate: global.lastPriceUpdate.toString(),
    paused: global.paused,
    submissionNonce: global.submissionNonce.toString(),
    liquidationNonce: global.liquidationNonce.toString(),
  };
}

export function toLiquidationView(id: bigint, record: LiquidationRecord): Record<string, string> {
  return {
    liquidationId: id.toString(),
    account: record.account,
    liquidator: record.liquidator,
    collateralSeized: record.collateralSeized.toString(),
    debtCovered: record.debtCovered.toString(),
    reward: record.reward.toString(),
    blockHeight: record.blockHeight.toString(),
  };
}

export function toAssessmentView(a: LiquidationAssessment): Record<string, string | boolean> {
  return {
    account: a.account,
    health: healthToNumber(a.health).toString(),
    liquidatable: a.liquidatable,
    priceFresh: a.priceFresh,
    maxDebtToCover: a.maxDebtToCover.toString(),
  };
}

export function toReconciliationView(r: ReconciliationReport): Record<string, string | number | boolean> {
  return {
    positions: r.positions,
    sumCollateral: r.sumCollateral.toString(),
    sumSynthetic: r.sumSynthetic.toString(),
    totalCollateral: r.totalCollateral.toString(),
    totalSyntheticSupply: r.totalSyntheticSupply.toString(),
    collateralDrift: r.collateralDrift.toString(),
    syntheticDrift: r.syntheticDrift.toString(),
    balanced: r.balanced,
  };
}

/** Non-negative integer path parameter, or undefined */
export function parseId(raw: string): bigint | undefined {
  return /^\d+$/.test(raw) ? BigInt(raw) : undefined;
}

// ═══════════════════════════════════════════════════════════════
// App
// ═══════════════════════════════════════════════════════════════

export interface QueryAppOptions {
  /** Current block height for freshness views */
  blockHeight: () => bigint;
  metrics?: EngineMetrics;
  logger?: Logger;
}

export function createQueryApp(engine: SolvencyEngine, options: QueryAppOptions): Express {
  const logger = options.logger ?? createEngineLogger("QUERY-API");
  const app = express();
  app.use(cors({ methods: ["GET"] }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", paused: engine.isPaused(), timestamp: Date.now() });
  });

  app.get("/api/state", (_req: Request, res: Response) => {
    res.json(toGlobalView(engine.getGlobalState()));
  });

  app.get("/api/price", (_req: Request, res: Response) => {
    res.json(toPriceView(engine.getCurrentPrice(), engine.getLastPriceUpdate(), options.blockHeight()));
  });

  app.get("/api/positions/:account", (req: Request, res: Response) => {
    const account = req.params.account;
    const position = engine.getPosition(account);
    if (!position) {
      res.status(404).json({ error: `no position for ${account}` });
      return;
    }
    res.json(toPositionView(account, position));
  });

  app.get("/api/liquidations/:id", (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const record = id === undefined ? undefined : engine.getLiquidation(id);
    if (id === undefined || !record) {
      res.status(404).json({ error: `unknown liquidation ${req.params.id}` });
      return;
    }
    res.json(toLiquidationView(id, record));
  });

  app.get("/api/liquidatable", (_req: Request, res: Response) => {
    res.json(engine.findLiquidatable().map(toAssessmentView));
  });

  app.get("/api/reconciliation", (_req: Request, res: Response) => {
    res.json(toReconciliationView(engine.reconcile()));
  });

  const metrics = options.metrics;
  if (metrics) {
    app.get("/metrics", (_req: Request, res: Response, next: NextFunction) => {
      metrics.register
        .metrics()
        .then((body) => {
          res.set("Content-Type", metrics.register.contentType);
          res.send(body);
        })
        .catch(next);
    });
  }

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`request failed: ${describeError(err)}`);
    res.status(500).json({ error: "internal error" });
  });

  return app;
}

/**
 * Start the query API. Returns a handle to stop the server gracefully.
 */
export function startQueryServer(
  app: Express,
  port: number,
  logger: Logger = createEngineLogger("QUERY-API"),
): { server: Server; stop: () => Promise<void> } {
  const server = app.listen(port, () => {
    logger.info(`Listening on port ${port}`);
  });
  return {
    server,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
