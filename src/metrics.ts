/**
 * Synth Engine - Prometheus Metrics
 *
 * Each engine gets its own registry so that several engines (and tests)
 * can live in one process without duplicate-metric errors.
 *
 * Naming convention:  synth_engine_<metric>_<unit>
 */

import { Counter, Gauge, Registry, collectDefaultMetrics } from "prom-client";
import { EngineState } from "./state";

export interface EngineMetrics {
  register: Registry;
  operationsTotal: Counter<"operation" | "status">;
  liquidationsTotal: Counter<string>;
  totalCollateral: Gauge<string>;
  totalSyntheticSupply: Gauge<string>;
  currentPrice: Gauge<string>;
}

export function createEngineMetrics(options: { collectDefaults?: boolean } = {}): EngineMetrics {
  const register = new Registry();
  if (options.collectDefaults) {
    collectDefaultMetrics({ register, prefix: "synth_engine_" });
  }

  return {
    register,
    operationsTotal: new Counter({
      name: "synth_engine_operations_total",
      help: "Engine operations by outcome",
      labelNames: ["operation", "status"] as const, // status: committed | rejected
      registers: [register],
    }),
    liquidationsTotal: new Counter({
      name: "synth_engine_liquidations_total",
      help: "Committed liquidations",
      registers: [register],
    }),
    totalCollateral: new Gauge({
      name: "synth_engine_total_collateral",
      help: "Global collateral total (token units)",
      registers: [register],
    }),
    totalSyntheticSupply: new Gauge({
      name: "synth_engine_total_synthetic_supply",
      help: "Outstanding synthetic debt (debt units)",
      registers: [register],
    }),
    currentPrice: new Gauge({
      name: "synth_engine_current_price",
      help: "Current oracle price, 8-decimal fixed point",
      registers: [register],
    }),
  };
}

/** Gauges are float64; large totals lose precision, which is fine for dashboards */
export function refreshStateGauges(metrics: EngineMetrics, state: EngineState): void {
  metrics.totalCollateral.set(Number(state.global.totalCollateral));
  metrics.totalSyntheticSupply.set(Number(state.global.totalSyntheticSupply));
  metrics.currentPrice.set(Number(state.global.currentPrice));
}
