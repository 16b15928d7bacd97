export * from "./calculator";
export * from "./constants";
export * from "./errors";
export * from "./state";
export { TransactionManager } from "./transaction";
export type { TransactionListener } from "./transaction";
export { OracleRegistry } from "./oracle-registry";
export { PriceOracleFeed, isFresh } from "./price-feed";
export { PositionLedger } from "./position-ledger";
export type { MintResult } from "./position-ledger";
export { LiquidationEngine } from "./liquidation-engine";
export type { LiquidationAssessment, RewardTransfer } from "./liquidation-engine";
export { DiversifiedPositionManager } from "./diversified-manager";
export type { DiversifiedOperation, DiversifiedRequest, DiversifiedResult } from "./diversified-manager";
export { SolvencyEngine } from "./engine";
export type { EngineCapabilities, SolvencyEngineOptions } from "./engine";
export { InMemoryHost } from "./host";
export type { TransferEntry } from "./host";
export { reconcile } from "./reconciliation";
export type { ReconciliationReport } from "./reconciliation";
export { loadConfig, validateConfig, DEFAULT_CUSTODY_IDENTITY, DEFAULT_SERVER_PORT } from "./config";
export type { EngineConfig } from "./config";
export { createEngineLogger } from "./logger";
export { createEngineMetrics, refreshStateGauges } from "./metrics";
export type { EngineMetrics } from "./metrics";
export { createQueryApp, startQueryServer } from "./server";
