/**
 * Synth Engine - Configuration
 *
 * Reads from environment variables with defaults. The entry point loads
 * a .env file through dotenv before calling loadConfig().
 */

export interface EngineConfig {
  /** Identity allowed to register oracles and pause/resume */
  adminIdentity: string;
  /** Identity holding protocol funds; liquidation rewards are paid from it */
  custodyIdentity: string;
  /** production | staging | development | test */
  environment: string;
  logLevel: string;
  /** Port of the read-only query server */
  serverPort: number;
  metricsEnabled: boolean;
}

export const DEFAULT_CUSTODY_IDENTITY = "protocol-custody";
export const DEFAULT_SERVER_PORT = 8080;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    adminIdentity: env.ENGINE_ADMIN || "",
    custodyIdentity: env.ENGINE_CUSTODY || DEFAULT_CUSTODY_IDENTITY,
    environment: env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL || "info",
    serverPort: parseInt(env.ENGINE_PORT || String(DEFAULT_SERVER_PORT), 10),
    metricsEnabled: env.ENGINE_METRICS !== "false",
  };
}

/**
 * Validate that required configuration is present.
 * Throws if critical config is missing.
 */
export function validateConfig(config: EngineConfig): void {
  if (!config.adminIdentity) {
    throw new Error("ENGINE_ADMIN environment variable is required");
  }
  if (!config.custodyIdentity) {
    throw new Error("ENGINE_CUSTODY must not be empty");
  }
  if (config.adminIdentity === config.custodyIdentity) {
    throw new Error("ENGINE_ADMIN and ENGINE_CUSTODY must be distinct identities");
  }
  if (!Number.isInteger(config.serverPort) || config.serverPort < 1 || config.serverPort > 65535) {
    throw new Error(`ENGINE_PORT must be between 1 and 65535, got ${config.serverPort}`);
  }
}
