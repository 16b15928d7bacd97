/**
 * Config Validation Unit Tests
 */

import { EngineConfig, loadConfig, validateConfig } from "../config";

describe("loadConfig", () => {
  it("should apply defaults for optional settings", () => {
    const config = loadConfig({ ENGINE_ADMIN: "admin" });
    expect(config).toEqual({
      adminIdentity: "admin",
      custodyIdentity: "protocol-custody",
      environment: "development",
      logLevel: "info",
      serverPort: 8080,
      metricsEnabled: true,
    });
  });

  it("should read every setting from the environment", () => {
    const config = loadConfig({
      ENGINE_ADMIN: "ops",
      ENGINE_CUSTODY: "vault",
      NODE_ENV: "production",
      LOG_LEVEL: "debug",
      ENGINE_PORT: "9090",
      ENGINE_METRICS: "false",
    });
    expect(config).toEqual({
      adminIdentity: "ops",
      custodyIdentity: "vault",
      environment: "production",
      logLevel: "debug",
      serverPort: 9090,
      metricsEnabled: false,
    });
  });
});

describe("validateConfig", () => {
  const valid: EngineConfig = loadConfig({ ENGINE_ADMIN: "admin" });

  it("should accept a complete config", () => {
    expect(() => validateConfig(valid)).not.toThrow();
  });

  it("should require an administrator", () => {
    expect(() => validateConfig({ ...valid, adminIdentity: "" })).toThrow(
      "ENGINE_ADMIN environment variable is required",
    );
  });

  it("should reject an administrator that is also custody", () => {
    expect(() => validateConfig({ ...valid, custodyIdentity: "admin" })).toThrow(
      "ENGINE_ADMIN and ENGINE_CUSTODY must be distinct identities",
    );
  });

  it("should reject out-of-range ports", () => {
    expect(() => validateConfig({ ...valid, serverPort: 0 })).toThrow(
      "ENGINE_PORT must be between 1 and 65535, got 0",
    );
    expect(() => validateConfig({ ...valid, serverPort: Number.NaN })).toThrow("ENGINE_PORT");
  });
});
