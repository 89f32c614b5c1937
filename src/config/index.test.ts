import { describe, expect, it } from "vitest";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      logFile: undefined,
      catalogPath: "/usr/local/etc/lxc-provisioner/lxc_configs.json",
      runtime: { pctBin: "pct", commandTimeoutMs: 1_800_000, defaultBridge: "vmbr0" },
      healthCheck: { maxAttempts: 12, intervalSeconds: 10, probeTimeoutMs: 5_000 },
      waits: { shutdownTimeoutSeconds: 60, startTimeoutSeconds: 60, pollIntervalSeconds: 3 },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      LOG_FILE: "/var/log/lxc-provision.log",
      LXC_CATALOG_PATH: "/srv/lxc_configs.json",
      PCT_BIN: "/usr/sbin/pct",
      LXC_DEFAULT_BRIDGE: "vmbr1",
      HEALTH_MAX_ATTEMPTS: "3",
      HEALTH_INTERVAL_SECONDS: "0.5",
      SHUTDOWN_TIMEOUT_SECONDS: "120",
    });

    expect(config.logLevel).toBe("debug");
    expect(config.logFile).toBe("/var/log/lxc-provision.log");
    expect(config.catalogPath).toBe("/srv/lxc_configs.json");
    expect(config.runtime).toEqual({ pctBin: "/usr/sbin/pct", commandTimeoutMs: 1_800_000, defaultBridge: "vmbr1" });
    expect(config.healthCheck).toEqual({ maxAttempts: 3, intervalSeconds: 0.5, probeTimeoutMs: 5_000 });
    expect(config.waits.shutdownTimeoutSeconds).toBe(120);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ LOG_LEVEL: "", HEALTH_MAX_ATTEMPTS: "  " });
    expect(config.logLevel).toBe("info");
    expect(config.healthCheck.maxAttempts).toBe(12);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => loadConfig({ HEALTH_MAX_ATTEMPTS: "0" })).toThrow();
    expect(() => loadConfig({ STATUS_POLL_INTERVAL_SECONDS: "soon" })).toThrow();
  });
});
