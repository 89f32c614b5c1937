import { z } from "zod";

const configSchema = z.object({
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  /** Optional log file; every record is also written to the console. */
  logFile: z.string().min(1).optional(),

  /** JSON catalog of container targets, keyed by ctid under `lxc_configs`. */
  catalogPath: z.string().min(1).default("/usr/local/etc/lxc-provisioner/lxc_configs.json"),

  /** Container runtime CLI. */
  runtime: z
    .object({
      pctBin: z.string().min(1).default("pct"),
      commandTimeoutMs: z.coerce.number().int().positive().default(1_800_000),
      defaultBridge: z.string().min(1).default("vmbr0"),
    })
    .default({
      pctBin: "pct",
      commandTimeoutMs: 1_800_000,
      defaultBridge: "vmbr0",
    }),

  /** Default health-check policy; catalog entries may override it per target. */
  healthCheck: z
    .object({
      maxAttempts: z.coerce.number().int().positive().default(12),
      intervalSeconds: z.coerce.number().nonnegative().default(10),
      probeTimeoutMs: z.coerce.number().int().positive().default(5_000),
    })
    .default({
      maxAttempts: 12,
      intervalSeconds: 10,
      probeTimeoutMs: 5_000,
    }),

  /** Bounded waits around shutdown/start during snapshot finalization. */
  waits: z
    .object({
      shutdownTimeoutSeconds: z.coerce.number().int().positive().default(60),
      startTimeoutSeconds: z.coerce.number().int().positive().default(60),
      pollIntervalSeconds: z.coerce.number().positive().default(3),
    })
    .default({
      shutdownTimeoutSeconds: 60,
      startTimeoutSeconds: 60,
      pollIntervalSeconds: 3,
    }),
});

export type Config = z.infer<typeof configSchema>;

/** Empty strings count as unset so `FOO= lxc-provision ...` falls back to the default. */
function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    logLevel: blankToUndefined(env.LOG_LEVEL),
    logFile: blankToUndefined(env.LOG_FILE),
    catalogPath: blankToUndefined(env.LXC_CATALOG_PATH),
    runtime: {
      pctBin: blankToUndefined(env.PCT_BIN),
      commandTimeoutMs: blankToUndefined(env.PCT_COMMAND_TIMEOUT_MS),
      defaultBridge: blankToUndefined(env.LXC_DEFAULT_BRIDGE),
    },
    healthCheck: {
      maxAttempts: blankToUndefined(env.HEALTH_MAX_ATTEMPTS),
      intervalSeconds: blankToUndefined(env.HEALTH_INTERVAL_SECONDS),
      probeTimeoutMs: blankToUndefined(env.HEALTH_PROBE_TIMEOUT_MS),
    },
    waits: {
      shutdownTimeoutSeconds: blankToUndefined(env.SHUTDOWN_TIMEOUT_SECONDS),
      startTimeoutSeconds: blankToUndefined(env.START_TIMEOUT_SECONDS),
      pollIntervalSeconds: blankToUndefined(env.STATUS_POLL_INTERVAL_SECONDS),
    },
  });
}
