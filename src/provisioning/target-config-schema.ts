import { z } from "zod";

const IPV4_OCTET = "(25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)";
const IPV4_PATTERN = new RegExp(`^${IPV4_OCTET}(\\.${IPV4_OCTET}){3}$`);
const CIDR_PATTERN = new RegExp(`^${IPV4_OCTET}(\\.${IPV4_OCTET}){3}/(3[0-2]|[12]?\\d)$`);
const MAC_PATTERN = /^[0-9A-Fa-f]{2}(:[0-9A-Fa-f]{2}){5}$/;
const INTERFACE_NAME_PATTERN = /^[A-Za-z][\w.-]{0,14}$/;

export const ipv4Schema = z.string().regex(IPV4_PATTERN, "must be an IPv4 address");
export const cidrSchema = z.string().regex(CIDR_PATTERN, "must be an IPv4 address in CIDR notation");
export const macAddressSchema = z.string().regex(MAC_PATTERN, "must be a MAC address (aa:bb:cc:dd:ee:ff)");

const positiveInt = z.number().int().positive();
const portSchema = z.number().int().min(1).max(65535);

/** Accepts `["nesting=1", "keyctl=1"]` or the pct-style `"nesting=1,keyctl=1"`. */
export const featuresSchema = z
  .union([z.array(z.string().min(1)), z.string()])
  .transform((value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((f) => f.trim())
          .filter(Boolean)
      : value,
  );

export const networkConfigSchema = z.object({
  name: z.string().regex(INTERFACE_NAME_PATTERN, "must be a network interface name").default("eth0"),
  bridge: z.string().min(1).optional(),
  ip: cidrSchema,
  gw: ipv4Schema,
});

// ---------------------------------------------------------------------------
// Workloads
// ---------------------------------------------------------------------------

const nginxProxyWorkloadSchema = z
  .object({
    type: z.literal("nginx-proxy"),
    backend: z.object({ ip: ipv4Schema, port: portSchema }),
    listen_port: portSchema.default(80),
  })
  .transform((w) => ({
    type: w.type,
    backend: w.backend,
    listenPort: w.listen_port,
  }));

const vllmCommonShape = {
  model: z.string().min(1),
  served_model_name: z.string().min(1).optional(),
  port: portSchema.default(8000),
  tensor_parallel_size: positiveInt.default(1),
  gpu_memory_utilization: z.number().gt(0).max(1).optional(),
  max_model_len: positiveInt.optional(),
  /** Chat completion sent once the health check passes; the reply is logged. */
  api_check: z
    .object({
      prompt: z.string().min(1).default("What is the capital of France?"),
      /** Case-insensitive text the reply should contain; a miss is a warning. */
      expect: z.string().min(1).optional(),
      max_tokens: positiveInt.default(64),
    })
    .optional(),
};

type ApiCheckInput = { prompt: string; expect?: string; max_tokens: number } | undefined;

function toApiCheck(check: ApiCheckInput) {
  return check ? { prompt: check.prompt, expect: check.expect, maxTokens: check.max_tokens } : undefined;
}

const vllmSourceWorkloadSchema = z
  .object({
    type: z.literal("vllm-source"),
    ...vllmCommonShape,
    repo_url: z.string().url().default("https://github.com/vllm-project/vllm.git"),
    commit: z
      .string()
      .regex(/^[0-9a-f]{7,40}$/, "must be a git commit hash")
      .optional(),
  })
  .transform((w) => ({
    type: w.type,
    model: w.model,
    servedModelName: w.served_model_name,
    port: w.port,
    tensorParallelSize: w.tensor_parallel_size,
    gpuMemoryUtilization: w.gpu_memory_utilization,
    maxModelLen: w.max_model_len,
    apiCheck: toApiCheck(w.api_check),
    repoUrl: w.repo_url,
    commit: w.commit,
  }));

const vllmPackageWorkloadSchema = z
  .object({
    type: z.literal("vllm-package"),
    ...vllmCommonShape,
    /** Pinned pip requirement specifiers, e.g. `vllm==0.6.3`. */
    packages: z.array(z.string().min(1)).min(1).default(["vllm"]),
  })
  .transform((w) => ({
    type: w.type,
    model: w.model,
    servedModelName: w.served_model_name,
    port: w.port,
    tensorParallelSize: w.tensor_parallel_size,
    gpuMemoryUtilization: w.gpu_memory_utilization,
    maxModelLen: w.max_model_len,
    apiCheck: toApiCheck(w.api_check),
    packages: w.packages,
  }));

const dockerWorkloadSchema = z.object({ type: z.literal("docker") });

export const workloadSchema = z.union([
  nginxProxyWorkloadSchema,
  vllmSourceWorkloadSchema,
  vllmPackageWorkloadSchema,
  dockerWorkloadSchema,
]);

export type WorkloadConfig = z.output<typeof workloadSchema>;
export type WorkloadType = WorkloadConfig["type"];
export type NginxProxyWorkload = Extract<WorkloadConfig, { type: "nginx-proxy" }>;
export type VllmSourceWorkload = Extract<WorkloadConfig, { type: "vllm-source" }>;
export type VllmPackageWorkload = Extract<WorkloadConfig, { type: "vllm-package" }>;
export type VllmWorkload = VllmSourceWorkload | VllmPackageWorkload;

// ---------------------------------------------------------------------------
// Health check
// ---------------------------------------------------------------------------

export const healthCheckSchema = z
  .object({
    max_attempts: positiveInt.optional(),
    interval_seconds: z.number().nonnegative().optional(),
    path: z.string().startsWith("/").optional(),
    port: portSchema.optional(),
    /** `container` runs curl inside the target; `host` probes the target's IP from the hypervisor. */
    via: z.enum(["container", "host"]).default("container"),
  })
  .transform((h) => ({
    maxAttempts: h.max_attempts,
    intervalSeconds: h.interval_seconds,
    path: h.path,
    port: h.port,
    via: h.via,
  }));

export type HealthCheckConfig = z.output<typeof healthCheckSchema>;

// ---------------------------------------------------------------------------
// Catalog entry
// ---------------------------------------------------------------------------

/** One target block of the catalog, in the catalog's snake_case wire format. */
export const targetEntrySchema = z.object({
  name: z.string().min(1),
  memory_mb: positiveInt,
  cores: positiveInt,
  storage_pool: z.string().min(1),
  storage_size_gb: positiveInt.optional(),
  features: featuresSchema.default([]),
  unprivileged: z.boolean().default(false),
  network_config: networkConfigSchema.optional(),
  mac_address: macAddressSchema.optional(),
  clone_from_ctid: positiveInt.optional(),
  clone_from_snapshot: z.string().min(1).optional(),
  template_snapshot_name: z.string().min(1).optional(),
  workload: workloadSchema.optional(),
  health_check: healthCheckSchema.optional(),
});

export type TargetEntry = z.output<typeof targetEntrySchema>;

export const catalogSchema = z.object({
  lxc_configs: z.record(z.string().regex(/^\d+$/, "catalog keys must be ctids"), z.unknown()),
});

export type Catalog = z.output<typeof catalogSchema>;
