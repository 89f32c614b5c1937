import type { HealthCheckConfig, WorkloadConfig } from "./target-config-schema.js";

export interface NetworkConfig {
  /** Address in CIDR notation, e.g. 10.0.0.110/24 */
  ip: string;
  gateway: string;
  ifName: string;
  bridge: string;
}

/** Identifies the template container and snapshot a clone is created from. */
export interface SourceRef {
  sourceCtid: number;
  snapshotName: string;
}

/**
 * A fully resolved target. Frozen by the resolver and passed explicitly
 * through every stage of a run.
 */
export interface TargetConfig {
  readonly ctid: number;
  readonly name: string;
  readonly memoryMB: number;
  readonly cores: number;
  readonly storagePool: string;
  readonly storageSizeGB?: number;
  readonly features: readonly string[];
  readonly unprivileged: boolean;
  readonly network?: Readonly<NetworkConfig>;
  readonly macAddress?: string;
  readonly cloneFrom?: Readonly<SourceRef>;
  /** Snapshot this container is frozen into once provisioned (templates only). */
  readonly templateSnapshotName?: string;
  readonly workload?: Readonly<WorkloadConfig>;
  readonly healthCheck?: Readonly<HealthCheckConfig>;
}

/** Runtime flag representation used by pct. */
export type RuntimeBool = "1" | "0";

export interface CloneSpec {
  readonly sourceCtid: number;
  readonly targetCtid: number;
  readonly snapshotName: string;
  readonly hostname: string;
  readonly memory: number;
  readonly cores: number;
  /** `pool` or `pool:sizeGB` */
  readonly storage: string;
  readonly features: readonly string[];
  readonly unprivileged: RuntimeBool;
}

/** A single `set-property` call. */
export interface PropertySpec {
  readonly key: string;
  readonly value: string;
}

export type NetworkSpec = PropertySpec;

/** Resource settings that differ between a target's config and the runtime. */
export interface ResourceChanges {
  readonly properties: readonly PropertySpec[];
  /** Set when the root disk is smaller than requested; disks only grow. */
  readonly rootfsSizeGB?: number;
}

export interface HealthCheckOutcome {
  attempt: number;
  httpStatus?: number;
  connectionFailed: boolean;
}
