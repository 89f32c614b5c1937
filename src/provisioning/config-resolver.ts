import type { ZodError } from "zod";
import { ConfigInvalidError } from "./errors.js";
import { catalogSchema, type TargetEntry, targetEntrySchema } from "./target-config-schema.js";
import type { SourceRef, TargetConfig } from "./types.js";

export interface ResolveOptions {
  /** Bridge used when a target's network block names none. */
  defaultBridge?: string;
}

const DEFAULT_BRIDGE = "vmbr0";

function firstIssue(error: ZodError, prefix: string): ConfigInvalidError {
  const issue = error.issues[0];
  const path = [prefix, ...(issue?.path ?? []).map(String)].filter(Boolean).join(".");
  return new ConfigInvalidError(path || "(root)", issue?.message ?? "invalid value");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse a JSON configuration string, failing as ConfigInvalid rather than SyntaxError. */
export function parseConfigJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigInvalidError("(json)", err instanceof Error ? err.message : String(err));
  }
}

function parseEntry(raw: unknown, prefix: string): TargetEntry {
  if (!isRecord(raw)) {
    throw new ConfigInvalidError(prefix || "(root)", "must be a JSON object");
  }
  const result = targetEntrySchema.safeParse(raw);
  if (!result.success) {
    throw firstIssue(result.error, prefix);
  }
  return result.data;
}

/**
 * Resolve a target's configuration from either a whole catalog
 * (`{ "lxc_configs": { "<ctid>": {...} } }`) or a single target block.
 *
 * All validation happens here; nothing downstream re-checks field shapes.
 */
export function resolveTargetConfig(blob: unknown, ctid: number, options: ResolveOptions = {}): TargetConfig {
  if (!Number.isInteger(ctid) || ctid <= 0) {
    throw new ConfigInvalidError("ctid", "must be a positive integer");
  }
  if (!isRecord(blob)) {
    throw new ConfigInvalidError("(root)", "must be a JSON object");
  }

  let catalog: Record<string, unknown> | undefined;
  let entryRaw: unknown = blob;
  let prefix = "";
  if ("lxc_configs" in blob) {
    const parsed = catalogSchema.safeParse(blob);
    if (!parsed.success) {
      throw firstIssue(parsed.error, "");
    }
    catalog = parsed.data.lxc_configs;
    prefix = `lxc_configs.${ctid}`;
    entryRaw = catalog[String(ctid)];
    if (entryRaw === undefined) {
      throw new ConfigInvalidError(prefix, "no catalog entry for this ctid");
    }
  }

  const entry = parseEntry(entryRaw, prefix);
  const field = (name: string) => (prefix ? `${prefix}.${name}` : name);

  let cloneFrom: SourceRef | undefined;
  if (entry.clone_from_ctid !== undefined) {
    if (entry.clone_from_ctid === ctid) {
      throw new ConfigInvalidError(field("clone_from_ctid"), "must differ from the target ctid");
    }
    const snapshotName = entry.clone_from_snapshot ?? sourceSnapshotName(catalog, entry.clone_from_ctid);
    if (!snapshotName) {
      throw new ConfigInvalidError(
        field("clone_from_snapshot"),
        `no snapshot given and source ${entry.clone_from_ctid} declares no template_snapshot_name`,
      );
    }
    cloneFrom = Object.freeze({ sourceCtid: entry.clone_from_ctid, snapshotName });
  }

  const network = entry.network_config
    ? Object.freeze({
        ip: entry.network_config.ip,
        gateway: entry.network_config.gw,
        ifName: entry.network_config.name,
        bridge: entry.network_config.bridge ?? options.defaultBridge ?? DEFAULT_BRIDGE,
      })
    : undefined;

  return Object.freeze({
    ctid,
    name: entry.name,
    memoryMB: entry.memory_mb,
    cores: entry.cores,
    storagePool: entry.storage_pool,
    storageSizeGB: entry.storage_size_gb,
    features: Object.freeze([...entry.features]),
    unprivileged: entry.unprivileged,
    network,
    macAddress: entry.mac_address,
    cloneFrom,
    templateSnapshotName: entry.template_snapshot_name,
    workload: entry.workload ? Object.freeze(entry.workload) : undefined,
    healthCheck: entry.health_check ? Object.freeze(entry.health_check) : undefined,
  });
}

function sourceSnapshotName(catalog: Record<string, unknown> | undefined, sourceCtid: number): string | undefined {
  const source = catalog?.[String(sourceCtid)];
  if (!isRecord(source)) return undefined;
  const name = source.template_snapshot_name;
  return typeof name === "string" && name.length > 0 ? name : undefined;
}
