import { ConfigInvalidError } from "./errors.js";
import type {
  CloneSpec,
  NetworkConfig,
  NetworkSpec,
  PropertySpec,
  ResourceChanges,
  RuntimeBool,
  SourceRef,
  TargetConfig,
} from "./types.js";

/** Interface slot the network string is applied to. */
export const NETWORK_PROPERTY_KEY = "net0";

function toRuntimeBool(value: boolean): RuntimeBool {
  return value ? "1" : "0";
}

/**
 * Build the clone operation for a target. Pure: the same inputs always
 * produce an equal, frozen value.
 *
 * Network settings are left out on purpose; the clone copies the template's
 * adapter config verbatim, so the interface is applied afterwards through
 * {@link buildNetworkSpec}.
 */
export function buildCloneSpec(config: TargetConfig, source: SourceRef): CloneSpec {
  if (config.ctid === source.sourceCtid) {
    throw new ConfigInvalidError("ctid", `target ${config.ctid} cannot be cloned from itself`);
  }
  if (!Number.isInteger(source.sourceCtid) || source.sourceCtid <= 0) {
    throw new ConfigInvalidError("sourceCtid", "must be a positive integer");
  }
  if (source.snapshotName.trim() === "") {
    throw new ConfigInvalidError("snapshotName", "must not be empty");
  }

  const storage =
    config.storageSizeGB !== undefined ? `${config.storagePool}:${config.storageSizeGB}` : config.storagePool;

  return Object.freeze({
    sourceCtid: source.sourceCtid,
    targetCtid: config.ctid,
    snapshotName: source.snapshotName,
    hostname: config.name,
    memory: config.memoryMB,
    cores: config.cores,
    storage,
    features: Object.freeze([...config.features]),
    unprivileged: toRuntimeBool(config.unprivileged),
  });
}

/** `name=<if>,bridge=<bridge>,ip=<cidr>,gw=<gw>[,hwaddr=<mac>]` */
export function formatNetworkInterface(network: Readonly<NetworkConfig>, macAddress?: string): string {
  const parts = [`name=${network.ifName}`, `bridge=${network.bridge}`, `ip=${network.ip}`, `gw=${network.gateway}`];
  if (macAddress) {
    parts.push(`hwaddr=${macAddress}`);
  }
  return parts.join(",");
}

/** The post-clone set-property call, or null when the target declares no network. */
export function buildNetworkSpec(config: TargetConfig): NetworkSpec | null {
  if (!config.network) return null;
  return Object.freeze({
    key: NETWORK_PROPERTY_KEY,
    value: formatNetworkInterface(config.network, config.macAddress),
  });
}

/**
 * Compare an interface string against the runtime's current value.
 * pct may reorder keys and append its own (`type=veth`), so compare the
 * keys we set rather than the raw string.
 */
export function networkMatches(expected: string, current: string | undefined): boolean {
  if (current === undefined) return false;
  const parse = (value: string) =>
    new Map(
      value
        .split(",")
        .map((pair) => pair.split("="))
        .filter((kv): kv is [string, string] => kv.length === 2)
        .map(([k, v]) => [k.trim(), v.trim()]),
    );
  const want = parse(expected);
  const have = parse(current);
  for (const [key, value] of want) {
    const actual = have.get(key);
    if (actual === undefined) return false;
    // MAC addresses are reported upper-case
    if (key === "hwaddr" ? actual.toLowerCase() !== value.toLowerCase() : actual !== value) return false;
  }
  return true;
}

const SIZE_UNITS_GB: Record<string, number> = { K: 1 / (1024 * 1024), M: 1 / 1024, G: 1, T: 1024 };

/** `size=` of a volume string such as `local-zfs:subvol-910-disk-0,size=32G`, in GB. */
export function parseDiskSizeGB(volume: string): number | undefined {
  const match = /(?:^|,)size=(\d+(?:\.\d+)?)([KMGT])?(?:,|$)/.exec(volume);
  if (!match) return undefined;
  const [, amount, unit] = match;
  return Number(amount) * (SIZE_UNITS_GB[unit ?? "G"] ?? 1);
}

function featureSet(value: string): Set<string> {
  return new Set(
    value
      .split(",")
      .map((f) => f.trim())
      .filter(Boolean),
  );
}

/**
 * Resource settings the runtime does not yet have. Features are only
 * enforced when the target lists some; an empty list keeps what the template
 * carries, as a clone does.
 */
export function planResourceChanges(config: TargetConfig, current: Readonly<Record<string, string>>): ResourceChanges {
  const properties: PropertySpec[] = [];
  if (current.memory !== String(config.memoryMB)) {
    properties.push({ key: "memory", value: String(config.memoryMB) });
  }
  if (current.cores !== String(config.cores)) {
    properties.push({ key: "cores", value: String(config.cores) });
  }
  if (config.features.length > 0) {
    const have = featureSet(current.features ?? "");
    if (have.size !== config.features.length || config.features.some((f) => !have.has(f))) {
      properties.push({ key: "features", value: config.features.join(",") });
    }
  }

  let rootfsSizeGB: number | undefined;
  if (config.storageSizeGB !== undefined) {
    const size = current.rootfs === undefined ? undefined : parseDiskSizeGB(current.rootfs);
    if (size === undefined || size < config.storageSizeGB) {
      rootfsSizeGB = config.storageSizeGB;
    }
  }
  return Object.freeze({ properties: Object.freeze(properties), rootfsSizeGB });
}
