import { logger } from "../config/logger.js";
import type { CloneSpec } from "../provisioning/types.js";
import { type CommandRunner, createCommandRunner } from "./command-runner.js";
import { type CommandResult, type ContainerStatus, type ExecOptions, type RuntimeClient, RuntimeCommandError } from "./runtime-client.js";

/** Pseudo-entry `pct listsnapshot` prints for the live state. */
const CURRENT_SNAPSHOT = "current";

/**
 * Parse `pct listsnapshot` output:
 *
 * ```
 * `-> docker-snapshot   2025-01-01 10:00:00   base image
 *     `-> current                              You are here!
 * ```
 */
export function parseSnapshotList(output: string): Set<string> {
  const names = new Set<string>();
  for (const raw of output.split("\n")) {
    const line = raw.replace(/^[\s`|]*->\s*/, "").trim();
    if (!line) continue;
    const [name] = line.split(/\s+/);
    if (name && name !== CURRENT_SNAPSHOT) names.add(name);
  }
  return names;
}

/** Parse `pct config` output (`key: value` per line). */
export function parseContainerConfig(output: string): Record<string, string> {
  const config: Record<string, string> = {};
  for (const line of output.split("\n")) {
    const sep = line.indexOf(":");
    if (sep <= 0 || line.startsWith(" ") || line.startsWith("#")) continue;
    config[line.slice(0, sep).trim()] = line.slice(sep + 1).trim();
  }
  return config;
}

const MISSING_CONTAINER = /does not exist/;

/**
 * `pct status` prints `status: running` / `status: stopped`. Only the
 * missing-config error means absent; any other failure is thrown.
 */
export function parseStatus(result: CommandResult, ctid: number): ContainerStatus {
  if (result.exitCode !== 0) {
    if (MISSING_CONTAINER.test(result.stderr)) {
      return { exists: false, running: false };
    }
    throw new RuntimeCommandError(`pct status ${ctid}`, result);
  }
  return { exists: true, running: /status:\s*running/.test(result.stdout) };
}

export interface PctRuntimeClientOptions {
  pctBin?: string;
  /** Applies to every pct call; installs inside `pct exec` can run for a long time. */
  commandTimeoutMs?: number;
  runner?: CommandRunner;
}

/** RuntimeClient backed by the Proxmox `pct` CLI. */
export class PctRuntimeClient implements RuntimeClient {
  private readonly pctBin: string;
  private readonly commandTimeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: PctRuntimeClientOptions = {}) {
    this.pctBin = options.pctBin ?? "pct";
    this.commandTimeoutMs = options.commandTimeoutMs ?? 1_800_000;
    this.runner = options.runner ?? createCommandRunner();
  }

  private pct(args: readonly string[], input?: string): Promise<CommandResult> {
    logger.debug("pct", { args });
    return this.runner(this.pctBin, args, { timeoutMs: this.commandTimeoutMs, input });
  }

  async status(ctid: number): Promise<ContainerStatus> {
    return parseStatus(await this.pct(["status", String(ctid)]), ctid);
  }

  /**
   * `pct clone` only takes identity and storage, so resources are applied
   * with `pct set` and the root disk grown with `pct resize` afterwards.
   * Returns the first failing step's result.
   */
  async clone(spec: CloneSpec): Promise<CommandResult> {
    const target = String(spec.targetCtid);
    const [pool, sizeGB] = spec.storage.split(":");
    const cloned = await this.pct([
      "clone",
      String(spec.sourceCtid),
      target,
      "--snapname",
      spec.snapshotName,
      "--hostname",
      spec.hostname,
      "--storage",
      pool ?? spec.storage,
    ]);
    if (cloned.exitCode !== 0) return cloned;

    const setArgs = ["set", target, "--memory", String(spec.memory), "--cores", String(spec.cores)];
    if (spec.features.length > 0) {
      setArgs.push("--features", spec.features.join(","));
    }
    const resourced = await this.pct(setArgs);
    if (resourced.exitCode !== 0) return resourced;

    if (sizeGB) {
      const resized = await this.resize(spec.targetCtid, "rootfs", Number(sizeGB));
      if (resized.exitCode !== 0) return resized;
    }

    // Privilege level is inherited from the template and cannot be changed on a clone.
    const config = await this.getConfig(spec.targetCtid);
    const actual = config.unprivileged === "1" ? "1" : "0";
    if (actual !== spec.unprivileged) {
      logger.warn("Clone privilege level differs from the requested one", {
        ctid: spec.targetCtid,
        requested: spec.unprivileged,
        actual,
      });
    }
    return cloned;
  }

  setProperty(ctid: number, key: string, value: string): Promise<CommandResult> {
    return this.pct(["set", String(ctid), `--${key}`, value]);
  }

  resize(ctid: number, disk: string, sizeGB: number): Promise<CommandResult> {
    return this.pct(["resize", String(ctid), disk, `${sizeGB}G`]);
  }

  async getConfig(ctid: number): Promise<Record<string, string>> {
    const result = await this.pct(["config", String(ctid)]);
    return result.exitCode === 0 ? parseContainerConfig(result.stdout) : {};
  }

  async snapshotList(ctid: number): Promise<Set<string>> {
    const result = await this.pct(["listsnapshot", String(ctid)]);
    return result.exitCode === 0 ? parseSnapshotList(result.stdout) : new Set();
  }

  snapshotCreate(ctid: number, name: string): Promise<CommandResult> {
    return this.pct(["snapshot", String(ctid), name]);
  }

  shutdown(ctid: number): Promise<CommandResult> {
    return this.pct(["shutdown", String(ctid)]);
  }

  start(ctid: number): Promise<CommandResult> {
    return this.pct(["start", String(ctid)]);
  }

  exec(ctid: number, argv: readonly string[], options: ExecOptions = {}): Promise<CommandResult> {
    return this.pct(["exec", String(ctid), "--", ...argv], options.input);
  }
}
