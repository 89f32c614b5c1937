import { logger, logPlainOutput } from "../config/logger.js";
import { ConfigInvalidError, type ErrorKind, ProvisioningError } from "../provisioning/errors.js";
import type { WorkloadConfig, WorkloadType } from "../provisioning/target-config-schema.js";
import type { TargetConfig } from "../provisioning/types.js";
import { type CommandResult, describeFailure, execShell, type RuntimeClient } from "../runtime/runtime-client.js";

/** Where inside the container a workload answers its health probe. */
export interface HealthEndpoint {
  port: number;
  path: string;
}

/**
 * Workload-specific install/configure/run routine. Every `is*` check reads a
 * durable signal from inside the container so a rerun skips finished work.
 */
export interface ServiceInstaller {
  readonly workload: WorkloadType;
  /** systemd unit the workload runs as. */
  readonly serviceName: string;
  /** Also false when an installed build no longer matches the config (a changed pin). */
  isInstalled(ctid: number, config: TargetConfig): Promise<boolean>;
  /** @throws ProvisioningError InstallFailed */
  install(ctid: number, config: TargetConfig): Promise<void>;
  isConfigured(ctid: number, config: TargetConfig): Promise<boolean>;
  /** @throws ProvisioningError ConfigureFailed */
  configure(ctid: number, config: TargetConfig): Promise<void>;
  isServiceActive(ctid: number): Promise<boolean>;
  /** daemon-reload, enable and restart; journal tail attached on failure. */
  manageService(ctid: number): Promise<void>;
  recentLogs(ctid: number): Promise<string>;
  healthEndpoint(config: TargetConfig): HealthEndpoint | null;
  /** Runs after a passing health check. Failures are logged as warnings, never thrown. */
  smokeTest(ctid: number, config: TargetConfig): Promise<void>;
}

export const JOURNAL_TAIL_LINES = 50;

/** Single-quote a value for `bash -c`. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Shared systemd and file plumbing for installers driven through `RuntimeClient.exec`. */
export abstract class SystemdServiceInstaller<W extends WorkloadType> implements ServiceInstaller {
  abstract readonly workload: W;
  abstract readonly serviceName: string;

  constructor(protected readonly runtime: RuntimeClient) {}

  abstract isInstalled(ctid: number, config: TargetConfig): Promise<boolean>;
  abstract install(ctid: number, config: TargetConfig): Promise<void>;
  abstract isConfigured(ctid: number, config: TargetConfig): Promise<boolean>;
  abstract configure(ctid: number, config: TargetConfig): Promise<void>;
  abstract healthEndpoint(config: TargetConfig): HealthEndpoint | null;

  protected workloadOf(config: TargetConfig): Extract<WorkloadConfig, { type: W }> {
    const workload = config.workload;
    if (!workload || !this.isOwnWorkload(workload)) {
      throw new ConfigInvalidError("workload.type", `expected "${this.workload}" for CTID ${config.ctid}`);
    }
    return workload;
  }

  private isOwnWorkload(workload: WorkloadConfig): workload is Extract<WorkloadConfig, { type: W }> {
    return workload.type === this.workload;
  }

  /** Exit status of a check script; only 0 counts as true. */
  protected async check(ctid: number, script: string): Promise<boolean> {
    const result = await execShell(this.runtime, ctid, script);
    return result.exitCode === 0;
  }

  /** Run a step, turning a non-zero exit into a ProvisioningError of the given kind. */
  protected async step(ctid: number, kind: ErrorKind, description: string, script: string): Promise<CommandResult> {
    logger.info(description, { ctid, workload: this.workload });
    const result = await execShell(this.runtime, ctid, script);
    if (result.exitCode !== 0) {
      throw new ProvisioningError(kind, `${description} failed: ${describeFailure(result)}`, "workload", {
        ctid,
        toolExitCode: result.exitCode,
      });
    }
    return result;
  }

  /** Write a file inside the container, content passed on stdin. */
  protected async writeFile(ctid: number, path: string, content: string): Promise<void> {
    const result = await execShell(this.runtime, ctid, `mkdir -p "$(dirname ${shellQuote(path)})" && cat > ${shellQuote(path)}`, {
      input: content,
    });
    if (result.exitCode !== 0) {
      throw new ProvisioningError("ConfigureFailed", `Writing ${path} failed: ${describeFailure(result)}`, "workload", {
        ctid,
        toolExitCode: result.exitCode,
      });
    }
    logger.info("Wrote file in container", { ctid, path });
  }

  /** File content, or null when it does not exist. */
  protected async readFile(ctid: number, path: string): Promise<string | null> {
    const result = await this.runtime.exec(ctid, ["cat", path]);
    return result.exitCode === 0 ? result.stdout : null;
  }

  async isServiceActive(ctid: number): Promise<boolean> {
    return this.check(ctid, `systemctl is-active --quiet ${this.serviceName}`);
  }

  async manageService(ctid: number): Promise<void> {
    logger.info("Enabling and restarting service", { ctid, service: this.serviceName });
    const result = await execShell(
      this.runtime,
      ctid,
      `systemctl daemon-reload && systemctl enable ${this.serviceName} && systemctl restart ${this.serviceName}`,
    );
    if (result.exitCode !== 0) {
      const diagnostics = await this.recentLogs(ctid);
      logger.error("Service failed to start", { ctid, service: this.serviceName, exitCode: result.exitCode });
      logPlainOutput("error", diagnostics);
      throw new ProvisioningError(
        "ConfigureFailed",
        `Service ${this.serviceName} failed to start: ${describeFailure(result)}`,
        "workload",
        { ctid, toolExitCode: result.exitCode, diagnostics },
      );
    }
  }

  async smokeTest(_ctid: number, _config: TargetConfig): Promise<void> {}

  async recentLogs(ctid: number): Promise<string> {
    const result = await this.runtime.exec(ctid, [
      "journalctl",
      "-u",
      this.serviceName,
      "--no-pager",
      "-n",
      String(JOURNAL_TAIL_LINES),
    ]);
    return result.stdout || result.stderr;
  }
}
