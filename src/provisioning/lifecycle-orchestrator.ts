import { logger } from "../config/logger.js";
import type { HealthEndpoint, ServiceInstaller } from "../installers/service-installer.js";
import { describeFailure, type RuntimeClient } from "../runtime/runtime-client.js";
import { buildCloneSpec, buildNetworkSpec, networkMatches, planResourceChanges } from "./command-builder.js";
import { ConfigInvalidError, type ErrorKind, ProvisioningError, type Stage } from "./errors.js";
import { ContainerCurlProbe, FetchHttpProbe, HealthChecker, type HttpProbe } from "./health-checker.js";
import { type ProvisionState, ProvisionStateTracker } from "./provision-state.js";
import { RetryPolicy, type Sleep } from "./retry-policy.js";
import type { SourceRef, TargetConfig } from "./types.js";

export interface HealthCheckPolicy {
  maxAttempts: number;
  intervalSeconds: number;
  via: "container" | "host";
}

export interface ProvisionPlan {
  config: TargetConfig;
  /** Required only when the target does not exist yet. */
  source?: SourceRef;
  installer?: ServiceInstaller;
  /** Overrides the target's own health_check block. */
  healthCheck?: Partial<HealthCheckPolicy>;
  /** Snapshot to freeze the finished container into (template workflows). */
  finalizeSnapshot?: string;
}

export type PipelineStage = Exclude<Stage, "arguments" | "config">;

export interface ProvisionReport {
  ctid: number;
  /** `noop` when the run changed nothing on the host. */
  outcome: "noop" | "provisioned";
  finalState: ProvisionState;
  states: readonly ProvisionState[];
  skipped: readonly PipelineStage[];
  /** Side effects performed, in order. */
  actions: readonly string[];
}

export interface LifecycleOrchestratorOptions {
  healthCheck?: { maxAttempts?: number; intervalSeconds?: number; probeTimeoutMs?: number };
  shutdownTimeoutSeconds?: number;
  startTimeoutSeconds?: number;
  pollIntervalSeconds?: number;
  /** Probe used for `via: "host"` checks. Defaults to fetch. */
  hostProbe?: HttpProbe;
  sleep?: Sleep;
}

interface RunContext {
  plan: ProvisionPlan;
  ctid: number;
  tracker: ProvisionStateTracker;
  skipped: PipelineStage[];
  actions: string[];
}

/**
 * Drives one target through clone → resources → network → workload → verify → snapshot.
 * Every stage first asks the runtime whether its postcondition already holds,
 * so a rerun after any failure resumes at the first unmet one.
 */
export class LifecycleOrchestrator {
  private readonly runtime: RuntimeClient;
  private readonly healthDefaults: { maxAttempts: number; intervalSeconds: number; probeTimeoutMs: number };
  private readonly shutdownTimeoutSeconds: number;
  private readonly startTimeoutSeconds: number;
  private readonly pollIntervalSeconds: number;
  private readonly hostProbe: HttpProbe;
  private readonly sleep?: Sleep;

  constructor(runtime: RuntimeClient, options: LifecycleOrchestratorOptions = {}) {
    this.runtime = runtime;
    this.healthDefaults = {
      maxAttempts: options.healthCheck?.maxAttempts ?? 12,
      intervalSeconds: options.healthCheck?.intervalSeconds ?? 10,
      probeTimeoutMs: options.healthCheck?.probeTimeoutMs ?? 5_000,
    };
    this.shutdownTimeoutSeconds = options.shutdownTimeoutSeconds ?? 60;
    this.startTimeoutSeconds = options.startTimeoutSeconds ?? 60;
    this.pollIntervalSeconds = options.pollIntervalSeconds ?? 3;
    this.hostProbe = options.hostProbe ?? new FetchHttpProbe(this.healthDefaults.probeTimeoutMs);
    this.sleep = options.sleep;
  }

  async run(plan: ProvisionPlan): Promise<ProvisionReport> {
    const ctid = plan.config.ctid;
    const ctx: RunContext = { plan, ctid, tracker: new ProvisionStateTracker(ctid), skipped: [], actions: [] };
    logger.info("Starting provisioning run", {
      ctid,
      name: plan.config.name,
      workload: plan.installer?.workload,
      finalizeSnapshot: plan.finalizeSnapshot,
    });

    const status = await this.runtime.status(ctid);
    if (status.exists) {
      const terminal = await this.completedState(plan);
      if (terminal) {
        ctx.tracker.advance(terminal);
        ctx.skipped.push("clone", "network", "workload", "verify", "snapshot");
        logger.info("Target already provisioned, nothing to do", { ctid, state: terminal });
        return this.report(ctx);
      }
      logger.info("Target exists, skipping clone", { ctid });
      ctx.skipped.push("clone");
    } else {
      await this.cloneStage(ctx);
    }
    await this.resourceStage(ctx);
    ctx.tracker.advance("Cloned");

    await this.networkStage(ctx);
    await this.workloadStage(ctx);
    await this.verifyStage(ctx);
    await this.snapshotStage(ctx);

    const report = this.report(ctx);
    logger.info("Provisioning run complete", {
      ctid,
      outcome: report.outcome,
      state: report.finalState,
      skipped: report.skipped,
    });
    return report;
  }

  /**
   * What `run` would do for this plan, one line per stage, without touching
   * the runtime. Each step still checks the host first when the plan runs.
   */
  planSteps(plan: ProvisionPlan): string[] {
    const { config, installer } = plan;
    const steps: string[] = [];

    if (plan.source) {
      const spec = buildCloneSpec(config, plan.source);
      steps.push(
        `clone ${spec.sourceCtid}@${spec.snapshotName} to ${spec.targetCtid} if absent ` +
          `(hostname ${spec.hostname}, storage ${spec.storage}, unprivileged ${spec.unprivileged})`,
      );
    } else {
      steps.push(`use existing container ${config.ctid}`);
    }

    const resources = [`memory ${config.memoryMB}`, `cores ${config.cores}`];
    if (config.features.length > 0) resources.push(`features ${config.features.join(",")}`);
    steps.push(`set ${resources.join(", ")} where they differ`);
    if (config.storageSizeGB !== undefined) {
      steps.push(`grow rootfs to ${config.storageSizeGB}G if smaller`);
    }

    const network = buildNetworkSpec(config);
    if (network) steps.push(`set ${network.key} ${network.value}`);

    if (installer) {
      steps.push(`install, configure and start ${installer.workload} (service ${installer.serviceName}) as needed`);
      const endpoint = installer.healthEndpoint(config);
      if (endpoint) {
        const policy = this.healthPolicy(plan);
        steps.push(
          `check ${this.healthUrl(plan, policy, endpoint)} until HTTP 200 ` +
            `(${policy.maxAttempts} attempts, ${policy.intervalSeconds}s apart)`,
        );
      }
    }

    if (plan.finalizeSnapshot) {
      steps.push(`shut down, snapshot "${plan.finalizeSnapshot}" and start again unless the snapshot exists`);
    }
    return steps;
  }

  /**
   * Terminal state when the completion marker holds, else null. The marker is
   * the finalize snapshot when there is one, otherwise an installed, configured
   * and running workload.
   */
  private async completedState(plan: ProvisionPlan): Promise<ProvisionState | null> {
    const { config, installer, finalizeSnapshot } = plan;
    if (finalizeSnapshot) {
      const snapshots = await this.runtime.snapshotList(config.ctid);
      return snapshots.has(finalizeSnapshot) ? "Snapshotted" : null;
    }
    if (!installer) return null;
    const complete =
      (await installer.isInstalled(config.ctid, config)) &&
      (await installer.isConfigured(config.ctid, config)) &&
      (await installer.isServiceActive(config.ctid));
    if (!complete) return null;
    return installer.healthEndpoint(config) ? "Verified" : "WorkloadInstalled";
  }

  private async cloneStage(ctx: RunContext): Promise<void> {
    const { plan, ctid } = ctx;
    if (!plan.source) {
      throw new ProvisioningError("ContainerNotFound", `Container ${ctid} does not exist and has no clone source`, "clone", {
        ctid,
      });
    }
    const spec = buildCloneSpec(plan.config, plan.source);

    const source = await this.runtime.status(spec.sourceCtid);
    if (!source.exists) {
      throw new ProvisioningError("SourceNotFound", `Source container ${spec.sourceCtid} does not exist`, "clone", {
        ctid,
      });
    }
    const snapshots = await this.runtime.snapshotList(spec.sourceCtid);
    if (!snapshots.has(spec.snapshotName)) {
      throw new ProvisioningError(
        "SourceNotFound",
        `Snapshot "${spec.snapshotName}" not found on source container ${spec.sourceCtid}`,
        "clone",
        { ctid },
      );
    }

    logger.info("Cloning container", { ctid, sourceCtid: spec.sourceCtid, snapshot: spec.snapshotName });
    const result = await this.runtime.clone(spec);
    if (result.exitCode !== 0) {
      throw new ProvisioningError("CloneFailed", `Clone of ${spec.sourceCtid} failed: ${describeFailure(result)}`, "clone", {
        ctid,
        toolExitCode: result.exitCode,
      });
    }
    ctx.actions.push("clone");

    const after = await this.runtime.status(ctid);
    if (!after.exists) {
      throw new ProvisioningError("CloneFailed", `Container ${ctid} missing after clone reported success`, "clone", {
        ctid,
      });
    }
    logger.info("Container cloned", { ctid, sourceCtid: spec.sourceCtid });
  }

  /**
   * Memory, cores, features and root disk size. Checked on every run, so a
   * clone whose follow-up settings failed is completed by the next run.
   */
  private async resourceStage(ctx: RunContext): Promise<void> {
    const { ctid } = ctx;
    const changes = planResourceChanges(ctx.plan.config, await this.runtime.getConfig(ctid));

    for (const property of changes.properties) {
      logger.info("Applying container resource", { ctid, [property.key]: property.value });
      const result = await this.runtime.setProperty(ctid, property.key, property.value);
      if (result.exitCode !== 0) {
        throw new ProvisioningError(
          "PostCloneConfigFailed",
          `Setting ${property.key} failed: ${describeFailure(result)}`,
          "clone",
          { ctid, toolExitCode: result.exitCode },
        );
      }
      ctx.actions.push(`set ${property.key}`);
    }

    if (changes.rootfsSizeGB !== undefined) {
      logger.info("Growing root disk", { ctid, sizeGB: changes.rootfsSizeGB });
      const result = await this.runtime.resize(ctid, "rootfs", changes.rootfsSizeGB);
      if (result.exitCode !== 0) {
        throw new ProvisioningError("PostCloneConfigFailed", `Resizing rootfs failed: ${describeFailure(result)}`, "clone", {
          ctid,
          toolExitCode: result.exitCode,
        });
      }
      ctx.actions.push("resize rootfs");
    }
  }

  private async networkStage(ctx: RunContext): Promise<void> {
    const { ctid } = ctx;
    const spec = buildNetworkSpec(ctx.plan.config);
    if (!spec) {
      ctx.skipped.push("network");
      return;
    }

    const current = await this.runtime.getConfig(ctid);
    if (networkMatches(spec.value, current[spec.key])) {
      logger.info("Network interface already configured", { ctid, [spec.key]: current[spec.key] });
      ctx.skipped.push("network");
    } else {
      logger.info("Configuring network interface", { ctid, [spec.key]: spec.value });
      const result = await this.runtime.setProperty(ctid, spec.key, spec.value);
      if (result.exitCode !== 0) {
        throw new ProvisioningError(
          "PostCloneConfigFailed",
          `Setting ${spec.key} failed: ${describeFailure(result)}`,
          "network",
          { ctid, toolExitCode: result.exitCode },
        );
      }
      ctx.actions.push(`set ${spec.key}`);
    }
    ctx.tracker.advance("NetworkConfigured");
  }

  private async workloadStage(ctx: RunContext): Promise<void> {
    const { plan, ctid } = ctx;
    const installer = plan.installer;
    if (!installer) {
      ctx.skipped.push("workload");
      return;
    }

    const actionsBefore = ctx.actions.length;
    await this.ensureRunning(ctx);

    let changed = false;
    if (await installer.isInstalled(ctid, plan.config)) {
      logger.info("Workload already installed", { ctid, workload: installer.workload });
    } else {
      await installer.install(ctid, plan.config);
      if (!(await installer.isInstalled(ctid, plan.config))) {
        throw new ProvisioningError(
          "InstallFailed",
          `${installer.workload} install finished but the installation check still fails`,
          "workload",
          { ctid },
        );
      }
      ctx.actions.push("install");
      changed = true;
    }

    if (await installer.isConfigured(ctid, plan.config)) {
      logger.info("Workload configuration is current", { ctid, workload: installer.workload });
    } else {
      await installer.configure(ctid, plan.config);
      ctx.actions.push("configure");
      changed = true;
    }

    if (changed || !(await installer.isServiceActive(ctid))) {
      await installer.manageService(ctid);
      ctx.actions.push(`restart ${installer.serviceName}`);
    } else {
      logger.info("Service already active", { ctid, service: installer.serviceName });
    }

    if (ctx.actions.length === actionsBefore) {
      ctx.skipped.push("workload");
    }
    ctx.tracker.advance("WorkloadInstalled");
  }

  private async verifyStage(ctx: RunContext): Promise<void> {
    const { plan, ctid } = ctx;
    const installer = plan.installer;
    const endpoint = installer?.healthEndpoint(plan.config);
    if (!installer || !endpoint) {
      ctx.skipped.push("verify");
      return;
    }

    const policy = this.healthPolicy(plan);
    const url = this.healthUrl(plan, policy, endpoint);
    const probe =
      policy.via === "host" ? this.hostProbe : new ContainerCurlProbe(this.runtime, ctid, this.healthDefaults.probeTimeoutMs);

    const checker = new HealthChecker(probe, { sleep: this.sleep });
    await checker.probe(
      { url, ctid, diagnostics: () => installer.recentLogs(ctid) },
      policy.maxAttempts,
      policy.intervalSeconds,
    );
    await installer.smokeTest(ctid, plan.config);
    ctx.tracker.advance("Verified");
  }

  private healthUrl(plan: ProvisionPlan, policy: HealthCheckPolicy, endpoint: HealthEndpoint): string {
    if (policy.via === "host") {
      const ip = plan.config.network?.ip.split("/")[0];
      if (!ip) {
        throw new ConfigInvalidError("health_check.via", "host probing needs network_config");
      }
      return `http://${ip}:${endpoint.port}${endpoint.path}`;
    }
    return `http://localhost:${endpoint.port}${endpoint.path}`;
  }

  private healthPolicy(plan: ProvisionPlan): HealthCheckPolicy {
    const own = plan.config.healthCheck;
    return {
      maxAttempts: plan.healthCheck?.maxAttempts ?? own?.maxAttempts ?? this.healthDefaults.maxAttempts,
      intervalSeconds: plan.healthCheck?.intervalSeconds ?? own?.intervalSeconds ?? this.healthDefaults.intervalSeconds,
      via: plan.healthCheck?.via ?? own?.via ?? "container",
    };
  }

  private async snapshotStage(ctx: RunContext): Promise<void> {
    const { plan, ctid } = ctx;
    const name = plan.finalizeSnapshot;
    if (!name) {
      ctx.skipped.push("snapshot");
      return;
    }

    const existing = await this.runtime.snapshotList(ctid);
    if (existing.has(name)) {
      logger.info("Snapshot already exists", { ctid, snapshot: name });
      ctx.skipped.push("snapshot");
      ctx.tracker.advance("Snapshotted");
      return;
    }

    const status = await this.runtime.status(ctid);
    if (status.running) {
      logger.info("Shutting down container for snapshot", { ctid });
      const result = await this.runtime.shutdown(ctid);
      if (result.exitCode !== 0) {
        throw new ProvisioningError("ShutdownTimeout", `Shutdown failed: ${describeFailure(result)}`, "snapshot", {
          ctid,
          toolExitCode: result.exitCode,
        });
      }
      ctx.actions.push("shutdown");
      await this.waitForState(ctid, false, this.shutdownTimeoutSeconds, "ShutdownTimeout", "snapshot");
    }

    logger.info("Creating snapshot", { ctid, snapshot: name });
    const created = await this.runtime.snapshotCreate(ctid, name);
    if (created.exitCode !== 0) {
      throw new ProvisioningError("SnapshotFailed", `Snapshot "${name}" failed: ${describeFailure(created)}`, "snapshot", {
        ctid,
        toolExitCode: created.exitCode,
      });
    }
    ctx.actions.push(`snapshot ${name}`);

    await this.startAndWait(ctx, "snapshot");
    ctx.tracker.advance("Snapshotted");
  }

  private async ensureRunning(ctx: RunContext): Promise<void> {
    const status = await this.runtime.status(ctx.ctid);
    if (!status.running) {
      await this.startAndWait(ctx, "workload");
    }
  }

  private async startAndWait(ctx: RunContext, stage: PipelineStage): Promise<void> {
    const { ctid } = ctx;
    logger.info("Starting container", { ctid });
    const result = await this.runtime.start(ctid);
    if (result.exitCode !== 0) {
      throw new ProvisioningError("StartTimeout", `Start failed: ${describeFailure(result)}`, stage, {
        ctid,
        toolExitCode: result.exitCode,
      });
    }
    ctx.actions.push("start");
    await this.waitForState(ctid, true, this.startTimeoutSeconds, "StartTimeout", stage);
  }

  private async waitForState(
    ctid: number,
    running: boolean,
    timeoutSeconds: number,
    kind: ErrorKind,
    stage: PipelineStage,
  ): Promise<void> {
    const wanted = running ? "running" : "stopped";
    const policy = RetryPolicy.forTimeout(timeoutSeconds, this.pollIntervalSeconds, this.sleep);
    const result = await policy.run<true>(async () => {
      const status = await this.runtime.status(ctid);
      return status.running === running ? { done: true, value: true } : { done: false, reason: `not ${wanted}` };
    });
    if (!result.ok) {
      throw new ProvisioningError(kind, `Container ${ctid} not ${wanted} after ${timeoutSeconds}s`, stage, { ctid });
    }
    logger.info(`Container is ${wanted}`, { ctid });
  }

  private report(ctx: RunContext): ProvisionReport {
    return {
      ctid: ctx.ctid,
      outcome: ctx.actions.length === 0 ? "noop" : "provisioned",
      finalState: ctx.tracker.state,
      states: [...ctx.tracker.history],
      skipped: [...ctx.skipped],
      actions: [...ctx.actions],
    };
  }
}
