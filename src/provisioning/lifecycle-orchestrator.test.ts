import { beforeEach, describe, expect, it, vi } from "vitest";
import { FakeRuntimeClient, failed, ok } from "../test/fake-runtime-client.js";
import { FakeServiceInstaller } from "../test/fake-service-installer.js";
import { ProvisioningError } from "./errors.js";
import { LifecycleOrchestrator } from "./lifecycle-orchestrator.js";
import type { TargetConfig } from "./types.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
  logPlainOutput: vi.fn(),
}));

const NET0 = "name=eth0,bridge=vmbr0,ip=10.0.0.110/24,gw=10.0.0.1,hwaddr=52:54:00:12:34:56";

const app1: TargetConfig = {
  ctid: 910,
  name: "app1",
  memoryMB: 4096,
  cores: 2,
  storagePool: "local-zfs",
  features: [],
  unprivileged: true,
  network: { ip: "10.0.0.110/24", gateway: "10.0.0.1", ifName: "eth0", bridge: "vmbr0" },
  macAddress: "52:54:00:12:34:56",
};

const dockerTemplate: TargetConfig = {
  ctid: 902,
  name: "docker-template",
  memoryMB: 2048,
  cores: 2,
  storagePool: "local-zfs",
  features: ["nesting=1"],
  unprivileged: true,
};

const TEMPLATE_RESOURCES = { memory: "2048", cores: "2", features: "nesting=1" };

const source = { sourceCtid: 902, snapshotName: "docker-snapshot" };

function curlAnswers(status: string) {
  return (_ctid: number, argv: readonly string[]) => (argv[0] === "curl" ? ok(status) : ok());
}

async function runError(promise: Promise<unknown>): Promise<ProvisioningError> {
  const err = await promise.catch((e: unknown) => e);
  if (err instanceof ProvisioningError) return err;
  throw new Error(`expected ProvisioningError, got ${String(err)}`);
}

describe("LifecycleOrchestrator", () => {
  let runtime: FakeRuntimeClient;
  let sleep: ReturnType<typeof vi.fn>;
  let orchestrator: LifecycleOrchestrator;

  beforeEach(() => {
    runtime = new FakeRuntimeClient();
    runtime.addContainer(902, {
      snapshots: ["docker-snapshot"],
      config: { hostname: "docker-template", net0: "name=eth0,bridge=vmbr0,ip=10.0.0.102/24,gw=10.0.0.1" },
    });
    runtime.execHandler = curlAnswers("200");
    sleep = vi.fn().mockResolvedValue(undefined);
    orchestrator = new LifecycleOrchestrator(runtime, {
      shutdownTimeoutSeconds: 6,
      startTimeoutSeconds: 6,
      pollIntervalSeconds: 3,
      sleep,
    });
  });

  describe("clone workflow", () => {
    it("clones 910 from 902 and then applies net0", async () => {
      const cloneSpy = vi.spyOn(runtime, "clone");

      const report = await orchestrator.run({ config: app1, source });

      expect(cloneSpy).toHaveBeenCalledWith({
        sourceCtid: 902,
        targetCtid: 910,
        snapshotName: "docker-snapshot",
        hostname: "app1",
        memory: 4096,
        cores: 2,
        storage: "local-zfs",
        features: [],
        unprivileged: "1",
      });
      const setCalls = runtime.calls.filter((c) => c.method === "setProperty");
      expect(setCalls).toEqual([{ method: "setProperty", ctid: 910, args: ["net0", NET0] }]);
      expect(report).toEqual({
        ctid: 910,
        outcome: "provisioned",
        finalState: "NetworkConfigured",
        states: ["Cloned", "NetworkConfigured"],
        skipped: ["workload", "verify", "snapshot"],
        actions: ["clone", "set net0"],
      });
    });

    it("performs no side effects on a second run", async () => {
      const first = await orchestrator.run({ config: app1, source });
      const second = await orchestrator.run({ config: app1, source });

      expect(second.finalState).toBe(first.finalState);
      expect(second.outcome).toBe("noop");
      expect(second.skipped).toEqual(["clone", "network", "workload", "verify", "snapshot"]);
      expect(runtime.count("clone")).toBe(1);
      expect(runtime.count("setProperty")).toBe(1);
    });

    it("skips the network stage when the target declares no network", async () => {
      const report = await orchestrator.run({ config: { ...app1, network: undefined }, source });

      expect(runtime.count("setProperty")).toBe(0);
      expect(report.finalState).toBe("Cloned");
      expect(report.skipped).toContain("network");
    });

    it("fails with ContainerNotFound when the target is missing and there is no source", async () => {
      const err = await runError(orchestrator.run({ config: app1 }));
      expect(err.kind).toBe("ContainerNotFound");
      expect(err.stage).toBe("clone");
    });

    it("fails with SourceNotFound when the template is missing", async () => {
      const err = await runError(orchestrator.run({ config: app1, source: { sourceCtid: 903, snapshotName: "docker-snapshot" } }));
      expect(err.kind).toBe("SourceNotFound");
      expect(err.message).toBe("Source container 903 does not exist");
      expect(runtime.count("clone")).toBe(0);
    });

    it("fails with SourceNotFound when the snapshot is missing", async () => {
      const err = await runError(orchestrator.run({ config: app1, source: { sourceCtid: 902, snapshotName: "gone" } }));
      expect(err.kind).toBe("SourceNotFound");
      expect(err.message).toBe('Snapshot "gone" not found on source container 902');
      expect(runtime.count("clone")).toBe(0);
    });

    it("classifies a failed clone with the tool's exit code", async () => {
      runtime.failures.set("clone", failed(4, "storage 'local-zfs' does not exist"));

      const err = await runError(orchestrator.run({ config: app1, source }));

      expect(err.kind).toBe("CloneFailed");
      expect(err.toolExitCode).toBe(4);
      expect(err.message).toBe("Clone of 902 failed: storage 'local-zfs' does not exist");
      expect(runtime.count("setProperty")).toBe(0);
    });

    it("classifies a failed set-property as PostCloneConfigFailed", async () => {
      runtime.failures.set("setProperty", failed(25, "invalid format - bridge 'vmbr9' does not exist"));

      const err = await runError(orchestrator.run({ config: app1, source }));

      expect(err.kind).toBe("PostCloneConfigFailed");
      expect(err.stage).toBe("network");
      expect(err.toolExitCode).toBe(25);
    });

    it("completes the resource settings of a clone whose follow-up settings failed", async () => {
      const sized: TargetConfig = { ...app1, features: ["nesting=1"], storageSizeGB: 32 };
      runtime.cloneFailsAfterCreate = failed(25, "unable to apply memory");

      const err = await runError(orchestrator.run({ config: sized, source }));
      expect(err.kind).toBe("CloneFailed");
      expect(runtime.containers.get(910)?.config.memory).toBeUndefined();

      runtime.cloneFailsAfterCreate = undefined;
      const report = await orchestrator.run({ config: sized, source });

      expect(report.skipped).toEqual(["clone", "workload", "verify", "snapshot"]);
      expect(report.actions).toEqual(["set memory", "set cores", "set features", "resize rootfs", "set net0"]);
      expect(runtime.count("clone")).toBe(1);
      expect(runtime.containers.get(910)?.config).toEqual({
        hostname: "app1",
        net0: NET0,
        memory: "4096",
        cores: "2",
        features: "nesting=1",
        rootfs: "local-zfs:subvol-910-disk-0,size=32G",
      });
    });

    it("reports a failed resource setting as PostCloneConfigFailed in the clone stage", async () => {
      runtime.addContainer(910, { config: { cores: "2" } });
      runtime.failures.set("setProperty", failed(25, "unable to apply memory"));

      const err = await runError(orchestrator.run({ config: app1, source }));

      expect(err.kind).toBe("PostCloneConfigFailed");
      expect(err.stage).toBe("clone");
      expect(err.message).toBe("Setting memory failed: unable to apply memory");
      expect(err.toolExitCode).toBe(25);
    });

    it("reports a failed disk resize as PostCloneConfigFailed", async () => {
      runtime.addContainer(910, { config: { memory: "4096", cores: "2", rootfs: "local-zfs:subvol-910-disk-0,size=8G" } });
      runtime.failures.set("resize", failed(1, "zfs error: out of space"));

      const err = await runError(orchestrator.run({ config: { ...app1, storageSizeGB: 32 }, source }));

      expect(err.kind).toBe("PostCloneConfigFailed");
      expect(err.message).toBe("Resizing rootfs failed: zfs error: out of space");
      expect(runtime.calls.filter((c) => c.method === "resize")).toEqual([
        { method: "resize", ctid: 910, args: ["rootfs", "32G"] },
      ]);
    });

    it("rejects a clone onto its own source before touching the source", async () => {
      const err = await runError(orchestrator.run({ config: { ...app1, ctid: 905 }, source: { sourceCtid: 905, snapshotName: "base" } }));

      expect(err.kind).toBe("ConfigInvalid");
      expect(runtime.calls).toEqual([{ method: "status", ctid: 905, args: [] }]);
    });
  });

  describe("full pipeline", () => {
    it("clones, configures, installs, verifies and snapshots in order", async () => {
      const installer = new FakeServiceInstaller();

      const report = await orchestrator.run({ config: app1, source, installer, finalizeSnapshot: "app-snapshot" });

      expect(report.states).toEqual(["Cloned", "NetworkConfigured", "WorkloadInstalled", "Verified", "Snapshotted"]);
      expect(report.actions).toEqual([
        "clone",
        "set net0",
        "start",
        "install",
        "configure",
        "restart fake-service",
        "shutdown",
        "snapshot app-snapshot",
        "start",
      ]);
      expect(runtime.containers.get(910)?.snapshots.has("app-snapshot")).toBe(true);
      expect(runtime.containers.get(910)?.running).toBe(true);
    });

    it("is idempotent across two runs", async () => {
      const installer = new FakeServiceInstaller();
      const plan = { config: app1, source, installer, finalizeSnapshot: "app-snapshot" };

      const first = await orchestrator.run(plan);
      const second = await orchestrator.run(plan);

      expect(second).toEqual({
        ctid: 910,
        outcome: "noop",
        finalState: first.finalState,
        states: ["Snapshotted"],
        skipped: ["clone", "network", "workload", "verify", "snapshot"],
        actions: [],
      });
      expect(runtime.count("clone")).toBe(1);
      expect(runtime.count("snapshotCreate")).toBe(1);
      expect(runtime.count("shutdown")).toBe(1);
      expect(installer.counts.install).toBe(1);
    });

    it("short-circuits when the workload marker is present", async () => {
      runtime.addContainer(953, { running: true });
      const installer = new FakeServiceInstaller();
      installer.installed.add(953);
      installer.configured.add(953);
      installer.active.add(953);

      const report = await orchestrator.run({ config: { ...app1, ctid: 953 }, source, installer });

      expect(report.outcome).toBe("noop");
      expect(report.finalState).toBe("Verified");
      expect(runtime.count("clone")).toBe(0);
      expect(runtime.count("exec")).toBe(0);
      expect(installer.counts).toEqual({ install: 0, configure: 0, manageService: 0, recentLogs: 0, smokeTest: 0 });
    });

    it("only restarts the service when it is installed and configured but stopped", async () => {
      runtime.addContainer(953, { running: true, config: { memory: "4096", cores: "2", net0: NET0 } });
      const installer = new FakeServiceInstaller();
      installer.installed.add(953);
      installer.configured.add(953);

      const report = await orchestrator.run({ config: { ...app1, ctid: 953 }, installer });

      expect(report.actions).toEqual(["restart fake-service"]);
      expect(installer.counts.install).toBe(0);
      expect(installer.counts.configure).toBe(0);
    });

    it("resumes after a failed install without cloning again", async () => {
      const installer = new FakeServiceInstaller();
      installer.failInstall = true;

      const err = await runError(orchestrator.run({ config: app1, source, installer }));
      expect(err.kind).toBe("InstallFailed");
      expect(err.toolExitCode).toBe(100);

      installer.failInstall = false;
      const report = await orchestrator.run({ config: app1, source, installer });

      expect(report.skipped).toEqual(["clone", "network", "snapshot"]);
      expect(report.actions).toEqual(["install", "configure", "restart fake-service"]);
      expect(runtime.count("clone")).toBe(1);
      expect(runtime.count("setProperty")).toBe(1);
    });

    it("fails verification after the configured attempts and emits recent logs", async () => {
      runtime.execHandler = curlAnswers("503");
      const installer = new FakeServiceInstaller();

      const err = await runError(
        orchestrator.run({
          config: app1,
          source,
          installer,
          healthCheck: { maxAttempts: 3, intervalSeconds: 1 },
          finalizeSnapshot: "app-snapshot",
        }),
      );

      expect(err.kind).toBe("HealthCheckFailed");
      expect(err.details.diagnostics).toBe("fake-service[1]: listening");
      expect(installer.counts.recentLogs).toBe(1);
      expect(runtime.calls.filter((c) => c.args[0] === "curl")).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[1_000], [1_000]]);
      expect(runtime.count("snapshotCreate")).toBe(0);
    });

    it("runs the workload's smoke test once the health check passes", async () => {
      const installer = new FakeServiceInstaller();
      await orchestrator.run({ config: app1, source, installer });
      expect(installer.counts.smokeTest).toBe(1);
    });

    it("skips the smoke test when the health check fails", async () => {
      runtime.execHandler = curlAnswers("503");
      const installer = new FakeServiceInstaller();

      await runError(orchestrator.run({ config: app1, source, installer, healthCheck: { maxAttempts: 1 } }));

      expect(installer.counts.smokeTest).toBe(0);
    });

    it("takes the health policy from the target config", async () => {
      runtime.execHandler = curlAnswers("502");
      const installer = new FakeServiceInstaller();

      await runError(
        orchestrator.run({ config: { ...app1, healthCheck: { maxAttempts: 2, intervalSeconds: 5, path: undefined, port: undefined, via: "container" } }, source, installer }),
      );

      expect(sleep.mock.calls).toEqual([[5_000]]);
    });

    it("checks the target address from the host when asked to", async () => {
      const hostProbe = { get: vi.fn().mockResolvedValue({ httpStatus: 200 }) };
      const hostOrchestrator = new LifecycleOrchestrator(runtime, { hostProbe, sleep });
      const installer = new FakeServiceInstaller({ port: 8000, path: "/v1/models" });

      await hostOrchestrator.run({ config: app1, source, installer, healthCheck: { via: "host" } });

      expect(hostProbe.get).toHaveBeenCalledWith("http://10.0.0.110:8000/v1/models");
      expect(runtime.calls.filter((c) => c.args[0] === "curl")).toHaveLength(0);
    });

    it("skips verification for workloads without a health endpoint", async () => {
      const installer = new FakeServiceInstaller(null);

      const report = await orchestrator.run({ config: app1, source, installer });

      expect(report.finalState).toBe("WorkloadInstalled");
      expect(report.skipped).toEqual(["verify", "snapshot"]);
    });
  });

  describe("snapshot finalization", () => {
    it("does nothing when the snapshot already exists", async () => {
      const report = await orchestrator.run({
        config: dockerTemplate,
        installer: new FakeServiceInstaller(null),
        finalizeSnapshot: "docker-snapshot",
      });

      expect(report.outcome).toBe("noop");
      expect(report.finalState).toBe("Snapshotted");
      expect(runtime.count("shutdown")).toBe(0);
      expect(runtime.count("snapshotCreate")).toBe(0);
      expect(runtime.count("start")).toBe(0);
    });

    it("stops, snapshots and restarts a running container", async () => {
      runtime.addContainer(902, { running: true, config: TEMPLATE_RESOURCES });

      const report = await orchestrator.run({ config: dockerTemplate, finalizeSnapshot: "docker-snapshot" });

      expect(report.actions).toEqual(["shutdown", "snapshot docker-snapshot", "start"]);
      expect(runtime.calls.map((c) => c.method).filter((m) => m !== "status")).toEqual([
        "snapshotList",
        "getConfig",
        "snapshotList",
        "shutdown",
        "snapshotCreate",
        "start",
      ]);
    });

    it("times out when the container does not stop", async () => {
      runtime.addContainer(902, { running: true, ignoresShutdown: true, config: TEMPLATE_RESOURCES });

      const err = await runError(orchestrator.run({ config: dockerTemplate, finalizeSnapshot: "docker-snapshot" }));

      expect(err.kind).toBe("ShutdownTimeout");
      expect(err.message).toBe("Container 902 not stopped after 6s");
      expect(sleep.mock.calls).toEqual([[3_000], [3_000]]);
      expect(runtime.count("snapshotCreate")).toBe(0);
    });

    it("reports SnapshotFailed with the tool's exit code", async () => {
      runtime.addContainer(902, { running: false, config: TEMPLATE_RESOURCES });
      runtime.failures.set("snapshotCreate", failed(255, "snapshot feature is not available"));

      const err = await runError(orchestrator.run({ config: dockerTemplate, finalizeSnapshot: "docker-snapshot" }));

      expect(err.kind).toBe("SnapshotFailed");
      expect(err.toolExitCode).toBe(255);
      expect(runtime.count("shutdown")).toBe(0);
      expect(runtime.count("start")).toBe(0);
    });

    it("times out when the container does not come back", async () => {
      runtime.addContainer(902, { running: false, ignoresStart: true, config: TEMPLATE_RESOURCES });

      const err = await runError(orchestrator.run({ config: dockerTemplate, finalizeSnapshot: "docker-snapshot" }));

      expect(err.kind).toBe("StartTimeout");
      expect(err.stage).toBe("snapshot");
      expect(runtime.containers.get(902)?.snapshots.has("docker-snapshot")).toBe(true);
    });
  });

  describe("planSteps", () => {
    it("describes every stage without touching the runtime", () => {
      const installer = new FakeServiceInstaller({ port: 8000, path: "/v1/models" });

      const steps = orchestrator.planSteps({
        config: { ...app1, features: ["nesting=1"], storageSizeGB: 32 },
        source,
        installer,
        healthCheck: { maxAttempts: 3, intervalSeconds: 5 },
        finalizeSnapshot: "app-snapshot",
      });

      expect(steps).toEqual([
        "clone 902@docker-snapshot to 910 if absent (hostname app1, storage local-zfs:32, unprivileged 1)",
        "set memory 4096, cores 2, features nesting=1 where they differ",
        "grow rootfs to 32G if smaller",
        `set net0 ${NET0}`,
        "install, configure and start nginx-proxy (service fake-service) as needed",
        "check http://localhost:8000/v1/models until HTTP 200 (3 attempts, 5s apart)",
        'shut down, snapshot "app-snapshot" and start again unless the snapshot exists',
      ]);
      expect(runtime.calls).toEqual([]);
    });

    it("names the existing container when there is no clone source", () => {
      expect(orchestrator.planSteps({ config: dockerTemplate })).toEqual([
        "use existing container 902",
        "set memory 2048, cores 2, features nesting=1 where they differ",
      ]);
    });
  });
});
