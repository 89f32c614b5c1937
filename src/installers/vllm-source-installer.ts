import type { TargetConfig } from "../provisioning/types.js";
import { type HealthEndpoint, SystemdServiceInstaller, shellQuote } from "./service-installer.js";
import { checkChatCompletion } from "./vllm-api-check.js";
import { generateVllmUnit, VLLM_SERVICE_NAME, VLLM_UNIT_PATH, VLLM_VENV_DIR } from "./vllm-unit.js";

export const VLLM_REPO_DIR = "/opt/vllm_repo";

/** vLLM built from a git checkout into a virtualenv, optionally pinned to a commit. */
export class VllmSourceInstaller extends SystemdServiceInstaller<"vllm-source"> {
  readonly workload = "vllm-source" as const;
  readonly serviceName = VLLM_SERVICE_NAME;

  /** With a pinned commit, the checkout's HEAD must be that commit. */
  isInstalled(ctid: number, config: TargetConfig): Promise<boolean> {
    const built = `test -x ${VLLM_VENV_DIR}/bin/vllm && test -d ${VLLM_REPO_DIR}/.git`;
    const { commit } = this.workloadOf(config);
    if (!commit) return this.check(ctid, built);
    const pinned = shellQuote(`${commit}^{commit}`);
    return this.check(
      ctid,
      `${built} && test "$(git -C ${VLLM_REPO_DIR} rev-parse HEAD)" = "$(git -C ${VLLM_REPO_DIR} rev-parse --verify --quiet ${pinned})"`,
    );
  }

  async install(ctid: number, config: TargetConfig): Promise<void> {
    const workload = this.workloadOf(config);
    await this.step(ctid, "InstallFailed", "Checking GPU visibility", "nvidia-smi");
    await this.step(
      ctid,
      "InstallFailed",
      "Installing build prerequisites",
      "apt-get update && DEBIAN_FRONTEND=noninteractive apt-get install -y git python3-venv python3-pip build-essential",
    );
    await this.step(
      ctid,
      "InstallFailed",
      "Creating virtualenv",
      `test -x ${VLLM_VENV_DIR}/bin/python || python3 -m venv ${VLLM_VENV_DIR}`,
    );
    await this.step(
      ctid,
      "InstallFailed",
      "Cloning vLLM repository",
      `test -d ${VLLM_REPO_DIR}/.git || git clone ${shellQuote(workload.repoUrl)} ${VLLM_REPO_DIR}`,
    );
    if (workload.commit) {
      await this.step(
        ctid,
        "InstallFailed",
        `Checking out commit ${workload.commit}`,
        `git -C ${VLLM_REPO_DIR} fetch --all && git -C ${VLLM_REPO_DIR} checkout ${shellQuote(workload.commit)}`,
      );
    }
    await this.step(
      ctid,
      "InstallFailed",
      "Building vLLM from source",
      `${VLLM_VENV_DIR}/bin/pip install --upgrade pip && ${VLLM_VENV_DIR}/bin/pip install -e ${VLLM_REPO_DIR}`,
    );
  }

  async isConfigured(ctid: number, config: TargetConfig): Promise<boolean> {
    const current = await this.readFile(ctid, VLLM_UNIT_PATH);
    return current === generateVllmUnit(this.workloadOf(config));
  }

  async configure(ctid: number, config: TargetConfig): Promise<void> {
    await this.writeFile(ctid, VLLM_UNIT_PATH, generateVllmUnit(this.workloadOf(config)));
  }

  healthEndpoint(config: TargetConfig): HealthEndpoint {
    return { port: this.workloadOf(config).port, path: config.healthCheck?.path ?? "/v1/models" };
  }

  async smokeTest(ctid: number, config: TargetConfig): Promise<void> {
    await checkChatCompletion(this.runtime, ctid, this.workloadOf(config));
  }
}
