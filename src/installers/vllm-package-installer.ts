import type { TargetConfig } from "../provisioning/types.js";
import { type HealthEndpoint, SystemdServiceInstaller, shellQuote } from "./service-installer.js";
import { checkChatCompletion } from "./vllm-api-check.js";
import { generateVllmUnit, VLLM_SERVICE_NAME, VLLM_UNIT_PATH, VLLM_VENV_DIR } from "./vllm-unit.js";

/** vLLM from a pinned pip manifest into a virtualenv. */
export class VllmPackageInstaller extends SystemdServiceInstaller<"vllm-package"> {
  readonly workload = "vllm-package" as const;
  readonly serviceName = VLLM_SERVICE_NAME;

  isInstalled(ctid: number, _config?: TargetConfig): Promise<boolean> {
    return this.check(ctid, `test -x ${VLLM_VENV_DIR}/bin/python && ${VLLM_VENV_DIR}/bin/pip show vllm >/dev/null 2>&1`);
  }

  async install(ctid: number, config: TargetConfig): Promise<void> {
    const workload = this.workloadOf(config);
    await this.step(
      ctid,
      "InstallFailed",
      "Installing Python tooling",
      "apt-get update && DEBIAN_FRONTEND=noninteractive apt-get install -y python3-venv python3-pip",
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
      "Installing vLLM packages",
      `${VLLM_VENV_DIR}/bin/pip install ${workload.packages.map(shellQuote).join(" ")}`,
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
