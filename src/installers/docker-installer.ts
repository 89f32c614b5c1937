import { logger, logPlainOutput } from "../config/logger.js";
import { ProvisioningError } from "../provisioning/errors.js";
import { describeFailure } from "../runtime/runtime-client.js";
import { SystemdServiceInstaller } from "./service-installer.js";

/**
 * Docker Engine for Docker template containers. No health endpoint; `docker info`
 * is the check, followed by a hello-world run.
 */
export class DockerInstaller extends SystemdServiceInstaller<"docker"> {
  readonly workload = "docker" as const;
  readonly serviceName = "docker";

  isInstalled(ctid: number): Promise<boolean> {
    return this.check(ctid, "dpkg -s docker.io >/dev/null 2>&1 && command -v docker >/dev/null");
  }

  async install(ctid: number): Promise<void> {
    await this.step(
      ctid,
      "InstallFailed",
      "Installing Docker Engine",
      "apt-get update && DEBIAN_FRONTEND=noninteractive apt-get install -y docker.io",
    );
  }

  /** Nothing is generated for Docker. */
  async isConfigured(): Promise<boolean> {
    return true;
  }

  async configure(): Promise<void> {}

  async manageService(ctid: number): Promise<void> {
    await super.manageService(ctid);
    const info = await this.runtime.exec(ctid, ["docker", "info"]);
    if (info.exitCode !== 0) {
      throw new ProvisioningError("ConfigureFailed", `docker info failed: ${describeFailure(info)}`, "workload", {
        ctid,
        toolExitCode: info.exitCode,
      });
    }
    logger.info("Docker Engine is running", { ctid });
    logPlainOutput("info", info.stdout.split("\n").slice(0, 10).join("\n"));

    // Pulls from Docker Hub; a failure only warns.
    const hello = await this.runtime.exec(ctid, ["docker", "run", "--rm", "hello-world"]);
    if (hello.exitCode !== 0) {
      logger.warn("Docker hello-world test failed", {
        ctid,
        exitCode: hello.exitCode,
        error: describeFailure(hello),
      });
      return;
    }
    logger.info("Docker hello-world test passed", { ctid });
  }

  healthEndpoint(): null {
    return null;
  }
}
