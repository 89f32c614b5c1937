import type { TargetConfig } from "../provisioning/types.js";
import {
  generateServerBlock,
  NGINX_DEFAULT_ENABLED_PATH,
  NGINX_ENABLED_PATH,
  NGINX_SITE_PATH,
} from "./nginx-server-block.js";
import { type HealthEndpoint, SystemdServiceInstaller } from "./service-installer.js";

/** nginx reverse proxy in front of a single backend. */
export class NginxProxyInstaller extends SystemdServiceInstaller<"nginx-proxy"> {
  readonly workload = "nginx-proxy" as const;
  readonly serviceName = "nginx";

  isInstalled(ctid: number): Promise<boolean> {
    return this.check(ctid, "dpkg -s nginx >/dev/null 2>&1 && test -x /usr/sbin/nginx");
  }

  async install(ctid: number): Promise<void> {
    await this.step(
      ctid,
      "InstallFailed",
      "Installing nginx",
      "apt-get update && DEBIAN_FRONTEND=noninteractive apt-get install -y nginx",
    );
  }

  async isConfigured(ctid: number, config: TargetConfig): Promise<boolean> {
    const current = await this.readFile(ctid, NGINX_SITE_PATH);
    if (current !== generateServerBlock(this.workloadOf(config))) return false;
    return this.check(ctid, `test -L ${NGINX_ENABLED_PATH} && ! test -e ${NGINX_DEFAULT_ENABLED_PATH}`);
  }

  async configure(ctid: number, config: TargetConfig): Promise<void> {
    const workload = this.workloadOf(config);
    await this.writeFile(ctid, NGINX_SITE_PATH, generateServerBlock(workload));
    await this.step(
      ctid,
      "ConfigureFailed",
      "Enabling proxy site",
      `ln -sf ${NGINX_SITE_PATH} ${NGINX_ENABLED_PATH} && rm -f ${NGINX_DEFAULT_ENABLED_PATH} && nginx -t`,
    );
  }

  healthEndpoint(config: TargetConfig): HealthEndpoint {
    return { port: this.workloadOf(config).listenPort, path: config.healthCheck?.path ?? "/" };
  }
}
