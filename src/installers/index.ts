import type { WorkloadConfig } from "../provisioning/target-config-schema.js";
import type { RuntimeClient } from "../runtime/runtime-client.js";
import { DockerInstaller } from "./docker-installer.js";
import { NginxProxyInstaller } from "./nginx-proxy-installer.js";
import type { ServiceInstaller } from "./service-installer.js";
import { VllmPackageInstaller } from "./vllm-package-installer.js";
import { VllmSourceInstaller } from "./vllm-source-installer.js";

export type { HealthEndpoint, ServiceInstaller } from "./service-installer.js";

export function createInstaller(workload: Pick<WorkloadConfig, "type">, runtime: RuntimeClient): ServiceInstaller {
  switch (workload.type) {
    case "nginx-proxy":
      return new NginxProxyInstaller(runtime);
    case "vllm-source":
      return new VllmSourceInstaller(runtime);
    case "vllm-package":
      return new VllmPackageInstaller(runtime);
    case "docker":
      return new DockerInstaller(runtime);
  }
}
