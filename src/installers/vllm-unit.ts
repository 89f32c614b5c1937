import type { VllmWorkload } from "../provisioning/target-config-schema.js";

export const VLLM_SERVICE_NAME = "vllm_model_server";
export const VLLM_UNIT_PATH = `/etc/systemd/system/${VLLM_SERVICE_NAME}.service`;
export const VLLM_VENV_DIR = "/opt/vllm";

/** Arguments for the OpenAI-compatible API server entrypoint. */
export function vllmServerArgs(workload: VllmWorkload): string[] {
  const args = [
    "--model",
    workload.model,
    "--served-model-name",
    workload.servedModelName ?? workload.model,
    "--host",
    "0.0.0.0",
    "--port",
    String(workload.port),
  ];
  if (workload.tensorParallelSize > 1) {
    args.push("--tensor-parallel-size", String(workload.tensorParallelSize));
  }
  if (workload.gpuMemoryUtilization !== undefined) {
    args.push("--gpu-memory-utilization", String(workload.gpuMemoryUtilization));
  }
  if (workload.maxModelLen !== undefined) {
    args.push("--max-model-len", String(workload.maxModelLen));
  }
  return args;
}

export function generateVllmUnit(workload: VllmWorkload): string {
  const execStart = [`${VLLM_VENV_DIR}/bin/python`, "-m", "vllm.entrypoints.openai.api_server", ...vllmServerArgs(workload)];
  return `[Unit]
Description=vLLM OpenAI-compatible model server (${workload.servedModelName ?? workload.model})
After=network-online.target
Wants=network-online.target

[Service]
Type=simple
WorkingDirectory=${VLLM_VENV_DIR}
Environment=HF_HOME=${VLLM_VENV_DIR}/.cache/huggingface
ExecStart=${execStart.join(" ")}
Restart=always
RestartSec=10

[Install]
WantedBy=multi-user.target
`;
}
