import { describe, expect, it } from "vitest";
import { resolveTargetConfig } from "../provisioning/config-resolver.js";
import type { VllmWorkload } from "../provisioning/target-config-schema.js";
import { generateVllmUnit, vllmServerArgs } from "./vllm-unit.js";

function vllmWorkload(fields: Record<string, unknown>): VllmWorkload {
  const config = resolveTargetConfig(
    {
      name: "vllm1",
      memory_mb: 32768,
      cores: 8,
      storage_pool: "local-zfs",
      workload: { type: "vllm-package", model: "test-org/tiny-model", ...fields },
    },
    950,
  );
  const workload = config.workload;
  if (workload?.type !== "vllm-package") throw new Error("expected a vllm-package workload");
  return workload;
}

describe("vllmServerArgs", () => {
  it("serves the model under its own name on all interfaces by default", () => {
    expect(vllmServerArgs(vllmWorkload({}))).toEqual([
      "--model",
      "test-org/tiny-model",
      "--served-model-name",
      "test-org/tiny-model",
      "--host",
      "0.0.0.0",
      "--port",
      "8000",
    ]);
  });

  it("adds tuning flags only when they are set", () => {
    const args = vllmServerArgs(
      vllmWorkload({
        served_model_name: "tiny",
        port: 8001,
        tensor_parallel_size: 2,
        gpu_memory_utilization: 0.9,
        max_model_len: 4096,
      }),
    );

    expect(args).toEqual([
      "--model",
      "test-org/tiny-model",
      "--served-model-name",
      "tiny",
      "--host",
      "0.0.0.0",
      "--port",
      "8001",
      "--tensor-parallel-size",
      "2",
      "--gpu-memory-utilization",
      "0.9",
      "--max-model-len",
      "4096",
    ]);
  });
});

describe("generateVllmUnit", () => {
  it("writes a restart-always unit that runs the API server from the virtualenv", () => {
    expect(generateVllmUnit(vllmWorkload({ served_model_name: "tiny" }))).toBe(`[Unit]
Description=vLLM OpenAI-compatible model server (tiny)
After=network-online.target
Wants=network-online.target

[Service]
Type=simple
WorkingDirectory=/opt/vllm
Environment=HF_HOME=/opt/vllm/.cache/huggingface
ExecStart=/opt/vllm/bin/python -m vllm.entrypoints.openai.api_server --model test-org/tiny-model --served-model-name tiny --host 0.0.0.0 --port 8000
Restart=always
RestartSec=10

[Install]
WantedBy=multi-user.target
`);
  });
});
