import type { CloneSpec } from "../provisioning/types.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ContainerStatus {
  exists: boolean;
  running: boolean;
}

export interface ExecOptions {
  /** Written to the command's stdin, used to push generated files into a container. */
  input?: string;
}

/**
 * Capability surface over the container runtime. Every method reports what
 * the runtime says; none of them throw for a non-zero tool exit, callers
 * classify the result.
 */
export interface RuntimeClient {
  status(ctid: number): Promise<ContainerStatus>;
  clone(spec: CloneSpec): Promise<CommandResult>;
  setProperty(ctid: number, key: string, value: string): Promise<CommandResult>;
  /** Grow a volume (`rootfs`, `mp0`...) to `sizeGB`. */
  resize(ctid: number, disk: string, sizeGB: number): Promise<CommandResult>;
  /** Current container config as `key → value`; empty when the container is missing. */
  getConfig(ctid: number): Promise<Record<string, string>>;
  snapshotList(ctid: number): Promise<Set<string>>;
  snapshotCreate(ctid: number, name: string): Promise<CommandResult>;
  shutdown(ctid: number): Promise<CommandResult>;
  start(ctid: number): Promise<CommandResult>;
  exec(ctid: number, argv: readonly string[], options?: ExecOptions): Promise<CommandResult>;
}

/**
 * A runtime query that failed for a reason other than the container being
 * absent (timeout, permissions). Not a provisioning outcome, so it maps to
 * the unclassified exit code.
 */
export class RuntimeCommandError extends Error {
  readonly name = "RuntimeCommandError" as const;

  constructor(
    readonly command: string,
    readonly result: CommandResult,
  ) {
    super(`${command} failed: ${describeFailure(result)}`);
  }
}

/** Run a shell snippet inside the container. */
export function execShell(
  runtime: RuntimeClient,
  ctid: number,
  script: string,
  options?: ExecOptions,
): Promise<CommandResult> {
  return runtime.exec(ctid, ["bash", "-c", script], options);
}

/** stderr when there is any, else stdout, trimmed for log lines and error messages. */
export function describeFailure(result: CommandResult): string {
  const text = (result.stderr.trim() || result.stdout.trim()).split("\n").slice(-5).join("\n");
  return text || `exit code ${result.exitCode}`;
}
