/**
 * Failure taxonomy for a provisioning run.
 *
 * Every stage throws a ProvisioningError; ExitCoordinator is the only place
 * that turns a kind into a process exit code.
 */

export const ERROR_KINDS = [
  "UsageError",
  "ConfigInvalid",
  "SourceNotFound",
  "ContainerNotFound",
  "CloneFailed",
  "PostCloneConfigFailed",
  "InstallFailed",
  "ConfigureFailed",
  "HealthCheckFailed",
  "ShutdownTimeout",
  "StartTimeout",
  "SnapshotFailed",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Stage names used in the terminal diagnostic line. */
export type Stage = "arguments" | "config" | "clone" | "network" | "workload" | "verify" | "snapshot";

export class ProvisioningError extends Error {
  readonly name = "ProvisioningError" as const;

  constructor(
    readonly kind: ErrorKind,
    message: string,
    readonly stage: Stage,
    readonly details: {
      ctid?: number;
      /** Exit code of the underlying tool (pct, systemctl, curl...), when there is one. */
      toolExitCode?: number;
      /** Tool output captured for diagnosis (journal tail, stderr). */
      diagnostics?: string;
    } = {},
  ) {
    super(message);
  }

  get ctid(): number | undefined {
    return this.details.ctid;
  }

  get toolExitCode(): number | undefined {
    return this.details.toolExitCode;
  }
}

/** Thrown by ConfigResolver; `field` is the dotted path of the offending field. */
export class ConfigInvalidError extends ProvisioningError {
  constructor(
    readonly field: string,
    reason: string,
  ) {
    super("ConfigInvalid", `Invalid configuration field "${field}": ${reason}`, "config");
  }
}

/** Bad or missing command-line arguments. */
export class UsageError extends ProvisioningError {
  constructor(message: string) {
    super("UsageError", message, "arguments");
  }
}

export function isProvisioningError(err: unknown): err is ProvisioningError {
  return err instanceof ProvisioningError;
}
