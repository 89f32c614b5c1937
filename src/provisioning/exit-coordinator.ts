import { logger } from "../config/logger.js";
import type { ErrorKind } from "./errors.js";
import { isProvisioningError } from "./errors.js";
import type { ProvisionReport } from "./lifecycle-orchestrator.js";

export const EXIT_OK = 0;
export const EXIT_UNCLASSIFIED = 1;

const EXIT_CODES: Record<ErrorKind, number> = {
  UsageError: 2,
  ConfigInvalid: 2,
  SourceNotFound: 3,
  ContainerNotFound: 3,
  CloneFailed: 4,
  InstallFailed: 4,
  PostCloneConfigFailed: 5,
  ConfigureFailed: 5,
  SnapshotFailed: 5,
  ShutdownTimeout: 6,
  StartTimeout: 6,
  HealthCheckFailed: 6,
};

export function exitCodeFor(kind: ErrorKind): number {
  return EXIT_CODES[kind];
}

export type RunResult = { ok: true; report: ProvisionReport } | { ok: false; error: unknown };

/** The one place a run's result becomes a process exit code and a final log line. */
export class ExitCoordinator {
  constructor(private readonly workflow: string) {}

  finish(result: RunResult): number {
    if (result.ok) {
      const { report } = result;
      logger.info(
        report.outcome === "noop"
          ? `${this.workflow} finished: CTID ${report.ctid} already in state ${report.finalState}`
          : `${this.workflow} finished: CTID ${report.ctid} reached state ${report.finalState}`,
        { ctid: report.ctid, outcome: report.outcome, exitCode: EXIT_OK },
      );
      return EXIT_OK;
    }

    const { error } = result;
    if (isProvisioningError(error)) {
      const exitCode = exitCodeFor(error.kind);
      logger.error(`${this.workflow} failed at stage "${error.stage}" (${error.kind}): ${error.message}`, {
        ctid: error.ctid,
        stage: error.stage,
        kind: error.kind,
        toolExitCode: error.toolExitCode,
        exitCode,
      });
      return exitCode;
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error(`${this.workflow} failed with an unexpected error: ${message}`, {
      stack: error instanceof Error ? error.stack : undefined,
      exitCode: EXIT_UNCLASSIFIED,
    });
    return EXIT_UNCLASSIFIED;
  }
}
