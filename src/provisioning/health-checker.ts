import { logger, logPlainOutput } from "../config/logger.js";
import type { RuntimeClient } from "../runtime/runtime-client.js";
import { ProvisioningError } from "./errors.js";
import { RetryPolicy, type Sleep } from "./retry-policy.js";
import type { HealthCheckOutcome } from "./types.js";

/** Result of one GET: a status code, or a connection-level failure. */
export type ProbeResponse = { httpStatus: number } | { connectionFailed: true; error: string };

export interface HttpProbe {
  get(url: string): Promise<ProbeResponse>;
}

/** Probe from the hypervisor host with `fetch`. */
export class FetchHttpProbe implements HttpProbe {
  constructor(private readonly timeoutMs = 5_000) {}

  async get(url: string): Promise<ProbeResponse> {
    try {
      const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      // Drain so the socket is released before the next attempt.
      await res.arrayBuffer();
      return { httpStatus: res.status };
    } catch (err) {
      return { connectionFailed: true, error: err instanceof Error ? err.message : String(err) };
    }
  }
}

/** Probe from inside the container with curl, for services bound to localhost. */
export class ContainerCurlProbe implements HttpProbe {
  constructor(
    private readonly runtime: RuntimeClient,
    private readonly ctid: number,
    private readonly timeoutMs = 5_000,
  ) {}

  async get(url: string): Promise<ProbeResponse> {
    const maxTime = String(Math.max(1, Math.ceil(this.timeoutMs / 1000)));
    const result = await this.runtime.exec(this.ctid, [
      "curl",
      "-s",
      "-o",
      "/dev/null",
      "-w",
      "%{http_code}",
      "--max-time",
      maxTime,
      url,
    ]);
    const code = Number.parseInt(result.stdout.trim(), 10);
    if (result.exitCode !== 0 || !Number.isFinite(code) || code === 0) {
      return { connectionFailed: true, error: result.stderr.trim() || `curl exit code ${result.exitCode}` };
    }
    return { httpStatus: code };
  }
}

export interface HealthTarget {
  url: string;
  ctid?: number;
  /** Recent service logs, fetched only after the last attempt fails. */
  diagnostics?: () => Promise<string>;
}

/** Bounded GET loop; only HTTP 200 counts as healthy. */
export class HealthChecker {
  private readonly sleep?: Sleep;

  constructor(
    private readonly http: HttpProbe,
    options: { sleep?: Sleep } = {},
  ) {
    this.sleep = options.sleep;
  }

  async probe(target: HealthTarget, maxAttempts: number, intervalSeconds: number): Promise<HealthCheckOutcome[]> {
    const policy = new RetryPolicy({ maxAttempts, intervalMs: intervalSeconds * 1000, sleep: this.sleep });
    const outcomes: HealthCheckOutcome[] = [];
    const meta = { ctid: target.ctid, url: target.url };

    logger.info("Waiting for service health", { ...meta, maxAttempts, intervalSeconds });
    const result = await policy.run<HealthCheckOutcome>(async (attempt) => {
      const response = await this.http.get(target.url);
      if ("connectionFailed" in response) {
        outcomes.push({ attempt, connectionFailed: true });
        logger.info("Service not reachable yet", { ...meta, attempt, maxAttempts, error: response.error });
        return { done: false, reason: `connection failed: ${response.error}` };
      }
      const outcome = { attempt, httpStatus: response.httpStatus, connectionFailed: false };
      outcomes.push(outcome);
      if (response.httpStatus === 200) {
        return { done: true, value: outcome };
      }
      logger.info("Service answered with non-200 status", { ...meta, attempt, maxAttempts, status: response.httpStatus });
      return { done: false, reason: `HTTP ${response.httpStatus}` };
    });

    if (result.ok) {
      logger.info("Service is healthy", { ...meta, attempt: result.attempts });
      return outcomes;
    }

    let diagnostics: string | undefined;
    if (target.diagnostics) {
      diagnostics = await target.diagnostics();
      logger.error("Recent service logs", meta);
      logPlainOutput("error", diagnostics);
    }
    throw new ProvisioningError(
      "HealthCheckFailed",
      `No HTTP 200 from ${target.url} after ${result.attempts} attempts (last: ${result.lastReason})`,
      "verify",
      { ctid: target.ctid, diagnostics },
    );
  }
}
