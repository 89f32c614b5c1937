/**
 * Provisioning lifecycle states, in order. Derived every run from what the
 * runtime reports and never persisted.
 *
 * ```
 * Absent → Cloned → NetworkConfigured → WorkloadInstalled → Verified → Snapshotted
 * ```
 *
 * Stages may be skipped (no network, no workload, no health endpoint, no
 * snapshot) but a run never moves backwards.
 */

export const PROVISION_STATES = [
  "Absent",
  "Cloned",
  "NetworkConfigured",
  "WorkloadInstalled",
  "Verified",
  "Snapshotted",
] as const;

export type ProvisionState = (typeof PROVISION_STATES)[number];

export function stateRank(state: ProvisionState): number {
  return PROVISION_STATES.indexOf(state);
}

/** Forward moves only; staying put is allowed so a skipped stage is a no-op. */
export function isForwardTransition(from: ProvisionState, to: ProvisionState): boolean {
  return stateRank(to) >= stateRank(from);
}

/** Thrown when a run would move to an earlier state. */
export class StateRegressionError extends Error {
  readonly name = "StateRegressionError" as const;
  constructor(ctid: number, from: ProvisionState, to: ProvisionState) {
    super(`Provision state for CTID ${ctid} cannot regress: ${from} → ${to}`);
  }
}

/** Tracks one run's progress and enforces the forward-only rule. */
export class ProvisionStateTracker {
  private current: ProvisionState = "Absent";
  private readonly visited: ProvisionState[] = [];

  constructor(private readonly ctid: number) {}

  get state(): ProvisionState {
    return this.current;
  }

  get history(): readonly ProvisionState[] {
    return this.visited;
  }

  advance(to: ProvisionState): void {
    if (!isForwardTransition(this.current, to)) {
      throw new StateRegressionError(this.ctid, this.current, to);
    }
    if (this.visited.length === 0 || this.current !== to) {
      this.visited.push(to);
    }
    this.current = to;
  }
}
