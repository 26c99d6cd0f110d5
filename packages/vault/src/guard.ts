/**
 * Reentrancy guard — scoped acquisition with a phase state machine.
 *
 * `run()` checks and acquires in the same synchronous step, so any
 * re-entry (including from inside an awaited transfer) sees the guard
 * held and is refused. The guard is released on every exit path.
 */

import { CustodyError } from "@custody/ledger";
import type { OperationPhase } from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class GuardError extends Error {
  public readonly code: GuardErrorCode;
  constructor(code: GuardErrorCode, message: string) {
    super(message);
    this.name = "GuardError";
    this.code = code;
  }
}

export type GuardErrorCode = "INVALID_TRANSITION";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<OperationPhase, readonly OperationPhase[]> = {
  idle: ["validating"],
  validating: ["idle", "mutating"],
  mutating: ["idle", "transferring"],
  transferring: ["idle", "faulted"],
  faulted: ["idle"],
};

/** Moves the guarded operation to its next phase. */
export type Advance = (next: OperationPhase) => void;

// =============================================================================
// Guard
// =============================================================================

export class ReentrancyGuard {
  private _phase: OperationPhase = "idle";

  get phase(): OperationPhase {
    return this._phase;
  }

  get inProgress(): boolean {
    return this._phase !== "idle";
  }

  /**
   * Run `operation` while holding the guard.
   *
   * Fails with REENTRANCY_REJECTED, without calling `operation`, if an
   * operation is already in progress.
   */
  async run<T>(operation: (advance: Advance) => T | Promise<T>): Promise<T> {
    if (this.inProgress) {
      throw new CustodyError({ code: "REENTRANCY_REJECTED" });
    }
    this._transition("validating");

    try {
      return await operation((next) => this._transition(next));
    } finally {
      this._phase = "idle";
    }
  }

  private _transition(next: OperationPhase): void {
    const allowed = VALID_TRANSITIONS[this._phase];
    if (!allowed.includes(next)) {
      throw new GuardError(
        "INVALID_TRANSITION",
        `Cannot move from '${this._phase}' to '${next}'`,
      );
    }
    this._phase = next;
  }
}
