// ============================================
// Run State Machine
// ============================================

import { ErrorCode } from "@helmsman/shared";
import { z } from "zod";
import { HelmsmanError } from "../errors/index.js";

/**
 * Run state enumeration.
 *
 * - Idle: created, not started
 * - Running: turns in progress
 * - Completed: the model gave a final answer
 * - MaxTurnsReached / CostLimitReached: a budget ceiling ended the run
 * - HookStopped: a hook asked the run to stop
 * - Errored: an interrupting denial or an unrecoverable failure
 * - Cancelled: aborted by the caller
 */
export const RunStateSchema = z.enum([
  "Idle",
  "Running",
  "Completed",
  "MaxTurnsReached",
  "CostLimitReached",
  "HookStopped",
  "Errored",
  "Cancelled",
]);

export type RunState = z.infer<typeof RunStateSchema>;

export const StopReasonSchema = z.enum([
  "complete",
  "max_turns",
  "cost_limit",
  "hook_requested_stop",
  "error",
  "cancelled",
]);

/** Why a run ended. Assigned exactly once. */
export type StopReason = z.infer<typeof StopReasonSchema>;

const TERMINAL_STATES = [
  "Completed",
  "MaxTurnsReached",
  "CostLimitReached",
  "HookStopped",
  "Errored",
  "Cancelled",
] as const satisfies readonly RunState[];

export const VALID_TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  Idle: ["Running"],
  Running: TERMINAL_STATES,
  Completed: [],
  MaxTurnsReached: [],
  CostLimitReached: [],
  HookStopped: [],
  Errored: [],
  Cancelled: [],
};

export const STOP_REASON_STATES: Readonly<Record<StopReason, RunState>> = {
  complete: "Completed",
  max_turns: "MaxTurnsReached",
  cost_limit: "CostLimitReached",
  hook_requested_stop: "HookStopped",
  error: "Errored",
  cancelled: "Cancelled",
};

export function isValidTransition(from: RunState, to: RunState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: RunState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

/**
 * Tracks one run. The stop reason is fixed by the transition into a
 * terminal state and never changes afterwards.
 */
export class RunStateMachine {
  #state: RunState = "Idle";
  #stopReason: StopReason | undefined;

  get state(): RunState {
    return this.#state;
  }

  get stopReason(): StopReason | undefined {
    return this.#stopReason;
  }

  start(): void {
    this.#transition("Running");
  }

  finish(reason: StopReason): void {
    this.#transition(STOP_REASON_STATES[reason]);
    this.#stopReason = reason;
  }

  #transition(to: RunState): void {
    if (!isValidTransition(this.#state, to)) {
      throw new HelmsmanError(
        `Invalid run state transition: ${this.#state} -> ${to}`,
        ErrorCode.INVALID_STATE_TRANSITION,
        { context: { from: this.#state, to } }
      );
    }
    this.#state = to;
  }
}
