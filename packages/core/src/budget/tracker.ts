/**
 * Budget Tracker
 *
 * Counts turns and cost for one run against the policy's ceilings. A `null`
 * ceiling is unlimited.
 *
 * @module @helmsman/core/budget
 */

import { BudgetExceededError } from "../errors/index.js";

// =============================================================================
// Types
// =============================================================================

export interface BudgetLimits {
  maxTurns: number | null;
  maxCostUsd: number | null;
}

export type BudgetBreach = "cost_limit" | "max_turns";

export interface BudgetEvaluation {
  /** Set once per run, the first time cost crosses the warning threshold */
  warning?: string;
  breach?: BudgetBreach;
}

export interface BudgetSnapshot extends BudgetLimits {
  turnsUsed: number;
  costUsed: number;
  /** Share of the cost ceiling used, 0 when unlimited */
  costFraction: number;
}

/** Fraction of the cost ceiling at which the warning fires */
export const COST_WARNING_THRESHOLD = 0.9;

export const BUDGET_EXHAUSTED_MESSAGE = "Budget exhausted: cost limit reached";

export function formatCost(cost: number): string {
  return `$${cost.toFixed(4)}`;
}

// =============================================================================
// BudgetTracker
// =============================================================================

/**
 * @example
 * ```typescript
 * const budget = new BudgetTracker({ maxTurns: 10, maxCostUsd: 0.5 });
 * budget.recordTurn(provider.usage().cost);
 * const { warning, breach } = budget.evaluate({ pendingToolWork: true });
 * ```
 */
export class BudgetTracker {
  #limits: BudgetLimits;
  #turnsUsed = 0;
  #costUsed = 0;
  #warned = false;

  constructor(limits: BudgetLimits) {
    this.#limits = { ...limits };
  }

  /** Start counting a new run */
  reset(limits: BudgetLimits = this.#limits): void {
    this.#limits = { ...limits };
    this.#turnsUsed = 0;
    this.#costUsed = 0;
    this.#warned = false;
  }

  /**
   * Count a finished turn. `costUsed` is the run's cost so far; it never
   * decreases.
   */
  recordTurn(costUsed: number): void {
    this.#turnsUsed += 1;
    this.recordCost(costUsed);
  }

  recordCost(costUsed: number): void {
    if (Number.isFinite(costUsed) && costUsed > this.#costUsed) {
      this.#costUsed = costUsed;
    }
  }

  get turnsUsed(): number {
    return this.#turnsUsed;
  }

  get costUsed(): number {
    return this.#costUsed;
  }

  get costExhausted(): boolean {
    const { maxCostUsd } = this.#limits;
    return maxCostUsd !== null && this.#costUsed >= maxCostUsd;
  }

  /**
   * @throws BudgetExceededError once the cost ceiling is reached
   */
  assertWithinCost(): void {
    const { maxCostUsd } = this.#limits;
    if (maxCostUsd !== null && this.#costUsed >= maxCostUsd) {
      throw new BudgetExceededError(BUDGET_EXHAUSTED_MESSAGE, this.#costUsed, maxCostUsd);
    }
  }

  /**
   * Check the ceilings after a turn.
   *
   * A cost breach always counts. The turn ceiling only counts while the model
   * still has tool work pending; a final answer on the last turn completes the
   * run normally.
   */
  evaluate(options: { pendingToolWork: boolean }): BudgetEvaluation {
    const { maxTurns, maxCostUsd } = this.#limits;

    if (this.costExhausted) {
      return { breach: "cost_limit" };
    }

    const result: BudgetEvaluation = {};
    if (
      maxCostUsd !== null &&
      !this.#warned &&
      this.#costUsed >= maxCostUsd * COST_WARNING_THRESHOLD
    ) {
      this.#warned = true;
      result.warning = `Approaching cost limit: ${formatCost(this.#costUsed)} / ${formatCost(maxCostUsd)}`;
    }
    if (options.pendingToolWork && maxTurns !== null && this.#turnsUsed >= maxTurns) {
      result.breach = "max_turns";
    }
    return result;
  }

  snapshot(): BudgetSnapshot {
    const { maxCostUsd } = this.#limits;
    return {
      ...this.#limits,
      turnsUsed: this.#turnsUsed,
      costUsed: this.#costUsed,
      costFraction: maxCostUsd ? this.#costUsed / maxCostUsd : 0,
    };
  }
}
