// ============================================
// Stall Detector
// ============================================

/**
 * Flags a model that keeps giving the same answer without calling tools.
 * Advisory only: the loop reports it as a warning and carries on.
 *
 * @module @helmsman/core/agent/stall-detector
 */

export interface StallDetectorConfig {
  /** Identical consecutive responses that count as a stall (default: 2, minimum 2) */
  windowSize?: number;
}

export interface StallResult {
  isStalled: boolean;
  /** Consecutive identical responses so far */
  repeats: number;
  message?: string;
}

export const DEFAULT_STALL_WINDOW = 2;

/**
 * Trim, collapse whitespace and lower-case.
 */
export function normalizeResponse(text: string): string {
  return text.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * @example
 * ```typescript
 * const detector = new StallDetector();
 * detector.record("Working on it.", false);
 * detector.record("working on it. ", false);
 * // { isStalled: true, repeats: 2, message: "Agent may be stalled: identical response repeated 2 times" }
 * ```
 */
export class StallDetector {
  readonly windowSize: number;
  #last: string | undefined;
  #repeats = 0;

  constructor(config: StallDetectorConfig = {}) {
    this.windowSize = Math.max(DEFAULT_STALL_WINDOW, Math.floor(config.windowSize ?? DEFAULT_STALL_WINDOW));
  }

  /**
   * Record an assistant turn. A turn with tool calls, or with no text,
   * breaks any streak.
   */
  record(text: string, hadToolCalls: boolean): StallResult {
    const normalized = normalizeResponse(text);

    if (hadToolCalls || normalized.length === 0) {
      this.reset();
      return { isStalled: false, repeats: 0 };
    }

    if (normalized === this.#last) {
      this.#repeats += 1;
    } else {
      this.#last = normalized;
      this.#repeats = 1;
    }

    if (this.#repeats < this.windowSize) {
      return { isStalled: false, repeats: this.#repeats };
    }
    return {
      isStalled: true,
      repeats: this.#repeats,
      message: `Agent may be stalled: identical response repeated ${this.#repeats} times`,
    };
  }

  reset(): void {
    this.#last = undefined;
    this.#repeats = 0;
  }
}
