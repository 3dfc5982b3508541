import type { DancerId, PieceId } from "../types.js";
import type { ViolationKind } from "./checks/checks.types.js";

// =============================================================================
// Validation Group
// =============================================================================

/**
 * Groups related validation items under a deterministic key.
 *
 * Every item a check produces shares the group `check:<name>`, so a
 * summary has one line per check.
 */
export interface ValidationGroup {
  /** Deterministic key derived from the check name. */
  readonly key: string;
  /** Human-readable label for summaries (e.g., "Fairness within 2"). */
  readonly title: string;
}

// =============================================================================
// Errors - hard invariants broken, the state is not a valid assignment
// =============================================================================

export interface StateError {
  readonly id: string;
  readonly type: "invariant";
  readonly check: string;
  readonly kind: ViolationKind;
  readonly message: string;
  /** What the item is about, e.g. `ana/opener`, `opener` or `ana/solo+duet`. */
  readonly entity: string;
  readonly dancerId?: DancerId;
  readonly pieceId?: PieceId;
  readonly group: ValidationGroup;
}

// =============================================================================
// Violations - goals not met, the state may still be valid
// =============================================================================

export interface StateViolation {
  readonly id: string;
  readonly type: "goal";
  readonly check: string;
  readonly kind: ViolationKind;
  readonly message: string;
  /** What the item is about, e.g. `ana/opener`, `opener` or `ana/solo+duet`. */
  readonly entity: string;
  readonly dancerId?: DancerId;
  readonly pieceId?: PieceId;
  readonly group: ValidationGroup;
}

// =============================================================================
// Passed - checks with nothing to report
// =============================================================================

export interface CheckPassed {
  readonly id: string;
  readonly type: "check";
  readonly check: string;
  readonly message: string;
  readonly group: ValidationGroup;
}

// =============================================================================
// Complete validation result
// =============================================================================

/** @category Validation */
export interface StateValidation {
  readonly errors: readonly StateError[];
  readonly violations: readonly StateViolation[];
  readonly passed: readonly CheckPassed[];
}

/**
 * Summary of validation items grouped by the check that produced them.
 * Use `summarizeValidation()` to create these from a `StateValidation`.
 *
 * @category Validation
 */
export interface ValidationSummary {
  readonly groupKey: string;
  readonly title: string;
  readonly status: "passed" | "partial" | "failed";
  readonly passedCount: number;
  readonly violatedCount: number;
  readonly errorCount: number;
}
