import type { DancerId, PieceId, TimeSlot } from "../../types.js";
import type { AssignmentState } from "../state.js";
import type { Universe } from "../universe.js";

// =============================================================================
// Violations
// =============================================================================

interface ViolationBase {
  /** Name of the check that produced the violation. */
  readonly check: string;
  readonly message: string;
}

export interface ScheduleConflictViolation extends ViolationBase {
  readonly kind: "ScheduleConflict";
  readonly dancerId: DancerId;
  readonly pieceIds: readonly [PieceId, PieceId];
  readonly slots: readonly TimeSlot[];
}

export interface AvailabilityViolation extends ViolationBase {
  readonly kind: "Availability";
  readonly dancerId: DancerId;
  readonly pieceId: PieceId;
  readonly missingSlots: readonly TimeSlot[];
}

export interface CapacityViolation extends ViolationBase {
  readonly kind: "Capacity";
  readonly pieceId: PieceId;
  readonly headcount: number;
  readonly minDancers: number;
  readonly maxDancers: number;
}

export interface HardAvoidViolation extends ViolationBase {
  readonly kind: "HardAvoid";
  readonly dancerId: DancerId;
  readonly pieceId: PieceId;
}

export interface MustHaveUnreachedViolation extends ViolationBase {
  readonly kind: "MustHaveUnreached";
  readonly dancerId: DancerId;
}

export interface FairnessViolation extends ViolationBase {
  readonly kind: "Fairness";
  /** Dancer with the most assignments (first in declaration order on ties). */
  readonly maxDancerId: DancerId;
  /** Dancer with the fewest assignments (first in declaration order on ties). */
  readonly minDancerId: DancerId;
  readonly spread: number;
  readonly bound: number;
}

export interface UncoveredViolation extends ViolationBase {
  readonly kind: "Uncovered";
  readonly dancerId: DancerId;
}

/** Produced by checks registered through custom factories. */
export interface CustomViolation extends ViolationBase {
  readonly kind: "Custom";
  readonly dancerId?: DancerId;
  readonly pieceId?: PieceId;
}

export type Violation =
  | ScheduleConflictViolation
  | AvailabilityViolation
  | CapacityViolation
  | HardAvoidViolation
  | MustHaveUnreachedViolation
  | FairnessViolation
  | UncoveredViolation
  | CustomViolation;

export type ViolationKind = Violation["kind"];

// =============================================================================
// Checks
// =============================================================================

/**
 * A pure predicate over a state snapshot.
 *
 * Checks hold no state between calls and may be evaluated on any number of
 * snapshots in any order.
 */
export interface InvariantCheck {
  readonly name: string;
  check(state: AssignmentState, universe: Universe): Violation[];
}

export type CreateCheckFunction<TConfig = unknown> = (config: TConfig) => InvariantCheck;

// Registry of built-in check names to their config types
export interface CheckRegistry {
  "schedule-conflict": import("./schedule-conflict.js").ScheduleConflictConfig;
  availability: import("./availability.js").AvailabilityConfig;
  capacity: import("./capacity.js").CapacityConfig;
  "hard-avoid": import("./hard-avoid.js").HardAvoidConfig;
  "must-have": import("./must-have.js").MustHaveConfig;
  fairness: import("./fairness.js").FairnessConfig;
  coverage: import("./coverage.js").CoverageConfig;
}

export type CheckName = keyof CheckRegistry;

export type CheckFactories = {
  [checkName: string]: CreateCheckFunction<any>;
};

export type BuiltInCheckFactories = {
  [K in CheckName]: CreateCheckFunction<CheckRegistry[K]>;
};

/**
 * A named check configuration entry.
 *
 * Flat discriminated union: `name` is the discriminant and all config fields
 * (including scope fields like `dancerIds`) sit at the same level.
 *
 * @category Checks
 * @example
 * ```ts
 * const checks: CheckConfigEntry[] = [
 *   { name: "fairness", bound: 1 },
 *   { name: "must-have", dancerIds: ["ana"] },
 * ];
 * ```
 */
export type CheckConfigEntry = {
  [K in CheckName]: { name: K } & CheckRegistry[K];
}[CheckName];
