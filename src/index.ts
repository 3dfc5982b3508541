/**
 * Temporal casting engine: assigns dancers to pieces by searching over
 * sequences of single casting actions.
 *
 * Describe pieces (fixed rehearsal slots, headcount range) and dancers
 * (availability, mustHave / preferred / avoid tiers). troupe validates the
 * universe, then explores assignment states step by step, checking
 * invariants after every step, and returns a trace that ends in a valid
 * casting, either the shortest one or the best-scoring one.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Universe**: The static world, produced by {@link loadUniverse} from a
 * plain descriptor or built with {@link roster}, {@link piece} and
 * {@link dancer}. Malformed input fails with a {@link ConfigError}.
 *
 * **States and actions**: {@link AssignmentState} is an immutable snapshot.
 * {@link assign}, {@link unassign} and {@link stutter} derive the next
 * snapshot or report a precondition violation.
 *
 * **Invariants**: Independent checks (schedule conflicts, availability,
 * capacity, avoided pieces, fairness, must-have and coverage goals)
 * composed by {@link checkInvariants}. Custom checks plug in through a
 * factory map.
 *
 * **Planning**: {@link Planner} runs a bounded breadth-first search.
 * `findTrace()` answers feasibility; `optimize()` maximizes the
 * {@link SCORE_WEIGHTS | satisfaction score}. Unsatisfiable horizons are a
 * normal result, not an error.
 *
 * @example Plan a casting
 * ```typescript
 * import { roster, piece, dancer, formatTrace } from "troupe";
 *
 * const result = await roster({
 *   timeSlots: ["mon-18", "wed-18"],
 *   pieces: [
 *     piece("opener", ["mon-18"], { max: 2 }),
 *     piece("solo", ["wed-18"], { max: 1 }),
 *   ],
 *   dancers: [
 *     dancer("ana", ["mon-18", "wed-18"], { mustHave: ["solo"], preferred: ["opener"] }),
 *     dancer("ben", ["mon-18"], { mustHave: ["opener"] }),
 *   ],
 * }).optimize({ minLen: 1, maxLen: 4 });
 *
 * if (result.status === "found" && result.trace) {
 *   console.log(formatTrace(result.trace));
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Domain
// ============================================================================

export type {
  TimeSlot,
  PieceId,
  DancerId,
  Tier,
  Piece,
  Dancer,
  PieceDescriptor,
  DancerDescriptor,
  UniverseDescriptor,
} from "./types.js";

export {
  PieceDescriptorSchema,
  DancerDescriptorSchema,
  UniverseDescriptorSchema,
  TIERS,
} from "./types.js";

export { loadUniverse } from "./engine/universe.js";

export type { Universe, LoadUniverseOptions } from "./engine/universe.js";

// ============================================================================
// Errors
// ============================================================================

export { ConfigError } from "./errors.js";

export type { ConfigErrorKind, ConfigIssue } from "./errors.js";

// ============================================================================
// State and transitions
// ============================================================================

export { AssignmentState, compareStateKeys } from "./engine/state.js";

export type { AssignmentRecord } from "./engine/state.js";

export { assign, unassign, stutter, applyAction, formatAction } from "./engine/transitions.js";

export type {
  Action,
  AvoidPolicy,
  PreconditionKind,
  PreconditionViolation,
  TransitionResult,
  TransitionOptions,
} from "./engine/transitions.js";

// ============================================================================
// Invariants
// ============================================================================

export {
  checkInvariants,
  isValidAssignment,
  InvariantSuite,
  HARD_VIOLATION_KINDS,
} from "./engine/invariants.js";

export type { InvariantOptions } from "./engine/invariants.js";

export {
  createScheduleConflictCheck,
  createAvailabilityCheck,
  createCapacityCheck,
  createHardAvoidCheck,
  createMustHaveCheck,
  createFairnessCheck,
  createCoverageCheck,
} from "./engine/checks/index.js";

export { builtInCheckFactories, createCheckFactory } from "./engine/checks/registry.js";

export { buildChecks } from "./engine/checks/resolver.js";

export type { CustomCheckConfigEntry } from "./engine/checks/resolver.js";

export type { ScopeConfig } from "./engine/checks/scoping.js";

export type {
  Violation,
  ViolationKind,
  ScheduleConflictViolation,
  AvailabilityViolation,
  CapacityViolation,
  HardAvoidViolation,
  MustHaveUnreachedViolation,
  FairnessViolation,
  UncoveredViolation,
  CustomViolation,
  InvariantCheck,
  CreateCheckFunction,
  CheckRegistry,
  CheckName,
  CheckFactories,
  CheckConfigEntry,
} from "./engine/checks/checks.types.js";

// ============================================================================
// Scoring
// ============================================================================

export { SCORE_WEIGHTS, dancerScore, totalScore, scoreState } from "./engine/scoring.js";

export type { ScoreReport } from "./engine/scoring.js";

// ============================================================================
// Planner
// ============================================================================

export { Planner, planFeasible, planOptimal } from "./engine/planner.js";

export type { RunOptions, Successor } from "./engine/planner.js";

export { PlannerOptionsSchema, resolvePlannerOptions } from "./engine/options.js";

export type {
  PlannerOptions,
  PlannerOptionsInput,
  ResolvedPlannerOptions,
} from "./engine/options.js";

export { formatTrace } from "./engine/trace.js";

export type {
  Trace,
  TraceStep,
  TraceAction,
  PlanStatus,
  PlanMode,
  PlanResult,
  SearchStats,
} from "./engine/trace.js";

export {
  TraceSchema,
  TraceStepSchema,
  TraceActionSchema,
  PlanResultSchema,
  PlanStatusSchema,
} from "./engine/trace.schemas.js";

// ============================================================================
// Validation
// ============================================================================

export { reportState, summarizeValidation } from "./engine/validation-reporter.js";

export type {
  ValidationGroup,
  StateValidation,
  StateError,
  StateViolation,
  CheckPassed,
  ValidationSummary,
} from "./engine/validation.types.js";

// ============================================================================
// Roster Definition API
// ============================================================================

export { roster, piece, dancer, Roster } from "./roster.js";

export type { RosterConfig, RosterPlanOptions, PieceOptions, DancerTiers } from "./roster.js";

// ============================================================================
// Logging
// ============================================================================

export { logger } from "./logger.js";
