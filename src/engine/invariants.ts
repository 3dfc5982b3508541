import type { AssignmentState } from "./state.js";
import type { Universe } from "./universe.js";
import type { AvoidPolicy } from "./transitions.js";
import type {
  CheckConfigEntry,
  CheckFactories,
  InvariantCheck,
  Violation,
  ViolationKind,
} from "./checks/checks.types.js";
import {
  createAvailabilityCheck,
  createCapacityCheck,
  createCoverageCheck,
  createFairnessCheck,
  createHardAvoidCheck,
  createMustHaveCheck,
  createScheduleConflictCheck,
} from "./checks/index.js";
import { buildChecks, type CustomCheckConfigEntry } from "./checks/resolver.js";
import { builtInCheckFactories, createCheckFactory } from "./checks/registry.js";

/**
 * The parts of the planner configuration that decide what a valid
 * assignment is.
 */
export interface InvariantOptions {
  fairnessBound?: number;
  avoidPolicy?: AvoidPolicy;
  /** Every dancer must be cast in at least one piece. */
  requireFullCoverage?: boolean;
  /** Every dancer with a mustHave tier must be cast in one of those pieces. */
  requireMustHave?: boolean;
  checks?: readonly (CheckConfigEntry | CustomCheckConfigEntry)[];
  checkFactories?: CheckFactories;
}

/**
 * Violation kinds that always make a state invalid. `Uncovered` and
 * `MustHaveUnreached` join them when the matching goal option is on.
 */
export const HARD_VIOLATION_KINDS: readonly ViolationKind[] = [
  "ScheduleConflict",
  "Availability",
  "Capacity",
  "HardAvoid",
  "Fairness",
  "Custom",
];

/**
 * Kinds that are checked after every transition. A successor that shows one
 * of these is pruned.
 */
const STEP_KINDS: ReadonlySet<ViolationKind> = new Set([
  "ScheduleConflict",
  "Availability",
  "HardAvoid",
]);

/**
 * A compiled set of checks bound to one configuration.
 *
 * Create once per search; evaluation is pure and can be shared by any number
 * of branches.
 */
export class InvariantSuite {
  readonly checks: readonly InvariantCheck[];
  readonly #extra: ReadonlySet<InvariantCheck>;
  readonly #hardKinds: ReadonlySet<ViolationKind>;
  readonly #stepKinds: ReadonlySet<ViolationKind>;

  constructor(options: InvariantOptions = {}, stepOptions: { fairnessEveryStep?: boolean } = {}) {
    const core: InvariantCheck[] = [
      createScheduleConflictCheck(),
      createAvailabilityCheck(),
      createCapacityCheck(),
      createHardAvoidCheck({ policy: options.avoidPolicy ?? "strict" }),
      createMustHaveCheck(),
      createFairnessCheck({ bound: options.fairnessBound ?? 2 }),
      createCoverageCheck(),
    ];
    const extra = options.checks
      ? buildChecks(options.checks, {
          ...builtInCheckFactories,
          ...createCheckFactory(options.checkFactories ?? {}),
        })
      : [];
    this.checks = [...core, ...extra];
    this.#extra = new Set(extra);

    const hard = new Set<ViolationKind>(HARD_VIOLATION_KINDS);
    if (options.requireFullCoverage) hard.add("Uncovered");
    if (options.requireMustHave) hard.add("MustHaveUnreached");
    this.#hardKinds = hard;

    const step = new Set(STEP_KINDS);
    if (stepOptions.fairnessEveryStep ?? true) step.add("Fairness");
    this.#stepKinds = step;
  }

  /** Runs every check; violations are ordered by check, then declaration order. */
  check(state: AssignmentState, universe: Universe): Violation[] {
    return this.checks.flatMap((c) => c.check(state, universe));
  }

  /**
   * Hard invariants hold, every piece has at least one dancer, and the
   * configured goals are met.
   */
  isValid(state: AssignmentState, universe: Universe): boolean {
    if (universe.pieces.some((p) => state.headcount(p.id) < 1)) return false;
    for (const c of this.checks) {
      for (const v of c.check(state, universe)) {
        if (this.blocks(c, v)) return false;
      }
    }
    return true;
  }

  /** True when the state may stay on a search branch. */
  holdsAfterStep(state: AssignmentState, universe: Universe): boolean {
    for (const c of this.checks) {
      for (const v of c.check(state, universe)) {
        if (this.#stepKinds.has(v.kind)) return false;
      }
    }
    return true;
  }

  /**
   * Whether a violation makes the state invalid. Anything reported by a
   * check added through `options.checks` does.
   */
  blocks(check: InvariantCheck, violation: Violation): boolean {
    return this.#extra.has(check) || this.#hardKinds.has(violation.kind);
  }
}

/**
 * Evaluates every invariant against a state.
 *
 * @example
 * ```typescript
 * const violations = checkInvariants(state, universe, { fairnessBound: 1 });
 * for (const v of violations) console.log(v.kind, v.message);
 * ```
 *
 * @category Invariants
 */
export function checkInvariants(
  state: AssignmentState,
  universe: Universe,
  options: InvariantOptions = {},
): Violation[] {
  return new InvariantSuite(options).check(state, universe);
}

/**
 * No Capacity, ScheduleConflict, Availability, HardAvoid or Fairness
 * violation, every piece has at least one dancer, and (when configured)
 * every dancer is cast and every must-have tier is reached.
 *
 * @category Invariants
 */
export function isValidAssignment(
  state: AssignmentState,
  universe: Universe,
  options: InvariantOptions = {},
): boolean {
  return new InvariantSuite(options).isValid(state, universe);
}
