import type { Violation } from "./checks/checks.types.js";
import { InvariantSuite, type InvariantOptions } from "./invariants.js";
import type { AssignmentState } from "./state.js";
import type { Universe } from "./universe.js";
import type {
  CheckPassed,
  StateError,
  StateValidation,
  StateViolation,
  ValidationGroup,
  ValidationSummary,
} from "./validation.types.js";

export interface ValidationReporter {
  // Errors (hard invariants)
  reportError(error: Omit<StateError, "type" | "id">): void;

  // Violations (goals)
  reportViolation(violation: Omit<StateViolation, "type" | "id">): void;

  // Passed (confidence builders)
  reportPassed(passed: Omit<CheckPassed, "type" | "id">): void;

  // Query methods
  hasErrors(): boolean;
  getValidation(): StateValidation;
}

const CHECK_TITLES: Record<string, string> = {
  "schedule-conflict": "No overlapping rehearsals",
  availability: "Cast only when available",
  capacity: "Headcount within range",
  "hard-avoid": "Avoided pieces respected",
  "must-have": "Must-have pieces reached",
  fairness: "Balanced casting",
  coverage: "Every dancer cast",
};

export function checkGroup(check: string): ValidationGroup {
  return { key: `check:${check}`, title: CHECK_TITLES[check] ?? check };
}

/**
 * The entity segment of an item id.
 * Format: {dancer}/{piece}, {piece}, {dancer}, {dancer}/{a}+{b} for
 * conflicting pieces, or {max}/{min} for fairness.
 */
function violationEntity(v: Violation): string {
  switch (v.kind) {
    case "ScheduleConflict":
      return `${v.dancerId}/${v.pieceIds[0]}+${v.pieceIds[1]}`;
    case "Availability":
    case "HardAvoid":
      return `${v.dancerId}/${v.pieceId}`;
    case "Capacity":
      return v.pieceId;
    case "MustHaveUnreached":
    case "Uncovered":
      return v.dancerId;
    case "Fairness":
      return `${v.maxDancerId}/${v.minDancerId}`;
    case "Custom":
      return [v.dancerId, v.pieceId].filter((x) => x !== undefined).join("/") || "_";
  }
}

function violationSubject(v: Violation): { dancerId?: string; pieceId?: string } {
  switch (v.kind) {
    case "Availability":
    case "HardAvoid":
      return { dancerId: v.dancerId, pieceId: v.pieceId };
    case "ScheduleConflict":
    case "MustHaveUnreached":
    case "Uncovered":
      return { dancerId: v.dancerId };
    case "Capacity":
      return { pieceId: v.pieceId };
    case "Fairness":
      return { dancerId: v.maxDancerId };
    case "Custom":
      return {
        ...(v.dancerId !== undefined ? { dancerId: v.dancerId } : {}),
        ...(v.pieceId !== undefined ? { pieceId: v.pieceId } : {}),
      };
  }
}

/**
 * Collects validation items with deterministic ids.
 * Format: {category}:{check}:{entity}
 */
export class ValidationReporterImpl implements ValidationReporter {
  #errors: StateError[] = [];
  #violations: StateViolation[] = [];
  #passed: CheckPassed[] = [];

  reportError(error: Omit<StateError, "type" | "id">): void {
    const id = `error:${error.check}:${error.entity}`;
    this.#errors.push({ id, type: "invariant", ...error });
  }

  reportViolation(violation: Omit<StateViolation, "type" | "id">): void {
    const id = `violation:${violation.check}:${violation.entity}`;
    this.#violations.push({ id, type: "goal", ...violation });
  }

  reportPassed(passed: Omit<CheckPassed, "type" | "id">): void {
    const id = `passed:${passed.check}`;
    this.#passed.push({ id, type: "check", ...passed });
  }

  hasErrors(): boolean {
    return this.#errors.length > 0;
  }

  getValidation(): StateValidation {
    return {
      errors: [...this.#errors],
      violations: [...this.#violations],
      passed: [...this.#passed],
    };
  }
}

/**
 * Runs every check against a state and sorts the outcome into errors (hard
 * invariants), violations (goals that are not required under `options`) and
 * passed checks.
 *
 * @example
 * ```typescript
 * const validation = reportState(state, universe, { requireMustHave: true });
 * if (validation.errors.length > 0) console.log(validation.errors[0]?.message);
 * ```
 *
 * @category Validation
 */
export function reportState(
  state: AssignmentState,
  universe: Universe,
  options: InvariantOptions = {},
): StateValidation {
  const suite = new InvariantSuite(options);
  const reporter = new ValidationReporterImpl();

  for (const check of suite.checks) {
    const group = checkGroup(check.name);
    const found = check.check(state, universe);
    if (found.length === 0) {
      reporter.reportPassed({ check: check.name, message: group.title, group });
      continue;
    }
    for (const v of found) {
      const item = {
        check: check.name,
        kind: v.kind,
        message: v.message,
        entity: violationEntity(v),
        ...violationSubject(v),
        group,
      };
      if (suite.blocks(check, v)) reporter.reportError(item);
      else reporter.reportViolation(item);
    }
  }

  return reporter.getValidation();
}

// =============================================================================
// Validation Summary - pure function for aggregation
// =============================================================================

/**
 * Aggregates validation items by their group into summaries, in the order
 * groups are first seen (passed, then violations, then errors).
 * This is a pure function that doesn't modify the input.
 *
 * @example
 * ```typescript
 * const summaries = summarizeValidation(reportState(state, universe));
 * // summaries[0] = {
 * //   groupKey: "check:schedule-conflict",
 * //   title: "No overlapping rehearsals",
 * //   status: "passed",
 * //   passedCount: 1, violatedCount: 0, errorCount: 0,
 * // }
 * ```
 */
export function summarizeValidation(validation: StateValidation): readonly ValidationSummary[] {
  const groups = new Map<
    string,
    { title: string; passedCount: number; violatedCount: number; errorCount: number }
  >();

  const getOrCreateGroup = (group: ValidationGroup) => {
    let entry = groups.get(group.key);
    if (!entry) {
      entry = { title: group.title, passedCount: 0, violatedCount: 0, errorCount: 0 };
      groups.set(group.key, entry);
    }
    return entry;
  };

  for (const item of validation.passed) getOrCreateGroup(item.group).passedCount++;
  for (const item of validation.violations) getOrCreateGroup(item.group).violatedCount++;
  for (const item of validation.errors) getOrCreateGroup(item.group).errorCount++;

  const summaries: ValidationSummary[] = [];
  for (const [key, group] of groups) {
    const status: ValidationSummary["status"] =
      group.errorCount > 0 ? "failed" : group.violatedCount > 0 ? "partial" : "passed";
    summaries.push({
      groupKey: key,
      title: group.title,
      status,
      passedCount: group.passedCount,
      violatedCount: group.violatedCount,
      errorCount: group.errorCount,
    });
  }
  return summaries;
}
