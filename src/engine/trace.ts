/**
 * Trace and result types emitted by the planner.
 *
 * Types are derived from Zod schemas so that validation and types stay in sync.
 *
 * @see trace.schemas.ts for the source Zod schemas
 */

import type { z } from "zod";
import type {
  PlanModeSchema,
  PlanResultSchema,
  PlanStatusSchema,
  SearchStatsSchema,
  TraceActionSchema,
  TraceSchema,
  TraceStepSchema,
} from "./trace.schemas.js";
import type { AssignmentState } from "./state.js";
import { formatAction, type Action } from "./transitions.js";

/** The action that produced a step: `init` for step 0, otherwise an engine action. */
export type TraceAction = z.infer<typeof TraceActionSchema>;

/**
 * One state of a trace together with the action that produced it.
 *
 * - `index`: position in the trace, 0 for `Init`
 * - `state`: every dancer's pieces, in declaration order
 */
export type TraceStep = z.infer<typeof TraceStepSchema>;

/**
 * An ordered sequence `[state_0 … state_n]` connected by single actions.
 * `steps[0]` is always the initial state.
 */
export type Trace = z.infer<typeof TraceSchema>;

/**
 * Search outcome.
 *
 * - `"found"`: a witness was found (and, for optimization, the whole horizon was explored)
 * - `"unsat_within_horizon"`: the horizon was fully explored and no valid state exists
 * - `"budget_exceeded"`: the search stopped early; the result is inconclusive
 *
 * @category Planner
 */
export type PlanStatus = z.infer<typeof PlanStatusSchema>;

export type PlanMode = z.infer<typeof PlanModeSchema>;

export type SearchStats = z.infer<typeof SearchStatsSchema>;

/** @category Planner */
export type PlanResult = z.infer<typeof PlanResultSchema>;

/** A node of the search arena, addressed by its index. */
export interface ArenaNode {
  readonly state: AssignmentState;
  /** Index of the predecessor, -1 for the root. */
  readonly parent: number;
  readonly action: Action | undefined;
  readonly depth: number;
}

/**
 * Rebuilds the trace ending at `index` by following parent links, then pads
 * with stutter steps until it has at least `minLen` transitions.
 */
export function buildTrace(arena: readonly ArenaNode[], index: number, minLen: number): Trace {
  const path: ArenaNode[] = [];
  let cursor = index;
  while (cursor >= 0) {
    const node = arena[cursor];
    if (!node) throw new Error(`Arena has no node ${cursor}`);
    path.push(node);
    cursor = node.parent;
  }
  path.reverse();

  const steps: TraceStep[] = path.map((node, i) => ({
    index: i,
    action: node.action ?? { type: "init" },
    state: node.state.toRecord(),
  }));

  const validAt = steps.length - 1;
  const last = path[path.length - 1];
  if (last) {
    while (steps.length - 1 < minLen) {
      steps.push({ index: steps.length, action: { type: "stutter" }, state: last.state.toRecord() });
    }
  }

  return { steps, validAt };
}

/**
 * Renders a trace as plain text, one line per step.
 *
 * @example
 * ```text
 * 0  init
 * 1  assign(ana, opener)   ana: opener | ben: -
 * ```
 */
export function formatTrace(trace: Trace): string {
  return trace.steps
    .map((step) => {
      const label = step.action.type === "init" ? "init" : formatAction(step.action);
      const cast = Object.entries(step.state)
        .map(([dancerId, pieces]) => `${dancerId}: ${pieces.length > 0 ? pieces.join(", ") : "-"}`)
        .join(" | ");
      return `${String(step.index).padEnd(3)}${label.padEnd(28)}${cast}`;
    })
    .join("\n");
}
