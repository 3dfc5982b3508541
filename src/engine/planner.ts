import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { Logger } from "pino";
import { logger as packageLogger } from "../logger.js";
import type { DancerId, Piece } from "../types.js";
import { InvariantSuite } from "./invariants.js";
import {
  resolvePlannerOptions,
  type PlannerOptions,
  type ResolvedPlannerOptions,
} from "./options.js";
import { scoreState, totalScore } from "./scoring.js";
import { AssignmentState, compareStateKeys } from "./state.js";
import { buildTrace, type ArenaNode, type PlanMode, type PlanResult } from "./trace.js";
import { assign, unassign, type Action } from "./transitions.js";
import { isSubset, type Universe } from "./universe.js";

/**
 * Per-call controls for a search.
 */
export interface RunOptions {
  /** Aborting stops the search cooperatively with status `budget_exceeded`. */
  signal?: AbortSignal;
}

export interface Successor {
  action: Action;
  state: AssignmentState;
}

type BudgetReason = NonNullable<PlanResult["budget"]>;

interface SearchOutcome {
  arena: ArenaNode[];
  /** Arena index of the witness, if any. */
  witness: number | undefined;
  exhausted: boolean;
  budget: BudgetReason | undefined;
  nodesExpanded: number;
  elapsedMs: number;
}

/**
 * Bounded breadth-first search over assignment states.
 *
 * Nodes are immutable {@link AssignmentState} snapshots kept in an indexed
 * arena; edges are actions accepted by the transition engine. The root is
 * the initial state. States are deduplicated by their canonical key, so each
 * is reached by a shortest action sequence.
 *
 * @example
 * ```typescript
 * const universe = loadUniverse(descriptor);
 * const planner = new Planner(universe, { maxLen: 6, fairnessBound: 1 });
 *
 * const feasible = await planner.findTrace();
 * if (feasible.status === "found") console.log(formatTrace(feasible.trace!));
 *
 * const best = await planner.optimize({ signal: AbortSignal.timeout(5_000) });
 * ```
 *
 * @category Planner
 */
export class Planner {
  readonly universe: Universe;
  readonly options: ResolvedPlannerOptions;
  readonly invariants: InvariantSuite;
  readonly logger: Logger;

  /** Pieces each dancer could ever be assigned, in declaration order. */
  #candidates = new Map<DancerId, readonly Piece[]>();

  constructor(universe: Universe, options: PlannerOptions = {}) {
    this.universe = universe;
    this.options = resolvePlannerOptions(options);
    this.logger = options.logger ?? packageLogger;
    this.invariants = new InvariantSuite(
      {
        fairnessBound: this.options.fairnessBound,
        avoidPolicy: this.options.avoidPolicy,
        requireFullCoverage: this.options.requireFullCoverage,
        requireMustHave: this.options.requireMustHave,
        checks: options.checks,
        checkFactories: options.checkFactories,
      },
      { fairnessEveryStep: this.options.fairnessEveryStep },
    );

    const allowAvoid = this.options.avoidPolicy === "necessity";
    for (const dancer of universe.dancers) {
      this.#candidates.set(
        dancer.id,
        universe.pieces.filter(
          (p) =>
            isSubset(p.rehearsalSlots, dancer.availability) &&
            (dancer.mustHave.has(p.id) ||
              dancer.preferred.has(p.id) ||
              (allowAvoid &&
                dancer.avoid.has(p.id) &&
                universe.willingCount(p.id) < p.minDancers)),
        ),
      );
    }
  }

  /**
   * Feasibility query: the shortest trace reaching a valid assignment.
   *
   * Returns `unsat_within_horizon` when no valid state is reachable within
   * `maxLen` steps. That is a normal outcome, not a fault.
   */
  async findTrace(run: RunOptions = {}): Promise<PlanResult> {
    const outcome = await this.#search("feasibility", run, (index) => index);
    return this.#toResult("feasibility", outcome);
  }

  /**
   * Optimization query: among all valid states reachable within the horizon,
   * the one with the highest total score.
   *
   * Ties go to the shorter trace, then to the greatest canonical state key
   * (earlier-declared dancers and pieces first). When a budget stops the
   * search, the best witness so far is returned with `optimal: false`.
   */
  async optimize(run: RunOptions = {}): Promise<PlanResult> {
    const leader: { best?: { index: number; score: number; depth: number; key: string } } = {};

    const outcome = await this.#search("optimization", run, (index, node) => {
      const score = totalScore(this.universe, node.state);
      const key = node.state.key;
      const best = leader.best;
      if (
        !best ||
        score > best.score ||
        (score === best.score &&
          (node.depth < best.depth ||
            (node.depth === best.depth && compareStateKeys(key, best.key) < 0)))
      ) {
        leader.best = { index, score, depth: node.depth, key };
      }
      return undefined;
    });

    return this.#toResult("optimization", { ...outcome, witness: leader.best?.index });
  }

  /**
   * Every state on a search branch within the horizon, in breadth-first order.
   * Pruned successors are not included.
   */
  async reachableStates(run: RunOptions = {}): Promise<AssignmentState[]> {
    const outcome = await this.#search("optimization", run, () => undefined, { visitAll: true });
    return outcome.arena.map((node) => node.state);
  }

  /**
   * Engine-accepted successors of a state, in a fixed order: assigns by
   * dancer then piece declaration order, then unassigns in the same order.
   * Stutter is omitted since it never yields a new state.
   */
  successors(state: AssignmentState): Successor[] {
    const result: Successor[] = [];
    const transitionOptions = { avoidPolicy: this.options.avoidPolicy };

    for (const dancer of this.universe.dancers) {
      for (const piece of this.#candidates.get(dancer.id) ?? []) {
        if (state.has(dancer.id, piece.id)) continue;
        // a full piece stays full until someone leaves it
        if (state.headcount(piece.id) >= piece.maxDancers) continue;
        const next = assign(state, this.universe, dancer.id, piece.id, transitionOptions);
        if (next.ok) result.push({ action: next.action, state: next.state });
      }
    }

    for (const dancer of this.universe.dancers) {
      for (const piece of this.universe.pieces) {
        if (!state.has(dancer.id, piece.id)) continue;
        const next = unassign(state, this.universe, dancer.id, piece.id);
        if (next.ok) result.push({ action: next.action, state: next.state });
      }
    }

    return result;
  }

  async #search(
    mode: PlanMode,
    run: RunOptions,
    onValid: (index: number, node: ArenaNode) => number | undefined,
    opts: { visitAll?: boolean } = {},
  ): Promise<SearchOutcome> {
    const { maxLen, maxNodes, timeLimitMs, yieldEvery } = this.options;
    const started = performance.now();
    const elapsed = () => performance.now() - started;

    this.logger.debug(
      {
        mode,
        minLen: this.options.minLen,
        maxLen,
        dancers: this.universe.dancers.length,
        pieces: this.universe.pieces.length,
      },
      "search started",
    );

    const root = AssignmentState.initial(this.universe);
    const arena: ArenaNode[] = [{ state: root, parent: -1, action: undefined, depth: 0 }];
    // key -> arena index, or -1 for a pruned state
    const visited = new Map<string, number>([[root.key, 0]]);
    let nodesExpanded = 0;

    const finish = (
      witness: number | undefined,
      exhausted: boolean,
      budget?: BudgetReason,
    ): SearchOutcome => ({
      arena,
      witness,
      exhausted,
      budget,
      nodesExpanded,
      elapsedMs: elapsed(),
    });

    const check = (index: number): number | undefined => {
      const node = arena[index];
      if (!node || opts.visitAll) return undefined;
      if (!this.invariants.isValid(node.state, this.universe)) return undefined;
      return onValid(index, node);
    };

    const rootHit = check(0);
    if (rootHit !== undefined) return finish(rootHit, false);

    for (let head = 0; head < arena.length; head++) {
      const node = arena[head];
      if (!node || node.depth >= maxLen) continue;

      if (run.signal?.aborted) return finish(undefined, false, "aborted");
      if (nodesExpanded >= maxNodes) return finish(undefined, false, "nodes");
      if (timeLimitMs !== undefined && elapsed() >= timeLimitMs) {
        return finish(undefined, false, "time");
      }
      if (nodesExpanded > 0 && nodesExpanded % yieldEvery === 0) {
        await yieldToEventLoop();
        if (run.signal?.aborted) return finish(undefined, false, "aborted");
      }

      nodesExpanded++;
      for (const succ of this.successors(node.state)) {
        const key = succ.state.key;
        if (visited.has(key)) continue;
        if (!this.invariants.holdsAfterStep(succ.state, this.universe)) {
          visited.set(key, -1);
          continue;
        }
        const index = arena.length;
        arena.push({ state: succ.state, parent: head, action: succ.action, depth: node.depth + 1 });
        visited.set(key, index);

        const hit = check(index);
        if (hit !== undefined) return finish(hit, false);
      }
    }

    return finish(undefined, true);
  }

  #toResult(mode: PlanMode, outcome: SearchOutcome): PlanResult {
    const stats = {
      nodesExpanded: outcome.nodesExpanded,
      statesVisited: outcome.arena.length,
      maxDepth: outcome.arena.reduce((max, node) => Math.max(max, node.depth), 0),
      elapsedMs: outcome.elapsedMs,
    };

    const witnessNode =
      outcome.witness === undefined ? undefined : outcome.arena[outcome.witness];
    const trace =
      outcome.witness === undefined
        ? undefined
        : buildTrace(outcome.arena, outcome.witness, this.options.minLen);
    const score =
      mode === "optimization" && witnessNode
        ? scoreState(this.universe, witnessNode.state)
        : undefined;

    let result: PlanResult;
    if (outcome.budget) {
      this.logger.warn({ mode, budget: outcome.budget, ...stats }, "search budget exceeded");
      result = {
        status: "budget_exceeded",
        mode,
        budget: outcome.budget,
        stats,
        ...(mode === "optimization" && trace ? { trace, score, optimal: false } : {}),
      };
    } else if (trace) {
      result = {
        status: "found",
        mode,
        trace,
        stats,
        ...(mode === "optimization" ? { score, optimal: outcome.exhausted } : {}),
      };
    } else {
      result = { status: "unsat_within_horizon", mode, stats };
    }

    this.logger.debug({ mode, status: result.status, ...stats }, "search finished");
    return result;
  }
}

/**
 * Runs a feasibility query against a universe.
 *
 * @category Planner
 */
export function planFeasible(
  universe: Universe,
  options: PlannerOptions = {},
  run: RunOptions = {},
): Promise<PlanResult> {
  return new Planner(universe, options).findTrace(run);
}

/**
 * Runs an optimization query against a universe.
 *
 * @category Planner
 */
export function planOptimal(
  universe: Universe,
  options: PlannerOptions = {},
  run: RunOptions = {},
): Promise<PlanResult> {
  return new Planner(universe, options).optimize(run);
}
