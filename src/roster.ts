/**
 * High-level roster definition API.
 *
 * Small, composable factory functions that produce a complete universe
 * descriptor. Each concept is a single function call.
 *
 * @example
 * ```typescript
 * import { roster, piece, dancer } from "troupe";
 *
 * const spring = roster({
 *   timeSlots: ["mon-18", "tue-18", "thu-18"],
 *   pieces: [
 *     piece("opener", ["mon-18"], { max: 4 }),
 *     piece("duet", ["tue-18", "thu-18"], { min: 2, max: 2 }),
 *   ],
 * });
 *
 * const result = await spring
 *   .with([
 *     dancer("ana", ["mon-18", "tue-18", "thu-18"], { mustHave: ["duet"] }),
 *     dancer("ben", ["tue-18", "thu-18"], { preferred: ["duet"] }),
 *   ])
 *   .optimize({ maxLen: 6 });
 * ```
 *
 * @module
 */

import type { CheckConfigEntry, CheckFactories } from "./engine/checks/checks.types.js";
import { builtInCheckFactories } from "./engine/checks/registry.js";
import type { CustomCheckConfigEntry } from "./engine/checks/resolver.js";
import type { PlannerOptions } from "./engine/options.js";
import { Planner, type RunOptions } from "./engine/planner.js";
import type { PlanResult } from "./engine/trace.js";
import { loadUniverse, type LoadUniverseOptions, type Universe } from "./engine/universe.js";
import type {
  DancerDescriptor,
  DancerId,
  PieceDescriptor,
  PieceId,
  TimeSlot,
  UniverseDescriptor,
} from "./types.js";

// ============================================================================
// Pieces and dancers
// ============================================================================

/**
 * Headcount range of a {@link piece}. `min` defaults to 1.
 *
 * @category Roster Definition
 */
export interface PieceOptions {
  min?: number;
  max: number;
}

/**
 * Defines a piece rehearsing in fixed slots.
 *
 * @example Solo
 * ```ts
 * piece("solo", ["wed-19"], { max: 1 })
 * ```
 *
 * @example Ensemble needing at least four dancers
 * ```ts
 * piece("finale", ["sat-10", "sat-14"], { min: 4, max: 12 })
 * ```
 *
 * @category Roster Definition
 */
export function piece(
  id: PieceId,
  rehearsalSlots: readonly TimeSlot[],
  options: PieceOptions,
): PieceDescriptor {
  return {
    id,
    rehearsalSlots: [...rehearsalSlots],
    minDancers: options.min ?? 1,
    maxDancers: options.max,
  };
}

/**
 * Preference tiers of a {@link dancer}. Omitted tiers are empty.
 *
 * @category Roster Definition
 */
export interface DancerTiers {
  mustHave?: readonly PieceId[];
  preferred?: readonly PieceId[];
  avoid?: readonly PieceId[];
}

/**
 * Defines a dancer with availability and preference tiers.
 *
 * @example
 * ```ts
 * dancer("ana", ["mon-18", "tue-18"], { mustHave: ["opener"], avoid: ["finale"] })
 * ```
 *
 * @category Roster Definition
 */
export function dancer(
  id: DancerId,
  availability: readonly TimeSlot[],
  tiers: DancerTiers = {},
): DancerDescriptor {
  return {
    id,
    availability: [...availability],
    ...(tiers.mustHave ? { mustHave: [...tiers.mustHave] } : {}),
    ...(tiers.preferred ? { preferred: [...tiers.preferred] } : {}),
    ...(tiers.avoid ? { avoid: [...tiers.avoid] } : {}),
  };
}

// ============================================================================
// Roster configuration
// ============================================================================

/**
 * Configuration for {@link roster}.
 *
 * @category Roster Definition
 */
export interface RosterConfig {
  /** Declared rehearsal slots. */
  timeSlots: readonly TimeSlot[];
  pieces?: readonly PieceDescriptor[];
  /** Dancers (typically added via `.with()` once the cast is known). */
  dancers?: readonly DancerDescriptor[];
  /** Additional hard checks applied on every plan. */
  checks?: readonly (CheckConfigEntry | CustomCheckConfigEntry)[];
  /**
   * Custom check factories. Keys are check names, values are functions
   * that take a config object and return an `InvariantCheck`.
   * Built-in check names cannot be overridden.
   */
  checkFactories?: CheckFactories;
}

/**
 * Options for {@link Roster.plan} and {@link Roster.optimize}: planner
 * options, load options and per-call controls.
 *
 * @category Roster Definition
 */
export interface RosterPlanOptions extends PlannerOptions, LoadUniverseOptions, RunOptions {}

interface MergedRosterConfig {
  timeSlots: TimeSlot[];
  pieces: PieceDescriptor[];
  dancers: DancerDescriptor[];
  checks: (CheckConfigEntry | CustomCheckConfigEntry)[];
  checkFactories: CheckFactories;
}

type WithArg = Roster | readonly DancerDescriptor[];

// ============================================================================
// Roster class
// ============================================================================

/**
 * An immutable roster definition.
 *
 * Created by {@link roster}, composed via {@link Roster.with}, and planned
 * via {@link Roster.plan} or {@link Roster.optimize}.
 *
 * @category Roster Definition
 */
export class Roster {
  readonly #config: Readonly<MergedRosterConfig>;

  /** @internal */
  constructor(config: MergedRosterConfig) {
    this.#config = config;
  }

  /** @internal Returns a copy of the config for merging. */
  _getConfig(): MergedRosterConfig {
    return {
      timeSlots: [...this.#config.timeSlots],
      pieces: [...this.#config.pieces],
      dancers: [...this.#config.dancers],
      checks: [...this.#config.checks],
      checkFactories: { ...this.#config.checkFactories },
    };
  }

  // --------------------------------------------------------------------------
  // Inspection
  // --------------------------------------------------------------------------

  get timeSlots(): readonly TimeSlot[] {
    return this.#config.timeSlots;
  }

  get pieceIds(): readonly PieceId[] {
    return this.#config.pieces.map((p) => p.id);
  }

  get dancerIds(): readonly DancerId[] {
    return this.#config.dancers.map((d) => d.id);
  }

  get checkNames(): readonly string[] {
    return this.#config.checks.map((c) => c.name);
  }

  // --------------------------------------------------------------------------
  // Composition
  // --------------------------------------------------------------------------

  /**
   * Merges rosters or dancers onto this roster, returning a new immutable
   * `Roster`. The original is untouched.
   *
   * Merge semantics:
   * - Time slots: union, in first-seen order
   * - Pieces and dancers: additive; error on duplicate ID
   * - Checks: additive
   * - Check factories: additive; error on name collision
   */
  with(...args: WithArg[]): Roster {
    return new Roster(mergeConfig(this.#config, args));
  }

  // --------------------------------------------------------------------------
  // Planning
  // --------------------------------------------------------------------------

  /** The plain descriptor, as {@link loadUniverse} accepts it. */
  toDescriptor(): UniverseDescriptor {
    return {
      timeSlots: [...this.#config.timeSlots],
      pieces: this.#config.pieces.map((p) => ({ ...p, rehearsalSlots: [...p.rehearsalSlots] })),
      dancers: this.#config.dancers.map((d) => ({ ...d, availability: [...d.availability] })),
    };
  }

  /**
   * Validates the roster and builds its {@link Universe}.
   *
   * @throws {ConfigError} when the roster is malformed
   */
  load(options: LoadUniverseOptions = {}): Universe {
    return loadUniverse(this.toDescriptor(), options);
  }

  /** Shortest trace to a valid assignment. */
  async plan(options: RosterPlanOptions = {}): Promise<PlanResult> {
    const { planner, run } = this.#planner(options);
    return planner.findTrace(run);
  }

  /** Highest-scoring valid assignment within the horizon. */
  async optimize(options: RosterPlanOptions = {}): Promise<PlanResult> {
    const { planner, run } = this.#planner(options);
    return planner.optimize(run);
  }

  #planner(options: RosterPlanOptions): { planner: Planner; run: RunOptions } {
    const { preferenceAvailability, signal, checks, checkFactories, ...rest } = options;
    const universe = this.load({ preferenceAvailability });
    const planner = new Planner(universe, {
      ...rest,
      checks: [...this.#config.checks, ...(checks ?? [])],
      checkFactories: { ...this.#config.checkFactories, ...checkFactories },
    });
    return { planner, run: { signal } };
  }
}

// ============================================================================
// roster() factory
// ============================================================================

/**
 * Create a roster definition.
 *
 * @example
 * ```typescript
 * const base = roster({
 *   timeSlots: ["mon-18", "wed-18"],
 *   pieces: [piece("opener", ["mon-18"], { max: 3 })],
 *   checks: [{ name: "must-have" }],
 * });
 * ```
 *
 * @category Roster Definition
 */
export function roster(config: RosterConfig): Roster {
  const merged: MergedRosterConfig = {
    timeSlots: [],
    pieces: [],
    dancers: [],
    checks: [...(config.checks ?? [])],
    checkFactories: {},
  };
  mergeTimeSlots(merged, config.timeSlots);
  mergeCheckFactories(merged, config.checkFactories ?? {});
  mergePieces(merged, config.pieces ?? []);
  mergeDancers(merged, config.dancers ?? []);
  return new Roster(merged);
}

// ============================================================================
// Internal: Merge logic
// ============================================================================

function mergeConfig(base: Readonly<MergedRosterConfig>, args: WithArg[]): MergedRosterConfig {
  const result: MergedRosterConfig = {
    timeSlots: [...base.timeSlots],
    pieces: [...base.pieces],
    dancers: [...base.dancers],
    checks: [...base.checks],
    checkFactories: { ...base.checkFactories },
  };

  for (const arg of args) {
    if (arg instanceof Roster) {
      const other = arg._getConfig();
      mergeTimeSlots(result, other.timeSlots);
      mergePieces(result, other.pieces);
      mergeDancers(result, other.dancers);
      result.checks.push(...other.checks);
      mergeCheckFactories(result, other.checkFactories);
    } else if (Array.isArray(arg)) {
      mergeDancers(result, arg);
    } else {
      throw new Error(
        `Unexpected argument passed to .with(): expected Roster or DancerDescriptor[], got ${typeof arg}`,
      );
    }
  }

  return result;
}

function mergeTimeSlots(result: MergedRosterConfig, slots: readonly TimeSlot[]): void {
  const known = new Set(result.timeSlots);
  for (const slot of slots) {
    if (known.has(slot)) continue;
    known.add(slot);
    result.timeSlots.push(slot);
  }
}

function mergePieces(result: MergedRosterConfig, pieces: readonly PieceDescriptor[]): void {
  const ids = new Set(result.pieces.map((p) => p.id));
  for (const p of pieces) {
    if (ids.has(p.id)) {
      throw new Error(`Duplicate piece ID "${p.id}".`);
    }
    ids.add(p.id);
    result.pieces.push(p);
  }
}

function mergeDancers(result: MergedRosterConfig, dancers: readonly DancerDescriptor[]): void {
  const ids = new Set(result.dancers.map((d) => d.id));
  for (const d of dancers) {
    if (ids.has(d.id)) {
      throw new Error(`Duplicate dancer ID "${d.id}".`);
    }
    ids.add(d.id);
    result.dancers.push(d);
  }
}

function mergeCheckFactories(
  result: MergedRosterConfig,
  factories: CheckFactories,
): void {
  for (const [name, factory] of Object.entries(factories)) {
    if (Object.hasOwn(builtInCheckFactories, name)) {
      throw new Error(
        `Custom check factory "${name}" conflicts with a built-in check. Choose a different name.`,
      );
    }
    const existing = Object.hasOwn(result.checkFactories, name)
      ? result.checkFactories[name]
      : undefined;
    if (existing && existing !== factory) {
      throw new Error(`Check factory "${name}" is defined twice.`);
    }
    result.checkFactories[name] = factory;
  }
}
