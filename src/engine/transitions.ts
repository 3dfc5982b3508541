import type { DancerId, PieceId, TimeSlot } from "../types.js";
import type { AssignmentState } from "./state.js";
import { intersect, isSubset, type Universe } from "./universe.js";

/**
 * How dancers may be cast into pieces in their avoid tier.
 *
 * - `"strict"`: never
 * - `"necessity"`: only while the piece is still below `minDancers` and
 *   has too few willing dancers to reach it without them
 */
export type AvoidPolicy = "strict" | "necessity";

/**
 * A single discrete step of a trace.
 *
 * Exactly one action is applied per step; there are no multi-dancer moves.
 */
export type Action =
  | { readonly type: "stutter" }
  | { readonly type: "assign"; readonly dancerId: DancerId; readonly pieceId: PieceId }
  | { readonly type: "unassign"; readonly dancerId: DancerId; readonly pieceId: PieceId };

export type PreconditionKind =
  | "Unavailable"
  | "Conflict"
  | "AtCapacity"
  | "NotEligible"
  | "NotAssigned"
  | "BelowMinimum";

/**
 * Why an action could not be applied. These are expected signals consumed by
 * the search to prune a branch, never process-level errors.
 */
export interface PreconditionViolation {
  readonly kind: PreconditionKind;
  readonly action: Action;
  readonly message: string;
  /** Slots outside availability (`Unavailable`) or shared with another piece (`Conflict`). */
  readonly slots?: readonly TimeSlot[];
  /** The already-assigned piece that clashes (`Conflict`). */
  readonly conflictingPieceId?: PieceId;
}

export type TransitionResult =
  | { readonly ok: true; readonly state: AssignmentState; readonly action: Action }
  | { readonly ok: false; readonly violation: PreconditionViolation };

export interface TransitionOptions {
  avoidPolicy?: AvoidPolicy;
}

/**
 * Casts dancer `d` in piece `p`.
 *
 * Preconditions are checked in order and the first failure wins:
 * `Unavailable`, `Conflict`, `AtCapacity`, `NotEligible`. On success only
 * `d`'s entry changes; on failure nothing is derived.
 *
 * @category Engine
 */
export function assign(
  state: AssignmentState,
  universe: Universe,
  dancerId: DancerId,
  pieceId: PieceId,
  options: TransitionOptions = {},
): TransitionResult {
  const dancer = universe.dancer(dancerId);
  const piece = universe.piece(pieceId);
  const action: Action = { type: "assign", dancerId, pieceId };

  if (!isSubset(piece.rehearsalSlots, dancer.availability)) {
    const missing = [...piece.rehearsalSlots].filter((slot) => !dancer.availability.has(slot));
    return fail(action, "Unavailable", `${dancerId} is not available for ${pieceId}`, {
      slots: missing,
    });
  }

  const current = state.piecesOf(dancerId);
  for (const otherId of current) {
    const shared = intersect(universe.piece(otherId).rehearsalSlots, piece.rehearsalSlots);
    if (shared.length > 0) {
      return fail(
        action,
        "Conflict",
        `${pieceId} shares rehearsal slots with ${otherId} for ${dancerId}`,
        { slots: shared, conflictingPieceId: otherId },
      );
    }
  }

  const headcount = state.headcount(pieceId);
  if (headcount >= piece.maxDancers) {
    return fail(action, "AtCapacity", `${pieceId} already has ${headcount} of ${piece.maxDancers}`);
  }

  const tier = universe.tierOf(dancerId, pieceId);
  const eligible =
    tier === "mustHave" ||
    tier === "preferred" ||
    (tier === "avoid" &&
      (options.avoidPolicy ?? "strict") === "necessity" &&
      headcount < piece.minDancers &&
      universe.willingCount(pieceId) < piece.minDancers);
  if (!eligible) {
    return fail(action, "NotEligible", `${dancerId} is not eligible for ${pieceId}`);
  }

  const next = new Set(current);
  next.add(pieceId);
  return { ok: true, state: state.withPieces(dancerId, next), action };
}

/**
 * Removes dancer `d` from piece `p`.
 *
 * Preconditions: `NotAssigned`, then `BelowMinimum` (the removal would leave
 * the piece with fewer than `minDancers`).
 *
 * @category Engine
 */
export function unassign(
  state: AssignmentState,
  universe: Universe,
  dancerId: DancerId,
  pieceId: PieceId,
): TransitionResult {
  universe.dancer(dancerId);
  const piece = universe.piece(pieceId);
  const action: Action = { type: "unassign", dancerId, pieceId };

  const current = state.piecesOf(dancerId);
  if (!current.has(pieceId)) {
    return fail(action, "NotAssigned", `${dancerId} is not cast in ${pieceId}`);
  }

  const headcount = state.headcount(pieceId);
  if (headcount - 1 < piece.minDancers) {
    return fail(
      action,
      "BelowMinimum",
      `removing ${dancerId} would leave ${pieceId} with ${headcount - 1} of minimum ${piece.minDancers}`,
    );
  }

  const next = new Set(current);
  next.delete(pieceId);
  return { ok: true, state: state.withPieces(dancerId, next), action };
}

/** The identity step. Always succeeds and returns the same state object. */
export function stutter(state: AssignmentState): TransitionResult {
  return { ok: true, state, action: { type: "stutter" } };
}

/**
 * Applies any {@link Action}.
 *
 * @example
 * ```typescript
 * const result = applyAction(state, universe, { type: "assign", dancerId: "ana", pieceId: "opener" });
 * if (result.ok) state = result.state;
 * ```
 */
export function applyAction(
  state: AssignmentState,
  universe: Universe,
  action: Action,
  options: TransitionOptions = {},
): TransitionResult {
  switch (action.type) {
    case "stutter":
      return stutter(state);
    case "assign":
      return assign(state, universe, action.dancerId, action.pieceId, options);
    case "unassign":
      return unassign(state, universe, action.dancerId, action.pieceId);
  }
}

export function formatAction(action: Action): string {
  switch (action.type) {
    case "stutter":
      return "stutter";
    case "assign":
      return `assign(${action.dancerId}, ${action.pieceId})`;
    case "unassign":
      return `unassign(${action.dancerId}, ${action.pieceId})`;
  }
}

function fail(
  action: Action,
  kind: PreconditionKind,
  message: string,
  extra: { slots?: TimeSlot[]; conflictingPieceId?: PieceId } = {},
): TransitionResult {
  return { ok: false, violation: { kind, action, message, ...extra } };
}
