import type { DancerId } from "../types.js";
import type { AssignmentState } from "./state.js";
import type { Universe } from "./universe.js";

/**
 * Per-piece weights of the satisfaction score.
 *
 * A dancer's score is `3·|mustHave cast| + 1·|preferred cast| − 2·|avoid cast|`.
 * Pieces outside all three tiers contribute nothing.
 */
export const SCORE_WEIGHTS = {
  MUST_HAVE: 3,
  PREFERRED: 1,
  AVOID: -2,
} as const;

/**
 * Scores of one state: the aggregate and each dancer's share.
 *
 * @category Scoring
 */
export interface ScoreReport {
  total: number;
  dancers: Record<DancerId, number>;
}

/** @category Scoring */
export function dancerScore(universe: Universe, state: AssignmentState, dancerId: DancerId): number {
  const dancer = universe.dancer(dancerId);
  let score = 0;
  for (const pieceId of state.piecesOf(dancerId)) {
    if (dancer.mustHave.has(pieceId)) score += SCORE_WEIGHTS.MUST_HAVE;
    else if (dancer.preferred.has(pieceId)) score += SCORE_WEIGHTS.PREFERRED;
    else if (dancer.avoid.has(pieceId)) score += SCORE_WEIGHTS.AVOID;
  }
  return score;
}

/** @category Scoring */
export function totalScore(universe: Universe, state: AssignmentState): number {
  let total = 0;
  for (const dancer of universe.dancers) {
    total += dancerScore(universe, state, dancer.id);
  }
  return total;
}

/** @category Scoring */
export function scoreState(universe: Universe, state: AssignmentState): ScoreReport {
  const entries = universe.dancers.map(
    (dancer): [DancerId, number] => [dancer.id, dancerScore(universe, state, dancer.id)],
  );
  const total = entries.reduce((sum, [, score]) => sum + score, 0);
  return { total, dancers: Object.fromEntries(entries) };
}
