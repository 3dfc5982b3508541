import * as z from "zod";
import type { InvariantCheck, Violation } from "./checks.types.js";
import { resolvePieces, withScopes } from "./scoping.js";

const CapacitySchema = withScopes(z.object({}), ["pieces"]);

export type CapacityConfig = z.infer<typeof CapacitySchema>;

/**
 * Flags a piece whose headcount falls outside `[minDancers, maxDancers]`.
 *
 * In the initial state every piece is below its minimum, so this check
 * only becomes quiet once casting is complete.
 */
export function createCapacityCheck(config: CapacityConfig = {}): InvariantCheck {
  const parsed = CapacitySchema.parse(config);

  return {
    name: "capacity",
    check(state, universe) {
      const violations: Violation[] = [];
      for (const piece of resolvePieces(parsed, universe)) {
        const headcount = state.headcount(piece.id);
        if (headcount >= piece.minDancers && headcount <= piece.maxDancers) continue;
        violations.push({
          kind: "Capacity",
          check: "capacity",
          pieceId: piece.id,
          headcount,
          minDancers: piece.minDancers,
          maxDancers: piece.maxDancers,
          message:
            headcount < piece.minDancers
              ? `${piece.id} has ${headcount} dancers, needs at least ${piece.minDancers}`
              : `${piece.id} has ${headcount} dancers, allows at most ${piece.maxDancers}`,
        });
      }
      return violations;
    },
  };
}
