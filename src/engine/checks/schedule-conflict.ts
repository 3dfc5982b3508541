import * as z from "zod";
import { intersect } from "../universe.js";
import type { InvariantCheck, Violation } from "./checks.types.js";
import { resolveDancers, withScopes } from "./scoping.js";

const ScheduleConflictSchema = withScopes(z.object({}), ["dancers"]);

export type ScheduleConflictConfig = z.infer<typeof ScheduleConflictSchema>;

/**
 * Flags a dancer cast in two pieces that share a rehearsal slot.
 *
 * One violation is reported per conflicting pair, ordered by piece
 * declaration order.
 *
 * @example
 * ```ts
 * createScheduleConflictCheck({});
 * ```
 */
export function createScheduleConflictCheck(config: ScheduleConflictConfig = {}): InvariantCheck {
  const parsed = ScheduleConflictSchema.parse(config);

  return {
    name: "schedule-conflict",
    check(state, universe) {
      const violations: Violation[] = [];
      for (const dancer of resolveDancers(parsed, universe)) {
        const assigned = universe.pieces.filter((p) => state.has(dancer.id, p.id));
        for (let i = 0; i < assigned.length; i++) {
          for (let j = i + 1; j < assigned.length; j++) {
            const a = assigned[i];
            const b = assigned[j];
            if (!a || !b) continue;
            const shared = intersect(a.rehearsalSlots, b.rehearsalSlots);
            if (shared.length === 0) continue;
            violations.push({
              kind: "ScheduleConflict",
              check: "schedule-conflict",
              dancerId: dancer.id,
              pieceIds: [a.id, b.id],
              slots: shared,
              message: `${dancer.id} is double-booked in ${a.id} and ${b.id} (${shared.join(", ")})`,
            });
          }
        }
      }
      return violations;
    },
  };
}
