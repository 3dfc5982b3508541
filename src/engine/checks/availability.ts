import * as z from "zod";
import type { InvariantCheck, Violation } from "./checks.types.js";
import { resolveDancers, withScopes } from "./scoping.js";

const AvailabilitySchema = withScopes(z.object({}), ["dancers"]);

export type AvailabilityConfig = z.infer<typeof AvailabilitySchema>;

/**
 * Flags an assigned piece whose rehearsal slots are not all inside the
 * dancer's availability.
 */
export function createAvailabilityCheck(config: AvailabilityConfig = {}): InvariantCheck {
  const parsed = AvailabilitySchema.parse(config);

  return {
    name: "availability",
    check(state, universe) {
      const violations: Violation[] = [];
      for (const dancer of resolveDancers(parsed, universe)) {
        for (const piece of universe.pieces) {
          if (!state.has(dancer.id, piece.id)) continue;
          const missing = [...piece.rehearsalSlots].filter(
            (slot) => !dancer.availability.has(slot),
          );
          if (missing.length === 0) continue;
          violations.push({
            kind: "Availability",
            check: "availability",
            dancerId: dancer.id,
            pieceId: piece.id,
            missingSlots: missing,
            message: `${dancer.id} is cast in ${piece.id} but unavailable at ${missing.join(", ")}`,
          });
        }
      }
      return violations;
    },
  };
}
