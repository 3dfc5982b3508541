import * as z from "zod";
import type { InvariantCheck, Violation } from "./checks.types.js";
import { resolveDancers, withScopes } from "./scoping.js";

const HardAvoidSchema = withScopes(
  z.object({
    policy: z.union([z.literal("strict"), z.literal("necessity")]).optional(),
  }),
  ["dancers"],
);

export type HardAvoidConfig = z.infer<typeof HardAvoidSchema>;

/**
 * Flags a dancer cast in a piece from their avoid tier.
 *
 * - `"strict"` (default): every such casting is a violation.
 * - `"necessity"`: the casting is excused only when the piece cannot reach
 *   `minDancers` otherwise, that is when fewer than `minDancers` dancers in
 *   the universe are able to attend it and list it as mustHave or preferred.
 *
 * @example Allow avoided pieces only to keep a piece alive
 * ```ts
 * createHardAvoidCheck({ policy: "necessity" });
 * ```
 */
export function createHardAvoidCheck(config: HardAvoidConfig = {}): InvariantCheck {
  const parsed = HardAvoidSchema.parse(config);
  const policy = parsed.policy ?? "strict";

  return {
    name: "hard-avoid",
    check(state, universe) {
      const violations: Violation[] = [];
      for (const dancer of resolveDancers(parsed, universe)) {
        for (const pieceId of dancer.avoid) {
          if (!state.has(dancer.id, pieceId)) continue;

          if (
            policy === "necessity" &&
            universe.willingCount(pieceId) < universe.piece(pieceId).minDancers
          ) {
            continue;
          }

          violations.push({
            kind: "HardAvoid",
            check: "hard-avoid",
            dancerId: dancer.id,
            pieceId,
            message:
              policy === "strict"
                ? `${dancer.id} is cast in avoided piece ${pieceId}`
                : `${dancer.id} is cast in avoided piece ${pieceId} although it can reach its minimum without them`,
          });
        }
      }
      return violations;
    },
  };
}
