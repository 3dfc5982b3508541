import * as z from "zod";
import type { InvariantCheck, Violation } from "./checks.types.js";
import { resolveDancers, withScopes } from "./scoping.js";

const MustHaveSchema = withScopes(z.object({}), ["dancers"]);

export type MustHaveConfig = z.infer<typeof MustHaveSchema>;

/**
 * Flags a dancer with a non-empty mustHave tier who is cast in none of it.
 */
export function createMustHaveCheck(config: MustHaveConfig = {}): InvariantCheck {
  const parsed = MustHaveSchema.parse(config);

  return {
    name: "must-have",
    check(state, universe) {
      const violations: Violation[] = [];
      for (const dancer of resolveDancers(parsed, universe)) {
        if (dancer.mustHave.size === 0) continue;
        const reached = [...dancer.mustHave].some((pieceId) => state.has(dancer.id, pieceId));
        if (reached) continue;
        violations.push({
          kind: "MustHaveUnreached",
          check: "must-have",
          dancerId: dancer.id,
          message: `${dancer.id} is cast in none of their must-have pieces`,
        });
      }
      return violations;
    },
  };
}
