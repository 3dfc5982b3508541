import * as z from "zod";
import type { InvariantCheck, Violation } from "./checks.types.js";
import { resolveDancers, withScopes } from "./scoping.js";

const CoverageSchema = withScopes(z.object({}), ["dancers"]);

export type CoverageConfig = z.infer<typeof CoverageSchema>;

/** Flags a dancer who is cast in nothing. */
export function createCoverageCheck(config: CoverageConfig = {}): InvariantCheck {
  const parsed = CoverageSchema.parse(config);

  return {
    name: "coverage",
    check(state, universe) {
      const violations: Violation[] = [];
      for (const dancer of resolveDancers(parsed, universe)) {
        if (state.assignmentCount(dancer.id) > 0) continue;
        violations.push({
          kind: "Uncovered",
          check: "coverage",
          dancerId: dancer.id,
          message: `${dancer.id} is not cast in any piece`,
        });
      }
      return violations;
    },
  };
}
