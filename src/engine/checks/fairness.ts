import * as z from "zod";
import type { InvariantCheck } from "./checks.types.js";
import { resolveDancers, withScopes } from "./scoping.js";

const FairnessSchema = withScopes(
  z.object({
    bound: z.number().int().min(0),
  }),
  ["dancers"],
);

export type FairnessConfig = z.infer<typeof FairnessSchema>;

/**
 * Flags a state where two dancers' assignment counts differ by more than
 * `bound`.
 *
 * Reported once per state, naming the extreme pair (first in declaration
 * order on ties).
 *
 * @example Nobody carries more than one piece over anyone else
 * ```ts
 * createFairnessCheck({ bound: 1 });
 * ```
 */
export function createFairnessCheck(config: FairnessConfig): InvariantCheck {
  const parsed = FairnessSchema.parse(config);
  const { bound } = parsed;

  return {
    name: "fairness",
    check(state, universe) {
      const dancers = resolveDancers(parsed, universe);
      let max: { id: string; count: number } | undefined;
      let min: { id: string; count: number } | undefined;

      for (const dancer of dancers) {
        const count = state.assignmentCount(dancer.id);
        if (!max || count > max.count) max = { id: dancer.id, count };
        if (!min || count < min.count) min = { id: dancer.id, count };
      }

      if (!max || !min) return [];
      const spread = max.count - min.count;
      if (spread <= bound) return [];

      return [
        {
          kind: "Fairness",
          check: "fairness",
          maxDancerId: max.id,
          minDancerId: min.id,
          spread,
          bound,
          message: `${max.id} has ${max.count} pieces and ${min.id} has ${min.count}, spread ${spread} exceeds ${bound}`,
        },
      ];
    },
  };
}
