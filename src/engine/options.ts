import * as z from "zod";
import type { Logger } from "pino";
import { ConfigError } from "../errors.js";
import type { CheckConfigEntry, CheckFactories } from "./checks/checks.types.js";
import type { CustomCheckConfigEntry } from "./checks/resolver.js";

/**
 * Zod schema for the serializable planner options.
 *
 * Defaults: horizon `[5, 10]`, fairness bound 2, strict avoid policy,
 * coverage and must-have goals off, fairness enforced at every step.
 */
export const PlannerOptionsSchema = z
  .object({
    minLen: z.number().int().min(0).default(5),
    maxLen: z.number().int().min(0).default(10),
    fairnessBound: z.number().int().min(0).default(2),
    avoidPolicy: z.union([z.literal("strict"), z.literal("necessity")]).default("strict"),
    requireFullCoverage: z.boolean().default(false),
    requireMustHave: z.boolean().default(false),
    fairnessEveryStep: z.boolean().default(true),
    maxNodes: z.number().int().min(1).default(1_000_000),
    timeLimitMs: z.number().positive().optional(),
    yieldEvery: z.number().int().min(1).default(2_048),
  })
  .superRefine((val, ctx) => {
    if (val.minLen > val.maxLen) {
      ctx.addIssue({
        code: "custom",
        path: ["minLen"],
        message: `minLen (${val.minLen}) must not exceed maxLen (${val.maxLen})`,
      });
    }
  });

/** Options as accepted from callers: every field optional. */
export type PlannerOptionsInput = z.input<typeof PlannerOptionsSchema>;

/** Options after defaults have been applied. */
export type ResolvedPlannerOptions = z.output<typeof PlannerOptionsSchema>;

/**
 * Configuration for {@link Planner}.
 *
 * @example
 * ```typescript
 * const options: PlannerOptions = {
 *   maxLen: 8,
 *   fairnessBound: 1,
 *   avoidPolicy: "necessity",
 *   checks: [{ name: "must-have", dancerIds: ["ana"] }],
 * };
 * ```
 */
export interface PlannerOptions extends PlannerOptionsInput {
  /**
   * Additional hard checks. A state that any of them flags is not a valid
   * assignment.
   */
  checks?: readonly (CheckConfigEntry | CustomCheckConfigEntry)[];
  /**
   * Custom factories used to instantiate `checks`, alongside the built-in
   * ones. Build them with `createCheckFactory` so built-ins cannot be replaced.
   */
  checkFactories?: CheckFactories;
  /** Logger for search diagnostics. Defaults to the package logger. */
  logger?: Logger;
}

/**
 * Applies defaults and validates the serializable options.
 *
 * @throws {ConfigError} of kind `InvalidOptions`
 */
export function resolvePlannerOptions(input: PlannerOptionsInput = {}): ResolvedPlannerOptions {
  const parsed = PlannerOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    throw new ConfigError(
      "InvalidOptions",
      `Invalid planner options: ${issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ")}`,
      { issues },
    );
  }
  return parsed.data;
}
