/**
 * Zod schemas for the structures a search emits.
 *
 * These define the contract with reporting and persistence collaborators.
 * TypeScript types are derived from them in trace.ts.
 */

import { z } from "zod";

// --------------------------------------------------------------------------
// Actions
// --------------------------------------------------------------------------

export const InitActionSchema = z.object({ type: z.literal("init") });

export const StutterActionSchema = z.object({ type: z.literal("stutter") });

export const AssignActionSchema = z.object({
  type: z.literal("assign"),
  dancerId: z.string(),
  pieceId: z.string(),
});

export const UnassignActionSchema = z.object({
  type: z.literal("unassign"),
  dancerId: z.string(),
  pieceId: z.string(),
});

export const TraceActionSchema = z.discriminatedUnion("type", [
  InitActionSchema,
  StutterActionSchema,
  AssignActionSchema,
  UnassignActionSchema,
]);

// --------------------------------------------------------------------------
// Trace
// --------------------------------------------------------------------------

export const AssignmentRecordSchema = z.record(z.string(), z.array(z.string()));

export const TraceStepSchema = z.object({
  index: z.number().int().min(0),
  action: TraceActionSchema,
  state: AssignmentRecordSchema,
});

export const TraceSchema = z.object({
  steps: z.array(TraceStepSchema).min(1),
  /** Index of the first step whose state is a valid assignment. */
  validAt: z.number().int().min(0),
});

// --------------------------------------------------------------------------
// Result
// --------------------------------------------------------------------------

export const PlanStatusSchema = z.enum(["found", "unsat_within_horizon", "budget_exceeded"]);

export const PlanModeSchema = z.enum(["feasibility", "optimization"]);

export const ScoreReportSchema = z.object({
  total: z.number().int(),
  dancers: z.record(z.string(), z.number().int()),
});

export const SearchStatsSchema = z.object({
  nodesExpanded: z.number().int().min(0),
  statesVisited: z.number().int().min(0),
  maxDepth: z.number().int().min(0),
  elapsedMs: z.number().min(0),
});

export const PlanResultSchema = z.object({
  status: PlanStatusSchema,
  mode: PlanModeSchema,
  trace: TraceSchema.optional(),
  score: ScoreReportSchema.optional(),
  /** Whether the witness is proven best within the horizon (optimization only). */
  optimal: z.boolean().optional(),
  /** Why the search stopped early (`budget_exceeded` only). */
  budget: z.enum(["nodes", "time", "aborted"]).optional(),
  stats: SearchStatsSchema,
});
