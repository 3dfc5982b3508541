/**
 * Core casting types: time slots, pieces, dancers and the universe descriptor.
 *
 * Descriptor types are derived from Zod schemas so that the shape an
 * ingestion collaborator must produce and the shape the loader validates
 * never drift apart.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Opaque rehearsal time unit. Only meaningful as a member of the
 * universe's declared slot domain.
 */
export type TimeSlot = string;

export type PieceId = string;

export type DancerId = string;

const IdSchema = z.string().min(1);

// ============================================================================
// Descriptor schemas
// ============================================================================

/**
 * Zod schema for {@link PieceDescriptor}.
 *
 * Only structural checks live here. Semantic checks (empty slot lists,
 * capacity bounds) are made by the loader so that they surface as
 * {@link ConfigError} kinds rather than generic schema issues.
 */
export const PieceDescriptorSchema = z.object({
  id: IdSchema,
  rehearsalSlots: z.array(IdSchema),
  minDancers: z.number().int(),
  maxDancers: z.number().int(),
});

export const DancerDescriptorSchema = z.object({
  id: IdSchema,
  availability: z.array(IdSchema),
  mustHave: z.array(IdSchema).optional(),
  preferred: z.array(IdSchema).optional(),
  avoid: z.array(IdSchema).optional(),
});

export const UniverseDescriptorSchema = z.object({
  timeSlots: z.array(IdSchema),
  pieces: z.array(PieceDescriptorSchema),
  dancers: z.array(DancerDescriptorSchema),
});

/**
 * A piece (job) with fixed rehearsal slots and a headcount range.
 *
 * @example
 * ```typescript
 * const duet: PieceDescriptor = {
 *   id: "duet",
 *   rehearsalSlots: ["tue-18", "thu-18"],
 *   minDancers: 2,
 *   maxDancers: 2,
 * };
 * ```
 */
export type PieceDescriptor = z.infer<typeof PieceDescriptorSchema>;

/**
 * A dancer (resource) with availability and three preference tiers.
 *
 * The tiers must be pairwise disjoint. Pieces in `mustHave` or `preferred`
 * must rehearse entirely inside `availability`.
 */
export type DancerDescriptor = z.infer<typeof DancerDescriptorSchema>;

/**
 * Everything the planner needs about the world, as produced by an
 * ingestion collaborator (roster import, form export, ...).
 */
export type UniverseDescriptor = z.infer<typeof UniverseDescriptorSchema>;

// ============================================================================
// Tiers
// ============================================================================

/** A dancer's preference classification of a piece. */
export type Tier = "mustHave" | "preferred" | "avoid";

export const TIERS = ["mustHave", "preferred", "avoid"] as const satisfies readonly Tier[];

// ============================================================================
// Loaded entities
// ============================================================================

export interface Piece {
  readonly id: PieceId;
  readonly rehearsalSlots: ReadonlySet<TimeSlot>;
  readonly minDancers: number;
  readonly maxDancers: number;
}

export interface Dancer {
  readonly id: DancerId;
  readonly availability: ReadonlySet<TimeSlot>;
  readonly mustHave: ReadonlySet<PieceId>;
  readonly preferred: ReadonlySet<PieceId>;
  readonly avoid: ReadonlySet<PieceId>;
}
