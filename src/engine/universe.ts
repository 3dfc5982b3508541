import { ConfigError, type ConfigIssue } from "../errors.js";
import {
  TIERS,
  UniverseDescriptorSchema,
  type Dancer,
  type DancerDescriptor,
  type DancerId,
  type Piece,
  type PieceDescriptor,
  type PieceId,
  type Tier,
  type TimeSlot,
  type UniverseDescriptor,
} from "../types.js";

/**
 * Options for {@link loadUniverse}.
 */
export interface LoadUniverseOptions {
  /**
   * What to do when a mustHave or preferred piece rehearses outside the
   * dancer's availability.
   *
   * - `"error"` (default): reject with `PreferenceOutsideAvailability`
   * - `"ignore"`: load anyway; the transition engine reports `Unavailable`
   *   whenever the assignment is attempted
   */
  preferenceAvailability?: "error" | "ignore";
}

/**
 * The static, validated world a search runs against.
 *
 * Created once by {@link loadUniverse} and never mutated. `dancers` and
 * `pieces` keep declaration order, which the planner uses for every
 * deterministic ordering decision.
 */
export interface Universe {
  readonly timeSlots: ReadonlySet<TimeSlot>;
  readonly dancers: readonly Dancer[];
  readonly pieces: readonly Piece[];
  dancer(id: DancerId): Dancer;
  piece(id: PieceId): Piece;
  hasDancer(id: DancerId): boolean;
  hasPiece(id: PieceId): boolean;
  /** Declaration index of a piece; used for canonical state keys. */
  pieceIndex(id: PieceId): number;
  /** The dancer's tier for a piece, or `undefined` when the dancer has no opinion. */
  tierOf(dancerId: DancerId, pieceId: PieceId): Tier | undefined;
  /**
   * Dancers who can attend every rehearsal of the piece and list it as
   * mustHave or preferred. Under the necessity avoid policy a piece may take
   * dancers who avoid it only while this is below its `minDancers`.
   */
  willingCount(pieceId: PieceId): number;
}

/**
 * Validates a universe descriptor and builds the frozen {@link Universe}.
 *
 * Fails with a {@link ConfigError} before any search can start.
 *
 * @example
 * ```typescript
 * const universe = loadUniverse({
 *   timeSlots: ["mon-18", "wed-18"],
 *   pieces: [{ id: "opener", rehearsalSlots: ["mon-18"], minDancers: 1, maxDancers: 4 }],
 *   dancers: [{ id: "ana", availability: ["mon-18", "wed-18"], mustHave: ["opener"] }],
 * });
 * ```
 *
 * @category Domain
 */
export function loadUniverse(
  descriptor: UniverseDescriptor,
  options: LoadUniverseOptions = {},
): Universe {
  const parsed = UniverseDescriptorSchema.safeParse(descriptor);
  if (!parsed.success) {
    const issues: ConfigIssue[] = parsed.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    throw new ConfigError("SchemaViolation", "Universe descriptor does not match the schema", {
      issues,
    });
  }
  const input = parsed.data;

  const timeSlots = new Set<TimeSlot>();
  for (const slot of input.timeSlots) {
    if (timeSlots.has(slot)) {
      throw new ConfigError("DuplicateId", `Time slot "${slot}" is declared twice`, {
        entityId: slot,
      });
    }
    timeSlots.add(slot);
  }

  const pieces = new Map<PieceId, Piece>();
  for (const raw of input.pieces) {
    if (pieces.has(raw.id)) {
      throw new ConfigError("DuplicateId", `Piece "${raw.id}" is declared twice`, {
        entityId: raw.id,
      });
    }
    pieces.set(raw.id, buildPiece(raw, timeSlots));
  }

  const dancers = new Map<DancerId, Dancer>();
  for (const raw of input.dancers) {
    if (dancers.has(raw.id)) {
      throw new ConfigError("DuplicateId", `Dancer "${raw.id}" is declared twice`, {
        entityId: raw.id,
      });
    }
    dancers.set(raw.id, buildDancer(raw, timeSlots, pieces, options));
  }

  return createUniverse(timeSlots, [...pieces.values()], [...dancers.values()]);
}

function buildPiece(raw: PieceDescriptor, timeSlots: ReadonlySet<TimeSlot>): Piece {
  if (raw.rehearsalSlots.length === 0) {
    throw new ConfigError("EmptyRehearsalSlots", `Piece "${raw.id}" has no rehearsal slots`, {
      entityId: raw.id,
    });
  }
  for (const slot of raw.rehearsalSlots) {
    if (!timeSlots.has(slot)) {
      throw new ConfigError(
        "UnknownReference",
        `Piece "${raw.id}" rehearses in undeclared time slot "${slot}"`,
        { entityId: raw.id },
      );
    }
  }
  if (raw.minDancers < 1 || raw.maxDancers < 1 || raw.minDancers > raw.maxDancers) {
    throw new ConfigError(
      "InvalidCapacity",
      `Piece "${raw.id}" has invalid capacity [${raw.minDancers}, ${raw.maxDancers}]: ` +
        "minDancers must be at least 1 and no greater than maxDancers",
      { entityId: raw.id },
    );
  }

  return Object.freeze({
    id: raw.id,
    rehearsalSlots: toReadonlySet(raw.rehearsalSlots),
    minDancers: raw.minDancers,
    maxDancers: raw.maxDancers,
  });
}

function buildDancer(
  raw: DancerDescriptor,
  timeSlots: ReadonlySet<TimeSlot>,
  pieces: ReadonlyMap<PieceId, Piece>,
  options: LoadUniverseOptions,
): Dancer {
  for (const slot of raw.availability) {
    if (!timeSlots.has(slot)) {
      throw new ConfigError(
        "UnknownReference",
        `Dancer "${raw.id}" is available in undeclared time slot "${slot}"`,
        { entityId: raw.id },
      );
    }
  }

  const tiers = {
    mustHave: raw.mustHave ?? [],
    preferred: raw.preferred ?? [],
    avoid: raw.avoid ?? [],
  } satisfies Record<Tier, string[]>;

  const seen = new Map<PieceId, Tier>();
  for (const tier of TIERS) {
    for (const pieceId of tiers[tier]) {
      if (!pieces.has(pieceId)) {
        throw new ConfigError(
          "UnknownReference",
          `Dancer "${raw.id}" lists undeclared piece "${pieceId}" as ${tier}`,
          { entityId: raw.id },
        );
      }
      const previous = seen.get(pieceId);
      if (previous !== undefined && previous !== tier) {
        throw new ConfigError(
          "OverlappingTiers",
          `Dancer "${raw.id}" lists piece "${pieceId}" as both ${previous} and ${tier}`,
          { entityId: raw.id },
        );
      }
      seen.set(pieceId, tier);
    }
  }

  const availability = toReadonlySet(raw.availability);

  if ((options.preferenceAvailability ?? "error") === "error") {
    for (const pieceId of [...tiers.mustHave, ...tiers.preferred]) {
      const piece = pieces.get(pieceId);
      if (piece && !isSubset(piece.rehearsalSlots, availability)) {
        throw new ConfigError(
          "PreferenceOutsideAvailability",
          `Dancer "${raw.id}" wants piece "${pieceId}" but is not available for all of its rehearsals`,
          { entityId: raw.id },
        );
      }
    }
  }

  return Object.freeze({
    id: raw.id,
    availability,
    mustHave: toReadonlySet(tiers.mustHave),
    preferred: toReadonlySet(tiers.preferred),
    avoid: toReadonlySet(tiers.avoid),
  });
}

function createUniverse(
  timeSlots: ReadonlySet<TimeSlot>,
  pieces: Piece[],
  dancers: Dancer[],
): Universe {
  const pieceMap = new Map(pieces.map((p) => [p.id, p]));
  const dancerMap = new Map(dancers.map((d) => [d.id, d]));
  const pieceIndexMap = new Map(pieces.map((p, idx) => [p.id, idx]));
  const willingMap = new Map(
    pieces.map((p) => [
      p.id,
      dancers.filter(
        (d) =>
          (d.mustHave.has(p.id) || d.preferred.has(p.id)) &&
          isSubset(p.rehearsalSlots, d.availability),
      ).length,
    ]),
  );

  return Object.freeze({
    timeSlots,
    pieces: Object.freeze(pieces),
    dancers: Object.freeze(dancers),
    dancer(id: DancerId): Dancer {
      const dancer = dancerMap.get(id);
      if (!dancer) throw new Error(`Unknown dancer "${id}"`);
      return dancer;
    },
    piece(id: PieceId): Piece {
      const piece = pieceMap.get(id);
      if (!piece) throw new Error(`Unknown piece "${id}"`);
      return piece;
    },
    hasDancer(id: DancerId): boolean {
      return dancerMap.has(id);
    },
    hasPiece(id: PieceId): boolean {
      return pieceMap.has(id);
    },
    pieceIndex(id: PieceId): number {
      const idx = pieceIndexMap.get(id);
      if (idx === undefined) throw new Error(`Unknown piece "${id}"`);
      return idx;
    },
    tierOf(dancerId: DancerId, pieceId: PieceId): Tier | undefined {
      const dancer = dancerMap.get(dancerId);
      if (!dancer) throw new Error(`Unknown dancer "${dancerId}"`);
      if (dancer.mustHave.has(pieceId)) return "mustHave";
      if (dancer.preferred.has(pieceId)) return "preferred";
      if (dancer.avoid.has(pieceId)) return "avoid";
      return undefined;
    },
    willingCount(pieceId: PieceId): number {
      const count = willingMap.get(pieceId);
      if (count === undefined) throw new Error(`Unknown piece "${pieceId}"`);
      return count;
    },
  });
}

/** True when every element of `inner` is in `outer`. */
export function isSubset<T>(inner: ReadonlySet<T>, outer: ReadonlySet<T>): boolean {
  for (const value of inner) {
    if (!outer.has(value)) return false;
  }
  return true;
}

/** Elements present in both sets, in `a`'s iteration order. */
export function intersect<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): T[] {
  const result: T[] = [];
  for (const value of a) {
    if (b.has(value)) result.push(value);
  }
  return result;
}

function toReadonlySet<T>(values: readonly T[]): ReadonlySet<T> {
  return new Set(values);
}
