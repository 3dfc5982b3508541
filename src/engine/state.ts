import type { DancerId, PieceId } from "../types.js";
import type { Universe } from "./universe.js";

const EMPTY: ReadonlySet<PieceId> = new Set();

/**
 * Plain, serializable view of an assignment state: each dancer's pieces,
 * sorted in piece declaration order.
 */
export type AssignmentRecord = Record<DancerId, PieceId[]>;

/**
 * Immutable snapshot mapping every dancer to the pieces they are cast in.
 *
 * The only mutable data in the system is expressed as a sequence of these
 * values: transitions derive a new snapshot and never touch the old one.
 * Deriving a state shares the piece sets of every untouched dancer, so
 * `next.piecesOf(other) === prev.piecesOf(other)` for all dancers the
 * action did not name.
 */
export class AssignmentState {
  readonly #universe: Universe;
  readonly #assignments: ReadonlyMap<DancerId, ReadonlySet<PieceId>>;
  readonly #headcounts: ReadonlyMap<PieceId, number>;
  #key: string | undefined;

  private constructor(
    universe: Universe,
    assignments: ReadonlyMap<DancerId, ReadonlySet<PieceId>>,
    headcounts: ReadonlyMap<PieceId, number>,
  ) {
    this.#universe = universe;
    this.#assignments = assignments;
    this.#headcounts = headcounts;
  }

  /** The `Init` state: every dancer unassigned. */
  static initial(universe: Universe): AssignmentState {
    const assignments = new Map<DancerId, ReadonlySet<PieceId>>();
    for (const dancer of universe.dancers) {
      assignments.set(dancer.id, EMPTY);
    }
    return new AssignmentState(universe, assignments, new Map());
  }

  /**
   * Builds a state from an explicit record. Dancers missing from the record
   * are unassigned. Intended for tests and for replaying persisted traces.
   */
  static fromRecord(universe: Universe, record: Partial<AssignmentRecord>): AssignmentState {
    let state = AssignmentState.initial(universe);
    for (const [dancerId, pieceIds] of Object.entries(record)) {
      if (!universe.hasDancer(dancerId)) {
        throw new Error(`Unknown dancer "${dancerId}"`);
      }
      for (const pieceId of pieceIds ?? []) {
        universe.piece(pieceId);
      }
      state = state.withPieces(dancerId, new Set(pieceIds));
    }
    return state;
  }

  get universe(): Universe {
    return this.#universe;
  }

  piecesOf(dancerId: DancerId): ReadonlySet<PieceId> {
    const pieces = this.#assignments.get(dancerId);
    if (!pieces) throw new Error(`Unknown dancer "${dancerId}"`);
    return pieces;
  }

  has(dancerId: DancerId, pieceId: PieceId): boolean {
    return this.piecesOf(dancerId).has(pieceId);
  }

  assignmentCount(dancerId: DancerId): number {
    return this.piecesOf(dancerId).size;
  }

  /** Number of dancers currently cast in the piece. */
  headcount(pieceId: PieceId): number {
    return this.#headcounts.get(pieceId) ?? 0;
  }

  /** Dancers cast in the piece, in declaration order. */
  dancersIn(pieceId: PieceId): DancerId[] {
    return this.#universe.dancers.filter((d) => this.has(d.id, pieceId)).map((d) => d.id);
  }

  /**
   * Derives a new state where only `dancerId`'s piece set is replaced.
   * Headcounts are adjusted incrementally.
   */
  withPieces(dancerId: DancerId, pieces: ReadonlySet<PieceId>): AssignmentState {
    const previous = this.piecesOf(dancerId);
    const assignments = new Map(this.#assignments);
    assignments.set(dancerId, pieces);

    const headcounts = new Map(this.#headcounts);
    for (const pieceId of previous) {
      if (!pieces.has(pieceId)) headcounts.set(pieceId, (headcounts.get(pieceId) ?? 0) - 1);
    }
    for (const pieceId of pieces) {
      if (!previous.has(pieceId)) headcounts.set(pieceId, (headcounts.get(pieceId) ?? 0) + 1);
    }

    return new AssignmentState(this.#universe, assignments, headcounts);
  }

  /**
   * Canonical hash of the state.
   *
   * One bit string per dancer (declaration order), one character per piece
   * (declaration order), joined by `|`. Two states are equal iff their keys
   * are equal.
   */
  get key(): string {
    if (this.#key === undefined) {
      const pieces = this.#universe.pieces;
      this.#key = this.#universe.dancers
        .map((dancer) => {
          const assigned = this.piecesOf(dancer.id);
          return pieces.map((p) => (assigned.has(p.id) ? "1" : "0")).join("");
        })
        .join("|");
    }
    return this.#key;
  }

  equals(other: AssignmentState): boolean {
    return this.key === other.key;
  }

  /** Plain object keyed by dancer id; every id becomes an own property. */
  toRecord(): AssignmentRecord {
    return Object.fromEntries(
      this.#universe.dancers.map((dancer): [DancerId, PieceId[]] => {
        const assigned = this.piecesOf(dancer.id);
        return [dancer.id, this.#universe.pieces.filter((p) => assigned.has(p.id)).map((p) => p.id)];
      }),
    );
  }

  toJSON(): AssignmentRecord {
    return this.toRecord();
  }
}

/**
 * Orders canonical keys so that the greatest key sorts first.
 *
 * With the bit-string encoding of {@link AssignmentState.key}, the greatest
 * key is the one where earlier-declared dancers hold earlier-declared pieces.
 */
export function compareStateKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}
