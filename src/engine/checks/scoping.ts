import * as z from "zod";
import type { Dancer, Piece } from "../../types.js";
import type { Universe } from "../universe.js";

/**
 * Fields for narrowing a check to specific dancers or pieces.
 *
 * When no scope is specified, the check applies to the whole universe.
 * Ids that the universe does not declare are ignored.
 */
export interface ScopeConfig {
  /** Restrict to these dancers. */
  dancerIds?: string[];
  /** Restrict to these pieces. */
  pieceIds?: string[];
}

type ScopeKey = "dancers" | "pieces";

type ScopeShape<T extends readonly ScopeKey[]> = ("dancers" extends T[number]
  ? { dancerIds: z.ZodOptional<z.ZodArray<z.ZodString>> }
  : {}) &
  ("pieces" extends T[number] ? { pieceIds: z.ZodOptional<z.ZodArray<z.ZodString>> } : {});

const scopeFields = <T extends readonly ScopeKey[]>(supported: T) =>
  ({
    ...(supported.includes("dancers") ? { dancerIds: z.array(z.string()).optional() } : {}),
    ...(supported.includes("pieces") ? { pieceIds: z.array(z.string()).optional() } : {}),
  }) as ScopeShape<T>;

/**
 * Extends a check's config schema with the scope fields it supports.
 */
export const withScopes = <T extends z.ZodRawShape, TScopes extends readonly ScopeKey[]>(
  base: z.ZodObject<T>,
  scopes: TScopes,
) => base.extend(scopeFields(scopes));

export function resolveDancers(scope: ScopeConfig, universe: Universe): readonly Dancer[] {
  const ids = scope.dancerIds;
  if (!ids || ids.length === 0) return universe.dancers;
  const wanted = new Set(ids);
  return universe.dancers.filter((d) => wanted.has(d.id));
}

export function resolvePieces(scope: ScopeConfig, universe: Universe): readonly Piece[] {
  const ids = scope.pieceIds;
  if (!ids || ids.length === 0) return universe.pieces;
  const wanted = new Set(ids);
  return universe.pieces.filter((p) => wanted.has(p.id));
}
