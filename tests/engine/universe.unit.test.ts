import { describe, expect, it } from "vitest";
import { loadUniverse } from "../../src/engine/universe.js";
import type { UniverseDescriptor } from "../../src/types.js";
import { castingDescriptor, expectConfigError, scenarioBDescriptor } from "./helpers.js";

function withPiece(
  piece: UniverseDescriptor["pieces"][number],
  dancers: UniverseDescriptor["dancers"] = [],
): UniverseDescriptor {
  return { timeSlots: ["T1", "T2"], pieces: [piece], dancers };
}

describe("loadUniverse", () => {
  it("keeps declaration order and exposes set-based lookups", () => {
    const universe = loadUniverse(castingDescriptor);

    expect(universe.dancers.map((d) => d.id)).toEqual(["A", "B", "C", "D"]);
    expect(universe.pieces.map((p) => p.id)).toEqual(["P1", "P2", "P3"]);
    expect([...universe.piece("P2").rehearsalSlots]).toEqual(["T1", "T2"]);
    expect(universe.dancer("B").availability.has("T1")).toBe(true);
    expect(universe.pieceIndex("P3")).toBe(2);
  });

  it("reports each dancer's tier for a piece", () => {
    const universe = loadUniverse(castingDescriptor);

    expect(universe.tierOf("A", "P1")).toBe("mustHave");
    expect(universe.tierOf("A", "P2")).toBe("preferred");
    expect(universe.tierOf("A", "P3")).toBe("avoid");
    expect(universe.tierOf("D", "P1")).toBeUndefined();
  });

  it("counts the dancers able and willing to fill each piece", () => {
    const universe = loadUniverse(castingDescriptor);

    expect(universe.pieces.map((p) => universe.willingCount(p.id))).toEqual([2, 1, 1]);
    expect(() => universe.willingCount("nope")).toThrow('Unknown piece "nope"');
  });

  it("freezes the universe and its entities", () => {
    const universe = loadUniverse(castingDescriptor);

    expect(Object.isFrozen(universe)).toBe(true);
    expect(Object.isFrozen(universe.pieces)).toBe(true);
    expect(Object.isFrozen(universe.dancer("A"))).toBe(true);
  });

  it("throws on lookups of undeclared ids", () => {
    const universe = loadUniverse(castingDescriptor);

    expect(() => universe.piece("nope")).toThrow('Unknown piece "nope"');
    expect(() => universe.dancer("nope")).toThrow('Unknown dancer "nope"');
    expect(universe.hasPiece("nope")).toBe(false);
    expect(universe.hasDancer("A")).toBe(true);
  });

  it("accepts a dancer who avoids a piece outside their availability", () => {
    const universe = loadUniverse({
      timeSlots: ["T1", "T2"],
      pieces: [{ id: "P", rehearsalSlots: ["T2"], minDancers: 1, maxDancers: 1 }],
      dancers: [{ id: "A", availability: ["T1"], avoid: ["P"] }],
    });

    expect(universe.tierOf("A", "P")).toBe("avoid");
  });

  describe("rejections", () => {
    it("rejects a piece without rehearsal slots", () => {
      const error = expectConfigError(
        withPiece({ id: "P", rehearsalSlots: [], minDancers: 1, maxDancers: 1 }),
      );

      expect(error.kind).toBe("EmptyRehearsalSlots");
      expect(error.entityId).toBe("P");
    });

    it("rejects a piece rehearsing in an undeclared slot", () => {
      const error = expectConfigError(
        withPiece({ id: "P", rehearsalSlots: ["T9"], minDancers: 1, maxDancers: 1 }),
      );

      expect(error.kind).toBe("UnknownReference");
      expect(error.message).toBe('Piece "P" rehearses in undeclared time slot "T9"');
    });

    it.each([
      { minDancers: 1, maxDancers: 0 },
      { minDancers: 0, maxDancers: 2 },
      { minDancers: 3, maxDancers: 2 },
      { minDancers: -1, maxDancers: -1 },
    ])("rejects capacity [$minDancers, $maxDancers]", ({ minDancers, maxDancers }) => {
      const error = expectConfigError(
        withPiece({ id: "P", rehearsalSlots: ["T1"], minDancers, maxDancers }),
      );

      expect(error.kind).toBe("InvalidCapacity");
      expect(error.entityId).toBe("P");
    });

    it("rejects a piece listed in two tiers of one dancer", () => {
      const error = expectConfigError(
        withPiece({ id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 1 }, [
          { id: "A", availability: ["T1"], mustHave: ["P"], avoid: ["P"] },
        ]),
      );

      expect(error.kind).toBe("OverlappingTiers");
      expect(error.message).toBe('Dancer "A" lists piece "P" as both mustHave and avoid');
    });

    it("rejects a tier naming an undeclared piece", () => {
      const error = expectConfigError(
        withPiece({ id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 1 }, [
          { id: "A", availability: ["T1"], preferred: ["Q"] },
        ]),
      );

      expect(error.kind).toBe("UnknownReference");
      expect(error.entityId).toBe("A");
    });

    it("rejects availability in an undeclared slot", () => {
      const error = expectConfigError(
        withPiece({ id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 1 }, [
          { id: "A", availability: ["T7"] },
        ]),
      );

      expect(error.kind).toBe("UnknownReference");
    });

    it("rejects a wanted piece outside the dancer's availability", () => {
      const error = expectConfigError(scenarioBDescriptor);

      expect(error.kind).toBe("PreferenceOutsideAvailability");
      expect(error.entityId).toBe("A");
    });

    it("loads a wanted piece outside availability when told to ignore it", () => {
      const universe = loadUniverse(scenarioBDescriptor, { preferenceAvailability: "ignore" });

      expect(universe.dancer("A").mustHave.has("P")).toBe(true);
      expect(universe.dancer("A").availability.size).toBe(0);
    });

    it("rejects duplicate ids", () => {
      const slots = expectConfigError({ timeSlots: ["T1", "T1"], pieces: [], dancers: [] });
      const pieces = expectConfigError({
        timeSlots: ["T1"],
        pieces: [
          { id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 1 },
          { id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 2 },
        ],
        dancers: [],
      });
      const dancers = expectConfigError({
        timeSlots: ["T1"],
        pieces: [],
        dancers: [
          { id: "A", availability: [] },
          { id: "A", availability: ["T1"] },
        ],
      });

      expect([slots.kind, pieces.kind, dancers.kind]).toEqual([
        "DuplicateId",
        "DuplicateId",
        "DuplicateId",
      ]);
      expect([slots.entityId, pieces.entityId, dancers.entityId]).toEqual(["T1", "P", "A"]);
    });

    it("reports schema issues with their paths", () => {
      const error = expectConfigError(
        withPiece({ id: "", rehearsalSlots: ["T1"], minDancers: 1.5, maxDancers: 2 }),
      );

      expect(error.kind).toBe("SchemaViolation");
      expect(error.issues.map((issue) => issue.path)).toEqual(["pieces.0.id", "pieces.0.minDancers"]);
    });
  });
});
