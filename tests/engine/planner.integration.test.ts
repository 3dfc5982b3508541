import { pino } from "pino";
import { describe, expect, it, vi } from "vitest";
import { ConfigError } from "../../src/errors.js";
import { isValidAssignment } from "../../src/engine/invariants.js";
import { Planner, planFeasible, planOptimal } from "../../src/engine/planner.js";
import { totalScore } from "../../src/engine/scoring.js";
import { AssignmentState } from "../../src/engine/state.js";
import { PlanResultSchema } from "../../src/engine/trace.schemas.js";
import { assign } from "../../src/engine/transitions.js";
import { loadUniverse } from "../../src/engine/universe.js";
import {
  expectViolation,
  replayTrace,
  scenarioA,
  scenarioBDescriptor,
  scenarioC,
  scenarioD,
  shortHandedUniverse,
  staffedUniverse,
} from "./helpers.js";

describe("Planner (integration)", () => {
  describe("feasible casting", () => {
    it("finds a short trace that casts the dancer who needs the piece", async () => {
      const universe = scenarioA();

      const result = await planFeasible(universe, { minLen: 1, maxLen: 3 });

      expect(result.status).toBe("found");
      expect(result.trace?.steps).toEqual([
        { index: 0, action: { type: "init" }, state: { A: [], B: [] } },
        { index: 1, action: { type: "assign", dancerId: "A", pieceId: "P" }, state: { A: ["P"], B: [] } },
      ]);
      expect(result.trace?.validAt).toBe(1);
      expect(result.stats).toMatchObject({ nodesExpanded: 1, statesVisited: 2, maxDepth: 1 });
    });

    it("pads the trace with stutter steps up to the minimum length", async () => {
      const universe = scenarioA();

      const result = await planFeasible(universe);

      const steps = result.trace?.steps ?? [];
      expect(steps).toHaveLength(6);
      expect(result.trace?.validAt).toBe(1);
      expect(steps.slice(2).map((s) => s.action.type)).toEqual([
        "stutter",
        "stutter",
        "stutter",
        "stutter",
      ]);
      expect(steps.at(-1)?.state).toEqual({ A: ["P"], B: [] });
    });

    it("reports unsat when full coverage is required but a dancer wants nothing", async () => {
      const universe = scenarioA();

      const result = await planFeasible(universe, { requireFullCoverage: true });

      expect(result.status).toBe("unsat_within_horizon");
      expect(result.trace).toBeUndefined();
      expect(result.stats.nodesExpanded).toBe(2);
    });
  });

  describe("infeasible casting", () => {
    it("refuses to load a dancer who wants a piece they can never attend", () => {
      expect(() => loadUniverse(scenarioBDescriptor)).toThrow(ConfigError);
    });

    it("reports unsat once that universe is loaded anyway", async () => {
      const universe = loadUniverse(scenarioBDescriptor, { preferenceAvailability: "ignore" });

      const feasible = await planFeasible(universe);
      const optimal = await planOptimal(universe);

      expect(feasible.status).toBe("unsat_within_horizon");
      expect(optimal.status).toBe("unsat_within_horizon");
      expect(
        expectViolation(assign(AssignmentState.initial(universe), universe, "A", "P")).kind,
      ).toBe("Unavailable");
    });
  });

  describe("optimization", () => {
    it("casts exactly one of two dancers into a single-seat piece", async () => {
      const universe = scenarioC();

      const result = await planOptimal(universe, { minLen: 1, maxLen: 3 });

      expect(result.status).toBe("found");
      expect(result.optimal).toBe(true);
      expect(result.score).toEqual({ total: 3, dancers: { A: 3, B: 0 } });
      expect(result.trace?.steps.at(-1)?.state).toEqual({ A: ["P"], B: [] });
      expect(result.stats).toMatchObject({ nodesExpanded: 3, statesVisited: 3 });
    });

    it("finds no reachable valid state that scores higher", async () => {
      const universe = scenarioC();
      const planner = new Planner(universe, { minLen: 1, maxLen: 3 });

      const states = await planner.reachableStates();
      const best = Math.max(
        ...states
          .filter((s) => isValidAssignment(s, universe))
          .map((s) => totalScore(universe, s)),
      );

      expect(best).toBe(3);
    });

    it("prefers the fairness-respecting optimum", async () => {
      const universe = scenarioD();

      const result = await planOptimal(universe, { minLen: 3, maxLen: 3, fairnessBound: 2 });

      expect(result.status).toBe("found");
      expect(result.score).toEqual({ total: 7, dancers: { A: 6, B: 1 } });
      expect(result.trace?.steps.at(-1)?.state).toEqual({ A: ["P1", "P2"], B: ["P3"] });
      expect(result.trace?.validAt).toBe(3);
    });

    it("gives everything to one dancer when the bound allows it", async () => {
      const universe = scenarioD();

      const result = await planOptimal(universe, { minLen: 3, maxLen: 3, fairnessBound: 3 });

      expect(result.score?.total).toBe(9);
      expect(result.trace?.steps.at(-1)?.state).toEqual({ A: ["P1", "P2", "P3"], B: [] });
    });

    it("reports unsat when no fairness-respecting valid state exists", async () => {
      const universe = scenarioD(false);

      const result = await planOptimal(universe, { minLen: 3, maxLen: 3, fairnessBound: 2 });

      expect(result.status).toBe("unsat_within_horizon");
      expect(result.score).toBeUndefined();
    });
  });

  describe("unreachable goals", () => {
    it("cannot satisfy a dancer who must have five pieces under a fairness bound", async () => {
      const ids = ["Q1", "Q2", "Q3", "Q4", "Q5"];
      const slots = ["S1", "S2", "S3", "S4", "S5"];
      const universe = loadUniverse({
        timeSlots: slots,
        pieces: ids.map((id, i) => ({
          id,
          rehearsalSlots: [slots[i] ?? "S1"],
          minDancers: 1,
          maxDancers: 1,
        })),
        dancers: [
          { id: "X", availability: slots, mustHave: ids },
          { id: "Y", availability: slots },
        ],
      });

      const result = await planFeasible(universe, { fairnessBound: 2 });

      expect(result.status).toBe("unsat_within_horizon");
    });

    it("cannot cover a dancer who avoids every piece", async () => {
      const universe = loadUniverse({
        timeSlots: ["T1"],
        pieces: [{ id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 2 }],
        dancers: [
          { id: "A", availability: ["T1"], avoid: ["P"] },
          { id: "B", availability: ["T1"], mustHave: ["P"] },
        ],
      });

      const strict = await planFeasible(universe, { requireFullCoverage: true });
      const necessity = await planFeasible(universe, {
        requireFullCoverage: true,
        avoidPolicy: "necessity",
      });

      expect(strict.status).toBe("unsat_within_horizon");
      expect(necessity.status).toBe("unsat_within_horizon");
    });
  });

  describe("avoid policy", () => {
    it("casts an avoiding dancer only when the piece cannot reach its minimum otherwise", async () => {
      const universe = shortHandedUniverse();

      const strict = await planFeasible(universe, { minLen: 2, maxLen: 3 });
      const necessity = await planFeasible(universe, {
        minLen: 2,
        maxLen: 3,
        avoidPolicy: "necessity",
      });

      expect(strict.status).toBe("unsat_within_horizon");
      expect(necessity.status).toBe("found");
      expect(necessity.trace?.steps.map((s) => s.action)).toEqual([
        { type: "init" },
        { type: "assign", dancerId: "A", pieceId: "P" },
        { type: "assign", dancerId: "B", pieceId: "P" },
      ]);
      expect(necessity.trace?.steps.at(-1)?.state).toEqual({ A: ["P"], B: ["P"], C: [] });
    });

    it("leaves the avoiding dancer out when a willing dancer can fill the piece", async () => {
      const universe = staffedUniverse();
      const planner = new Planner(universe, { minLen: 1, maxLen: 3, avoidPolicy: "necessity" });

      const result = await planner.findTrace();
      const reachable = await planner.reachableStates();

      expect(result.trace?.steps.at(-1)?.state).toEqual({ A: [], B: ["P"] });
      expect(reachable.some((s) => s.has("A", "P"))).toBe(false);
    });
  });

  describe("traces", () => {
    it("replays every recorded step through the transition engine", async () => {
      const universe = scenarioD();

      const result = await planFeasible(universe, { minLen: 4, maxLen: 6 });
      const trace = result.trace;
      if (!trace) throw new Error("expected a trace");

      const states = replayTrace(universe, trace);
      expect(states.map((s) => s.toRecord())).toEqual(trace.steps.map((s) => s.state));
      expect(trace.steps).toHaveLength(5);
      expect(trace.validAt).toBe(3);
      const valid = states[trace.validAt];
      expect(valid && isValidAssignment(valid, universe)).toBe(true);
    });

    it("keeps dancers whose ids shadow object built-ins in steps and scores", async () => {
      const universe = loadUniverse({
        timeSlots: ["T1"],
        pieces: [{ id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 1 }],
        dancers: [
          { id: "__proto__", availability: ["T1"], mustHave: ["P"] },
          { id: "constructor", availability: ["T1"] },
        ],
      });

      const result = await planOptimal(universe, { minLen: 1, maxLen: 2 });

      expect(result.status).toBe("found");
      expect(result.trace?.steps.map((s) => Object.entries(s.state))).toEqual([
        [
          ["__proto__", []],
          ["constructor", []],
        ],
        [
          ["__proto__", ["P"]],
          ["constructor", []],
        ],
      ]);
      expect(result.score?.total).toBe(3);
      expect(Object.entries(result.score?.dancers ?? {})).toEqual([
        ["__proto__", 3],
        ["constructor", 0],
      ]);
    });

    it("emits results that match the published schema", async () => {
      const result = await planOptimal(scenarioC(), { minLen: 1, maxLen: 2 });

      expect(PlanResultSchema.safeParse(result).success).toBe(true);
    });
  });

  describe("budgets", () => {
    it("stops after the node budget and says so", async () => {
      const result = await planOptimal(scenarioD(), { minLen: 3, maxLen: 3, maxNodes: 1 });

      expect(result.status).toBe("budget_exceeded");
      expect(result.budget).toBe("nodes");
      expect(result.trace).toBeUndefined();
      expect(result.stats.nodesExpanded).toBe(1);
    });

    it("returns the best witness found before the budget ran out", async () => {
      const result = await planOptimal(scenarioC(), { minLen: 1, maxLen: 3, maxNodes: 1 });

      expect(result.status).toBe("budget_exceeded");
      expect(result.optimal).toBe(false);
      expect(result.score?.total).toBe(3);
      expect(result.trace?.steps.at(-1)?.state).toEqual({ A: ["P"], B: [] });
    });

    it("stops when the signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await new Planner(scenarioD()).findTrace({ signal: controller.signal });

      expect(result.status).toBe("budget_exceeded");
      expect(result.budget).toBe("aborted");
      expect(result.stats.nodesExpanded).toBe(0);
    });

    it("stops once the time limit has passed", async () => {
      let clock = 0;
      const now = vi.spyOn(performance, "now").mockImplementation(() => (clock += 10));
      try {
        const result = await planOptimal(scenarioD(), { minLen: 3, maxLen: 3, timeLimitMs: 15 });

        expect(result.status).toBe("budget_exceeded");
        expect(result.budget).toBe("time");
        expect(result.trace).toBeUndefined();
        expect(result.stats.nodesExpanded).toBe(1);
        expect(result.stats.elapsedMs).toBe(30);
      } finally {
        now.mockRestore();
      }
    });

    it("reaches the same answer while yielding after every expansion", async () => {
      const result = await planOptimal(scenarioD(), {
        minLen: 3,
        maxLen: 3,
        fairnessBound: 2,
        yieldEvery: 1,
      });

      expect(result.score?.total).toBe(7);
    });

    it("logs a warning when a budget is exceeded", async () => {
      const lines: string[] = [];
      const logger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });

      await planOptimal(scenarioD(), { minLen: 3, maxLen: 3, maxNodes: 1, logger });

      const entries: { level: number; msg: string; budget?: string }[] = lines.map((line) =>
        JSON.parse(line),
      );
      expect(entries.map((e) => e.msg)).toEqual([
        "search started",
        "search budget exceeded",
        "search finished",
      ]);
      expect(entries[1]).toMatchObject({ level: 40, budget: "nodes" });
    });
  });

  describe("options", () => {
    it("rejects a minimum length above the maximum", () => {
      let error: unknown;
      try {
        new Planner(scenarioA(), { minLen: 4, maxLen: 2 });
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.kind).toBe("InvalidOptions");
      expect(error instanceof ConfigError && error.issues.map((i) => i.path)).toEqual(["minLen"]);
    });

    it("rejects a node budget below one", () => {
      expect(() => new Planner(scenarioA(), { maxNodes: 0 })).toThrow(ConfigError);
    });
  });
});
