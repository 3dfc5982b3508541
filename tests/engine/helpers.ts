import { ConfigError } from "../../src/errors.js";
import { AssignmentState } from "../../src/engine/state.js";
import type { Trace } from "../../src/engine/trace.js";
import {
  applyAction,
  type Action,
  type PreconditionViolation,
  type TransitionOptions,
  type TransitionResult,
} from "../../src/engine/transitions.js";
import {
  loadUniverse,
  type LoadUniverseOptions,
  type Universe,
} from "../../src/engine/universe.js";
import type { UniverseDescriptor } from "../../src/types.js";

/**
 * Three slots, three pieces, four dancers.
 *
 * - P1 {T1} [1,1], P2 {T1,T2} [1,1], P3 {T3} [1,3]
 * - A: everywhere; mustHave P1, preferred P2, avoid P3
 * - B: T1 only; mustHave P1
 * - C: T3 only; preferred P3
 * - D: everywhere; no tiers
 */
export const castingDescriptor: UniverseDescriptor = {
  timeSlots: ["T1", "T2", "T3"],
  pieces: [
    { id: "P1", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 1 },
    { id: "P2", rehearsalSlots: ["T1", "T2"], minDancers: 1, maxDancers: 1 },
    { id: "P3", rehearsalSlots: ["T3"], minDancers: 1, maxDancers: 3 },
  ],
  dancers: [
    {
      id: "A",
      availability: ["T1", "T2", "T3"],
      mustHave: ["P1"],
      preferred: ["P2"],
      avoid: ["P3"],
    },
    { id: "B", availability: ["T1"], mustHave: ["P1"] },
    { id: "C", availability: ["T3"], preferred: ["P3"] },
    { id: "D", availability: ["T1", "T2", "T3"] },
  ],
};

export function castingUniverse(): Universe {
  return loadUniverse(castingDescriptor);
}

/** One piece P {T1} [1,2]; A wants it, B has no opinion. */
export function scenarioA(): Universe {
  return loadUniverse({
    timeSlots: ["T1"],
    pieces: [{ id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 2 }],
    dancers: [
      { id: "A", availability: ["T1"], mustHave: ["P"] },
      { id: "B", availability: ["T1"] },
    ],
  });
}

/** As {@link scenarioA}, but A is never available. */
export const scenarioBDescriptor: UniverseDescriptor = {
  timeSlots: ["T1"],
  pieces: [{ id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 2 }],
  dancers: [
    { id: "A", availability: [], mustHave: ["P"] },
    { id: "B", availability: ["T1"] },
  ],
};

/** One single-seat piece that both dancers must have. */
export function scenarioC(): Universe {
  return loadUniverse({
    timeSlots: ["T1"],
    pieces: [{ id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 1 }],
    dancers: [
      { id: "A", availability: ["T1"], mustHave: ["P"] },
      { id: "B", availability: ["T1"], mustHave: ["P"] },
    ],
  });
}

/**
 * Three single-seat pieces in distinct slots. A must have all of them, B
 * would like them (or has no opinion when `bWants` is false).
 */
export function scenarioD(bWants = true): Universe {
  const pieceIds = ["P1", "P2", "P3"];
  return loadUniverse({
    timeSlots: ["T1", "T2", "T3"],
    pieces: pieceIds.map((id, i) => ({
      id,
      rehearsalSlots: [`T${i + 1}`],
      minDancers: 1,
      maxDancers: 1,
    })),
    dancers: [
      { id: "A", availability: ["T1", "T2", "T3"], mustHave: pieceIds },
      {
        id: "B",
        availability: ["T1", "T2", "T3"],
        ...(bWants ? { preferred: pieceIds } : {}),
      },
    ],
  });
}

/**
 * P {T1} [2,3] has a single willing dancer (B). A and C avoid it, so under
 * the necessity policy one of them has to step in.
 */
export function shortHandedUniverse(): Universe {
  return loadUniverse({
    timeSlots: ["T1"],
    pieces: [{ id: "P", rehearsalSlots: ["T1"], minDancers: 2, maxDancers: 3 }],
    dancers: [
      { id: "A", availability: ["T1"], avoid: ["P"] },
      { id: "B", availability: ["T1"], preferred: ["P"] },
      { id: "C", availability: ["T1"], avoid: ["P"] },
    ],
  });
}

/** P {T1} [1,2]: A avoids it, B prefers it and can fill it alone. */
export function staffedUniverse(): Universe {
  return loadUniverse({
    timeSlots: ["T1"],
    pieces: [{ id: "P", rehearsalSlots: ["T1"], minDancers: 1, maxDancers: 2 }],
    dancers: [
      { id: "A", availability: ["T1"], avoid: ["P"] },
      { id: "B", availability: ["T1"], preferred: ["P"] },
    ],
  });
}

export function expectOk(result: TransitionResult): AssignmentState {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.violation.kind}: ${result.violation.message}`);
  }
  return result.state;
}

export function expectViolation(result: TransitionResult): PreconditionViolation {
  if (result.ok) {
    throw new Error("expected a precondition violation, got success");
  }
  return result.violation;
}

export function expectConfigError(
  descriptor: UniverseDescriptor,
  options?: LoadUniverseOptions,
): ConfigError {
  try {
    loadUniverse(descriptor, options);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("expected loadUniverse to throw a ConfigError");
}

/**
 * Replays a trace's actions from the initial state and returns every
 * intermediate state, so tests can compare them with the recorded steps.
 */
export function replayTrace(
  universe: Universe,
  trace: Trace,
  options: TransitionOptions = {},
): AssignmentState[] {
  let state = AssignmentState.initial(universe);
  const states = [state];
  for (const step of trace.steps.slice(1)) {
    if (step.action.type === "init") throw new Error("init may only appear at step 0");
    const action: Action = step.action;
    state = expectOk(applyAction(state, universe, action, options));
    states.push(state);
  }
  return states;
}
