import {
  createAvailabilityCheck,
  createCapacityCheck,
  createCoverageCheck,
  createFairnessCheck,
  createHardAvoidCheck,
  createMustHaveCheck,
  createScheduleConflictCheck,
} from "./index.js";
import type { BuiltInCheckFactories, CheckFactories, CheckName } from "./checks.types.js";

export const builtInCheckFactories: BuiltInCheckFactories = {
  "schedule-conflict": createScheduleConflictCheck,
  availability: createAvailabilityCheck,
  capacity: createCapacityCheck,
  "hard-avoid": createHardAvoidCheck,
  "must-have": createMustHaveCheck,
  fairness: createFairnessCheck,
  coverage: createCoverageCheck,
};

function isBuiltInCheckName(name: string): name is CheckName {
  return Object.hasOwn(builtInCheckFactories, name);
}

/**
 * Creates a check factory map, preventing overriding built-in checks.
 */
export function createCheckFactory<F extends CheckFactories>(factories: F): F {
  for (const name in factories) {
    if (isBuiltInCheckName(name) && factories[name] !== builtInCheckFactories[name]) {
      throw new Error(`Cannot override built-in check "${name}" in custom factory`);
    }
  }
  return factories;
}
