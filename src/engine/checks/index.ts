export { createAvailabilityCheck } from "./availability.js";
export { createCapacityCheck } from "./capacity.js";
export { createCoverageCheck } from "./coverage.js";
export { createFairnessCheck } from "./fairness.js";
export { createHardAvoidCheck } from "./hard-avoid.js";
export { createMustHaveCheck } from "./must-have.js";
export { createScheduleConflictCheck } from "./schedule-conflict.js";
