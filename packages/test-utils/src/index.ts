// @pointing-lab/test-utils
// Fixtures and deterministic random sources for pointing-lab tests.

export {
  createTrajectory,
  createStraightTrajectory,
  createTrialResult,
  createSessionRecord,
} from "./factories.js";

export { sequenceRandom, constantRandom } from "./random.js";
export type { CountingRandom } from "./random.js";
